import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom, from, timeout, TimeoutError } from 'rxjs';
import {
  ChargeRequest,
  PaymentGateway,
  PaymentOutcome,
  RefundRequest,
  RefundResponse,
  VoidRequest,
  VoidResponse,
} from './payment-gateway';

@Injectable()
export class PaymentsService {
  private readonly logger = new Logger(PaymentsService.name);
  private readonly timeoutMs: number;

  constructor(
    private readonly gateway: PaymentGateway,
    private readonly configService: ConfigService,
  ) {
    this.timeoutMs = this.configService.get<number>('booking.paymentTimeoutMs', 30000);
  }

  /**
   * Charges through the gateway, bounded by the configured timeout. Never
   * throws: every result, including a gateway error, maps to an outcome.
   */
  async charge(request: ChargeRequest): Promise<PaymentOutcome> {
    try {
      const response = await firstValueFrom(from(this.gateway.charge(request)).pipe(timeout(this.timeoutMs)));

      if (response.status === 'SUCCESS') {
        return { outcome: 'SUCCESS', transactionId: response.transactionId };
      }
      return { outcome: 'FAILURE', reason: response.reason };
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.logger.warn(`Charge ${request.idempotencyKey} timed out after ${this.timeoutMs}ms`);
        return { outcome: 'TIMEOUT' };
      }

      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Charge ${request.idempotencyKey} failed at the gateway: ${errorMessage}`, errorStack);
      return { outcome: 'FAILURE', reason: 'GATEWAY_ERROR' };
    }
  }

  refund(request: RefundRequest): Promise<RefundResponse> {
    return this.gateway.refund(request);
  }

  voidCharge(request: VoidRequest): Promise<VoidResponse> {
    return this.gateway.voidCharge(request);
  }
}
