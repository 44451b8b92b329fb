import { Injectable, Logger } from '@nestjs/common';
import { PaymentsService } from './payments.service';
import { retryWithBackoff } from '../utils/retry.util';

export interface RefundInstruction {
  bookingId: string;
  paymentTransactionId?: string;
  refundAmount?: number;
  currency?: string;
  /** Key of a charge that timed out; set when no transaction id is known. */
  chargeIdempotencyKey?: string;
}

export type SettlementResult =
  | { status: 'REFUNDED'; refundId: string }
  | { status: 'VOIDED' }
  | { status: 'SKIPPED'; reason: string }
  | { status: 'REJECTED'; reason: string };

/**
 * Moves refund money for cancelled or expired bookings, and voids charges
 * that timed out. Runs from the event consumer, so a thrown error nacks the
 * message for redelivery.
 */
@Injectable()
export class RefundSettlementService {
  private readonly logger = new Logger(RefundSettlementService.name);

  constructor(private readonly paymentsService: PaymentsService) {}

  async settle(instruction: RefundInstruction): Promise<SettlementResult> {
    const { bookingId, paymentTransactionId, refundAmount, chargeIdempotencyKey } = instruction;

    if (!paymentTransactionId && chargeIdempotencyKey) {
      return this.voidTimedOutCharge(bookingId, chargeIdempotencyKey);
    }
    if (!paymentTransactionId) {
      return { status: 'SKIPPED', reason: 'NO_CHARGE' };
    }
    if (refundAmount === undefined || refundAmount <= 0) {
      return { status: 'SKIPPED', reason: 'NOTHING_TO_REFUND' };
    }

    const response = await retryWithBackoff(
      () =>
        this.paymentsService.refund({
          transactionId: paymentTransactionId,
          amount: refundAmount,
          currency: instruction.currency ?? 'USD',
          idempotencyKey: `refund:${bookingId}`,
        }),
      { maxAttempts: 5, initialDelayMs: 200, label: `refund for booking ${bookingId}` },
    );

    if (response.status === 'FAILED') {
      this.logger.error(`Refund for booking ${bookingId} rejected by gateway: ${response.reason}`);
      return { status: 'REJECTED', reason: response.reason };
    }

    this.logger.log(`Refund ${response.refundId} of ${refundAmount} settled for booking ${bookingId}`);
    return { status: 'REFUNDED', refundId: response.refundId };
  }

  private async voidTimedOutCharge(bookingId: string, chargeIdempotencyKey: string): Promise<SettlementResult> {
    const response = await retryWithBackoff(
      () =>
        this.paymentsService.voidCharge({
          chargeIdempotencyKey,
          refundIdempotencyKey: `refund:${bookingId}`,
        }),
      { maxAttempts: 5, initialDelayMs: 200, label: `void for booking ${bookingId}` },
    );

    switch (response.status) {
      case 'VOIDED':
        this.logger.log(`Timed-out charge ${chargeIdempotencyKey} voided before settling`);
        return { status: 'VOIDED' };
      case 'REFUNDED':
        this.logger.log(
          `Timed-out charge ${response.transactionId} refunded in full (${response.amount}) for booking ${bookingId}`,
        );
        return { status: 'REFUNDED', refundId: response.refundId };
      case 'FAILED':
        this.logger.error(`Void of charge ${chargeIdempotencyKey} rejected by gateway: ${response.reason}`);
        return { status: 'REJECTED', reason: response.reason };
    }
  }
}
