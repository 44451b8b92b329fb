import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { Decimal } from 'decimal.js';
import {
  ChargeRequest,
  ChargeResponse,
  PaymentGateway,
  RefundRequest,
  RefundResponse,
  VoidRequest,
  VoidResponse,
} from './payment-gateway';

export const DECLINED_METHOD = 'tok_decline';
export const INSUFFICIENT_FUNDS_METHOD = 'tok_insufficient';

interface ChargeRecord {
  transactionId: string;
  amount: Decimal;
  currency: string;
  refunded: Decimal;
}

export const VOIDED_REASON = 'VOIDED';

/**
 * In-process gateway used when no real provider is configured. Keeps an
 * idempotency ledger for charges and refunds.
 */
@Injectable()
export class SandboxPaymentGateway extends PaymentGateway {
  private readonly logger = new Logger(SandboxPaymentGateway.name);
  private readonly charges = new Map<string, ChargeResponse>();
  private readonly transactions = new Map<string, ChargeRecord>();
  private readonly refunds = new Map<string, RefundResponse>();

  get settledCharges(): number {
    return this.transactions.size;
  }

  async charge(request: ChargeRequest): Promise<ChargeResponse> {
    const recorded = this.charges.get(request.idempotencyKey);
    if (recorded) {
      this.logger.log(`Replaying charge for key ${request.idempotencyKey}`);
      return recorded;
    }

    const response = this.decide(request);
    this.charges.set(request.idempotencyKey, response);

    if (response.status === 'SUCCESS') {
      this.transactions.set(response.transactionId, {
        transactionId: response.transactionId,
        amount: new Decimal(request.amount),
        currency: request.currency,
        refunded: new Decimal(0),
      });
      this.logger.log(`Charged ${request.amount} ${request.currency} as ${response.transactionId}`);
    } else {
      this.logger.warn(`Charge declined for key ${request.idempotencyKey}: ${response.reason}`);
    }

    return response;
  }

  async refund(request: RefundRequest): Promise<RefundResponse> {
    const recorded = this.refunds.get(request.idempotencyKey);
    if (recorded) {
      return recorded;
    }

    const transaction = this.transactions.get(request.transactionId);
    let response: RefundResponse;

    if (!transaction) {
      response = { status: 'FAILED', reason: 'UNKNOWN_TRANSACTION' };
    } else if (transaction.refunded.plus(request.amount).greaterThan(transaction.amount)) {
      response = { status: 'FAILED', reason: 'AMOUNT_EXCEEDS_CHARGE' };
    } else {
      transaction.refunded = transaction.refunded.plus(request.amount);
      response = { status: 'REFUNDED', refundId: `re_${randomUUID()}` };
      this.logger.log(`Refunded ${request.amount} ${request.currency} on ${request.transactionId}`);
    }

    this.refunds.set(request.idempotencyKey, response);
    return response;
  }

  async voidCharge(request: VoidRequest): Promise<VoidResponse> {
    const recorded = this.charges.get(request.chargeIdempotencyKey);

    if (!recorded) {
      this.charges.set(request.chargeIdempotencyKey, { status: 'FAILURE', reason: VOIDED_REASON });
      this.logger.log(`Voided key ${request.chargeIdempotencyKey} before any charge settled`);
      return { status: 'VOIDED' };
    }
    if (recorded.status === 'FAILURE') {
      return { status: 'VOIDED' };
    }

    const transaction = this.transactions.get(recorded.transactionId);
    if (!transaction) {
      return { status: 'FAILED', reason: 'UNKNOWN_TRANSACTION' };
    }

    const amount = transaction.amount.minus(transaction.refunded).toNumber();
    const refunded = await this.refund({
      transactionId: transaction.transactionId,
      amount,
      currency: transaction.currency,
      idempotencyKey: request.refundIdempotencyKey,
    });

    if (refunded.status === 'FAILED') {
      return refunded;
    }
    return { status: 'REFUNDED', transactionId: transaction.transactionId, refundId: refunded.refundId, amount };
  }

  private decide(request: ChargeRequest): ChargeResponse {
    if (request.method === DECLINED_METHOD) {
      return { status: 'FAILURE', reason: 'CARD_DECLINED' };
    }
    if (request.method === INSUFFICIENT_FUNDS_METHOD) {
      return { status: 'FAILURE', reason: 'INSUFFICIENT_FUNDS' };
    }
    if (request.amount <= 0) {
      return { status: 'FAILURE', reason: 'INVALID_AMOUNT' };
    }
    return { status: 'SUCCESS', transactionId: `txn_${randomUUID()}` };
  }
}
