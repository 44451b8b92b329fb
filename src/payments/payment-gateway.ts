export interface ChargeRequest {
  amount: number;
  currency: string;
  method: string;
  idempotencyKey: string;
}

export type ChargeResponse = { status: 'SUCCESS'; transactionId: string } | { status: 'FAILURE'; reason: string };

export interface RefundRequest {
  transactionId: string;
  amount: number;
  currency: string;
  idempotencyKey: string;
}

export type RefundResponse = { status: 'REFUNDED'; refundId: string } | { status: 'FAILED'; reason: string };

export interface VoidRequest {
  chargeIdempotencyKey: string;
  refundIdempotencyKey: string;
}

/**
 * VOIDED: nothing settled under the key, and a charge that arrives later
 * with it is refused. REFUNDED: the charge had settled and was refunded in full.
 */
export type VoidResponse =
  | { status: 'VOIDED' }
  | { status: 'REFUNDED'; transactionId: string; refundId: string; amount: number }
  | { status: 'FAILED'; reason: string };

/**
 * Contract the engine expects from a payment provider. A repeated
 * idempotency key must return the first result and never move money twice.
 */
export abstract class PaymentGateway {
  abstract charge(request: ChargeRequest): Promise<ChargeResponse>;
  abstract refund(request: RefundRequest): Promise<RefundResponse>;
  /** Settles a charge whose outcome the engine never learned. */
  abstract voidCharge(request: VoidRequest): Promise<VoidResponse>;
}

/**
 * Closed set of outcomes the orchestrator handles. A timeout is its own
 * variant: the charge may still settle after it, so it has to be voided.
 */
export type PaymentOutcome =
  | { outcome: 'SUCCESS'; transactionId: string }
  | { outcome: 'FAILURE'; reason: string }
  | { outcome: 'TIMEOUT' };
