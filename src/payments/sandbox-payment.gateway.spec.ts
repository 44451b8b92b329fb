import { SandboxPaymentGateway } from './sandbox-payment.gateway';

describe('SandboxPaymentGateway', () => {
  let gateway: SandboxPaymentGateway;

  beforeEach(() => {
    gateway = new SandboxPaymentGateway();
    jest.spyOn(gateway['logger'], 'log').mockImplementation();
    jest.spyOn(gateway['logger'], 'warn').mockImplementation();
  });

  it('should charge once per idempotency key', async () => {
    const request = { amount: 27, currency: 'USD', method: 'tok_visa', idempotencyKey: 'hold:abc' };

    const first = await gateway.charge(request);
    const second = await gateway.charge(request);

    expect(first.status).toBe('SUCCESS');
    expect(second).toEqual(first);
    expect(gateway.settledCharges).toBe(1);
  });

  it('should decline the decline token', async () => {
    const response = await gateway.charge({
      amount: 10,
      currency: 'USD',
      method: 'tok_decline',
      idempotencyKey: 'k1',
    });

    expect(response).toEqual({ status: 'FAILURE', reason: 'CARD_DECLINED' });
  });

  it('should fail the insufficient-funds token', async () => {
    const response = await gateway.charge({
      amount: 10,
      currency: 'USD',
      method: 'tok_insufficient',
      idempotencyKey: 'k2',
    });

    expect(response).toEqual({ status: 'FAILURE', reason: 'INSUFFICIENT_FUNDS' });
  });

  it('should refund at most the charged amount', async () => {
    const charge = await gateway.charge({ amount: 20, currency: 'USD', method: 'tok_visa', idempotencyKey: 'k3' });
    if (charge.status !== 'SUCCESS') {
      throw new Error('expected a successful charge');
    }

    const refund = await gateway.refund({
      transactionId: charge.transactionId,
      amount: 15,
      currency: 'USD',
      idempotencyKey: 'refund:b1',
    });
    const replay = await gateway.refund({
      transactionId: charge.transactionId,
      amount: 15,
      currency: 'USD',
      idempotencyKey: 'refund:b1',
    });
    const excess = await gateway.refund({
      transactionId: charge.transactionId,
      amount: 10,
      currency: 'USD',
      idempotencyKey: 'refund:b2',
    });

    expect(refund.status).toBe('REFUNDED');
    expect(replay).toEqual(refund);
    expect(excess).toEqual({ status: 'FAILED', reason: 'AMOUNT_EXCEEDS_CHARGE' });
  });

  it('should refuse a charge that arrives after its key was voided', async () => {
    const voided = await gateway.voidCharge({ chargeIdempotencyKey: 'hold:late', refundIdempotencyKey: 'refund:b4' });
    const late = await gateway.charge({ amount: 20, currency: 'USD', method: 'tok_visa', idempotencyKey: 'hold:late' });

    expect(voided).toEqual({ status: 'VOIDED' });
    expect(late).toEqual({ status: 'FAILURE', reason: 'VOIDED' });
    expect(gateway.settledCharges).toBe(0);
  });

  it('should refund in full a charge that settled before the void', async () => {
    const charge = await gateway.charge({ amount: 20, currency: 'USD', method: 'tok_visa', idempotencyKey: 'hold:k5' });
    if (charge.status !== 'SUCCESS') {
      throw new Error('expected a successful charge');
    }

    const voided = await gateway.voidCharge({ chargeIdempotencyKey: 'hold:k5', refundIdempotencyKey: 'refund:b5' });
    const again = await gateway.voidCharge({ chargeIdempotencyKey: 'hold:k5', refundIdempotencyKey: 'refund:b5' });
    const excess = await gateway.refund({
      transactionId: charge.transactionId,
      amount: 1,
      currency: 'USD',
      idempotencyKey: 'refund:b6',
    });

    expect(voided).toEqual({
      status: 'REFUNDED',
      transactionId: charge.transactionId,
      refundId: expect.stringMatching(/^re_/),
      amount: 20,
    });
    expect(again).toEqual(voided);
    expect(excess).toEqual({ status: 'FAILED', reason: 'AMOUNT_EXCEEDS_CHARGE' });
  });

  it('should reject refunds for unknown transactions', async () => {
    const response = await gateway.refund({
      transactionId: 'txn_missing',
      amount: 5,
      currency: 'USD',
      idempotencyKey: 'refund:b3',
    });

    expect(response).toEqual({ status: 'FAILED', reason: 'UNKNOWN_TRANSACTION' });
  });
});
