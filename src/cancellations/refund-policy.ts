import { Decimal } from 'decimal.js';

export interface RefundPolicy {
  cutoffMinutes: number;
  fullRefundHours: number;
  partialRefundPercent: number;
}

export type RefundDecision =
  | { eligible: true; refundAmount: number; refundPercent: number; minutesToShow: number }
  | { eligible: false; minutesToShow: number };

const MINUTE_MS = 60 * 1000;

/**
 * Refund owed for cancelling at `now`. Pure; depends only on its arguments.
 *
 * Tiers: at or beyond `fullRefundHours` before the show the whole amount,
 * otherwise `partialRefundPercent` of it, and nothing once the show is
 * `cutoffMinutes` away or closer. The refund never grows as the show nears.
 */
export function calculateRefund(finalAmount: number, scheduledAt: Date, now: Date, policy: RefundPolicy): RefundDecision {
  const msToShow = scheduledAt.getTime() - now.getTime();
  const minutesToShow = Math.floor(msToShow / MINUTE_MS);

  if (msToShow <= policy.cutoffMinutes * MINUTE_MS) {
    return { eligible: false, minutesToShow };
  }

  const refundPercent = msToShow >= policy.fullRefundHours * 60 * MINUTE_MS ? 100 : policy.partialRefundPercent;
  const refundAmount = new Decimal(finalAmount)
    .times(refundPercent)
    .dividedBy(100)
    .toDecimalPlaces(2, Decimal.ROUND_DOWN)
    .toNumber();

  return { eligible: true, refundAmount, refundPercent, minutesToShow };
}
