import { registerAs } from '@nestjs/config';
import { readEnvironment } from './env.validation';

export default registerAs('booking', () => {
  const env = readEnvironment();

  return {
    holdTtlSeconds: env.HOLD_TTL_SECONDS,
    sweepIntervalMs: env.HOLD_SWEEP_INTERVAL_MS,
    sweepBatchSize: env.HOLD_SWEEP_BATCH_SIZE,
    holdExtensionSeconds: env.HOLD_EXTENSION_SECONDS,
    maxHoldExtensions: env.HOLD_MAX_EXTENSIONS,
    maxSeatsPerHold: env.MAX_SEATS_PER_HOLD,
    paymentTimeoutMs: env.PAYMENT_TIMEOUT_MS,
    convenienceFeePerSeat: env.CONVENIENCE_FEE_PER_SEAT,
    currency: env.CURRENCY,
    cancellationCutoffMinutes: env.CANCELLATION_CUTOFF_MINUTES,
    fullRefundHours: env.FULL_REFUND_HOURS,
    partialRefundPercent: env.PARTIAL_REFUND_PERCENT,
  };
});
