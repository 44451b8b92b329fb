import { Logger } from '@nestjs/common';

type ErrorClass = abstract new (...args: never[]) => Error;

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryableErrors?: ErrorClass[];
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  label?: string;
}

const defaultOptions: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  retryableErrors: [],
  onRetry: () => undefined,
  label: 'operation',
};

/**
 * Executes a function with exponential backoff retry logic.
 *
 * When `retryableErrors` is non-empty only those error classes are retried;
 * anything else is rethrown on the first attempt.
 *
 * @example
 * const code = await retryWithBackoff(() => insertWithFreshCode(), {
 *   maxAttempts: 5,
 *   retryableErrors: [BookingCodeCollisionError],
 * });
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  const logger = new Logger('RetryUtil');

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (
        opts.retryableErrors.length > 0 &&
        !opts.retryableErrors.some((retryable) => lastError instanceof retryable)
      ) {
        throw lastError;
      }

      if (attempt >= opts.maxAttempts) {
        logger.error(
          `Max retry attempts (${opts.maxAttempts}) reached for ${opts.label}. Last error: ${lastError.message}`,
          lastError.stack,
        );
        throw lastError;
      }

      const delayMs = Math.min(opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt - 1), opts.maxDelayMs);

      logger.warn(
        `Attempt ${attempt}/${opts.maxAttempts} of ${opts.label} failed: ${lastError.message}. Retrying in ${delayMs}ms...`,
      );

      opts.onRetry(lastError, attempt, delayMs);

      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
}
