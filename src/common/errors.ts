import { QueryFailedError } from 'typeorm';

/**
 * Raised when seat-state bookkeeping is about to disagree with itself
 * (a seat in two non-available states, a booking skipping a status, a
 * counter going negative). Unreachable in a correct deployment, so it is
 * thrown rather than returned and always rolls the transaction back.
 */
export class InvariantViolationError extends Error {
  constructor(
    message: string,
    readonly context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export function assertNever(value: never): never {
  throw new InvariantViolationError(`Unhandled variant: ${JSON.stringify(value)}`);
}

const PG_UNIQUE_VIOLATION = '23505';

/**
 * True when the error is a Postgres unique violation, optionally on a
 * specific constraint name.
 */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }

  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) {
    return false;
  }

  const code = 'code' in driverError ? driverError.code : undefined;
  if (code !== PG_UNIQUE_VIOLATION) {
    return false;
  }

  if (!constraint) {
    return true;
  }

  return 'constraint' in driverError && driverError.constraint === constraint;
}
