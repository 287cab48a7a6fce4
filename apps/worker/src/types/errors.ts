import type { ErrorCode } from '@pricewatch/shared';

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * The pattern store or price history could not be read or written.
 * Distinct from a validation failure: the attempt can be retried.
 */
export class PersistenceError extends Error {
  readonly code: ErrorCode = 'PERSISTENCE_FAILED';
  readonly retryable = true;

  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super(`${operation} failed: ${describe(cause)}`, { cause });
    this.name = 'PersistenceError';
  }
}

/**
 * A stored or seeded pattern record does not match the record schema
 */
export class InvalidPatternRecordError extends Error {
  readonly code: ErrorCode = 'PATTERN_RECORD_INVALID';
  readonly retryable = false;

  constructor(
    readonly domain: string | null,
    readonly issues: string[],
  ) {
    super(`Invalid pattern record${domain ? ` for ${domain}` : ''}: ${issues.join('; ')}`);
    this.name = 'InvalidPatternRecordError';
  }
}
