/**
 * Error hierarchy for the settlement engine.
 *
 * Every failure carries a `kind` (what went wrong) and a `category` (what the
 * caller can do about it):
 * - `caller-error`: the request is wrong; retrying the same input fails again
 * - `retryable`: an I/O failure; the same input may succeed later
 * - `fatal`: the engine produced or found inconsistent state
 */

export type SettlementErrorKind = 'validation' | 'not-found' | 'consistency' | 'persistence';

export type SettlementErrorCategory = 'caller-error' | 'retryable' | 'fatal';

export abstract class SettlementError extends Error {
  abstract readonly kind: SettlementErrorKind;
  abstract readonly category: SettlementErrorCategory;

  readonly context: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.context = context ?? {};
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      category: this.category,
      context: this.context,
      kind: this.kind,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * Unknown event kind or role, malformed policy, missing participant.
 * Always raised before anything is persisted.
 */
export class ValidationError extends SettlementError {
  readonly kind = 'validation' as const;
  readonly category = 'caller-error' as const;
}

export class NotFoundError extends SettlementError {
  readonly kind = 'not-found' as const;
  readonly category = 'caller-error' as const;
}

/**
 * Computed state violates an engine invariant (e.g. value not conserved).
 */
export class ConsistencyError extends SettlementError {
  readonly kind = 'consistency' as const;
  readonly category = 'fatal' as const;
}

export class PersistenceError extends SettlementError {
  readonly kind = 'persistence' as const;
  readonly category = 'retryable' as const;
}

export function isSettlementError(error: unknown): error is SettlementError {
  return error instanceof SettlementError;
}

/**
 * Normalize any error into a SettlementError. Plain errors coming out of the
 * persistence layer become PersistenceErrors.
 */
export function toSettlementError(error: unknown, context?: Record<string, unknown>): SettlementError {
  if (isSettlementError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new PersistenceError(message, context, { cause: error });
}
