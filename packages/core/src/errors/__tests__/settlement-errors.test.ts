import { describe, expect, it } from 'vitest';

import {
  ConsistencyError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  isSettlementError,
  toSettlementError,
} from '../settlement-errors.js';

describe('SettlementError hierarchy', () => {
  it('maps each error kind to its category', () => {
    expect(new ValidationError('bad').category).toBe('caller-error');
    expect(new NotFoundError('missing').category).toBe('caller-error');
    expect(new ConsistencyError('broken').category).toBe('fatal');
    expect(new PersistenceError('io').category).toBe('retryable');
  });

  it('keeps context and serializes it', () => {
    const error = new ValidationError('Unknown participant', { eventId: 7, participantId: 42 });

    expect(error.name).toBe('ValidationError');
    expect(error.toJSON()).toEqual({
      category: 'caller-error',
      context: { eventId: 7, participantId: 42 },
      kind: 'validation',
      message: 'Unknown participant',
      name: 'ValidationError',
    });
  });

  it('wraps plain errors as persistence errors', () => {
    const cause = new Error('SQLITE_BUSY');
    const wrapped = toSettlementError(cause, { operation: 'insert' });

    expect(wrapped).toBeInstanceOf(PersistenceError);
    expect(wrapped.message).toBe('SQLITE_BUSY');
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.context).toEqual({ operation: 'insert' });
  });

  it('passes settlement errors through unchanged', () => {
    const original = new NotFoundError('Batch not found');
    expect(toSettlementError(original)).toBe(original);
    expect(isSettlementError(original)).toBe(true);
    expect(isSettlementError(new Error('x'))).toBe(false);
  });
});
