import { ConsistencyError } from '@netsettle/core';
import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import type { BalanceMap, NettingResult } from '../../domain/types.js';
import { checkConservation } from '../conservation.js';

function balances(entries: [number, string, string][]): BalanceMap {
  return new Map(
    entries.map(([id, debit, credit]) => [id, { debit: new Decimal(debit), credit: new Decimal(credit) }])
  );
}

function nettingWithResidual(residual: string): NettingResult {
  return {
    positions: [],
    suppressed: [],
    transfers: [],
    unmatched: [],
    stats: {
      transferCount: 0,
      grossVolume: new Decimal(0),
      netVolume: new Decimal(0),
      nettingEfficiency: new Decimal(0),
      roundingResidual: new Decimal(residual),
      suppressedVolume: new Decimal(0),
    },
  };
}

describe('checkConservation', () => {
  const balanced = balances([
    [1, '1.005', '0'],
    [2, '0', '1.005'],
  ]);

  it('accepts balanced postings with a residual within one cent per participant', () => {
    expect(checkConservation(balanced, nettingWithResidual('0.02'), 1).isOk()).toBe(true);
    expect(checkConservation(balanced, nettingWithResidual('-0.02'), 1).isOk()).toBe(true);
  });

  it('rejects a residual above the tolerance', () => {
    const result = checkConservation(balanced, nettingWithResidual('0.021'), 1);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConsistencyError);
      expect(result.error.message).toBe('Rounding residual 0.021 exceeds 0.02');
      expect(result.error.context).toEqual({ participants: 2, postings: 1 });
    }
  });

  it('rejects postings whose debits and credits differ', () => {
    const result = checkConservation(
      balances([
        [1, '3', '0'],
        [2, '0', '2.5'],
      ]),
      nettingWithResidual('0'),
      2
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Postings are unbalanced: debit 3 vs credit 2.5');
      expect(result.error.category).toBe('fatal');
    }
  });

  it('allows one cent of residual when there are no balances', () => {
    expect(checkConservation(new Map(), nettingWithResidual('0.01'), 0).isOk()).toBe(true);
    expect(checkConservation(new Map(), nettingWithResidual('0.011'), 0).isErr()).toBe(true);
  });
});
