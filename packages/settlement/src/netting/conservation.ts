import { ConsistencyError, SMALLEST_CURRENCY_UNIT, sumDecimals } from '@netsettle/core';
import { err, ok, type Result } from 'neverthrow';

import type { BalanceMap, NettingResult } from '../domain/types.js';

/**
 * Every posting debits and credits the same amount, and the rounded positions
 * account for the postings' net value to within one cent per participant.
 */
export function checkConservation(
  balances: BalanceMap,
  netting: NettingResult,
  postingCount: number
): Result<void, ConsistencyError> {
  const totalDebit = sumDecimals([...balances.values()].map((b) => b.debit));
  const totalCredit = sumDecimals([...balances.values()].map((b) => b.credit));
  if (!totalDebit.equals(totalCredit)) {
    return err(
      new ConsistencyError(`Postings are unbalanced: debit ${totalDebit.toFixed()} vs credit ${totalCredit.toFixed()}`, {
        postings: postingCount,
      })
    );
  }

  const tolerance = SMALLEST_CURRENCY_UNIT.times(Math.max(balances.size, 1));
  const residual = netting.stats.roundingResidual.abs();
  if (residual.greaterThan(tolerance)) {
    return err(
      new ConsistencyError(`Rounding residual ${residual.toFixed()} exceeds ${tolerance.toFixed(2)}`, {
        participants: balances.size,
        postings: postingCount,
      })
    );
  }
  return ok(undefined);
}
