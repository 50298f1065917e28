import { Decimal } from 'decimal.js';

import type { Balance, BalanceMap, Posting } from '../domain/types.js';

function balanceFor(balances: BalanceMap, participantId: number): Balance {
  let balance = balances.get(participantId);
  if (!balance) {
    balance = { credit: new Decimal(0), debit: new Decimal(0) };
    balances.set(participantId, balance);
  }
  return balance;
}

/**
 * Accumulate postings into per-participant credit and debit totals, in posting order.
 */
export function buildBalances(postings: readonly Posting[]): BalanceMap {
  const balances: BalanceMap = new Map();
  for (const posting of postings) {
    const debited = balanceFor(balances, posting.debitParticipantId);
    debited.debit = debited.debit.plus(posting.amount);

    const credited = balanceFor(balances, posting.creditParticipantId);
    credited.credit = credited.credit.plus(posting.amount);
  }
  return balances;
}
