import type { ParticipantRole } from '@netsettle/core';
import { roundMoney } from '@netsettle/core';
import { Decimal } from 'decimal.js';

import type { BalanceMap, NetPosition, NettingParameters, NettingResult, Transfer } from '../domain/types.js';

interface Remaining {
  participantId: number;
  remaining: Decimal;
}

function byMagnitudeThenId(a: NetPosition, b: NetPosition): number {
  const byMagnitude = b.amount.abs().comparedTo(a.amount.abs());
  return byMagnitude !== 0 ? byMagnitude : a.participantId - b.participantId;
}

/**
 * Net per-participant balances and match debtors against creditors.
 *
 * Each participant's `debit − credit` is rounded once to cents. Debtors and
 * creditors are sorted by descending magnitude (participant id breaks ties) and
 * the largest remaining debtor pays the largest remaining creditor until one
 * side runs out. This greedy matching is an approximation: it does not search
 * for the smallest possible number of transfers.
 *
 * Positions below the minimum payout of the participant's role are moved to
 * `suppressed`; transfers are computed before that threshold is applied.
 */
export function applyBilateralNetting(
  balances: BalanceMap,
  parameters: NettingParameters,
  roles: ReadonlyMap<number, ParticipantRole>
): NettingResult {
  const epsilon = parameters.zeroEpsilon;
  const participantIds = [...balances.keys()].sort((a, b) => a - b);

  let grossVolume = new Decimal(0);
  let rawTotal = new Decimal(0);
  let roundedTotal = new Decimal(0);
  let netVolume = new Decimal(0);
  const nonZero: NetPosition[] = [];

  for (const participantId of participantIds) {
    const balance = balances.get(participantId);
    if (!balance) continue;

    const raw = balance.debit.minus(balance.credit);
    const amount = roundMoney(raw, parameters.roundingMode);

    grossVolume = grossVolume.plus(balance.credit).plus(balance.debit);
    rawTotal = rawTotal.plus(raw);
    roundedTotal = roundedTotal.plus(amount);
    netVolume = netVolume.plus(amount.abs());

    if (amount.abs().greaterThan(epsilon)) {
      nonZero.push({ participantId, amount });
    }
  }

  const debtors = nonZero.filter((p) => p.amount.isPositive()).sort(byMagnitudeThenId);
  const creditors = nonZero.filter((p) => p.amount.isNegative()).sort(byMagnitudeThenId);
  const { transfers, unmatched } = matchGreedy(debtors, creditors, epsilon);

  const positions: NetPosition[] = [];
  const suppressed: NetPosition[] = [];
  let suppressedVolume = new Decimal(0);
  for (const position of nonZero) {
    const role = roles.get(position.participantId);
    const threshold = (role && parameters.minimumPayoutByRole[role]) ?? parameters.minimumPayout;
    if (position.amount.abs().greaterThanOrEqualTo(threshold)) {
      positions.push(position);
    } else {
      suppressed.push(position);
      suppressedVolume = suppressedVolume.plus(position.amount.abs());
    }
  }

  return {
    positions,
    suppressed,
    transfers,
    unmatched,
    stats: {
      transferCount: transfers.length,
      grossVolume,
      netVolume,
      nettingEfficiency: grossVolume.isZero() ? new Decimal(0) : new Decimal(1).minus(netVolume.dividedBy(grossVolume)),
      roundingResidual: roundedTotal.minus(rawTotal),
      suppressedVolume,
    },
  };
}

function matchGreedy(
  debtors: readonly NetPosition[],
  creditors: readonly NetPosition[],
  epsilon: Decimal
): { transfers: Transfer[]; unmatched: NetPosition[] } {
  const owing: Remaining[] = debtors.map((d) => ({ participantId: d.participantId, remaining: d.amount }));
  const owed: Remaining[] = creditors.map((c) => ({ participantId: c.participantId, remaining: c.amount.abs() }));
  const transfers: Transfer[] = [];

  let i = 0;
  let j = 0;
  while (i < owing.length && j < owed.length) {
    const debtor = owing[i];
    const creditor = owed[j];
    if (!debtor || !creditor) break;

    const amount = Decimal.min(debtor.remaining, creditor.remaining);
    if (amount.greaterThan(epsilon)) {
      transfers.push({ debtorId: debtor.participantId, creditorId: creditor.participantId, amount });
    }

    debtor.remaining = debtor.remaining.minus(amount);
    creditor.remaining = creditor.remaining.minus(amount);
    if (debtor.remaining.lessThanOrEqualTo(epsilon)) i += 1;
    if (creditor.remaining.lessThanOrEqualTo(epsilon)) j += 1;
  }

  const unmatched: NetPosition[] = [
    ...owing.slice(i).map((d) => ({ participantId: d.participantId, amount: d.remaining })),
    ...owed.slice(j).map((c) => ({ participantId: c.participantId, amount: c.remaining.negated() })),
  ].filter((p) => p.amount.abs().greaterThan(epsilon));

  return { transfers, unmatched };
}
