import type { EnergyUnit, EventKind, ParticipantRole, RoundingMode, UsageEvent } from '@netsettle/core';
import type { Decimal } from 'decimal.js';

/**
 * Where the energy behind an event came from, after source normalization
 */
export type SourceBucket = 'local-pv' | 'battery' | 'grid' | 'unclassified';

export interface EventClassification {
  kind: EventKind;
  sourceBucket: SourceBucket;
}

export interface ClassifiedEvent {
  event: UsageEvent;
  classification: EventClassification;
}

/**
 * Running total of one participant's events of one kind, source bucket and unit
 */
export interface AggregateTotal {
  /** `<kind>:<sourceBucket>`, e.g. `consumption:local-pv` */
  key: string;
  kind: EventKind;
  sourceBucket: SourceBucket;
  unit: EnergyUnit;
  quantity: Decimal;
  eventCount: number;
}

export interface AggregationResult {
  /** In-window events in accumulation order: timestamp, then id */
  events: ClassifiedEvent[];
  /** Totals per participant id, in first-seen order */
  totals: Map<number, AggregateTotal[]>;
  /** Events dropped because they fall outside the window */
  excludedCount: number;
}

/**
 * One double-entry pair: `amount` is debited to one participant and credited to another
 */
export interface Posting {
  eventId: number;
  ruleId: string;
  debitParticipantId: number;
  creditParticipantId: number;
  amount: Decimal;
  description: string;
}

export type UnpricedReason =
  | 'non-monetary-kind'
  | 'no-matching-rule'
  | 'no-price'
  | 'zero-amount'
  | 'zero-priced-source';

export interface UnpricedEvent {
  eventId: number;
  participantId: number;
  kind: EventKind;
  reason: UnpricedReason;
  detail: string;
}

export type UnclassifiedSourcePolicy = 'external-market' | 'zero-priced';

export interface UnclassifiedEvent {
  eventId: number;
  participantId: number;
  source: string;
  treatment: UnclassifiedSourcePolicy;
}

export interface EvaluationReport {
  postings: Posting[];
  unpriced: UnpricedEvent[];
  unclassified: UnclassifiedEvent[];
}

export interface Balance {
  credit: Decimal;
  debit: Decimal;
}

export type BalanceMap = Map<number, Balance>;

/**
 * Signed position. Positive: the participant owes. Negative: the participant is owed.
 */
export interface NetPosition {
  participantId: number;
  amount: Decimal;
}

export interface Transfer {
  debtorId: number;
  creditorId: number;
  amount: Decimal;
}

export interface NettingStats {
  transferCount: number;
  /** Σ(credit + debit) before netting */
  grossVolume: Decimal;
  /** Σ|amount| after netting */
  netVolume: Decimal;
  /** 1 − net/gross, 0 when gross is 0 */
  nettingEfficiency: Decimal;
  /** Σ rounded amounts − Σ(debit − credit) */
  roundingResidual: Decimal;
  suppressedVolume: Decimal;
}

export interface NettingResult {
  /** Positions that become settlement lines, ordered by participant id */
  positions: NetPosition[];
  /** Non-zero positions below the participant role's minimum payout */
  suppressed: NetPosition[];
  transfers: Transfer[];
  /** Balance left after matching, e.g. money entering or leaving the participant set */
  unmatched: NetPosition[];
  stats: NettingStats;
}

export interface NettingParameters {
  minimumPayout: Decimal;
  minimumPayoutByRole: Partial<Record<ParticipantRole, Decimal>>;
  roundingMode: RoundingMode;
  zeroEpsilon: Decimal;
}
