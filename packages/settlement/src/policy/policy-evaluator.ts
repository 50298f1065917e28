import type { Participant, UsageEvent } from '@netsettle/core';
import { ValidationError } from '@netsettle/core';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type {
  AggregationResult,
  EvaluationReport,
  EventClassification,
  Posting,
  SourceBucket,
  UnclassifiedEvent,
  UnclassifiedSourcePolicy,
  UnpricedEvent,
} from '../domain/types.js';

import type { CounterpartyResolver } from './counterparties.js';
import type { SettlementPolicy } from './policy-loader.js';
import { ENERGY_COMMUNITY_RULES, MIETERSTROM_RULES, NON_MONETARY_KINDS, type SettlementRule } from './rule-tables.js';

export interface EventEvaluation {
  postings: Posting[];
  unpriced?: UnpricedEvent | undefined;
  unclassified?: UnclassifiedEvent | undefined;
}

interface PolicyParametersBase {
  unclassified_source_policy: UnclassifiedSourcePolicy;
}

/**
 * Turn one classified event into zero, one or two postings.
 */
export function evaluateEvent(
  event: UsageEvent,
  classification: EventClassification,
  participant: Participant,
  policy: SettlementPolicy,
  counterparties: CounterpartyResolver
): Result<EventEvaluation, ValidationError> {
  switch (policy.useCase) {
    case 'energy_community':
      return applyRules(ENERGY_COMMUNITY_RULES, policy.parameters, event, classification, participant, counterparties);
    case 'mieterstrom':
      return applyRules(MIETERSTROM_RULES, policy.parameters, event, classification, participant, counterparties);
  }
}

/**
 * Evaluate every aggregated event in accumulation order.
 */
export function evaluatePolicy(
  aggregation: AggregationResult,
  participants: ReadonlyMap<number, Participant>,
  policy: SettlementPolicy,
  counterparties: CounterpartyResolver
): Result<EvaluationReport, ValidationError> {
  const report: EvaluationReport = { postings: [], unpriced: [], unclassified: [] };

  for (const { event, classification } of aggregation.events) {
    const participant = participants.get(event.participantId);
    if (!participant) {
      return err(
        new ValidationError(`Event ${event.id} references unknown participant ${event.participantId}`, {
          eventId: event.id,
          participantId: event.participantId,
        })
      );
    }

    const result = evaluateEvent(event, classification, participant, policy, counterparties);
    if (result.isErr()) {
      return err(result.error);
    }

    report.postings.push(...result.value.postings);
    if (result.value.unpriced) report.unpriced.push(result.value.unpriced);
    if (result.value.unclassified) report.unclassified.push(result.value.unclassified);
  }

  return ok(report);
}

function applyRules<P extends PolicyParametersBase>(
  rules: readonly SettlementRule<P>[],
  parameters: P,
  event: UsageEvent,
  classification: EventClassification,
  participant: Participant,
  counterparties: CounterpartyResolver
): Result<EventEvaluation, ValidationError> {
  const { kind } = classification;
  const unpriced = (reason: UnpricedEvent['reason'], detail: string): UnpricedEvent => ({
    eventId: event.id,
    participantId: participant.id,
    kind,
    reason,
    detail,
  });

  if (NON_MONETARY_KINDS.has(kind)) {
    return ok({ postings: [], unpriced: unpriced('non-monetary-kind', `${kind} carries no monetary rule`) });
  }

  let bucket: SourceBucket = classification.sourceBucket;
  let unclassified: UnclassifiedEvent | undefined;
  if (bucket === 'unclassified' && kind === 'consumption') {
    const treatment = parameters.unclassified_source_policy;
    unclassified = { eventId: event.id, participantId: participant.id, source: event.source, treatment };
    if (treatment === 'zero-priced') {
      return ok({
        postings: [],
        unpriced: unpriced('zero-priced-source', `Source "${event.source}" is unclassified and zero-priced`),
        unclassified,
      });
    }
    bucket = 'grid';
  }

  const rule = rules.find(
    (candidate) =>
      candidate.kinds.includes(kind) &&
      (candidate.sources === undefined || candidate.sources.includes(bucket)) &&
      candidate.subjectRoles.includes(participant.role)
  );
  if (!rule) {
    return ok({
      postings: [],
      unpriced: unpriced('no-matching-rule', `No rule prices ${kind} from ${bucket} by a ${participant.role}`),
      unclassified,
    });
  }

  const amount = resolveAmount(event, rule, parameters);
  if (amount === undefined) {
    return ok({
      postings: [],
      unpriced: unpriced('no-price', `Rule ${rule.id} has no price for ${event.unit} quantities`),
      unclassified,
    });
  }
  if (amount.isZero()) {
    return ok({
      postings: [],
      unpriced: unpriced('zero-amount', `Rule ${rule.id} prices this event at 0`),
      unclassified,
    });
  }

  const splitAmount = rule.split ? amount.times(rule.split.share(parameters)) : undefined;
  const mainAmount = splitAmount ? amount.minus(splitAmount) : amount;
  const postings: Posting[] = [];

  if (!mainAmount.isZero()) {
    const counterparty = counterparties.resolve(rule.counterpartyRole);
    if (counterparty.isErr()) {
      return err(withEventContext(counterparty.error, event));
    }
    const subjectPays = rule.side === 'debit';
    postings.push({
      eventId: event.id,
      ruleId: rule.id,
      debitParticipantId: subjectPays ? participant.id : counterparty.value.id,
      creditParticipantId: subjectPays ? counterparty.value.id : participant.id,
      amount: mainAmount,
      description: rule.description,
    });
  }

  if (rule.split && splitAmount && !splitAmount.isZero()) {
    const splitParty = counterparties.resolve(rule.split.counterpartyRole);
    if (splitParty.isErr()) {
      return err(withEventContext(splitParty.error, event));
    }
    let debitorId = participant.id;
    if (rule.side === 'credit') {
      const counterparty = counterparties.resolve(rule.counterpartyRole);
      if (counterparty.isErr()) {
        return err(withEventContext(counterparty.error, event));
      }
      debitorId = counterparty.value.id;
    }
    postings.push({
      eventId: event.id,
      ruleId: rule.id,
      debitParticipantId: debitorId,
      creditParticipantId: splitParty.value.id,
      amount: splitAmount,
      description: rule.split.description,
    });
  }

  return ok({ postings, unclassified });
}

/**
 * EUR events carry their amount. Otherwise quantity × price, where the price is
 * the event's own, else the policy's, else the use-case constant.
 */
function resolveAmount<P>(event: UsageEvent, rule: SettlementRule<P>, parameters: P): Decimal | undefined {
  if (event.unit === 'EUR') {
    return event.quantity;
  }
  const price = event.pricePerUnit ?? rule.price(parameters);
  return price ? event.quantity.times(price) : undefined;
}

function withEventContext(error: ValidationError, event: UsageEvent): ValidationError {
  return new ValidationError(`${error.message} (event ${event.id})`, {
    ...error.context,
    eventId: event.id,
    participantId: event.participantId,
  });
}
