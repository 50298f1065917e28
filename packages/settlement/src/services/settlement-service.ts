import type {
  Participant,
  ParticipantRole,
  SettlementBatch,
  SettlementLine,
  SettlementWindow,
} from '@netsettle/core';
import {
  ConsistencyError,
  formatMoney,
  toSettlementError,
  ValidationError,
  type SettlementError,
} from '@netsettle/core';
import type { DataContext } from '@netsettle/data';
import { getLogger } from '@netsettle/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';

import { aggregateEvents, validateWindow } from '../aggregation/event-aggregator.js';
import { buildBalances } from '../balances/balance-builder.js';
import type { NettingResult, UnclassifiedEvent, UnpricedEvent } from '../domain/types.js';
import { checkConservation } from '../netting/conservation.js';
import { applyBilateralNetting } from '../netting/netting-engine.js';
import { createCounterpartyResolver, SYNTHETIC_PARTICIPANTS } from '../policy/counterparties.js';
import { evaluatePolicy } from '../policy/policy-evaluator.js';
import { getNettingParameters, loadPolicy, type SettlementPolicy } from '../policy/policy-loader.js';
import { USE_CASES } from '../policy/use-case-configs.js';
import { computeProofHash } from '../proof/proof-hash.js';

const logger = getLogger('SettlementService');

export interface SettlementRequest {
  /** `{ use_case, parameters }`, validated against the use case's schema */
  policy: unknown;
  window: SettlementWindow;
  /** Settle even if a batch of the same use case already covers part of the window */
  allowOverlap?: boolean | undefined;
}

export interface ParticipantPosition {
  participantId: number;
  externalId: string;
  name: string;
  role: ParticipantRole;
  amount: Decimal;
}

export interface SettlementPreview {
  useCase: SettlementPolicy['useCase'];
  window: SettlementWindow;
  eventCount: number;
  postingCount: number;
  positions: ParticipantPosition[];
  netting: NettingResult;
  unpriced: UnpricedEvent[];
  unclassified: UnclassifiedEvent[];
}

export interface SettlementExecution extends SettlementPreview {
  batch: SettlementBatch;
  lines: SettlementLine[];
}

interface PreparedRequest {
  policy: SettlementPolicy;
  window: SettlementWindow;
}

/**
 * Line description. Part of the proof hash, so it must be reproducible from the batch alone.
 */
export function buildLineDescription(amount: Decimal, policy: SettlementPolicy, window: SettlementWindow): string {
  const direction = amount.isNegative() ? 'Payout due' : 'Payment due';
  return `${direction}: ${USE_CASES[policy.useCase].title} ${window.start.toISOString()}/${window.end.toISOString()}`;
}

/**
 * Computes and commits settlement batches.
 *
 * `execute` runs as one unit of work: policy storage, overlap check, event load,
 * evaluation, netting and batch insert commit together or not at all.
 */
export class SettlementService {
  constructor(private readonly ctx: DataContext) {}

  /**
   * Same computation as `execute`, without storing a policy or batch.
   * Synthetic counterparties are still created, as they are for any settlement.
   */
  async preview(request: SettlementRequest): Promise<Result<SettlementPreview, SettlementError>> {
    const prepared = this.prepare(request);
    if (prepared.isErr()) {
      return err(prepared.error);
    }

    const result = await this.ctx.executeInTransaction((tx) =>
      this.compute(tx, prepared.value.policy, prepared.value.window)
    );
    if (result.isErr()) {
      return err(toSettlementError(result.error));
    }
    return ok(result.value);
  }

  async execute(request: SettlementRequest): Promise<Result<SettlementExecution, SettlementError>> {
    const prepared = this.prepare(request);
    if (prepared.isErr()) {
      return err(prepared.error);
    }
    const { policy, window } = prepared.value;

    const result = await this.ctx.executeInTransaction(async (tx): Promise<Result<SettlementExecution, Error>> => {
      if (!request.allowOverlap) {
        const overlapping = await tx.settlements.findOverlappingBatches(policy.useCase, window);
        if (overlapping.isErr()) {
          return err(overlapping.error);
        }
        const [first] = overlapping.value;
        if (first) {
          return err(
            new ValidationError(
              `Window overlaps settled batch ${first.id} (${first.start.toISOString()}/${first.end.toISOString()})`,
              { batchIds: overlapping.value.map((b) => b.id), useCase: policy.useCase }
            )
          );
        }
      }

      const computed = await this.compute(tx, policy, window);
      if (computed.isErr()) {
        return err(computed.error);
      }
      const preview = computed.value;
      if (preview.eventCount === 0) {
        return err(
          new ValidationError('No usage events in the settlement window', {
            end: window.end.toISOString(),
            start: window.start.toISOString(),
          })
        );
      }

      const policyRecord = await tx.policies.create(policy.useCase, policy.parameters);
      if (policyRecord.isErr()) {
        return err(policyRecord.error);
      }

      const batch: SettlementBatch = {
        id: uuidv4(),
        useCase: policy.useCase,
        policyId: policyRecord.value.id,
        start: window.start,
        end: window.end,
        createdAt: new Date(),
      };
      const lines = preview.netting.positions.map((position): SettlementLine => {
        const description = buildLineDescription(position.amount, policy, window);
        return {
          id: uuidv4(),
          batchId: batch.id,
          participantId: position.participantId,
          amount: position.amount,
          description,
          proofHash: computeProofHash({
            batchId: batch.id,
            participantId: position.participantId,
            amount: position.amount,
            description,
          }),
        };
      });

      const stored = await tx.settlements.createBatch(batch, lines);
      if (stored.isErr()) {
        return err(stored.error);
      }

      return ok({ ...preview, batch, lines });
    });

    if (result.isErr()) {
      const error = toSettlementError(result.error, { useCase: policy.useCase });
      logger.warn({ error: error.toJSON() }, 'Settlement rolled back');
      return err(error);
    }

    const { batch, lines, netting } = result.value;
    logger.audit(
      {
        batchId: batch.id,
        end: batch.end.toISOString(),
        lineCount: lines.length,
        nettingEfficiency: netting.stats.nettingEfficiency.toFixed(4),
        policyId: batch.policyId,
        roundingResidual: netting.stats.roundingResidual.toFixed(),
        start: batch.start.toISOString(),
        suppressedVolume: formatMoney(netting.stats.suppressedVolume),
        transferCount: netting.stats.transferCount,
        useCase: batch.useCase,
      },
      'Settlement batch committed'
    );
    return ok(result.value);
  }

  private prepare(request: SettlementRequest): Result<PreparedRequest, ValidationError> {
    const window = validateWindow(request.window);
    if (window.isErr()) {
      return err(window.error);
    }
    const policy = loadPolicy(request.policy);
    if (policy.isErr()) {
      return err(policy.error);
    }
    return ok({ policy: policy.value, window: window.value });
  }

  private async compute(
    tx: DataContext,
    policy: SettlementPolicy,
    window: SettlementWindow
  ): Promise<Result<SettlementPreview, Error>> {
    const synthetic = await tx.participants.ensureMany(SYNTHETIC_PARTICIPANTS);
    if (synthetic.isErr()) {
      return err(synthetic.error);
    }

    const eventsResult = await tx.usageEvents.findInWindow(window);
    if (eventsResult.isErr()) {
      return err(eventsResult.error);
    }

    const participantsResult = await tx.participants.findAll();
    if (participantsResult.isErr()) {
      return err(participantsResult.error);
    }
    const participants = new Map(participantsResult.value.map((p): [number, Participant] => [p.id, p]));

    const aggregation = aggregateEvents(eventsResult.value, participants, window);
    if (aggregation.isErr()) {
      return err(aggregation.error);
    }

    const evaluation = evaluatePolicy(
      aggregation.value,
      participants,
      policy,
      createCounterpartyResolver(participants.values())
    );
    if (evaluation.isErr()) {
      return err(evaluation.error);
    }

    const balances = buildBalances(evaluation.value.postings);
    const roles = new Map([...participants.values()].map((p): [number, ParticipantRole] => [p.id, p.role]));
    const netting = applyBilateralNetting(balances, getNettingParameters(policy), roles);

    const conservation = checkConservation(balances, netting, evaluation.value.postings.length);
    if (conservation.isErr()) {
      return err(conservation.error);
    }

    const positions = toParticipantPositions(netting, participants);
    if (positions.isErr()) {
      return err(positions.error);
    }

    logger.debug(
      {
        events: aggregation.value.events.length,
        postings: evaluation.value.postings.length,
        transfers: netting.stats.transferCount,
        unclassified: evaluation.value.unclassified.length,
        unpriced: evaluation.value.unpriced.length,
      },
      'Settlement computed'
    );

    return ok({
      useCase: policy.useCase,
      window,
      eventCount: aggregation.value.events.length,
      postingCount: evaluation.value.postings.length,
      positions: positions.value,
      netting,
      unpriced: evaluation.value.unpriced,
      unclassified: evaluation.value.unclassified,
    });
  }
}

function toParticipantPositions(
  netting: NettingResult,
  participants: ReadonlyMap<number, Participant>
): Result<ParticipantPosition[], ConsistencyError> {
  const positions: ParticipantPosition[] = [];
  for (const { participantId, amount } of netting.positions) {
    const participant = participants.get(participantId);
    if (!participant) {
      return err(new ConsistencyError(`Net position for unknown participant ${participantId}`, { participantId }));
    }
    positions.push({
      participantId,
      externalId: participant.externalId,
      name: participant.name,
      role: participant.role,
      amount,
    });
  }
  return ok(positions);
}
