import type { Participant, ParticipantRole, SettlementBatch, UsageEvent } from '@netsettle/core';
import { formatMoney, NotFoundError, toSettlementError, type SettlementError } from '@netsettle/core';
import type { DataContext } from '@netsettle/data';
import { err, ok, type Result } from 'neverthrow';

import { buildExplanation, UNKNOWN_PARTICIPANT_NAME } from '../audit/explanation-builder.js';
import { verifyProofHash } from '../proof/proof-hash.js';

export interface AuditLine {
  lineId: string;
  participantId: number;
  participantName: string;
  participantRole: ParticipantRole | 'unknown';
  amount: string;
  description: string;
  proofHash: string;
  isVerified: boolean;
  explanation?: string | undefined;
}

export interface AuditPayload {
  batchId: string;
  useCase: string;
  createdAt: string;
  start: string;
  end: string;
  lines: AuditLine[];
  summary: {
    lineCount: number;
    verifiedCount: number;
    /** Lines whose stored fields no longer match their proof hash */
    failedLineIds: string[];
  };
}

export interface AuditOptions {
  explain?: boolean | undefined;
}

/**
 * Read-only verification of committed batches. Never runs inside a write transaction.
 */
export class AuditService {
  constructor(private readonly ctx: DataContext) {}

  async getAuditPayload(batchId: string, options: AuditOptions = {}): Promise<Result<AuditPayload, SettlementError>> {
    const batchResult = await this.ctx.settlements.findBatchById(batchId);
    if (batchResult.isErr()) {
      return err(toSettlementError(batchResult.error, { batchId }));
    }
    const batch = batchResult.value;
    if (!batch) {
      return err(new NotFoundError(`Settlement batch ${batchId} not found`, { batchId }));
    }

    const linesResult = await this.ctx.settlements.findLinesByBatchId(batch.id);
    if (linesResult.isErr()) {
      return err(toSettlementError(linesResult.error, { batchId }));
    }

    const participantsResult = await this.ctx.participants.findAll();
    if (participantsResult.isErr()) {
      return err(toSettlementError(participantsResult.error, { batchId }));
    }
    const participants = new Map(participantsResult.value.map((p): [number, Participant] => [p.id, p]));

    let eventsByParticipant = new Map<number, UsageEvent[]>();
    if (options.explain) {
      const eventsResult = await this.loadEventsByParticipant(batch);
      if (eventsResult.isErr()) {
        return err(eventsResult.error);
      }
      eventsByParticipant = eventsResult.value;
    }

    const lines = linesResult.value.map((line): AuditLine => {
      const participant = participants.get(line.participantId);
      const isVerified = verifyProofHash(
        { batchId: line.batchId, participantId: line.participantId, amount: line.amount, description: line.description },
        line.proofHash
      );

      return {
        lineId: line.id,
        participantId: line.participantId,
        participantName: participant?.name ?? UNKNOWN_PARTICIPANT_NAME,
        participantRole: participant?.role ?? 'unknown',
        amount: formatMoney(line.amount),
        description: line.description,
        proofHash: line.proofHash,
        isVerified,
        explanation: options.explain
          ? buildExplanation(participant, eventsByParticipant.get(line.participantId) ?? [], line.amount)
          : undefined,
      };
    });

    return ok({
      batchId: batch.id,
      useCase: batch.useCase,
      createdAt: batch.createdAt.toISOString(),
      start: batch.start.toISOString(),
      end: batch.end.toISOString(),
      lines,
      summary: {
        lineCount: lines.length,
        verifiedCount: lines.filter((line) => line.isVerified).length,
        failedLineIds: lines.filter((line) => !line.isVerified).map((line) => line.lineId),
      },
    });
  }

  private async loadEventsByParticipant(
    batch: SettlementBatch
  ): Promise<Result<Map<number, UsageEvent[]>, SettlementError>> {
    const eventsResult = await this.ctx.usageEvents.findInWindow({ start: batch.start, end: batch.end });
    if (eventsResult.isErr()) {
      return err(toSettlementError(eventsResult.error, { batchId: batch.id }));
    }

    const byParticipant = new Map<number, UsageEvent[]>();
    for (const event of eventsResult.value) {
      const existing = byParticipant.get(event.participantId);
      if (existing) {
        existing.push(event);
      } else {
        byParticipant.set(event.participantId, [event]);
      }
    }
    return ok(byParticipant);
  }
}
