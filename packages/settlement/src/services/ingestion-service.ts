import type { NewUsageEvent, ParticipantRole } from '@netsettle/core';
import {
  DateSchema,
  DecimalSchema,
  EnergyUnitSchema,
  toSettlementError,
  ValidationError,
  type SettlementError,
} from '@netsettle/core';
import type { DataContext } from '@netsettle/data';
import { getLogger } from '@netsettle/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { decodeEventKind, decodeParticipantRole } from '../aggregation/decoders.js';

const logger = getLogger('IngestionService');

/** Role given to participants first seen without one */
export const DEFAULT_PARTICIPANT_ROLE: ParticipantRole = 'prosumer';

export const UsageEventInputSchema = z
  .object({
    participant_id: z.union([z.string().trim().min(1), z.number().int()]).transform(String),
    event_kind: z.string().min(1),
    quantity: DecimalSchema,
    unit: EnergyUnitSchema,
    timestamp: DateSchema,
    source: z.string().default(''),
    price_per_unit: DecimalSchema.optional(),
    participant_name: z.string().optional(),
    role: z.string().optional(),
  })
  .superRefine((data, ctx) => {
    if (data.unit === 'kWh' && data.quantity.isNegative()) {
      ctx.addIssue({
        code: 'custom',
        message: 'kWh quantities must not be negative',
        path: ['quantity'],
      });
    }
  });

export type UsageEventInput = z.input<typeof UsageEventInputSchema>;

export interface IngestionSummary {
  eventCount: number;
  participantCount: number;
  participantsCreated: number;
}

interface DecodedEvent {
  externalId: string;
  name: string | undefined;
  role: ParticipantRole | undefined;
  event: Omit<NewUsageEvent, 'participantId'>;
}

/**
 * Imports usage events. Participants are created on first reference; the whole
 * import is one transaction, so a single bad record stores nothing.
 */
export class IngestionService {
  constructor(private readonly ctx: DataContext) {}

  async ingest(records: unknown): Promise<Result<IngestionSummary, SettlementError>> {
    const decoded = decodeRecords(records);
    if (decoded.isErr()) {
      return err(decoded.error);
    }

    const result = await this.ctx.executeInTransaction(async (tx): Promise<Result<IngestionSummary, Error>> => {
      const participantIds = new Map<string, number>();
      let participantsCreated = 0;

      for (const record of decoded.value) {
        if (participantIds.has(record.externalId) && record.role === undefined) continue;

        const existing = await tx.participants.findByExternalId(record.externalId);
        if (existing.isErr()) {
          return err(existing.error);
        }

        const role = record.role ?? existing.value?.role ?? DEFAULT_PARTICIPANT_ROLE;
        const ensured = await tx.participants.ensure({ externalId: record.externalId, name: record.name, role });
        if (ensured.isErr()) {
          return err(ensured.error);
        }
        if (!existing.value) participantsCreated += 1;
        participantIds.set(record.externalId, ensured.value.id);
      }

      const events: NewUsageEvent[] = [];
      for (const record of decoded.value) {
        const participantId = participantIds.get(record.externalId);
        if (participantId === undefined) {
          return err(new Error(`Participant ${record.externalId} was not resolved`));
        }
        events.push({ ...record.event, participantId });
      }

      const stored = await tx.usageEvents.createBulk(events);
      if (stored.isErr()) {
        return err(stored.error);
      }

      return ok({ eventCount: stored.value, participantCount: participantIds.size, participantsCreated });
    });

    if (result.isErr()) {
      return err(toSettlementError(result.error));
    }

    logger.info(result.value, 'Usage events ingested');
    return ok(result.value);
  }
}

function decodeRecords(records: unknown): Result<DecodedEvent[], ValidationError> {
  const parsed = z.array(UsageEventInputSchema).safeParse(records);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    return err(
      new ValidationError(`Invalid usage event at ${path || '(root)'}: ${issue?.message ?? 'invalid input'}`, {
        field: path,
      })
    );
  }

  const decoded: DecodedEvent[] = [];
  for (const [index, record] of parsed.data.entries()) {
    const kind = decodeEventKind(record.event_kind);
    if (kind.isErr()) {
      return err(new ValidationError(`Record ${index}: ${kind.error.message}`, { ...kind.error.context, index }));
    }

    let role: ParticipantRole | undefined;
    if (record.role !== undefined) {
      const decodedRole = decodeParticipantRole(record.role);
      if (decodedRole.isErr()) {
        return err(
          new ValidationError(`Record ${index}: ${decodedRole.error.message}`, { ...decodedRole.error.context, index })
        );
      }
      role = decodedRole.value;
    }

    decoded.push({
      externalId: record.participant_id,
      name: record.participant_name,
      role,
      event: {
        kind: kind.value,
        quantity: record.quantity,
        unit: record.unit,
        timestamp: record.timestamp,
        source: record.source,
        pricePerUnit: record.price_per_unit,
      },
    });
  }
  return ok(decoded);
}
