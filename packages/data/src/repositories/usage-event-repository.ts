import type { NewUsageEvent, SettlementWindow, UsageEvent } from '@netsettle/core';
import { UsageEventSchema, wrapError } from '@netsettle/core';
import type { Selectable } from '@netsettle/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { UsageEventsTable } from '../schema/database-schema.js';
import type { KyselyDB } from '../storage/database.js';

import { BaseRepository } from './base-repository.js';

// Stays below SQLite's bound-parameter limit at nine columns per row
const INSERT_CHUNK_SIZE = 500;

/**
 * Repository for UsageEvent database operations. Events are immutable once stored.
 */
export class UsageEventRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'UsageEventRepository');
  }

  /**
   * Insert events and return how many were stored.
   * Callers wanting all-or-nothing semantics run this inside a transaction.
   */
  async createBulk(events: readonly NewUsageEvent[]): Promise<Result<number, Error>> {
    if (events.length === 0) {
      return ok(0);
    }

    try {
      const createdAt = this.getCurrentDateTimeForDB();
      const rows = events.map((event) => ({
        participant_id: event.participantId,
        event_kind: event.kind,
        quantity: event.quantity.toFixed(),
        unit: event.unit,
        timestamp: event.timestamp,
        source: event.source,
        price_per_unit: event.pricePerUnit?.toFixed(),
        created_at: createdAt,
      }));

      for (let offset = 0; offset < rows.length; offset += INSERT_CHUNK_SIZE) {
        await this.db
          .insertInto('usage_events')
          .values(rows.slice(offset, offset + INSERT_CHUNK_SIZE))
          .execute();
      }

      this.logger.debug({ count: rows.length }, 'Stored usage events');
      return ok(rows.length);
    } catch (error) {
      return wrapError(error, 'Failed to store usage events');
    }
  }

  /**
   * Events with `start <= timestamp < end`, ordered by timestamp then id.
   */
  async findInWindow(window: SettlementWindow): Promise<Result<UsageEvent[], Error>> {
    try {
      const rows = await this.db
        .selectFrom('usage_events')
        .selectAll()
        .where('timestamp', '>=', window.start.toISOString())
        .where('timestamp', '<', window.end.toISOString())
        .orderBy('timestamp', 'asc')
        .orderBy('id', 'asc')
        .execute();

      const events: UsageEvent[] = [];
      for (const row of rows) {
        const result = this.toUsageEvent(row);
        if (result.isErr()) {
          return err(result.error);
        }
        events.push(result.value);
      }
      return ok(events);
    } catch (error) {
      return wrapError(error, 'Failed to load usage events');
    }
  }

  private toUsageEvent(row: Selectable<UsageEventsTable>): Result<UsageEvent, Error> {
    const parseResult = UsageEventSchema.safeParse({
      id: row.id,
      participantId: row.participant_id,
      kind: row.event_kind,
      quantity: row.quantity,
      unit: row.unit,
      timestamp: row.timestamp,
      source: row.source,
      pricePerUnit: row.price_per_unit ?? undefined,
      createdAt: row.created_at,
    });

    if (!parseResult.success) {
      return err(new Error(`Invalid usage event ${row.id}: ${parseResult.error.message}`));
    }

    return ok(parseResult.data);
  }
}
