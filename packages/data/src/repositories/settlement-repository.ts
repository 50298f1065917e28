import type { SettlementBatch, SettlementLine, SettlementWindow } from '@netsettle/core';
import { formatMoney, SettlementBatchSchema, SettlementLineSchema, wrapError } from '@netsettle/core';
import type { Selectable } from '@netsettle/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { SettlementBatchesTable, SettlementLinesTable } from '../schema/database-schema.js';
import type { KyselyDB } from '../storage/database.js';

import { BaseRepository } from './base-repository.js';

const LINE_CHUNK_SIZE = 500;

export interface ListBatchesOptions {
  useCase?: string | undefined;
  limit?: number | undefined;
}

/**
 * Append-only store for settlement batches and their lines.
 * There is no update or delete path; the schema rejects both with triggers.
 */
export class SettlementRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'SettlementRepository');
  }

  /**
   * Insert a batch with all of its lines. Run inside a transaction so a failed
   * line insert leaves no partial batch behind.
   */
  async createBatch(batch: SettlementBatch, lines: readonly SettlementLine[]): Promise<Result<void, Error>> {
    const foreignLine = lines.find((line) => line.batchId !== batch.id);
    if (foreignLine) {
      return err(new Error(`Line ${foreignLine.id} belongs to batch ${foreignLine.batchId}, not ${batch.id}`));
    }

    try {
      await this.db
        .insertInto('settlement_batches')
        .values({
          id: batch.id,
          use_case: batch.useCase,
          policy_id: batch.policyId,
          start_time: batch.start,
          end_time: batch.end,
          created_at: batch.createdAt,
        })
        .execute();

      const rows = lines.map((line) => ({
        id: line.id,
        batch_id: line.batchId,
        participant_id: line.participantId,
        amount: formatMoney(line.amount),
        description: line.description,
        proof_hash: line.proofHash,
      }));

      for (let offset = 0; offset < rows.length; offset += LINE_CHUNK_SIZE) {
        await this.db
          .insertInto('settlement_lines')
          .values(rows.slice(offset, offset + LINE_CHUNK_SIZE))
          .execute();
      }

      this.logger.debug({ batchId: batch.id, lineCount: rows.length }, 'Stored settlement batch');
      return ok(undefined);
    } catch (error) {
      return wrapError(error, `Failed to store settlement batch ${batch.id}`);
    }
  }

  async findBatchById(batchId: string): Promise<Result<SettlementBatch | undefined, Error>> {
    try {
      const row = await this.db
        .selectFrom('settlement_batches')
        .selectAll()
        .where('id', '=', batchId)
        .executeTakeFirst();
      if (!row) {
        return ok(undefined);
      }
      return this.toBatch(row);
    } catch (error) {
      return wrapError(error, `Failed to find settlement batch ${batchId}`);
    }
  }

  /**
   * Lines of a batch ordered by participant id.
   */
  async findLinesByBatchId(batchId: string): Promise<Result<SettlementLine[], Error>> {
    try {
      const rows = await this.db
        .selectFrom('settlement_lines')
        .selectAll()
        .where('batch_id', '=', batchId)
        .orderBy('participant_id', 'asc')
        .execute();

      const lines: SettlementLine[] = [];
      for (const row of rows) {
        const result = this.toLine(row);
        if (result.isErr()) {
          return err(result.error);
        }
        lines.push(result.value);
      }
      return ok(lines);
    } catch (error) {
      return wrapError(error, `Failed to load lines of settlement batch ${batchId}`);
    }
  }

  /**
   * Batches of a use case whose window intersects `[start, end)`.
   */
  async findOverlappingBatches(useCase: string, window: SettlementWindow): Promise<Result<SettlementBatch[], Error>> {
    try {
      const rows = await this.db
        .selectFrom('settlement_batches')
        .selectAll()
        .where('use_case', '=', useCase)
        .where('start_time', '<', window.end.toISOString())
        .where('end_time', '>', window.start.toISOString())
        .orderBy('start_time', 'asc')
        .execute();
      return this.toBatches(rows);
    } catch (error) {
      return wrapError(error, `Failed to look up overlapping batches for ${useCase}`);
    }
  }

  /**
   * Most recent batches first.
   */
  async listBatches(options: ListBatchesOptions = {}): Promise<Result<SettlementBatch[], Error>> {
    try {
      let query = this.db.selectFrom('settlement_batches').selectAll();
      if (options.useCase) {
        query = query.where('use_case', '=', options.useCase);
      }
      query = query.orderBy('created_at', 'desc').orderBy('id', 'asc');
      if (options.limit !== undefined) {
        query = query.limit(options.limit);
      }

      const rows = await query.execute();
      return this.toBatches(rows);
    } catch (error) {
      return wrapError(error, 'Failed to list settlement batches');
    }
  }

  private toBatches(rows: Selectable<SettlementBatchesTable>[]): Result<SettlementBatch[], Error> {
    const batches: SettlementBatch[] = [];
    for (const row of rows) {
      const result = this.toBatch(row);
      if (result.isErr()) {
        return err(result.error);
      }
      batches.push(result.value);
    }
    return ok(batches);
  }

  private toBatch(row: Selectable<SettlementBatchesTable>): Result<SettlementBatch, Error> {
    const parseResult = SettlementBatchSchema.safeParse({
      id: row.id,
      useCase: row.use_case,
      policyId: row.policy_id,
      start: row.start_time,
      end: row.end_time,
      createdAt: row.created_at,
    });

    if (!parseResult.success) {
      return err(new Error(`Invalid settlement batch ${row.id}: ${parseResult.error.message}`));
    }

    return ok(parseResult.data);
  }

  private toLine(row: Selectable<SettlementLinesTable>): Result<SettlementLine, Error> {
    const parseResult = SettlementLineSchema.safeParse({
      id: row.id,
      batchId: row.batch_id,
      participantId: row.participant_id,
      amount: row.amount,
      description: row.description,
      proofHash: row.proof_hash,
    });

    if (!parseResult.success) {
      return err(new Error(`Invalid settlement line ${row.id}: ${parseResult.error.message}`));
    }

    return ok(parseResult.data);
  }
}
