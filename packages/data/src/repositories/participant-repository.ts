import type { Participant, ParticipantReference } from '@netsettle/core';
import { ParticipantSchema, ValidationError, wrapError } from '@netsettle/core';
import type { Selectable } from '@netsettle/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { ParticipantsTable } from '../schema/database-schema.js';
import type { KyselyDB } from '../storage/database.js';

import { BaseRepository } from './base-repository.js';

/**
 * Repository for Participant database operations
 */
export class ParticipantRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'ParticipantRepository');
  }

  /**
   * Find or create a participant by external id.
   * A participant's role is fixed on creation; referencing it with another role fails.
   */
  async ensure(reference: ParticipantReference): Promise<Result<Participant, Error>> {
    const externalId = reference.externalId.trim();
    if (externalId === '') {
      return err(new ValidationError('Participant external id must not be empty'));
    }

    try {
      const existingResult = await this.findByExternalId(externalId);
      if (existingResult.isErr()) {
        return err(existingResult.error);
      }

      const existing = existingResult.value;
      if (existing) {
        if (existing.role !== reference.role) {
          return err(
            new ValidationError(
              `Participant ${externalId} already exists with role ${existing.role}, cannot reference it as ${reference.role}`,
              { externalId, existingRole: existing.role, requestedRole: reference.role }
            )
          );
        }
        return ok(existing);
      }

      const name = reference.name?.trim() || externalId;
      const row = await this.db
        .insertInto('participants')
        .values({
          external_id: externalId,
          name,
          role: reference.role,
          created_at: this.getCurrentDateTimeForDB(),
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      this.logger.debug({ externalId, role: reference.role }, 'Created participant');
      return this.toParticipant(row);
    } catch (error) {
      return wrapError(error, `Failed to ensure participant ${externalId}`);
    }
  }

  /**
   * Ensure several participants in order. Stops at the first failure.
   */
  async ensureMany(references: readonly ParticipantReference[]): Promise<Result<Participant[], Error>> {
    const participants: Participant[] = [];
    for (const reference of references) {
      const result = await this.ensure(reference);
      if (result.isErr()) {
        return err(result.error);
      }
      participants.push(result.value);
    }
    return ok(participants);
  }

  async findAll(): Promise<Result<Participant[], Error>> {
    try {
      const rows = await this.db.selectFrom('participants').selectAll().orderBy('id', 'asc').execute();
      return this.toParticipants(rows);
    } catch (error) {
      return wrapError(error, 'Failed to load participants');
    }
  }

  async findByExternalId(externalId: string): Promise<Result<Participant | undefined, Error>> {
    try {
      const row = await this.db
        .selectFrom('participants')
        .selectAll()
        .where('external_id', '=', externalId)
        .executeTakeFirst();
      if (!row) {
        return ok(undefined);
      }
      return this.toParticipant(row);
    } catch (error) {
      return wrapError(error, `Failed to find participant ${externalId}`);
    }
  }

  private toParticipants(rows: Selectable<ParticipantsTable>[]): Result<Participant[], Error> {
    const participants: Participant[] = [];
    for (const row of rows) {
      const result = this.toParticipant(row);
      if (result.isErr()) {
        return err(result.error);
      }
      participants.push(result.value);
    }
    return ok(participants);
  }

  private toParticipant(row: Selectable<ParticipantsTable>): Result<Participant, Error> {
    const parseResult = ParticipantSchema.safeParse({
      id: row.id,
      externalId: row.external_id,
      name: row.name,
      role: row.role,
      createdAt: row.created_at,
    });

    if (!parseResult.success) {
      return err(new Error(`Invalid participant data: ${parseResult.error.message}`));
    }

    return ok(parseResult.data);
  }
}
