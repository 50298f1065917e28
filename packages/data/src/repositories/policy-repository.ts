import type { PolicyRecord } from '@netsettle/core';
import { PolicyRecordSchema, wrapError } from '@netsettle/core';
import type { Selectable } from '@netsettle/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import type { PoliciesTable } from '../schema/database-schema.js';
import type { KyselyDB } from '../storage/database.js';
import { parseWithSchema, serializeToJson } from '../utils/db-utils.js';

import { BaseRepository } from './base-repository.js';

const StoredParametersSchema = z.record(z.string(), z.unknown());

/**
 * Repository for the policies a settlement batch was computed under
 */
export class PolicyRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'PolicyRepository');
  }

  async create(useCase: string, parameters: Record<string, unknown>): Promise<Result<PolicyRecord, Error>> {
    const jsonResult = serializeToJson(parameters);
    if (jsonResult.isErr()) {
      return err(jsonResult.error);
    }

    try {
      const row = await this.db
        .insertInto('policies')
        .values({
          use_case: useCase,
          parameters_json: jsonResult.value,
          created_at: this.getCurrentDateTimeForDB(),
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return this.toPolicyRecord(row);
    } catch (error) {
      return wrapError(error, `Failed to store policy for ${useCase}`);
    }
  }

  private toPolicyRecord(row: Selectable<PoliciesTable>): Result<PolicyRecord, Error> {
    const parametersResult = parseWithSchema(row.parameters_json, StoredParametersSchema);
    if (parametersResult.isErr()) {
      return err(parametersResult.error);
    }

    const parseResult = PolicyRecordSchema.safeParse({
      id: row.id,
      useCase: row.use_case,
      parameters: parametersResult.value,
      createdAt: row.created_at,
    });

    if (!parseResult.success) {
      return err(new Error(`Invalid policy data: ${parseResult.error.message}`));
    }

    return ok(parseResult.data);
  }
}
