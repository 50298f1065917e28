import { getDatabasePath } from '@netsettle/env';
import { closeSqliteDatabase, createSqliteDatabase, type Kysely } from '@netsettle/sqlite';
import type { Result } from 'neverthrow';

import type { DatabaseSchema } from '../schema/database-schema.js';

export type KyselyDB = Kysely<DatabaseSchema>;

/**
 * Create the settlement database. Defaults to `<data dir>/settlement.db`.
 */
export function createDatabase(dbPath?: string): Result<KyselyDB, Error> {
  return createSqliteDatabase<DatabaseSchema>(dbPath ?? getDatabasePath());
}

export async function closeDatabase(db: KyselyDB): Promise<Result<void, Error>> {
  return closeSqliteDatabase(db);
}
