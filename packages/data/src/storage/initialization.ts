import { getLogger } from '@netsettle/logger';
import { runMigrations } from '@netsettle/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { migrations } from '../migrations/index.js';

import { closeDatabase, createDatabase, type KyselyDB } from './database.js';

const logger = getLogger('DatabaseInitialization');

/**
 * Open the database and bring its schema up to date.
 */
export async function initializeDatabase(dbPath?: string): Promise<Result<KyselyDB, Error>> {
  const dbResult = createDatabase(dbPath);
  if (dbResult.isErr()) return err(dbResult.error);

  const db = dbResult.value;
  const migrationResult = await runMigrations(db, migrations);
  if (migrationResult.isErr()) {
    const closeResult = await closeDatabase(db);
    if (closeResult.isErr()) {
      logger.warn({ error: closeResult.error }, 'Failed to close database after migration failure');
    }
    return err(migrationResult.error);
  }

  if (migrationResult.value.length > 0) {
    logger.info({ applied: migrationResult.value }, 'Database migrations applied');
  }
  return ok(db);
}

export { closeDatabase, createDatabase, type KyselyDB };
