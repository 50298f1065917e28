import { IN_MEMORY_DATABASE, runMigrations } from '@netsettle/sqlite';

import { DataContext } from '../data-context.js';
import { migrations } from '../migrations/index.js';
import { createDatabase, type KyselyDB } from '../storage/database.js';

/**
 * Create an in-memory database with migrations applied. For use in tests only.
 */
export async function createTestDatabase(): Promise<KyselyDB> {
  const dbResult = createDatabase(IN_MEMORY_DATABASE);
  if (dbResult.isErr()) {
    throw dbResult.error;
  }

  const db = dbResult.value;
  const migrationResult = await runMigrations(db, migrations);
  if (migrationResult.isErr()) {
    await db.destroy();
    throw migrationResult.error;
  }

  return db;
}

/**
 * Create an in-memory DataContext with migrations applied. For use in tests only.
 */
export async function createTestDataContext(): Promise<DataContext> {
  const db = await createTestDatabase();
  return new DataContext(db);
}
