import { getErrorMessage, wrapError } from '@netsettle/core';
import { getLogger } from '@netsettle/logger';
import { Migrator, type Kysely, type Migration } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

const logger = getLogger('SqliteMigrations');

/**
 * Run all pending migrations from a programmatic migration record.
 *
 * Migrations are keyed by name (e.g. '001_initial_schema') and applied in key
 * order. A programmatic provider avoids FileMigrationProvider's dynamic
 * `import()`, which cannot resolve .ts sources under Vitest.
 */
export async function runMigrations<T>(
  db: Kysely<T>,
  migrations: Record<string, Migration>
): Promise<Result<string[], Error>> {
  try {
    logger.debug(`Running migrations (${Object.keys(migrations).length} registered)`);

    const migrator = new Migrator({
      db,
      provider: { getMigrations: () => Promise.resolve(migrations) },
    });

    const { error, results } = await migrator.migrateToLatest();
    const applied: string[] = [];

    if (results && results.length > 0) {
      for (const result of results) {
        if (result.status === 'Success') {
          applied.push(result.migrationName);
          logger.debug(`Migration "${result.migrationName}" executed successfully`);
        } else if (result.status === 'Error') {
          logger.error(`Migration "${result.migrationName}" failed`);
        }
      }
    } else {
      logger.debug('No pending migrations');
    }

    if (error) {
      logger.error({ error }, 'Migration failed');
      return err(new Error(getErrorMessage(error, 'Unknown migration error')));
    }

    return ok(applied);
  } catch (error) {
    logger.error({ error }, 'Error running migrations');
    return wrapError(error, 'Failed to run migrations');
  }
}
