import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@netsettle/core';
import { getLogger } from '@netsettle/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect, type KyselyPlugin } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import { sqliteTypeAdapterPlugin } from './plugins/sqlite-type-adapter-plugin.js';

const logger = getLogger('SqliteDatabase');

export const IN_MEMORY_DATABASE = ':memory:';

export interface CreateSqliteDatabaseOptions {
  /** Additional Kysely plugins (sqliteTypeAdapterPlugin is always applied) */
  plugins?: KyselyPlugin[] | undefined;
  /** Milliseconds a writer waits for a competing write lock before failing */
  busyTimeoutMs?: number | undefined;
}

/**
 * Create and configure a SQLite-backed Kysely database instance.
 *
 * Always applies the sqliteTypeAdapterPlugin (Date to ISO string, undefined to NULL).
 */
export function createSqliteDatabase<T>(
  dbPath: string,
  options?: CreateSqliteDatabaseOptions
): Result<Kysely<T>, Error> {
  try {
    const isInMemory = dbPath === IN_MEMORY_DATABASE;
    const dataDir = path.dirname(dbPath);
    if (!isInMemory && !fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    const sqliteDb = new Database(dbPath);

    sqliteDb.pragma('foreign_keys = ON');
    sqliteDb.pragma(`busy_timeout = ${options?.busyTimeoutMs ?? 5000}`);
    if (!isInMemory) {
      sqliteDb.pragma('journal_mode = WAL');
      sqliteDb.pragma('synchronous = NORMAL');
    }

    logger.debug(`Connected to SQLite database: ${dbPath}`);

    const plugins = [sqliteTypeAdapterPlugin, ...(options?.plugins ?? [])];

    let kysely = new Kysely<T>({
      dialect: new SqliteDialect({ database: sqliteDb }),
    });

    for (const plugin of plugins) {
      kysely = kysely.withPlugin(plugin);
    }

    return ok(kysely);
  } catch (error) {
    logger.error({ error }, `Error creating SQLite database: ${dbPath}`);
    return wrapError(error, `Failed to create SQLite database: ${dbPath}`);
  }
}
