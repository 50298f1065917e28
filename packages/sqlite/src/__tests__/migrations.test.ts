import { sql } from 'kysely';
import type { Migration } from 'kysely';
import { describe, expect, it } from 'vitest';

import { closeSqliteDatabase } from '../close.js';
import { createSqliteDatabase } from '../database.js';
import { runMigrations } from '../migrations.js';

const migrations: Record<string, Migration> = {
  '001_create_notes': {
    up: async (kysely) => {
      await kysely.schema
        .createTable('notes')
        .addColumn('id', 'integer', (c) => c.primaryKey())
        .execute();
    },
  },
};

describe('runMigrations', () => {
  it('executes registered migrations and reports their names', async () => {
    const db = createSqliteDatabase<Record<string, never>>(':memory:')._unsafeUnwrap();

    const migrationResult = await runMigrations(db, migrations);
    expect(migrationResult._unsafeUnwrap()).toEqual(['001_create_notes']);

    const tableCheck = await sql<{ name: string }>`
      select name from sqlite_master where type = 'table' and name = 'notes'
    `.execute(db);
    expect(tableCheck.rows[0]?.name).toBe('notes');

    await closeSqliteDatabase(db);
  });

  it('is a no-op when everything is applied', async () => {
    const db = createSqliteDatabase<Record<string, never>>(':memory:')._unsafeUnwrap();

    await runMigrations(db, migrations);
    const second = await runMigrations(db, migrations);

    expect(second._unsafeUnwrap()).toEqual([]);
    await closeSqliteDatabase(db);
  });

  it('returns an error when a migration fails', async () => {
    const db = createSqliteDatabase<Record<string, never>>(':memory:')._unsafeUnwrap();

    const result = await runMigrations(db, {
      '001_broken': {
        up: async (kysely) => {
          await sql`create tabel nope`.execute(kysely);
        },
      },
    });

    expect(result.isErr()).toBe(true);
    await closeSqliteDatabase(db);
  });
});
