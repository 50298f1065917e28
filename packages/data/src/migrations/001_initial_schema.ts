import { sql, type Kysely } from '@netsettle/sqlite';

const APPEND_ONLY_TABLES = ['settlement_batches', 'settlement_lines'] as const;

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('participants')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('external_id', 'text', (col) => col.notNull().unique())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('role', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addCheckConstraint(
      'participants_role_valid',
      sql`role IN ('consumer', 'tenant', 'commercial-tenant', 'landlord', 'operator', 'prosumer', 'external-market', 'fee-collector')`
    )
    .execute();

  await db.schema.createIndex('idx_participants_role').on('participants').column('role').execute();

  await db.schema
    .createTable('usage_events')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('participant_id', 'integer', (col) => col.references('participants.id').notNull())
    .addColumn('event_kind', 'text', (col) => col.notNull())
    .addColumn('quantity', 'text', (col) => col.notNull())
    .addColumn('unit', 'text', (col) => col.notNull())
    .addColumn('timestamp', 'text', (col) => col.notNull())
    .addColumn('source', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('price_per_unit', 'text')
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addCheckConstraint(
      'usage_events_kind_valid',
      sql`event_kind IN ('generation', 'consumption', 'grid-feed', 'base-fee', 'battery-charge', 'battery-discharge', 'production', 'vpp-sale')`
    )
    .addCheckConstraint('usage_events_unit_valid', sql`unit IN ('kWh', 'EUR')`)
    .execute();

  // Window queries filter on timestamp and read in (timestamp, id) order
  await db.schema
    .createIndex('idx_usage_events_timestamp')
    .on('usage_events')
    .columns(['timestamp', 'id'])
    .execute();

  await db.schema
    .createTable('policies')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('use_case', 'text', (col) => col.notNull())
    .addColumn('parameters_json', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addCheckConstraint('policies_parameters_json_valid', sql`json_valid(parameters_json)`)
    .execute();

  await db.schema
    .createTable('settlement_batches')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('use_case', 'text', (col) => col.notNull())
    .addColumn('policy_id', 'integer', (col) => col.references('policies.id').notNull())
    .addColumn('start_time', 'text', (col) => col.notNull())
    .addColumn('end_time', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addCheckConstraint('settlement_batches_window_valid', sql`start_time < end_time`)
    .execute();

  await db.schema
    .createIndex('idx_settlement_batches_use_case_window')
    .on('settlement_batches')
    .columns(['use_case', 'start_time', 'end_time'])
    .execute();

  await db.schema
    .createTable('settlement_lines')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('batch_id', 'text', (col) => col.references('settlement_batches.id').notNull())
    .addColumn('participant_id', 'integer', (col) => col.notNull())
    .addColumn('amount', 'text', (col) => col.notNull())
    .addColumn('description', 'text', (col) => col.notNull())
    .addColumn('proof_hash', 'text', (col) => col.notNull())
    .addUniqueConstraint('settlement_lines_batch_participant_unique', ['batch_id', 'participant_id'])
    .execute();

  // Corrections are issued as new batches, never as updates
  for (const table of APPEND_ONLY_TABLES) {
    await sql
      .raw(
        `CREATE TRIGGER ${table}_no_update BEFORE UPDATE ON ${table}
         BEGIN SELECT RAISE(ABORT, '${table} is append-only'); END`
      )
      .execute(db);
    await sql
      .raw(
        `CREATE TRIGGER ${table}_no_delete BEFORE DELETE ON ${table}
         BEGIN SELECT RAISE(ABORT, '${table} is append-only'); END`
      )
      .execute(db);
  }
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('settlement_lines').execute();
  await db.schema.dropTable('settlement_batches').execute();
  await db.schema.dropTable('policies').execute();
  await db.schema.dropTable('usage_events').execute();
  await db.schema.dropTable('participants').execute();
}
