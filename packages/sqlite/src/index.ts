export { createSqliteDatabase, IN_MEMORY_DATABASE, type CreateSqliteDatabaseOptions } from './database.js';
export { runMigrations } from './migrations.js';
export { closeSqliteDatabase } from './close.js';
export {
  SqliteTypeAdapterPlugin,
  sqliteTypeAdapterPlugin,
  convertValueForSqlite,
} from './plugins/sqlite-type-adapter-plugin.js';

// Re-export commonly used Kysely types so consumers don't need kysely as a direct dependency
export {
  Kysely,
  sql,
  type ColumnType,
  type ControlledTransaction,
  type Generated,
  type Insertable,
  type Migration,
  type Selectable,
  type Transaction,
} from 'kysely';
