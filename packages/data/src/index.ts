export { DataContext } from './data-context.js';
export { createDatabase, closeDatabase, type KyselyDB } from './storage/database.js';
export { initializeDatabase } from './storage/initialization.js';
export { migrations } from './migrations/index.js';
export { BaseRepository } from './repositories/base-repository.js';
export { ParticipantRepository } from './repositories/participant-repository.js';
export { UsageEventRepository } from './repositories/usage-event-repository.js';
export { PolicyRepository } from './repositories/policy-repository.js';
export { SettlementRepository, type ListBatchesOptions } from './repositories/settlement-repository.js';
export { parseWithSchema, serializeToJson, withControlledTransaction } from './utils/db-utils.js';
export { createTestDatabase, createTestDataContext } from './__tests__/test-utils.js';
export type {
  DatabaseSchema,
  ParticipantsTable,
  PoliciesTable,
  SettlementBatchesTable,
  SettlementLinesTable,
  UsageEventsTable,
} from './schema/database-schema.js';
