import { getLogger } from '@netsettle/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { ParticipantRepository } from './repositories/participant-repository.js';
import { PolicyRepository } from './repositories/policy-repository.js';
import { SettlementRepository } from './repositories/settlement-repository.js';
import { UsageEventRepository } from './repositories/usage-event-repository.js';
import type { KyselyDB } from './storage/initialization.js';
import { closeDatabase, initializeDatabase } from './storage/initialization.js';
import { withControlledTransaction } from './utils/db-utils.js';

const logger = getLogger('data-context');

export class DataContext {
  static async initialize(dbPath?: string): Promise<Result<DataContext, Error>> {
    const initResult = await initializeDatabase(dbPath);
    if (initResult.isErr()) return err(initResult.error);
    return ok(new DataContext(initResult.value));
  }

  readonly participants: ParticipantRepository;
  readonly usageEvents: UsageEventRepository;
  readonly policies: PolicyRepository;
  readonly settlements: SettlementRepository;

  private readonly connection: KyselyDB;

  constructor(connection: KyselyDB) {
    this.connection = connection;
    this.participants = new ParticipantRepository(connection);
    this.usageEvents = new UsageEventRepository(connection);
    this.policies = new PolicyRepository(connection);
    this.settlements = new SettlementRepository(connection);
  }

  /**
   * Execute a callback inside a single DB transaction (Unit of Work).
   * The callback receives a transaction-scoped DataContext whose repos
   * are all bound to the same transaction. Commits on ok(), rolls back on err() or throw.
   * Called on a context that is already transaction-scoped, the callback joins that transaction.
   */
  async executeInTransaction<T>(fn: (tx: DataContext) => Promise<Result<T, Error>>): Promise<Result<T, Error>> {
    if (this.connection.isTransaction) {
      return fn(this);
    }

    return withControlledTransaction(
      this.connection,
      logger,
      async (trx) => {
        const txContext = new DataContext(trx);
        return fn(txContext);
      },
      'Transaction failed'
    );
  }

  async close(): Promise<Result<void, Error>> {
    return closeDatabase(this.connection);
  }
}
