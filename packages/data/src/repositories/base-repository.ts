import { getLogger, type Logger } from '@netsettle/logger';

import type { KyselyDB } from '../storage/database.js';

/**
 * Base repository class for Kysely-based database operations
 */
export abstract class BaseRepository {
  protected db: KyselyDB;
  protected logger: Logger;

  constructor(db: KyselyDB, repositoryName: string) {
    this.db = db;
    this.logger = getLogger(repositoryName);
  }

  /**
   * Current time for DateTime columns; the sqlite type adapter stores it as an ISO string
   */
  protected getCurrentDateTimeForDB(): Date {
    return new Date();
  }
}
