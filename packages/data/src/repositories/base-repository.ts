import { getLogger, type Logger } from '@spendlog/logger';

import type { KyselyDB } from '../storage/database.js';

/**
 * Base class for Kysely-backed repositories.
 */
export abstract class BaseRepository {
  protected db: KyselyDB;
  protected logger: Logger;

  constructor(db: KyselyDB, repositoryName: string) {
    this.db = db;
    this.logger = getLogger(repositoryName);
  }
}
