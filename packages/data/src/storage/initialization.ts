import { getLogger } from '@spendlog/logger';
import type { PoolConfig } from 'pg';

import { createDatabase, type KyselyDB } from './database.js';
import { ensureSchema } from './schema-setup.js';

const logger = getLogger('DatabaseInitialization');

/**
 * Connect and make sure the expenses table exists.
 *
 * The pool is destroyed again if schema setup fails, so callers only own
 * a database handle that is ready to use.
 */
export async function initializeDatabase(config?: PoolConfig): Promise<KyselyDB> {
  logger.debug('Initializing database...');

  const database = createDatabase(config);

  try {
    await ensureSchema(database);
  } catch (error) {
    await database.destroy();
    throw error;
  }

  logger.debug('Database initialization completed');
  return database;
}
