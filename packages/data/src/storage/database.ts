import { wrapError } from '@spendlog/core';
import { getLogger } from '@spendlog/logger';
import { Kysely, PostgresDialect } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';
import pg, { type PoolConfig } from 'pg';

import { getDatabaseConfig } from '../config/database-config.js';
import type { DatabaseSchema } from '../schema/database-schema.js';

const logger = getLogger('KyselyDatabase');

export type KyselyDB = Kysely<DatabaseSchema>;

/**
 * Create the Kysely instance over a pg pool.
 *
 * No connection is opened until the first query.
 */
export function createDatabase(config: PoolConfig = getDatabaseConfig()): KyselyDB {
  const pool = new pg.Pool(config);
  pool.on('error', (error) => logger.error({ error }, 'Idle database client error'));

  logger.debug(
    { host: config.host, database: config.database, usesConnectionString: config.connectionString !== undefined },
    'Created PostgreSQL pool'
  );

  return new Kysely<DatabaseSchema>({
    dialect: new PostgresDialect({ pool }),
  });
}

/**
 * Close a Kysely database connection.
 */
export async function closeDatabase(db: KyselyDB): Promise<Result<void, Error>> {
  try {
    await db.destroy();
    logger.debug('Database connection closed');
    return ok(undefined);
  } catch (error) {
    logger.error({ error }, 'Error closing database');
    return wrapError(error, 'Failed to close database');
  }
}
