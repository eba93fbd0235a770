import { wrapError } from '@spendlog/core';
import { closeDatabase, ExpenseRepository, initializeDatabase, type KyselyDB } from '@spendlog/data';
import { getLogger } from '@spendlog/logger';
import type { Result } from 'neverthrow';

const logger = getLogger('database-utils');

/**
 * Run `fn` against a freshly opened database and always close it afterwards.
 *
 * Connection and schema setup failures are returned as Err, like the
 * repository's own failures, so commands have a single error path.
 *
 * @example
 * const result = await withExpenseRepository((repo) => repo.findAll());
 */
export async function withExpenseRepository<T>(
  fn: (repo: ExpenseRepository) => Promise<Result<T, Error>>
): Promise<Result<T, Error>> {
  let database: KyselyDB;
  try {
    database = await initializeDatabase();
  } catch (error) {
    logger.error({ error }, 'Database initialization failed');
    return wrapError(error, 'Failed to open expenses database');
  }

  try {
    return await fn(new ExpenseRepository(database));
  } finally {
    const closeResult = await closeDatabase(database);
    if (closeResult.isErr()) {
      logger.warn({ error: closeResult.error }, 'Database did not close cleanly');
    }
  }
}
