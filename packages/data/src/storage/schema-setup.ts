import { getLogger } from '@spendlog/logger';
import { sql } from 'kysely';

import type { KyselyDB } from './database.js';

const logger = getLogger('SchemaSetup');

/**
 * Create the expenses table unless it already exists.
 */
export async function ensureSchema(db: KyselyDB): Promise<void> {
  await db.schema
    .createTable('expenses')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('amount', sql`numeric(6,2)`, (col) => col.notNull())
    .addColumn('memo', 'text', (col) => col.notNull())
    .addColumn('created_on', 'date', (col) => col.notNull().defaultTo(sql`CURRENT_DATE`))
    .execute();

  logger.debug('Ensured expenses table exists');
}
