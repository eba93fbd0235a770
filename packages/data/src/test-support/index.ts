import { PGlite } from '@electric-sql/pglite';
import { Kysely, sql } from 'kysely';
import { PGliteDialect } from 'kysely-pglite-dialect';

import type { DatabaseSchema } from '../schema/database-schema.js';
import type { KyselyDB } from '../storage/database.js';
import { ensureSchema } from '../storage/schema-setup.js';

/**
 * Create an in-memory PostgreSQL database with the expenses table in place.
 */
export async function createTestDatabase(): Promise<KyselyDB> {
  const db = new Kysely<DatabaseSchema>({
    dialect: new PGliteDialect(new PGlite()),
  });
  await ensureSchema(db);
  return db;
}

/**
 * Empty the expenses table and restart its id sequence.
 */
export async function resetTestDatabase(db: KyselyDB): Promise<void> {
  await sql`TRUNCATE expenses RESTART IDENTITY`.execute(db);
}

/**
 * The database server's current date as YYYY-MM-DD.
 */
export async function getServerDate(db: KyselyDB): Promise<string> {
  const result = await sql<{ today: string }>`SELECT to_char(CURRENT_DATE, 'YYYY-MM-DD') AS today`.execute(db);
  const today = result.rows[0]?.today;
  if (today === undefined) {
    throw new Error('Database returned no current date');
  }
  return today;
}
