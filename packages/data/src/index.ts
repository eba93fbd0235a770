export { createDatabase, closeDatabase, type KyselyDB } from './storage/database.js';
export { ensureSchema } from './storage/schema-setup.js';
export { initializeDatabase } from './storage/initialization.js';
export { getDatabaseConfig, databaseEnvSchema, type DatabaseEnvConfig } from './config/database-config.js';
export { BaseRepository } from './repositories/base-repository.js';
export { ExpenseRepository } from './repositories/expense-repository.js';
export type { DatabaseSchema, ExpensesTable } from './schema/database-schema.js';
