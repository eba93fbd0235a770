import type { PoolConfig } from 'pg';
import { z } from 'zod';

const DEFAULT_DATABASE_NAME = 'spendlog';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val === undefined || val.length === 0 ? undefined : val));

export const databaseEnvSchema = z.object({
  DB_URL: optionalString,
  DB_HOST: optionalString,
  DB_PORT: optionalString.pipe(z.coerce.number().int().positive().optional()),
  DB_NAME: optionalString,
  DB_USER: optionalString,
  DB_PASSWORD: optionalString,
  DB_SSL: z
    .string()
    .default('false')
    .transform((val: string) => val === 'true'),
  PGDATABASE: optionalString,
});

export type DatabaseEnvConfig = z.infer<typeof databaseEnvSchema>;

/**
 * Build the pg pool configuration from the environment.
 *
 * Only settings that are present are passed on, so pg keeps its own
 * defaults and PG* variables for everything else. The CLI holds a single
 * connection for its lifetime.
 */
export function getDatabaseConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const config = databaseEnvSchema.parse(env);
  const ssl = config.DB_SSL ? { rejectUnauthorized: false } : undefined;

  if (config.DB_URL) {
    return { connectionString: config.DB_URL, max: 1, ...(ssl ? { ssl } : {}) };
  }

  return {
    database: config.DB_NAME ?? config.PGDATABASE ?? DEFAULT_DATABASE_NAME,
    max: 1,
    ...(config.DB_HOST ? { host: config.DB_HOST } : {}),
    ...(config.DB_PORT ? { port: config.DB_PORT } : {}),
    ...(config.DB_USER ? { user: config.DB_USER } : {}),
    ...(config.DB_PASSWORD ? { password: config.DB_PASSWORD } : {}),
    ...(ssl ? { ssl } : {}),
  };
}
