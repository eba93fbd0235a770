import { z } from 'zod';

export const logLevels = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

const booleanString = (defaultValue: 'true' | 'false') =>
  z
    .string()
    .default(defaultValue)
    .transform((val: string) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_ENABLED: booleanString('false'),
  LOGGER_FILE_LOG_ENABLED: booleanString('false'),
  LOGGER_FILE_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid file log name' }).default('spendlog.log'),
  LOGGER_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid log directory name' }).default('logs'),
  LOGGER_LOG_LEVEL: z.enum(logLevels).default('info'),
  LOGGER_SERVICE_NAME: z.string().default('spendlog'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('production'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
