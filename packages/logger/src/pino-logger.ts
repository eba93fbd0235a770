import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

export type Logger = pino.Logger;

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

interface TransportMode {
  console: boolean;
  file: boolean;
  level?: LoggerEnvConfig['LOGGER_LOG_LEVEL'] | undefined;
}

let env: LoggerEnvConfig | undefined;
let rootLogger: Logger | undefined;
let transportMode: TransportMode | undefined;
const loggerCache = new Map<string, Logger>();

function getEnv(): LoggerEnvConfig {
  if (!env) {
    env = validateLoggerEnv(process.env);
  }
  return env;
}

function getTransportMode(): TransportMode {
  if (!transportMode) {
    const config = getEnv();
    transportMode = { console: config.LOGGER_CONSOLE_ENABLED, file: config.LOGGER_FILE_LOG_ENABLED };
  }
  return transportMode;
}

function isTestEnv(): boolean {
  return getEnv().NODE_ENV === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Build the destinations for the root logger.
 *
 * Console output goes to stderr: stdout belongs to command output.
 */
function buildStreams(): pino.StreamEntry[] {
  const config = getEnv();
  const mode = getTransportMode();
  const streams: pino.StreamEntry[] = [];

  if (isTestEnv()) return streams;

  if (mode.console) {
    streams.push({ level: 'trace', stream: pino.destination({ dest: 2, sync: true }) });
  }

  if (mode.file) {
    streams.push({
      level: 'trace',
      stream: pino.destination({
        dest: path.join(config.LOGGER_LOG_DIRNAME, config.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
        sync: true,
      }),
    });
  }

  return streams;
}

function createRootLogger(): Logger {
  const config = getEnv();
  const mode = getTransportMode();

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: config.NODE_ENV,
      pid: process.pid,
      service: config.LOGGER_SERVICE_NAME,
    },
    level: mode.level ?? config.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const streams = buildStreams();
  if (streams.length === 0) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino({ ...pinoConfig, level: 'silent' }, noopStream);
  }

  return pino(pinoConfig, pino.multistream(streams));
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with transport reconfiguration.
 *
 * Modules create their loggers at top level, before the CLI has parsed
 * `--verbose`, so the returned Proxy resolves the underlying pino logger
 * on every property access.
 */
export function getLogger(category: string): Logger {
  const target = getOrCreateCategoryLogger(category);
  return new Proxy(target, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
}

/**
 * Update destinations at runtime. Cached loggers are dropped so the new
 * configuration applies immediately.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...getTransportMode(), ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

/** Reset env and transport state (for testing). */
export function _resetLogger(): void {
  env = undefined;
  transportMode = undefined;
  rootLogger = undefined;
  loggerCache.clear();
}
