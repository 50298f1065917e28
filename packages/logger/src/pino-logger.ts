import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { logLevelsSchema, validateLoggerEnv } from './env.schema.js';

const env = validateLoggerEnv(process.env);

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

/** Category logger with the custom `audit` level. */
export type Logger = pino.Logger<'audit'>;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

export interface TransportMode {
  console: boolean;
  file: boolean;
}

// Mutable so the CLI can silence console output in JSON mode
let transportMode: TransportMode = {
  console: env.LOGGER_CONSOLE_ENABLED,
  file: env.LOGGER_FILE_LOG_ENABLED,
};

function ensureLogDirExists(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

function isTestEnvironment(): boolean {
  // vitest may set NODE_ENV after this module was evaluated
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function createRootLogger(): Logger {
  interface TransportTarget {
    level: string;
    options: Record<string, unknown>;
    target: string;
  }

  const transportTargets: TransportTarget[] = [];
  const isTestEnv = isTestEnvironment();

  if (transportMode.console && !isTestEnv) {
    if (env.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      // JSON on stderr keeps stdout free for command output
      transportTargets.push({
        level: 'trace',
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (transportMode.file && !isTestEnv) {
    ensureLogDirExists(env.LOGGER_AUDIT_LOG_DIRNAME);
    transportTargets.push({
      level: 'trace',
      options: {
        destination: path.join(env.LOGGER_AUDIT_LOG_DIRNAME, env.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (env.LOGGER_AUDIT_LOG_ENABLED && !isTestEnv) {
    ensureLogDirExists(env.LOGGER_AUDIT_LOG_DIRNAME);
    transportTargets.push({
      level: 'audit',
      options: {
        destination: path.join(env.LOGGER_AUDIT_LOG_DIRNAME, `${env.LOGGER_AUDIT_LOG_FILENAME}_${os.hostname()}.log`),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  const pinoConfig: pino.LoggerOptions<'audit'> = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    customLevels: logLevelsSchema,
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    useOnlyCustomLevels: true,
  };

  // Tests and fully disabled transports write nowhere
  if (isTestEnv || transportTargets.length === 0) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino<'audit'>(pinoConfig, noopStream);
  }

  return pino.pino<'audit'>({ ...pinoConfig, transport: { targets: transportTargets } });
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
 * Modules create their loggers at top level, before the CLI has parsed its
 * flags. The proxy resolves the current underlying pino logger on every
 * property access, so `setLoggerTransports` also applies to those.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value = logger[prop as keyof Logger];
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Update transport mode at runtime. Resets cached loggers so the new
 * configuration applies immediately.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...transportMode, ...next };
  rootLogger?.flush();
  rootLogger = undefined;
  loggerCache.clear();
}

export function getLoggerTransports(): TransportMode {
  return { ...transportMode };
}
