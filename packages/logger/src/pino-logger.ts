import { Writable } from 'node:stream';

import pino from 'pino';

import { type LoggerEnvConfig, validateLoggerEnv } from './env.schema.js';

export type Logger = pino.Logger;

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

interface TransportMode {
  console: boolean;
  file: boolean;
}

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

const loggerCache = new Map<string, Logger>();

let env: LoggerEnvConfig | undefined;
let rootLogger: Logger | undefined;
let transportOverrides: Partial<TransportMode> = {};

function getEnv(): LoggerEnvConfig {
  if (!env) {
    env = validateLoggerEnv(process.env);
  }
  return env;
}

function isTestEnv(config: LoggerEnvConfig): boolean {
  return config.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): Logger {
  const config = getEnv();
  const mode: TransportMode = {
    console: transportOverrides.console ?? config.LOGGER_CONSOLE_ENABLED,
    file: transportOverrides.file ?? config.LOGGER_FILE_LOG_ENABLED,
  };

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: config.NODE_ENV,
      service: config.LOGGER_SERVICE_NAME,
    },
    level: config.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Test runs never spawn transport workers; everything goes to a no-op stream
  if (isTestEnv(config)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(pinoConfig, noopStream);
  }

  const transportTargets: TransportTarget[] = [];

  if (mode.console) {
    if (config.NODE_ENV === 'development') {
      transportTargets.push({
        level: config.LOGGER_LOG_LEVEL,
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      // Plain JSON on stderr keeps stdout free for command output
      transportTargets.push({
        level: config.LOGGER_LOG_LEVEL,
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (mode.file) {
    transportTargets.push({
      level: config.LOGGER_LOG_LEVEL,
      options: {
        destination: `./${config.LOGGER_LOG_DIRNAME}/${config.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (transportTargets.length === 0) {
    return pino({ ...pinoConfig, enabled: false });
  }

  return pino({ ...pinoConfig, transport: { targets: transportTargets } });
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }

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
 * The returned proxy resolves the underlying pino logger on every property
 * access, so modules that create their logger at top level still pick up a
 * later `setLoggerTransports(...)` call.
 */
export function getLogger(category: string): Logger {
  const target: object = {};
  return new Proxy(target, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  }) as Logger;
}

/**
 * Update transport mode at runtime (the CLI silences console output in JSON mode).
 * Resets cached loggers so the new configuration applies immediately.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportOverrides = { ...transportOverrides, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

/**
 * Forget the validated environment and every cached logger.
 */
export function resetLoggers(): void {
  env = undefined;
  transportOverrides = {};
  rootLogger = undefined;
  loggerCache.clear();
}
