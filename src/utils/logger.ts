/**
 * Logger Factory Module
 *
 * Centralized logging on Pino:
 * - Development (pretty print) vs Production (JSON) output
 * - Silent under NODE_ENV=test unless LOG_LEVEL asks otherwise
 * - Optional rotating file output with pino-roll
 * - Child loggers with context binding
 *
 * Both the controller and every forked worker use this module; worker
 * loggers carry their pid so interleaved output can be told apart.
 *
 * @module utils/logger
 */

import pino, { type Logger, type Level, type LoggerOptions } from 'pino';
import path from 'path';
import fs from 'fs';

/**
 * Log levels supported by Pino, plus 'silent'
 */
export type LogLevel = Level | 'silent';

/**
 * Logger configuration interface
 */
export interface LoggerConfig {
  /** Log level (default: from LOG_LEVEL, else by environment) */
  level?: LogLevel;
  /** Enable pretty print (default: on outside production) */
  prettyPrint?: boolean;
  /** Log to rotated files in this directory instead of stdout */
  logDir?: string;
  /** Additional metadata to include in all logs */
  metadata?: Record<string, unknown>;
}

const VALID_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Root logger instance (singleton)
 */
let rootLogger: Logger | null = null;

/** Whether the root was built with defaults by getRootLogger() */
let rootIsDefault = false;

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

function isTest(): boolean {
  return process.env.NODE_ENV === 'test';
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Normalize a level name from configuration.
 *
 * @returns undefined for unknown names
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Get log level from environment or default
 */
function getDefaultLogLevel(): LogLevel {
  const envLevel = parseLogLevel(process.env.LOG_LEVEL);
  if (envLevel) {
    return envLevel;
  }

  if (isTest()) return 'silent';
  return isProduction() ? 'info' : 'debug';
}

function getBaseConfig(level: LogLevel): LoggerOptions {
  return {
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };
}

/**
 * Pretty console output for local development.
 */
function getDevelopmentConfig(level: LogLevel): LoggerOptions {
  return {
    ...getBaseConfig(level),
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'hostname',
        messageFormat: '[{context}] {msg}',
      },
    },
  };
}

/**
 * JSON output with ISO timestamps.
 */
function getProductionConfig(level: LogLevel): LoggerOptions {
  return {
    ...getBaseConfig(level),
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

function buildOptions(config: LoggerConfig): LoggerOptions {
  const level = config.level ?? getDefaultLogLevel();
  const pretty = config.prettyPrint ?? (!isProduction() && !isTest());
  const options = pretty ? getDevelopmentConfig(level) : getProductionConfig(level);

  if (config.metadata) {
    options.base = { pid: process.pid, ...config.metadata };
  }
  return options;
}

/**
 * Open a size-rotated log file.
 *
 * pino-roll is imported lazily so processes that never log to files do not
 * load it.
 */
async function setupFileLogging(logDir: string): Promise<pino.DestinationStream> {
  const logsPath = path.resolve(process.cwd(), logDir);
  if (!fs.existsSync(logsPath)) {
    fs.mkdirSync(logsPath, { recursive: true });
  }

  const { default: pinoRoll } = await import('pino-roll');
  return pinoRoll({
    file: path.join(logsPath, 'procbridge'),
    extension: '.log',
    size: '10m',
    limit: { count: 10 },
    mkdir: true,
  });
}

/**
 * Initialize the root logger
 *
 * Creates the singleton root logger, replacing one that getRootLogger()
 * built with defaults. Later calls return the same instance until
 * resetLogger() is called. Child loggers created before this call keep
 * writing through the default root.
 *
 * @example
 * ```typescript
 * const logger = await initLogger({ level: 'info', logDir: './logs' });
 * logger.info('Controller started');
 * ```
 */
export async function initLogger(config: LoggerConfig = {}): Promise<Logger> {
  if (rootLogger && !rootIsDefault) {
    return rootLogger;
  }
  rootIsDefault = false;

  const options = buildOptions(config);

  if (config.logDir) {
    try {
      const stream = await setupFileLogging(config.logDir);
      // pino refuses a transport together with an explicit stream
      const { transport: _transport, ...fileOptions } = options;
      rootLogger = pino(fileOptions, stream);
      return rootLogger;
    } catch (error) {
      console.warn('Failed to setup file logging, falling back to stdout:', error);
    }
  }

  rootLogger = pino(options);
  return rootLogger;
}

/**
 * Create a child logger with context
 *
 * @param context - Component name (e.g., 'Manager', 'WorkerLoop')
 * @param metadata - Additional metadata to include in all logs
 *
 * @example
 * ```typescript
 * class Reconciler {
 *   private logger = createLogger('Reconciler', { workerPid: 4242 });
 * }
 * ```
 */
export function createLogger(context: string, metadata?: Record<string, unknown>): Logger {
  return getRootLogger().child({ context, ...metadata });
}

/**
 * Get the root logger instance, creating a default one if needed.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(buildOptions({}));
    rootIsDefault = true;
  }
  return rootLogger;
}

/**
 * Drop the root logger so the next call builds a fresh one.
 */
export function resetLogger(): void {
  rootLogger = null;
  rootIsDefault = false;
}

/**
 * Update the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

/**
 * Check if a log level is enabled
 */
export function isLevelEnabled(level: Level): boolean {
  return getRootLogger().isLevelEnabled(level);
}

/**
 * Flush any pending log entries
 *
 * Useful for ensuring logs are written before process exit.
 */
export function flushLogger(): Promise<void> {
  const logger = rootLogger;
  if (!logger) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    logger.flush(() => resolve());
  });
}
