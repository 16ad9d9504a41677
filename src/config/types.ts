/**
 * Configuration type definitions for procbridge.
 *
 * Values come from procbridge.config.yaml, environment variables and
 * per-spawn overrides, in increasing order of precedence.
 */

/**
 * Worker process section.
 */
export interface WorkerConfig {
  /** Upper bound on one poll of the request channel (milliseconds) */
  pollTimeoutMs?: number;
  /** Finish requests already received before honouring close */
  drainOnClose?: boolean;
  /** Extra Node.js flags for the forked process */
  execArgv?: string[];
}

/**
 * Controller-side reconciler section.
 */
export interface ReconcilerConfig {
  /** Upper bound on one poll of the reply channel (milliseconds) */
  pollTimeoutMs?: number;
}

/**
 * Shutdown section.
 */
export interface ShutdownConfig {
  /** Kill the worker if close(wait) takes longer than this (milliseconds) */
  closeTimeoutMs?: number;
}

/**
 * Logging configuration section.
 */
export interface LoggingConfig {
  /** Log level (trace, debug, info, warn, error, fatal, silent) */
  level?: string;
  /** Enable pretty printing in console */
  pretty?: boolean;
  /** Directory for rotated log files; file logging is off when unset */
  dir?: string;
}

/**
 * Shape of procbridge.config.yaml.
 */
export interface ProcBridgeConfig {
  worker?: WorkerConfig;
  reconciler?: ReconcilerConfig;
  shutdown?: ShutdownConfig;
  logging?: LoggingConfig;
}

/**
 * Per-spawn overrides. Logging belongs to the whole process and is set up
 * through Config.initLogging().
 */
export type SpawnConfig = Omit<ProcBridgeConfig, 'logging'>;

/**
 * Configuration as read from disk, with its origin.
 */
export interface LoadedConfig extends ProcBridgeConfig {
  /** Path of the file the values came from */
  _source?: string;
  /** Whether a file was found and parsed */
  _fromFile: boolean;
}

/**
 * Result of searching for a configuration file.
 */
export interface ConfigFileInfo {
  path: string;
  exists: boolean;
}

/**
 * Fully-resolved settings consumed by the Manager and the worker loop.
 */
export interface ResolvedConfig {
  workerPollTimeoutMs: number;
  drainOnClose: boolean;
  workerExecArgv: string[];
  reconcilerPollTimeoutMs: number;
  closeTimeoutMs: number;
}
