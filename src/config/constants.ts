/**
 * Library-wide constants.
 */

/**
 * Worker loop defaults
 */
export const WORKER_LOOP = {
  /** Upper bound on one transport poll inside the worker (milliseconds) */
  POLL_TIMEOUT_MS: 1000,

  /** Process requests already received when close is observed */
  DRAIN_ON_CLOSE: true,
} as const;

/**
 * Controller-side reply reconciliation
 */
export const RECONCILER = {
  /** Upper bound on one transport poll in the controller (milliseconds) */
  POLL_TIMEOUT_MS: 50,
} as const;

/**
 * Shutdown protocol
 */
export const SHUTDOWN = {
  /** How long close(wait) waits for the worker before killing it (milliseconds) */
  CLOSE_TIMEOUT_MS: 10_000,
} as const;

/**
 * Operation names with a fixed meaning on the wire.
 */
export const RESERVED_OPERATIONS = {
  /** Read an attribute off the instance: args `[name]` */
  GET_ATTRIBUTE: '__getattr__',
  /** Write an attribute on the instance: args `[name, value]` */
  SET_ATTRIBUTE: '__setattr__',
} as const;

/**
 * Configuration file names to search for, in priority order.
 */
export const CONFIG_FILE_NAMES = [
  'procbridge.config.yaml',
  'procbridge.config.yml',
] as const;
