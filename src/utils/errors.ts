/**
 * Error types raised by procbridge itself.
 *
 * Errors thrown by the proxied object travel back unchanged in name and
 * message (see error-handler.ts); the classes here cover failures of the
 * bridge: transmission, lifecycle and protocol.
 *
 * @module utils/errors
 */

/**
 * Error categories for classification and handling
 */
export enum ErrorCategory {
  /** A payload could not be serialized */
  TRANSMISSION = 'TRANSMISSION',
  /** The worker went away or was closed */
  LIFECYCLE = 'LIFECYCLE',
  /** Replies and calls no longer line up, or a frame is malformed */
  PROTOCOL = 'PROTOCOL',
  /** The caller asked for something the bridge does not support */
  USAGE = 'USAGE',
  /** Raised inside the proxied object */
  REMOTE = 'REMOTE',
}

export interface ProcBridgeErrorOptions {
  cause?: unknown;
  retryable?: boolean;
  context?: Record<string, unknown>;
}

/**
 * Base class for every error the bridge raises.
 */
export class ProcBridgeError extends Error {
  readonly category: ErrorCategory;
  readonly retryable: boolean;
  readonly context?: Record<string, unknown>;
  readonly errorId: string;

  constructor(message: string, category: ErrorCategory, options: ProcBridgeErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.category = category;
    this.retryable = options.retryable ?? false;
    this.context = options.context;
    this.errorId = `err_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
  }

  toJSON() {
    return {
      errorId: this.errorId,
      name: this.name,
      message: this.message,
      category: this.category,
      retryable: this.retryable,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * A request or reply payload could not be serialized.
 */
export class TransmissionError extends ProcBridgeError {
  constructor(message: string, options: ProcBridgeErrorOptions = {}) {
    super(message, ErrorCategory.TRANSMISSION, options);
  }
}

/**
 * The worker was closed before this call could be answered, or the call was
 * submitted after close.
 */
export class WorkerClosedError extends ProcBridgeError {
  constructor(message = 'Worker is closed', options: ProcBridgeErrorOptions = {}) {
    super(message, ErrorCategory.LIFECYCLE, options);
  }
}

/**
 * The worker process exited without answering.
 */
export class WorkerFaultError extends ProcBridgeError {
  readonly exitCode: number | null;
  readonly signal: string | null;

  constructor(exitCode: number | null, signal: string | null, options: ProcBridgeErrorOptions = {}) {
    const how = signal ? `signal ${signal}` : `exit code ${String(exitCode)}`;
    super(`Worker process terminated unexpectedly (${how})`, ErrorCategory.LIFECYCLE, {
      ...options,
      context: { ...options.context, exitCode, signal },
    });
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

/**
 * Requests cannot be withdrawn once sent.
 */
export class CancellationError extends ProcBridgeError {
  constructor(what = 'Pending calls') {
    super(`${what} cannot be cancelled: the worker may already be executing the request`, ErrorCategory.USAGE);
  }
}

/**
 * close(wait) gave up waiting for the worker.
 */
export class CloseTimeoutError extends ProcBridgeError {
  constructor(timeoutMs: number) {
    super(`Worker did not close within ${timeoutMs}ms and was killed`, ErrorCategory.LIFECYCLE, {
      context: { timeoutMs },
    });
  }
}

/**
 * The worker could not start: bad bootstrap frame or missing constructor.
 */
export class BootstrapError extends ProcBridgeError {
  constructor(message: string, options: ProcBridgeErrorOptions = {}) {
    super(message, ErrorCategory.PROTOCOL, options);
  }
}

/**
 * Replies can no longer be matched to calls.
 */
export class ProtocolError extends ProcBridgeError {
  constructor(message: string, options: ProcBridgeErrorOptions = {}) {
    super(message, ErrorCategory.PROTOCOL, options);
  }
}

/**
 * An error raised inside the worker whose class has no local counterpart.
 * `name` keeps the remote class name; `remoteStack` keeps the remote trace.
 */
export class RemoteError extends ProcBridgeError {
  readonly remoteName: string;
  readonly remoteStack?: string;
  readonly code?: string;

  constructor(name: string, message: string, options: ProcBridgeErrorOptions & { stack?: string; code?: string } = {}) {
    super(message, ErrorCategory.REMOTE, options);
    this.name = name;
    this.remoteName = name;
    this.remoteStack = options.stack;
    this.code = options.code;
  }
}
