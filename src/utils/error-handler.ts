/**
 * Error handling helpers
 *
 * - Converting thrown values to a transmissible shape and back, so failures
 *   inside the worker reach the caller with their class name and message
 * - Standardized error logging with Pino
 *
 * @module utils/error-handler
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { createLogger } from './logger.js';
import {
  BootstrapError,
  ErrorCategory,
  ProcBridgeError,
  ProtocolError,
  RemoteError,
  TransmissionError,
  WorkerClosedError,
} from './errors.js';

/**
 * Transmissible form of a thrown value.
 */
export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  code?: string;
  cause?: SerializedError;
}

export const serializedErrorSchema: z.ZodType<SerializedError> = z.lazy(() =>
  z.object({
    name: z.string(),
    message: z.string(),
    stack: z.string().optional(),
    code: z.string().optional(),
    cause: serializedErrorSchema.optional(),
  })
);

type ErrorFactory = (message: string) => Error;

/**
 * Classes rebuilt as themselves on the receiving side.
 */
const KNOWN_ERRORS: Record<string, ErrorFactory> = {
  Error: (message) => new Error(message),
  TypeError: (message) => new TypeError(message),
  RangeError: (message) => new RangeError(message),
  SyntaxError: (message) => new SyntaxError(message),
  ReferenceError: (message) => new ReferenceError(message),
  EvalError: (message) => new EvalError(message),
  URIError: (message) => new URIError(message),
  TransmissionError: (message) => new TransmissionError(message),
  WorkerClosedError: (message) => new WorkerClosedError(message),
  BootstrapError: (message) => new BootstrapError(message),
  ProtocolError: (message) => new ProtocolError(message),
};

/** Nested causes deeper than this are dropped. */
const MAX_CAUSE_DEPTH = 5;

/**
 * Get a readable message out of any thrown value.
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Capture a thrown value as plain data.
 *
 * @example
 * ```typescript
 * serializeError(new RangeError('too big'));
 * // { name: 'RangeError', message: 'too big', stack: 'RangeError: too big\n    at ...' }
 * ```
 */
export function serializeError(error: unknown, depth = 0): SerializedError {
  if (!(error instanceof Error)) {
    return { name: 'Error', message: toErrorMessage(error) };
  }

  // subclasses that never set `name` still report their class
  const className = error.constructor.name;
  const name = error.name === 'Error' && className && className !== 'Error' ? className : error.name || 'Error';
  const serialized: SerializedError = {
    name,
    message: error.message,
  };
  if (error.stack) serialized.stack = error.stack;

  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string') serialized.code = code;

  if (error.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
    serialized.cause = serializeError(error.cause, depth + 1);
  }
  return serialized;
}

/**
 * Rebuild an error captured by serializeError().
 *
 * Built-in classes and the bridge's own transmissible errors come back as
 * themselves; any other class becomes a RemoteError whose `name` is the
 * original class name.
 */
export function deserializeError(serialized: SerializedError): Error {
  const factory = Object.hasOwn(KNOWN_ERRORS, serialized.name) ? KNOWN_ERRORS[serialized.name] : undefined;
  const cause = serialized.cause ? deserializeError(serialized.cause) : undefined;

  if (!factory) {
    return new RemoteError(serialized.name, serialized.message, {
      stack: serialized.stack,
      code: serialized.code,
      cause,
    });
  }

  const error = factory(serialized.message);
  if (serialized.stack) error.stack = serialized.stack;
  if (cause !== undefined) error.cause = cause;
  if (serialized.code !== undefined) Reflect.set(error, 'code', serialized.code);
  return error;
}

let errorLogger: Logger | undefined;

function getErrorHandlerLogger(): Logger {
  if (!errorLogger) {
    errorLogger = createLogger('ErrorHandler');
  }
  return errorLogger;
}

/**
 * Classify an error for logging.
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof ProcBridgeError) return error.category;
  return ErrorCategory.REMOTE;
}

/**
 * Log an error with full context using Pino.
 *
 * Lifecycle errors are expected during shutdown and log at warn; the rest
 * log at error.
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {},
  customLogger?: Logger
): void {
  const logger = customLogger ?? getErrorHandlerLogger();
  const category = classifyError(error);
  const logData: Record<string, unknown> = {
    err: error instanceof Error ? error : undefined,
    category,
    ...context,
  };
  if (error instanceof ProcBridgeError) {
    logData.errorId = error.errorId;
  }

  const message = toErrorMessage(error);
  if (category === ErrorCategory.LIFECYCLE) {
    logger.warn(logData, message);
  } else {
    logger.error(logData, message);
  }
}
