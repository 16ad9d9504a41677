/**
 * Tests for error handler utilities (src/utils/error-handler.ts)
 *
 * Tests the following functionality:
 * - Readable messages from any thrown value
 * - Error serialization and reconstruction across the process boundary
 * - Error classification
 * - Error logging with Pino
 */

import { describe, it, expect } from 'vitest';
import pino from 'pino';
import {
  classifyError,
  deserializeError,
  logError,
  serializedErrorSchema,
  serializeError,
  toErrorMessage,
} from './error-handler.js';
import { ErrorCategory, RemoteError, TransmissionError, WorkerClosedError } from './errors.js';

class LedgerError extends Error {}

function memoryLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'trace' },
    {
      write(line: string) {
        lines.push(JSON.parse(line));
      },
    }
  );
  return { logger, lines };
}

describe('toErrorMessage', () => {
  it('should use the message of an Error', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('should pass strings through', () => {
    expect(toErrorMessage('plain')).toBe('plain');
  });

  it('should JSON-encode other values', () => {
    expect(toErrorMessage({ code: 7 })).toBe('{"code":7}');
    expect(toErrorMessage(['a', 'b'])).toBe('["a","b"]');
  });

  it('should fall back to String() when JSON fails', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(toErrorMessage(circular)).toBe('[object Object]');
    expect(toErrorMessage(undefined)).toBe('undefined');
  });
});

describe('serializeError', () => {
  it('should capture name, message and stack', () => {
    const error = new RangeError('too big');

    const serialized = serializeError(error);

    expect(serialized.name).toBe('RangeError');
    expect(serialized.message).toBe('too big');
    expect(serialized.stack).toBe(error.stack);
  });

  it('should report the class of a subclass that never set name', () => {
    expect(serializeError(new LedgerError('unbalanced')).name).toBe('LedgerError');
  });

  it('should keep a string code', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });

    expect(serializeError(error).code).toBe('ENOENT');
  });

  it('should ignore a non-string code', () => {
    const error = Object.assign(new Error('odd'), { code: 12 });

    expect(serializeError(error).code).toBeUndefined();
  });

  it('should wrap values that are not errors', () => {
    expect(serializeError('plain failure')).toEqual({ name: 'Error', message: 'plain failure' });
    expect(serializeError(42)).toEqual({ name: 'Error', message: '42' });
  });

  it('should follow causes up to a fixed depth', () => {
    let error = new Error('level 0');
    for (let level = 1; level < 8; level++) {
      error = new Error(`level ${level}`, { cause: error });
    }

    let depth = 0;
    for (let current = serializeError(error).cause; current; current = current.cause) {
      depth++;
    }

    expect(depth).toBe(5);
  });

  it('should produce data the schema accepts', () => {
    const serialized = serializeError(new TypeError('outer', { cause: 'inner' }));

    expect(serializedErrorSchema.safeParse(serialized).success).toBe(true);
    expect(serialized.cause).toEqual({ name: 'Error', message: 'inner' });
  });
});

describe('deserializeError', () => {
  it('should rebuild built-in classes', () => {
    const error = deserializeError({ name: 'TypeError', message: 'not a function', stack: 'TypeError: remote' });

    expect(error).toBeInstanceOf(TypeError);
    expect(error.message).toBe('not a function');
    expect(error.stack).toBe('TypeError: remote');
  });

  it('should rebuild the bridge errors that travel', () => {
    expect(deserializeError({ name: 'TransmissionError', message: 'x' })).toBeInstanceOf(TransmissionError);
    expect(deserializeError({ name: 'WorkerClosedError', message: 'x' })).toBeInstanceOf(WorkerClosedError);
  });

  it('should turn unknown classes into RemoteError', () => {
    const error = deserializeError({ name: 'LedgerError', message: 'unbalanced', code: 'E_LEDGER' });

    expect(error).toBeInstanceOf(RemoteError);
    expect(error.name).toBe('LedgerError');
    expect(error.message).toBe('unbalanced');
    expect(Reflect.get(error, 'code')).toBe('E_LEDGER');
  });

  it('should not treat prototype members as known classes', () => {
    expect(deserializeError({ name: 'constructor', message: 'x' })).toBeInstanceOf(RemoteError);
  });

  it('should rebuild causes and codes', () => {
    const error = deserializeError({
      name: 'Error',
      message: 'outer',
      code: 'E_OUTER',
      cause: { name: 'RangeError', message: 'inner' },
    });

    expect(error.cause).toBeInstanceOf(RangeError);
    expect(Reflect.get(error, 'code')).toBe('E_OUTER');
  });

  it('should invert serializeError for plain errors', () => {
    const original = new SyntaxError('unexpected token');

    const rebuilt = deserializeError(serializeError(original));

    expect(rebuilt).toBeInstanceOf(SyntaxError);
    expect(rebuilt.message).toBe('unexpected token');
    expect(rebuilt.stack).toBe(original.stack);
  });
});

describe('classifyError', () => {
  it('should use the category of bridge errors', () => {
    expect(classifyError(new TransmissionError('x'))).toBe(ErrorCategory.TRANSMISSION);
  });

  it('should treat everything else as remote', () => {
    expect(classifyError(new Error('x'))).toBe(ErrorCategory.REMOTE);
    expect(classifyError('x')).toBe(ErrorCategory.REMOTE);
  });
});

describe('logError', () => {
  it('should log lifecycle errors at warn', () => {
    const { logger, lines } = memoryLogger();
    const error = new WorkerClosedError();

    logError(error, { operation: 'submit' }, logger);

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe(40);
    expect(lines[0].msg).toBe('Worker is closed');
    expect(lines[0].category).toBe('LIFECYCLE');
    expect(lines[0].operation).toBe('submit');
    expect(lines[0].errorId).toBe(error.errorId);
  });

  it('should log other errors at error', () => {
    const { logger, lines } = memoryLogger();

    logError(new Error('boom'), {}, logger);

    expect(lines[0].level).toBe(50);
    expect(lines[0].category).toBe('REMOTE');
    expect(lines[0].errorId).toBeUndefined();
  });

  it('should accept values that are not errors', () => {
    const { logger, lines } = memoryLogger();

    logError('plain', { step: 2 }, logger);

    expect(lines[0].msg).toBe('plain');
    expect(lines[0].err).toBeUndefined();
    expect(lines[0].step).toBe(2);
  });
});
