/**
 * Tests for PendingCall and PendingCallQueue.
 */

import { describe, it, expect, vi } from 'vitest';
import { PendingCall } from './pending-call.js';
import { PendingCallQueue } from './pending-queue.js';
import { CancellationError } from '../utils/errors.js';

describe('PendingCall', () => {
  it('should start pending', () => {
    const call = new PendingCall<number>('increment');

    expect(call.operation).toBe('increment');
    expect(call.state).toBe('pending');
    expect(call.done).toBe(false);
  });

  it('should hand out increasing ids', () => {
    const first = new PendingCall('a');
    const second = new PendingCall('b');

    expect(second.id).toBeGreaterThan(first.id);
  });

  it('should resolve for await', async () => {
    const call = new PendingCall<number>('increment');

    call.resolve(3);

    expect(call.state).toBe('fulfilled');
    expect(call.done).toBe(true);
    await expect(call).resolves.toBe(3);
  });

  it('should reach subscribers that came before settlement', async () => {
    const call = new PendingCall<string>('greet');
    const result = call.then((value) => value.toUpperCase());

    call.resolve('hi');

    await expect(result).resolves.toBe('HI');
  });

  it('should reject for await', async () => {
    const call = new PendingCall('fail');
    const error = new RangeError('too big');

    call.reject(error);

    expect(call.state).toBe('rejected');
    await expect(call).rejects.toBe(error);
  });

  it('should expose the rejection reason only once rejected', () => {
    const error = new Error('refused');
    const rejected = PendingCall.rejected('store', error);
    const resolved = new PendingCall<number>('count');
    resolved.resolve(1);

    expect(rejected.reason).toBe(error);
    expect(resolved.reason).toBeUndefined();
    expect(new PendingCall('pending').reason).toBeUndefined();
  });

  it('should settle only once', async () => {
    const call = new PendingCall<number>('increment');

    expect(call.resolve(1)).toBe(true);
    expect(call.resolve(2)).toBe(false);
    expect(call.reject(new Error('late'))).toBe(false);

    await expect(call).resolves.toBe(1);
  });

  it('should support catch and finally', async () => {
    const call = new PendingCall('fail');
    const onFinally = vi.fn();
    call.reject(new Error('boom'));

    const recovered = await call.catch((error: unknown) => (error instanceof Error ? error.message : 'unknown'));
    await call.finally(onFinally).catch(() => undefined);

    expect(recovered).toBe('boom');
    expect(onFinally).toHaveBeenCalledTimes(1);
  });

  it('should not raise an unhandled rejection when nobody listens', async () => {
    const unhandled = vi.fn();
    process.on('unhandledRejection', unhandled);
    try {
      PendingCall.rejected('ignored', new Error('nobody cares'));
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(unhandled).not.toHaveBeenCalled();
    } finally {
      process.off('unhandledRejection', unhandled);
    }
  });

  it('should build calls that are already rejected', async () => {
    const error = new Error('not sent');

    const call = PendingCall.rejected('store', error);

    expect(call.state).toBe('rejected');
    await expect(call).rejects.toBe(error);
  });

  it('should refuse cancellation without changing state', async () => {
    const call = new PendingCall<number>('increment');

    expect(() => call.cancel()).toThrow(CancellationError);
    expect(() => call.cancel()).toThrow("Call 'increment' cannot be cancelled");
    expect(call.state).toBe('pending');

    call.resolve(5);
    expect(() => call.cancel()).toThrow(CancellationError);
    await expect(call).resolves.toBe(5);
  });
});

describe('PendingCallQueue', () => {
  it('should be first in, first out', () => {
    const queue = new PendingCallQueue();
    const calls = [new PendingCall('a'), new PendingCall('b'), new PendingCall('c')];
    for (const call of calls) queue.push(call);

    expect(queue.size).toBe(3);
    expect(queue.shift()).toBe(calls[0]);
    expect(queue.shift()).toBe(calls[1]);
    expect(queue.size).toBe(1);
  });

  it('should return undefined when empty', () => {
    const queue = new PendingCallQueue();

    expect(queue.isEmpty).toBe(true);
    expect(queue.shift()).toBeUndefined();
  });

  it('should drain everything in order', () => {
    const queue = new PendingCallQueue();
    const first = new PendingCall('a');
    const second = new PendingCall('b');
    queue.push(first);
    queue.push(second);

    expect(queue.drain()).toEqual([first, second]);
    expect(queue.isEmpty).toBe(true);
  });
});
