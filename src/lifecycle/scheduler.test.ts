/**
 * Tests for EventLoopScheduler.
 */

import { describe, it, expect, vi } from 'vitest';
import { EventLoopScheduler } from './scheduler.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('EventLoopScheduler', () => {
  it('should never run callSoon callbacks inline', async () => {
    const scheduler = new EventLoopScheduler();
    const callback = vi.fn();

    scheduler.callSoon(callback);
    expect(callback).not.toHaveBeenCalled();
    await tick();

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should run thread-safe callbacks in submission order', async () => {
    const scheduler = new EventLoopScheduler();
    const order: number[] = [];

    scheduler.callSoonThreadsafe(() => order.push(1));
    scheduler.callSoon(() => order.push(2));
    scheduler.callSoonThreadsafe(() => order.push(3));
    await tick();

    expect(order).toEqual([1, 2, 3]);
  });

  it('should keep running after a callback throws', async () => {
    const scheduler = new EventLoopScheduler();
    const after = vi.fn();

    scheduler.callSoonThreadsafe(() => {
      throw new Error('callback failed');
    });
    scheduler.callSoonThreadsafe(after);
    await tick();

    expect(after).toHaveBeenCalledTimes(1);
  });

  it('should run callLater after the delay', () => {
    vi.useFakeTimers();
    try {
      const scheduler = new EventLoopScheduler();
      const callback = vi.fn();

      scheduler.callLater(100, callback);
      vi.advanceTimersByTime(99);
      expect(callback).not.toHaveBeenCalled();
      vi.advanceTimersByTime(1);

      expect(callback).toHaveBeenCalledTimes(1);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should let a timer be cancelled', () => {
    vi.useFakeTimers();
    try {
      const scheduler = new EventLoopScheduler();
      const callback = vi.fn();

      const timer = scheduler.callLater(100, callback);
      timer.cancel();
      vi.advanceTimersByTime(200);

      expect(callback).not.toHaveBeenCalled();
    } finally {
      vi.useRealTimers();
    }
  });
});
