/**
 * Tests for OneShotSignal.
 */

import { describe, it, expect, vi } from 'vitest';
import { OneShotSignal } from './signal.js';

describe('OneShotSignal', () => {
  it('should start unset', () => {
    const signal = new OneShotSignal('close-requested');

    expect(signal.isSet).toBe(false);
    expect(signal.name).toBe('close-requested');
  });

  it('should report which call performed the transition', () => {
    const signal = new OneShotSignal('worker-closed');

    expect(signal.set()).toBe(true);
    expect(signal.set()).toBe(false);
    expect(signal.isSet).toBe(true);
  });

  it('should run listeners once', () => {
    const signal = new OneShotSignal('worker-closed');
    const listener = vi.fn();
    signal.onSet(listener);

    signal.set();
    signal.set();

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should run late listeners immediately', () => {
    const signal = new OneShotSignal('worker-closed');
    signal.set();
    const listener = vi.fn();

    signal.onSet(listener);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should resolve wait() when set', async () => {
    const signal = new OneShotSignal('close-requested');
    const waiting = signal.wait(10_000);

    signal.set();

    await expect(waiting).resolves.toBe(true);
  });

  it('should resolve wait() at once when already set', async () => {
    const signal = new OneShotSignal('close-requested');
    signal.set();

    await expect(signal.wait(0)).resolves.toBe(true);
  });

  it('should resolve wait() with false on timeout', async () => {
    const signal = new OneShotSignal('close-requested');

    await expect(signal.wait(5)).resolves.toBe(false);
    expect(signal.isSet).toBe(false);
  });
});
