/**
 * Tests for Reconciler.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createMemoryLinkPair } from '../transport/memory-link.js';
import { Transport } from '../transport/transport.js';
import {
  callReplySchema,
  workerInboundSchema,
  type CallReply,
  type ControllerFrame,
  type WorkerFrame,
  type WorkerInbound,
} from '../transport/frames.js';
import type { FrameLink } from '../transport/link.js';
import { OneShotSignal } from '../lifecycle/signal.js';
import { EventLoopScheduler, type Scheduler } from '../lifecycle/scheduler.js';
import { ProtocolError, RemoteError, WorkerClosedError, WorkerFaultError } from '../utils/errors.js';
import { PendingCall } from './pending-call.js';
import { PendingCallQueue } from './pending-queue.js';
import { Reconciler } from './reconciler.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

async function waitFor(predicate: () => boolean): Promise<void> {
  for (let attempt = 0; attempt < 200 && !predicate(); attempt++) {
    await tick();
  }
  expect(predicate()).toBe(true);
}

/** Scheduler that holds callbacks until the test runs them. */
class ManualScheduler implements Scheduler {
  readonly queued: Array<() => void> = [];

  callSoon(callback: () => void): void {
    this.queued.push(callback);
  }

  callSoonThreadsafe(callback: () => void): void {
    this.queued.push(callback);
  }

  callLater(): { cancel(): void } {
    return { cancel: () => {} };
  }

  runAll(): void {
    for (const callback of this.queued.splice(0)) callback();
  }
}

describe('Reconciler', () => {
  let workerLink: FrameLink;
  let worker: Transport<WorkerFrame, WorkerInbound>;
  let controller: Transport<ControllerFrame, CallReply>;
  let queue: PendingCallQueue;
  let workerClosed: OneShotSignal;

  const reply = (value: unknown): CallReply => ({ kind: 'reply', ok: true, value });

  beforeEach(() => {
    const [controllerEnd, workerEnd] = createMemoryLinkPair();
    workerLink = workerEnd;
    controller = new Transport<ControllerFrame, CallReply>(controllerEnd, callReplySchema, 'controller');
    worker = new Transport<WorkerFrame, WorkerInbound>(workerEnd, workerInboundSchema, 'worker');
    queue = new PendingCallQueue();
    workerClosed = new OneShotSignal('worker-closed');
  });

  afterEach(() => {
    workerClosed.set();
  });

  function start(scheduler: Scheduler = new EventLoopScheduler()): Reconciler {
    const reconciler = new Reconciler({ transport: controller, queue, scheduler, workerClosed, pollTimeoutMs: 20 });
    reconciler.start();
    return reconciler;
  }

  it('should settle calls in reply order', async () => {
    const first = new PendingCall<number>('increment');
    const second = new PendingCall('fail');
    const third = new PendingCall<string>('name');
    queue.push(first);
    queue.push(second);
    queue.push(third);
    start();

    worker.send(reply(1));
    worker.send({ kind: 'reply', ok: false, error: { name: 'RangeError', message: 'too big' } });
    worker.send(reply('counter'));

    await expect(first).resolves.toBe(1);
    await expect(second).rejects.toBeInstanceOf(RangeError);
    await expect(third).resolves.toBe('counter');
    expect(queue.isEmpty).toBe(true);
  });

  it('should rebuild unknown error classes as RemoteError', async () => {
    const call = new PendingCall('audit');
    queue.push(call);
    start();

    worker.send({ kind: 'reply', ok: false, error: { name: 'LedgerError', message: 'unbalanced' } });

    const error: unknown = await call.catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(RemoteError);
    expect(error instanceof Error && error.name).toBe('LedgerError');
  });

  it('should settle through the scheduler, never inline', async () => {
    const scheduler = new ManualScheduler();
    const call = new PendingCall<number>('increment');
    queue.push(call);
    start(scheduler);

    worker.send(reply(7));
    await waitFor(() => scheduler.queued.length === 1);

    expect(queue.isEmpty).toBe(true);
    expect(call.state).toBe('pending');
    scheduler.runAll();
    expect(call.state).toBe('fulfilled');
    await expect(call).resolves.toBe(7);
  });

  it('should reject calls left over once the worker has closed', async () => {
    const answered = new PendingCall<number>('increment');
    const orphaned = new PendingCall<number>('increment');
    queue.push(answered);
    queue.push(orphaned);
    const reconciler = start();

    worker.send(reply(1));
    await worker.flush();
    workerClosed.set();
    await reconciler.done;

    expect(answered.state).toBe('fulfilled');
    expect(orphaned.state).toBe('rejected');
    await expect(orphaned).rejects.toBeInstanceOf(WorkerClosedError);
    expect(reconciler.isStopped).toBe(true);
  });

  it('should reject leftovers with the error given to fail()', async () => {
    const call = new PendingCall('slow');
    queue.push(call);
    const reconciler = start();

    reconciler.fail(() => new WorkerFaultError(null, 'SIGKILL'));
    reconciler.fail(() => new WorkerClosedError());
    workerClosed.set();
    await reconciler.done;

    await expect(call).rejects.toBeInstanceOf(WorkerFaultError);
  });

  it('should drain replies already received before stopping', async () => {
    const call = new PendingCall<number>('increment');
    queue.push(call);

    worker.send(reply(3));
    await worker.flush();
    workerClosed.set();
    const reconciler = start();
    await reconciler.done;

    await expect(call).resolves.toBe(3);
  });

  it('should reject the head call when a reply is malformed', async () => {
    const call = new PendingCall('increment');
    queue.push(call);
    start();

    workerLink.send({ kind: 'reply', value: 1 }, () => {});

    await expect(call).rejects.toBeInstanceOf(ProtocolError);
  });

  it('should stop on a reply nobody is waiting for', async () => {
    const reconciler = start();

    worker.send(reply('unexpected'));
    await waitFor(() => reconciler.isStopped);
    await reconciler.done;

    const late = new PendingCall('late');
    queue.push(late);
    await tick();
    expect(late.state).toBe('pending');
  });

  it('should start only once', async () => {
    const scheduler = new EventLoopScheduler();
    const spy = vi.spyOn(scheduler, 'callSoonThreadsafe');
    const call = new PendingCall<number>('increment');
    queue.push(call);
    const reconciler = start(scheduler);
    reconciler.start();

    worker.send(reply(1));
    await expect(call).resolves.toBe(1);

    expect(spy).toHaveBeenCalledTimes(1);
  });
});
