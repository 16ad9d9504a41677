/**
 * Reconciler - matches worker replies to pending calls.
 *
 * Runs as an async loop on the controller: wait for replies, pop one queued
 * call per reply, and hand the settlement to the scheduler. Stops once the
 * worker is closed and every reply it sent has been consumed; whatever is
 * still queued at that point can no longer be answered and is rejected.
 */

import type { Logger } from 'pino';
import type { OneShotSignal } from '../lifecycle/signal.js';
import type { Scheduler } from '../lifecycle/scheduler.js';
import type { CallReply, ControllerFrame } from '../transport/frames.js';
import type { Received, Transport } from '../transport/transport.js';
import { createLogger } from '../utils/logger.js';
import { ProtocolError, WorkerClosedError } from '../utils/errors.js';
import { deserializeError, logError } from '../utils/error-handler.js';
import type { PendingCall } from './pending-call.js';
import type { PendingCallQueue } from './pending-queue.js';

export interface ReconcilerOptions {
  transport: Transport<ControllerFrame, CallReply>;
  queue: PendingCallQueue;
  scheduler: Scheduler;
  workerClosed: OneShotSignal;
  pollTimeoutMs: number;
}

export class Reconciler {
  private readonly logger: Logger;
  private stopped = false;
  private running?: Promise<void>;
  private failure?: () => Error;

  constructor(private readonly options: ReconcilerOptions) {
    this.logger = createLogger('Reconciler');
    options.workerClosed.onSet(() => options.transport.wake());
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Resolves once the loop has exited and every settlement it scheduled has
   * run.
   */
  get done(): Promise<void> {
    return this.running ?? Promise.resolve();
  }

  start(): void {
    if (this.running) return;
    this.running = this.loop().catch((error: unknown) => {
      logError(error, { operation: 'reconcile' }, this.logger);
      this.stopped = true;
      this.rejectRemaining();
    });
  }

  /**
   * Set the error that calls left in the queue are rejected with.
   * Defaults to WorkerClosedError.
   */
  fail(createError: () => Error): void {
    this.failure ??= createError;
  }

  private async loop(): Promise<void> {
    const { transport, workerClosed, pollTimeoutMs } = this.options;

    while (!this.stopped) {
      this.drain();
      if (this.stopped) break;
      if (workerClosed.isSet && transport.pending === 0) break;
      await transport.poll(pollTimeoutMs);
    }

    this.stopped = true;
    this.rejectRemaining();
    await new Promise<void>((resolve) => this.options.scheduler.callSoonThreadsafe(resolve));
    this.logger.debug('Reconciler stopped');
  }

  private drain(): void {
    const { transport, queue, scheduler } = this.options;

    for (let reply = transport.tryReceive(); reply !== undefined; reply = transport.tryReceive()) {
      const call = queue.shift();
      if (!call) {
        const error = new ProtocolError('Received a reply with no call waiting for it');
        logError(error, { replyKind: reply.kind }, this.logger);
        this.failure ??= () => new ProtocolError('Replies can no longer be matched to calls');
        this.stopped = true;
        return;
      }
      scheduler.callSoonThreadsafe(() => settle(call, reply));
    }
  }

  private rejectRemaining(): void {
    const remaining = this.options.queue.drain();
    if (remaining.length === 0) return;

    const createError = this.failure ?? (() => new WorkerClosedError('Worker closed before answering'));
    this.logger.debug({ count: remaining.length }, 'Rejecting unanswered calls');
    for (const call of remaining) {
      this.options.scheduler.callSoonThreadsafe(() => call.reject(createError()));
    }
  }
}

function settle(call: PendingCall, reply: Received<CallReply>): void {
  if (reply.kind === 'invalid') {
    call.reject(reply.error);
  } else if (reply.ok) {
    call.resolve(reply.value);
  } else {
    call.reject(deserializeError(reply.error));
  }
}
