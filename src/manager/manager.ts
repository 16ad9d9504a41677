/**
 * Manager - controller side of one worker.
 *
 * Owns the worker process, the transport to it, the queue of calls awaiting
 * replies and the Reconciler that settles them. The first queued call is
 * always the construction outcome.
 */

import type { Logger } from 'pino';
import { Config } from '../config/index.js';
import type { ResolvedConfig, SpawnConfig } from '../config/types.js';
import { OneShotSignal } from '../lifecycle/signal.js';
import type { Scheduler } from '../lifecycle/scheduler.js';
import { callReplySchema, type CallReply, type ControllerFrame } from '../transport/frames.js';
import { Transport } from '../transport/transport.js';
import { createLogger } from '../utils/logger.js';
import { CloseTimeoutError, WorkerClosedError, WorkerFaultError } from '../utils/errors.js';
import { logError } from '../utils/error-handler.js';
import { ForkLauncher, type WorkerLauncher, type WorkerProcess, type WorkerTarget } from './launcher.js';
import { PendingCall } from './pending-call.js';
import { PendingCallQueue } from './pending-queue.js';
import { Reconciler } from './reconciler.js';

export interface ManagerOptions {
  /** Where call settlements run */
  scheduler: Scheduler;
  /** How the worker is started; defaults to a forked child process */
  launcher?: WorkerLauncher;
  /** Overrides on top of the config file and environment */
  config?: SpawnConfig;
}

export class Manager {
  readonly closeRequested = new OneShotSignal('close-requested');
  readonly workerClosed = new OneShotSignal('worker-closed');
  /** Settles with `true` once the instance exists, or with the construction error */
  readonly construction: PendingCall<boolean>;

  private readonly config: ResolvedConfig;
  private readonly queue = new PendingCallQueue();
  private readonly worker: WorkerProcess;
  private readonly transport: Transport<ControllerFrame, CallReply>;
  private readonly reconciler: Reconciler;
  private readonly logger: Logger;
  private killed = false;

  constructor(type: WorkerTarget, args: readonly unknown[], options: ManagerOptions) {
    this.config = Config.resolve(options.config);
    this.construction = new PendingCall<boolean>('constructor');
    this.queue.push(this.construction);

    const launcher = options.launcher ?? new ForkLauncher();
    this.worker = launcher.launch({
      target: { module: type.module, exportName: type.exportName, ctor: type.ctor },
      execArgv: this.config.workerExecArgv,
    });
    this.logger = createLogger('Manager', { type: type.exportName, pid: this.worker.pid });

    this.transport = new Transport<ControllerFrame, CallReply>(this.worker.link, callReplySchema, 'controller');
    this.transport.onSignal((signal) => {
      if (signal === 'worker-closed' && this.workerClosed.set()) {
        this.logger.debug('Worker closed');
      }
    });
    this.worker.onExit((exitCode, signal) => this.handleExit(exitCode, signal));

    this.reconciler = new Reconciler({
      transport: this.transport,
      queue: this.queue,
      scheduler: options.scheduler,
      workerClosed: this.workerClosed,
      pollTimeoutMs: this.config.reconcilerPollTimeoutMs,
    });
    this.reconciler.start();

    try {
      this.transport.send({
        kind: 'bootstrap',
        module: type.module,
        exportName: type.exportName,
        args: [...args],
        settings: {
          pollTimeoutMs: this.config.workerPollTimeoutMs,
          drainOnClose: this.config.drainOnClose,
        },
      });
    } catch (error) {
      // the worker never learns what to build
      this.queue.shift();
      this.construction.reject(error);
      this.closeRequested.set();
      this.kill();
    }
  }

  get pid(): number | undefined {
    return this.worker.pid;
  }

  get isClosing(): boolean {
    return this.closeRequested.isSet;
  }

  get isClosed(): boolean {
    return this.workerClosed.isSet;
  }

  /** Calls sent and not yet answered, including the construction call */
  get pendingCount(): number {
    return this.queue.size;
  }

  /**
   * Send one call to the worker.
   *
   * Calls after close, and calls whose arguments cannot be transmitted, come
   * back already rejected and are never queued.
   */
  submit<R = unknown>(name: string, args: readonly unknown[] = [], kwargs: Record<string, unknown> = {}): PendingCall<R> {
    if (this.isClosing || this.isClosed || this.reconciler.isStopped) {
      return PendingCall.rejected<R>(name, new WorkerClosedError(`Cannot call '${name}': worker is closed`));
    }

    const call = new PendingCall<R>(name);
    try {
      this.transport.send({ kind: 'call', name, args: [...args], kwargs });
    } catch (error) {
      this.logger.debug({ operation: name, err: error }, 'Call not sent');
      return PendingCall.rejected<R>(name, error);
    }
    this.queue.push(call);
    return call;
  }

  /**
   * Ask the worker to stop.
   *
   * @param wait - Resolve only once the worker has closed and every call has settled
   * @param timeoutMs - With `wait`, kill the worker after this long
   * @throws CloseTimeoutError when the worker had to be killed
   */
  async requestClose(wait = false, timeoutMs = this.config.closeTimeoutMs): Promise<void> {
    if (this.closeRequested.set()) {
      this.logger.debug({ pending: this.queue.size }, 'Close requested');
      if (!this.workerClosed.isSet && this.transport.isConnected) {
        try {
          this.transport.sendSignal('close-requested');
        } catch (error) {
          logError(error, { operation: 'requestClose' }, this.logger);
        }
      }
    }
    if (!wait) return;

    const closed = await this.workerClosed.wait(timeoutMs);
    if (!closed) {
      this.kill();
      this.reconciler.fail(() => new WorkerClosedError('Worker was killed before answering'));
      this.workerClosed.set();
      await this.reconciler.done;
      throw new CloseTimeoutError(timeoutMs);
    }
    await this.reconciler.done;
    this.transport.close();
  }

  /**
   * Best-effort close that never throws.
   */
  dispose(): void {
    this.requestClose(false).catch((error: unknown) => logError(error, { operation: 'dispose' }, this.logger));
  }

  private kill(): void {
    this.killed = true;
    this.worker.kill();
  }

  private handleExit(exitCode: number | null, signal: NodeJS.Signals | null): void {
    this.logger.debug({ exitCode, signal }, 'Worker exited');
    if (this.workerClosed.isSet) return;

    if (this.killed) {
      this.reconciler.fail(() => new WorkerClosedError('Worker was killed before answering'));
    } else {
      logError(new WorkerFaultError(exitCode, signal), { pending: this.queue.size }, this.logger);
      this.reconciler.fail(() => new WorkerFaultError(exitCode, signal));
    }
    this.workerClosed.set();
  }
}
