/**
 * Schedulers decide where settlement callbacks run.
 *
 * The Reconciler never settles a call inline; it hands the settlement to
 * the scheduler the Manager was given. A caller that owns its own execution
 * context can supply a Scheduler that forwards work there.
 */

import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { logError } from '../utils/error-handler.js';

export interface TimerHandle {
  cancel(): void;
}

export interface Scheduler {
  /** Run `callback` on a later turn of this scheduler's loop */
  callSoon(callback: () => void): void;

  /**
   * Same as callSoon, but safe to call from outside the scheduler's own
   * context.
   */
  callSoonThreadsafe(callback: () => void): void;

  /** Run `callback` after `delayMs` */
  callLater(delayMs: number, callback: () => void): TimerHandle;
}

/**
 * Scheduler backed by the Node.js event loop.
 */
export class EventLoopScheduler implements Scheduler {
  private readonly logger: Logger = createLogger('Scheduler');

  callSoon(callback: () => void): void {
    setImmediate(() => this.run(callback));
  }

  callSoonThreadsafe(callback: () => void): void {
    // one thread per process: the event loop queue is already the hand-off point
    setImmediate(() => this.run(callback));
  }

  callLater(delayMs: number, callback: () => void): TimerHandle {
    const timer = setTimeout(() => this.run(callback), delayMs);
    return { cancel: () => clearTimeout(timer) };
  }

  private run(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      logError(error, { operation: 'scheduledCallback' }, this.logger);
    }
  }
}
