/**
 * PendingCall - the caller's view of one request in flight.
 *
 * Promise-like, but the underlying promise is only created when someone
 * subscribes, so a call that is rejected and never awaited does not raise
 * an unhandled rejection.
 *
 * ```typescript
 * const call = handle.increment(2);
 * call.state;        // 'pending'
 * await call;        // 3
 * call.cancel();     // throws CancellationError
 * ```
 */

import { CancellationError } from '../utils/errors.js';

export type CallState = 'pending' | 'fulfilled' | 'rejected';

type Outcome<T> = { ok: true; value: T } | { ok: false; reason: unknown };

let nextCallId = 1;

export class PendingCall<T = unknown> implements PromiseLike<T> {
  readonly id = nextCallId++;
  private outcome?: Outcome<T>;
  private readonly listeners: Array<() => void> = [];

  constructor(readonly operation: string) {}

  /**
   * A call that failed before it was sent.
   */
  static rejected<T = unknown>(operation: string, reason: unknown): PendingCall<T> {
    const call = new PendingCall<T>(operation);
    call.reject(reason);
    return call;
  }

  get state(): CallState {
    if (!this.outcome) return 'pending';
    return this.outcome.ok ? 'fulfilled' : 'rejected';
  }

  /** Rejection reason once rejected, otherwise undefined */
  get reason(): unknown {
    return this.outcome && !this.outcome.ok ? this.outcome.reason : undefined;
  }

  get done(): boolean {
    return this.outcome !== undefined;
  }

  /**
   * @returns false if the call was already settled
   */
  resolve(value: T): boolean {
    return this.settle({ ok: true, value });
  }

  /**
   * @returns false if the call was already settled
   */
  reject(reason: unknown): boolean {
    return this.settle({ ok: false, reason });
  }

  /**
   * Requests cannot be withdrawn once sent.
   *
   * @throws CancellationError always
   */
  cancel(): never {
    throw new CancellationError(`Call '${this.operation}'`);
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }

  catch<TResult = never>(
    onrejected?: ((reason: unknown) => TResult | PromiseLike<TResult>) | null
  ): Promise<T | TResult> {
    return this.toPromise().catch(onrejected);
  }

  finally(onfinally?: (() => void) | null): Promise<T> {
    return this.toPromise().finally(onfinally);
  }

  private toPromise(): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const deliver = (): void => {
        const outcome = this.outcome;
        if (!outcome) return;
        if (outcome.ok) resolve(outcome.value);
        else reject(outcome.reason);
      };
      if (this.outcome) deliver();
      else this.listeners.push(deliver);
    });
  }

  private settle(outcome: Outcome<T>): boolean {
    if (this.outcome) return false;
    this.outcome = outcome;
    for (const listener of this.listeners.splice(0)) listener();
    return true;
  }
}
