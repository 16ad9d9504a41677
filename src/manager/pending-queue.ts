import type { PendingCall } from './pending-call.js';

/**
 * FIFO of calls awaiting a reply. Replies arrive in request order, so the
 * head is always the call the next reply belongs to.
 */
export class PendingCallQueue {
  private calls: PendingCall[] = [];

  get size(): number {
    return this.calls.length;
  }

  get isEmpty(): boolean {
    return this.calls.length === 0;
  }

  push(call: PendingCall): void {
    this.calls.push(call);
  }

  shift(): PendingCall | undefined {
    return this.calls.shift();
  }

  /**
   * Remove and return every queued call, oldest first.
   */
  drain(): PendingCall[] {
    const calls = this.calls;
    this.calls = [];
    return calls;
  }
}
