/**
 * FIFO of received frames with a bounded wait.
 */
export class Inbox<T> {
  private items: T[] = [];
  private waiters = new Set<(ready: boolean) => void>();

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
    this.notify(true);
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  /**
   * Wait until an item is queued, the timeout elapses or wake() is called.
   *
   * @returns whether an item is available
   */
  wait(timeoutMs: number): Promise<boolean> {
    if (this.items.length > 0) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => settle(false), timeoutMs);
      // the channel, not the poll, keeps the process alive
      timer.unref();

      const settle = (ready: boolean): void => {
        clearTimeout(timer);
        this.waiters.delete(settle);
        resolve(ready);
      };
      this.waiters.add(settle);
    });
  }

  /**
   * Release every waiter now, reporting whether anything is queued.
   */
  wake(): void {
    this.notify(this.items.length > 0);
  }

  private notify(ready: boolean): void {
    for (const waiter of [...this.waiters]) {
      waiter(ready);
    }
  }
}
