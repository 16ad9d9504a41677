/**
 * OneShotSignal - a flag that goes from unset to set exactly once.
 *
 * Used for the two lifecycle transitions on each side of the bridge:
 * *close requested* (controller to worker) and *worker closed* (worker to
 * controller).
 */
export class OneShotSignal {
  private fired = false;
  private readonly listeners: Array<() => void> = [];

  constructor(readonly name: string) {}

  get isSet(): boolean {
    return this.fired;
  }

  /**
   * Set the signal. Later calls are no-ops.
   *
   * @returns true if this call performed the transition
   */
  set(): boolean {
    if (this.fired) return false;
    this.fired = true;
    for (const listener of this.listeners.splice(0)) listener();
    return true;
  }

  /**
   * Run `listener` once the signal is set; immediately if it already is.
   */
  onSet(listener: () => void): void {
    if (this.fired) {
      listener();
      return;
    }
    this.listeners.push(listener);
  }

  /**
   * Wait for the signal.
   *
   * @param timeoutMs - Give up after this long; wait indefinitely when omitted
   * @returns whether the signal is set
   */
  wait(timeoutMs?: number): Promise<boolean> {
    if (this.fired) return Promise.resolve(true);

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => resolve(this.fired), timeoutMs);
      }
      this.listeners.push(() => {
        if (timer) clearTimeout(timer);
        resolve(true);
      });
    });
  }
}
