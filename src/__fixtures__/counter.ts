import { defineRemoteType } from '../remote/remote-type.js';

export class Counter {
  count: number;

  constructor(start = 0) {
    this.count = start;
  }

  get doubled(): number {
    return this.count * 2;
  }

  increment(by = 1): number {
    this.count += by;
    return this.count;
  }

  async incrementLater(by: number, delayMs: number): Promise<number> {
    await new Promise((resolve) => setTimeout(resolve, delayMs));
    return this.increment(by);
  }

  reset(): void {
    this.count = 0;
  }
}

export const CounterType = defineRemoteType(Counter, { module: import.meta.url });
