import { defineRemoteType } from '../remote/remote-type.js';

/**
 * Holds an interval for its whole life, so its process never goes idle.
 */
export class Ticker {
  ticks = 0;

  constructor(intervalMs = 10) {
    setInterval(() => {
      this.ticks++;
    }, intervalMs);
  }

  getPid(): number {
    return process.pid;
  }
}

export const TickerType = defineRemoteType(Ticker, { module: import.meta.url });
