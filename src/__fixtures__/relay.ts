import { InProcessLauncher } from '../manager/launcher.js';
import { defineRemoteType } from '../remote/remote-type.js';
import { spawn } from '../remote/spawn.js';
import { CounterType } from './counter.js';

/**
 * Spawns a worker of its own from inside a worker.
 */
export class Relay {
  async countFrom(start: number, steps: number): Promise<number> {
    const counter = spawn(CounterType, [start], { launcher: new InProcessLauncher() });
    return counter.use(async (inner) => {
      await inner.ready();
      let last = start;
      for (let step = 0; step < steps; step++) {
        last = await inner.increment();
      }
      return last;
    });
  }
}

export const RelayType = defineRemoteType(Relay, { module: import.meta.url });
