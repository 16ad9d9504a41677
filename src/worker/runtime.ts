/**
 * Worker runtime: the bootstrap handshake and the loop around it.
 *
 * The controller's first frame names the class to construct and the
 * settings to run with. Whatever goes wrong before the instance exists is
 * reported as the construction outcome, so the controller always gets its
 * first reply.
 */

import { pathToFileURL } from 'url';
import { isAbsolute } from 'path';
import { WORKER_LOOP } from '../config/constants.js';
import { OneShotSignal } from '../lifecycle/signal.js';
import { workerInboundSchema, type WorkerFrame, type WorkerInbound, type WorkerSettings } from '../transport/frames.js';
import type { FrameLink } from '../transport/link.js';
import { Transport } from '../transport/transport.js';
import { createLogger } from '../utils/logger.js';
import { BootstrapError } from '../utils/errors.js';
import { WorkerLoop } from './worker-loop.js';

/**
 * Look up the exported class the controller asked for.
 */
export type ConstructorResolver = (module: string, exportName: string) => Promise<unknown>;

export interface RuntimeOptions {
  resolveConstructor?: ConstructorResolver;
}

const DEFAULT_SETTINGS: WorkerSettings = {
  pollTimeoutMs: WORKER_LOOP.POLL_TIMEOUT_MS,
  drainOnClose: WORKER_LOOP.DRAIN_ON_CLOSE,
};

/**
 * Import `exportName` from `module`, a file URL or absolute path.
 */
export const importConstructor: ConstructorResolver = async (module, exportName) => {
  const url = isAbsolute(module) ? pathToFileURL(module).href : module;
  const namespace: Record<string, unknown> = await import(url);
  if (!Object.hasOwn(namespace, exportName)) {
    throw new BootstrapError(`Module ${module} has no export named '${exportName}'`);
  }
  return namespace[exportName];
};

/**
 * Run one worker over `link` until it is closed.
 */
export async function runWorker(link: FrameLink, options: RuntimeOptions = {}): Promise<void> {
  const logger = createLogger('WorkerRuntime', { pid: process.pid });
  const resolveConstructor = options.resolveConstructor ?? importConstructor;
  const transport = new Transport<WorkerFrame, WorkerInbound>(link, workerInboundSchema, 'worker');
  const closeRequested = new OneShotSignal('close-requested');
  transport.onSignal((signal) => {
    if (signal === 'close-requested' && closeRequested.set()) {
      logger.debug('Close requested');
    }
  });

  const first = await transport.receive();
  const settings = first.kind === 'bootstrap' ? first.settings : DEFAULT_SETTINGS;
  const loop = new WorkerLoop(transport, closeRequested, settings);

  await loop.run(async () => {
    if (first.kind === 'invalid') {
      throw new BootstrapError('Invalid bootstrap frame', { cause: first.error });
    }
    if (first.kind !== 'bootstrap') {
      throw new BootstrapError(`Expected a bootstrap frame, received '${first.kind}'`);
    }

    const ctor = await resolveConstructor(first.module, first.exportName);
    if (typeof ctor !== 'function') {
      throw new BootstrapError(`Export '${first.exportName}' of ${first.module} is not a constructor`);
    }
    const instance: unknown = Reflect.construct(ctor, first.args);
    if (typeof instance !== 'object' || instance === null) {
      throw new BootstrapError(`Constructing '${first.exportName}' did not produce an object`);
    }
    return instance;
  });

  transport.close();
}
