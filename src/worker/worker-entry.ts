/**
 * Entry point of a forked worker process.
 */

import { Config } from '../config/index.js';
import { parentLink } from '../transport/link.js';
import { createLogger, flushLogger } from '../utils/logger.js';
import { logError } from '../utils/error-handler.js';
import { runWorker } from './runtime.js';

async function main(): Promise<void> {
  await Config.initLogging({ role: 'worker' });

  await runWorker(parentLink());
  createLogger('WorkerEntry', { pid: process.pid }).debug('Worker exiting');
}

main()
  .catch((error: unknown) => {
    logError(error, { operation: 'runWorker', pid: process.pid });
    process.exitCode = 1;
  })
  .finally(async () => {
    await flushLogger();
    // timers or sockets left open by the instance must not keep the worker alive
    process.exit();
  });
