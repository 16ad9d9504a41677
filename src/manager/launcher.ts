/**
 * Worker launchers.
 *
 * - ForkLauncher: a child Node.js process over an `advanced` IPC channel
 * - InProcessLauncher: the worker loop on this process's event loop, over an
 *   in-memory link; the class is taken from the RemoteType directly
 */

import { fork } from 'child_process';
import { extname } from 'path';
import { fileURLToPath } from 'url';
import type { Logger } from 'pino';
import { childLink, type FrameLink } from '../transport/link.js';
import { createMemoryLinkPair } from '../transport/memory-link.js';
import { runWorker } from '../worker/runtime.js';
import { createLogger } from '../utils/logger.js';
import { logError } from '../utils/error-handler.js';
import type { RemoteClass } from '../remote/remote-type.js';

export type ExitListener = (exitCode: number | null, signal: NodeJS.Signals | null) => void;

/**
 * A running worker as seen by the Manager.
 */
export interface WorkerProcess {
  readonly pid: number | undefined;
  readonly link: FrameLink;
  /** Called once, after the worker has gone and its channel is drained */
  onExit(listener: ExitListener): void;
  /** Stop the worker without waiting for it */
  kill(): void;
}

/**
 * What a worker constructs: the class itself, and where the worker can
 * import it from.
 */
export interface WorkerTarget {
  readonly module: string;
  readonly exportName: string;
  readonly ctor: RemoteClass;
}

export interface LaunchOptions {
  target: WorkerTarget;
  /** Extra Node.js flags for a forked worker */
  execArgv: string[];
}

export interface WorkerLauncher {
  launch(options: LaunchOptions): WorkerProcess;
}

/**
 * Location of the worker entry point, next to this build's sources.
 * Running from TypeScript sources, the child needs the tsx loader too.
 */
function resolveWorkerEntry(): { path: string; execArgv: string[] } {
  const extension = extname(fileURLToPath(import.meta.url));
  const path = fileURLToPath(new URL(`../worker/worker-entry${extension}`, import.meta.url));
  return { path, execArgv: extension === '.ts' ? ['--import', 'tsx'] : [] };
}

export class ForkLauncher implements WorkerLauncher {
  private readonly logger: Logger = createLogger('ForkLauncher');

  launch(options: LaunchOptions): WorkerProcess {
    const entry = resolveWorkerEntry();
    const child = fork(entry.path, [], {
      serialization: 'advanced',
      execArgv: [...entry.execArgv, ...options.execArgv],
      stdio: ['inherit', 'inherit', 'inherit', 'ipc'],
    });
    this.logger.debug({ pid: child.pid, target: options.target.exportName }, 'Worker forked');

    child.on('error', (error) => logError(error, { pid: child.pid }, this.logger));

    return {
      pid: child.pid,
      link: childLink(child),
      onExit(listener) {
        child.once('close', (code, signal) => listener(code, signal));
      },
      kill() {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGKILL');
        }
      },
    };
  }
}

export class InProcessLauncher implements WorkerLauncher {
  private readonly logger: Logger = createLogger('InProcessLauncher');

  launch(options: LaunchOptions): WorkerProcess {
    const [controllerEnd, workerEnd] = createMemoryLinkPair();
    const listeners: ExitListener[] = [];
    let exit: { code: number | null; signal: NodeJS.Signals | null } | undefined;

    const emitExit = (code: number | null, signal: NodeJS.Signals | null): void => {
      if (exit) return;
      exit = { code, signal };
      // after any frames still being delivered
      setImmediate(() => {
        for (const listener of listeners) listener(code, signal);
      });
    };

    const { ctor } = options.target;
    runWorker(workerEnd, { resolveConstructor: async () => ctor }).then(
      () => emitExit(0, null),
      (error: unknown) => {
        logError(error, { target: options.target.exportName }, this.logger);
        emitExit(1, null);
      }
    );

    return {
      pid: process.pid,
      link: controllerEnd,
      onExit(listener) {
        if (exit) {
          const { code, signal } = exit;
          setImmediate(() => listener(code, signal));
          return;
        }
        listeners.push(listener);
      },
      kill() {
        workerEnd.disconnect();
        emitExit(null, 'SIGKILL');
      },
    };
  }
}
