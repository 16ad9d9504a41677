/**
 * procbridge - run an object in a child process and call it as if it were
 * local.
 *
 * ```typescript
 * import { Config, defineRemoteType } from 'procbridge';
 *
 * export class Sample {
 *   constructor(readonly name: string) {}
 *   greet(who: string) { return `${this.name} greets ${who}`; }
 * }
 * export const SampleType = defineRemoteType(Sample, { module: import.meta.url });
 *
 * await Config.initLogging();
 * await SampleType.spawn('worker').use(async (sample) => {
 *   console.log(await sample.greet('you'));
 * });
 * ```
 */

export { defineRemoteType, collectMethodNames, spawn, isHandleMember, HANDLE_MEMBERS } from './remote/index.js';
export type {
  RemoteClass,
  RemoteType,
  RemoteTypeOptions,
  RemoteHandle,
  RemoteMembers,
  HandleCore,
  HandleSummary,
  SpawnOptions,
} from './remote/index.js';

export { Manager, PendingCall, ForkLauncher, InProcessLauncher } from './manager/index.js';
export type { ManagerOptions, CallState, WorkerLauncher, WorkerProcess, WorkerTarget, LaunchOptions } from './manager/index.js';

export { EventLoopScheduler, OneShotSignal } from './lifecycle/index.js';
export type { Scheduler, TimerHandle } from './lifecycle/index.js';

export { Config, resolveConfig } from './config/index.js';
export type { ProcBridgeConfig, ResolvedConfig, SpawnConfig } from './config/index.js';

export {
  ErrorCategory,
  ProcBridgeError,
  TransmissionError,
  WorkerClosedError,
  WorkerFaultError,
  CancellationError,
  CloseTimeoutError,
  BootstrapError,
  ProtocolError,
  RemoteError,
} from './utils/errors.js';
export { serializeError, deserializeError, type SerializedError } from './utils/error-handler.js';
export { createLogger, initLogger, setLogLevel } from './utils/logger.js';
