export { Manager, type ManagerOptions } from './manager.js';
export { PendingCall, type CallState } from './pending-call.js';
export { PendingCallQueue } from './pending-queue.js';
export { Reconciler, type ReconcilerOptions } from './reconciler.js';
export {
  ForkLauncher,
  InProcessLauncher,
  type WorkerLauncher,
  type WorkerProcess,
  type LaunchOptions,
  type WorkerTarget,
  type ExitListener,
} from './launcher.js';
