export { WorkerLoop, dispatch, type InstanceFactory } from './worker-loop.js';
export { runWorker, importConstructor, type ConstructorResolver, type RuntimeOptions } from './runtime.js';
