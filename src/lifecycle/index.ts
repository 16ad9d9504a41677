export { OneShotSignal } from './signal.js';
export { EventLoopScheduler, type Scheduler, type TimerHandle } from './scheduler.js';
