/**
 * spawn - start a worker for a RemoteType and return its handle.
 */

import { EventLoopScheduler } from '../lifecycle/scheduler.js';
import { Manager, type ManagerOptions } from '../manager/manager.js';
import { createHandle, type RemoteHandle } from './handle.js';
import type { RemoteClass, RemoteType } from './remote-type.js';

export type SpawnOptions = Partial<ManagerOptions>;

// a handle dropped without close() still lets its worker go
const unreachableHandles = new FinalizationRegistry<Manager>((manager) => manager.dispose());

export function spawn<C extends RemoteClass>(
  type: RemoteType<C>,
  args: ConstructorParameters<C>,
  options: SpawnOptions = {}
): RemoteHandle<InstanceType<C>> {
  const manager = new Manager(type, args, {
    scheduler: options.scheduler ?? new EventLoopScheduler(),
    launcher: options.launcher,
    config: options.config,
  });
  const handle = createHandle<InstanceType<C>>(manager, type);
  unreachableHandles.register(handle, manager);
  return handle;
}
