/**
 * RemoteType - a class made spawnable in a worker process.
 *
 * ```typescript
 * export class Counter {
 *   constructor(private count = 0) {}
 *   increment(by = 1) { return (this.count += by); }
 * }
 * export const CounterType = defineRemoteType(Counter, { module: import.meta.url });
 *
 * const counter = CounterType.spawn(10);
 * await counter.ready();
 * await counter.increment(2); // 12
 * ```
 */

import { isAbsolute } from 'path';
import { pathToFileURL } from 'url';
import type { WorkerTarget } from '../manager/launcher.js';
import type { RemoteHandle } from './handle.js';
import { spawn, type SpawnOptions } from './spawn.js';

/** Any class a worker can construct */
export type RemoteClass = new (...args: never[]) => object;

export interface RemoteType<C extends RemoteClass = RemoteClass> extends WorkerTarget {
  readonly ctor: C;
  /** Names dispatched as method calls; every other name is an attribute */
  readonly methodNames: ReadonlySet<string>;
  /** Spawn a worker with this type's default options */
  spawn(...args: ConstructorParameters<C>): RemoteHandle<InstanceType<C>>;
}

export interface RemoteTypeOptions {
  /** File URL or absolute path of the module exporting the class, usually `import.meta.url` */
  module: string | URL;
  /** Export name of the class; defaults to the class name */
  exportName?: string;
  /** Method names, when the prototype does not tell the whole story */
  methodNames?: Iterable<string>;
  /** Options used by `type.spawn()` */
  spawnOptions?: SpawnOptions;
}

/**
 * Names of the methods on a class's prototype chain, inherited ones
 * included. `constructor` and accessors are left out.
 */
export function collectMethodNames(ctor: RemoteClass): Set<string> {
  const names = new Set<string>();
  let proto: unknown = ctor.prototype;

  while (typeof proto === 'object' && proto !== null && proto !== Object.prototype) {
    for (const key of Object.getOwnPropertyNames(proto)) {
      if (key === 'constructor') continue;
      const descriptor = Object.getOwnPropertyDescriptor(proto, key);
      if (descriptor && typeof descriptor.value === 'function') {
        names.add(key);
      }
    }
    proto = Reflect.getPrototypeOf(proto);
  }
  return names;
}

function toModuleUrl(module: string | URL): string {
  if (module instanceof URL) return module.href;
  return isAbsolute(module) ? pathToFileURL(module).href : module;
}

export function defineRemoteType<C extends RemoteClass>(ctor: C, options: RemoteTypeOptions): RemoteType<C> {
  const methodNames: ReadonlySet<string> = options.methodNames
    ? new Set(options.methodNames)
    : collectMethodNames(ctor);

  const type: RemoteType<C> = {
    ctor,
    module: toModuleUrl(options.module),
    exportName: options.exportName ?? ctor.name,
    methodNames,
    spawn: (...args) => spawn(type, args, options.spawnOptions),
  };
  return Object.freeze(type);
}
