/**
 * RemoteHandle - the caller's stand-in for an object living in a worker.
 *
 * Reading a method name yields a function that sends the call; reading any
 * other name fetches the attribute; assigning a name sets it remotely.
 * Every remote operation returns a PendingCall. A fixed set of handle
 * members (lifecycle, helpers, `then`) is served locally and never
 * forwarded.
 *
 * Plain assignment throws when the value cannot be sent or the worker is
 * closed. A write the remote object refuses is only reported through
 * `setAttribute()`.
 */

import { RESERVED_OPERATIONS } from '../config/constants.js';
import type { Manager } from '../manager/manager.js';
import type { PendingCall } from '../manager/pending-call.js';
import { CancellationError } from '../utils/errors.js';
import { logError } from '../utils/error-handler.js';

/**
 * Names the handle answers itself.
 */
export const HANDLE_MEMBERS = [
  'ready',
  'close',
  'use',
  'cancel',
  'isClosing',
  'isClosed',
  'methodNames',
  'manager',
  'getAttribute',
  'setAttribute',
  'call',
  'then',
  'constructor',
  'toJSON',
] as const;

export type HandleMemberName = (typeof HANDLE_MEMBERS)[number];

const RESERVED: ReadonlySet<string> = new Set(HANDLE_MEMBERS);

export function isHandleMember(name: string): boolean {
  return RESERVED.has(name);
}

/**
 * Remote view of `T`: methods return PendingCalls of their awaited result,
 * attributes read as PendingCalls of their value.
 */
export type RemoteMembers<T> = {
  readonly [K in keyof T as K extends HandleMemberName ? never : K extends string ? K : never]: T[K] extends (
    ...args: infer A
  ) => infer R
    ? (...args: A) => PendingCall<Awaited<R>>
    : PendingCall<T[K]>;
};

export interface HandleCore<T> {
  readonly manager: Manager;
  readonly methodNames: ReadonlySet<string>;
  readonly isClosing: boolean;
  readonly isClosed: boolean;
  /** Handles are not thenable */
  readonly then: undefined;

  /** Resolves to this same handle once the remote instance exists */
  ready(): Promise<RemoteHandle<T>>;

  close(wait?: boolean, timeoutMs?: number): Promise<void>;

  /** Run `fn` with the handle, then close and wait for the worker */
  use<R>(fn: (handle: RemoteHandle<T>) => R | PromiseLike<R>): Promise<R>;

  /** @throws CancellationError always */
  cancel(): never;

  getAttribute<K extends keyof T & string>(name: K): PendingCall<T[K]>;
  setAttribute<K extends keyof T & string>(name: K, value: T[K]): PendingCall<undefined>;

  /** Call any operation by name, with keyword arguments */
  call<R = unknown>(name: string, args?: readonly unknown[], kwargs?: Record<string, unknown>): PendingCall<R>;

  toJSON(): HandleSummary;
}

export interface HandleSummary {
  type: string;
  pid: number | undefined;
  isClosing: boolean;
  isClosed: boolean;
}

export type RemoteHandle<T> = HandleCore<T> & RemoteMembers<T>;

/**
 * What a handle needs to know about its type.
 */
export interface HandleTypeInfo {
  readonly exportName: string;
  readonly methodNames: ReadonlySet<string>;
}

export function createHandle<T extends object>(manager: Manager, type: HandleTypeInfo): RemoteHandle<T> {
  const core: HandleCore<T> = {
    manager,
    methodNames: type.methodNames,
    get isClosing() {
      return manager.isClosing;
    },
    get isClosed() {
      return manager.isClosed;
    },
    then: undefined,

    ready: () => manager.construction.then(() => handle),
    close: (wait = false, timeoutMs) => manager.requestClose(wait, timeoutMs),
    async use<R>(fn: (handle: RemoteHandle<T>) => R | PromiseLike<R>): Promise<R> {
      let result: R;
      try {
        result = await fn(handle);
      } catch (error) {
        // the caller's error wins over a failed close
        await manager
          .requestClose(true)
          .catch((closeError: unknown) => logError(closeError, { operation: 'use', type: type.exportName }));
        throw error;
      }
      await manager.requestClose(true);
      return result;
    },
    cancel() {
      throw new CancellationError('Remote handles');
    },

    getAttribute<K extends keyof T & string>(name: K) {
      return manager.submit<T[K]>(RESERVED_OPERATIONS.GET_ATTRIBUTE, [name]);
    },
    setAttribute<K extends keyof T & string>(name: K, value: T[K]) {
      return manager.submit<undefined>(RESERVED_OPERATIONS.SET_ATTRIBUTE, [name, value]);
    },
    call<R = unknown>(name: string, args: readonly unknown[] = [], kwargs: Record<string, unknown> = {}) {
      return manager.submit<R>(name, args, kwargs);
    },

    toJSON: () => ({
      type: type.exportName,
      pid: manager.pid,
      isClosing: manager.isClosing,
      isClosed: manager.isClosed,
    }),
  };

  const forwarders = new Map<string, (...args: unknown[]) => PendingCall<unknown>>();

  const handler: ProxyHandler<HandleCore<T>> = {
    get(target, property, receiver) {
      if (typeof property === 'symbol' || RESERVED.has(property)) {
        return Reflect.get(target, property, receiver);
      }
      if (type.methodNames.has(property)) {
        const name = property;
        let forward = forwarders.get(name);
        if (!forward) {
          forward = (...args: unknown[]) => manager.submit(name, args);
          forwarders.set(name, forward);
        }
        return forward;
      }
      return manager.submit(RESERVED_OPERATIONS.GET_ATTRIBUTE, [property]);
    },

    set(_target, property, value: unknown) {
      if (typeof property === 'symbol' || RESERVED.has(property)) {
        throw new TypeError(`Cannot assign to handle member '${String(property)}'`);
      }
      const call = manager.submit(RESERVED_OPERATIONS.SET_ATTRIBUTE, [property, value]);
      if (call.state === 'rejected') {
        throw call.reason;
      }
      return true;
    },

    has(target, property) {
      if (typeof property === 'symbol' || RESERVED.has(property)) {
        return Reflect.has(target, property);
      }
      return type.methodNames.has(property);
    },

    deleteProperty(_target, property) {
      throw new TypeError(`Cannot delete '${String(property)}' from a remote handle`);
    },
  };

  // the remote members only exist behind the proxy
  const handle = new Proxy(core, handler) as RemoteHandle<T>;
  return handle;
}
