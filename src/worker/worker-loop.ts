/**
 * WorkerLoop - serves calls against the single proxied instance.
 *
 * One request is processed at a time, in arrival order, and every request
 * gets exactly one reply. The first reply is always the construction
 * outcome.
 */

import type { Logger } from 'pino';
import { RESERVED_OPERATIONS } from '../config/constants.js';
import { OneShotSignal } from '../lifecycle/signal.js';
import type { CallReply, CallRequest, WorkerFrame, WorkerInbound, WorkerSettings } from '../transport/frames.js';
import type { Transport } from '../transport/transport.js';
import { createLogger } from '../utils/logger.js';
import { ProtocolError, TransmissionError } from '../utils/errors.js';
import { logError, serializeError } from '../utils/error-handler.js';

export type InstanceFactory = () => Promise<object>;

export class WorkerLoop {
  readonly workerClosed = new OneShotSignal('worker-closed');
  private readonly logger: Logger;
  private served = 0;

  constructor(
    private readonly transport: Transport<WorkerFrame, WorkerInbound>,
    private readonly closeRequested: OneShotSignal,
    private readonly settings: WorkerSettings
  ) {
    this.logger = createLogger('WorkerLoop', { pid: process.pid });
    closeRequested.onSet(() => transport.wake());
  }

  /**
   * Construct the instance, then serve calls until close is requested or the
   * channel goes away.
   */
  async run(create: InstanceFactory): Promise<void> {
    let instance: object;
    try {
      instance = await create();
    } catch (error) {
      logError(error, { operation: 'construct' }, this.logger);
      this.reply({ kind: 'reply', ok: false, error: serializeError(error) });
      await this.finish();
      return;
    }

    this.reply({ kind: 'reply', ok: true, value: true });
    this.logger.debug({ type: instance.constructor.name }, 'Instance constructed');

    await this.serve(instance);
    await this.finish();
  }

  private async serve(instance: object): Promise<void> {
    while (!this.closeRequested.isSet && this.transport.isConnected) {
      const ready = await this.transport.poll(this.settings.pollTimeoutMs);
      if (!ready) continue;
      if (this.closeRequested.isSet && !this.settings.drainOnClose) break;
      await this.handleNext(instance);
    }

    if (this.closeRequested.isSet && this.settings.drainOnClose) {
      while (this.transport.pending > 0 && this.transport.isConnected) {
        await this.handleNext(instance);
      }
    }
    this.logger.debug({ served: this.served, unread: this.transport.pending }, 'Worker loop finished');
  }

  private async handleNext(instance: object): Promise<void> {
    const frame = this.transport.tryReceive();
    if (!frame) return;

    if (frame.kind === 'invalid') {
      this.reply({ kind: 'reply', ok: false, error: serializeError(frame.error) });
      return;
    }
    if (frame.kind === 'bootstrap') {
      const error = new ProtocolError('Worker is already running; bootstrap frame ignored');
      this.reply({ kind: 'reply', ok: false, error: serializeError(error) });
      return;
    }

    let reply: CallReply;
    try {
      const value = await dispatch(instance, frame);
      reply = { kind: 'reply', ok: true, value };
    } catch (error) {
      this.logger.debug({ operation: frame.name, err: error }, 'Call failed');
      reply = { kind: 'reply', ok: false, error: serializeError(error) };
    }
    this.served++;
    this.reply(reply, frame.name);
  }

  private reply(reply: CallReply, operation?: string): void {
    try {
      this.transport.send(reply);
    } catch (error) {
      if (error instanceof TransmissionError && reply.ok) {
        // the call still gets its one reply
        this.reply({ kind: 'reply', ok: false, error: serializeError(error) }, operation);
        return;
      }
      logError(error, { operation }, this.logger);
    }
  }

  private async finish(): Promise<void> {
    if (!this.workerClosed.set()) return;
    if (this.transport.isConnected) {
      try {
        this.transport.sendSignal('worker-closed');
      } catch (error) {
        logError(error, { operation: 'finish' }, this.logger);
      }
    }
    await this.transport.flush();
  }
}

/**
 * Apply one request to the instance.
 */
export async function dispatch(instance: object, request: CallRequest): Promise<unknown> {
  switch (request.name) {
    case RESERVED_OPERATIONS.GET_ATTRIBUTE: {
      const [attribute] = request.args;
      if (typeof attribute !== 'string') {
        throw new TypeError('Attribute name must be a string');
      }
      return Reflect.get(instance, attribute);
    }

    case RESERVED_OPERATIONS.SET_ATTRIBUTE: {
      const [attribute, value] = request.args;
      if (typeof attribute !== 'string') {
        throw new TypeError('Attribute name must be a string');
      }
      if (!Reflect.set(instance, attribute, value)) {
        throw new TypeError(`Cannot assign to read only property '${attribute}'`);
      }
      return undefined;
    }

    default: {
      const member: unknown = Reflect.get(instance, request.name);
      if (typeof member !== 'function') {
        throw new TypeError(`${instance.constructor.name}.${request.name} is not a function`);
      }
      const args = Object.keys(request.kwargs).length > 0 ? [...request.args, request.kwargs] : request.args;
      const result: unknown = Reflect.apply(member, instance, args);
      return await result;
    }
  }
}
