/**
 * Transport - ordered, validated frame channel between controller and worker.
 *
 * Wraps a FrameLink and adds:
 * - validation of inbound frames against a zod schema
 * - an inbox with blocking receive, bounded poll and non-blocking take
 * - out-of-band routing of control frames to signal listeners
 * - send-time serialization checks, so a bad payload fails at the caller
 *
 * Frames are delivered to the inbox in the order the peer sent them. A
 * frame that fails validation still takes its place in the inbox as an
 * `invalid` entry, so request/reply positions stay aligned.
 */

import type { Logger } from 'pino';
import type { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ProtocolError, WorkerClosedError } from '../utils/errors.js';
import { logError, toErrorMessage } from '../utils/error-handler.js';
import { encodeFrame } from './codec.js';
import { controlFrameSchema, type ControlFrame, type LifecycleSignalName } from './frames.js';
import { Inbox } from './inbox.js';
import type { FrameLink } from './link.js';

/**
 * Inbox entry for a frame that failed validation.
 */
export interface InvalidFrame {
  kind: 'invalid';
  error: ProtocolError;
}

export type Received<TIn> = TIn | InvalidFrame;

/** How often receive() re-checks for a lost channel while waiting. */
const RECEIVE_POLL_MS = 1000;

export class Transport<TOut extends object, TIn extends object> {
  private readonly inbox = new Inbox<Received<TIn>>();
  private readonly signalListeners: Array<(signal: LifecycleSignalName) => void> = [];
  private readonly disconnectListeners: Array<() => void> = [];
  private readonly flushWaiters: Array<() => void> = [];
  private inFlight = 0;
  private disconnected = false;
  private readonly logger: Logger;

  constructor(
    private readonly link: FrameLink,
    private readonly schema: z.ZodType<TIn, z.ZodTypeDef, unknown>,
    name: string
  ) {
    this.logger = createLogger('Transport', { end: name });
    link.onMessage((raw) => this.handleMessage(raw));
    link.onDisconnect(() => this.handleDisconnect());
  }

  /** Frames waiting in the inbox */
  get pending(): number {
    return this.inbox.size;
  }

  get isConnected(): boolean {
    return !this.disconnected && this.link.connected;
  }

  /**
   * Send one frame.
   *
   * @throws TransmissionError when the frame cannot be serialized; nothing is sent
   * @throws WorkerClosedError when the channel is already closed
   */
  send(frame: TOut | ControlFrame): void {
    if (!this.isConnected) {
      throw new WorkerClosedError('Channel is closed');
    }
    encodeFrame(frame);

    this.inFlight++;
    this.link.send(frame, (error) => {
      this.inFlight--;
      if (error) {
        logError(error, { frameKind: Reflect.get(frame, 'kind') }, this.logger);
      }
      if (this.inFlight === 0) this.releaseFlushWaiters();
    });
  }

  /**
   * Announce a lifecycle transition to the peer.
   */
  sendSignal(signal: LifecycleSignalName): void {
    this.send({ kind: 'control', signal });
  }

  /**
   * Wait up to `timeoutMs` for a frame.
   *
   * @returns whether a frame is ready; false on timeout, wake() or disconnect
   */
  poll(timeoutMs: number): Promise<boolean> {
    return this.inbox.wait(timeoutMs);
  }

  /**
   * Take the next frame if one is ready.
   */
  tryReceive(): Received<TIn> | undefined {
    return this.inbox.shift();
  }

  /**
   * Wait for the next frame.
   *
   * @throws WorkerClosedError if the channel closes with the inbox empty
   */
  async receive(): Promise<Received<TIn>> {
    for (;;) {
      const frame = this.inbox.shift();
      if (frame !== undefined) return frame;
      if (this.disconnected) {
        throw new WorkerClosedError('Channel closed before a frame arrived');
      }
      await this.inbox.wait(RECEIVE_POLL_MS);
    }
  }

  /**
   * Release anyone blocked in poll() so they re-check their state.
   */
  wake(): void {
    this.inbox.wake();
  }

  onSignal(listener: (signal: LifecycleSignalName) => void): void {
    this.signalListeners.push(listener);
  }

  onDisconnect(listener: () => void): void {
    this.disconnectListeners.push(listener);
  }

  /**
   * Resolve once every frame sent so far has been handed to the channel.
   */
  flush(): Promise<void> {
    if (this.inFlight === 0 || this.disconnected) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.flushWaiters.push(resolve));
  }

  /**
   * Close the channel from this end.
   */
  close(): void {
    this.link.disconnect();
  }

  private handleMessage(raw: unknown): void {
    const control = controlFrameSchema.safeParse(raw);
    if (control.success) {
      this.logger.debug({ signal: control.data.signal }, 'Signal received');
      for (const listener of this.signalListeners) listener(control.data.signal);
      return;
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      const error = new ProtocolError(`Malformed frame: ${toErrorMessage(parsed.error.issues.map((issue) => issue.message))}`);
      this.logger.warn({ err: error }, 'Dropping malformed frame');
      this.inbox.push({ kind: 'invalid', error });
      return;
    }

    this.inbox.push(parsed.data);
  }

  private handleDisconnect(): void {
    if (this.disconnected) return;
    this.disconnected = true;
    this.logger.debug({ pending: this.inbox.size }, 'Channel disconnected');
    this.releaseFlushWaiters();
    this.inbox.wake();
    for (const listener of this.disconnectListeners) listener();
  }

  private releaseFlushWaiters(): void {
    for (const resolve of this.flushWaiters.splice(0)) resolve();
  }
}
