/**
 * FrameLink - the raw duplex channel under a Transport.
 *
 * Implementations:
 * - childLink: controller end of a forked child's IPC channel
 * - parentLink: worker end, over `process.send`
 * - createMemoryLinkPair: both ends in one process (see memory-link.ts)
 *
 * A link moves already-validated frames and reports delivery failures
 * through the send callback; it does not interpret frames.
 */

import type { ChildProcess } from 'child_process';

export interface FrameLink {
  /** Whether frames can still be sent */
  readonly connected: boolean;

  /**
   * Queue one frame. `done` runs once the frame has been handed to the
   * channel, with an error if the channel refused it.
   */
  send(frame: object, done: (error: Error | null) => void): void;

  /** Register the receiver of inbound frames, in arrival order */
  onMessage(listener: (raw: unknown) => void): void;

  /** Register a listener for the channel going away */
  onDisconnect(listener: () => void): void;

  /** Close the channel from this end */
  disconnect(): void;
}

/**
 * Controller end of a child process's IPC channel. The child must have been
 * forked with `serialization: 'advanced'`.
 */
export function childLink(child: ChildProcess): FrameLink {
  return {
    get connected() {
      return child.connected;
    },
    send(frame, done) {
      child.send(frame, (error) => done(error ?? null));
    },
    onMessage(listener) {
      child.on('message', (message: unknown) => listener(message));
    },
    onDisconnect(listener) {
      child.on('disconnect', listener);
    },
    disconnect() {
      if (child.connected) child.disconnect();
    },
  };
}

/**
 * Worker end of the IPC channel to the parent.
 *
 * @throws Error when the process was not started with an IPC channel
 */
export function parentLink(proc: NodeJS.Process = process): FrameLink {
  const send = proc.send?.bind(proc);
  if (!send) {
    throw new Error('No IPC channel: this process was not forked by a controller');
  }

  return {
    get connected() {
      return proc.connected;
    },
    send(frame, done) {
      send(frame, undefined, undefined, (error: Error | null) => done(error));
    },
    onMessage(listener) {
      proc.on('message', (message: unknown) => listener(message));
    },
    onDisconnect(listener) {
      proc.on('disconnect', listener);
    },
    disconnect() {
      if (proc.connected) proc.disconnect?.();
    },
  };
}
