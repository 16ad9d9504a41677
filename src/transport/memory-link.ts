/**
 * In-process FrameLink pair.
 *
 * Frames are copied through the structured-clone codec and delivered on a
 * later event-loop turn, in send order, so both ends behave as if a process
 * boundary sat between them. Used to run a worker loop inside the
 * controller's process.
 *
 * Usage:
 * ```typescript
 * const [controllerEnd, workerEnd] = createMemoryLinkPair();
 * workerEnd.onMessage((frame) => console.log(frame));
 * controllerEnd.send({ kind: 'call', name: 'ping', args: [], kwargs: {} }, () => {});
 * ```
 */

import { cloneFrame } from './codec.js';
import type { FrameLink } from './link.js';

interface Endpoint {
  messageListeners: Array<(raw: unknown) => void>;
  disconnectListeners: Array<() => void>;
}

export function createMemoryLinkPair(): [FrameLink, FrameLink] {
  const a: Endpoint = { messageListeners: [], disconnectListeners: [] };
  const b: Endpoint = { messageListeners: [], disconnectListeners: [] };
  let connected = true;

  // setImmediate callbacks run in the order they were queued, which gives
  // per-direction FIFO delivery
  const disconnect = (): void => {
    if (!connected) return;
    connected = false;
    setImmediate(() => {
      for (const endpoint of [a, b]) {
        for (const listener of endpoint.disconnectListeners) listener();
      }
    });
  };

  const makeEnd = (self: Endpoint, peer: Endpoint): FrameLink => ({
    get connected() {
      return connected;
    },
    send(frame, done) {
      if (!connected) {
        setImmediate(() => done(new Error('Channel closed')));
        return;
      }
      const copy = cloneFrame(frame);
      setImmediate(() => {
        for (const listener of peer.messageListeners) listener(copy);
        done(null);
      });
    },
    onMessage(listener) {
      self.messageListeners.push(listener);
    },
    onDisconnect(listener) {
      self.disconnectListeners.push(listener);
    },
    disconnect,
  });

  return [makeEnd(a, b), makeEnd(b, a)];
}
