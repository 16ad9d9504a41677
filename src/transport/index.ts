/**
 * Transport layer module.
 *
 * Ordered frame channel between a controller and its worker process.
 *
 * Usage:
 * ```typescript
 * import { Transport, childLink, workerInboundSchema, callReplySchema } from './transport/index.js';
 *
 * // Controller end
 * const transport = new Transport(childLink(child), callReplySchema, 'controller');
 * transport.send({ kind: 'call', name: 'increment', args: [1], kwargs: {} });
 * if (await transport.poll(50)) {
 *   const reply = transport.tryReceive();
 * }
 * ```
 */

export * from './frames.js';
export { encodeFrame, decodeFrame, cloneFrame } from './codec.js';
export { Inbox } from './inbox.js';
export { childLink, parentLink, type FrameLink } from './link.js';
export { createMemoryLinkPair } from './memory-link.js';
export { Transport, type InvalidFrame, type Received } from './transport.js';
