/**
 * Structured-clone encoding for frames.
 *
 * Uses the same V8 serializer as the IPC channel's `advanced` mode, so a
 * frame that encodes here will cross the process boundary, and one that
 * does not fails before anything is written.
 */

import { serialize, deserialize } from 'v8';
import { TransmissionError } from '../utils/errors.js';
import { toErrorMessage } from '../utils/error-handler.js';

/**
 * Encode a frame, failing with TransmissionError on values that cannot be
 * cloned (functions, class instances with native state, symbols, ...).
 */
export function encodeFrame(frame: object): Buffer {
  try {
    return serialize(frame);
  } catch (error) {
    throw new TransmissionError(`Payload cannot be transmitted: ${toErrorMessage(error)}`, { cause: error });
  }
}

export function decodeFrame(buffer: Buffer): unknown {
  return deserialize(buffer);
}

/**
 * Copy a frame through the codec, as a process boundary would.
 */
export function cloneFrame(frame: object): unknown {
  return decodeFrame(encodeFrame(frame));
}
