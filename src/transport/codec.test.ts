/**
 * Tests for the frame codec.
 */

import { describe, it, expect } from 'vitest';
import { cloneFrame, decodeFrame, encodeFrame } from './codec.js';
import { TransmissionError } from '../utils/errors.js';

describe('encodeFrame', () => {
  it('should carry structured-clone values', () => {
    const frame = {
      kind: 'call',
      name: 'store',
      args: [new Map([['a', 1]]), new Date(0), 10n, new Set(['x'])],
      kwargs: {},
    };

    expect(decodeFrame(encodeFrame(frame))).toEqual(frame);
  });

  it('should reject functions with TransmissionError', () => {
    const frame = { kind: 'reply', ok: true, value: () => 1 };

    expect(() => encodeFrame(frame)).toThrow(TransmissionError);
    expect(() => encodeFrame(frame)).toThrow(/^Payload cannot be transmitted: /);
  });

  it('should reject symbols', () => {
    expect(() => encodeFrame({ value: Symbol('local') })).toThrow(TransmissionError);
  });
});

describe('cloneFrame', () => {
  it('should return a copy, not the original', () => {
    const frame = { kind: 'call', args: [{ nested: true }] };

    const copy = cloneFrame(frame);

    expect(copy).toEqual(frame);
    expect(copy).not.toBe(frame);
  });
});
