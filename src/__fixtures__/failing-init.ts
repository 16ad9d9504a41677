import { defineRemoteType } from '../remote/remote-type.js';

export class InitError extends Error {}

export class FailingInit {
  constructor(reason = 'refused') {
    throw new InitError(`cannot start: ${reason}`);
  }

  neverCalled(): string {
    return 'unreachable';
  }
}

export const FailingInitType = defineRemoteType(FailingInit, { module: import.meta.url });
