import { defineRemoteType } from '../remote/remote-type.js';

export class LedgerError extends Error {
  readonly code = 'E_LEDGER';
}

class Named {
  describe(): string {
    return `${this.constructor.name} instance`;
  }
}

export interface FormatOptions {
  upper?: boolean;
  suffix?: string;
}

/**
 * Exercises every dispatch path: inherited methods, keyword options,
 * thrown errors and values that cannot cross the process boundary.
 */
export class Sample extends Named {
  label: string;
  readonly frozen = 'fixed';
  private readonly initArgs: unknown[];

  constructor(label = 'sample', ...rest: unknown[]) {
    super();
    this.label = label;
    this.initArgs = [label, ...rest];
    Object.defineProperty(this, 'frozen', { writable: false });
  }

  getInitArgs(): unknown[] {
    return this.initArgs;
  }

  getPid(): number {
    return process.pid;
  }

  echo<T>(value: T): T {
    return value;
  }

  format(text: string, options: FormatOptions = {}): string {
    const body = options.upper ? text.toUpperCase() : text;
    return `${body}${options.suffix ?? ''}`;
  }

  fail(message: string): never {
    throw new RangeError(message);
  }

  failLedger(): never {
    throw new LedgerError('unbalanced');
  }

  async failLater(message: string): Promise<never> {
    await Promise.resolve();
    throw new TypeError(message);
  }

  throwString(): never {
    throw 'plain failure';
  }

  makeCallback(): () => string {
    return () => this.label;
  }

  async sleep(ms: number): Promise<number> {
    await new Promise((resolve) => setTimeout(resolve, ms));
    return ms;
  }

  crash(exitCode: number): void {
    process.exit(exitCode);
  }
}

export const SampleType = defineRemoteType(Sample, { module: import.meta.url });
