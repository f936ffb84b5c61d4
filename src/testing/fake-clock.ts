/**
 * Virtual clock for tests: sleeping advances time instantly.
 */

import type { Clock } from '../utils/clock.js';

function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

export class FakeClock implements Clock {
  private current: number;

  /** Every sleep duration requested, in order. */
  readonly sleeps: number[] = [];

  /** Called after each sleep has advanced the clock. */
  onSleep: ((now: number) => void) | undefined;

  constructor(start = 1_700_000_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted === true) {
      return Promise.reject(abortError());
    }
    this.sleeps.push(ms);
    this.current += ms;
    this.onSleep?.(this.current);
    if (signal?.aborted === true) {
      return Promise.reject(abortError());
    }
    return Promise.resolve();
  }

  /** Sum of all requested sleeps. */
  get totalSlept(): number {
    return this.sleeps.reduce((sum, ms) => sum + ms, 0);
  }
}
