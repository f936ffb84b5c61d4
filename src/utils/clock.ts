/**
 * Time source and sleeping for every wait in nodeswap.
 *
 * Quorum settle times, deletion polling and the provisioning loop all sleep
 * through a {@link Clock}, so tests can advance virtual time instead of waiting.
 *
 * @packageDocumentation
 */

import { setTimeout as sleepFor } from 'node:timers/promises';

/**
 * Source of the current time and of cancellable sleeps.
 */
export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number;

  /**
   * Resolves after `ms` milliseconds.
   *
   * @param ms - Duration to wait.
   * @param signal - Rejects with an `AbortError` when aborted.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Wall-clock implementation backed by Node timers.
 */
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) {
      return;
    }
    await sleepFor(ms, undefined, signal === undefined ? undefined : { signal });
  }
}

/**
 * Whether an error is the rejection produced by an aborted sleep.
 *
 * @param error - Caught value.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Formats a duration as `Xh Ym Zs`, `Ym Zs` or `Zs`.
 *
 * @param ms - Duration in milliseconds.
 *
 * @example
 * ```typescript
 * formatRuntime(3_725_000); // "1h 2m 5s"
 * formatRuntime(65_000);    // "1m 5s"
 * formatRuntime(9_400);     // "9s"
 * ```
 */
export function formatRuntime(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${String(hours)}h ${String(minutes)}m ${String(seconds)}s`;
  }
  if (minutes > 0) {
    return `${String(minutes)}m ${String(seconds)}s`;
  }
  return `${String(seconds)}s`;
}
