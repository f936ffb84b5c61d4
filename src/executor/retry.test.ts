/**
 * Tests for retry logic with exponential backoff.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_RETRY_CONFIG,
  calculateBackoffDelay,
  isRetryableError,
  validateRetryConfig,
  withRetry,
  type AttemptResult,
  type RetryAttemptInfo,
} from './retry.js';

function failure(message: string, retryable: boolean): AttemptResult<string> {
  return { ok: false, error: { message, retryable } };
}

function success(value: string): AttemptResult<string> {
  return { ok: true, value };
}

describe('retry module', () => {
  describe('validateRetryConfig', () => {
    it('returns defaults when no config is provided', () => {
      expect(validateRetryConfig()).toEqual(DEFAULT_RETRY_CONFIG);
    });

    it('merges a partial config with defaults', () => {
      expect(validateRetryConfig({ maxRetries: 5 })).toEqual({
        maxRetries: 5,
        baseDelayMs: 2000,
        backoffMultiplier: 1.5,
        maxDelayMs: 30000,
      });
    });

    it('rejects a fractional retry count', () => {
      expect(() => validateRetryConfig({ maxRetries: 2.5 })).toThrow(
        'maxRetries must be a non-negative integer'
      );
    });

    it('rejects a shrinking multiplier', () => {
      expect(() => validateRetryConfig({ backoffMultiplier: 0.9 })).toThrow(
        'backoffMultiplier must be >= 1, got: 0.9'
      );
    });

    it('rejects a max delay below the base delay', () => {
      expect(() => validateRetryConfig({ baseDelayMs: 5000, maxDelayMs: 1000 })).toThrow(
        'maxDelayMs (1000) must be >= baseDelayMs (5000)'
      );
    });
  });

  describe('calculateBackoffDelay', () => {
    it('grows by 1.5x per retry', () => {
      const config = validateRetryConfig();

      expect([0, 1, 2, 3].map((n) => calculateBackoffDelay(n, config))).toEqual([
        2000, 3000, 4500, 6750,
      ]);
    });

    it('caps at the maximum delay', () => {
      const config = validateRetryConfig({ maxDelayMs: 4000 });

      expect(calculateBackoffDelay(2, config)).toBe(4000);
    });
  });

  describe('isRetryableError', () => {
    it.each([
      'dial tcp 10.0.0.1:6443: connect: connection refused',
      'Unable to connect to the server: net/http: TLS handshake timeout',
      'read: connection reset by peer',
      'dial tcp: lookup api.lab: Temporary failure in name resolution',
      'context deadline exceeded',
      'Error from server (ServiceUnavailable): the server is currently unable to handle the request',
      'Error from server (InternalError): Internal Server Error',
      'Error from server (TooManyRequests): Too Many Requests',
      'http2: client connection lost, keepalive ping failed',
    ])('retries %s', (text) => {
      expect(isRetryableError(text)).toBe(true);
    });

    it.each([
      'Error from server (NotFound): baremetalhosts.metal3.io "worker-9" not found',
      'Error from server (Forbidden): permission denied',
      '',
      '   ',
    ])('does not retry %j', (text) => {
      expect(isRetryableError(text)).toBe(false);
    });
  });

  describe('withRetry', () => {
    it('returns the first success without sleeping', async () => {
      const sleep = vi.fn(() => Promise.resolve());
      const operation = vi.fn(() => Promise.resolve(success('ok')));

      const result = await withRetry(operation, { sleep });

      expect(result).toEqual(success('ok'));
      expect(operation).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('stops immediately on a non-retryable failure', async () => {
      const sleep = vi.fn(() => Promise.resolve());
      const operation = vi.fn(() => Promise.resolve(failure('not found', false)));

      const result = await withRetry(operation, { sleep });

      expect(result).toEqual(failure('not found', false));
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('retries transient failures until success', async () => {
      const sleep = vi.fn((_ms: number) => Promise.resolve());
      const operation = vi
        .fn<() => Promise<AttemptResult<string>>>()
        .mockResolvedValueOnce(failure('connection refused', true))
        .mockResolvedValueOnce(failure('connection refused', true))
        .mockResolvedValueOnce(success('items'));

      const result = await withRetry(operation, { sleep });

      expect(result).toEqual(success('items'));
      expect(sleep.mock.calls.map((call) => call[0])).toEqual([2000, 3000]);
    });

    it('reports each retry before sleeping', async () => {
      const retries: RetryAttemptInfo[] = [];
      const operation = vi
        .fn<() => Promise<AttemptResult<string>>>()
        .mockResolvedValueOnce(failure('timeout', true))
        .mockResolvedValueOnce(success('done'));

      await withRetry(operation, {
        sleep: () => Promise.resolve(),
        onRetry: (info) => retries.push(info),
      });

      expect(retries).toEqual([
        {
          attempt: 2,
          totalAttempts: 4,
          delayMs: 2000,
          previousError: { message: 'timeout', retryable: true },
        },
      ]);
    });

    it('returns a non-retryable failure once retries are exhausted', async () => {
      const sleep = vi.fn((_ms: number) => Promise.resolve());
      const operation = vi.fn(() => Promise.resolve(failure('service unavailable', true)));

      const result = await withRetry(operation, { sleep });

      expect(operation).toHaveBeenCalledTimes(4);
      expect(sleep.mock.calls.map((call) => call[0])).toEqual([2000, 3000, 4500]);
      expect(result).toEqual(
        failure('All 4 attempts failed. Last error: service unavailable', false)
      );
    });
  });
});
