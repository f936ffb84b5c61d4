/**
 * Retry logic with exponential backoff for `oc` invocations.
 *
 * Only failures whose output matches a known transient pattern are retried;
 * everything else (not found, forbidden, invalid input) fails on the first
 * attempt.
 *
 * @packageDocumentation
 */

/**
 * Configuration options for retry behavior.
 */
export interface RetryConfig {
  /** Retries after the first attempt (default: 3). */
  maxRetries: number;
  /** Delay before the first retry in milliseconds (default: 2000). */
  baseDelayMs: number;
  /** Growth factor applied per further retry (default: 1.5). */
  backoffMultiplier: number;
  /** Maximum delay in milliseconds (default: 30000). */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 2000,
  backoffMultiplier: 1.5,
  maxDelayMs: 30000,
} as const;

/**
 * Output fragments that mark an API or network failure as transient.
 * Matched case-insensitively.
 */
export const RETRYABLE_ERROR_PATTERNS: readonly string[] = [
  'connection refused',
  'keepalive ping failed',
  'timeout',
  'connection reset by peer',
  'temporary failure in name resolution',
  'context deadline exceeded',
  'service unavailable',
  'internal server error',
  'too many requests',
  'server is currently unable to handle the request',
] as const;

/**
 * Validates retry configuration values.
 *
 * @param config - Partial retry configuration to validate.
 * @returns Valid retry configuration with defaults applied.
 * @throws Error if configuration values are invalid.
 */
export function validateRetryConfig(config: Partial<RetryConfig> = {}): RetryConfig {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
    backoffMultiplier = DEFAULT_RETRY_CONFIG.backoffMultiplier,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
  } = config;

  if (maxRetries < 0 || !Number.isInteger(maxRetries)) {
    throw new Error(`maxRetries must be a non-negative integer, got: ${String(maxRetries)}`);
  }

  if (baseDelayMs < 0) {
    throw new Error(`baseDelayMs must be non-negative, got: ${String(baseDelayMs)}`);
  }

  if (backoffMultiplier < 1) {
    throw new Error(`backoffMultiplier must be >= 1, got: ${String(backoffMultiplier)}`);
  }

  if (maxDelayMs < baseDelayMs) {
    throw new Error(
      `maxDelayMs (${String(maxDelayMs)}) must be >= baseDelayMs (${String(baseDelayMs)})`
    );
  }

  return { maxRetries, baseDelayMs, backoffMultiplier, maxDelayMs };
}

/**
 * Delay before retry number `attempt` (0-indexed):
 * `min(maxDelayMs, baseDelayMs * backoffMultiplier^attempt)`.
 *
 * @param attempt - The retry number, starting at 0.
 * @param config - Retry configuration.
 */
export function calculateBackoffDelay(attempt: number, config: RetryConfig): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffMultiplier, attempt);
  return Math.round(Math.min(exponentialDelay, config.maxDelayMs));
}

/**
 * Whether command output describes a transient failure worth retrying.
 *
 * @param errorText - stderr (or error message) of the failed command.
 */
export function isRetryableError(errorText: string): boolean {
  const lowered = errorText.toLowerCase();
  if (lowered.trim() === '') {
    return false;
  }
  return RETRYABLE_ERROR_PATTERNS.some((pattern) => lowered.includes(pattern));
}

/**
 * Failure of a single attempt.
 */
export interface AttemptFailure {
  readonly message: string;
  readonly retryable: boolean;
}

/**
 * Outcome of one attempt, or of the whole retried operation.
 */
export type AttemptResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: AttemptFailure };

/**
 * Information about a retry attempt.
 */
export interface RetryAttemptInfo {
  /** The attempt about to run (1-indexed). */
  attempt: number;
  /** Total attempts that will be made (initial + retries). */
  totalAttempts: number;
  /** Delay before this attempt in milliseconds. */
  delayMs: number;
  /** Failure of the previous attempt. */
  previousError: AttemptFailure;
}

export type RetryCallback = (info: RetryAttemptInfo) => void;

/**
 * Options for the withRetry function.
 */
export interface WithRetryOptions {
  config?: Partial<RetryConfig>;
  /** Invoked before each retry attempt. */
  onRetry?: RetryCallback;
  /** Sleep function for delays (injectable for testing). */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Default sleep implementation using setTimeout.
 *
 * @param ms - Milliseconds to sleep.
 */
export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs an operation, retrying retryable failures with exponential backoff.
 * Never throws for a failed attempt; the final failure is returned.
 *
 * @param operation - One attempt of the operation.
 * @param options - Retry options.
 *
 * @example
 * ```typescript
 * const result = await withRetry(() => attemptOc(['get', 'bmh']), {
 *   config: { maxRetries: 3 },
 *   onRetry: (info) => logger.warn('command_retry', { attempt: info.attempt }),
 * });
 * ```
 */
export async function withRetry<T>(
  operation: () => Promise<AttemptResult<T>>,
  options: WithRetryOptions = {}
): Promise<AttemptResult<T>> {
  const config = validateRetryConfig(options.config);
  const sleep = options.sleep ?? defaultSleep;
  const totalAttempts = config.maxRetries + 1;

  let result = await operation();

  for (let retry = 0; retry < config.maxRetries; retry++) {
    if (result.ok || !result.error.retryable) {
      return result;
    }

    const delayMs = calculateBackoffDelay(retry, config);
    options.onRetry?.({
      attempt: retry + 2,
      totalAttempts,
      delayMs,
      previousError: result.error,
    });

    await sleep(delayMs);
    result = await operation();
  }

  if (!result.ok && result.error.retryable) {
    return {
      ok: false,
      error: {
        message: `All ${String(totalAttempts)} attempts failed. Last error: ${result.error.message}`,
        retryable: false,
      },
    };
  }

  return result;
}
