/**
 * Command execution against the cluster.
 *
 * @packageDocumentation
 */

export type { CommandExecutor, RunOptions } from './types.js';
export { OcExecutor } from './oc-executor.js';
export type { OcExecutorOptions } from './oc-executor.js';
export {
  DEFAULT_RETRY_CONFIG,
  RETRYABLE_ERROR_PATTERNS,
  calculateBackoffDelay,
  isRetryableError,
  validateRetryConfig,
  withRetry,
} from './retry.js';
export type {
  AttemptFailure,
  AttemptResult,
  RetryAttemptInfo,
  RetryCallback,
  RetryConfig,
  WithRetryOptions,
} from './retry.js';
