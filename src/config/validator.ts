/**
 * Semantic validation for configuration values.
 *
 * Type checks happen in the parser; this module checks that durations,
 * retry bounds and CSR timing make sense together.
 *
 * @packageDocumentation
 */

import type { Config, MonitorConfig, RetrySettingsConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

function validatePositive(value: number, field: string, errors: ValidationError[]): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.push({ field, value, message: `${field} must be a finite positive number` });
  }
}

function validateNonNegative(value: number, field: string, errors: ValidationError[]): void {
  if (!Number.isFinite(value) || value < 0) {
    errors.push({ field, value, message: `${field} must be a finite non-negative number` });
  }
}

function validateMonitor(monitor: MonitorConfig, errors: ValidationError[]): void {
  validatePositive(monitor.timeout_minutes, 'monitor.timeout_minutes', errors);
  validatePositive(monitor.check_interval_seconds, 'monitor.check_interval_seconds', errors);
  validateNonNegative(monitor.csr_check_delay_minutes, 'monitor.csr_check_delay_minutes', errors);
  validateNonNegative(monitor.csr_early_check_minutes, 'monitor.csr_early_check_minutes', errors);
  validateNonNegative(
    monitor.csr_approval_delay_seconds,
    'monitor.csr_approval_delay_seconds',
    errors
  );

  if (monitor.csr_early_check_minutes > monitor.csr_check_delay_minutes) {
    errors.push({
      field: 'monitor.csr_early_check_minutes',
      value: monitor.csr_early_check_minutes,
      message: `monitor.csr_early_check_minutes must not exceed monitor.csr_check_delay_minutes (${String(monitor.csr_check_delay_minutes)})`,
    });
  }
}

function validateRetry(retry: RetrySettingsConfig, errors: ValidationError[]): void {
  if (!Number.isInteger(retry.max_retries) || retry.max_retries < 0) {
    errors.push({
      field: 'retry.max_retries',
      value: retry.max_retries,
      message: 'retry.max_retries must be a non-negative integer',
    });
  }
  validateNonNegative(retry.base_delay_ms, 'retry.base_delay_ms', errors);

  if (!Number.isFinite(retry.backoff_multiplier) || retry.backoff_multiplier < 1) {
    errors.push({
      field: 'retry.backoff_multiplier',
      value: retry.backoff_multiplier,
      message: 'retry.backoff_multiplier must be at least 1',
    });
  }

  if (retry.max_delay_ms < retry.base_delay_ms) {
    errors.push({
      field: 'retry.max_delay_ms',
      value: retry.max_delay_ms,
      message: `retry.max_delay_ms must be >= retry.base_delay_ms (${String(retry.base_delay_ms)})`,
    });
  }
}

/**
 * Validates a parsed configuration.
 *
 * @param config - Configuration to validate.
 * @returns Validation result listing every problem found.
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  if (config.cluster.oc_binary.trim() === '') {
    errors.push({
      field: 'cluster.oc_binary',
      value: config.cluster.oc_binary,
      message: 'cluster.oc_binary must not be empty',
    });
  }
  validatePositive(config.cluster.command_timeout_seconds, 'cluster.command_timeout_seconds', errors);

  validateMonitor(config.monitor, errors);

  validateNonNegative(config.quorum.disable_settle_seconds, 'quorum.disable_settle_seconds', errors);
  validateNonNegative(config.quorum.enable_settle_seconds, 'quorum.enable_settle_seconds', errors);
  validateNonNegative(
    config.quorum.member_removal_settle_seconds,
    'quorum.member_removal_settle_seconds',
    errors
  );
  validateNonNegative(config.quorum.secret_delete_delay_ms, 'quorum.secret_delete_delay_ms', errors);

  validateNonNegative(
    config.resources.claim_cache_ttl_seconds,
    'resources.claim_cache_ttl_seconds',
    errors
  );
  validatePositive(
    config.resources.deletion_timeout_seconds,
    'resources.deletion_timeout_seconds',
    errors
  );
  validatePositive(config.resources.deletion_poll_seconds, 'resources.deletion_poll_seconds', errors);
  validateNonNegative(
    config.resources.delete_settle_seconds,
    'resources.delete_settle_seconds',
    errors
  );
  validatePositive(config.resources.drain_timeout_seconds, 'resources.drain_timeout_seconds', errors);

  validateRetry(config.retry, errors);

  return { valid: errors.length === 0, errors };
}

/**
 * Validates a configuration and throws on the first invalid result.
 *
 * @param config - Configuration to validate.
 * @throws ConfigValidationError listing every problem found.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);
  if (!result.valid) {
    const summary = result.errors.map((e) => e.message).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${summary}`, result.errors);
  }
}
