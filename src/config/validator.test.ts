import { describe, expect, it } from 'vitest';
import { ConfigValidationError, assertConfigValid, getDefaultConfig, validateConfig } from './index.js';

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(getDefaultConfig())).toEqual({ valid: true, errors: [] });
  });

  it('rejects a non-positive monitor interval', () => {
    const config = getDefaultConfig();
    config.monitor.check_interval_seconds = 0;

    const result = validateConfig(config);

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.field)).toEqual(['monitor.check_interval_seconds']);
  });

  it('rejects an early CSR check later than the regular one', () => {
    const config = getDefaultConfig();
    config.monitor.csr_early_check_minutes = 12;

    const result = validateConfig(config);

    expect(result.errors[0]?.message).toBe(
      'monitor.csr_early_check_minutes must not exceed monitor.csr_check_delay_minutes (10)'
    );
  });

  it('rejects a backoff multiplier below one and a fractional retry count', () => {
    const config = getDefaultConfig();
    config.retry.backoff_multiplier = 0.5;
    config.retry.max_retries = 1.5;

    const fields = validateConfig(config).errors.map((e) => e.field);

    expect(fields).toEqual(['retry.max_retries', 'retry.backoff_multiplier']);
  });

  it('rejects a max delay smaller than the base delay', () => {
    const config = getDefaultConfig();
    config.retry.max_delay_ms = 100;

    expect(validateConfig(config).errors[0]?.field).toBe('retry.max_delay_ms');
  });
});

describe('assertConfigValid', () => {
  it('throws with every problem listed', () => {
    const config = getDefaultConfig();
    config.cluster.oc_binary = ' ';
    config.resources.deletion_poll_seconds = -1;

    expect(() => {
      assertConfigValid(config);
    }).toThrow(ConfigValidationError);

    try {
      assertConfigValid(config);
    } catch (error) {
      expect(error instanceof ConfigValidationError ? error.errors.length : 0).toBe(2);
    }
  });
});
