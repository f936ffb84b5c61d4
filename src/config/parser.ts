/**
 * TOML configuration parser for nodeswap.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_CLI_CONFIG,
  DEFAULT_CLUSTER,
  DEFAULT_CONFIG,
  DEFAULT_MONITOR,
  DEFAULT_PATHS,
  DEFAULT_QUORUM,
  DEFAULT_RESOURCES,
  DEFAULT_RETRY,
} from './defaults.js';
import type {
  CliSettingsConfig,
  ClusterConfig,
  Config,
  MonitorConfig,
  PathConfig,
  QuorumConfig,
  ResourcesConfig,
  RetrySettingsConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Reads a top-level table, returning undefined when it is absent.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function readSection(parsed: RawSection, name: string): RawSection | undefined {
  const value = parsed[name];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof value}`);
  }
  return value;
}

function parseCluster(raw: RawSection | undefined): ClusterConfig {
  const result: ClusterConfig = { ...DEFAULT_CLUSTER };
  if (raw === undefined) {
    return result;
  }

  if ('oc_binary' in raw) {
    result.oc_binary = validateString(raw.oc_binary, 'cluster.oc_binary');
  }
  if ('machine_api_namespace' in raw) {
    result.machine_api_namespace = validateString(
      raw.machine_api_namespace,
      'cluster.machine_api_namespace'
    );
  }
  if ('etcd_namespace' in raw) {
    result.etcd_namespace = validateString(raw.etcd_namespace, 'cluster.etcd_namespace');
  }
  if ('command_timeout_seconds' in raw) {
    result.command_timeout_seconds = validateNumber(
      raw.command_timeout_seconds,
      'cluster.command_timeout_seconds'
    );
  }

  return result;
}

function parseMonitor(raw: RawSection | undefined): MonitorConfig {
  const result: MonitorConfig = { ...DEFAULT_MONITOR };
  if (raw === undefined) {
    return result;
  }

  if ('timeout_minutes' in raw) {
    result.timeout_minutes = validateNumber(raw.timeout_minutes, 'monitor.timeout_minutes');
  }
  if ('check_interval_seconds' in raw) {
    result.check_interval_seconds = validateNumber(
      raw.check_interval_seconds,
      'monitor.check_interval_seconds'
    );
  }
  if ('csr_check_delay_minutes' in raw) {
    result.csr_check_delay_minutes = validateNumber(
      raw.csr_check_delay_minutes,
      'monitor.csr_check_delay_minutes'
    );
  }
  if ('csr_early_check_minutes' in raw) {
    result.csr_early_check_minutes = validateNumber(
      raw.csr_early_check_minutes,
      'monitor.csr_early_check_minutes'
    );
  }
  if ('csr_approval_delay_seconds' in raw) {
    result.csr_approval_delay_seconds = validateNumber(
      raw.csr_approval_delay_seconds,
      'monitor.csr_approval_delay_seconds'
    );
  }

  return result;
}

function parseQuorum(raw: RawSection | undefined): QuorumConfig {
  const result: QuorumConfig = { ...DEFAULT_QUORUM };
  if (raw === undefined) {
    return result;
  }

  if ('disable_settle_seconds' in raw) {
    result.disable_settle_seconds = validateNumber(
      raw.disable_settle_seconds,
      'quorum.disable_settle_seconds'
    );
  }
  if ('enable_settle_seconds' in raw) {
    result.enable_settle_seconds = validateNumber(
      raw.enable_settle_seconds,
      'quorum.enable_settle_seconds'
    );
  }
  if ('member_removal_settle_seconds' in raw) {
    result.member_removal_settle_seconds = validateNumber(
      raw.member_removal_settle_seconds,
      'quorum.member_removal_settle_seconds'
    );
  }
  if ('secret_delete_delay_ms' in raw) {
    result.secret_delete_delay_ms = validateNumber(
      raw.secret_delete_delay_ms,
      'quorum.secret_delete_delay_ms'
    );
  }

  return result;
}

function parseResources(raw: RawSection | undefined): ResourcesConfig {
  const result: ResourcesConfig = { ...DEFAULT_RESOURCES };
  if (raw === undefined) {
    return result;
  }

  if ('claim_cache_ttl_seconds' in raw) {
    result.claim_cache_ttl_seconds = validateNumber(
      raw.claim_cache_ttl_seconds,
      'resources.claim_cache_ttl_seconds'
    );
  }
  if ('deletion_timeout_seconds' in raw) {
    result.deletion_timeout_seconds = validateNumber(
      raw.deletion_timeout_seconds,
      'resources.deletion_timeout_seconds'
    );
  }
  if ('deletion_poll_seconds' in raw) {
    result.deletion_poll_seconds = validateNumber(
      raw.deletion_poll_seconds,
      'resources.deletion_poll_seconds'
    );
  }
  if ('delete_settle_seconds' in raw) {
    result.delete_settle_seconds = validateNumber(
      raw.delete_settle_seconds,
      'resources.delete_settle_seconds'
    );
  }
  if ('drain_timeout_seconds' in raw) {
    result.drain_timeout_seconds = validateNumber(
      raw.drain_timeout_seconds,
      'resources.drain_timeout_seconds'
    );
  }

  return result;
}

function parseRetry(raw: RawSection | undefined): RetrySettingsConfig {
  const result: RetrySettingsConfig = { ...DEFAULT_RETRY };
  if (raw === undefined) {
    return result;
  }

  if ('max_retries' in raw) {
    result.max_retries = validateNumber(raw.max_retries, 'retry.max_retries');
  }
  if ('base_delay_ms' in raw) {
    result.base_delay_ms = validateNumber(raw.base_delay_ms, 'retry.base_delay_ms');
  }
  if ('backoff_multiplier' in raw) {
    result.backoff_multiplier = validateNumber(raw.backoff_multiplier, 'retry.backoff_multiplier');
  }
  if ('max_delay_ms' in raw) {
    result.max_delay_ms = validateNumber(raw.max_delay_ms, 'retry.max_delay_ms');
  }

  return result;
}

function parsePaths(raw: RawSection | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw === undefined) {
    return result;
  }

  if ('backup_root' in raw) {
    result.backup_root = validateString(raw.backup_root, 'paths.backup_root');
  }

  return result;
}

function parseCliSettings(raw: RawSection | undefined): CliSettingsConfig {
  const result: CliSettingsConfig = { ...DEFAULT_CLI_CONFIG };
  if (raw === undefined) {
    return result;
  }

  if ('colors' in raw) {
    result.colors = validateBoolean(raw.colors, 'cli.colors');
  }
  if ('unicode' in raw) {
    result.unicode = validateBoolean(raw.unicode, 'cli.unicode');
  }
  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'cli.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a Config, filling missing fields from defaults.
 *
 * @param tomlContent - Raw TOML content.
 * @throws ConfigParseError for invalid TOML syntax or mistyped fields.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [monitor]
 * timeout_minutes = 60
 *
 * [cli]
 * debug = true
 * `);
 * config.monitor.check_interval_seconds; // 25
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: RawSection;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    cluster: parseCluster(readSection(parsed, 'cluster')),
    monitor: parseMonitor(readSection(parsed, 'monitor')),
    quorum: parseQuorum(readSection(parsed, 'quorum')),
    resources: parseResources(readSection(parsed, 'resources')),
    retry: parseRetry(readSection(parsed, 'retry')),
    paths: parsePaths(readSection(parsed, 'paths')),
    cli: parseCliSettings(readSection(parsed, 'cli')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    cluster: { ...DEFAULT_CONFIG.cluster },
    monitor: { ...DEFAULT_CONFIG.monitor },
    quorum: { ...DEFAULT_CONFIG.quorum },
    resources: { ...DEFAULT_CONFIG.resources },
    retry: { ...DEFAULT_CONFIG.retry },
    paths: { ...DEFAULT_CONFIG.paths },
    cli: { ...DEFAULT_CONFIG.cli },
  };
}
