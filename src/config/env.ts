/**
 * Environment variable overrides for configuration.
 *
 * NODESWAP_<SECTION>_<FIELD> variables override the matching config value.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | {
      readonly type: 'string';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: string) => void;
    }
  | {
      readonly type: 'number';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: number) => void;
    }
  | {
      readonly type: 'boolean';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: boolean) => void;
    };

/**
 * Supported environment variables.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  NODESWAP_DEBUG: {
    type: 'boolean',
    description: 'Enable debug logging (shortcut for NODESWAP_CLI_DEBUG)',
    apply: (o, v) => {
      o.cli = { ...o.cli, debug: v };
    },
  },
  NODESWAP_CLI_DEBUG: {
    type: 'boolean',
    description: 'Enable debug logging',
    apply: (o, v) => {
      o.cli = { ...o.cli, debug: v };
    },
  },
  NODESWAP_CLI_COLORS: {
    type: 'boolean',
    description: 'Enable or disable ANSI colors',
    apply: (o, v) => {
      o.cli = { ...o.cli, colors: v };
    },
  },
  NODESWAP_CLUSTER_OC_BINARY: {
    type: 'string',
    description: 'Path to the oc binary',
    apply: (o, v) => {
      o.cluster = { ...o.cluster, oc_binary: v };
    },
  },
  NODESWAP_CLUSTER_COMMAND_TIMEOUT_SECONDS: {
    type: 'number',
    description: 'Timeout for a single oc command in seconds',
    apply: (o, v) => {
      o.cluster = { ...o.cluster, command_timeout_seconds: v };
    },
  },
  NODESWAP_MONITOR_TIMEOUT_MINUTES: {
    type: 'number',
    description: 'Provisioning monitor timeout in minutes',
    apply: (o, v) => {
      o.monitor = { ...o.monitor, timeout_minutes: v };
    },
  },
  NODESWAP_MONITOR_CHECK_INTERVAL_SECONDS: {
    type: 'number',
    description: 'Provisioning monitor poll interval in seconds',
    apply: (o, v) => {
      o.monitor = { ...o.monitor, check_interval_seconds: v };
    },
  },
  NODESWAP_QUORUM_DISABLE_SETTLE_SECONDS: {
    type: 'number',
    description: 'Wait after disabling the etcd quorum guard in seconds',
    apply: (o, v) => {
      o.quorum = { ...o.quorum, disable_settle_seconds: v };
    },
  },
  NODESWAP_QUORUM_ENABLE_SETTLE_SECONDS: {
    type: 'number',
    description: 'Wait after re-enabling the etcd quorum guard in seconds',
    apply: (o, v) => {
      o.quorum = { ...o.quorum, enable_settle_seconds: v };
    },
  },
  NODESWAP_RESOURCES_CLAIM_CACHE_TTL_SECONDS: {
    type: 'number',
    description: 'Lifetime of the cached BareMetalHost list in seconds',
    apply: (o, v) => {
      o.resources = { ...o.resources, claim_cache_ttl_seconds: v };
    },
  },
  NODESWAP_RETRY_MAX_RETRIES: {
    type: 'number',
    description: 'Retries for transient oc failures',
    apply: (o, v) => {
      o.retry = { ...o.retry, max_retries: v };
    },
  },
  NODESWAP_RETRY_BASE_DELAY_MS: {
    type: 'number',
    description: 'Delay before the first retry in milliseconds',
    apply: (o, v) => {
      o.retry = { ...o.retry, base_delay_ms: v };
    },
  },
  NODESWAP_PATHS_BACKUP_ROOT: {
    type: 'string',
    description: 'Parent directory for backup workspaces',
    apply: (o, v) => {
      o.paths = { ...o.paths, backup_root: v };
    },
  },
};

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value is empty or not numeric.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off', case-insensitive.
 *
 * @throws EnvCoercionError if the value is not one of those.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function applyMapping(
  mapping: EnvMapping,
  overrides: PartialConfig,
  value: string,
  envVar: string
): void {
  switch (mapping.type) {
    case 'string':
      mapping.apply(overrides, value);
      return;
    case 'number':
      mapping.apply(overrides, coerceToNumber(value, envVar));
      return;
    case 'boolean':
      mapping.apply(overrides, coerceToBoolean(value, envVar));
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** Environment variables that were applied. */
  appliedVars: string[];
  /** Coercion errors, when collected instead of thrown. */
  errors: EnvCoercionError[];
}

/**
 * Reads NODESWAP_* variables into a partial configuration.
 *
 * @param env - The environment to read from.
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @throws EnvCoercionError on the first bad value unless errors are collected.
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(mapping, overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - Values that take precedence.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    cluster: { ...base.cluster, ...partial.cluster },
    monitor: { ...base.monitor, ...partial.monitor },
    quorum: { ...base.quorum, ...partial.quorum },
    resources: { ...base.resources, ...partial.resources },
    retry: { ...base.retry, ...partial.retry },
    paths: { ...base.paths, ...partial.paths },
    cli: { ...base.cli, ...partial.cli },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment to read from.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Lists every supported environment variable with its description and type.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
