/**
 * Configuration module for nodeswap.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  CliSettingsConfig,
  ClusterConfig,
  Config,
  MonitorConfig,
  PartialConfig,
  PathConfig,
  QuorumConfig,
  ResourcesConfig,
  RetrySettingsConfig,
} from './types.js';
export {
  DEFAULT_CLI_CONFIG,
  DEFAULT_CLUSTER,
  DEFAULT_CONFIG,
  DEFAULT_MONITOR,
  DEFAULT_PATHS,
  DEFAULT_QUORUM,
  DEFAULT_RESOURCES,
  DEFAULT_RETRY,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
