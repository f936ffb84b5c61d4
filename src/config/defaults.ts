/**
 * Default configuration values for nodeswap.toml.
 *
 * @packageDocumentation
 */

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

export const DEFAULT_CLUSTER: ClusterConfig = {
  oc_binary: 'oc',
  machine_api_namespace: 'openshift-machine-api',
  etcd_namespace: 'openshift-etcd',
  command_timeout_seconds: 120,
};

/**
 * Default monitor timing: 45 minute budget polled every 25 seconds, CSR
 * approval after 10 minutes or 3 minutes when the machine looks stuck.
 */
export const DEFAULT_MONITOR: MonitorConfig = {
  timeout_minutes: 45,
  check_interval_seconds: 25,
  csr_check_delay_minutes: 10,
  csr_early_check_minutes: 3,
  csr_approval_delay_seconds: 3,
};

export const DEFAULT_QUORUM: QuorumConfig = {
  disable_settle_seconds: 120,
  enable_settle_seconds: 60,
  member_removal_settle_seconds: 3,
  secret_delete_delay_ms: 500,
};

export const DEFAULT_RESOURCES: ResourcesConfig = {
  claim_cache_ttl_seconds: 300,
  deletion_timeout_seconds: 120,
  deletion_poll_seconds: 5,
  delete_settle_seconds: 1,
  drain_timeout_seconds: 300,
};

/**
 * Default retry policy: three retries growing by 1.5x from two seconds.
 */
export const DEFAULT_RETRY: RetrySettingsConfig = {
  max_retries: 3,
  base_delay_ms: 2000,
  backoff_multiplier: 1.5,
  max_delay_ms: 30000,
};

export const DEFAULT_PATHS: PathConfig = {
  backup_root: '',
};

export const DEFAULT_CLI_CONFIG: CliSettingsConfig = {
  colors: true,
  unicode: true,
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  cluster: DEFAULT_CLUSTER,
  monitor: DEFAULT_MONITOR,
  quorum: DEFAULT_QUORUM,
  resources: DEFAULT_RESOURCES,
  retry: DEFAULT_RETRY,
  paths: DEFAULT_PATHS,
  cli: DEFAULT_CLI_CONFIG,
};
