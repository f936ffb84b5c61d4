/**
 * Configuration types for nodeswap.toml parsing.
 *
 * Field names mirror the TOML keys, so they stay snake_case.
 *
 * @packageDocumentation
 */

/**
 * How the `oc` client is invoked and which namespaces it targets.
 */
export interface ClusterConfig {
  /** Path or name of the `oc` binary. */
  oc_binary: string;
  /** Namespace holding BareMetalHosts, Machines, MachineSets and node secrets. */
  machine_api_namespace: string;
  /** Namespace holding etcd pods and member secrets. */
  etcd_namespace: string;
  /** Per-invocation timeout for a single `oc` command. */
  command_timeout_seconds: number;
}

/**
 * Provisioning monitor timing.
 */
export interface MonitorConfig {
  /** Global timeout for driving a node to Ready. */
  timeout_minutes: number;
  /** Sleep between monitor loop iterations. */
  check_interval_seconds: number;
  /** Time after machine resolution when CSR approval always starts. */
  csr_check_delay_minutes: number;
  /** Earlier CSR activation when the machine is still in its Provisioning phase. */
  csr_early_check_minutes: number;
  /** Pause after each CSR approval. */
  csr_approval_delay_seconds: number;
}

/**
 * etcd settle times. These waits guard against proceeding before the
 * store has adjusted to a membership or quorum change.
 */
export interface QuorumConfig {
  /** Wait after disabling the quorum guard. */
  disable_settle_seconds: number;
  /** Wait after re-enabling the quorum guard. */
  enable_settle_seconds: number;
  /** Wait after removing a member. */
  member_removal_settle_seconds: number;
  /** Gap between consecutive secret deletions. */
  secret_delete_delay_ms: number;
}

/**
 * Resource lifecycle timing.
 */
export interface ResourcesConfig {
  /** Lifetime of the cached BareMetalHost list. */
  claim_cache_ttl_seconds: number;
  /** Upper bound when polling for deleted resources to disappear. */
  deletion_timeout_seconds: number;
  /** Poll interval while waiting for deletions. */
  deletion_poll_seconds: number;
  /** Pause after deleting a failed node's machine and host. */
  delete_settle_seconds: number;
  /** Timeout handed to `oc adm drain`. */
  drain_timeout_seconds: number;
}

/**
 * Retry policy for transient `oc` failures.
 */
export interface RetrySettingsConfig {
  /** Retries after the first attempt. */
  max_retries: number;
  /** Delay before the first retry. */
  base_delay_ms: number;
  /** Growth factor applied to the delay for each further retry. */
  backoff_multiplier: number;
  /** Ceiling on any single delay. */
  max_delay_ms: number;
}

/**
 * Filesystem locations.
 */
export interface PathConfig {
  /**
   * Parent directory for per-cluster backup workspaces. Empty means
   * `~/backup_yamls`.
   */
  backup_root: string;
}

/**
 * CLI configuration for terminal behavior.
 */
export interface CliSettingsConfig {
  /** Whether to use ANSI colors in output. */
  colors: boolean;
  /** Whether to use Unicode box-drawing characters. */
  unicode: boolean;
  /** Whether debug-level log entries are written. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from nodeswap.toml.
 */
export interface Config {
  cluster: ClusterConfig;
  monitor: MonitorConfig;
  quorum: QuorumConfig;
  resources: ResourcesConfig;
  retry: RetrySettingsConfig;
  paths: PathConfig;
  cli: CliSettingsConfig;
}

/**
 * Partial configuration for merging with defaults.
 */
export interface PartialConfig {
  cluster?: Partial<ClusterConfig>;
  monitor?: Partial<MonitorConfig>;
  quorum?: Partial<QuorumConfig>;
  resources?: Partial<ResourcesConfig>;
  retry?: Partial<RetrySettingsConfig>;
  paths?: Partial<PathConfig>;
  cli?: Partial<CliSettingsConfig>;
}
