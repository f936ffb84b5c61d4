/**
 * Application wiring for the nodeswap CLI.
 *
 * Loads configuration, builds the components an operation needs and runs
 * the orchestrator.
 */

import { homedir } from 'node:os';
import * as path from 'node:path';
import {
  ConfigParseError,
  applyEnvOverrides,
  assertConfigValid,
  getDefaultConfig,
  parseConfig,
  type Config,
  type EnvRecord,
} from '../config/index.js';
import { OcExecutor, type CommandExecutor } from '../executor/index.js';
import { prepareWorkspace } from '../materialize/workspace.js';
import { NodeMaterializer } from '../materialize/materializer.js';
import {
  Orchestrator,
  orchestratorSettingsFromConfig,
  type OrchestratorDependencies,
} from '../orchestrator/orchestrator.js';
import type { OperationRequest } from '../orchestrator/plan.js';
import type { OperationReport } from '../orchestrator/report.js';
import { ProvisioningMonitor, monitorSettingsFromConfig } from '../provisioning/monitor.js';
import { QuorumManager, quorumDurationsFromConfig } from '../quorum/quorum-manager.js';
import type { Reporter } from '../reporting/types.js';
import { ClaimCache } from '../resources/claim-cache.js';
import { ConflictResolver } from '../resources/conflict-resolver.js';
import { ResourceManager, resourceDurationsFromConfig } from '../resources/resource-manager.js';
import { SystemClock, type Clock } from '../utils/clock.js';
import { Logger } from '../utils/logger.js';
import { safeExists, safeReadFile } from '../utils/safe-fs.js';
import { EXIT_CODES, type CliCommandResult } from './types.js';

/** Config file looked for in the working directory. */
export const DEFAULT_CONFIG_FILE = 'nodeswap.toml';

export interface LoadConfigOptions {
  /** Explicit file, which must exist. */
  configPath?: string;
  cwd?: string;
  env?: EnvRecord;
  /** Turns debug logging on regardless of the file and environment. */
  debug?: boolean;
}

export interface LoadedConfig {
  config: Config;
  /** File the values came from; undefined when only defaults applied. */
  source?: string;
}

/**
 * Loads configuration with the precedence flag > env > file > defaults.
 *
 * @throws {ConfigParseError} When an explicit file is missing or any file is malformed.
 * @throws {ConfigValidationError} When values are out of range.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath !== undefined;
  const configPath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);

  let config = getDefaultConfig();
  let source: string | undefined;

  if (await safeExists(configPath)) {
    config = parseConfig(await safeReadFile(configPath));
    source = configPath;
  } else if (explicit) {
    throw new ConfigParseError(`Config file not found: ${configPath}`);
  }

  config = applyEnvOverrides(config, options.env ?? process.env);
  if (options.debug === true) {
    config = { ...config, cli: { ...config.cli, debug: true } };
  }
  assertConfigValid(config);

  return source === undefined ? { config } : { config, source };
}

export interface DependencyOverrides {
  /** Replaces the `oc` executor. */
  executor?: CommandExecutor;
  clock?: Clock;
  homeDir?: string;
}

/**
 * Builds every component an operation talks to from the configuration.
 */
export function createDependencies(
  config: Config,
  reporter: Reporter,
  overrides: DependencyOverrides = {}
): OrchestratorDependencies {
  const clock = overrides.clock ?? new SystemClock();
  const logger = new Logger({ component: 'nodeswap', debugMode: config.cli.debug });
  const namespace = config.cluster.machine_api_namespace;

  const executor =
    overrides.executor ??
    new OcExecutor({
      binary: config.cluster.oc_binary,
      timeoutMs: config.cluster.command_timeout_seconds * 1000,
      retry: {
        maxRetries: config.retry.max_retries,
        baseDelayMs: config.retry.base_delay_ms,
        backoffMultiplier: config.retry.backoff_multiplier,
        maxDelayMs: config.retry.max_delay_ms,
      },
      clock,
      logger: logger.child('OcExecutor'),
      onRetry: (command, info) => {
        reporter.warn(
          `Retrying '${command}' (attempt ${String(info.attempt)}/${String(info.totalAttempts)}) in ${String(Math.round(info.delayMs / 1000))}s`
        );
      },
    });

  const claims = new ClaimCache({
    executor,
    clock,
    logger: logger.child('ClaimCache'),
    namespace,
    ttlMs: config.resources.claim_cache_ttl_seconds * 1000,
  });
  const resources = new ResourceManager({
    executor,
    clock,
    logger: logger.child('ResourceManager'),
    claims,
    namespace,
    durations: resourceDurationsFromConfig(config),
  });
  const homeDir = overrides.homeDir ?? homedir();

  return {
    quorum: new QuorumManager({
      executor,
      clock,
      logger: logger.child('QuorumManager'),
      etcdNamespace: config.cluster.etcd_namespace,
      durations: quorumDurationsFromConfig(config),
    }),
    resources,
    conflicts: new ConflictResolver({ resources, logger: logger.child('ConflictResolver') }),
    materializer: new NodeMaterializer({ resources, logger: logger.child('NodeMaterializer') }),
    monitor: new ProvisioningMonitor({
      executor,
      clock,
      logger: logger.child('ProvisioningMonitor'),
      reporter,
      settings: monitorSettingsFromConfig(config),
    }),
    prepareWorkspace: (backupDir?: string) =>
      prepareWorkspace({
        executor,
        logger: logger.child('Workspace'),
        backupRoot: config.paths.backup_root,
        homeDir,
        ...(backupDir === undefined ? {} : { backupDir }),
      }),
    clock,
    logger: logger.child('Orchestrator'),
    reporter,
    settings: orchestratorSettingsFromConfig(config),
  };
}

/**
 * Exit code for a finished operation.
 */
export function exitCodeFor(report: OperationReport): number {
  if (report.kind === 'succeeded') {
    return EXIT_CODES.success;
  }
  return report.interrupted ? EXIT_CODES.interrupted : EXIT_CODES.failure;
}

/**
 * Runs one operation end to end.
 *
 * @param signal - Aborted on SIGINT; the run ends with exit code 130.
 */
export async function runOperation(
  request: OperationRequest,
  config: Config,
  reporter: Reporter,
  overrides: DependencyOverrides = {},
  signal?: AbortSignal
): Promise<CliCommandResult> {
  const orchestrator = new Orchestrator(createDependencies(config, reporter, overrides));
  const report = await orchestrator.run(request, signal);
  return { exitCode: exitCodeFor(report) };
}
