/**
 * BareMetalHost, Machine and MachineSet lifecycle.
 *
 * @packageDocumentation
 */

import { getNumber, type JsonObject } from '../cluster/json.js';
import {
  CONTROL_PLANE_NODE_SELECTOR,
  WORKER_MACHINESET_SELECTOR,
  hostConsumerMachine,
  isNodeReady,
  listItems,
  machineOwningSet,
  resourceName,
} from '../cluster/resources.js';
import type { Config } from '../config/types.js';
import type { CommandExecutor } from '../executor/types.js';
import type { Clock } from '../utils/clock.js';
import type { Logger } from '../utils/logger.js';
import { resolveWithin } from '../utils/safe-fs.js';
import type { ResourceBackupSet } from './backup-set.js';
import type { ClaimCache, ClaimListOptions } from './claim-cache.js';
import { extractClaimFields, extractMachineFields, writeManifest } from './manifest.js';
import {
  APPLY_ORDER,
  type ApplyResult,
  type FailedNodeBackupResult,
  type ResourceKind,
  type ScaleResult,
  type StepCallback,
} from './types.js';

/** Annotation telling a MachineSet which Machine to remove when scaled down. */
export const DELETE_MACHINE_ANNOTATION = 'machine.openshift.io/delete-machine';

/** Extra time the `oc` process gets beyond the drain's own timeout. */
const DRAIN_GRACE_MS = 30_000;

/** Backup file of a removed BareMetalHost. */
export function removedClaimFile(claimName: string): string {
  return `${claimName}_bmh.backup.yaml`;
}

/** Backup file of a removed Machine. */
export function removedMachineFile(machineName: string): string {
  return `${machineName}_machine.backup.yaml`;
}

/**
 * Resource wait durations, in milliseconds.
 */
export interface ResourceDurations {
  readonly deleteSettleMs: number;
  readonly deletionPollMs: number;
  readonly deletionTimeoutMs: number;
  readonly drainTimeoutMs: number;
}

export function resourceDurationsFromConfig(config: Config): ResourceDurations {
  return {
    deleteSettleMs: config.resources.delete_settle_seconds * 1000,
    deletionPollMs: config.resources.deletion_poll_seconds * 1000,
    deletionTimeoutMs: config.resources.deletion_timeout_seconds * 1000,
    drainTimeoutMs: config.resources.drain_timeout_seconds * 1000,
  };
}

export interface ResourceManagerOptions {
  readonly executor: CommandExecutor;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly claims: ClaimCache;
  readonly namespace: string;
  readonly durations: ResourceDurations;
}

export interface FailedNodeBackupOptions {
  /** Workspace the backups are written to. */
  readonly backupDir: string;
  readonly onStep?: StepCallback;
  readonly signal?: AbortSignal;
}

/**
 * Resources whose disappearance {@link ResourceManager.verifyResourcesDeleted} waits for.
 */
export interface DeletionTargets {
  readonly machineName?: string;
  readonly claimName?: string;
}

/**
 * Reads and mutates a node's cluster resources in the machine API namespace.
 */
export class ResourceManager {
  private readonly executor: CommandExecutor;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly claims: ClaimCache;
  private readonly namespace: string;
  private readonly durations: ResourceDurations;

  constructor(options: ResourceManagerOptions) {
    this.executor = options.executor;
    this.clock = options.clock;
    this.logger = options.logger;
    this.claims = options.claims;
    this.namespace = options.namespace;
    this.durations = options.durations;
  }

  /**
   * First cached BareMetalHost whose name contains the pattern.
   */
  async findClaim(pattern: string, options: ClaimListOptions = {}): Promise<JsonObject | undefined> {
    const hosts = await this.claims.list(options);
    return hosts.find((host) => resourceName(host)?.includes(pattern) === true);
  }

  /** Cached BareMetalHost list. */
  listClaims(options: ClaimListOptions = {}): Promise<readonly JsonObject[]> {
    return this.claims.list(options);
  }

  getClaim(name: string): Promise<JsonObject | null> {
    return this.executor.runJson(['get', 'bmh', name, '-n', this.namespace]);
  }

  getMachine(name: string): Promise<JsonObject | null> {
    return this.executor.runJson(['get', 'machine', name, '-n', this.namespace]);
  }

  getNode(name: string): Promise<JsonObject | null> {
    return this.executor.runJson(['get', 'node', name]);
  }

  getSecret(name: string): Promise<JsonObject | null> {
    return this.executor.runJson(['get', 'secret', name, '-n', this.namespace]);
  }

  listMachines(): Promise<JsonObject | null> {
    return this.executor.runJson(['get', 'machines', '-n', this.namespace]);
  }

  /**
   * Locates the failed node's BareMetalHost and Machine, writes their
   * stable fields to the workspace and deletes both.
   *
   * The backups take a `.backup.yaml` suffix, so a replacement that reuses
   * the failed node's name does not overwrite them with its own files.
   *
   * @param pattern - Failed node name or a substring of its host name.
   */
  async findAndBackupFailedNode(
    pattern: string,
    options: FailedNodeBackupOptions
  ): Promise<FailedNodeBackupResult> {
    options.onStep?.('Locating failed node resources');
    const claim = await this.findClaim(pattern);
    const claimName = resourceName(claim);
    if (claim === undefined || claimName === undefined) {
      return { kind: 'failed', stage: 'locate', reason: `No BMH found matching '${pattern}'` };
    }
    const machineName = hostConsumerMachine(claim);
    if (machineName === undefined) {
      return {
        kind: 'failed',
        stage: 'locate',
        reason: `BMH ${claimName} does not have a consumer machine reference`,
      };
    }

    options.onStep?.('Backing up failed node resources');
    const machine = await this.getMachine(machineName);
    if (machine === null) {
      return { kind: 'failed', stage: 'backup', reason: `Could not read machine ${machineName}` };
    }
    let claimBackupPath: string;
    let machineBackupPath: string;
    try {
      claimBackupPath = resolveWithin(options.backupDir, removedClaimFile(claimName));
      machineBackupPath = resolveWithin(options.backupDir, removedMachineFile(machineName));
      await writeManifest(claimBackupPath, extractClaimFields(claim));
      await writeManifest(machineBackupPath, extractMachineFields(machine));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { kind: 'failed', stage: 'backup', reason: `Backup failed: ${message}` };
    }
    this.logger.info('failed_node_backed_up', { claimBackupPath, machineBackupPath });

    options.onStep?.('Removing failed node resources');
    if (!(await this.deleteMachine(machineName))) {
      return { kind: 'failed', stage: 'remove', reason: `Failed to delete machine ${machineName}` };
    }
    if (!(await this.deleteClaim(claimName))) {
      return { kind: 'failed', stage: 'remove', reason: `Failed to delete BMH ${claimName}` };
    }
    await this.clock.sleep(this.durations.deleteSettleMs, options.signal);

    return { kind: 'removed', claimName, machineName, claimBackupPath, machineBackupPath };
  }

  /**
   * MachineSet owning a Machine, from its owner references.
   */
  async resolveOwningPool(machineName: string): Promise<string | undefined> {
    const machine = await this.getMachine(machineName);
    return machine === null ? undefined : machineOwningSet(machine);
  }

  /**
   * Scales a MachineSet by one replica. Scaling down at zero issues no command.
   *
   * @param direction - `up` or `down`; anything else is reported, not thrown.
   */
  async scalePool(poolName: string, direction: string): Promise<ScaleResult> {
    if (direction !== 'up' && direction !== 'down') {
      return { kind: 'invalid-direction', direction };
    }

    const pool = await this.executor.runJson(['get', 'machineset', poolName, '-n', this.namespace]);
    if (pool === null) {
      return { kind: 'failed', reason: `Could not read MachineSet ${poolName}` };
    }

    const from = getNumber(pool, 'spec', 'replicas') ?? 0;
    if (direction === 'down' && from === 0) {
      this.logger.info('pool_already_at_floor', { pool: poolName });
      return { kind: 'already-at-floor' };
    }

    const to = direction === 'up' ? from + 1 : from - 1;
    const output = await this.executor.run([
      'scale',
      'machineset',
      poolName,
      '-n',
      this.namespace,
      `--replicas=${String(to)}`,
    ]);
    if (output === null) {
      return { kind: 'failed', reason: `Failed to scale MachineSet ${poolName} to ${String(to)}` };
    }

    this.logger.info('pool_scaled', { pool: poolName, from, to });
    return { kind: 'scaled', from, to };
  }

  /**
   * First MachineSet labelled with the worker role.
   */
  async findWorkerPool(): Promise<string | undefined> {
    const pools = await this.executor.runJson([
      'get',
      'machineset',
      '-n',
      this.namespace,
      '-l',
      WORKER_MACHINESET_SELECTOR,
    ]);
    for (const pool of listItems(pools)) {
      const name = resourceName(pool);
      if (name !== undefined) {
        return name;
      }
    }
    return undefined;
  }

  /**
   * Applies a backup set in dependency order, stopping at the first failure.
   *
   * @param isPoolAddition - The MachineSet creates the Machine, so none is applied.
   */
  async applyMaterializedResources(
    resources: ResourceBackupSet,
    isPoolAddition: boolean
  ): Promise<ApplyResult> {
    const applied: ResourceKind[] = [];
    for (const kind of APPLY_ORDER) {
      if (kind === 'compute-machine' && isPoolAddition) {
        continue;
      }
      const path = resources.get(kind);
      if (path === undefined) {
        continue;
      }
      const output = await this.executor.run(['apply', '-f', path]);
      if (output === null) {
        this.logger.error('apply_failed', { kind, path });
        return { kind: 'failed', resourceKind: kind, path };
      }
      this.logger.info('resource_applied', { kind, path });
      applied.push(kind);
    }
    this.claims.invalidate();
    return { kind: 'applied', kinds: applied };
  }

  /**
   * First control-plane node whose Ready condition is not `True`.
   */
  async findFailedControlPlaneNode(): Promise<string | undefined> {
    const nodes = await this.executor.runJson(['get', 'nodes', '-l', CONTROL_PLANE_NODE_SELECTOR]);
    for (const node of listItems(nodes)) {
      const name = resourceName(node);
      if (name !== undefined && !isNodeReady(node)) {
        return name;
      }
    }
    return undefined;
  }

  /**
   * Name of a control-plane node that is Ready.
   */
  async findReadyControlPlaneNode(): Promise<string | undefined> {
    const nodes = await this.executor.runJson(['get', 'nodes', '-l', CONTROL_PLANE_NODE_SELECTOR]);
    for (const node of listItems(nodes)) {
      const name = resourceName(node);
      if (name !== undefined && isNodeReady(node)) {
        return name;
      }
    }
    return undefined;
  }

  async cordonNode(nodeName: string): Promise<boolean> {
    return (await this.executor.run(['adm', 'cordon', nodeName])) !== null;
  }

  async drainNode(nodeName: string): Promise<boolean> {
    const seconds = Math.ceil(this.durations.drainTimeoutMs / 1000);
    const output = await this.executor.run(
      [
        'adm',
        'drain',
        nodeName,
        '--ignore-daemonsets',
        '--delete-emptydir-data',
        '--force',
        `--timeout=${String(seconds)}s`,
      ],
      { timeoutMs: this.durations.drainTimeoutMs + DRAIN_GRACE_MS }
    );
    return output !== null;
  }

  async annotateForDeletion(machineName: string): Promise<boolean> {
    const output = await this.executor.run([
      'annotate',
      'machine',
      machineName,
      '-n',
      this.namespace,
      `${DELETE_MACHINE_ANNOTATION}=true`,
      '--overwrite',
    ]);
    return output !== null;
  }

  async deleteMachine(machineName: string): Promise<boolean> {
    const output = await this.executor.run(['delete', 'machine', machineName, '-n', this.namespace]);
    if (output === null) {
      this.logger.error('machine_delete_failed', { machine: machineName });
    }
    return output !== null;
  }

  async deleteClaim(claimName: string): Promise<boolean> {
    const output = await this.executor.run(['delete', 'bmh', claimName, '-n', this.namespace]);
    if (output === null) {
      this.logger.error('claim_delete_failed', { claim: claimName });
    } else {
      this.claims.invalidate();
    }
    return output !== null;
  }

  /**
   * Polls until the named resources no longer exist.
   *
   * @returns Whether they were gone before the deletion timeout.
   */
  async verifyResourcesDeleted(targets: DeletionTargets, signal?: AbortSignal): Promise<boolean> {
    const start = this.clock.now();
    for (;;) {
      const remaining: string[] = [];
      if (targets.machineName !== undefined && (await this.getMachine(targets.machineName)) !== null) {
        remaining.push(`machine/${targets.machineName}`);
      }
      if (targets.claimName !== undefined && (await this.getClaim(targets.claimName)) !== null) {
        remaining.push(`bmh/${targets.claimName}`);
      }
      if (remaining.length === 0) {
        return true;
      }
      if (this.clock.now() - start >= this.durations.deletionTimeoutMs) {
        this.logger.warn('deletion_unverified', { remaining });
        return false;
      }
      await this.clock.sleep(this.durations.deletionPollMs, signal);
    }
  }
}
