/**
 * Detects and removes a running node that already uses the MAC address of
 * the node about to be provisioned.
 *
 * @packageDocumentation
 */

import { hostConsumerMachine, hostMacAddresses, machineNodeName, resourceName } from '../cluster/resources.js';
import type { Logger } from '../utils/logger.js';
import type { ResourceManager } from './resource-manager.js';
import type { ConflictResolution, MacConflict, StepCallback } from './types.js';

/** Plan steps a conflict adds to an operation. */
export const CONFLICT_STEPS = 3;

export interface ConflictResolverOptions {
  readonly resources: ResourceManager;
  readonly logger: Logger;
}

export class ConflictResolver {
  private readonly resources: ResourceManager;
  private readonly logger: Logger;

  constructor(options: ConflictResolverOptions) {
    this.resources = options.resources;
    this.logger = options.logger;
  }

  /**
   * Finds a host with the MAC whose Machine has already become a node, and
   * checks whether that node still exists.
   *
   * @param mac - Compared case-insensitively against boot and inspected NIC addresses.
   */
  async detect(mac: string): Promise<MacConflict | undefined> {
    const wanted = mac.toLowerCase();
    const hosts = await this.resources.listClaims({ forceRefresh: true });

    for (const host of hosts) {
      const claimName = resourceName(host);
      if (claimName === undefined || !hostMacAddresses(host).includes(wanted)) {
        continue;
      }
      const machineName = hostConsumerMachine(host);
      if (machineName === undefined) {
        continue;
      }
      const machine = await this.resources.getMachine(machineName);
      const nodeName = machineNodeName(machine);
      if (nodeName === undefined) {
        continue;
      }
      const nodePresent = (await this.resources.getNode(nodeName)) !== null;
      this.logger.warn('mac_conflict_detected', { mac: wanted, claimName, machineName, nodeName, nodePresent });
      return { claimName, machineName, nodeName, nodePresent };
    }
    return undefined;
  }

  /**
   * Cordons, drains and removes the conflicting node, reporting each of the
   * {@link CONFLICT_STEPS} steps through `onStep`. When the node is already
   * gone, cordon and drain are reported as skipped and `drained` is false.
   */
  async resolve(
    conflict: MacConflict,
    onStep: StepCallback,
    signal?: AbortSignal
  ): Promise<ConflictResolution> {
    const { claimName, machineName, nodeName } = conflict;

    let drained = false;
    if (conflict.nodePresent) {
      onStep(`Cordoning existing node ${nodeName}`);
      if (!(await this.resources.cordonNode(nodeName))) {
        return { kind: 'failed', reason: `Failed to cordon node ${nodeName}` };
      }

      onStep(`Draining existing node ${nodeName}`);
      drained = await this.resources.drainNode(nodeName);
      if (!drained) {
        this.logger.warn('drain_failed', { node: nodeName });
      }
    } else {
      onStep(`Skipping cordon: node ${nodeName} no longer exists`);
      onStep(`Skipping drain: node ${nodeName} no longer exists`);
    }

    onStep(`Removing existing machine ${machineName} and BMH ${claimName}`);
    let scaledPool: string | undefined;
    const pool = await this.resources.resolveOwningPool(machineName);
    if (pool !== undefined) {
      if (!(await this.resources.annotateForDeletion(machineName))) {
        this.logger.warn('delete_annotation_failed', { machine: machineName });
      }
      const scale = await this.resources.scalePool(pool, 'down');
      if (scale.kind === 'scaled') {
        scaledPool = pool;
      } else {
        this.logger.warn('conflict_pool_not_scaled', { pool, result: scale.kind });
      }
    }

    if (!(await this.resources.deleteMachine(machineName))) {
      return { kind: 'failed', reason: `Failed to delete machine ${machineName}` };
    }
    if (!(await this.resources.deleteClaim(claimName))) {
      return { kind: 'failed', reason: `Failed to delete BMH ${claimName}` };
    }

    const deletionVerified = await this.resources.verifyResourcesDeleted(
      { machineName, claimName },
      signal
    );

    return scaledPool === undefined
      ? { kind: 'resolved', drained, deletionVerified }
      : { kind: 'resolved', drained, scaledPool, deletionVerified };
  }
}
