/**
 * etcd membership and quorum-guard management.
 *
 * Removing a failed control-plane node means removing its etcd member first,
 * then letting the cluster run below its normal quorum while the replacement
 * provisions. The quorum guard is suspended through the etcd operator's
 * unsupported override and restored once the new member has joined.
 *
 * @packageDocumentation
 */

import { getObjects, getString, isJsonObject, parseJson } from '../cluster/json.js';
import {
  CONTROL_PLANE_NODE_SELECTOR,
  listItems,
  resourceName,
} from '../cluster/resources.js';
import type { Config } from '../config/types.js';
import type { CommandExecutor } from '../executor/types.js';
import type { Clock } from '../utils/clock.js';
import type { Logger } from '../utils/logger.js';
import type {
  ClusterHealthResult,
  EndpointHealth,
  EtcdMember,
  GuardDisableResult,
  GuardEnableResult,
  MemberRemovalResult,
  QuorumOperations,
  SecretCleanupResult,
} from './types.js';

/** Merge patch that suspends the etcd quorum guard. */
export const DISABLE_GUARD_PATCH =
  '{"spec": {"unsupportedConfigOverrides": {"useUnsupportedUnsafeNonHANonProductionUnstableEtcd": true}}}';

/** Merge patch that restores the etcd quorum guard. */
export const ENABLE_GUARD_PATCH = '{"spec": {"unsupportedConfigOverrides": null}}';

/** Command an operator runs to restore the guard by hand. */
export const ENABLE_GUARD_COMMAND = `oc patch etcd/cluster --type=merge -p '${ENABLE_GUARD_PATCH}'`;

const ETCD_CONTAINER = 'etcd';

/**
 * Wait durations for quorum operations, in milliseconds.
 */
export interface QuorumDurations {
  readonly disableSettleMs: number;
  readonly enableSettleMs: number;
  readonly memberRemovalSettleMs: number;
  readonly secretDeleteDelayMs: number;
}

export interface QuorumManagerOptions {
  readonly executor: CommandExecutor;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly etcdNamespace: string;
  readonly durations: QuorumDurations;
}

/**
 * Reads quorum wait durations from the loaded configuration.
 */
export function quorumDurationsFromConfig(config: Config): QuorumDurations {
  return {
    disableSettleMs: config.quorum.disable_settle_seconds * 1000,
    enableSettleMs: config.quorum.enable_settle_seconds * 1000,
    memberRemovalSettleMs: config.quorum.member_removal_settle_seconds * 1000,
    secretDeleteDelayMs: config.quorum.secret_delete_delay_ms,
  };
}

/**
 * Parses `etcdctl endpoint health --write-out=json` output.
 *
 * @returns Endpoints in reported order, or undefined when the output is not a JSON array.
 */
export function parseEndpointHealth(output: string): EndpointHealth[] | undefined {
  const parsed = parseJson(output);
  if (!Array.isArray(parsed)) {
    return undefined;
  }
  return parsed.filter(isJsonObject).map((entry) => ({
    endpoint: getString(entry, 'endpoint') ?? '',
    healthy: entry['health'] === true,
  }));
}

/**
 * Parses `etcdctl member list --write-out=json` output.
 *
 * Member IDs are uint64 values that overflow a double, so they are quoted
 * before decoding and converted to hex with BigInt.
 *
 * @returns Members, or undefined when the output is not a member list.
 */
export function parseMemberList(output: string): EtcdMember[] | undefined {
  const parsed = parseJson(output.replace(/"ID"\s*:\s*(\d+)/g, '"ID":"$1"'));
  if (!isJsonObject(parsed) || !Array.isArray(parsed['members'])) {
    return undefined;
  }

  const members: EtcdMember[] = [];
  for (const entry of getObjects(parsed, 'members')) {
    const id = getString(entry, 'ID');
    if (id === undefined) {
      continue;
    }
    const urls = entry['clientURLs'];
    members.push({
      id,
      hexId: BigInt(id).toString(16),
      name: getString(entry, 'name') ?? 'unknown',
      clientURLs: Array.isArray(urls)
        ? urls.filter((url): url is string => typeof url === 'string')
        : [],
    });
  }
  return members;
}

/**
 * Host part of an endpoint URL such as `https://10.0.0.3:2379`.
 */
export function endpointHost(endpoint: string): string | undefined {
  try {
    const host = new URL(endpoint).hostname;
    return host === '' ? undefined : host.replace(/^\[|\]$/g, '');
  } catch {
    return undefined;
  }
}

/**
 * Finds the member serving an endpoint, by exact client URL and then by host.
 */
export function matchMember(members: readonly EtcdMember[], endpoint: string): EtcdMember | undefined {
  const exact = members.find((member) => member.clientURLs.includes(endpoint));
  if (exact !== undefined) {
    return exact;
  }
  const host = endpointHost(endpoint);
  if (host === undefined) {
    return undefined;
  }
  return members.find((member) => member.clientURLs.some((url) => url.includes(host)));
}

function reportsNoChange(output: string): boolean {
  const lowered = output.toLowerCase();
  return lowered.includes('unchanged') || lowered.includes('no change');
}

/**
 * {@link QuorumOperations} backed by `oc` and `etcdctl` inside a healthy etcd pod.
 */
export class QuorumManager implements QuorumOperations {
  private readonly executor: CommandExecutor;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly namespace: string;
  private readonly durations: QuorumDurations;

  constructor(options: QuorumManagerOptions) {
    this.executor = options.executor;
    this.clock = options.clock;
    this.logger = options.logger;
    this.namespace = options.etcdNamespace;
    this.durations = options.durations;
  }

  /**
   * First running etcd pod whose name does not contain the pattern.
   * An empty pattern excludes nothing.
   */
  async findHealthyMember(excludePattern: string): Promise<string | null> {
    const pods = await this.executor.runJson(['get', 'pods', '-n', this.namespace, '-l', 'app=etcd']);
    if (pods === null) {
      return null;
    }

    for (const pod of listItems(pods)) {
      const name = resourceName(pod);
      if (name === undefined || getString(pod, 'status', 'phase') !== 'Running') {
        continue;
      }
      if (excludePattern !== '' && name.includes(excludePattern)) {
        continue;
      }
      this.logger.debug('healthy_member_selected', { pod: name });
      return name;
    }
    return null;
  }

  async removeFailedMember(
    excludeNodeNamePattern: string,
    signal?: AbortSignal
  ): Promise<MemberRemovalResult> {
    const pod = await this.findHealthyMember(excludeNodeNamePattern);
    if (pod === null) {
      return { kind: 'failed', reason: 'No healthy etcd pods available' };
    }

    const endpoints = await this.readEndpointHealth(pod);
    if (endpoints === undefined) {
      return { kind: 'failed', reason: `Could not read endpoint health from ${pod}` };
    }

    const failed = endpoints.find((endpoint) => !endpoint.healthy);
    if (failed === undefined) {
      this.logger.info('no_failed_member', { pod, endpoints: endpoints.length });
      return { kind: 'no-failed-member', healthyMember: pod };
    }

    const listOutput = await this.etcdctl(pod, ['member', 'list']);
    const members = listOutput === null ? undefined : parseMemberList(listOutput);
    if (members === undefined) {
      return { kind: 'failed', reason: `Could not read etcd member list from ${pod}` };
    }

    const member = matchMember(members, failed.endpoint);
    if (member === undefined) {
      this.logger.warn('failed_member_not_found', {
        endpoint: failed.endpoint,
        members: members.map((m) => ({ name: m.name, clientURLs: m.clientURLs })),
      });
      return { kind: 'member-not-found', failedEndpoint: failed.endpoint };
    }

    const removeOutput = await this.etcdctl(pod, ['member', 'remove', member.hexId]);
    const remaining = removeOutput === null ? undefined : parseMemberList(removeOutput);
    if (remaining === undefined) {
      return {
        kind: 'failed',
        reason: `Removal of etcd member ${member.name} (${member.hexId}) did not complete`,
      };
    }

    const stillListed = remaining.some((m) => m.id === member.id);
    if (stillListed) {
      this.logger.error('member_still_listed', { memberId: member.hexId, name: member.name });
    } else {
      this.logger.info('member_removed', {
        memberId: member.hexId,
        name: member.name,
        remaining: remaining.length,
      });
    }

    await this.clock.sleep(this.durations.memberRemovalSettleMs, signal);

    return {
      kind: 'removed',
      removedMemberId: member.hexId,
      memberName: member.name,
      failedEndpoint: failed.endpoint,
      remainingMemberCount: remaining.length,
      stillListed,
    };
  }

  async disableQuorumGuard(signal?: AbortSignal): Promise<GuardDisableResult> {
    const output = await this.patchEtcd(DISABLE_GUARD_PATCH);
    if (output === null) {
      return { kind: 'failed', reason: 'Failed to patch etcd/cluster to disable the quorum guard' };
    }
    if (reportsNoChange(output)) {
      this.logger.info('quorum_guard_already_disabled');
      return { kind: 'already-disabled' };
    }

    this.logger.info('quorum_guard_disabled', { settleMs: this.durations.disableSettleMs });
    await this.clock.sleep(this.durations.disableSettleMs, signal);
    return { kind: 'disabled', waitedMs: this.durations.disableSettleMs };
  }

  async enableQuorumGuard(signal?: AbortSignal): Promise<GuardEnableResult> {
    const output = await this.patchEtcd(ENABLE_GUARD_PATCH);
    if (output === null) {
      return { kind: 'failed', reason: 'Failed to patch etcd/cluster to re-enable the quorum guard' };
    }

    this.logger.info('quorum_guard_enabled', { settleMs: this.durations.enableSettleMs });
    await this.clock.sleep(this.durations.enableSettleMs, signal);
    return { kind: 'enabled', waitedMs: this.durations.enableSettleMs };
  }

  /**
   * Deletes the etcd secrets of a failed node.
   *
   * @param failedNodeIdentifier - Full or partial node name.
   */
  async cleanupMemberSecrets(
    failedNodeIdentifier: string,
    signal?: AbortSignal
  ): Promise<SecretCleanupResult> {
    const nodes = await this.executor.runJson(['get', 'nodes', '-l', CONTROL_PLANE_NODE_SELECTOR]);
    const matched = listItems(nodes)
      .map((node) => resourceName(node))
      .find((name): name is string => name !== undefined && name.includes(failedNodeIdentifier));
    const resolvedNodeName = matched ?? failedNodeIdentifier;
    if (matched === undefined) {
      this.logger.warn('failed_node_unresolved', { identifier: failedNodeIdentifier });
    }

    const secrets = await this.executor.runJson(['get', 'secrets', '-n', this.namespace]);
    if (secrets === null) {
      return {
        resolvedNodeName,
        nodeMatched: matched !== undefined,
        deletedSecrets: [],
        failedSecrets: [],
        listFailed: true,
      };
    }

    const targets = listItems(secrets)
      .map((secret) => resourceName(secret))
      .filter((name): name is string => name !== undefined && name.includes(resolvedNodeName));

    const deletedSecrets: string[] = [];
    const failedSecrets: string[] = [];
    for (const [index, name] of targets.entries()) {
      if (index > 0) {
        await this.clock.sleep(this.durations.secretDeleteDelayMs, signal);
      }
      const result = await this.executor.run(['delete', 'secret', name, '-n', this.namespace]);
      if (result === null) {
        this.logger.warn('secret_delete_failed', { secret: name });
        failedSecrets.push(name);
      } else {
        deletedSecrets.push(name);
      }
    }

    this.logger.info('member_secrets_cleaned', {
      node: resolvedNodeName,
      deleted: deletedSecrets.length,
      failed: failedSecrets.length,
    });
    return {
      resolvedNodeName,
      nodeMatched: matched !== undefined,
      deletedSecrets,
      failedSecrets,
      listFailed: false,
    };
  }

  async checkClusterHealth(): Promise<ClusterHealthResult> {
    const pod = await this.findHealthyMember('');
    if (pod === null) {
      return { kind: 'failed', reason: 'No healthy etcd pods available' };
    }
    const endpoints = await this.readEndpointHealth(pod);
    if (endpoints === undefined) {
      return { kind: 'failed', reason: `Could not read endpoint health from ${pod}` };
    }
    return {
      kind: 'healthy',
      healthyMember: pod,
      endpoints,
      unhealthyEndpoints: endpoints.filter((e) => !e.healthy).map((e) => e.endpoint),
    };
  }

  private async readEndpointHealth(pod: string): Promise<EndpointHealth[] | undefined> {
    const output = await this.etcdctl(pod, ['endpoint', 'health']);
    if (output === null) {
      return undefined;
    }
    const endpoints = parseEndpointHealth(output);
    if (endpoints === undefined) {
      this.logger.error('endpoint_health_unparsable', { pod, preview: output.slice(0, 200) });
    }
    return endpoints;
  }

  private etcdctl(pod: string, args: readonly string[]): Promise<string | null> {
    return this.executor.execIn(
      pod,
      ['etcdctl', ...args, '--write-out=json'],
      this.namespace,
      ETCD_CONTAINER
    );
  }

  private patchEtcd(patch: string): Promise<string | null> {
    return this.executor.run(['patch', 'etcd/cluster', '--type=merge', '-p', patch]);
  }
}
