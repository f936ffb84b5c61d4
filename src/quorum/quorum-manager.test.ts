/**
 * Tests for QuorumManager.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FakeClock } from '../testing/fake-clock.js';
import { FakeExecutor } from '../testing/fake-executor.js';
import { Logger } from '../utils/logger.js';
import {
  DISABLE_GUARD_PATCH,
  ENABLE_GUARD_PATCH,
  QuorumManager,
  endpointHost,
  matchMember,
  parseEndpointHealth,
  parseMemberList,
} from './quorum-manager.js';

const NS = 'openshift-etcd';

const PODS = {
  items: [
    { metadata: { name: 'etcd-master-0' }, status: { phase: 'Running' } },
    { metadata: { name: 'etcd-master-1' }, status: { phase: 'Pending' } },
    { metadata: { name: 'etcd-master-2' }, status: { phase: 'Running' } },
  ],
};

const HEALTH_ONE_DOWN = JSON.stringify([
  { endpoint: 'https://192.168.10.20:2379', health: true },
  { endpoint: 'https://192.168.10.21:2379', health: false },
  { endpoint: 'https://192.168.10.22:2379', health: true },
]);

const MEMBER_LIST = `{"header":{"cluster_id":1},"members":[
  {"ID":12345678901234567890,"name":"master-0","clientURLs":["https://192.168.10.20:2379"]},
  {"ID":9372538179322589801,"name":"master-1","clientURLs":["https://192.168.10.21:2379"]},
  {"ID":10501334649042878790,"name":"master-2","clientURLs":["https://192.168.10.22:2379"]}
]}`;

const AFTER_REMOVE = `{"header":{"cluster_id":1},"members":[
  {"ID":12345678901234567890,"name":"master-0","clientURLs":["https://192.168.10.20:2379"]},
  {"ID":10501334649042878790,"name":"master-2","clientURLs":["https://192.168.10.22:2379"]}
]}`;

function createManager(executor: FakeExecutor): { manager: QuorumManager; clock: FakeClock } {
  const clock = new FakeClock();
  const manager = new QuorumManager({
    executor,
    clock,
    logger: new Logger({ component: 'QuorumManager' }),
    etcdNamespace: NS,
    durations: {
      disableSettleMs: 120_000,
      enableSettleMs: 60_000,
      memberRemovalSettleMs: 3_000,
      secretDeleteDelayMs: 500,
    },
  });
  return { manager, clock };
}

describe('parsers', () => {
  it('keeps uint64 member IDs exact and converts them to hex', () => {
    const members = parseMemberList(MEMBER_LIST);

    expect(members?.map((m) => [m.id, m.hexId])).toEqual([
      ['12345678901234567890', 'ab54a98ceb1f0ad2'],
      ['9372538179322589801', '8211f1d0f64f3269'],
      ['10501334649042878790', '91bc3c398fb3c146'],
    ]);
  });

  it('rejects output that is not a member list', () => {
    expect(parseMemberList('Error: context deadline exceeded')).toBeUndefined();
    expect(parseMemberList('{"header":{}}')).toBeUndefined();
  });

  it('reads endpoint health in order', () => {
    expect(parseEndpointHealth(HEALTH_ONE_DOWN)).toEqual([
      { endpoint: 'https://192.168.10.20:2379', healthy: true },
      { endpoint: 'https://192.168.10.21:2379', healthy: false },
      { endpoint: 'https://192.168.10.22:2379', healthy: true },
    ]);
    expect(parseEndpointHealth('{"endpoint":"x"}')).toBeUndefined();
  });

  it('extracts the endpoint host', () => {
    expect(endpointHost('https://192.168.10.21:2379')).toBe('192.168.10.21');
    expect(endpointHost('not a url')).toBeUndefined();
  });

  it('falls back to a host match when no client URL is identical', () => {
    const members = parseMemberList(MEMBER_LIST) ?? [];

    expect(matchMember(members, 'https://192.168.10.21:2379')?.name).toBe('master-1');
    expect(matchMember(members, 'http://192.168.10.22:2379')?.name).toBe('master-2');
    expect(matchMember(members, 'https://10.9.9.9:2379')).toBeUndefined();
  });
});

describe('QuorumManager', () => {
  let executor: FakeExecutor;

  beforeEach(() => {
    executor = new FakeExecutor();
    executor.onJson(`get pods -n ${NS} -l app=etcd`, PODS);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('findHealthyMember', () => {
    it('skips pods that are not running or match the excluded node', async () => {
      const { manager } = createManager(executor);

      await expect(manager.findHealthyMember('master-0')).resolves.toBe('etcd-master-2');
      await expect(manager.findHealthyMember('')).resolves.toBe('etcd-master-0');
    });

    it('returns null when the pod list cannot be read', async () => {
      const { manager } = createManager(new FakeExecutor());

      await expect(manager.findHealthyMember('master-1')).resolves.toBeNull();
    });
  });

  describe('removeFailedMember', () => {
    it('removes the member behind the unhealthy endpoint', async () => {
      executor
        .onExec('etcdctl endpoint health', HEALTH_ONE_DOWN)
        .onExec('etcdctl member list', MEMBER_LIST)
        .onExec('etcdctl member remove', AFTER_REMOVE);
      const { manager, clock } = createManager(executor);

      const result = await manager.removeFailedMember('master-1');

      expect(result).toEqual({
        kind: 'removed',
        removedMemberId: '8211f1d0f64f3269',
        memberName: 'master-1',
        failedEndpoint: 'https://192.168.10.21:2379',
        remainingMemberCount: 2,
        stillListed: false,
      });
      expect(executor.commands('exec')).toEqual([
        'etcdctl endpoint health --write-out=json',
        'etcdctl member list --write-out=json',
        'etcdctl member remove 8211f1d0f64f3269 --write-out=json',
      ]);
      expect(executor.calls.find((c) => c.kind === 'exec')?.pod).toBe('etcd-master-0');
      expect(clock.sleeps).toEqual([3_000]);
    });

    it('reports a member still listed after removal without failing', async () => {
      executor
        .onExec('etcdctl endpoint health', HEALTH_ONE_DOWN)
        .onExec('etcdctl member list', MEMBER_LIST)
        .onExec('etcdctl member remove', MEMBER_LIST);
      const { manager } = createManager(executor);

      const result = await manager.removeFailedMember('master-1');

      expect(result.kind).toBe('removed');
      expect(result.kind === 'removed' && result.stillListed).toBe(true);
    });

    it('issues no removal when every endpoint is healthy', async () => {
      executor.onExec(
        'etcdctl endpoint health',
        JSON.stringify([{ endpoint: 'https://192.168.10.20:2379', health: true }])
      );
      const { manager } = createManager(executor);

      const result = await manager.removeFailedMember('master-1');

      expect(result).toEqual({ kind: 'no-failed-member', healthyMember: 'etcd-master-0' });
      expect(executor.commands('exec')).toEqual(['etcdctl endpoint health --write-out=json']);
    });

    it('treats an endpoint with no matching member as already removed', async () => {
      executor
        .onExec(
          'etcdctl endpoint health',
          JSON.stringify([{ endpoint: 'https://10.9.9.9:2379', health: false }])
        )
        .onExec('etcdctl member list', MEMBER_LIST);
      const { manager, clock } = createManager(executor);

      const result = await manager.removeFailedMember('master-1');

      expect(result).toEqual({ kind: 'member-not-found', failedEndpoint: 'https://10.9.9.9:2379' });
      expect(executor.matching('etcdctl member remove')).toEqual([]);
      expect(clock.sleeps).toEqual([]);
    });

    it('fails when health output cannot be parsed', async () => {
      executor.onExec('etcdctl endpoint health', 'Error: unexpected EOF');
      const { manager } = createManager(executor);

      await expect(manager.removeFailedMember('master-1')).resolves.toEqual({
        kind: 'failed',
        reason: 'Could not read endpoint health from etcd-master-0',
      });
    });

    it('fails when no healthy pod remains', async () => {
      executor.onJson(`get pods -n ${NS}`, { items: [] });
      const { manager } = createManager(executor);

      await expect(manager.removeFailedMember('master-1')).resolves.toEqual({
        kind: 'failed',
        reason: 'No healthy etcd pods available',
      });
    });
  });

  describe('quorum guard', () => {
    it('waits for the cluster to settle after disabling', async () => {
      executor.onRun('patch etcd/cluster', 'etcd.operator.openshift.io/cluster patched');
      const { manager, clock } = createManager(executor);

      const result = await manager.disableQuorumGuard();

      expect(result).toEqual({ kind: 'disabled', waitedMs: 120_000 });
      expect(executor.commands('run')).toEqual([
        `patch etcd/cluster --type=merge -p ${DISABLE_GUARD_PATCH}`,
      ]);
      expect(clock.sleeps).toEqual([120_000]);
    });

    it('skips the wait when the guard was already disabled', async () => {
      executor.onRun('patch etcd/cluster', 'etcd.operator.openshift.io/cluster patched (no change)');
      const { manager, clock } = createManager(executor);

      await expect(manager.disableQuorumGuard()).resolves.toEqual({ kind: 'already-disabled' });
      expect(clock.sleeps).toEqual([]);
    });

    it('reports a failed patch', async () => {
      const { manager } = createManager(executor);

      const result = await manager.disableQuorumGuard();

      expect(result.kind).toBe('failed');
    });

    it('always waits after re-enabling', async () => {
      executor.onRun('patch etcd/cluster', 'etcd.operator.openshift.io/cluster patched (no change)');
      const { manager, clock } = createManager(executor);

      await expect(manager.enableQuorumGuard()).resolves.toEqual({ kind: 'enabled', waitedMs: 60_000 });
      expect(executor.commands('run')).toEqual([`patch etcd/cluster --type=merge -p ${ENABLE_GUARD_PATCH}`]);
      expect(clock.sleeps).toEqual([60_000]);
    });

    it('rejects with an abort error when interrupted during the settle wait', async () => {
      executor.onRun('patch etcd/cluster', 'patched');
      const { manager } = createManager(executor);
      const controller = new AbortController();
      controller.abort();

      await expect(manager.disableQuorumGuard(controller.signal)).rejects.toMatchObject({
        name: 'AbortError',
      });
    });
  });

  describe('cleanupMemberSecrets', () => {
    it('resolves the node name and deletes its secrets', async () => {
      executor
        .onJson('get nodes -l node-role.kubernetes.io/control-plane', {
          items: [
            { metadata: { name: 'master-0.lab.example.com' } },
            { metadata: { name: 'master-1.lab.example.com' } },
          ],
        })
        .onJson(`get secrets -n ${NS}`, {
          items: [
            { metadata: { name: 'etcd-peer-master-1.lab.example.com' } },
            { metadata: { name: 'etcd-peer-master-0.lab.example.com' } },
            { metadata: { name: 'etcd-serving-master-1.lab.example.com' } },
          ],
        })
        .onRun('delete secret', 'deleted');
      const { manager, clock } = createManager(executor);

      const result = await manager.cleanupMemberSecrets('master-1');

      expect(result).toEqual({
        resolvedNodeName: 'master-1.lab.example.com',
        nodeMatched: true,
        deletedSecrets: [
          'etcd-peer-master-1.lab.example.com',
          'etcd-serving-master-1.lab.example.com',
        ],
        failedSecrets: [],
        listFailed: false,
      });
      expect(executor.commands('run')).toEqual([
        `delete secret etcd-peer-master-1.lab.example.com -n ${NS}`,
        `delete secret etcd-serving-master-1.lab.example.com -n ${NS}`,
      ]);
      expect(clock.sleeps).toEqual([500]);
    });

    it('falls back to the identifier when no node matches', async () => {
      executor.onJson(`get secrets -n ${NS}`, {
        items: [{ metadata: { name: 'etcd-peer-master-4' } }],
      });
      executor.onRun('delete secret', 'deleted');
      const { manager } = createManager(executor);

      const result = await manager.cleanupMemberSecrets('master-4');

      expect(result.resolvedNodeName).toBe('master-4');
      expect(result.nodeMatched).toBe(false);
      expect(result.deletedSecrets).toEqual(['etcd-peer-master-4']);
    });

    it('reports an unreadable secret list', async () => {
      const { manager } = createManager(executor);

      const result = await manager.cleanupMemberSecrets('master-4');

      expect(result.listFailed).toBe(true);
      expect(result.deletedSecrets).toEqual([]);
    });
  });

  describe('checkClusterHealth', () => {
    it('lists unhealthy endpoints from any running member', async () => {
      executor.onExec('etcdctl endpoint health', HEALTH_ONE_DOWN);
      const { manager } = createManager(executor);

      const result = await manager.checkClusterHealth();

      expect(result.kind).toBe('healthy');
      expect(result.kind === 'healthy' && result.healthyMember).toBe('etcd-master-0');
      expect(result.kind === 'healthy' && result.unhealthyEndpoints).toEqual([
        'https://192.168.10.21:2379',
      ]);
    });

    it('fails without health output', async () => {
      const { manager } = createManager(executor);

      await expect(manager.checkClusterHealth()).resolves.toEqual({
        kind: 'failed',
        reason: 'Could not read endpoint health from etcd-master-0',
      });
    });
  });
});
