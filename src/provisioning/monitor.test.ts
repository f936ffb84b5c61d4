/**
 * Tests for ProvisioningMonitor.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { JsonObject } from '../cluster/json.js';
import { FakeClock } from '../testing/fake-clock.js';
import { FakeExecutor, sequence } from '../testing/fake-executor.js';
import { RecordingReporter } from '../testing/recording-reporter.js';
import { Logger } from '../utils/logger.js';
import { ProvisioningMonitor, type MonitorSettings } from './monitor.js';

const NS = 'openshift-machine-api';
const MACHINE = 'ocp-worker-0-x7k2p';

const SETTINGS: MonitorSettings = {
  timeoutMs: 45 * 60_000,
  intervalMs: 25_000,
  csrCheckDelayMs: 10 * 60_000,
  csrEarlyCheckMs: 3 * 60_000,
  csrApprovalDelayMs: 3_000,
  namespace: NS,
};

function host(state: string, consumer?: string): JsonObject {
  return {
    metadata: { name: 'worker-3' },
    spec: consumer === undefined ? {} : { consumerRef: { kind: 'Machine', name: consumer } },
    status: { provisioning: { state } },
  };
}

function machine(phase: string): JsonObject {
  return { metadata: { name: MACHINE }, status: { phase } };
}

const READY_NODE: JsonObject = {
  metadata: { name: 'worker-3' },
  status: { conditions: [{ type: 'Ready', status: 'True' }] },
};

function createMonitor(
  executor: FakeExecutor,
  settings: MonitorSettings = SETTINGS
): { monitor: ProvisioningMonitor; clock: FakeClock; reporter: RecordingReporter } {
  const clock = new FakeClock(0);
  const reporter = new RecordingReporter();
  const monitor = new ProvisioningMonitor({
    executor,
    clock,
    logger: new Logger({ component: 'ProvisioningMonitor' }),
    reporter,
    settings,
  });
  return { monitor, clock, reporter };
}

describe('ProvisioningMonitor', () => {
  let executor: FakeExecutor;

  beforeEach(() => {
    executor = new FakeExecutor();
    executor.onJson('get csr', { items: [] });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('checks one phase per iteration and approves CSRs in the node phase', async () => {
    executor
      .onJson(`get bmh worker-3 -n ${NS}`, host('provisioned', MACHINE))
      .onJson(`get machine ${MACHINE} -n ${NS}`, machine('Running'))
      .onJson('get csr', {
        items: [
          { metadata: { name: 'csr-8kq2n' } },
          { metadata: { name: 'csr-4bd7x' }, status: { conditions: [{ type: 'Approved' }] } },
        ],
      })
      .onRun('adm certificate approve', 'certificatesigningrequest approved')
      .onJson('get node worker-3', READY_NODE);
    const { monitor, clock, reporter } = createMonitor(executor);

    const outcome = await monitor.monitor({ nodeName: 'worker-3', allowHeuristic: false });

    expect(outcome).toEqual({
      kind: 'ready',
      machine: { resolvedVia: 'ConsumerRef', name: MACHINE },
      elapsedMs: 78_000,
      approvedCsrs: ['csr-8kq2n'],
    });
    expect(executor.commands('json')).toEqual([
      `get bmh worker-3 -n ${NS}`,
      `get bmh worker-3 -n ${NS}`,
      `get machine ${MACHINE} -n ${NS}`,
      'get csr',
      'get node worker-3',
    ]);
    expect(executor.commands('run')).toEqual(['adm certificate approve csr-8kq2n']);
    expect(clock.sleeps).toEqual([25_000, 25_000, 25_000, 3_000]);
    expect(reporter.textOf('progress')).toEqual([
      'Elapsed: 0s, Remaining: 2700s',
      'Elapsed: 25s, Remaining: 2675s',
      'Elapsed: 50s, Remaining: 2650s',
      'Elapsed: 75s, Remaining: 2625s',
    ]);
  });

  it('keeps waiting while the host does not exist', async () => {
    executor
      .onJson(`get bmh worker-3 -n ${NS}`, sequence([null, null, host('provisioned', MACHINE)]))
      .onJson(`get machine ${MACHINE}`, machine('Running'))
      .onJson('get node worker-3', READY_NODE);
    const { monitor, reporter } = createMonitor(executor);

    const outcome = await monitor.monitor({ nodeName: 'worker-3', allowHeuristic: false });

    expect(outcome.kind).toBe('ready');
    expect(reporter.textOf('info').filter((t) => t.includes('not found yet'))).toEqual([
      'BMH worker-3 not found yet, waiting for it to appear...',
      'BMH worker-3 not found yet, waiting for it to appear...',
    ]);
  });

  it('times out in the running phase with remediation for that phase', async () => {
    executor
      .onJson(`get bmh worker-3 -n ${NS}`, host('provisioned', MACHINE))
      .onJson(`get machine ${MACHINE} -n ${NS}`, machine('Provisioning'));
    const { monitor, reporter } = createMonitor(executor);

    const outcome = await monitor.monitor({ nodeName: 'worker-3', allowHeuristic: false });

    expect(outcome.kind).toBe('failed');
    if (outcome.kind !== 'failed') return;
    expect(outcome.failureKind).toBe('timeout');
    expect(outcome.phase).toBe('AwaitingRunning');
    expect(outcome.marker).toBe('Machine Running');
    expect(outcome.message).toBe('Machine did not reach Running state');
    expect(outcome.elapsedMs).toBe(2_700_000);
    expect(outcome.remediation.map((s) => s.action)).toEqual([
      `oc get machines -n ${NS}`,
      `oc describe machine ${MACHINE} -n ${NS}`,
      undefined,
    ]);

    const progress = reporter.textOf('progress');
    expect(progress).toContain('Elapsed: 225s, Remaining: 2475s');
    expect(progress).toContain('Elapsed: 250s, Remaining: 2450s, CSR checking: ACTIVE (3min threshold)');
    expect(executor.commands('json').filter((c) => c === 'get csr')).toHaveLength(99);
  });

  it('arms CSR checking on the ten minute timer when the machine is not Provisioning', async () => {
    executor
      .onJson(`get bmh worker-3 -n ${NS}`, host('provisioned', MACHINE))
      .onJson(`get machine ${MACHINE} -n ${NS}`, machine('Provisioned'));
    const { monitor, reporter } = createMonitor(executor, { ...SETTINGS, timeoutMs: 700_000 });

    await monitor.monitor({ nodeName: 'worker-3', allowHeuristic: false });

    const progress = reporter.textOf('progress');
    expect(progress).toContain('Elapsed: 625s, Remaining: 75s');
    expect(progress).toContain('Elapsed: 650s, Remaining: 50s, CSR checking: ACTIVE (10min timer)');
  });

  it('stops on a host in error state', async () => {
    executor.onJson(`get bmh worker-3 -n ${NS}`, host('error'));
    const { monitor, clock } = createMonitor(executor);

    const outcome = await monitor.monitor({ nodeName: 'worker-3', allowHeuristic: false });

    expect(outcome).toMatchObject({
      kind: 'failed',
      failureKind: 'state-divergence',
      phase: 'AwaitingClaim',
      marker: 'BMH Provisioned',
      message: 'BMH worker-3 is in error state',
      elapsedMs: 0,
    });
    expect(clock.sleeps).toEqual([]);
  });

  it('stops on a Failed machine', async () => {
    executor
      .onJson(`get bmh worker-3 -n ${NS}`, host('provisioned', MACHINE))
      .onJson(`get machine ${MACHINE} -n ${NS}`, machine('Failed'));
    const { monitor } = createMonitor(executor);

    const outcome = await monitor.monitor({ nodeName: 'worker-3', allowHeuristic: false });

    expect(outcome).toMatchObject({
      kind: 'failed',
      failureKind: 'state-divergence',
      phase: 'AwaitingRunning',
      message: `Machine ${MACHINE} is in Failed state`,
    });
  });

  it('resolves control-plane machines by heuristic when the host has no consumerRef', async () => {
    executor
      .onJson(`get bmh master-2 -n ${NS}`, host('provisioned'))
      .onJson(`get machines -n ${NS}`, {
        items: [
          { metadata: { name: 'ocp-master-0', annotations: { 'metal3.io/BareMetalHost': `${NS}/master-0` } } },
          { metadata: { name: 'ocp-master-2', annotations: { 'metal3.io/BareMetalHost': `${NS}/master-2` } } },
        ],
      })
      .onJson(`get machine ocp-master-2 -n ${NS}`, machine('Running'))
      .onJson('get node master-2', READY_NODE);
    const { monitor } = createMonitor(executor);

    const outcome = await monitor.monitor({ nodeName: 'master-2', allowHeuristic: true });

    expect(outcome).toMatchObject({
      kind: 'ready',
      machine: { resolvedVia: 'NumericHeuristic', name: 'ocp-master-2' },
    });
  });

  it('uses only the consumerRef for worker additions', async () => {
    executor.onJson(`get bmh worker-3 -n ${NS}`, host('provisioned'));
    const { monitor } = createMonitor(executor, { ...SETTINGS, timeoutMs: 100_000 });

    const outcome = await monitor.monitor({
      nodeName: 'worker-3',
      allowHeuristic: false,
      machineFile: '/tmp/backups/worker-3_machine.yaml',
    });

    expect(executor.matching('get machines')).toEqual([]);
    expect(outcome).toMatchObject({ kind: 'failed', failureKind: 'timeout', phase: 'AwaitingMachine' });
    if (outcome.kind === 'failed') {
      expect(outcome.remediation[1]?.action).toBe('oc apply -f /tmp/backups/worker-3_machine.yaml');
    }
  });

  it('returns an interrupted failure when aborted', async () => {
    executor.onJson(`get bmh worker-3 -n ${NS}`, host('provisioned', MACHINE));
    const { monitor, clock } = createMonitor(executor);
    const controller = new AbortController();
    clock.onSleep = () => {
      controller.abort();
    };

    const outcome = await monitor.monitor({ nodeName: 'worker-3', allowHeuristic: false }, controller.signal);

    expect(outcome).toMatchObject({
      kind: 'failed',
      failureKind: 'interrupted',
      phase: 'AwaitingMachine',
      elapsedMs: 25_000,
    });
  });

  it('logs each completed phase with its milestone count', async () => {
    executor
      .onJson(`get bmh worker-3 -n ${NS}`, host('provisioned', MACHINE))
      .onJson(`get machine ${MACHINE} -n ${NS}`, machine('Running'))
      .onJson('get node worker-3', READY_NODE);
    const logger = new Logger({ component: 'ProvisioningMonitor' });
    const info = vi.spyOn(logger, 'info');
    const monitor = new ProvisioningMonitor({
      executor,
      clock: new FakeClock(0),
      logger,
      reporter: new RecordingReporter(),
      settings: SETTINGS,
    });

    await monitor.monitor({ nodeName: 'worker-3', allowHeuristic: false });

    expect(info.mock.calls.filter(([event]) => event === 'phase_completed').map(([, data]) => data)).toEqual([
      { marker: 'BMH Provisioned', next: 'AwaitingMachine', milestones: '1/4' },
      { marker: 'Machine Created', next: 'AwaitingRunning', milestones: '2/4' },
      { marker: 'Machine Running', next: 'AwaitingReady', milestones: '3/4' },
      { marker: 'Node Ready', next: 'AwaitingReady', milestones: '4/4' },
    ]);
  });

  it('logs how many phases a timed-out run completed', async () => {
    executor
      .onJson(`get bmh worker-3 -n ${NS}`, host('provisioned', MACHINE))
      .onJson(`get machine ${MACHINE} -n ${NS}`, machine('Provisioning'));
    const logger = new Logger({ component: 'ProvisioningMonitor' });
    const warn = vi.spyOn(logger, 'warn');
    const monitor = new ProvisioningMonitor({
      executor,
      clock: new FakeClock(0),
      logger,
      reporter: new RecordingReporter(),
      settings: SETTINGS,
    });

    await monitor.monitor({ nodeName: 'worker-3', allowHeuristic: false });

    expect(warn).toHaveBeenCalledWith('provisioning_failed', {
      node: 'worker-3',
      failureKind: 'timeout',
      phase: 'AwaitingRunning',
      phasesCompleted: 2,
      elapsedMs: 2_700_000,
    });
  });
});
