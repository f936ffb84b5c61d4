/**
 * Polling monitor that drives a new node from BareMetalHost provisioning to a
 * Ready node.
 *
 * Each iteration checks the current phase once, then sleeps for the check
 * interval. Resources that do not exist yet are waited for. A host in `error`
 * or a machine in `Failed` stops the run, as does the global timeout or an
 * abort signal. CSRs are approved automatically: in the node phase on every
 * iteration, and earlier once the credential check has been armed.
 *
 * @packageDocumentation
 */

import type { JsonObject } from '../cluster/json.js';
import {
  hostProvisioningState,
  isCsrPending,
  isNodeReady,
  listItems,
  machinePhase,
  resourceName,
} from '../cluster/resources.js';
import type { Config } from '../config/types.js';
import type { CommandExecutor } from '../executor/types.js';
import type { Reporter } from '../reporting/types.js';
import { isAbortError, type Clock } from '../utils/clock.js';
import type { Logger } from '../utils/logger.js';
import { resolveByHeuristic, resolveFromClaim } from './machine-resolver.js';
import { remediationFor } from './remediation.js';
import { applyEvent, completedMilestones, createInitialState } from './state.js';
import {
  PHASE_FAILURE_MESSAGES,
  PHASE_MARKERS,
  PROVISIONING_PHASES,
  getPhaseIndex,
  type MachineResolution,
  type MonitorTarget,
  type NodeProvisioningState,
  type ProvisioningEvent,
  type ProvisioningFailureKind,
  type ProvisioningOutcome,
} from './types.js';

/**
 * Timing for the monitor, in milliseconds.
 */
export interface MonitorSettings {
  readonly timeoutMs: number;
  readonly intervalMs: number;
  /** Arm CSR approval this long after the machine resolves. */
  readonly csrCheckDelayMs: number;
  /** Arm earlier when the machine is still `Provisioning` after this long. */
  readonly csrEarlyCheckMs: number;
  /** Pause after a round of approvals. */
  readonly csrApprovalDelayMs: number;
  readonly namespace: string;
}

export interface ProvisioningMonitorOptions {
  readonly executor: CommandExecutor;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly reporter: Reporter;
  readonly settings: MonitorSettings;
}

export function monitorSettingsFromConfig(config: Config): MonitorSettings {
  return {
    timeoutMs: config.monitor.timeout_minutes * 60_000,
    intervalMs: config.monitor.check_interval_seconds * 1000,
    csrCheckDelayMs: config.monitor.csr_check_delay_minutes * 60_000,
    csrEarlyCheckMs: config.monitor.csr_early_check_minutes * 60_000,
    csrApprovalDelayMs: config.monitor.csr_approval_delay_seconds * 1000,
    namespace: config.cluster.machine_api_namespace,
  };
}

/**
 * Result of checking the current phase once.
 */
type PollResult =
  | { readonly kind: 'waiting' }
  | { readonly kind: 'advanced'; readonly events: readonly ProvisioningEvent[] }
  | { readonly kind: 'diverged'; readonly message: string };

const WAITING: PollResult = { kind: 'waiting' };

export class ProvisioningMonitor {
  private readonly executor: CommandExecutor;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly reporter: Reporter;
  private readonly settings: MonitorSettings;

  constructor(options: ProvisioningMonitorOptions) {
    this.executor = options.executor;
    this.clock = options.clock;
    this.logger = options.logger;
    this.reporter = options.reporter;
    this.settings = options.settings;
  }

  /**
   * Runs the provisioning loop until the node is Ready or the run stops.
   *
   * @param target - Node to watch.
   * @param signal - Aborting it ends the run with an `interrupted` failure.
   */
  async monitor(target: MonitorTarget, signal?: AbortSignal): Promise<ProvisioningOutcome> {
    const start = this.clock.now();
    let state = createInitialState(start);
    const approvedCsrs: string[] = [];

    this.reporter.info(`Monitoring provisioning of ${target.nodeName}`);

    const fail = (
      failureKind: ProvisioningFailureKind,
      message: string
    ): ProvisioningOutcome => {
      const outcome: ProvisioningOutcome = {
        kind: 'failed',
        failureKind,
        phase: state.phase,
        marker: PHASE_MARKERS[state.phase],
        message,
        remediation: remediationFor(state.phase, {
          nodeName: target.nodeName,
          namespace: this.settings.namespace,
          ...(state.targetMachine !== undefined ? { machineName: state.targetMachine.name } : {}),
          ...(target.machineFile !== undefined ? { machineFile: target.machineFile } : {}),
        }),
        elapsedMs: this.clock.now() - start,
        approvedCsrs,
      };
      this.logger.warn('provisioning_failed', {
        node: target.nodeName,
        failureKind,
        phase: state.phase,
        phasesCompleted: getPhaseIndex(state.phase),
        elapsedMs: outcome.elapsedMs,
      });
      return outcome;
    };

    try {
      for (;;) {
        if (signal?.aborted === true) {
          return fail('interrupted', 'Provisioning monitor interrupted');
        }

        const elapsed = this.clock.now() - start;
        if (elapsed >= this.settings.timeoutMs) {
          const minutes = Math.floor(this.settings.timeoutMs / 60_000);
          this.reporter.warn(
            `Provisioning did not complete within ${String(minutes)} minutes (stopped at: ${PHASE_MARKERS[state.phase]})`
          );
          return fail('timeout', PHASE_FAILURE_MESSAGES[state.phase]);
        }

        this.reporter.progress(this.progressLine(state, elapsed));

        const result = await this.poll(state, target, approvedCsrs, signal);
        if (result.kind === 'diverged') {
          this.reporter.error(result.message);
          return fail('state-divergence', result.message);
        }
        if (result.kind === 'advanced') {
          for (const event of result.events) {
            state = this.transition(state, event);
          }
          if (state.nodeReady && state.targetMachine !== undefined) {
            return this.ready(target, state.targetMachine, start, approvedCsrs);
          }
        }

        await this.clock.sleep(this.settings.intervalMs, signal);
      }
    } catch (error) {
      if (isAbortError(error)) {
        return fail('interrupted', 'Provisioning monitor interrupted');
      }
      throw error;
    }
  }

  private ready(
    target: MonitorTarget,
    machine: MachineResolution,
    start: number,
    approvedCsrs: readonly string[]
  ): ProvisioningOutcome {
    const elapsedMs = this.clock.now() - start;
    this.logger.info('provisioning_complete', { node: target.nodeName, machine: machine.name, elapsedMs });
    return { kind: 'ready', machine, elapsedMs, approvedCsrs };
  }

  private transition(state: NodeProvisioningState, event: ProvisioningEvent): NodeProvisioningState {
    const result = applyEvent(state, event, this.clock.now());
    if (!result.success) {
      this.logger.error('invalid_provisioning_transition', { error: result.error });
      return state;
    }
    if (result.state.phase !== state.phase || result.state.nodeReady) {
      this.logger.info('phase_completed', {
        marker: PHASE_MARKERS[state.phase],
        next: result.state.phase,
        milestones: `${String(completedMilestones(result.state))}/${String(PROVISIONING_PHASES.length)}`,
      });
    }
    return result.state;
  }

  private progressLine(state: NodeProvisioningState, elapsedMs: number): string {
    const elapsed = Math.floor(elapsedMs / 1000);
    const remaining = Math.floor((this.settings.timeoutMs - elapsedMs) / 1000);
    let line = `Elapsed: ${String(elapsed)}s, Remaining: ${String(remaining)}s`;
    if (state.credentialCheck.armed) {
      line += `, CSR checking: ACTIVE (${state.credentialCheck.reason})`;
    }
    return line;
  }

  private async poll(
    state: NodeProvisioningState,
    target: MonitorTarget,
    approvedCsrs: string[],
    signal?: AbortSignal
  ): Promise<PollResult> {
    switch (state.phase) {
      case 'AwaitingClaim':
        return this.pollClaim(target);
      case 'AwaitingMachine':
        return this.pollMachineResolution(target);
      case 'AwaitingRunning':
        return this.pollMachine(state, approvedCsrs, signal);
      case 'AwaitingReady':
        await this.approvePendingCsrs(approvedCsrs, signal);
        return this.pollNode(target);
    }
  }

  private async getHost(nodeName: string): Promise<JsonObject | null> {
    return this.executor.runJson(['get', 'bmh', nodeName, '-n', this.settings.namespace]);
  }

  private async pollClaim(target: MonitorTarget): Promise<PollResult> {
    const host = await this.getHost(target.nodeName);
    if (host === null) {
      this.reporter.info(`BMH ${target.nodeName} not found yet, waiting for it to appear...`);
      return WAITING;
    }

    const provisioning = hostProvisioningState(host) ?? 'unknown';
    if (provisioning === 'provisioned') {
      this.reporter.success(`BMH ${target.nodeName} is now Provisioned`);
      return { kind: 'advanced', events: [{ kind: 'claim-provisioned' }] };
    }
    if (provisioning === 'error') {
      return { kind: 'diverged', message: `BMH ${target.nodeName} is in error state` };
    }
    this.reporter.info(`BMH ${target.nodeName} is ${provisioning}, waiting for provisioned...`);
    return WAITING;
  }

  private async pollMachineResolution(target: MonitorTarget): Promise<PollResult> {
    const host = await this.getHost(target.nodeName);
    let resolution = resolveFromClaim(host);

    if (resolution === undefined && target.allowHeuristic) {
      const machines = await this.executor.runJson(['get', 'machines', '-n', this.settings.namespace]);
      resolution = resolveByHeuristic(target.nodeName, listItems(machines));
    }

    if (resolution === undefined) {
      this.reporter.info(`Waiting for a machine to bind to BMH ${target.nodeName}...`);
      return WAITING;
    }

    this.reporter.success(`Machine discovered: ${resolution.name} (via ${resolution.resolvedVia})`);
    return { kind: 'advanced', events: [{ kind: 'machine-resolved', resolution }] };
  }

  private async pollMachine(
    state: NodeProvisioningState,
    approvedCsrs: string[],
    signal?: AbortSignal
  ): Promise<PollResult> {
    const name = state.targetMachine?.name;
    if (name === undefined) {
      return WAITING;
    }

    const machine = await this.executor.runJson(['get', 'machine', name, '-n', this.settings.namespace]);
    const phase = machine === null ? undefined : machinePhase(machine);

    const events: ProvisioningEvent[] = [];
    const armed = this.armCredentialCheck(state, phase);
    if (armed !== undefined) {
      this.reporter.info(`CSR checking activated (${armed.reason})`);
      events.push(armed);
    }
    if (state.credentialCheck.armed || armed !== undefined) {
      await this.approvePendingCsrs(approvedCsrs, signal);
    }

    if (phase === 'Running') {
      this.reporter.success(`Machine ${name} is now Running`);
      events.push({ kind: 'machine-running' });
      return { kind: 'advanced', events };
    }
    if (phase === 'Failed') {
      return { kind: 'diverged', message: `Machine ${name} is in Failed state` };
    }
    this.reporter.info(
      phase === undefined
        ? `Machine ${name} not found, continuing to monitor...`
        : `Machine ${name} is ${phase}, waiting for Running...`
    );
    return events.length > 0 ? { kind: 'advanced', events } : WAITING;
  }

  /**
   * Event arming the credential check, when this observation arms it.
   */
  private armCredentialCheck(
    state: NodeProvisioningState,
    machinePhaseNow: string | undefined
  ): Extract<ProvisioningEvent, { kind: 'credential-check-armed' }> | undefined {
    if (state.credentialCheck.armed || state.machineResolvedAt === undefined) {
      return undefined;
    }
    const sinceResolved = this.clock.now() - state.machineResolvedAt;
    if (sinceResolved >= this.settings.csrCheckDelayMs) {
      return { kind: 'credential-check-armed', reason: '10min timer' };
    }
    if (sinceResolved >= this.settings.csrEarlyCheckMs && machinePhaseNow === 'Provisioning') {
      return { kind: 'credential-check-armed', reason: '3min threshold' };
    }
    return undefined;
  }

  private async pollNode(target: MonitorTarget): Promise<PollResult> {
    const node = await this.executor.runJson(['get', 'node', target.nodeName]);
    if (node === null) {
      this.reporter.info(`Node ${target.nodeName} not found yet, waiting for it to appear...`);
      return WAITING;
    }
    if (isNodeReady(node)) {
      this.reporter.success(`Node ${target.nodeName} is now Ready`);
      return { kind: 'advanced', events: [{ kind: 'node-ready' }] };
    }
    this.reporter.info(`Node ${target.nodeName} is NotReady, continuing to monitor...`);
    return WAITING;
  }

  private async approvePendingCsrs(approved: string[], signal?: AbortSignal): Promise<void> {
    const csrs = await this.executor.runJson(['get', 'csr']);
    const pending = listItems(csrs)
      .filter(isCsrPending)
      .map((csr) => resourceName(csr))
      .filter((name): name is string => name !== undefined);
    if (pending.length === 0) {
      return;
    }

    this.reporter.info(`Found ${String(pending.length)} pending CSR(s), approving...`);
    for (const name of pending) {
      const result = await this.executor.run(['adm', 'certificate', 'approve', name]);
      if (result === null) {
        this.reporter.warn(`Failed to approve CSR: ${name}`);
      } else {
        this.reporter.success(`Approved CSR: ${name}`);
        approved.push(name);
      }
    }
    await this.clock.sleep(this.settings.csrApprovalDelayMs, signal);
  }
}
