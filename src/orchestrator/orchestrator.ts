/**
 * Sequences a node operation from plan to terminal report.
 *
 * The orchestrator is the only place an operation ends. Components report
 * outcomes as unions; any failure here stops the run and becomes a failed
 * {@link OperationReport}. Nothing is rolled back automatically: backups of
 * removed resources are kept and listed with their restore commands.
 *
 * @packageDocumentation
 */

import type { Config } from '../config/types.js';
import type { NodeMaterializer, TemplateSource } from '../materialize/materializer.js';
import { configureNode } from '../materialize/node-configurator.js';
import type { ClaimTemplate, MaterializedNode } from '../materialize/types.js';
import type { Workspace } from '../materialize/workspace.js';
import type { ProvisioningMonitor } from '../provisioning/monitor.js';
import type { QuorumOperations } from '../quorum/types.js';
import type { Reporter, Suggestion } from '../reporting/types.js';
import type { ConflictResolver } from '../resources/conflict-resolver.js';
import type { ResourceManager } from '../resources/resource-manager.js';
import { isAbortError, type Clock } from '../utils/clock.js';
import type { Logger } from '../utils/logger.js';
import {
  StepTracker,
  computePlan,
  operationTitle,
  type OperationKind,
  type OperationPlan,
  type OperationRequest,
} from './plan.js';
import { presentReport, type OperationReport } from './report.js';

const CONFIGURE_STEP: Readonly<Record<OperationKind, string>> = {
  addition: 'Configuring new worker node',
  expansion: 'Configuring new control plane node',
  replacement: 'Configuring replacement node',
};

const APPLY_STEP: Readonly<Record<OperationKind, string>> = {
  addition: 'Applying new worker configuration',
  expansion: 'Applying new control plane node configuration',
  replacement: 'Applying replacement node configuration',
};

const MONITOR_STEP: Readonly<Record<OperationKind, string>> = {
  addition: 'Monitoring new worker provisioning',
  expansion: 'Monitoring new control plane node provisioning',
  replacement: 'Monitoring replacement node provisioning',
};

export interface OrchestratorSettings {
  readonly machineApiNamespace: string;
  readonly etcdNamespace: string;
}

export function orchestratorSettingsFromConfig(config: Config): OrchestratorSettings {
  return {
    machineApiNamespace: config.cluster.machine_api_namespace,
    etcdNamespace: config.cluster.etcd_namespace,
  };
}

/**
 * Everything an operation talks to.
 */
export interface OrchestratorDependencies {
  readonly quorum: QuorumOperations;
  readonly resources: ResourceManager;
  readonly conflicts: ConflictResolver;
  readonly materializer: NodeMaterializer;
  readonly monitor: ProvisioningMonitor;
  /** Creates the workspace, in the given directory when there is one. */
  readonly prepareWorkspace: (backupDir?: string) => Promise<Workspace>;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly reporter: Reporter;
  readonly settings: OrchestratorSettings;
}

/**
 * Mutable bookkeeping of one run.
 */
interface RunState {
  readonly plan: OperationPlan;
  readonly tracker: StepTracker;
  readonly startedAt: number;
  guardDisabled: boolean;
  readonly backups: string[];
}

/**
 * Reason a run stopped, before it is turned into a report.
 */
interface Halt {
  readonly kind: 'halt';
  readonly reason: string;
  readonly remediation: readonly Suggestion[];
}

function halt(reason: string, remediation: readonly Suggestion[] = []): Halt {
  return { kind: 'halt', reason, remediation };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Orchestrator {
  private readonly deps: OrchestratorDependencies;

  constructor(deps: OrchestratorDependencies) {
    this.deps = deps;
  }

  /**
   * Plans and runs an operation, then prints its closing narrative.
   *
   * @param signal - Aborting it interrupts the run at its next wait.
   */
  async run(request: OperationRequest, signal?: AbortSignal): Promise<OperationReport> {
    const { reporter, logger, clock } = this.deps;
    const startedAt = clock.now();

    const conflict = await this.deps.conflicts.detect(request.node.macAddress);
    const plan = computePlan(request, conflict);
    const state: RunState = {
      plan,
      tracker: new StepTracker(plan.totalSteps, reporter),
      startedAt,
      guardDisabled: false,
      backups: [],
    };

    reporter.header(operationTitle(plan));
    if (conflict?.nodePresent === true) {
      reporter.warn(
        `Found existing node '${conflict.nodeName}' with MAC address ${request.node.macAddress}; it will be cordoned, drained and removed first`
      );
    } else if (conflict !== undefined) {
      reporter.warn(
        `Found leftover BMH '${conflict.claimName}' with MAC address ${request.node.macAddress}; its node '${conflict.nodeName}' no longer exists, so only the BMH and machine will be removed`
      );
    }
    logger.info('operation_started', {
      kind: plan.kind,
      node: plan.replacementNode,
      totalSteps: plan.totalSteps,
      macConflict: conflict?.nodeName,
    });

    let report: OperationReport;
    try {
      report = await this.execute(state, signal);
    } catch (error) {
      if (!isAbortError(error)) {
        throw error;
      }
      report = this.failedReport(state, halt('Operation interrupted'), true);
    }

    logger.info(report.kind === 'succeeded' ? 'operation_succeeded' : 'operation_failed', {
      kind: plan.kind,
      node: plan.replacementNode,
      elapsedMs: report.elapsedMs,
      ...(report.kind === 'failed' ? { step: report.step, reason: report.reason } : {}),
    });
    presentReport(report, reporter);
    return report;
  }

  private async execute(state: RunState, signal?: AbortSignal): Promise<OperationReport> {
    const { plan, tracker } = state;
    const { reporter, resources, materializer } = this.deps;
    const nodeName = plan.replacementNode;
    const isAddition = plan.kind === 'addition';

    tracker.next('Setting up backup directory');
    let workspace: Workspace;
    try {
      workspace = await this.deps.prepareWorkspace(plan.backupDir);
    } catch (error) {
      return this.failedReport(state, halt(`Could not create backup directory: ${errorMessage(error)}`));
    }
    reporter.info(`${workspace.created ? 'Created' : 'Using'} backup directory ${workspace.dir}`);

    if (plan.macConflict !== undefined) {
      const resolution = await this.deps.conflicts.resolve(
        plan.macConflict,
        (text) => {
          tracker.next(text);
        },
        signal
      );
      if (resolution.kind === 'failed') {
        return this.failedReport(
          state,
          halt(resolution.reason, [
            { text: 'Check the existing node', action: `oc get node ${plan.macConflict.nodeName}` },
            {
              text: 'Check its host',
              action: `oc get bmh ${plan.macConflict.claimName} -n ${this.deps.settings.machineApiNamespace}`,
            },
          ])
        );
      }
      if (!plan.macConflict.nodePresent) {
        reporter.success(`Removed leftover machine ${plan.macConflict.machineName} and BMH ${plan.macConflict.claimName}`);
      } else if (resolution.drained) {
        reporter.success(`Removed existing node ${plan.macConflict.nodeName}`);
      } else {
        reporter.warn(`Removed existing node ${plan.macConflict.nodeName} without a clean drain`);
      }
      if (!resolution.deletionVerified) {
        reporter.warn(`Deletion of ${plan.macConflict.machineName} was not confirmed in time; continuing`);
      }
    }

    tracker.next('Getting template configuration');
    const template = await this.selectTemplate(plan, workspace.dir);
    if (template.kind === 'halt') {
      return this.failedReport(state, template);
    }

    if (plan.kind === 'expansion') {
      const stopped = await this.prepareExpansion(state, signal);
      if (stopped !== undefined) {
        return this.failedReport(state, stopped);
      }
    } else if (plan.kind === 'replacement') {
      const stopped = await this.removeFailedNode(state, template.failedNode, workspace.dir, signal);
      if (stopped !== undefined) {
        return this.failedReport(state, stopped);
      }
    }

    tracker.next(isAddition ? 'Creating configuration files for new worker' : 'Creating configuration files');
    const created = await materializer.createNodeConfigs({
      workspace: workspace.dir,
      nodeName,
      template: template.template,
      isPoolAddition: isAddition,
    });
    if (created.kind === 'failed') {
      return this.failedReport(state, halt(created.reason));
    }
    reporter.info(`Copied secrets from ${created.sourceNode}`);

    tracker.next(CONFIGURE_STEP[plan.kind]);
    const configured = await configureNode(created, plan.node);
    if (configured.kind === 'failed') {
      return this.failedReport(state, halt(configured.reason));
    }
    reporter.info(`BMC address: ${configured.bmcAddress}`);
    if (configured.updatedInterface !== undefined) {
      reporter.info(`Set ${configured.updatedInterface} to ${plan.node.ip}`);
    } else {
      reporter.warn('No enabled IPv4 interface found in the network state; address left unchanged');
    }
    if (configured.machineName !== undefined) {
      reporter.info(`Machine name: ${configured.machineName}`);
    }

    tracker.next(APPLY_STEP[plan.kind]);
    const stopped = await this.applyResources(created, isAddition);
    if (stopped !== undefined) {
      return this.failedReport(state, stopped);
    }

    tracker.next(MONITOR_STEP[plan.kind]);
    const machineFile = created.resources.get('compute-machine');
    const outcome = await this.deps.monitor.monitor(
      {
        nodeName,
        allowHeuristic: !isAddition,
        ...(machineFile === undefined ? {} : { machineFile }),
      },
      signal
    );
    if (outcome.kind === 'failed') {
      return this.failedReport(
        state,
        halt(outcome.message, outcome.remediation),
        outcome.failureKind === 'interrupted'
      );
    }
    reporter.success(`Node ${nodeName} is Ready on machine ${outcome.machine.name}`);

    if (plan.kind === 'expansion') {
      tracker.next('Re-enabling quorum guard');
      const enabled = await this.deps.quorum.enableQuorumGuard(signal);
      if (enabled.kind === 'failed') {
        return this.failedReport(state, halt(enabled.reason, this.etcdRemediation()));
      }
      state.guardDisabled = false;
      reporter.success('Quorum guard re-enabled');
    }

    return {
      kind: 'succeeded',
      operation: plan.kind,
      nodeName,
      stepsCompleted: tracker.completed,
      totalSteps: tracker.totalSteps,
      elapsedMs: this.deps.clock.now() - state.startedAt,
      machineName: outcome.machine.name,
      guardLeftDisabled: state.guardDisabled,
    };
  }

  /**
   * Picks the template host for the operation; for a replacement, the
   * failed node's own host.
   */
  private async selectTemplate(
    plan: OperationPlan,
    workspace: string
  ): Promise<{ kind: 'selected'; template: ClaimTemplate; failedNode: string } | Halt> {
    let source: TemplateSource;
    let failedNode = '';
    if (plan.kind === 'replacement') {
      const found = await this.deps.resources.findFailedControlPlaneNode();
      if (found === undefined) {
        return halt('No failed control-plane node found: every control-plane node is Ready', [
          { text: 'Check control-plane node status', action: 'oc get nodes -l node-role.kubernetes.io/control-plane' },
          { text: 'Use --expand-control-plane to add a node without replacing one' },
        ]);
      }
      failedNode = found;
      this.deps.reporter.info(`Failed control-plane node: ${failedNode}`);
      source = { kind: 'failed-node', nodeName: failedNode };
    } else {
      source = { kind: 'role', prefer: plan.kind === 'addition' ? 'worker' : 'control-plane' };
    }

    const result = await this.deps.materializer.selectTemplate(source, workspace);
    if (result.kind === 'failed') {
      return halt(result.reason, [
        { text: 'List the BareMetalHosts', action: `oc get bmh -n ${this.deps.settings.machineApiNamespace}` },
      ]);
    }
    if (result.template.fallback) {
      this.deps.reporter.warn(`No host with the preferred role found; using ${result.template.name} as template`);
    } else {
      this.deps.reporter.info(`Using ${result.template.name} as template`);
    }
    return { kind: 'selected', template: result.template, failedNode };
  }

  /**
   * Health check and guard disable ahead of a control-plane expansion.
   */
  private async prepareExpansion(state: RunState, signal?: AbortSignal): Promise<Halt | undefined> {
    const { tracker } = state;
    const { quorum, reporter } = this.deps;

    tracker.next('Checking etcd cluster health');
    const health = await quorum.checkClusterHealth();
    if (health.kind === 'failed') {
      return halt(health.reason, this.etcdRemediation());
    }
    if (health.unhealthyEndpoints.length > 0) {
      reporter.warn(`Unhealthy etcd endpoints: ${health.unhealthyEndpoints.join(', ')}`);
    } else {
      reporter.success(`All ${String(health.endpoints.length)} etcd endpoints are healthy`);
    }

    return this.disableGuard(state, signal);
  }

  /**
   * etcd member removal, guard disable, secret cleanup and removal of the
   * failed node's host and machine.
   */
  private async removeFailedNode(
    state: RunState,
    failedNode: string,
    workspace: string,
    signal?: AbortSignal
  ): Promise<Halt | undefined> {
    const { tracker } = state;
    const { quorum, reporter, resources } = this.deps;

    tracker.next('Removing failed etcd member');
    const removal = await quorum.removeFailedMember(failedNode, signal);
    switch (removal.kind) {
      case 'failed':
        return halt(removal.reason, this.etcdRemediation());
      case 'removed':
        if (removal.stillListed) {
          reporter.warn(`etcd member ${removal.memberName} (${removal.removedMemberId}) is still listed after removal`);
        } else {
          reporter.success(
            `Removed etcd member ${removal.memberName} (${removal.removedMemberId}); ${String(removal.remainingMemberCount)} members remain`
          );
        }
        break;
      case 'no-failed-member':
        reporter.warn(`All etcd endpoints are healthy (checked from ${removal.healthyMember}); no member removed`);
        break;
      case 'member-not-found':
        reporter.info(`No etcd member owns ${removal.failedEndpoint}; it was already removed`);
        break;
    }

    const stopped = await this.disableGuard(state, signal);
    if (stopped !== undefined) {
      return stopped;
    }

    tracker.next(`Cleaning up etcd secrets for ${failedNode}`);
    const cleanup = await quorum.cleanupMemberSecrets(failedNode, signal);
    if (cleanup.listFailed) {
      reporter.warn('Could not list etcd secrets; none were deleted');
    } else {
      reporter.info(`Deleted ${String(cleanup.deletedSecrets.length)} etcd secrets for ${cleanup.resolvedNodeName}`);
    }
    if (cleanup.failedSecrets.length > 0) {
      reporter.warn(`Could not delete: ${cleanup.failedSecrets.join(', ')}`);
    }

    const backup = await resources.findAndBackupFailedNode(failedNode, {
      backupDir: workspace,
      onStep: (text) => {
        tracker.next(text);
      },
      ...(signal === undefined ? {} : { signal }),
    });
    if (backup.kind === 'failed') {
      return halt(backup.reason, [
        { text: 'List the BareMetalHosts', action: `oc get bmh -n ${this.deps.settings.machineApiNamespace}` },
        { text: 'List the machines', action: `oc get machines -n ${this.deps.settings.machineApiNamespace}` },
      ]);
    }
    state.backups.push(backup.claimBackupPath, backup.machineBackupPath);
    reporter.success(`Removed ${backup.machineName} and ${backup.claimName}; backups kept in ${workspace}`);
    return undefined;
  }

  private async disableGuard(state: RunState, signal?: AbortSignal): Promise<Halt | undefined> {
    state.tracker.next('Disabling quorum guard');
    // Disabled from the patch onward, including during an interrupted settle wait.
    state.guardDisabled = true;
    const result = await this.deps.quorum.disableQuorumGuard(signal);
    if (result.kind === 'failed') {
      state.guardDisabled = false;
      return halt(result.reason, this.etcdRemediation());
    }
    this.deps.reporter.info(
      result.kind === 'already-disabled' ? 'Quorum guard was already disabled' : 'Quorum guard disabled'
    );
    return undefined;
  }

  private async applyResources(node: MaterializedNode, isAddition: boolean): Promise<Halt | undefined> {
    const { resources, reporter } = this.deps;

    const applied = await resources.applyMaterializedResources(node.resources, isAddition);
    if (applied.kind === 'failed') {
      return halt(`Failed to apply ${applied.resourceKind} from ${applied.path}`, [
        { text: 'Apply the file by hand to see the error', action: `oc apply -f ${applied.path}` },
      ]);
    }
    reporter.info(`Applied ${applied.kinds.join(', ')}`);
    if (!isAddition) {
      return undefined;
    }

    const pool = await resources.findWorkerPool();
    if (pool === undefined) {
      return halt('No worker MachineSet found to scale up', [
        { text: 'List the MachineSets', action: `oc get machinesets -n ${this.deps.settings.machineApiNamespace}` },
      ]);
    }
    const scaled = await resources.scalePool(pool, 'up');
    if (scaled.kind !== 'scaled') {
      const reason = scaled.kind === 'failed' ? scaled.reason : `MachineSet ${pool} could not be scaled up`;
      return halt(reason, [
        {
          text: 'Scale the MachineSet by hand',
          action: `oc scale machineset ${pool} -n ${this.deps.settings.machineApiNamespace} --replicas=<n>`,
        },
      ]);
    }
    reporter.info(`Scaled MachineSet ${pool} from ${String(scaled.from)} to ${String(scaled.to)}`);
    return undefined;
  }

  private etcdRemediation(): Suggestion[] {
    return [
      { text: 'Check the etcd pods', action: `oc get pods -n ${this.deps.settings.etcdNamespace} -l app=etcd` },
      { text: 'Check the etcd operator', action: 'oc get co etcd' },
    ];
  }

  private failedReport(state: RunState, stop: Halt, interrupted = false): OperationReport {
    return {
      kind: 'failed',
      operation: state.plan.kind,
      nodeName: state.plan.replacementNode,
      step: state.tracker.completed,
      stepText: state.tracker.currentStep,
      totalSteps: state.tracker.totalSteps,
      reason: stop.reason,
      remediation: stop.remediation,
      elapsedMs: this.deps.clock.now() - state.startedAt,
      guardLeftDisabled: state.guardDisabled,
      backups: [...state.backups],
      interrupted,
    };
  }
}
