/**
 * Types for the node provisioning state machine.
 *
 * A new node moves through four phases, in order:
 * AwaitingClaim → AwaitingMachine → AwaitingRunning → AwaitingReady.
 * Phases never move backwards and each completion flag is set at most once.
 *
 * @packageDocumentation
 */

import type { Suggestion } from '../reporting/types.js';

/**
 * Phases of node provisioning, in execution order.
 */
export const PROVISIONING_PHASES = [
  'AwaitingClaim',
  'AwaitingMachine',
  'AwaitingRunning',
  'AwaitingReady',
] as const;

export type ProvisioningPhase = (typeof PROVISIONING_PHASES)[number];

/**
 * Milestone reached when a phase completes.
 */
export const PHASE_MARKERS: Readonly<Record<ProvisioningPhase, string>> = {
  AwaitingClaim: 'BMH Provisioned',
  AwaitingMachine: 'Machine Created',
  AwaitingRunning: 'Machine Running',
  AwaitingReady: 'Node Ready',
};

/**
 * Failure message when provisioning stops in a phase.
 */
export const PHASE_FAILURE_MESSAGES: Readonly<Record<ProvisioningPhase, string>> = {
  AwaitingClaim: 'BMH did not become Provisioned',
  AwaitingMachine: 'Machine creation failed',
  AwaitingRunning: 'Machine did not reach Running state',
  AwaitingReady: 'Node did not become Ready',
};

/**
 * Gets the index of a phase in the execution order.
 */
export function getPhaseIndex(phase: ProvisioningPhase): number {
  return PROVISIONING_PHASES.indexOf(phase);
}

/**
 * How the machine backing a node was identified.
 *
 * - `ConsumerRef`: the BareMetalHost names it in `spec.consumerRef`.
 * - `NumericHeuristic`: matched by host annotation or by the node's number.
 */
export interface MachineResolution {
  readonly resolvedVia: 'ConsumerRef' | 'NumericHeuristic';
  readonly name: string;
}

/**
 * Why CSR approval started before the node phase.
 */
export type CredentialCheckReason = '10min timer' | '3min threshold';

export type CredentialCheck =
  | { readonly armed: false }
  | { readonly armed: true; readonly reason: CredentialCheckReason; readonly armedAt: number };

export interface NodeProvisioningState {
  readonly phase: ProvisioningPhase;
  readonly claimResolved: boolean;
  readonly machineResolved: boolean;
  readonly machineRunning: boolean;
  readonly nodeReady: boolean;
  readonly targetMachine?: MachineResolution;
  /** When the current phase began, in epoch milliseconds. */
  readonly phaseStartTime: number;
  /** When the machine was resolved, for CSR arming. */
  readonly machineResolvedAt?: number;
  readonly credentialCheck: CredentialCheck;
}

/**
 * Observations that advance the state machine.
 */
export type ProvisioningEvent =
  | { readonly kind: 'claim-provisioned' }
  | { readonly kind: 'machine-resolved'; readonly resolution: MachineResolution }
  | { readonly kind: 'machine-running' }
  | { readonly kind: 'node-ready' }
  | { readonly kind: 'credential-check-armed'; readonly reason: CredentialCheckReason };

export type TransitionResult =
  | { readonly success: true; readonly state: NodeProvisioningState }
  | { readonly success: false; readonly error: string };

export type ProvisioningFailureKind = 'timeout' | 'state-divergence' | 'interrupted';

export type ProvisioningOutcome =
  | {
      readonly kind: 'ready';
      readonly machine: MachineResolution;
      readonly elapsedMs: number;
      readonly approvedCsrs: readonly string[];
    }
  | {
      readonly kind: 'failed';
      readonly failureKind: ProvisioningFailureKind;
      /** Phase the monitor was in when it stopped. */
      readonly phase: ProvisioningPhase;
      /** Milestone of that phase, e.g. `Machine Running`. */
      readonly marker: string;
      readonly message: string;
      readonly remediation: readonly Suggestion[];
      readonly elapsedMs: number;
      readonly approvedCsrs: readonly string[];
    };

/**
 * What the monitor watches and how.
 */
export interface MonitorTarget {
  /** BareMetalHost name, which is also the expected node name. */
  readonly nodeName: string;
  /** Whether the numeric fallback may resolve the machine. */
  readonly allowHeuristic: boolean;
  /** Machine manifest path shown in remediation, when one was applied. */
  readonly machineFile?: string;
}
