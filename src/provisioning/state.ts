/**
 * Transition function for {@link NodeProvisioningState}.
 *
 * The monitor never edits its state directly; every change goes through
 * {@link applyEvent}, which rejects events that would skip or revisit a phase.
 *
 * @packageDocumentation
 */

import {
  type NodeProvisioningState,
  type ProvisioningEvent,
  type ProvisioningPhase,
  type TransitionResult,
} from './types.js';

/**
 * The phase each event completes, and the phase it leads to.
 */
const EVENT_PHASES: ReadonlyMap<
  Exclude<ProvisioningEvent['kind'], 'credential-check-armed'>,
  { readonly from: ProvisioningPhase; readonly to: ProvisioningPhase }
> = new Map([
  ['claim-provisioned', { from: 'AwaitingClaim', to: 'AwaitingMachine' }],
  ['machine-resolved', { from: 'AwaitingMachine', to: 'AwaitingRunning' }],
  ['machine-running', { from: 'AwaitingRunning', to: 'AwaitingReady' }],
  ['node-ready', { from: 'AwaitingReady', to: 'AwaitingReady' }],
] as const);

/**
 * Creates the state for a node that has just been applied.
 *
 * @param now - Start time in epoch milliseconds.
 */
export function createInitialState(now: number): NodeProvisioningState {
  return {
    phase: 'AwaitingClaim',
    claimResolved: false,
    machineResolved: false,
    machineRunning: false,
    nodeReady: false,
    phaseStartTime: now,
    credentialCheck: { armed: false },
  };
}

function rejected(event: ProvisioningEvent, state: NodeProvisioningState): TransitionResult {
  return {
    success: false,
    error: `Cannot apply '${event.kind}' in phase ${state.phase}`,
  };
}

/**
 * Applies an observation to the state.
 *
 * @param state - Current state.
 * @param event - What was observed.
 * @param now - Observation time in epoch milliseconds.
 * @returns The next state, or an error when the event is out of order or repeated.
 */
export function applyEvent(
  state: NodeProvisioningState,
  event: ProvisioningEvent,
  now: number
): TransitionResult {
  if (state.nodeReady) {
    return rejected(event, state);
  }

  if (event.kind === 'credential-check-armed') {
    if (!state.machineResolved || state.credentialCheck.armed) {
      return rejected(event, state);
    }
    return {
      success: true,
      state: { ...state, credentialCheck: { armed: true, reason: event.reason, armedAt: now } },
    };
  }

  const phases = EVENT_PHASES.get(event.kind);
  if (phases === undefined || phases.from !== state.phase) {
    return rejected(event, state);
  }
  const entered = phases.to !== state.phase ? { phase: phases.to, phaseStartTime: now } : {};

  switch (event.kind) {
    case 'claim-provisioned':
      return { success: true, state: { ...state, ...entered, claimResolved: true } };
    case 'machine-resolved':
      return {
        success: true,
        state: {
          ...state,
          ...entered,
          machineResolved: true,
          targetMachine: event.resolution,
          machineResolvedAt: now,
        },
      };
    case 'machine-running':
      return { success: true, state: { ...state, ...entered, machineRunning: true } };
    case 'node-ready':
      return { success: true, state: { ...state, nodeReady: true } };
  }
}

/**
 * Number of completion flags set, from 0 to 4.
 */
export function completedMilestones(state: NodeProvisioningState): number {
  return [state.claimResolved, state.machineResolved, state.machineRunning, state.nodeReady].filter(
    Boolean
  ).length;
}
