/**
 * Node provisioning monitor.
 *
 * @packageDocumentation
 */

export { ProvisioningMonitor, monitorSettingsFromConfig } from './monitor.js';
export type { MonitorSettings, ProvisioningMonitorOptions } from './monitor.js';
export { applyEvent, createInitialState } from './state.js';
export { remediationFor } from './remediation.js';
export type { RemediationContext } from './remediation.js';
export { resolveByHeuristic, resolveFromClaim } from './machine-resolver.js';
export { PHASE_FAILURE_MESSAGES, PHASE_MARKERS, PROVISIONING_PHASES } from './types.js';
export type {
  CredentialCheck,
  CredentialCheckReason,
  MachineResolution,
  MonitorTarget,
  NodeProvisioningState,
  ProvisioningEvent,
  ProvisioningFailureKind,
  ProvisioningOutcome,
  ProvisioningPhase,
  TransitionResult,
} from './types.js';
