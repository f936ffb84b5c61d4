/**
 * Operator remediation for a provisioning run that stopped in a phase.
 *
 * @packageDocumentation
 */

import type { Suggestion } from '../reporting/types.js';
import type { ProvisioningPhase } from './types.js';

export interface RemediationContext {
  readonly nodeName: string;
  readonly namespace: string;
  readonly machineName?: string;
  readonly machineFile?: string;
}

/**
 * Suggestions for the phase a run stopped in. Never empty.
 */
export function remediationFor(
  phase: ProvisioningPhase,
  context: RemediationContext
): readonly Suggestion[] {
  const { nodeName, namespace } = context;

  switch (phase) {
    case 'AwaitingClaim':
      return [
        { text: 'Check BMH status', action: `oc get bmh ${nodeName} -n ${namespace}` },
        { text: 'Check BMH details', action: `oc describe bmh ${nodeName} -n ${namespace}` },
        { text: 'Check for hardware or networking issues on the host' },
        { text: 'Verify BMC credentials and connectivity' },
      ];
    case 'AwaitingMachine':
      return [
        { text: 'Check BMH status', action: `oc get bmh ${nodeName} -n ${namespace}` },
        {
          text: 'Create the machine manually',
          action: `oc apply -f ${context.machineFile ?? '<machine-yaml>'}`,
        },
      ];
    case 'AwaitingRunning':
      return [
        { text: 'Check machine status', action: `oc get machines -n ${namespace}` },
        {
          text: 'Check machine details',
          action: `oc describe machine ${context.machineName ?? '<machine-name>'} -n ${namespace}`,
        },
        { text: 'Check for provisioning errors in the machine status' },
      ];
    case 'AwaitingReady':
      return [
        { text: 'Check node status', action: `oc get nodes ${nodeName}` },
        { text: 'Check for pending CSRs', action: 'oc get csr --watch' },
        { text: 'Approve CSRs manually if needed', action: 'oc adm certificate approve <csr-name>' },
        { text: 'Check machine status', action: `oc get machine -n ${namespace}` },
        { text: 'Check BMH status', action: `oc get bmh ${nodeName} -n ${namespace}` },
      ];
  }
}
