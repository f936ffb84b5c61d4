/**
 * Field accessors for the cluster objects nodeswap reads: BareMetalHosts,
 * Machines, MachineSets, Nodes, CSRs and etcd pods.
 *
 * @packageDocumentation
 */

import { getObjects, getString, getStringMap, type JsonObject } from './json.js';

/** Annotation a Machine carries naming the BareMetalHost it is bound to. */
export const MACHINE_HOST_ANNOTATION = 'metal3.io/BareMetalHost';

/** Label carrying the installer role of a BareMetalHost. */
export const HOST_ROLE_LABEL = 'installer.openshift.io/role';

/** Label carrying a Machine's role. */
export const MACHINE_ROLE_LABEL = 'machine.openshift.io/cluster-api-machine-role';

/** Label carrying the machine type, kept equal to the role. */
export const MACHINE_TYPE_LABEL = 'machine.openshift.io/cluster-api-machine-type';

/** Label selecting worker MachineSets. */
export const WORKER_MACHINESET_SELECTOR = 'machine.openshift.io/cluster-api-machine-role=worker';

/** Label selecting control-plane nodes. */
export const CONTROL_PLANE_NODE_SELECTOR = 'node-role.kubernetes.io/control-plane';

export function resourceName(resource: unknown): string | undefined {
  return getString(resource, 'metadata', 'name');
}

export function resourceLabels(resource: unknown): Record<string, string> {
  return getStringMap(resource, 'metadata', 'labels');
}

export function resourceAnnotations(resource: unknown): Record<string, string> {
  return getStringMap(resource, 'metadata', 'annotations');
}

/**
 * Items of a `List` response, or an empty array.
 */
export function listItems(list: unknown): JsonObject[] {
  return getObjects(list, 'items');
}

/**
 * `status.provisioning.state` of a BareMetalHost.
 */
export function hostProvisioningState(host: unknown): string | undefined {
  return getString(host, 'status', 'provisioning', 'state');
}

/**
 * Machine name from a BareMetalHost's `spec.consumerRef`, when it refers to a Machine.
 */
export function hostConsumerMachine(host: unknown): string | undefined {
  const kind = getString(host, 'spec', 'consumerRef', 'kind');
  if (kind !== undefined && kind !== 'Machine') {
    return undefined;
  }
  return getString(host, 'spec', 'consumerRef', 'name');
}

/**
 * MAC addresses a BareMetalHost reports, lower-cased: its boot MAC followed
 * by every NIC from hardware inspection.
 */
export function hostMacAddresses(host: unknown): string[] {
  const macs: string[] = [];
  const boot = getString(host, 'spec', 'bootMACAddress');
  if (boot !== undefined) {
    macs.push(boot.toLowerCase());
  }
  for (const nic of getObjects(host, 'status', 'hardwareDetails', 'nics')) {
    const mac = getString(nic, 'mac');
    if (mac !== undefined) {
      macs.push(mac.toLowerCase());
    }
  }
  return macs;
}

/**
 * `status.phase` of a Machine.
 */
export function machinePhase(machine: unknown): string | undefined {
  return getString(machine, 'status', 'phase');
}

/**
 * Node a Machine has become, from `status.nodeRef.name`.
 */
export function machineNodeName(machine: unknown): string | undefined {
  return getString(machine, 'status', 'nodeRef', 'name');
}

/**
 * Name of the MachineSet owning a Machine, from its owner references only.
 */
export function machineOwningSet(machine: unknown): string | undefined {
  const owner = getObjects(machine, 'metadata', 'ownerReferences').find(
    (ref) => getString(ref, 'kind') === 'MachineSet'
  );
  return owner === undefined ? undefined : getString(owner, 'name');
}

/**
 * Whether a Node reports condition `Ready` with status `"True"`.
 */
export function isNodeReady(node: unknown): boolean {
  return getObjects(node, 'status', 'conditions').some(
    (condition) => getString(condition, 'type') === 'Ready' && getString(condition, 'status') === 'True'
  );
}

/**
 * Whether a CSR is still pending, meaning it carries no status conditions.
 */
export function isCsrPending(csr: unknown): boolean {
  return getObjects(csr, 'status', 'conditions').length === 0;
}

/**
 * First run of digits in a name, used to pair `master-2` with `cluster-master-2`.
 */
export function embeddedNumber(name: string): string | undefined {
  const match = /(\d+)/.exec(name);
  return match?.[1];
}
