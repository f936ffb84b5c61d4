/**
 * Rewrites template files with the new node's identity.
 *
 * Each `update*` function returns a modified copy and leaves its input alone.
 * {@link configureNode} applies them to the files of a materialized node.
 *
 * @packageDocumentation
 */

import { ensureObject, getObjects, getPath, getString, type JsonObject } from '../cluster/json.js';
import { HOST_ROLE_LABEL, MACHINE_ROLE_LABEL, MACHINE_TYPE_LABEL } from '../cluster/resources.js';
import { parseManifest, readManifest, toYaml, writeManifest } from '../resources/manifest.js';
import { safeReadFile, safeWriteFile } from '../utils/safe-fs.js';
import type { ConfigureResult, MaterializedNode, NodeParameters, NodeRole } from './types.js';

const IPV4_PATTERN = /\b(?:[0-9]{1,3}\.){3}[0-9]{1,3}\b/g;

const SYSTEMS_SEGMENT = 'Systems/';

/** preDrain hook the etcd operator needs on every control-plane Machine. */
export const ETCD_PRE_DRAIN_HOOK = { name: 'EtcdQuorumOperator', owner: 'clusteroperator/etcd' } as const;

/**
 * Maps an operator-supplied role to a machine role.
 *
 * @returns `master` for `master`, `control` and `control-plane`; `worker` for
 *   `worker`; undefined for anything else.
 */
export function normalizeRole(role: string): NodeRole | undefined {
  switch (role.trim().toLowerCase()) {
    case 'master':
    case 'control':
    case 'control-plane':
      return 'master';
    case 'worker':
      return 'worker';
    default:
      return undefined;
  }
}

export function networkSecretName(nodeName: string): string {
  return `${nodeName}-network-config-secret`;
}

export function credentialSecretName(nodeName: string): string {
  return `${nodeName}-bmc-secret`;
}

/**
 * Sets the address of the first enabled IPv4 interface that has one.
 *
 * @returns The updated document and the interface changed, if any.
 */
export function updateNmstateIp(
  nmstate: JsonObject,
  ip: string
): { document: JsonObject; interfaceName?: string } {
  const document = structuredClone(nmstate);
  for (const iface of getObjects(document, 'interfaces')) {
    const first = getObjects(iface, 'ipv4', 'address')[0];
    if (getPath(iface, 'ipv4', 'enabled') === true && first !== undefined) {
      first['ip'] = ip;
      return { document, interfaceName: getString(iface, 'name') ?? 'unknown' };
    }
  }
  return { document };
}

/**
 * Embeds the nmstate text and renames the secret after the node.
 */
export function updateNetworkSecret(secret: JsonObject, nmstateText: string, nodeName: string): JsonObject {
  const updated = structuredClone(secret);
  ensureObject(updated, 'data')['nmstate'] = Buffer.from(nmstateText, 'utf-8').toString('base64');
  ensureObject(updated, 'metadata')['name'] = networkSecretName(nodeName);
  return updated;
}

export function updateCredentialSecret(secret: JsonObject, nodeName: string): JsonObject {
  const updated = structuredClone(secret);
  ensureObject(updated, 'metadata')['name'] = credentialSecretName(nodeName);
  return updated;
}

/**
 * Replaces the IPv4 host in a BMC address and, with a sushy UID, the system path.
 */
export function rewriteBmcAddress(address: string, bmcIp: string, sushyUid?: string): string {
  const replaced = address.replace(IPV4_PATTERN, bmcIp);
  if (sushyUid === undefined || sushyUid === '') {
    return replaced;
  }
  const index = replaced.indexOf(SYSTEMS_SEGMENT);
  return index === -1 ? replaced : replaced.slice(0, index + SYSTEMS_SEGMENT.length) + sushyUid;
}

/**
 * Points a template BareMetalHost at the new node's hardware and secrets.
 */
export function updateClaim(claim: JsonObject, params: NodeParameters): JsonObject {
  const updated = structuredClone(claim);
  const metadata = ensureObject(updated, 'metadata');
  const spec = ensureObject(updated, 'spec');
  const bmc = ensureObject(spec, 'bmc');

  metadata['name'] = params.nodeName;
  ensureObject(metadata, 'labels')[HOST_ROLE_LABEL] = params.role === 'master' ? 'control-plane' : 'worker';
  bmc['address'] = rewriteBmcAddress(getString(bmc, 'address') ?? '', params.bmcIp, params.sushyUid);
  bmc['credentialsName'] = credentialSecretName(params.nodeName);
  spec['bootMACAddress'] = params.macAddress;
  spec['preprovisioningNetworkDataName'] = networkSecretName(params.nodeName);
  return updated;
}

/**
 * Machine name for a node: `<prefix>-<role>-<first number in node name>`.
 */
export function machineNameFor(prefix: string, nodeName: string, role: NodeRole): string {
  const number = /(\d+)/.exec(nodeName)?.[1] ?? '0';
  return `${prefix}-${role}-${number}`;
}

/**
 * First two dash-separated parts of a machine name, e.g. `ocp4-x7k2p` for
 * `ocp4-x7k2p-master-0`.
 */
export function machineNamePrefix(machineName: string): string {
  return machineName.split('-').slice(0, 2).join('-');
}

/**
 * Names a template Machine for the node and sets its role-specific fields.
 */
export function updateMachine(
  machine: JsonObject,
  nodeName: string,
  role: NodeRole,
  prefix: string
): JsonObject {
  const updated = structuredClone(machine);
  const metadata = ensureObject(updated, 'metadata');
  const labels = ensureObject(metadata, 'labels');
  const spec = ensureObject(updated, 'spec');

  labels[MACHINE_ROLE_LABEL] = role;
  labels[MACHINE_TYPE_LABEL] = role;
  metadata['name'] = machineNameFor(prefix, nodeName, role);

  if (role === 'master') {
    if (spec['lifecycleHooks'] === undefined || spec['lifecycleHooks'] === null) {
      spec['lifecycleHooks'] = { preDrain: [{ ...ETCD_PRE_DRAIN_HOOK }] };
    }
  } else {
    delete spec['lifecycleHooks'];
  }

  ensureObject(spec, 'providerSpec', 'value', 'userData')['name'] =
    role === 'master' ? 'master-user-data-managed' : 'worker-user-data-managed';
  return updated;
}

/**
 * Rewrites every file of a materialized node in place.
 */
export async function configureNode(
  node: MaterializedNode,
  params: NodeParameters
): Promise<ConfigureResult> {
  const { resources } = node;
  try {
    let updatedInterface: string | undefined;
    const nmstatePath = resources.get('node-state-file');
    if (nmstatePath !== undefined) {
      const nmstate = parseManifest(await safeReadFile(nmstatePath));
      if (nmstate === undefined) {
        return { kind: 'failed', reason: `${nmstatePath} is not an nmstate document` };
      }
      const result = updateNmstateIp(nmstate, params.ip);
      updatedInterface = result.interfaceName;
      await safeWriteFile(nmstatePath, toYaml(result.document));

      const secretPath = resources.get('network-secret');
      if (secretPath !== undefined) {
        const secret = await readManifest(secretPath);
        await writeManifest(
          secretPath,
          updateNetworkSecret(secret, await safeReadFile(nmstatePath), params.nodeName)
        );
      }
    }

    const credentialPath = resources.get('credential-secret');
    if (credentialPath !== undefined) {
      const secret = await readManifest(credentialPath);
      await writeManifest(credentialPath, updateCredentialSecret(secret, params.nodeName));
    }

    let bmcAddress = '';
    const claimPath = resources.get('bare-metal-claim');
    if (claimPath !== undefined) {
      const claim = updateClaim(await readManifest(claimPath), params);
      bmcAddress = getString(claim, 'spec', 'bmc', 'address') ?? '';
      await writeManifest(claimPath, claim);
    }

    let machineName: string | undefined;
    const machinePath = resources.get('compute-machine');
    if (machinePath !== undefined) {
      if (node.machineNamePrefix === undefined) {
        return { kind: 'failed', reason: 'Machine template has no name to derive the new name from' };
      }
      const machine = updateMachine(
        await readManifest(machinePath),
        params.nodeName,
        params.role,
        node.machineNamePrefix
      );
      machineName = getString(machine, 'metadata', 'name');
      await writeManifest(machinePath, machine);
    }

    return {
      kind: 'configured',
      bmcAddress,
      ...(machineName === undefined ? {} : { machineName }),
      ...(updatedInterface === undefined ? {} : { updatedInterface }),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { kind: 'failed', reason: `Failed to configure node files: ${message}` };
  }
}
