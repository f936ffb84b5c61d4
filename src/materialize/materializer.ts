/**
 * Writes the template files a new node is configured from.
 *
 * @packageDocumentation
 */

import { ensureObject, getString, type JsonObject } from '../cluster/json.js';
import {
  HOST_ROLE_LABEL,
  MACHINE_ROLE_LABEL,
  MACHINE_TYPE_LABEL,
  listItems,
  resourceLabels,
  resourceName,
} from '../cluster/resources.js';
import { ResourceBackupSet } from '../resources/backup-set.js';
import {
  extractClaimFields,
  extractMachineFields,
  readManifest,
  sanitizeSecret,
  writeManifest,
} from '../resources/manifest.js';
import type { ResourceManager } from '../resources/resource-manager.js';
import type { Logger } from '../utils/logger.js';
import { resolveWithin, safeWriteFile } from '../utils/safe-fs.js';
import { credentialSecretName, machineNamePrefix, networkSecretName } from './node-configurator.js';
import type { ClaimTemplate, MaterializeResult, TemplateResult } from './types.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type HostRole = 'control-plane' | 'worker';

/**
 * Where the template BareMetalHost comes from.
 */
export type TemplateSource =
  | { readonly kind: 'failed-node'; readonly nodeName: string }
  | { readonly kind: 'role'; readonly prefer: HostRole };

/**
 * Picks a host with the preferred role, then one with the other role, then any host.
 */
export function pickTemplateHost(
  hosts: readonly JsonObject[],
  prefer: HostRole
): { host: JsonObject; fallback: boolean } | undefined {
  const other: HostRole = prefer === 'worker' ? 'control-plane' : 'worker';
  const withRole = (role: HostRole): JsonObject | undefined =>
    hosts.find((host) => resourceLabels(host)[HOST_ROLE_LABEL] === role);

  const preferred = withRole(prefer);
  if (preferred !== undefined) {
    return { host: preferred, fallback: false };
  }
  const fallback = withRole(other) ?? hosts[0];
  return fallback === undefined ? undefined : { host: fallback, fallback: true };
}

/**
 * Picks the Machine a new node's Machine is copied from.
 *
 * A worker template prefers a worker Machine; a control-plane Machine used
 * for a worker has its role labels switched.
 */
export function pickMachineTemplate(
  machines: readonly JsonObject[],
  isWorker: boolean
): JsonObject | undefined {
  if (isWorker) {
    const worker = machines.find((machine) => resourceLabels(machine)[MACHINE_ROLE_LABEL] === 'worker');
    if (worker !== undefined) {
      return worker;
    }
  }

  const first = machines[0];
  if (first === undefined) {
    return undefined;
  }
  if (isWorker && resourceLabels(first)[MACHINE_ROLE_LABEL] === 'master') {
    const adapted = structuredClone(first);
    const labels = ensureObject(adapted, 'metadata', 'labels');
    labels[MACHINE_ROLE_LABEL] = 'worker';
    labels[MACHINE_TYPE_LABEL] = 'worker';
    return adapted;
  }
  return first;
}

export interface MaterializerOptions {
  readonly resources: ResourceManager;
  readonly logger: Logger;
}

export interface NodeConfigRequest {
  readonly workspace: string;
  readonly nodeName: string;
  readonly template: ClaimTemplate;
  /** The worker MachineSet creates the Machine, so no Machine file is written. */
  readonly isPoolAddition: boolean;
}

export class NodeMaterializer {
  private readonly resources: ResourceManager;
  private readonly logger: Logger;

  constructor(options: MaterializerOptions) {
    this.resources = options.resources;
    this.logger = options.logger;
  }

  /**
   * Chooses the template BareMetalHost and backs it up as `<name>_bmh.yaml`.
   */
  async selectTemplate(source: TemplateSource, workspace: string): Promise<TemplateResult> {
    let host: JsonObject | undefined;
    let fallback = false;

    if (source.kind === 'failed-node') {
      host = (await this.resources.getClaim(source.nodeName)) ?? undefined;
      if (host === undefined) {
        return { kind: 'failed', reason: `Failed to retrieve BMH data for ${source.nodeName}` };
      }
    } else {
      const picked = pickTemplateHost(await this.resources.listClaims(), source.prefer);
      if (picked === undefined) {
        return { kind: 'failed', reason: 'No BMH found to use as template' };
      }
      host = picked.host;
      fallback = picked.fallback;
    }

    const name = resourceName(host);
    if (name === undefined) {
      return { kind: 'failed', reason: 'Template BMH has no name' };
    }
    let path: string;
    try {
      path = resolveWithin(workspace, `${name}_bmh.yaml`);
      await writeManifest(path, extractClaimFields(host));
    } catch (error) {
      return { kind: 'failed', reason: `Could not back up template BMH ${name}: ${errorMessage(error)}` };
    }
    const isWorker = resourceLabels(host)[HOST_ROLE_LABEL] === 'worker';
    this.logger.info('template_selected', { name, path, isWorker, fallback });

    return { kind: 'selected', template: { name, path, isWorker, fallback } };
  }

  /**
   * Copies a Ready control-plane node's secrets and the templates into files
   * named after the new node.
   */
  async createNodeConfigs(request: NodeConfigRequest): Promise<MaterializeResult> {
    const { workspace, nodeName } = request;

    const sourceNode = await this.resources.findReadyControlPlaneNode();
    if (sourceNode === undefined) {
      return { kind: 'failed', reason: 'No Ready control-plane node found to copy secrets from' };
    }

    const networkSecret = await this.resources.getSecret(networkSecretName(sourceNode));
    if (networkSecret === null) {
      return { kind: 'failed', reason: `Could not read secret ${networkSecretName(sourceNode)}` };
    }
    const encodedState = getString(networkSecret, 'data', 'nmstate');
    if (encodedState === undefined) {
      return { kind: 'failed', reason: `Secret ${networkSecretName(sourceNode)} has no nmstate data` };
    }
    const credentialSecret = await this.resources.getSecret(credentialSecretName(sourceNode));
    if (credentialSecret === null) {
      return { kind: 'failed', reason: `Could not read secret ${credentialSecretName(sourceNode)}` };
    }

    let machineTemplate: JsonObject | undefined;
    if (!request.isPoolAddition) {
      machineTemplate = pickMachineTemplate(
        listItems(await this.resources.listMachines()),
        request.template.isWorker
      );
      if (machineTemplate === undefined) {
        return { kind: 'failed', reason: 'No machine found to use as template' };
      }
    }

    const resources = new ResourceBackupSet();
    const file = (name: string): string => resolveWithin(workspace, name);
    let prefix: string | undefined;
    try {
      const networkPath = file(`${nodeName}_network-config-secret.yaml`);
      await writeManifest(networkPath, sanitizeSecret(networkSecret));
      resources.set('network-secret', networkPath);

      const credentialPath = file(`${nodeName}-bmc-secret.yaml`);
      await writeManifest(credentialPath, sanitizeSecret(credentialSecret));
      resources.set('credential-secret', credentialPath);

      const statePath = file(`${nodeName}_nmstate`);
      await safeWriteFile(statePath, Buffer.from(encodedState, 'base64').toString('utf-8'));
      resources.set('node-state-file', statePath);

      const claimPath = file(`${nodeName}_bmh.yaml`);
      const claim = await readManifest(request.template.path);
      await writeManifest(claimPath, claim);
      resources.set('bare-metal-claim', claimPath);

      if (machineTemplate !== undefined) {
        const machinePath = file(`${nodeName}_machine.yaml`);
        await writeManifest(machinePath, extractMachineFields(machineTemplate));
        resources.set('compute-machine', machinePath);
        const templateName = resourceName(machineTemplate);
        prefix = templateName === undefined ? undefined : machineNamePrefix(templateName);
      }
    } catch (error) {
      return { kind: 'failed', reason: `Could not write node files: ${errorMessage(error)}` };
    }

    this.logger.info('node_configs_created', { nodeName, sourceNode, files: resources.size });
    return prefix === undefined
      ? { kind: 'created', resources, sourceNode }
      : { kind: 'created', resources, sourceNode, machineNamePrefix: prefix };
  }
}
