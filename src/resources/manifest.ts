/**
 * Manifest files written to and read from the backup workspace.
 *
 * Backups keep only the fields needed to recreate a resource, so runtime
 * state such as `status`, `consumerRef` or server-managed metadata never
 * reaches `oc apply`.
 *
 * @packageDocumentation
 */

import * as yaml from 'js-yaml';
import { getPath, isJsonObject, type JsonObject } from '../cluster/json.js';
import { safeReadFile, safeWriteFile } from '../utils/safe-fs.js';

/** Machine name written into templates until a node is configured. */
export const PLACEHOLDER_MACHINE_NAME = 'PLACEHOLDER_NAME';

/** Metadata the API server manages, dropped from backed-up secrets. */
export const SERVER_MANAGED_METADATA = [
  'creationTimestamp',
  'resourceVersion',
  'uid',
  'ownerReferences',
  'annotations',
  'managedFields',
  'finalizers',
] as const;

function field(source: unknown, ...keys: readonly string[]): unknown {
  return getPath(source, ...keys) ?? null;
}

/**
 * Stable BareMetalHost fields. Missing fields are kept as null.
 */
export function extractClaimFields(host: unknown): JsonObject {
  const spec = (...keys: readonly string[]): unknown => field(host, 'spec', ...keys);
  return {
    apiVersion: field(host, 'apiVersion'),
    kind: field(host, 'kind'),
    metadata: {
      name: field(host, 'metadata', 'name'),
      namespace: field(host, 'metadata', 'namespace'),
    },
    spec: {
      automatedCleaningMode: spec('automatedCleaningMode'),
      bmc: {
        address: spec('bmc', 'address'),
        credentialsName: spec('bmc', 'credentialsName'),
        disableCertificateVerification: spec('bmc', 'disableCertificateVerification'),
      },
      bootMACAddress: spec('bootMACAddress'),
      bootMode: spec('bootMode'),
      externallyProvisioned: spec('externallyProvisioned'),
      online: spec('online'),
      rootDeviceHints: { deviceName: spec('rootDeviceHints', 'deviceName') },
      preprovisioningNetworkDataName: spec('preprovisioningNetworkDataName'),
      userData: {
        name: spec('userData', 'name'),
        namespace: spec('userData', 'namespace'),
      },
    },
  };
}

/**
 * Stable Machine fields, with the name replaced by {@link PLACEHOLDER_MACHINE_NAME}.
 */
export function extractMachineFields(machine: unknown): JsonObject {
  const value = (key: string): unknown => field(machine, 'spec', 'providerSpec', 'value', key);
  const labels = getPath(machine, 'metadata', 'labels');
  return {
    apiVersion: field(machine, 'apiVersion'),
    kind: field(machine, 'kind'),
    metadata: {
      labels: isJsonObject(labels) ? { ...labels } : {},
      name: PLACEHOLDER_MACHINE_NAME,
      namespace: field(machine, 'metadata', 'namespace'),
    },
    spec: {
      lifecycleHooks: field(machine, 'spec', 'lifecycleHooks'),
      providerSpec: {
        value: {
          apiVersion: value('apiVersion'),
          customDeploy: value('customDeploy'),
          image: value('image'),
          kind: value('kind'),
          userData: value('userData'),
        },
      },
    },
  };
}

/**
 * Copy of a Secret without server-managed metadata.
 */
export function sanitizeSecret(secret: JsonObject): JsonObject {
  const copy: JsonObject = { ...secret };
  const metadata = secret['metadata'];
  if (isJsonObject(metadata)) {
    const cleaned: JsonObject = { ...metadata };
    for (const key of SERVER_MANAGED_METADATA) {
      delete cleaned[key];
    }
    copy['metadata'] = cleaned;
  }
  return copy;
}

export function toYaml(manifest: JsonObject): string {
  return yaml.dump(manifest, {
    indent: 2,
    lineWidth: -1,
    noRefs: true,
    sortKeys: false,
  });
}

/**
 * Parses a single YAML document into an object.
 *
 * @returns The document, or undefined when it is not valid YAML or not a mapping.
 */
export function parseManifest(text: string): JsonObject | undefined {
  try {
    const parsed = yaml.load(text);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export async function writeManifest(filePath: string, manifest: JsonObject): Promise<void> {
  await safeWriteFile(filePath, toYaml(manifest));
}

/**
 * Reads a manifest file written by {@link writeManifest}.
 *
 * @throws {Error} If the file does not hold a YAML mapping.
 */
export async function readManifest(filePath: string): Promise<JsonObject> {
  const manifest = parseManifest(await safeReadFile(filePath));
  if (manifest === undefined) {
    throw new Error(`${filePath} does not contain a YAML mapping`);
  }
  return manifest;
}
