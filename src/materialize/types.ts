/**
 * Types for node configuration materialization.
 *
 * @packageDocumentation
 */

import type { ResourceBackupSet } from '../resources/backup-set.js';

/**
 * Machine role after normalization. `control` and `control-plane` become `master`.
 */
export type NodeRole = 'master' | 'worker';

/**
 * Operator-supplied identity of the node being provisioned.
 */
export interface NodeParameters {
  readonly nodeName: string;
  readonly ip: string;
  readonly bmcIp: string;
  readonly macAddress: string;
  readonly role: NodeRole;
  /** Replaces the text after `Systems/` in a redfish BMC address. */
  readonly sushyUid?: string;
}

/**
 * BareMetalHost chosen as the template for the new node.
 */
export interface ClaimTemplate {
  readonly name: string;
  readonly path: string;
  readonly isWorker: boolean;
  /** Whether the preferred role had no host and another was used. */
  readonly fallback: boolean;
}

export type TemplateResult =
  | { readonly kind: 'selected'; readonly template: ClaimTemplate }
  | { readonly kind: 'failed'; readonly reason: string };

/**
 * Files written for a new node, not yet configured.
 */
export interface MaterializedNode {
  readonly resources: ResourceBackupSet;
  /** Ready control-plane node whose secrets were copied. */
  readonly sourceNode: string;
  /** Leading name parts of the template machine, e.g. `ocp4-x7k2p`. */
  readonly machineNamePrefix?: string;
}

export type MaterializeResult =
  | ({ readonly kind: 'created' } & MaterializedNode)
  | { readonly kind: 'failed'; readonly reason: string };

/**
 * What {@link configureNode} changed.
 */
export interface NodeConfiguration {
  readonly bmcAddress: string;
  readonly machineName?: string;
  readonly updatedInterface?: string;
}

export type ConfigureResult =
  | ({ readonly kind: 'configured' } & NodeConfiguration)
  | { readonly kind: 'failed'; readonly reason: string };
