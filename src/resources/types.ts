/**
 * Types for the Resource Lifecycle Manager.
 *
 * @packageDocumentation
 */

/**
 * Kinds of node resource file a {@link ResourceBackupSet} can hold.
 */
export const RESOURCE_KINDS = [
  'network-secret',
  'credential-secret',
  'node-state-file',
  'bare-metal-claim',
  'compute-machine',
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

/**
 * Order in which materialized resources are applied. The node state file
 * is only an input to the network secret and is never applied itself.
 */
export const APPLY_ORDER: readonly ResourceKind[] = [
  'network-secret',
  'credential-secret',
  'bare-metal-claim',
  'compute-machine',
];

/**
 * Outcome of locating, backing up and removing a failed control-plane node.
 */
export type FailedNodeBackupResult =
  | {
      readonly kind: 'removed';
      readonly claimName: string;
      readonly machineName: string;
      readonly claimBackupPath: string;
      readonly machineBackupPath: string;
    }
  | {
      readonly kind: 'failed';
      readonly stage: FailedNodeStage;
      readonly reason: string;
    };

/** Sub-steps of {@link FailedNodeBackupResult}, reported as plan steps. */
export type FailedNodeStage = 'locate' | 'backup' | 'remove';

export type ScaleDirection = 'up' | 'down';

/**
 * Outcome of scaling a MachineSet by one replica.
 */
export type ScaleResult =
  | { readonly kind: 'scaled'; readonly from: number; readonly to: number }
  | { readonly kind: 'already-at-floor' }
  | { readonly kind: 'invalid-direction'; readonly direction: string }
  | { readonly kind: 'failed'; readonly reason: string };

/**
 * Outcome of applying a backup set to the cluster.
 */
export type ApplyResult =
  | { readonly kind: 'applied'; readonly kinds: readonly ResourceKind[] }
  | { readonly kind: 'failed'; readonly resourceKind: ResourceKind; readonly path: string };

/**
 * A host already registered with the MAC address being provisioned, whose
 * Machine has become a node.
 */
export interface MacConflict {
  readonly claimName: string;
  readonly machineName: string;
  readonly nodeName: string;
  /**
   * Whether the Node object still exists. A leftover host and machine whose
   * node is gone are removed without cordon or drain.
   */
  readonly nodePresent: boolean;
}

/**
 * Outcome of cleaning up a {@link MacConflict}.
 */
export type ConflictResolution =
  | {
      readonly kind: 'resolved';
      readonly drained: boolean;
      readonly scaledPool?: string;
      readonly deletionVerified: boolean;
    }
  | { readonly kind: 'failed'; readonly reason: string };

/**
 * Reports the start of one of a multi-step operation's plan steps.
 */
export type StepCallback = (text: string) => void;
