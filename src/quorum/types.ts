/**
 * Result types for etcd quorum operations.
 *
 * Every operation resolves to a discriminated union on `kind`. Outcomes that
 * find the work already done are successes with their own tag, so callers can
 * report them distinctly without treating them as failures.
 *
 * @packageDocumentation
 */

/**
 * An etcd member as reported by `etcdctl member list`.
 */
export interface EtcdMember {
  /** Decimal member ID, kept as a string since IDs are uint64. */
  readonly id: string;
  /** Hex form of the ID, as `etcdctl member remove` takes it. */
  readonly hexId: string;
  readonly name: string;
  readonly clientURLs: readonly string[];
}

/**
 * Health of one endpoint from `etcdctl endpoint health`.
 */
export interface EndpointHealth {
  readonly endpoint: string;
  readonly healthy: boolean;
}

/**
 * Member removed from the cluster.
 */
export interface QuorumOperationResult {
  /** Hex ID of the removed member. */
  readonly removedMemberId: string;
  readonly memberName: string;
  readonly failedEndpoint: string;
  /** Members left in the list returned by the removal. */
  readonly remainingMemberCount: number;
  /** Whether the removed ID still appeared in that list. */
  readonly stillListed: boolean;
}

export type MemberRemovalResult =
  | ({ readonly kind: 'removed' } & QuorumOperationResult)
  | { readonly kind: 'no-failed-member'; readonly healthyMember: string }
  | { readonly kind: 'member-not-found'; readonly failedEndpoint: string }
  | { readonly kind: 'failed'; readonly reason: string };

export type GuardDisableResult =
  | { readonly kind: 'disabled'; readonly waitedMs: number }
  | { readonly kind: 'already-disabled' }
  | { readonly kind: 'failed'; readonly reason: string };

export type GuardEnableResult =
  | { readonly kind: 'enabled'; readonly waitedMs: number }
  | { readonly kind: 'failed'; readonly reason: string };

export interface SecretCleanupResult {
  /** Cluster node name the identifier resolved to, or the identifier itself. */
  readonly resolvedNodeName: string;
  /** Whether the identifier matched a control-plane node. */
  readonly nodeMatched: boolean;
  readonly deletedSecrets: readonly string[];
  /** Secrets whose delete command failed. */
  readonly failedSecrets: readonly string[];
  /** Set when the secret list could not be read and nothing was deleted. */
  readonly listFailed: boolean;
}

export type ClusterHealthResult =
  | {
      readonly kind: 'healthy';
      readonly healthyMember: string;
      readonly endpoints: readonly EndpointHealth[];
      readonly unhealthyEndpoints: readonly string[];
    }
  | { readonly kind: 'failed'; readonly reason: string };

/**
 * etcd operations the orchestrator depends on.
 */
export interface QuorumOperations {
  findHealthyMember(excludePattern: string): Promise<string | null>;
  removeFailedMember(excludeNodeNamePattern: string, signal?: AbortSignal): Promise<MemberRemovalResult>;
  disableQuorumGuard(signal?: AbortSignal): Promise<GuardDisableResult>;
  enableQuorumGuard(signal?: AbortSignal): Promise<GuardEnableResult>;
  cleanupMemberSecrets(failedNodeIdentifier: string, signal?: AbortSignal): Promise<SecretCleanupResult>;
  checkClusterHealth(): Promise<ClusterHealthResult>;
}
