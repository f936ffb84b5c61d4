/**
 * etcd quorum operations.
 *
 * @packageDocumentation
 */

export {
  DISABLE_GUARD_PATCH,
  ENABLE_GUARD_COMMAND,
  ENABLE_GUARD_PATCH,
  QuorumManager,
  endpointHost,
  matchMember,
  parseEndpointHealth,
  parseMemberList,
  quorumDurationsFromConfig,
} from './quorum-manager.js';
export type { QuorumDurations, QuorumManagerOptions } from './quorum-manager.js';
export type {
  ClusterHealthResult,
  EndpointHealth,
  EtcdMember,
  GuardDisableResult,
  GuardEnableResult,
  MemberRemovalResult,
  QuorumOperationResult,
  QuorumOperations,
  SecretCleanupResult,
} from './types.js';
