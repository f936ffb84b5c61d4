/**
 * Node resource lifecycle: claims, machines, pools and backups.
 *
 * @packageDocumentation
 */

export { BackupSetConflictError, ResourceBackupSet } from './backup-set.js';
export { ClaimCache } from './claim-cache.js';
export type { ClaimCacheOptions, ClaimListOptions } from './claim-cache.js';
export { CONFLICT_STEPS, ConflictResolver } from './conflict-resolver.js';
export type { ConflictResolverOptions } from './conflict-resolver.js';
export {
  PLACEHOLDER_MACHINE_NAME,
  SERVER_MANAGED_METADATA,
  extractClaimFields,
  extractMachineFields,
  parseManifest,
  readManifest,
  sanitizeSecret,
  toYaml,
  writeManifest,
} from './manifest.js';
export {
  DELETE_MACHINE_ANNOTATION,
  ResourceManager,
  resourceDurationsFromConfig,
} from './resource-manager.js';
export type {
  DeletionTargets,
  FailedNodeBackupOptions,
  ResourceDurations,
  ResourceManagerOptions,
} from './resource-manager.js';
export { APPLY_ORDER, RESOURCE_KINDS } from './types.js';
export type {
  ApplyResult,
  ConflictResolution,
  FailedNodeBackupResult,
  FailedNodeStage,
  MacConflict,
  ResourceKind,
  ScaleDirection,
  ScaleResult,
  StepCallback,
} from './types.js';
