/**
 * Write-once map from resource kind to the file holding it.
 *
 * @packageDocumentation
 */

import { RESOURCE_KINDS, type ResourceKind } from './types.js';

/**
 * Error thrown when a kind is assigned a second path.
 */
export class BackupSetConflictError extends Error {
  public readonly resourceKind: ResourceKind;

  constructor(resourceKind: ResourceKind, existingPath: string) {
    super(`Resource kind '${resourceKind}' is already set to ${existingPath}`);
    this.name = 'BackupSetConflictError';
    this.resourceKind = resourceKind;
  }
}

/**
 * Files materialized for a node, keyed by {@link ResourceKind}.
 *
 * A path, once set, is never replaced. An absent kind is skipped on apply.
 */
export class ResourceBackupSet {
  private readonly paths = new Map<ResourceKind, string>();

  /**
   * @throws {BackupSetConflictError} If the kind already has a path.
   */
  set(kind: ResourceKind, path: string): this {
    const existing = this.paths.get(kind);
    if (existing !== undefined) {
      throw new BackupSetConflictError(kind, existing);
    }
    this.paths.set(kind, path);
    return this;
  }

  get(kind: ResourceKind): string | undefined {
    return this.paths.get(kind);
  }

  has(kind: ResourceKind): boolean {
    return this.paths.has(kind);
  }

  /** Present entries in {@link RESOURCE_KINDS} order. */
  entries(): [ResourceKind, string][] {
    const result: [ResourceKind, string][] = [];
    for (const kind of RESOURCE_KINDS) {
      const path = this.paths.get(kind);
      if (path !== undefined) {
        result.push([kind, path]);
      }
    }
    return result;
  }

  get size(): number {
    return this.paths.size;
  }
}
