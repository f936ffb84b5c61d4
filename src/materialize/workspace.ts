/**
 * Per-cluster backup directory.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { CommandExecutor } from '../executor/types.js';
import type { Logger } from '../utils/logger.js';
import { safeExists, safeMkdirp } from '../utils/safe-fs.js';

/** Directory name used when the cluster's base domain cannot be read. */
export const UNKNOWN_CLUSTER = 'unknown-cluster';

export interface WorkspaceOptions {
  readonly executor: CommandExecutor;
  readonly logger: Logger;
  /** Explicit directory; skips the base domain lookup. */
  readonly backupDir?: string;
  /** Parent of per-cluster directories. Empty means `<homeDir>/backup_yamls`. */
  readonly backupRoot: string;
  readonly homeDir: string;
}

export interface Workspace {
  readonly dir: string;
  readonly created: boolean;
  /** Base domain looked up for the default location. */
  readonly clusterName?: string;
}

/**
 * Resolves and creates the workspace directory.
 */
export async function prepareWorkspace(options: WorkspaceOptions): Promise<Workspace> {
  if (options.backupDir !== undefined && options.backupDir !== '') {
    const existed = await safeExists(options.backupDir);
    const dir = await safeMkdirp(options.backupDir);
    return { dir, created: !existed };
  }

  const output = await options.executor.run([
    'get',
    'dns',
    'cluster',
    '-o',
    'jsonpath={.spec.baseDomain}',
  ]);
  const domain = output?.replace(/^'+|'+$/g, '').trim();
  const clusterName = domain === undefined || domain === '' ? UNKNOWN_CLUSTER : domain;
  if (clusterName === UNKNOWN_CLUSTER) {
    options.logger.warn('base_domain_unavailable');
  }

  const root = options.backupRoot === '' ? path.join(options.homeDir, 'backup_yamls') : options.backupRoot;
  const target = path.join(root, clusterName);
  const existed = await safeExists(target);
  const dir = await safeMkdirp(target);
  return { dir, created: !existed, clusterName };
}
