/**
 * Time-bounded cache of the BareMetalHost list.
 *
 * @packageDocumentation
 */

import type { JsonObject } from '../cluster/json.js';
import { listItems } from '../cluster/resources.js';
import type { CommandExecutor } from '../executor/types.js';
import type { Clock } from '../utils/clock.js';
import type { Logger } from '../utils/logger.js';

export interface ClaimCacheOptions {
  readonly executor: CommandExecutor;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly namespace: string;
  readonly ttlMs: number;
}

export interface ClaimListOptions {
  /** Fetch even when the cached list is still fresh. */
  readonly forceRefresh?: boolean;
}

interface CacheEntry {
  readonly hosts: readonly JsonObject[];
  readonly fetchedAt: number;
}

/**
 * Caches `oc get bmh -n <namespace>` for a fixed TTL.
 *
 * Only a successful fetch replaces the cached list. A failed fetch returns
 * the previous list, or an empty one when nothing was ever fetched.
 */
export class ClaimCache {
  private readonly options: ClaimCacheOptions;
  private entry: CacheEntry | undefined;

  constructor(options: ClaimCacheOptions) {
    this.options = options;
  }

  async list(listOptions: ClaimListOptions = {}): Promise<readonly JsonObject[]> {
    const { clock, executor, logger, namespace, ttlMs } = this.options;
    const now = clock.now();
    if (
      listOptions.forceRefresh !== true &&
      this.entry !== undefined &&
      now - this.entry.fetchedAt < ttlMs
    ) {
      return this.entry.hosts;
    }

    const response = await executor.runJson(['get', 'bmh', '-n', namespace]);
    if (response === null) {
      logger.warn('claim_list_failed', { cached: this.entry?.hosts.length ?? 0 });
      return this.entry?.hosts ?? [];
    }

    const hosts = listItems(response);
    this.entry = { hosts, fetchedAt: now };
    logger.debug('claim_list_refreshed', { count: hosts.length });
    return hosts;
  }

  invalidate(): void {
    this.entry = undefined;
  }
}
