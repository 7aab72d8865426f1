/**
 * Eviction Policy Interface
 *
 * Contract every per-tier eviction algorithm satisfies. A tier holds one
 * policy instance and forwards get/put/delete to it; the tiered cache never
 * depends on which algorithm is behind the interface.
 *
 * @module caching/strategies
 */

import type { CacheKey, CacheValue, EvictedEntry, EvictionPolicyName } from '@tierstack/types';

export interface EvictionPolicy {
  readonly name: EvictionPolicyName;
  readonly capacity: number;
  readonly size: number;

  /**
   * Look up a key, updating the policy's bookkeeping on a hit
   * (frequency for LFU, recency for LRU).
   */
  get(key: CacheKey): CacheValue | undefined;

  /**
   * Look up a key without touching bookkeeping.
   */
  peek(key: CacheKey): CacheValue | undefined;

  has(key: CacheKey): boolean;

  /**
   * Insert or overwrite a key.
   *
   * @returns The entry pushed out to make room, or null when nothing was
   * evicted. With capacity 0 the new entry itself is returned.
   */
  put(key: CacheKey, value: CacheValue): EvictedEntry | null;

  /**
   * @returns true if the key was present
   */
  delete(key: CacheKey): boolean;

  /**
   * Resident entries in first-insertion order.
   */
  entries(): Array<[CacheKey, CacheValue]>;

  clear(): void;
}

export type EvictionPolicyFactory = (capacity: number) => EvictionPolicy;
