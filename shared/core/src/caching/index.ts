/**
 * Caching Module
 *
 * - TieredCache: multi-level cache with cascading writes and read promotion
 * - CacheTier: one fixed-capacity level wrapping an eviction policy
 * - Eviction policies: LFU (default), LRU, FIFO
 * - KeyQueue: O(1) ordered key sequence backing the policies
 *
 * @module caching
 */

export { TieredCache, createTieredCache } from './tiered-cache';
export type {
  TieredCacheEvents,
  TieredCacheDeps,
  TieredCacheStats,
  PeekResult
} from './tiered-cache';

export { CacheTier } from './cache-tier';
export type { TierStats } from './cache-tier';

export { KeyQueue } from './key-queue';

export {
  LFUPolicy,
  LRUPolicy,
  FIFOPolicy,
  createLFUPolicy,
  createLRUPolicy,
  createFIFOPolicy,
  EVICTION_POLICIES,
  getEvictionPolicyFactory,
  createEvictionPolicy
} from './strategies';
export type { EvictionPolicy, EvictionPolicyFactory } from './strategies';
