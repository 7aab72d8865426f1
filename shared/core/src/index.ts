/**
 * @tierstack/core - Core Library
 *
 * Multi-level key/value cache with pluggable eviction, plus per-key async
 * locking for compound operations on shared state.
 *
 * ```typescript
 * import { createTieredCache, KeyLockRegistry } from '@tierstack/core';
 *
 * const cache = createTieredCache({ maxLevels: 3, capacities: [2, 3, 4] });
 * cache.on('drop', ({ key }) => console.log(`dropped ${key}`));
 * cache.write('a', '1');
 * ```
 *
 * @module @tierstack/core
 */

// =============================================================================
// Caching
// =============================================================================

export {
  TieredCache,
  createTieredCache,
  CacheTier,
  KeyQueue,
  LFUPolicy,
  LRUPolicy,
  FIFOPolicy,
  createLFUPolicy,
  createLRUPolicy,
  createFIFOPolicy,
  EVICTION_POLICIES,
  getEvictionPolicyFactory,
  createEvictionPolicy
} from './caching';
export type {
  TieredCacheEvents,
  TieredCacheDeps,
  TieredCacheStats,
  PeekResult,
  TierStats,
  EvictionPolicy,
  EvictionPolicyFactory
} from './caching';

// =============================================================================
// Locking
// =============================================================================

export { AsyncMutex, KeyLockRegistry, createKeyLockRegistry } from './async';
export type {
  MutexStats,
  ReleaseFn,
  LockGuard,
  KeyLockRegistryDeps,
  KeyLockRegistryStats
} from './async';

// =============================================================================
// Inventory
// =============================================================================

export { SlotInventory } from './inventory';
export type { Reservation, SlotInventoryOptions } from './inventory';

// =============================================================================
// Logging
// =============================================================================

export {
  createLogger,
  getLogger,
  resetLoggerCache,
  RecordingLogger,
  NullLogger
} from './logging';
export type { ILogger, LoggerConfig, LogLevel, LogMeta, LogEntry } from './logging';

// =============================================================================
// Re-exports
// =============================================================================

export {
  ErrorCode,
  ErrorSeverity,
  TierstackError,
  InvalidConfigurationError,
  ValidationError,
  LockTimeoutError,
  LockCancelledError,
  NotFoundError,
  SlotUnavailableError,
  isTierstackError,
  isRetryableError
} from '@tierstack/types';
export type {
  CacheKey,
  CacheValue,
  EvictedEntry,
  EvictionPolicyName,
  TierSnapshot,
  CascadeEvent,
  DropEvent,
  PromotionEvent,
  TierCreatedEvent
} from '@tierstack/types';
