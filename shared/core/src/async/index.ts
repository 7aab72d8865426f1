/**
 * Async Module
 *
 * Mutual exclusion primitives:
 * - AsyncMutex: FIFO async mutex with direct hand-off and bounded waits
 * - KeyLockRegistry: lazily created per-key mutexes
 *
 * @module async
 */

export { AsyncMutex } from './async-mutex';
export type { MutexStats, ReleaseFn } from './async-mutex';

export { KeyLockRegistry, createKeyLockRegistry } from './key-lock-registry';
export type { LockGuard, KeyLockRegistryDeps, KeyLockRegistryStats } from './key-lock-registry';
