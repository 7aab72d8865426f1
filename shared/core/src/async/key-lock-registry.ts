/**
 * KeyLockRegistry
 *
 * One AsyncMutex per resource key, created on first use. Acquisitions of the
 * same key are mutually exclusive; acquisitions of different keys never wait
 * on each other. Intended for compound check-then-mutate sequences against a
 * single key (check availability, decrement, record) that the data structure
 * alone cannot make atomic.
 *
 * Lock entries are retained for the registry's lifetime. The key space is
 * expected to match a bounded inventory of resources; call dispose() on
 * shutdown. A disposed registry refuses every further acquisition, so a
 * holder that has not released yet stays exclusive.
 *
 * @example
 * ```ts
 * const locks = new KeyLockRegistry({ acquireTimeoutMs: 5000 });
 *
 * await locks.withLock('venue-7:2024-06-01T19:00', async () => {
 *   if (available <= 0) throw new SlotUnavailableError(...);
 *   available--;
 * });
 * ```
 */

import { LockCancelledError, LockTimeoutError } from '@tierstack/types';
import { validateLockRegistryConfig } from '@tierstack/config';
import type { LockRegistryConfig, LockRegistryConfigInput } from '@tierstack/config';
import { createLogger } from '../logging';
import type { ILogger } from '../logging';
import { AsyncMutex } from './async-mutex';

export interface LockGuard {
  readonly key: string;
  /** Epoch ms at which the lock was obtained */
  readonly acquiredAt: number;
  /** Idempotent */
  release(): void;
}

export interface KeyLockRegistryDeps {
  logger?: ILogger;
}

export interface KeyLockRegistryStats {
  /** Lock entries in the table */
  keys: number;
  acquisitions: number;
  /** Acquisitions that found the key already held */
  contended: number;
  timeouts: number;
  /** Keys currently held */
  held: number;
}

export class KeyLockRegistry {
  private readonly config: LockRegistryConfig;
  private readonly logger: ILogger;
  private readonly locks = new Map<string, AsyncMutex>();

  private stats = { acquisitions: 0, contended: 0, timeouts: 0 };
  private disposed = false;
  private disposeReason = '';

  constructor(config: LockRegistryConfigInput = {}, deps: KeyLockRegistryDeps = {}) {
    this.config = validateLockRegistryConfig(config);
    this.logger = deps.logger ?? createLogger('key-lock-registry');
  }

  get defaultTimeoutMs(): number {
    return this.config.acquireTimeoutMs;
  }

  /** Number of lock entries created so far */
  get size(): number {
    return this.locks.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Wait for exclusive access to `key`.
   *
   * @throws LockTimeoutError if the key is not free within timeoutMs
   * @throws LockCancelledError once the registry is disposed
   */
  async acquire(key: string, timeoutMs: number = this.config.acquireTimeoutMs): Promise<LockGuard> {
    this.assertNotDisposed(key);
    const mutex = this.lockFor(key);
    if (mutex.isLocked()) {
      this.stats.contended++;
    }

    let release: () => void;
    try {
      release = await mutex.acquire(timeoutMs);
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        this.stats.timeouts++;
        this.logger.warn('Lock acquisition timed out', { key, timeoutMs });
      }
      throw error;
    }

    this.stats.acquisitions++;
    return { key, acquiredAt: Date.now(), release };
  }

  release(guard: LockGuard): void {
    guard.release();
  }

  /**
   * Run fn while holding `key`. The lock is released on success, on a thrown
   * business error and on an unexpected failure alike. On timeout fn never
   * runs.
   */
  async withLock<T>(key: string, fn: () => Promise<T> | T, timeoutMs?: number): Promise<T> {
    const guard = await this.acquire(key, timeoutMs);
    try {
      return await fn();
    } finally {
      this.release(guard);
    }
  }

  /**
   * Run fn only if `key` is free right now.
   *
   * @returns fn's result, or null if the key was held
   */
  async tryWithLock<T>(key: string, fn: () => Promise<T> | T): Promise<T | null> {
    this.assertNotDisposed(key);
    const release = this.lockFor(key).tryAcquire();
    if (!release) {
      this.stats.contended++;
      return null;
    }
    this.stats.acquisitions++;
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.locks.get(key)?.isLocked() ?? false;
  }

  getStats(): KeyLockRegistryStats {
    let held = 0;
    for (const mutex of this.locks.values()) {
      if (mutex.isLocked()) held++;
    }
    return { keys: this.locks.size, ...this.stats, held };
  }

  /**
   * Reject all waiters, forget every lock entry and refuse later
   * acquisitions. Current holders keep their lock until they release.
   *
   * @returns The number of waiters that were cancelled
   */
  dispose(reason = 'lock registry disposed'): number {
    this.disposed = true;
    this.disposeReason = reason;
    let cancelled = 0;
    for (const mutex of this.locks.values()) {
      cancelled += mutex.cancelWaiters(reason);
    }
    this.locks.clear();
    if (cancelled > 0) {
      this.logger.warn('Lock registry disposed with waiters pending', { cancelled });
    }
    return cancelled;
  }

  private assertNotDisposed(key: string): void {
    if (this.disposed) {
      throw new LockCancelledError(key, this.disposeReason);
    }
  }

  // Map insert-if-absent is synchronous, so the table needs no lock of its own
  private lockFor(key: string): AsyncMutex {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new AsyncMutex(key);
      this.locks.set(key, mutex);
    }
    return mutex;
  }
}

export function createKeyLockRegistry(
  config?: LockRegistryConfigInput,
  deps?: KeyLockRegistryDeps
): KeyLockRegistry {
  return new KeyLockRegistry(config, deps);
}
