/**
 * AsyncMutex Unit Tests
 *
 * Exclusion, FIFO hand-off, bounded waits and waiter cancellation.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import {
  AsyncMutex,
  LockTimeoutError,
  LockCancelledError,
  ValidationError
} from '@tierstack/core';

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('AsyncMutex', () => {
  let mutex: AsyncMutex;

  beforeEach(() => {
    mutex = new AsyncMutex('test-lock');
  });

  // ===========================================================================
  // Basic Functionality
  // ===========================================================================

  describe('basic functionality', () => {
    it('should acquire and release lock', async () => {
      const release = await mutex.acquire();
      expect(mutex.isLocked()).toBe(true);
      release();
      expect(mutex.isLocked()).toBe(false);
    });

    it('should prevent double-release', async () => {
      const release = await mutex.acquire();
      release();
      release(); // Second release should be no-op
      expect(mutex.isLocked()).toBe(false);
    });

    it('should not let a stale release free a later holder', async () => {
      const first = await mutex.acquire();
      first();
      const second = await mutex.acquire();

      first();
      expect(mutex.isLocked()).toBe(true);
      second();
    });
  });

  // ===========================================================================
  // tryAcquire
  // ===========================================================================

  describe('tryAcquire', () => {
    it('should acquire immediately if unlocked', () => {
      const release = mutex.tryAcquire();
      expect(release).not.toBeNull();
      expect(mutex.isLocked()).toBe(true);
      release?.();
    });

    it('should return null if already locked', async () => {
      const release = await mutex.acquire();
      expect(mutex.tryAcquire()).toBeNull();
      release();
    });
  });

  // ===========================================================================
  // runExclusive
  // ===========================================================================

  describe('runExclusive', () => {
    it('should never run two critical sections at once', async () => {
      let active = 0;
      let maxActive = 0;

      await Promise.all(
        Array.from({ length: 10 }, () =>
          mutex.runExclusive(async () => {
            active++;
            maxActive = Math.max(maxActive, active);
            await sleep(1);
            active--;
          })
        )
      );

      expect(maxActive).toBe(1);
      expect(mutex.isLocked()).toBe(false);
    });

    it('should serve waiters in arrival order', async () => {
      const order: number[] = [];
      const release = await mutex.acquire();

      const waiters = [1, 2, 3].map(n => mutex.runExclusive(() => { order.push(n); }));
      expect(mutex.getWaitingCount()).toBe(3);
      release();
      await Promise.all(waiters);

      expect(order).toEqual([1, 2, 3]);
    });

    it('should release the lock when fn throws', async () => {
      await expect(mutex.runExclusive(() => {
        throw new Error('boom');
      })).rejects.toThrow('boom');

      expect(mutex.isLocked()).toBe(false);
    });

    it('should return fn result', async () => {
      await expect(mutex.runExclusive(async () => 42)).resolves.toBe(42);
    });
  });

  describe('tryRunExclusive', () => {
    it('should skip fn while the lock is held', async () => {
      const release = await mutex.acquire();
      let ran = false;

      await expect(mutex.tryRunExclusive(() => { ran = true; })).resolves.toBeNull();
      expect(ran).toBe(false);
      release();

      await expect(mutex.tryRunExclusive(() => 'done')).resolves.toBe('done');
    });
  });

  // ===========================================================================
  // Timeouts
  // ===========================================================================

  describe('timeouts', () => {
    it('should reject with LockTimeoutError and leave the queue', async () => {
      const release = await mutex.acquire();

      const attempt = mutex.acquire(10);
      await expect(attempt).rejects.toBeInstanceOf(LockTimeoutError);
      await expect(attempt).rejects.toThrow("Timeout: lock 'test-lock' not acquired within 10ms");

      expect(mutex.getWaitingCount()).toBe(0);
      expect(mutex.getStats().timeoutCount).toBe(1);
      release();
      expect(mutex.isLocked()).toBe(false);
    });

    it('should not run fn after a timed-out wait', async () => {
      const release = await mutex.acquire();
      let ran = false;

      await expect(mutex.runExclusive(() => { ran = true; }, 5)).rejects.toBeInstanceOf(LockTimeoutError);
      release();
      await sleep(5);

      expect(ran).toBe(false);
    });

    it('should hand off to a waiter that is still within its deadline', async () => {
      const release = await mutex.acquire();
      const attempt = mutex.acquire(1000);
      release();

      const next = await attempt;
      expect(mutex.isLocked()).toBe(true);
      next();
    });

    it('should acquire a free lock even with a zero timeout', async () => {
      const release = await mutex.acquire(0);
      expect(mutex.isLocked()).toBe(true);
      release();
    });

    it('should reject invalid timeouts', async () => {
      await expect(mutex.acquire(-1)).rejects.toBeInstanceOf(ValidationError);
      await expect(mutex.acquire(Number.NaN)).rejects.toThrow(
        'timeoutMs must be a non-negative finite number, got NaN'
      );
    });
  });

  // ===========================================================================
  // Cancellation and stats
  // ===========================================================================

  describe('cancelWaiters', () => {
    it('should reject queued waiters but keep the holder', async () => {
      const release = await mutex.acquire();
      const first = mutex.acquire();
      const second = mutex.acquire(1000);

      expect(mutex.cancelWaiters('shutting down')).toBe(2);

      await Promise.all([
        expect(first).rejects.toBeInstanceOf(LockCancelledError),
        expect(second).rejects.toThrow("Lock 'test-lock' cancelled: shutting down"),
      ]);
      expect(mutex.isLocked()).toBe(true);
      release();
      expect(mutex.isLocked()).toBe(false);
    });
  });

  describe('stats', () => {
    it('should count acquisitions and contention', async () => {
      const release = await mutex.acquire();
      const waiter = mutex.acquire();
      release();
      (await waiter)();

      const stats = mutex.getStats();
      expect(stats.acquireCount).toBe(2);
      expect(stats.contentionCount).toBe(1);
      expect(stats.isLocked).toBe(false);
      expect(stats.waitingCount).toBe(0);

      mutex.resetStats();
      expect(mutex.getStats().acquireCount).toBe(0);
    });
  });
});
