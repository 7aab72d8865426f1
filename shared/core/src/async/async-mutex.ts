/**
 * AsyncMutex
 *
 * Mutual exclusion for async critical sections, with optional bounded waits.
 * Waiters are served in FIFO order and the lock is handed directly to the
 * next waiter on release, so a new caller can never slip in between a release
 * and the waiter's wake-up.
 *
 * @example
 * ```ts
 * const mutex = new AsyncMutex('slot:2024-06-01T19:00');
 *
 * await mutex.runExclusive(async () => {
 *   await checkAndDecrement();
 * }, 5000);
 *
 * const release = await mutex.acquire(5000);
 * try {
 *   await doSomething();
 * } finally {
 *   release();
 * }
 * ```
 */

import { LockCancelledError, LockTimeoutError, ValidationError } from '@tierstack/types';

export type ReleaseFn = () => void;

export interface MutexStats {
  /** Number of times the mutex was acquired */
  acquireCount: number;
  /** Number of acquisitions that had to wait */
  contentionCount: number;
  /** Number of waits that gave up at their deadline */
  timeoutCount: number;
  /** Total time spent waiting in milliseconds */
  totalWaitTimeMs: number;
  isLocked: boolean;
  waitingCount: number;
}

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

function assertTimeout(timeoutMs: number | undefined): void {
  if (timeoutMs === undefined) return;
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new ValidationError(`timeoutMs must be a non-negative finite number, got ${timeoutMs}`, {
      field: 'timeoutMs',
      receivedValue: timeoutMs,
    });
  }
}

export class AsyncMutex {
  readonly name: string;
  private locked = false;
  private waitQueue: Waiter[] = [];
  private stats: MutexStats = {
    acquireCount: 0,
    contentionCount: 0,
    timeoutCount: 0,
    totalWaitTimeMs: 0,
    isLocked: false,
    waitingCount: 0,
  };

  constructor(name = 'mutex') {
    this.name = name;
  }

  /**
   * Acquire the mutex, waiting at most `timeoutMs` when it is held.
   * Without a timeout the wait is unbounded.
   *
   * @returns A release function that MUST be called when done
   * @throws LockTimeoutError when the deadline passes first
   */
  async acquire(timeoutMs?: number): Promise<ReleaseFn> {
    assertTimeout(timeoutMs);
    const startTime = Date.now();

    if (this.locked) {
      this.stats.contentionCount++;
      this.stats.waitingCount++;

      try {
        await new Promise<void>((resolve, reject) => {
          const waiter: Waiter = { resolve, reject, timer: null };
          if (timeoutMs !== undefined) {
            waiter.timer = setTimeout(() => {
              const index = this.waitQueue.indexOf(waiter);
              // Already handed the lock; the hand-off wins
              if (index === -1) return;
              this.waitQueue.splice(index, 1);
              this.stats.timeoutCount++;
              reject(new LockTimeoutError(this.name, timeoutMs));
            }, timeoutMs);
          }
          this.waitQueue.push(waiter);
        });
      } finally {
        this.stats.waitingCount--;
        this.stats.totalWaitTimeMs += Date.now() - startTime;
      }
    }

    this.locked = true;
    this.stats.isLocked = true;
    this.stats.acquireCount++;

    return this.createRelease();
  }

  /**
   * Acquire without waiting.
   *
   * @returns Release function if acquired, null if the mutex is held
   */
  tryAcquire(): ReleaseFn | null {
    if (this.locked) {
      return null;
    }

    this.locked = true;
    this.stats.isLocked = true;
    this.stats.acquireCount++;
    return this.createRelease();
  }

  /**
   * Run fn with exclusive access; the mutex is released on every exit path.
   * fn is not invoked if the acquisition times out.
   */
  async runExclusive<T>(fn: () => Promise<T> | T, timeoutMs?: number): Promise<T> {
    const release = await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Run fn only if the mutex is free right now.
   *
   * @returns fn's result, or null if the mutex was busy
   */
  async tryRunExclusive<T>(fn: () => Promise<T> | T): Promise<T | null> {
    const release = this.tryAcquire();
    if (!release) {
      return null;
    }
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  getWaitingCount(): number {
    return this.waitQueue.length;
  }

  getStats(): MutexStats {
    return { ...this.stats, waitingCount: this.waitQueue.length };
  }

  /**
   * Reject every queued waiter. The current holder, if any, keeps the lock
   * until it releases.
   *
   * @returns The number of waiters that were cancelled
   */
  cancelWaiters(reason?: string): number {
    const waiters = this.waitQueue.splice(0);
    for (const waiter of waiters) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.reject(new LockCancelledError(this.name, reason));
    }
    return waiters.length;
  }

  resetStats(): void {
    this.stats = {
      acquireCount: 0,
      contentionCount: 0,
      timeoutCount: 0,
      totalWaitTimeMs: 0,
      isLocked: this.locked,
      waitingCount: this.waitQueue.length,
    };
  }

  private createRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      // Hand off to the next waiter with the lock still held
      const next = this.waitQueue.shift();
      if (next) {
        if (next.timer) clearTimeout(next.timer);
        // setImmediate avoids deep recursion with long queues
        setImmediate(() => next.resolve());
      } else {
        this.locked = false;
        this.stats.isLocked = false;
      }
    };
  }
}
