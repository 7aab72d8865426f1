/**
 * First-In First-Out eviction. Reads and overwrites never change a key's
 * position; the oldest insert is always the victim.
 *
 * @module caching/strategies
 */

import type { CacheKey, CacheValue, EvictedEntry } from '@tierstack/types';
import { KeyQueue } from '../key-queue';
import type { EvictionPolicy } from './eviction-policy.interface';

export class FIFOPolicy implements EvictionPolicy {
  readonly name = 'fifo';
  readonly capacity: number;

  private readonly values = new Map<CacheKey, CacheValue>();
  private readonly arrivals = new KeyQueue();

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  get size(): number {
    return this.values.size;
  }

  get(key: CacheKey): CacheValue | undefined {
    return this.values.get(key);
  }

  peek(key: CacheKey): CacheValue | undefined {
    return this.values.get(key);
  }

  has(key: CacheKey): boolean {
    return this.values.has(key);
  }

  put(key: CacheKey, value: CacheValue): EvictedEntry | null {
    if (this.values.has(key)) {
      this.values.set(key, value);
      return null;
    }

    if (this.capacity <= 0) {
      return { key, value };
    }

    let evicted: EvictedEntry | null = null;
    if (this.values.size >= this.capacity) {
      const victim = this.arrivals.popOldest();
      const victimValue = victim === null ? undefined : this.values.get(victim);
      if (victim !== null && victimValue !== undefined) {
        this.values.delete(victim);
        evicted = { key: victim, value: victimValue };
      }
    }

    this.values.set(key, value);
    this.arrivals.append(key);
    return evicted;
  }

  delete(key: CacheKey): boolean {
    if (!this.values.delete(key)) {
      return false;
    }
    this.arrivals.remove(key);
    return true;
  }

  entries(): Array<[CacheKey, CacheValue]> {
    return [...this.values.entries()];
  }

  clear(): void {
    this.values.clear();
    this.arrivals.clear();
  }
}

export function createFIFOPolicy(capacity: number): FIFOPolicy {
  return new FIFOPolicy(capacity);
}
