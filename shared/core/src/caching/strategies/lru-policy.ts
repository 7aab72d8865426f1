/**
 * Least Recently Used eviction.
 *
 * A single KeyQueue holds keys in recency order; hits and overwrites move the
 * key to the tail, the head is the victim.
 *
 * @module caching/strategies
 */

import type { CacheKey, CacheValue, EvictedEntry } from '@tierstack/types';
import { KeyQueue } from '../key-queue';
import type { EvictionPolicy } from './eviction-policy.interface';

export class LRUPolicy implements EvictionPolicy {
  readonly name = 'lru';
  readonly capacity: number;

  private readonly values = new Map<CacheKey, CacheValue>();
  private readonly recency = new KeyQueue();

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  get size(): number {
    return this.values.size;
  }

  /** Keys from least to most recently used. */
  recencyOrder(): string[] {
    return this.recency.keys();
  }

  get(key: CacheKey): CacheValue | undefined {
    const value = this.values.get(key);
    if (value !== undefined) {
      this.recency.moveToTail(key);
    }
    return value;
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
      this.recency.moveToTail(key);
      return null;
    }

    if (this.capacity <= 0) {
      return { key, value };
    }

    let evicted: EvictedEntry | null = null;
    if (this.values.size >= this.capacity) {
      const victim = this.recency.popOldest();
      const victimValue = victim === null ? undefined : this.values.get(victim);
      if (victim !== null && victimValue !== undefined) {
        this.values.delete(victim);
        evicted = { key: victim, value: victimValue };
      }
    }

    this.values.set(key, value);
    this.recency.append(key);
    return evicted;
  }

  delete(key: CacheKey): boolean {
    if (!this.values.delete(key)) {
      return false;
    }
    this.recency.remove(key);
    return true;
  }

  entries(): Array<[CacheKey, CacheValue]> {
    return [...this.values.entries()];
  }

  clear(): void {
    this.values.clear();
    this.recency.clear();
  }
}

export function createLRUPolicy(capacity: number): LRUPolicy {
  return new LRUPolicy(capacity);
}
