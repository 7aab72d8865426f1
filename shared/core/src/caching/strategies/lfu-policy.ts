/**
 * Least Frequently Used eviction with O(1) operations.
 *
 * Keys are grouped into frequency buckets. Each bucket is a KeyQueue, so keys
 * sharing a frequency are ordered by when they reached it and the victim is
 * the oldest key of the lowest-frequency bucket.
 *
 * Invariants:
 * - every stored key sits in exactly one bucket, the one matching its frequency
 * - empty buckets are removed immediately
 * - the minFrequency bucket is non-empty whenever the store is non-empty
 *
 * @module caching/strategies
 */

import type { CacheKey, CacheValue, EvictedEntry } from '@tierstack/types';
import { KeyQueue } from '../key-queue';
import type { EvictionPolicy } from './eviction-policy.interface';

export class LFUPolicy implements EvictionPolicy {
  readonly name = 'lfu';
  readonly capacity: number;

  private readonly values = new Map<CacheKey, CacheValue>();
  private readonly frequencies = new Map<CacheKey, number>();
  private readonly buckets = new Map<number, KeyQueue>();
  private minFreq = 0;

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  get size(): number {
    return this.values.size;
  }

  /** Smallest frequency with a resident key; 0 when empty. */
  get minFrequency(): number {
    return this.minFreq;
  }

  frequencyOf(key: CacheKey): number | undefined {
    return this.frequencies.get(key);
  }

  /**
   * Keys of one frequency bucket, oldest first. Empty for unused frequencies.
   */
  bucketKeys(frequency: number): string[] {
    return this.buckets.get(frequency)?.keys() ?? [];
  }

  get(key: CacheKey): CacheValue | undefined {
    const value = this.values.get(key);
    if (value === undefined) {
      return undefined;
    }

    this.bumpFrequency(key);
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
      this.bumpFrequency(key);
      return null;
    }

    // Nothing can be resident; the new entry is its own victim
    if (this.capacity <= 0) {
      return { key, value };
    }

    let evicted: EvictedEntry | null = null;
    if (this.values.size >= this.capacity) {
      evicted = this.evictLeastFrequent();
    }

    this.values.set(key, value);
    this.frequencies.set(key, 1);
    this.bucketFor(1).append(key);
    this.minFreq = 1;

    return evicted;
  }

  delete(key: CacheKey): boolean {
    const freq = this.frequencies.get(key);
    if (freq === undefined) {
      return false;
    }

    this.values.delete(key);
    this.frequencies.delete(key);

    const bucket = this.buckets.get(freq);
    bucket?.remove(key);
    if (bucket && bucket.isEmpty()) {
      this.buckets.delete(freq);
      if (this.minFreq === freq) {
        this.minFreq = this.lowestBucketFrequency();
      }
    }

    return true;
  }

  entries(): Array<[CacheKey, CacheValue]> {
    return [...this.values.entries()];
  }

  clear(): void {
    this.values.clear();
    this.frequencies.clear();
    this.buckets.clear();
    this.minFreq = 0;
  }

  private bucketFor(frequency: number): KeyQueue {
    let bucket = this.buckets.get(frequency);
    if (!bucket) {
      bucket = new KeyQueue();
      this.buckets.set(frequency, bucket);
    }
    return bucket;
  }

  /**
   * Move key from its bucket to the next frequency's tail. Frequencies only
   * grow by one, so an emptied minimum bucket means the minimum is now freq+1.
   */
  private bumpFrequency(key: CacheKey): void {
    const freq = this.frequencies.get(key);
    if (freq === undefined) return;

    const bucket = this.buckets.get(freq);
    bucket?.remove(key);
    if (bucket && bucket.isEmpty()) {
      this.buckets.delete(freq);
      if (this.minFreq === freq) {
        this.minFreq = freq + 1;
      }
    }

    const next = freq + 1;
    this.frequencies.set(key, next);
    this.bucketFor(next).append(key);
  }

  private evictLeastFrequent(): EvictedEntry | null {
    const bucket = this.buckets.get(this.minFreq);
    const victim = bucket?.popOldest();
    if (!bucket || victim == null) {
      return null;
    }

    if (bucket.isEmpty()) {
      this.buckets.delete(this.minFreq);
    }

    const value = this.values.get(victim);
    this.values.delete(victim);
    this.frequencies.delete(victim);

    return value === undefined ? null : { key: victim, value };
  }

  private lowestBucketFrequency(): number {
    let lowest = 0;
    for (const freq of this.buckets.keys()) {
      if (lowest === 0 || freq < lowest) {
        lowest = freq;
      }
    }
    return lowest;
  }
}

export function createLFUPolicy(capacity: number): LFUPolicy {
  return new LFUPolicy(capacity);
}
