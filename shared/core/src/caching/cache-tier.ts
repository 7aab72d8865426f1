/**
 * CacheTier - one fixed-capacity level of the tiered cache.
 *
 * Thin wrapper over an EvictionPolicy: get/put/delete are forwarded verbatim,
 * the tier only adds its index, hit/miss/eviction counters and a snapshot
 * view for inspection.
 */

import { InvalidConfigurationError } from '@tierstack/types';
import type { CacheKey, CacheValue, EvictedEntry, TierSnapshot } from '@tierstack/types';
import type { EvictionPolicy, EvictionPolicyFactory } from './strategies';

export interface TierStats {
  index: number;
  capacity: number;
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}

export class CacheTier {
  readonly index: number;
  readonly capacity: number;
  private readonly policy: EvictionPolicy;

  private stats = { hits: 0, misses: 0, evictions: 0 };

  constructor(index: number, capacity: number, factory: EvictionPolicyFactory) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new InvalidConfigurationError(`Tier ${index} capacity must be an integer >= 0, got ${capacity}`, {
        issues: [`capacities.${index}: invalid capacity`],
        context: { tier: index, capacity },
      });
    }
    this.index = index;
    this.capacity = capacity;
    this.policy = factory(capacity);
  }

  get size(): number {
    return this.policy.size;
  }

  get policyName(): string {
    return this.policy.name;
  }

  get(key: CacheKey): CacheValue | undefined {
    const value = this.policy.get(key);
    if (value === undefined) {
      this.stats.misses++;
    } else {
      this.stats.hits++;
    }
    return value;
  }

  peek(key: CacheKey): CacheValue | undefined {
    return this.policy.peek(key);
  }

  has(key: CacheKey): boolean {
    return this.policy.has(key);
  }

  put(key: CacheKey, value: CacheValue): EvictedEntry | null {
    const evicted = this.policy.put(key, value);
    if (evicted) {
      this.stats.evictions++;
    }
    return evicted;
  }

  delete(key: CacheKey): boolean {
    return this.policy.delete(key);
  }

  clear(): void {
    this.policy.clear();
  }

  snapshot(): TierSnapshot {
    return {
      index: this.index,
      capacity: this.capacity,
      policy: this.policy.name,
      size: this.policy.size,
      entries: this.policy.entries(),
    };
  }

  getStats(): TierStats {
    return {
      index: this.index,
      capacity: this.capacity,
      size: this.policy.size,
      ...this.stats,
    };
  }

  resetStats(): void {
    this.stats = { hits: 0, misses: 0, evictions: 0 };
  }

  /**
   * `{a: 1, b: 2}` rendering of the tier contents.
   */
  toString(): string {
    const body = this.policy.entries().map(([key, value]) => `${key}: ${value}`).join(', ');
    return `{${body}}`;
  }
}
