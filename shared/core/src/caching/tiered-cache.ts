/**
 * Tiered Cache (L1..Ln)
 *
 * Ordered sequence of CacheTiers from fastest/smallest (index 0) to
 * slowest/largest. Writes always enter tier 0; whatever a tier evicts becomes
 * the next tier's input. New tiers are appended lazily when a cascade runs
 * past the last tier, up to maxLevels; past that, the cascaded entry is
 * dropped and reported through the `drop` event.
 *
 * Reads scan from tier 0. A hit in a lower tier is promoted by re-running the
 * write path, so the key becomes resident in tier 0. The lower-tier copy is
 * not removed: it stays until that tier evicts it or delete() clears it.
 *
 * Every operation is synchronous and runs to completion on the event loop,
 * so read/write/delete never interleave. Compound async sequences against one
 * key should be serialized with KeyLockRegistry.
 */

import { EventEmitter } from 'events';
import { InvalidConfigurationError, ErrorCode } from '@tierstack/types';
import type {
  CacheKey,
  CacheValue,
  CascadeEvent,
  DropEvent,
  EvictedEntry,
  PromotionEvent,
  TierCreatedEvent,
  TierSnapshot,
} from '@tierstack/types';
import { validateTieredCacheConfig } from '@tierstack/config';
import type { TieredCacheConfig, TieredCacheConfigInput } from '@tierstack/config';
import { createLogger } from '../logging';
import type { ILogger } from '../logging';
import { CacheTier } from './cache-tier';
import type { TierStats } from './cache-tier';
import { getEvictionPolicyFactory } from './strategies';
import type { EvictionPolicyFactory } from './strategies';

/** Events emitted by TieredCache */
export interface TieredCacheEvents {
  /** Entry pushed from one tier into the next */
  eviction: (event: CascadeEvent) => void;
  /** Entry lost because the bottom tier was full and maxLevels reached */
  drop: (event: DropEvent) => void;
  promotion: (event: PromotionEvent) => void;
  tierCreated: (event: TierCreatedEvent) => void;
}

export interface TieredCacheDeps {
  logger?: ILogger;
  /** Overrides `config.policy` */
  policyFactory?: EvictionPolicyFactory;
}

export interface TieredCacheStats {
  tiers: TierStats[];
  reads: number;
  hits: number;
  misses: number;
  hitRate: number;
  promotions: number;
  cascades: number;
  drops: number;
  tiersCreated: number;
}

export interface PeekResult {
  value: CacheValue;
  tier: number;
}

export class TieredCache extends EventEmitter {
  private readonly config: TieredCacheConfig;
  private readonly policyFactory: EvictionPolicyFactory;
  private readonly logger: ILogger;
  private readonly tiers: CacheTier[] = [];

  private stats = {
    reads: 0,
    hits: 0,
    misses: 0,
    promotions: 0,
    cascades: 0,
    drops: 0,
    tiersCreated: 0,
  };

  constructor(config: TieredCacheConfigInput, deps: TieredCacheDeps = {}) {
    super();
    this.config = validateTieredCacheConfig(config);
    this.policyFactory = deps.policyFactory ?? getEvictionPolicyFactory(this.config.policy);
    this.logger = deps.logger ?? createLogger('tiered-cache');

    if (this.config.capacities.length < this.config.maxLevels) {
      this.logger.warn('Fewer capacities than maxLevels; creating a tier beyond the list will fail', {
        maxLevels: this.config.maxLevels,
        capacities: this.config.capacities.length,
      });
    }

    this.tiers.push(new CacheTier(0, this.config.capacities[0], this.policyFactory));

    this.logger.info('Tiered cache initialized', {
      maxLevels: this.config.maxLevels,
      capacities: this.config.capacities,
      policy: deps.policyFactory ? 'custom' : this.config.policy,
    });
  }

  get maxLevels(): number {
    return this.config.maxLevels;
  }

  get tierCount(): number {
    return this.tiers.length;
  }

  /**
   * Resident entries across all tiers. Stale duplicates left behind by
   * promotion are counted once per tier holding them.
   */
  get size(): number {
    return this.tiers.reduce((total, tier) => total + tier.size, 0);
  }

  read(key: CacheKey): CacheValue | undefined {
    this.stats.reads++;

    for (const tier of this.tiers) {
      const value = tier.get(key);
      if (value === undefined) continue;

      this.stats.hits++;
      if (tier.index > 0) {
        this.stats.promotions++;
        this.emitEvent('promotion', { key, fromTier: tier.index });
        this.write(key, value);
      }
      return value;
    }

    this.stats.misses++;
    return undefined;
  }

  /**
   * Put into tier 0 and cascade evictions down the stack.
   *
   * @throws InvalidConfigurationError when a new tier is needed but no
   * capacity is configured for its index
   */
  write(key: CacheKey, value: CacheValue): void {
    let pending: EvictedEntry | null = { key, value };

    for (const tier of this.tiers) {
      if (!pending) return;
      const evicted: EvictedEntry | null = tier.put(pending.key, pending.value);
      if (evicted && tier.index + 1 < this.tiers.length) {
        this.recordCascade(evicted, tier.index);
      }
      pending = evicted;
    }

    if (!pending) return;

    const bottom = this.tiers.length - 1;
    if (this.tiers.length < this.config.maxLevels) {
      const tier = this.createTier(this.tiers.length);
      this.recordCascade(pending, bottom);
      // A fresh tier holds nothing, so this only evicts at capacity 0
      const overflow = tier.put(pending.key, pending.value);
      if (overflow) {
        this.recordDrop(overflow, tier.index);
      }
      return;
    }

    this.recordDrop(pending, bottom);
  }

  /**
   * Remove key from every tier, including stale promoted copies.
   *
   * @returns true if any tier held the key
   */
  delete(key: CacheKey): boolean {
    let removed = false;
    for (const tier of this.tiers) {
      if (tier.delete(key)) {
        removed = true;
      }
    }
    return removed;
  }

  /**
   * Side-effect-free lookup: first tier holding the key, no promotion and no
   * frequency/recency update.
   */
  peek(key: CacheKey): PeekResult | undefined {
    for (const tier of this.tiers) {
      const value = tier.peek(key);
      if (value !== undefined) {
        return { value, tier: tier.index };
      }
    }
    return undefined;
  }

  has(key: CacheKey): boolean {
    return this.peek(key) !== undefined;
  }

  /**
   * Empty every tier. Tiers themselves are kept.
   */
  clear(): void {
    for (const tier of this.tiers) {
      tier.clear();
    }
  }

  snapshot(): TierSnapshot[] {
    return this.tiers.map(tier => tier.snapshot());
  }

  getStats(): TieredCacheStats {
    const lookups = this.stats.hits + this.stats.misses;
    return {
      tiers: this.tiers.map(tier => tier.getStats()),
      ...this.stats,
      hitRate: lookups > 0 ? this.stats.hits / lookups : 0,
    };
  }

  resetStats(): void {
    this.stats = {
      reads: 0,
      hits: 0,
      misses: 0,
      promotions: 0,
      cascades: 0,
      drops: 0,
      tiersCreated: 0,
    };
    for (const tier of this.tiers) {
      tier.resetStats();
    }
  }

  /**
   * One line per tier, e.g. `L1: {a: 1}`.
   */
  toString(): string {
    return this.tiers.map(tier => `L${tier.index + 1}: ${tier.toString()}`).join('\n');
  }

  private createTier(index: number): CacheTier {
    const capacity = this.config.capacities[index];
    if (capacity === undefined) {
      throw new InvalidConfigurationError(
        `No capacity configured for tier ${index} (capacities has ${this.config.capacities.length} entries)`,
        {
          code: ErrorCode.MISSING_CAPACITY,
          issues: [`capacities.${index}: missing`],
          context: { tier: index, maxLevels: this.config.maxLevels },
        }
      );
    }

    const tier = new CacheTier(index, capacity, this.policyFactory);
    this.tiers.push(tier);
    this.stats.tiersCreated++;

    this.logger.info('Cache tier created', { tier: index, capacity });
    this.emitEvent('tierCreated', { index, capacity });
    return tier;
  }

  private recordCascade(entry: EvictedEntry, fromTier: number): void {
    this.stats.cascades++;
    this.emitEvent('eviction', { ...entry, fromTier, toTier: fromTier + 1 });
  }

  private recordDrop(entry: EvictedEntry, fromTier: number): void {
    this.stats.drops++;
    this.logger.debug('Cache entry dropped from bottom tier', { key: entry.key, tier: fromTier });
    this.emitEvent('drop', { ...entry, fromTier });
  }

  on<E extends keyof TieredCacheEvents>(event: E, listener: TieredCacheEvents[E]): this {
    return super.on(event, listener);
  }

  once<E extends keyof TieredCacheEvents>(event: E, listener: TieredCacheEvents[E]): this {
    return super.once(event, listener);
  }

  off<E extends keyof TieredCacheEvents>(event: E, listener: TieredCacheEvents[E]): this {
    return super.off(event, listener);
  }

  private emitEvent<E extends keyof TieredCacheEvents>(
    event: E,
    payload: Parameters<TieredCacheEvents[E]>[0]
  ): void {
    this.emit(event, payload);
  }
}

/**
 * Create a tiered cache; `config` is validated and defaults applied.
 */
export function createTieredCache(config: TieredCacheConfigInput, deps?: TieredCacheDeps): TieredCache {
  return new TieredCache(config, deps);
}
