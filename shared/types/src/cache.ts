// Shared cache types for tierstack

export type CacheKey = string;
export type CacheValue = string;

/** Entry pushed out of a tier by its eviction policy. */
export interface EvictedEntry {
  key: CacheKey;
  value: CacheValue;
}

export type EvictionPolicyName = 'lfu' | 'lru' | 'fifo';

/** Point-in-time view of one tier, ordered by policy order. */
export interface TierSnapshot {
  index: number;
  capacity: number;
  policy: EvictionPolicyName | string;
  size: number;
  entries: Array<[CacheKey, CacheValue]>;
}

// Event payloads emitted by TieredCache

export interface CascadeEvent extends EvictedEntry {
  fromTier: number;
  toTier: number;
}

export interface DropEvent extends EvictedEntry {
  fromTier: number;
}

export interface PromotionEvent {
  key: CacheKey;
  fromTier: number;
}

export interface TierCreatedEvent {
  index: number;
  capacity: number;
}
