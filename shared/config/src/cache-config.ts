/**
 * Cache and lock configuration loaded from the environment.
 *
 * Env vars:
 * - CACHE_MAX_LEVELS        maximum number of tiers (default 3)
 * - CACHE_CAPACITIES        comma-separated per-tier capacities (default 2,3,4)
 * - CACHE_EVICTION_POLICY   lfu | lru | fifo (default lfu)
 * - LOCK_ACQUIRE_TIMEOUT_MS default lock wait in ms (default 5000)
 */

import { parseEnvEnum, parseEnvInt, parseEnvIntList } from './env';
import {
  EvictionPolicyNameSchema,
  validateLockRegistryConfig,
  validateTieredCacheConfig,
  type LockRegistryConfig,
  type TieredCacheConfig,
} from './schemas';

export const CACHE_DEFAULTS = {
  maxLevels: 3,
  capacities: [2, 3, 4],
  policy: 'lfu',
} satisfies TieredCacheConfig;

export const LOCK_DEFAULTS = {
  acquireTimeoutMs: 5000,
} satisfies LockRegistryConfig;

export function loadCacheConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): TieredCacheConfig {
  return validateTieredCacheConfig({
    maxLevels: parseEnvInt('CACHE_MAX_LEVELS', CACHE_DEFAULTS.maxLevels, 1, undefined, env),
    capacities: parseEnvIntList('CACHE_CAPACITIES', [...CACHE_DEFAULTS.capacities], env),
    policy: parseEnvEnum('CACHE_EVICTION_POLICY', EvictionPolicyNameSchema.options, CACHE_DEFAULTS.policy, env),
  });
}

export function loadLockConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): LockRegistryConfig {
  return validateLockRegistryConfig({
    acquireTimeoutMs: parseEnvInt('LOCK_ACQUIRE_TIMEOUT_MS', LOCK_DEFAULTS.acquireTimeoutMs, 0, undefined, env),
  });
}
