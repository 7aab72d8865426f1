/**
 * Cache and lock configuration tests
 *
 * Schema validation, defaults and env loading.
 */

import { describe, it, expect } from '@jest/globals';

import {
  CACHE_DEFAULTS,
  LOCK_DEFAULTS,
  TieredCacheConfigSchema,
  loadCacheConfigFromEnv,
  loadLockConfigFromEnv,
  validateTieredCacheConfig,
  validateLockRegistryConfig,
  validateWithDetails
} from '@tierstack/config';
import { InvalidConfigurationError } from '@tierstack/types';

describe('validateTieredCacheConfig', () => {
  it('should default the policy to lfu', () => {
    expect(validateTieredCacheConfig({ maxLevels: 2, capacities: [1, 2] })).toEqual({
      maxLevels: 2,
      capacities: [1, 2],
      policy: 'lfu',
    });
  });

  it('should accept capacity 0 and fewer capacities than levels', () => {
    expect(validateTieredCacheConfig({ maxLevels: 5, capacities: [0] }).capacities).toEqual([0]);
  });

  it('should list every failing path', () => {
    let thrown: unknown;
    try {
      validateTieredCacheConfig({ maxLevels: 1.5, capacities: [1, -2], policy: 'lru' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(InvalidConfigurationError);
    if (thrown instanceof InvalidConfigurationError) {
      expect(thrown.issues).toEqual([
        'maxLevels: maxLevels must be an integer',
        'capacities.1: Capacity cannot be negative',
      ]);
      expect(thrown.message).toContain('Config validation failed for TieredCache');
    }
  });

  it('should report a non-object config at the root', () => {
    expect(() => validateTieredCacheConfig(null)).toThrow('(root): Expected object, received null');
  });
});

describe('validateLockRegistryConfig', () => {
  it('should apply the default timeout', () => {
    expect(validateLockRegistryConfig({})).toEqual({ acquireTimeoutMs: 5000 });
  });
});

describe('validateWithDetails', () => {
  it('should return data on success', () => {
    const result = validateWithDetails(TieredCacheConfigSchema, { maxLevels: 1, capacities: [3] });
    expect(result).toEqual({
      success: true,
      data: { maxLevels: 1, capacities: [3], policy: 'lfu' },
    });
  });

  it('should return path and message on failure', () => {
    const result = validateWithDetails(TieredCacheConfigSchema, { maxLevels: 0, capacities: [] });
    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      { path: 'maxLevels', message: 'maxLevels must be at least 1' },
      { path: 'capacities', message: 'At least one capacity is required' },
    ]);
  });
});

describe('loadCacheConfigFromEnv', () => {
  it('should use defaults when nothing is set', () => {
    expect(loadCacheConfigFromEnv({})).toEqual(CACHE_DEFAULTS);
    expect(loadLockConfigFromEnv({})).toEqual(LOCK_DEFAULTS);
  });

  it('should read every variable', () => {
    const config = loadCacheConfigFromEnv({
      CACHE_MAX_LEVELS: '4',
      CACHE_CAPACITIES: ' 8, 16 ,32 ',
      CACHE_EVICTION_POLICY: 'LRU',
    });
    expect(config).toEqual({ maxLevels: 4, capacities: [8, 16, 32], policy: 'lru' });

    expect(loadLockConfigFromEnv({ LOCK_ACQUIRE_TIMEOUT_MS: '250' })).toEqual({ acquireTimeoutMs: 250 });
  });

  it('should reject invalid values', () => {
    expect(() => loadCacheConfigFromEnv({ CACHE_MAX_LEVELS: '0' })).toThrow(
      'Invalid CACHE_MAX_LEVELS: 0 is below minimum 1'
    );
    expect(() => loadCacheConfigFromEnv({ CACHE_CAPACITIES: '2,-1' })).toThrow(
      'capacities.1: Capacity cannot be negative'
    );
    expect(() => loadCacheConfigFromEnv({ CACHE_EVICTION_POLICY: 'random' })).toThrow(
      InvalidConfigurationError
    );
  });
});
