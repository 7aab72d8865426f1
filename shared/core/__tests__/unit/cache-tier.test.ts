/**
 * CacheTier Unit Tests
 */

import { describe, it, expect } from '@jest/globals';

import { CacheTier, createLFUPolicy, InvalidConfigurationError } from '@tierstack/core';

describe('CacheTier', () => {
  it('should forward get/put to its policy and count hits and misses', () => {
    const tier = new CacheTier(0, 2, createLFUPolicy);
    tier.put('a', '1');

    expect(tier.get('a')).toBe('1');
    expect(tier.get('b')).toBeUndefined();
    expect(tier.getStats()).toEqual({
      index: 0,
      capacity: 2,
      size: 1,
      hits: 1,
      misses: 1,
      evictions: 0,
    });
  });

  it('should return and count evictions', () => {
    const tier = new CacheTier(1, 1, createLFUPolicy);
    tier.put('a', '1');

    expect(tier.put('b', '2')).toEqual({ key: 'a', value: '1' });
    expect(tier.getStats().evictions).toBe(1);
  });

  it('should not count peek or has as hits', () => {
    const tier = new CacheTier(0, 2, createLFUPolicy);
    tier.put('a', '1');

    expect(tier.peek('a')).toBe('1');
    expect(tier.has('a')).toBe(true);
    expect(tier.getStats().hits).toBe(0);
  });

  it('should render its contents', () => {
    const tier = new CacheTier(0, 3, createLFUPolicy);
    expect(tier.toString()).toBe('{}');

    tier.put('a', '1');
    tier.put('b', '2');
    expect(tier.toString()).toBe('{a: 1, b: 2}');
  });

  it('should describe itself in a snapshot', () => {
    const tier = new CacheTier(2, 4, createLFUPolicy);
    tier.put('x', 'y');

    expect(tier.snapshot()).toEqual({
      index: 2,
      capacity: 4,
      policy: 'lfu',
      size: 1,
      entries: [['x', 'y']],
    });
    expect(tier.policyName).toBe('lfu');
  });

  it('should delete and clear', () => {
    const tier = new CacheTier(0, 2, createLFUPolicy);
    tier.put('a', '1');
    tier.put('b', '2');

    expect(tier.delete('a')).toBe(true);
    expect(tier.delete('a')).toBe(false);
    tier.clear();
    expect(tier.size).toBe(0);
  });

  it('should reset counters without touching contents', () => {
    const tier = new CacheTier(0, 2, createLFUPolicy);
    tier.put('a', '1');
    tier.get('a');
    tier.resetStats();

    expect(tier.getStats()).toMatchObject({ hits: 0, misses: 0, evictions: 0, size: 1 });
  });

  it('should reject negative or fractional capacities', () => {
    expect(() => new CacheTier(0, -1, createLFUPolicy)).toThrow(InvalidConfigurationError);
    expect(() => new CacheTier(0, 1.5, createLFUPolicy)).toThrow(
      'Tier 0 capacity must be an integer >= 0, got 1.5'
    );
  });

  it('should accept capacity 0', () => {
    const tier = new CacheTier(0, 0, createLFUPolicy);
    expect(tier.put('a', '1')).toEqual({ key: 'a', value: '1' });
    expect(tier.size).toBe(0);
  });
});
