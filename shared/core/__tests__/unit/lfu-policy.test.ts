/**
 * LFUPolicy Unit Tests
 *
 * Frequency bucketing, FIFO tie-break, minFrequency maintenance and the
 * capacity-0 edge case.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { LFUPolicy } from '@tierstack/core';

describe('LFUPolicy', () => {
  let policy: LFUPolicy;

  beforeEach(() => {
    policy = new LFUPolicy(2);
  });

  // ===========================================================================
  // get / put
  // ===========================================================================

  describe('get and put', () => {
    it('should return the last written value for every key within capacity', () => {
      const large = new LFUPolicy(3);
      large.put('a', '1');
      large.put('b', '2');
      large.put('a', '10');
      large.put('c', '3');

      expect(large.get('a')).toBe('10');
      expect(large.get('b')).toBe('2');
      expect(large.get('c')).toBe('3');
      expect(large.size).toBe(3);
    });

    it('should report a miss without side effects', () => {
      policy.put('a', '1');

      expect(policy.get('missing')).toBeUndefined();
      expect(policy.frequencyOf('missing')).toBeUndefined();
      expect(policy.frequencyOf('a')).toBe(1);
      expect(policy.size).toBe(1);
    });

    it('should not evict below capacity', () => {
      expect(policy.put('a', '1')).toBeNull();
      expect(policy.put('b', '2')).toBeNull();
    });

    it('should bump frequency on get', () => {
      policy.put('a', '1');
      policy.get('a');
      policy.get('a');

      expect(policy.frequencyOf('a')).toBe(3);
      expect(policy.bucketKeys(3)).toEqual(['a']);
    });

    it('should bump frequency when overwriting an existing key', () => {
      policy.put('a', '1');
      expect(policy.put('a', '2')).toBeNull();

      expect(policy.peek('a')).toBe('2');
      expect(policy.frequencyOf('a')).toBe(2);
      expect(policy.minFrequency).toBe(2);
    });

    it('should not touch frequency on peek', () => {
      policy.put('a', '1');
      expect(policy.peek('a')).toBe('1');
      expect(policy.frequencyOf('a')).toBe(1);
    });
  });

  // ===========================================================================
  // Eviction
  // ===========================================================================

  describe('eviction', () => {
    it('should evict the earliest inserted key when frequencies tie', () => {
      policy.put('a', '1');
      policy.put('b', '2');

      expect(policy.put('c', '3')).toEqual({ key: 'a', value: '1' });
      expect(policy.get('a')).toBeUndefined();
      expect(policy.entries()).toEqual([['b', '2'], ['c', '3']]);
    });

    it('should keep a touched key over a less frequently used one', () => {
      policy.put('a', '1');
      policy.put('b', '2');
      policy.get('a');

      expect(policy.put('c', '3')).toEqual({ key: 'b', value: '2' });
      expect(policy.get('a')).toBe('1');
    });

    it('should break ties by the order keys reached their frequency', () => {
      policy.put('a', '1');
      policy.put('b', '2');
      policy.get('a');
      policy.get('b');

      expect(policy.minFrequency).toBe(2);
      expect(policy.bucketKeys(2)).toEqual(['a', 'b']);
      expect(policy.put('c', '3')).toEqual({ key: 'a', value: '1' });
    });

    it('should reset minFrequency to 1 after inserting a new key', () => {
      policy.put('a', '1');
      policy.get('a');
      expect(policy.minFrequency).toBe(2);

      policy.put('b', '2');
      expect(policy.minFrequency).toBe(1);
      expect(policy.bucketKeys(1)).toEqual(['b']);
    });

    it('should drop emptied buckets', () => {
      policy.put('a', '1');
      policy.get('a');

      expect(policy.bucketKeys(1)).toEqual([]);
      expect(policy.bucketKeys(2)).toEqual(['a']);
    });
  });

  // ===========================================================================
  // delete
  // ===========================================================================

  describe('delete', () => {
    it('should be a no-op for unknown keys', () => {
      policy.put('a', '1');
      expect(policy.delete('missing')).toBe(false);
      expect(policy.size).toBe(1);
    });

    it('should recompute minFrequency when the minimum bucket empties', () => {
      policy.put('a', '1');
      policy.put('b', '2');
      policy.get('b');
      policy.get('b');

      expect(policy.delete('a')).toBe(true);
      expect(policy.minFrequency).toBe(3);

      policy.delete('b');
      expect(policy.minFrequency).toBe(0);
      expect(policy.size).toBe(0);
    });

    it('should treat a re-put after delete as a fresh insert', () => {
      policy.put('a', '1');
      policy.get('a');
      policy.get('a');
      policy.delete('a');

      expect(policy.get('a')).toBeUndefined();
      policy.put('a', '2');
      expect(policy.frequencyOf('a')).toBe(1);
      expect(policy.peek('a')).toBe('2');
    });
  });

  // ===========================================================================
  // Edge cases
  // ===========================================================================

  describe('capacity 0', () => {
    it('should immediately evict the entry just inserted', () => {
      const empty = new LFUPolicy(0);

      expect(empty.put('a', '1')).toEqual({ key: 'a', value: '1' });
      expect(empty.put('b', '2')).toEqual({ key: 'b', value: '2' });
      expect(empty.size).toBe(0);
      expect(empty.get('a')).toBeUndefined();
      expect(empty.minFrequency).toBe(0);
    });
  });

  it('should clear all state', () => {
    policy.put('a', '1');
    policy.get('a');
    policy.clear();

    expect(policy.size).toBe(0);
    expect(policy.minFrequency).toBe(0);
    expect(policy.bucketKeys(2)).toEqual([]);
    expect(policy.put('b', '2')).toBeNull();
  });
});
