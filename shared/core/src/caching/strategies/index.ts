/**
 * Eviction Strategies
 *
 * Barrel export for the eviction policy interface, its implementations and
 * the name-to-factory registry.
 *
 * @package @tierstack/core
 * @module caching/strategies
 */

import { InvalidConfigurationError } from '@tierstack/types';
import type { EvictionPolicyName } from '@tierstack/types';
import type { EvictionPolicy, EvictionPolicyFactory } from './eviction-policy.interface';
import { createLFUPolicy } from './lfu-policy';
import { createLRUPolicy } from './lru-policy';
import { createFIFOPolicy } from './fifo-policy';

export type { EvictionPolicy, EvictionPolicyFactory } from './eviction-policy.interface';
export { LFUPolicy, createLFUPolicy } from './lfu-policy';
export { LRUPolicy, createLRUPolicy } from './lru-policy';
export { FIFOPolicy, createFIFOPolicy } from './fifo-policy';

export const EVICTION_POLICIES: Readonly<Record<EvictionPolicyName, EvictionPolicyFactory>> = {
  lfu: createLFUPolicy,
  lru: createLRUPolicy,
  fifo: createFIFOPolicy,
};

function isPolicyName(name: string): name is EvictionPolicyName {
  return Object.prototype.hasOwnProperty.call(EVICTION_POLICIES, name);
}

export function getEvictionPolicyFactory(name: string): EvictionPolicyFactory {
  if (!isPolicyName(name)) {
    throw new InvalidConfigurationError(`Unknown eviction policy '${name}'`, {
      issues: [`policy: expected one of ${Object.keys(EVICTION_POLICIES).join(', ')}`],
      context: { policy: name },
    });
  }
  return EVICTION_POLICIES[name];
}

export function createEvictionPolicy(name: string, capacity: number): EvictionPolicy {
  return getEvictionPolicyFactory(name)(capacity);
}
