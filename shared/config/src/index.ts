/**
 * @tierstack/config
 *
 * Validated configuration for the tiered cache, the key lock registry and the
 * slot inventory, plus strict env-var parsers.
 */

export {
  CapacitySchema,
  TimeoutMsSchema,
  EvictionPolicyNameSchema,
  TieredCacheConfigSchema,
  LockRegistryConfigSchema,
  SlotInventoryConfigSchema,
  validateWithDetails,
  validateOrThrow,
  createValidator,
  validateTieredCacheConfig,
  validateLockRegistryConfig,
  validateSlotInventoryConfig,
  z,
} from './schemas';
export type {
  TieredCacheConfig,
  TieredCacheConfigInput,
  LockRegistryConfig,
  LockRegistryConfigInput,
  ValidationResult,
} from './schemas';

export { parseEnvInt, parseEnvIntList, parseEnvEnum } from './env';

export {
  CACHE_DEFAULTS,
  LOCK_DEFAULTS,
  loadCacheConfigFromEnv,
  loadLockConfigFromEnv,
} from './cache-config';
