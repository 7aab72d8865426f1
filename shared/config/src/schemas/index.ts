/**
 * Zod Schema Validation for Config Objects
 *
 * Runtime validation for cache, lock and inventory configuration. Configs are
 * validated once at construction time; the cache and lock hot paths trust the
 * validated values afterwards.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '@tierstack/types';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Tier capacity (number of entries). Zero is legal: such a tier evicts every
 * entry it receives.
 */
export const CapacitySchema = z
  .number()
  .int('Capacity must be an integer')
  .min(0, 'Capacity cannot be negative');

export const TimeoutMsSchema = z
  .number()
  .int('Timeout must be an integer number of milliseconds')
  .min(0, 'Timeout cannot be negative');

export const EvictionPolicyNameSchema = z.enum(['lfu', 'lru', 'fifo']);

// =============================================================================
// Component Schemas
// =============================================================================

/**
 * Multi-level cache configuration.
 *
 * `capacities[i]` sizes tier i and is only read when that tier is created.
 * The list may be shorter than `maxLevels`; a tier beyond the list fails at
 * creation time rather than here.
 */
export const TieredCacheConfigSchema = z.object({
  maxLevels: z.number().int('maxLevels must be an integer').min(1, 'maxLevels must be at least 1'),
  capacities: z.array(CapacitySchema).min(1, 'At least one capacity is required'),
  policy: EvictionPolicyNameSchema.default('lfu'),
});

export const LockRegistryConfigSchema = z.object({
  acquireTimeoutMs: TimeoutMsSchema.default(5000),
});

export const SlotInventoryConfigSchema = z.object({
  acquireTimeoutMs: TimeoutMsSchema.optional(),
});

export type TieredCacheConfig = z.infer<typeof TieredCacheConfigSchema>;
export type TieredCacheConfigInput = z.input<typeof TieredCacheConfigSchema>;
export type LockRegistryConfig = z.infer<typeof LockRegistryConfigSchema>;
export type LockRegistryConfigInput = z.input<typeof LockRegistryConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: Array<{
    path: string;
    message: string;
  }>;
}

/**
 * Validate data against a schema and return detailed result.
 * Does NOT throw - returns result object for handling.
 */
export function validateWithDetails<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}

/**
 * Validate data and throw on failure.
 *
 * @throws InvalidConfigurationError listing every failing path
 */
export function validateOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): T {
  const result = schema.safeParse(data);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.errors.map(
    (e: z.ZodIssue) => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`
  );

  throw new InvalidConfigurationError(
    `Config validation failed for ${context}:\n${issues.map(i => `  - ${i}`).join('\n')}`,
    { issues, context: { config: context } }
  );
}

export function createValidator<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context: string
): (data: unknown) => T {
  return (data: unknown) => validateOrThrow(schema, data, context);
}

export const validateTieredCacheConfig = createValidator(TieredCacheConfigSchema, 'TieredCache');
export const validateLockRegistryConfig = createValidator(LockRegistryConfigSchema, 'KeyLockRegistry');
export const validateSlotInventoryConfig = createValidator(SlotInventoryConfigSchema, 'SlotInventory');

export { z } from 'zod';
