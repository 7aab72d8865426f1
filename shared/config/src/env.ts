/**
 * Environment Variable Parsing Utilities
 *
 * Strict parsers used when building configs from the environment. Invalid
 * values fail fast with InvalidConfigurationError; unset (or empty) variables
 * fall back to the supplied default.
 *
 * Design notes:
 * - Uses `??` not `||` for numeric defaults that can be 0
 * - List values are comma-separated, whitespace around items is ignored
 */

import { InvalidConfigurationError } from '@tierstack/types';

type Env = Record<string, string | undefined>;

function readRaw(name: string, env: Env): string | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return raw.trim();
}

function parseStrictInt(name: string, raw: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new InvalidConfigurationError(`Invalid ${name}: "${raw}" is not a valid integer`, {
      issues: [`${name}: not an integer`],
    });
  }
  return parseInt(raw, 10);
}

/**
 * Parse and validate an integer environment variable.
 *
 * @example
 * ```typescript
 * const levels = parseEnvInt('CACHE_MAX_LEVELS', 3, 1);
 * const timeout = parseEnvInt('LOCK_ACQUIRE_TIMEOUT_MS', 5000, 0, 600000);
 * ```
 */
export function parseEnvInt(
  name: string,
  defaultValue: number,
  min?: number,
  max?: number,
  env: Env = process.env
): number {
  const raw = readRaw(name, env);
  if (raw === undefined) return defaultValue;

  const parsed = parseStrictInt(name, raw);
  if (min !== undefined && parsed < min) {
    throw new InvalidConfigurationError(`Invalid ${name}: ${parsed} is below minimum ${min}`, {
      issues: [`${name}: below minimum ${min}`],
    });
  }
  if (max !== undefined && parsed > max) {
    throw new InvalidConfigurationError(`Invalid ${name}: ${parsed} is above maximum ${max}`, {
      issues: [`${name}: above maximum ${max}`],
    });
  }
  return parsed;
}

/**
 * Parse a comma-separated list of integers, e.g. `CACHE_CAPACITIES=2,3,4`.
 */
export function parseEnvIntList(
  name: string,
  defaultValue: number[],
  env: Env = process.env
): number[] {
  const raw = readRaw(name, env);
  if (raw === undefined) return [...defaultValue];

  return raw.split(',').map((item, i) => {
    const trimmed = item.trim();
    if (trimmed === '') {
      throw new InvalidConfigurationError(`Invalid ${name}: empty item at position ${i}`, {
        issues: [`${name}[${i}]: empty`],
      });
    }
    return parseStrictInt(`${name}[${i}]`, trimmed);
  });
}

/**
 * Parse an environment variable restricted to a fixed set of values.
 */
export function parseEnvEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: Env = process.env
): T {
  const raw = readRaw(name, env);
  if (raw === undefined) return defaultValue;

  const match = allowed.find(value => value === raw.toLowerCase());
  if (match === undefined) {
    throw new InvalidConfigurationError(
      `Invalid ${name}: "${raw}" must be one of ${allowed.join(', ')}`,
      { issues: [`${name}: unsupported value`] }
    );
  }
  return match;
}
