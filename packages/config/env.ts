/**
 * Environment Variable Utilities
 *
 * Safe parsing of environment variables. Unparseable values are reported
 * and ignored so the schema default applies.
 */

import { getLogger } from '@kernel/logger';

const logger = getLogger('config');

/**
 * Get environment variable value; blank values count as unset
 */
export function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Parse integer environment variable
 * @returns the integer, or undefined when unset or not an integer
 */
export function parseIntEnv(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  // '3.5' is rejected, not truncated
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    logger.warn('Ignoring non-integer environment value', { name, value });
    return undefined;
  }
  return parsed;
}

/**
 * Parse float environment variable
 */
export function parseFloatEnv(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    logger.warn('Ignoring non-numeric environment value', { name, value });
    return undefined;
  }
  return parsed;
}

/**
 * Parse boolean environment variable.
 * Only true/false/1/0 are recognized.
 */
export function parseBoolEnv(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  logger.warn('Unrecognized boolean value, using default', { name, value });
  return undefined;
}

/**
 * Parse string array environment variable
 */
export function parseArrayEnv(name: string, separator = ','): string[] | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.split(separator).map(s => s.trim()).filter(Boolean);
}
