/**
 * Environment Configuration Utilities
 *
 * Typed reads of environment variables with defaults.
 */

import { DomainError } from '../error-handling/errors.js';

/**
 * Read an environment variable, falling back to the default when it is unset
 * or cannot be parsed into the default's type.
 */
export function getConfig(key: string, defaultValue: number): number;
export function getConfig(key: string, defaultValue: boolean): boolean;
export function getConfig(key: string, defaultValue: string): string;
export function getConfig<T>(key: string, defaultValue: T, parser: (value: string) => T): T;
export function getConfig<T>(key: string, defaultValue: T, parser?: (value: string) => T): unknown {
  const value = process.env[key];

  if (value === undefined || value === '') {
    return defaultValue;
  }

  if (parser) {
    try {
      return parser(value);
    } catch {
      return defaultValue;
    }
  }

  if (typeof defaultValue === 'boolean') {
    const normalized = value.trim().toLowerCase();
    return normalized === 'true' || normalized === '1' || normalized === 'yes';
  }

  if (typeof defaultValue === 'number') {
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  return value;
}

/**
 * Get required configuration - throws if not present
 */
export function getRequiredConfig(key: string, fallbackKey?: string): string {
  const value = process.env[key] || (fallbackKey ? process.env[fallbackKey] : undefined);
  if (!value) {
    const keys = fallbackKey ? `${key} or ${fallbackKey}` : key;
    throw new DomainError(`Required environment variable not set: ${keys}`, 500);
  }
  return value;
}

export function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}
