/**
 * Input Validation Utilities
 * Shared validation helpers for all plugins
 *
 * The `validate*` helpers are lenient: bad input falls back to the default.
 * The `parse*` helpers are strict and throw with the variable name, for config
 * loading where a typo should stop the process.
 */

import type { RateLimitRule } from './types.js';

/**
 * Validates a string against an allowed list
 */
export function validateEnum<T extends string>(value: string | undefined, allowed: readonly T[], defaultValue: T): T;
export function validateEnum<T extends string>(value: string | undefined, allowed: readonly T[]): T | undefined;
export function validateEnum<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  defaultValue?: T
): T | undefined {
  if (!value) {
    return defaultValue;
  }
  return allowed.find((candidate) => candidate === value) ?? defaultValue;
}

/**
 * Validates a database URL format
 */
export function validateDatabaseUrl(url: string): boolean {
  if (!url || !/^postgres(ql)?:\/\//.test(url)) {
    return false;
  }
  try {
    new URL(url.replace(/^postgres(ql)?:\/\//, 'https://'));
    return true;
  } catch {
    return false;
  }
}

/**
 * Validates a Redis URL (redis:// or rediss://)
 */
export function validateRedisUrl(url: string): boolean {
  if (!/^rediss?:\/\//.test(url)) {
    return false;
  }
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

export function parseCsvList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

// ============================================================================
// Strict parsers
// ============================================================================

export function parsePort(value: string | undefined, varName: string, defaultPort: number): number {
  if (value === undefined || value === '') return defaultPort;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`${varName} must be a valid port number between 1 and 65535 (got: ${value})`);
  }
  return port;
}

export function parsePositiveInt(value: string | undefined, varName: string, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const num = Number(value);
  if (!Number.isInteger(num) || num < 1) {
    throw new Error(`${varName} must be a positive integer (got: ${value})`);
  }
  return num;
}

export function parsePositiveNumber(value: string | undefined, varName: string, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const num = Number(value);
  if (!Number.isFinite(num) || num <= 0) {
    throw new Error(`${varName} must be a positive number (got: ${value})`);
  }
  return num;
}

export function parseBoolean(value: string | undefined, varName: string, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`${varName} must be a boolean (got: ${value})`);
}

export function parseEnum<T extends string>(
  value: string | undefined,
  varName: string,
  allowed: readonly T[],
  defaultValue: T
): T {
  if (value === undefined || value === '') return defaultValue;
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`${varName} must be one of ${allowed.join(', ')} (got: ${value})`);
  }
  return match;
}

const WINDOW_SECONDS: Record<string, number> = {
  second: 1,
  minute: 60,
  hour: 3600,
  day: 86400,
};

/**
 * Parses a rate-limit expression such as `10/minute` or `1000/hour`.
 */
export function parseRateLimitRule(value: string, varName = 'rate limit'): RateLimitRule {
  const match = /^\s*(\d+)\s*\/\s*(second|minute|hour|day)s?\s*$/i.exec(value);
  if (!match) {
    throw new Error(`${varName} must look like "<count>/<second|minute|hour|day>" (got: ${value})`);
  }
  const limit = parseInt(match[1], 10);
  if (limit < 1) {
    throw new Error(`${varName} must allow at least one request (got: ${value})`);
  }
  return { limit, windowSeconds: WINDOW_SECONDS[match[2].toLowerCase()] };
}
