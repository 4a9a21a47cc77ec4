/**
 * Shared types for media-relay plugins
 */

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export type LogFormat = 'pretty' | 'json';

export type LogMeta = Record<string, unknown>;

/**
 * A sliding-window limit: at most `limit` hits in any trailing `windowSeconds`.
 */
export interface RateLimitRule {
  limit: number;
  windowSeconds: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the oldest counted hit leaves the window. */
  retryAfterSeconds: number;
}
