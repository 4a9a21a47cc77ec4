/**
 * Sliding-window rate limiter
 *
 * Each identity key owns an ordered set of hit timestamps. A check prunes
 * entries that have left the window, counts what remains, records the hit
 * when the count is below the limit and refreshes the key expiry. All four
 * steps run as one atomic unit against the store, so concurrent callers in
 * different processes never over-admit.
 */

import { randomBytes } from 'node:crypto';
import type { Redis } from 'ioredis';
import { createLogger } from './logger.js';
import type { RateLimitDecision, RateLimitRule } from './types.js';

const logger = createLogger('rate-limiter');

/** Extra key lifetime past the window so idle keys expire on their own. */
export const RATE_LIMIT_EXPIRY_SLACK_SECONDS = 60;

export interface SlidingWindowHit {
  key: string;
  nowMs: number;
  windowMs: number;
  limit: number;
  member: string;
  ttlMs: number;
}

export interface SlidingWindowResult {
  /** Hits counted inside the window before this attempt. */
  count: number;
  allowed: boolean;
  /** Timestamp of the oldest hit still inside the window, if any. */
  oldestMs: number | null;
}

export interface SlidingWindowStore {
  hit(request: SlidingWindowHit): Promise<SlidingWindowResult>;
  count(key: string, nowMs: number, windowMs: number): Promise<number>;
  clear(key: string): Promise<void>;
}

// ============================================================================
// Redis store
// ============================================================================

const HIT_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
local member = ARGV[4]
local ttl = tonumber(ARGV[5])
redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)
local allowed = 0
if count < limit then
  redis.call('ZADD', key, now, member)
  allowed = 1
end
redis.call('PEXPIRE', key, ttl)
local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local oldestScore = -1
if oldest[2] then
  oldestScore = tonumber(oldest[2])
end
return { count, allowed, oldestScore }
`;

export class RedisSlidingWindowStore implements SlidingWindowStore {
  constructor(private readonly redis: Redis) {}

  async hit(request: SlidingWindowHit): Promise<SlidingWindowResult> {
    const reply = await this.redis.eval(
      HIT_SCRIPT,
      1,
      request.key,
      request.nowMs,
      request.windowMs,
      request.limit,
      request.member,
      request.ttlMs
    );

    if (!Array.isArray(reply) || reply.length < 3) {
      throw new Error(`Unexpected rate limit script reply for ${request.key}`);
    }
    const [count, allowed, oldest] = reply.map((value: unknown) => Number(value));
    return { count, allowed: allowed === 1, oldestMs: oldest >= 0 ? oldest : null };
  }

  async count(key: string, nowMs: number, windowMs: number): Promise<number> {
    return this.redis.zcount(key, `(${nowMs - windowMs}`, '+inf');
  }

  async clear(key: string): Promise<void> {
    await this.redis.del(key);
  }
}

// ============================================================================
// In-process store (single-process mode and tests)
// ============================================================================

interface MemoryWindow {
  hits: number[];
  expiresAt: number;
}

export class MemorySlidingWindowStore implements SlidingWindowStore {
  private windows = new Map<string, MemoryWindow>();

  async hit(request: SlidingWindowHit): Promise<SlidingWindowResult> {
    const window = this.live(request.key, request.nowMs);
    const cutoff = request.nowMs - request.windowMs;
    window.hits = window.hits.filter((timestamp) => timestamp > cutoff);

    const count = window.hits.length;
    const allowed = count < request.limit;
    if (allowed) {
      window.hits.push(request.nowMs);
    }
    window.expiresAt = request.nowMs + request.ttlMs;
    this.windows.set(request.key, window);

    return { count, allowed, oldestMs: window.hits[0] ?? null };
  }

  async count(key: string, nowMs: number, windowMs: number): Promise<number> {
    const window = this.live(key, nowMs);
    return window.hits.filter((timestamp) => timestamp > nowMs - windowMs).length;
  }

  async clear(key: string): Promise<void> {
    this.windows.delete(key);
  }

  private live(key: string, nowMs: number): MemoryWindow {
    const existing = this.windows.get(key);
    if (!existing || existing.expiresAt <= nowMs) {
      return { hits: [], expiresAt: nowMs };
    }
    return existing;
  }
}

// ============================================================================
// Limiter
// ============================================================================

export interface SlidingWindowRateLimiterOptions {
  keyPrefix?: string;
  now?: () => number;
}

export class SlidingWindowRateLimiter {
  private readonly store: SlidingWindowStore;
  private readonly keyPrefix: string;
  private readonly now: () => number;

  constructor(store: SlidingWindowStore, options: SlidingWindowRateLimiterOptions = {}) {
    this.store = store;
    this.keyPrefix = options.keyPrefix ?? 'rate_limit';
    this.now = options.now ?? Date.now;
  }

  /**
   * Records an attempt for `key` and reports whether it is admitted.
   */
  async check(key: string, limit: number, windowSeconds: number): Promise<boolean> {
    const decision = await this.consume(key, { limit, windowSeconds });
    return decision.allowed;
  }

  async consume(key: string, rule: RateLimitRule): Promise<RateLimitDecision> {
    const nowMs = this.now();
    const windowMs = rule.windowSeconds * 1000;
    const result = await this.store.hit({
      key: this.storageKey(key),
      nowMs,
      windowMs,
      limit: rule.limit,
      member: `${nowMs}:${randomBytes(6).toString('hex')}`,
      ttlMs: (rule.windowSeconds + RATE_LIMIT_EXPIRY_SLACK_SECONDS) * 1000,
    });

    const used = result.allowed ? result.count + 1 : result.count;
    const retryAfterMs = result.allowed || result.oldestMs === null ? 0 : result.oldestMs + windowMs - nowMs;

    if (!result.allowed) {
      logger.debug('Rate limit exceeded', { key, limit: rule.limit, windowSeconds: rule.windowSeconds });
    }

    return {
      allowed: result.allowed,
      limit: rule.limit,
      remaining: Math.max(0, rule.limit - used),
      retryAfterSeconds: Math.max(0, Math.ceil(retryAfterMs / 1000)),
    };
  }

  async remaining(key: string, limit: number, windowSeconds: number): Promise<number> {
    const count = await this.store.count(this.storageKey(key), this.now(), windowSeconds * 1000);
    return Math.max(0, limit - count);
  }

  async reset(key: string): Promise<void> {
    await this.store.clear(this.storageKey(key));
    logger.info('Rate limit window cleared', { key });
  }

  private storageKey(key: string): string {
    return `${this.keyPrefix}:${key}`;
  }
}
