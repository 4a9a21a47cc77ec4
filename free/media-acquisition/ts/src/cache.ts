/**
 * Content Cache
 *
 * Namespaced TTL cache of JSON values under `cache:{namespace}:{key}`. The
 * backend enforces expiry; there is no LRU. Keys longer than 200 characters
 * are replaced by their SHA-256 digest.
 *
 * The cache accelerates; it is never the source of truth. Backend failures
 * are logged and read as misses.
 */

import type { Redis } from 'ioredis';
import { createLogger, errorMessage } from '@media-relay/plugin-utils';
import { sha256Hex } from './fingerprint.js';

const logger = createLogger('media-acquisition:cache');

export const MAX_RAW_KEY_LENGTH = 200;

// =============================================================================
// Backends
// =============================================================================

export interface CacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  /** Remaining lifetime in seconds; -2 when the key is missing, -1 when it never expires. */
  ttl(key: string): Promise<number>;
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  /** Deletes every key matching a glob pattern; returns the number removed. */
  deleteMatching(pattern: string): Promise<number>;
  /** SET NX PX: stores only when absent. */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Deletes the key only when it still holds `value`. */
  deleteIfEquals(key: string, value: string): Promise<boolean>;
}

const COMPARE_AND_DELETE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

export class RedisCacheBackend implements CacheBackend {
  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  async delete(key: string): Promise<boolean> {
    return (await this.redis.del(key)) > 0;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.redis.exists(key)) > 0;
  }

  async ttl(key: string): Promise<number> {
    return this.redis.ttl(key);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    return (await this.redis.expire(key, ttlSeconds)) === 1;
  }

  async deleteMatching(pattern: string): Promise<number> {
    let cursor = '0';
    let removed = 0;
    do {
      const [next, keys] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', 200);
      cursor = next;
      if (keys.length > 0) {
        removed += await this.redis.del(...keys);
      }
    } while (cursor !== '0');
    return removed;
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    return (await this.redis.set(key, value, 'PX', ttlMs, 'NX')) === 'OK';
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    const removed = await this.redis.eval(COMPARE_AND_DELETE_SCRIPT, 1, key, value);
    return Number(removed) > 0;
  }
}

interface MemoryEntry {
  value: string;
  expiresAt: number | null;
}

export class MemoryCacheBackend implements CacheBackend {
  private entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.live(key) !== null;
    this.entries.delete(key);
    return existed;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== null;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) return false;
    entry.expiresAt = this.now() + ttlSeconds * 1000;
    return true;
  }

  async deleteMatching(pattern: string): Promise<number> {
    const matcher = globToRegExp(pattern);
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (matcher.test(key) && this.live(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key)) return false;
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    return true;
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    if (this.live(key)?.value !== value) return false;
    this.entries.delete(key);
    return true;
  }

  private live(key: string): MemoryEntry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }
}

function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`);
}

// =============================================================================
// ContentCache
// =============================================================================

export interface ContentCacheOptions {
  enabled?: boolean;
  prefix?: string;
}

export class ContentCache {
  private readonly backend: CacheBackend;
  private readonly enabled: boolean;
  private readonly prefix: string;

  constructor(backend: CacheBackend, options: ContentCacheOptions = {}) {
    this.backend = backend;
    this.enabled = options.enabled ?? true;
    this.prefix = options.prefix ?? 'cache';
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  makeKey(namespace: string, key: string): string {
    const safeKey = key.length > MAX_RAW_KEY_LENGTH ? sha256Hex(key) : key;
    return `${this.prefix}:${namespace}:${safeKey}`;
  }

  async get<T>(namespace: string, key: string): Promise<T | null> {
    if (!this.enabled) return null;

    const cacheKey = this.makeKey(namespace, key);
    try {
      const raw = await this.backend.get(cacheKey);
      if (raw === null) return null;
      const value: T = JSON.parse(raw);
      return value;
    } catch (error) {
      logger.warn('Cache read failed, treating as miss', { key: cacheKey, error: errorMessage(error) });
      return null;
    }
  }

  async set<T>(namespace: string, key: string, value: T, ttlSeconds: number): Promise<boolean> {
    if (!this.enabled) return false;
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new RangeError(`Cache TTL must be a positive number of seconds (got: ${ttlSeconds})`);
    }

    const cacheKey = this.makeKey(namespace, key);
    try {
      await this.backend.set(cacheKey, JSON.stringify(value), Math.ceil(ttlSeconds));
      return true;
    } catch (error) {
      logger.warn('Cache write failed', { key: cacheKey, error: errorMessage(error) });
      return false;
    }
  }

  async delete(namespace: string, key: string): Promise<boolean> {
    if (!this.enabled) return false;
    const cacheKey = this.makeKey(namespace, key);
    try {
      return await this.backend.delete(cacheKey);
    } catch (error) {
      logger.warn('Cache delete failed', { key: cacheKey, error: errorMessage(error) });
      return false;
    }
  }

  async exists(namespace: string, key: string): Promise<boolean> {
    if (!this.enabled) return false;
    try {
      return await this.backend.exists(this.makeKey(namespace, key));
    } catch (error) {
      logger.warn('Cache exists check failed', { namespace, error: errorMessage(error) });
      return false;
    }
  }

  async getTtl(namespace: string, key: string): Promise<number | null> {
    if (!this.enabled) return null;
    const ttl = await this.backend.ttl(this.makeKey(namespace, key));
    return ttl >= 0 ? ttl : null;
  }

  async extendTtl(namespace: string, key: string, ttlSeconds: number): Promise<boolean> {
    if (!this.enabled) return false;
    return this.backend.expire(this.makeKey(namespace, key), ttlSeconds);
  }

  /**
   * Returns the cached value, or computes, stores and returns it.
   */
  async getOrSet<T>(namespace: string, key: string, factory: () => Promise<T>, ttlSeconds: number): Promise<T> {
    const cached = await this.get<T>(namespace, key);
    if (cached !== null) return cached;

    const value = await factory();
    if (value !== null && value !== undefined) {
      await this.set(namespace, key, value, ttlSeconds);
    }
    return value;
  }

  /**
   * Removes every key of a namespace matching `pattern` (glob over the raw key).
   */
  async invalidatePattern(namespace: string, pattern = '*'): Promise<number> {
    if (!this.enabled) return 0;
    const removed = await this.backend.deleteMatching(`${this.prefix}:${namespace}:${pattern}`);
    logger.info('Cache entries invalidated', { namespace, pattern, removed });
    return removed;
  }
}
