/**
 * Redis connection helper shared by the cache, rate limiter and job queue.
 */

import { Redis } from 'ioredis';
import { createLogger, errorMessage } from './logger.js';

const logger = createLogger('redis');

export interface RedisConnectionOptions {
  /** Name shown in logs, e.g. `cache` or `queue`. */
  name?: string;
  /**
   * BullMQ workers need `null` here so blocking commands are never retried
   * away from under them.
   */
  maxRetriesPerRequest?: number | null;
}

export function createRedisConnection(url: string, options: RedisConnectionOptions = {}): Redis {
  const name = options.name ?? 'default';
  const redis = new Redis(url, {
    maxRetriesPerRequest: options.maxRetriesPerRequest === undefined ? 3 : options.maxRetriesPerRequest,
    lazyConnect: true,
  });

  redis.on('error', (error: Error) => {
    logger.error('Redis connection error', { connection: name, error: errorMessage(error) });
  });
  redis.on('ready', () => {
    logger.debug('Redis connection ready', { connection: name });
  });

  return redis;
}

export async function pingRedis(redis: Redis): Promise<boolean> {
  try {
    return (await redis.ping()) === 'PONG';
  } catch (error) {
    logger.warn('Redis ping failed', { error: errorMessage(error) });
    return false;
  }
}
