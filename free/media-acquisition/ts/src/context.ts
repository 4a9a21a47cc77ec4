/**
 * Acquisition Context
 *
 * Builds every component from the configuration and owns their lifecycle.
 * The server, worker and CLI all start from here; nothing is a module-level
 * singleton.
 */

import type { Redis } from 'ioredis';
import {
  MemorySlidingWindowStore,
  RedisSlidingWindowStore,
  SlidingWindowRateLimiter,
  configureLogging,
  createLogger,
  createRedisConnection,
  errorMessage,
  pingRedis,
} from '@media-relay/plugin-utils';
import { ContentCache, MemoryCacheBackend, RedisCacheBackend, type CacheBackend } from './cache.js';
import { MemoryMediaCatalog, type MediaCatalog } from './catalog.js';
import { MediaAcquisitionDatabase } from './database.js';
import { ConfigurationError } from './errors.js';
import { FetchLease } from './lease.js';
import { LocalObjectStore, MinioObjectStore, type ObjectStore } from './object-store.js';
import { AcquisitionOrchestrator } from './pipeline.js';
import { createDefaultRegistry, type PluginRegistry } from './plugins/index.js';
import { MemoryQuotaStore, QuotaLedger, type QuotaStore } from './quota.js';
import { BullMqTaskQueue, MemoryTaskQueue, type TaskQueue } from './tasks.js';
import type { MediaAcquisitionConfig } from './types.js';

const logger = createLogger('media-acquisition:context');

export interface AcquisitionContext {
  config: MediaAcquisitionConfig;
  cache: ContentCache;
  ledger: QuotaLedger;
  registry: PluginRegistry;
  store: ObjectStore;
  catalog: MediaCatalog;
  rateLimiter: SlidingWindowRateLimiter;
  orchestrator: AcquisitionOrchestrator;
  tasks: TaskQueue;
  /** Present when STATE_BACKEND=redis. */
  redis?: Redis;
  database?: MediaAcquisitionDatabase;
  /** Reports whether every configured backend answers. */
  ping(): Promise<Record<string, boolean>>;
  close(): Promise<void>;
}

export interface ContextOptions {
  /** Create the quota/catalog tables and check the bucket before returning. */
  initialize?: boolean;
  /** Replaces the configured plugin set, mainly for tests. */
  registry?: PluginRegistry;
  /** Replaces the configured object store, mainly for tests. */
  store?: ObjectStore;
}

export async function createAcquisitionContext(
  config: MediaAcquisitionConfig,
  options: ContextOptions = {}
): Promise<AcquisitionContext> {
  configureLogging({ level: config.log_level });
  const redis = config.state_backend === 'redis' ? createRedisConnection(config.redis_url, { name: 'state' }) : undefined;
  const database =
    config.quota_backend === 'postgres' ? new MediaAcquisitionDatabase(requireDatabaseUrl(config)) : undefined;

  try {
    if (redis) {
      await redis.connect();
    }
    if (database && options.initialize !== false) {
      await database.initialize();
    }

    const cacheBackend: CacheBackend = redis ? new RedisCacheBackend(redis) : new MemoryCacheBackend();
    const cache = new ContentCache(cacheBackend, { enabled: config.cache_enabled });

    const quotaStore: QuotaStore = database ?? new MemoryQuotaStore();
    const catalog: MediaCatalog = database ?? new MemoryMediaCatalog();
    const ledger = new QuotaLedger(quotaStore, { limits: config.quota_daily_mb });

    const store = options.store ?? createObjectStore(config);
    if (options.initialize !== false) {
      await store.initialize();
    }

    const registry = options.registry ?? createDefaultRegistry(config);
    const lease = config.single_flight_enabled
      ? new FetchLease(cacheBackend, { ttlMs: config.single_flight_lease_ms })
      : undefined;

    const orchestrator = new AcquisitionOrchestrator(
      { cache, ledger, registry, store, catalog, lease },
      { tempDir: config.temp_dir, cacheTtlSeconds: config.cache_ttl_seconds }
    );

    const rateLimiter = new SlidingWindowRateLimiter(
      redis ? new RedisSlidingWindowStore(redis) : new MemorySlidingWindowStore()
    );

    const tasks: TaskQueue = redis
      ? new BullMqTaskQueue(redis, {
          queueName: config.queue_name,
          pollIntervalMs: config.task_poll_interval_ms,
          retentionSeconds: config.task_retention_seconds,
        })
      : new MemoryTaskQueue(orchestrator, {
          concurrency: config.worker_concurrency,
          pollIntervalMs: config.task_poll_interval_ms,
          retentionMs: config.task_retention_seconds * 1000,
        });

    logger.info('Acquisition context ready', {
      state: config.state_backend,
      quota: config.quota_backend,
      storage: config.storage_backend,
      plugins: registry.size,
      singleFlight: config.single_flight_enabled,
    });

    return {
      config,
      cache,
      ledger,
      registry,
      store,
      catalog,
      rateLimiter,
      orchestrator,
      tasks,
      redis,
      database,
      async ping() {
        const checks: Record<string, boolean> = { storage: await store.ping() };
        if (redis) checks.redis = await pingRedis(redis);
        if (database) checks.database = await database.ping();
        return checks;
      },
      async close() {
        await tasks.close();
        await closeConnections(redis, database);
        logger.info('Acquisition context closed');
      },
    };
  } catch (error) {
    await closeConnections(redis, database);
    throw error;
  }
}

function requireDatabaseUrl(config: MediaAcquisitionConfig): string {
  if (!config.database_url) {
    throw new ConfigurationError('DATABASE_URL is required when QUOTA_BACKEND=postgres');
  }
  return config.database_url;
}

export function createObjectStore(config: MediaAcquisitionConfig): ObjectStore {
  if (config.storage_backend === 'local') {
    return new LocalObjectStore({
      root: config.local_storage.path,
      baseUrl: config.local_storage.base_url,
      signingSecret: config.local_storage.signing_secret,
      createBucket: config.local_storage.create_bucket,
      cdnUrl: config.cdn_url,
      presignedExpirySeconds: config.presigned_url_expiry_seconds,
    });
  }
  return new MinioObjectStore({
    endpoint: config.minio.endpoint,
    port: config.minio.port,
    useSsl: config.minio.use_ssl,
    accessKey: config.minio.access_key,
    secretKey: config.minio.secret_key,
    bucket: config.minio.bucket,
    createBucket: config.minio.create_bucket,
    cdnUrl: config.cdn_url,
    presignedExpirySeconds: config.presigned_url_expiry_seconds,
  });
}

async function closeConnections(redis: Redis | undefined, database: MediaAcquisitionDatabase | undefined): Promise<void> {
  if (database) {
    try {
      await database.close();
    } catch (error) {
      logger.warn('Database did not close cleanly', { error: errorMessage(error) });
    }
  }
  if (redis?.status === 'wait') {
    redis.disconnect();
  } else if (redis && redis.status !== 'end') {
    try {
      await redis.quit();
    } catch (error) {
      logger.warn('Redis did not close cleanly', { error: errorMessage(error) });
    }
  }
}
