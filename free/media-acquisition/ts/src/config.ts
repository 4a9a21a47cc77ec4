/**
 * Media Acquisition Configuration
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import {
  LOG_LEVEL_NAMES,
  createLogger,
  errorMessage,
  parseBoolean,
  parseCsvList,
  parseEnum,
  parsePort,
  parsePositiveInt,
  parsePositiveNumber,
  parseRateLimitRule,
  validateDatabaseUrl,
  validateRedisUrl,
} from '@media-relay/plugin-utils';
import { ConfigurationError } from './errors.js';
import { DEFAULT_CACHE_TTL_SECONDS } from './pipeline.js';
import { DEFAULT_TIER_LIMITS } from './quota.js';
import { DEFAULT_TASK_RETENTION_SECONDS } from './tasks.js';
import type { MediaAcquisitionConfig, QuotaBackend, StateBackend, StorageBackend } from './types.js';

const logger = createLogger('media-acquisition:config');

const STATE_BACKENDS: readonly StateBackend[] = ['redis', 'memory'];
const QUOTA_BACKENDS: readonly QuotaBackend[] = ['postgres', 'memory'];
const STORAGE_BACKENDS: readonly StorageBackend[] = ['minio', 'local'];

/**
 * Loads `.env` into `process.env` without overriding values already set.
 */
export function loadEnvFile(path?: string): void {
  dotenvConfig(path ? { path } : undefined);
}

/**
 * Validates the environment and builds the service configuration.
 * Every problem is collected and reported in one ConfigurationError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MediaAcquisitionConfig {
  const problems: string[] = [];

  function read<T>(parse: () => T, fallback: T): T {
    try {
      return parse();
    } catch (error) {
      problems.push(errorMessage(error));
      return fallback;
    }
  }

  // Backends
  const stateBackend = read(() => parseEnum(env.STATE_BACKEND, 'STATE_BACKEND', STATE_BACKENDS, 'redis'), 'redis');
  const quotaBackend = read(() => parseEnum(env.QUOTA_BACKEND, 'QUOTA_BACKEND', QUOTA_BACKENDS, 'postgres'), 'postgres');
  const storageBackend = read(() => parseEnum(env.STORAGE_BACKEND, 'STORAGE_BACKEND', STORAGE_BACKENDS, 'minio'), 'minio');

  const redisUrl = env.REDIS_URL || 'redis://localhost:6379';
  if (stateBackend === 'redis' && !validateRedisUrl(redisUrl)) {
    problems.push(`REDIS_URL must be a redis:// or rediss:// URL (got: ${redisUrl})`);
  }

  const databaseUrl = env.DATABASE_URL || undefined;
  if (quotaBackend === 'postgres') {
    if (!databaseUrl) {
      problems.push('DATABASE_URL environment variable is required when QUOTA_BACKEND=postgres');
    } else if (!validateDatabaseUrl(databaseUrl)) {
      problems.push('DATABASE_URL must be a PostgreSQL connection string starting with postgresql:// or postgres://');
    }
  }

  // Storage
  const minioAccessKey = env.MINIO_ACCESS_KEY ?? '';
  const minioSecretKey = env.MINIO_SECRET_KEY ?? '';
  if (storageBackend === 'minio' && (!minioAccessKey || !minioSecretKey)) {
    problems.push('MINIO_ACCESS_KEY and MINIO_SECRET_KEY are required when STORAGE_BACKEND=minio');
  }

  const port = read(() => parsePort(env.PORT, 'PORT', 3310), 3310);
  const localBaseUrl = env.LOCAL_STORAGE_BASE_URL || `http://localhost:${port}/files`;
  const signingSecret = env.LOCAL_STORAGE_SIGNING_SECRET ?? '';
  if (storageBackend === 'local' && !signingSecret) {
    problems.push('LOCAL_STORAGE_SIGNING_SECRET is required when STORAGE_BACKEND=local');
  }

  const cdnUrl = env.CDN_URL || undefined;
  if (cdnUrl && !URL.canParse(cdnUrl)) {
    problems.push(`CDN_URL must be a valid URL (got: ${cdnUrl})`);
  }

  const config: MediaAcquisitionConfig = {
    port,
    host: env.HOST || '0.0.0.0',
    api_key: env.API_KEY || undefined,
    log_level: read(() => parseEnum(env.LOG_LEVEL, 'LOG_LEVEL', LOG_LEVEL_NAMES, 'info'), 'info'),

    state_backend: stateBackend,
    redis_url: redisUrl,
    quota_backend: quotaBackend,
    database_url: databaseUrl,

    storage_backend: storageBackend,
    minio: {
      endpoint: env.MINIO_ENDPOINT || 'localhost',
      port: read(() => parsePort(env.MINIO_PORT, 'MINIO_PORT', 9000), 9000),
      use_ssl: read(() => parseBoolean(env.MINIO_USE_SSL, 'MINIO_USE_SSL', false), false),
      access_key: minioAccessKey,
      secret_key: minioSecretKey,
      bucket: env.MINIO_BUCKET || 'media-files',
      create_bucket: read(() => parseBoolean(env.MINIO_CREATE_BUCKET, 'MINIO_CREATE_BUCKET', false), false),
    },
    local_storage: {
      path: env.LOCAL_STORAGE_PATH || './storage',
      base_url: localBaseUrl,
      signing_secret: signingSecret,
      create_bucket: read(() => parseBoolean(env.LOCAL_STORAGE_CREATE, 'LOCAL_STORAGE_CREATE', true), true),
    },
    cdn_url: cdnUrl,
    presigned_url_expiry_seconds: read(
      () => parsePositiveInt(env.PRESIGNED_URL_EXPIRY_SECONDS, 'PRESIGNED_URL_EXPIRY_SECONDS', 3600),
      3600
    ),
    temp_dir: env.TEMP_DIR || join(tmpdir(), 'media-acquisition'),

    cache_enabled: read(() => parseBoolean(env.CACHE_ENABLED, 'CACHE_ENABLED', true), true),
    cache_ttl_seconds: {
      free: read(
        () => parsePositiveInt(env.CACHE_TTL_SECONDS, 'CACHE_TTL_SECONDS', DEFAULT_CACHE_TTL_SECONDS.free),
        DEFAULT_CACHE_TTL_SECONDS.free
      ),
      premium: read(
        () => parsePositiveInt(env.PREMIUM_CACHE_TTL_SECONDS, 'PREMIUM_CACHE_TTL_SECONDS', DEFAULT_CACHE_TTL_SECONDS.premium),
        DEFAULT_CACHE_TTL_SECONDS.premium
      ),
    },
    quota_daily_mb: {
      free: read(
        () => parsePositiveNumber(env.QUOTA_FREE_DAILY_MB, 'QUOTA_FREE_DAILY_MB', DEFAULT_TIER_LIMITS.free),
        DEFAULT_TIER_LIMITS.free
      ),
      premium: read(
        () => parsePositiveNumber(env.QUOTA_PREMIUM_DAILY_MB, 'QUOTA_PREMIUM_DAILY_MB', DEFAULT_TIER_LIMITS.premium),
        DEFAULT_TIER_LIMITS.premium
      ),
    },
    rate_limit_per_user: read(
      () => parseRateLimitRule(env.RATE_LIMIT_PER_USER || '10/minute', 'RATE_LIMIT_PER_USER'),
      { limit: 10, windowSeconds: 60 }
    ),
    rate_limit_global: read(
      () => parseRateLimitRule(env.RATE_LIMIT_GLOBAL || '1000/minute', 'RATE_LIMIT_GLOBAL'),
      { limit: 1000, windowSeconds: 60 }
    ),

    single_flight_enabled: read(() => parseBoolean(env.SINGLE_FLIGHT_ENABLED, 'SINGLE_FLIGHT_ENABLED', false), false),
    single_flight_lease_ms: read(
      () => parsePositiveInt(env.SINGLE_FLIGHT_LEASE_MS, 'SINGLE_FLIGHT_LEASE_MS', 600_000),
      600_000
    ),

    queue_name: env.QUEUE_NAME || 'media-acquisition',
    worker_concurrency: read(() => parsePositiveInt(env.WORKER_CONCURRENCY, 'WORKER_CONCURRENCY', 4), 4),
    task_poll_interval_ms: read(() => parsePositiveInt(env.TASK_POLL_INTERVAL_MS, 'TASK_POLL_INTERVAL_MS', 1000), 1000),
    task_retention_seconds: read(
      () => parsePositiveInt(env.TASK_RETENTION_SECONDS, 'TASK_RETENTION_SECONDS', DEFAULT_TASK_RETENTION_SECONDS),
      DEFAULT_TASK_RETENTION_SECONDS
    ),

    yt_dlp_path: env.YT_DLP_PATH || 'yt-dlp',
    yt_dlp_timeout_ms: read(() => parsePositiveInt(env.YT_DLP_TIMEOUT_MS, 'YT_DLP_TIMEOUT_MS', 900_000), 900_000),
    content_blocklist: parseCsvList(env.CONTENT_BLOCKLIST),
    max_file_size_mb: read(() => parsePositiveNumber(env.MAX_FILE_SIZE_MB, 'MAX_FILE_SIZE_MB', 2048), 2048),
    http_timeout_ms: read(() => parsePositiveInt(env.HTTP_TIMEOUT_MS, 'HTTP_TIMEOUT_MS', 30_000), 30_000),
  };

  if (config.quota_daily_mb.premium < config.quota_daily_mb.free) {
    problems.push('QUOTA_PREMIUM_DAILY_MB must not be lower than QUOTA_FREE_DAILY_MB');
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }

  logger.debug('Configuration loaded and validated', {
    port: config.port,
    state: config.state_backend,
    quota: config.quota_backend,
    storage: config.storage_backend,
  });

  return config;
}
