/**
 * Media Acquisition Types
 */

import type { LogLevel, RateLimitRule } from '@media-relay/plugin-utils';

// =============================================================================
// Configuration
// =============================================================================

export type StateBackend = 'redis' | 'memory';
export type QuotaBackend = 'postgres' | 'memory';
export type StorageBackend = 'minio' | 'local';

export interface MediaAcquisitionConfig {
  port: number;
  host: string;
  api_key?: string;
  log_level: LogLevel;

  state_backend: StateBackend;
  redis_url: string;
  quota_backend: QuotaBackend;
  database_url?: string;

  storage_backend: StorageBackend;
  minio: {
    endpoint: string;
    port: number;
    use_ssl: boolean;
    access_key: string;
    secret_key: string;
    bucket: string;
    create_bucket: boolean;
  };
  local_storage: {
    path: string;
    base_url: string;
    signing_secret: string;
    create_bucket: boolean;
  };
  cdn_url?: string;
  presigned_url_expiry_seconds: number;
  temp_dir: string;

  cache_enabled: boolean;
  cache_ttl_seconds: Record<QuotaTier, number>;
  quota_daily_mb: Record<QuotaTier, number>;
  rate_limit_per_user: RateLimitRule;
  rate_limit_global: RateLimitRule;

  single_flight_enabled: boolean;
  single_flight_lease_ms: number;

  queue_name: string;
  worker_concurrency: number;
  task_poll_interval_ms: number;
  /** How long finished tasks stay visible to pollers. */
  task_retention_seconds: number;

  yt_dlp_path: string;
  yt_dlp_timeout_ms: number;
  content_blocklist: string[];
  max_file_size_mb: number;
  http_timeout_ms: number;
}

// =============================================================================
// Requests
// =============================================================================

export const MEDIA_KINDS = ['video', 'audio', 'image', 'document'] as const;
export type MediaKind = (typeof MEDIA_KINDS)[number];

export interface AcquisitionOptions {
  /** Skip the cache lookup and fetch again. */
  forceRefresh?: boolean;
  /** Maximum video height, e.g. 720. */
  quality?: number;
  /** Preferred container or codec, passed through to the plugin. */
  format?: string;
}

export interface AcquisitionRequest {
  url: string;
  userId: string;
  mediaKind: MediaKind;
  options?: AcquisitionOptions;
}

// =============================================================================
// Plugins
// =============================================================================

export interface PluginDescriptor {
  name: string;
  version: string;
  description: string;
  supportedDomains: string[];
  supportedKinds: MediaKind[];
  priority: number;
}

export interface MediaInfo {
  title: string;
  duration?: number;
  resolution?: string;
  /** Expected size in bytes when the source reports one. */
  filesize?: number;
  uploader?: string;
  thumbnail?: string;
  mimeType?: string;
  webpageUrl?: string;
  extra?: Record<string, unknown>;
}

export interface FetchOptions {
  mediaKind: MediaKind;
  quality?: number;
  format?: string;
}

export type FetchOutcome =
  | { success: true; filePath: string; metadata: Partial<MediaInfo> }
  | { success: false; error: string };

// =============================================================================
// Cache / quota / storage records
// =============================================================================

export interface CachedArtifact {
  fingerprint: string;
  objectKey: string;
  url: string;
  sizeBytes: number;
  mediaKind: MediaKind;
  metadata: MediaInfo;
  plugin: string;
  cachedAt: string;
  expiresAt: string;
}

export const QUOTA_TIERS = ['free', 'premium'] as const;
export type QuotaTier = (typeof QUOTA_TIERS)[number];

export interface QuotaRecord {
  userId: string;
  tier: QuotaTier;
  /** Ledger units (MiB) consumed since the last reset. */
  usedToday: number;
  resetAt: Date;
  /** Lifetime counters; never reset. */
  totalDownloads: number;
  totalBytes: number;
}

export interface QuotaStatus {
  userId: string;
  tier: QuotaTier;
  used: number;
  limit: number;
  remaining: number;
  resetAt: Date;
  totalDownloads: number;
  totalBytes: number;
}

export interface MediaItemRecord {
  userId: string;
  url: string;
  fingerprint: string;
  mediaKind: MediaKind;
  objectKey: string;
  sizeBytes: number;
  contentHash: string;
  plugin: string;
  metadata: MediaInfo;
}

export interface StoredMediaItem extends MediaItemRecord {
  id: string;
  createdAt: Date;
}

// =============================================================================
// Results
// =============================================================================

export interface AcquisitionResult {
  fingerprint: string;
  objectKey: string;
  url: string;
  sizeBytes: number;
  mediaKind: MediaKind;
  metadata: MediaInfo;
  plugin: string;
  cacheHit: boolean;
  cachedAt: string;
  expiresAt: string;
}

export const TASK_STATUSES = ['pending', 'processing', 'completed', 'failed', 'cancelled'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface TaskFailure {
  kind: string;
  message: string;
  stage?: string;
  retryable?: boolean;
}

export interface TaskSnapshot {
  id: string;
  status: TaskStatus;
  progress: number;
  fingerprint?: string;
  result?: AcquisitionResult;
  error?: TaskFailure;
  createdAt: string;
  updatedAt: string;
}
