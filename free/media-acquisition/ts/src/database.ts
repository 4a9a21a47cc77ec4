/**
 * Media Acquisition Database
 *
 * PostgreSQL persistence for quota records and the media catalog.
 */

import { Database, createLogger } from '@media-relay/plugin-utils';
import type { MediaCatalog } from './catalog.js';
import type { QuotaStore, UsageIncrement } from './quota.js';
import { QUOTA_WINDOW_MS } from './quota.js';
import {
  MEDIA_KINDS,
  QUOTA_TIERS,
  type MediaInfo,
  type MediaItemRecord,
  type MediaKind,
  type QuotaRecord,
  type QuotaTier,
  type StoredMediaItem,
} from './types.js';

const logger = createLogger('media-acquisition:database');

interface QuotaRow {
  user_id: string;
  tier: string;
  used_units: number;
  reset_at: Date;
  total_downloads: string;
  total_bytes: string;
}

interface MediaItemRow {
  id: string;
  user_id: string;
  url: string;
  fingerprint: string;
  media_kind: string;
  object_key: string;
  size_bytes: string;
  content_hash: string;
  plugin: string;
  title: string;
  duration: number | null;
  resolution: string | null;
  metadata: MediaInfo;
  created_at: Date;
}

const QUOTA_COLUMNS = 'user_id, tier, used_units, reset_at, total_downloads, total_bytes';

function toTier(value: string): QuotaTier {
  return QUOTA_TIERS.find((tier) => tier === value) ?? 'free';
}

function toMediaKind(value: string): MediaKind {
  return MEDIA_KINDS.find((kind) => kind === value) ?? 'document';
}

function toQuotaRecord(row: QuotaRow): QuotaRecord {
  return {
    userId: row.user_id,
    tier: toTier(row.tier),
    usedToday: Number(row.used_units),
    resetAt: row.reset_at,
    totalDownloads: Number(row.total_downloads),
    totalBytes: Number(row.total_bytes),
  };
}

function toStoredMediaItem(row: MediaItemRow): StoredMediaItem {
  return {
    id: row.id,
    userId: row.user_id,
    url: row.url,
    fingerprint: row.fingerprint,
    mediaKind: toMediaKind(row.media_kind),
    objectKey: row.object_key,
    sizeBytes: Number(row.size_bytes),
    contentHash: row.content_hash,
    plugin: row.plugin,
    metadata: row.metadata,
    createdAt: row.created_at,
  };
}

export class MediaAcquisitionDatabase implements QuotaStore, MediaCatalog {
  private db: Database;

  constructor(connectionString: string) {
    this.db = new Database({ connectionString });
  }

  async initialize(): Promise<void> {
    await this.db.connect();
    await this.createSchema();
    logger.info('Database schema initialized');
  }

  private async createSchema(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS media_acq_quotas (
        user_id VARCHAR(255) PRIMARY KEY,
        tier VARCHAR(20) NOT NULL DEFAULT 'free',
        used_units DOUBLE PRECISION NOT NULL DEFAULT 0,
        reset_at TIMESTAMPTZ NOT NULL,
        total_downloads BIGINT NOT NULL DEFAULT 0,
        total_bytes BIGINT NOT NULL DEFAULT 0,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      ALTER TABLE media_acq_quotas ADD COLUMN IF NOT EXISTS total_downloads BIGINT NOT NULL DEFAULT 0;
      ALTER TABLE media_acq_quotas ADD COLUMN IF NOT EXISTS total_bytes BIGINT NOT NULL DEFAULT 0;

      CREATE TABLE IF NOT EXISTS media_acq_media_items (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        user_id VARCHAR(255) NOT NULL,
        url TEXT NOT NULL,
        fingerprint CHAR(64) NOT NULL,
        media_kind VARCHAR(20) NOT NULL,
        object_key TEXT NOT NULL,
        size_bytes BIGINT NOT NULL,
        content_hash CHAR(64) NOT NULL,
        plugin VARCHAR(100) NOT NULL,
        title TEXT,
        duration DOUBLE PRECISION,
        resolution VARCHAR(50),
        metadata JSONB NOT NULL DEFAULT '{}',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_media_acq_items_user
        ON media_acq_media_items(user_id, created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_media_acq_items_fingerprint
        ON media_acq_media_items(fingerprint);
    `);
  }

  async ping(): Promise<boolean> {
    return this.db.ping();
  }

  async close(): Promise<void> {
    await this.db.disconnect();
  }

  // ===========================================================================
  // Quota store
  // ===========================================================================

  async load(userId: string, now: Date): Promise<QuotaRecord> {
    // The no-op update makes RETURNING yield the existing row on conflict
    const row = await this.db.queryOne<QuotaRow>(
      `INSERT INTO media_acq_quotas (user_id, tier, used_units, reset_at)
       VALUES ($1, 'free', 0, $2)
       ON CONFLICT (user_id) DO UPDATE SET user_id = EXCLUDED.user_id
       RETURNING ${QUOTA_COLUMNS}`,
      [userId, new Date(now.getTime() + QUOTA_WINDOW_MS)]
    );
    if (!row) {
      throw new Error(`Quota record for ${userId} could not be loaded`);
    }
    return toQuotaRecord(row);
  }

  async resetIfDue(userId: string, now: Date, nextResetAt: Date): Promise<QuotaRecord> {
    const reset = await this.db.queryOne<QuotaRow>(
      `UPDATE media_acq_quotas
       SET used_units = 0, reset_at = $3, updated_at = NOW()
       WHERE user_id = $1 AND reset_at <= $2
       RETURNING ${QUOTA_COLUMNS}`,
      [userId, now, nextResetAt]
    );
    return reset ? toQuotaRecord(reset) : this.load(userId, now);
  }

  async increment(userId: string, usage: UsageIncrement, ceiling: number | null): Promise<QuotaRecord | null> {
    const row = await this.db.queryOne<QuotaRow>(
      `UPDATE media_acq_quotas
       SET used_units = used_units + $2,
           total_downloads = total_downloads + 1,
           total_bytes = total_bytes + $4,
           updated_at = NOW()
       WHERE user_id = $1
         AND ($3::double precision IS NULL OR used_units + $2 <= $3::double precision)
       RETURNING ${QUOTA_COLUMNS}`,
      [userId, usage.units, ceiling, usage.bytes]
    );
    return row ? toQuotaRecord(row) : null;
  }

  async setTier(userId: string, tier: QuotaTier, now: Date): Promise<QuotaRecord> {
    const row = await this.db.queryOne<QuotaRow>(
      `INSERT INTO media_acq_quotas (user_id, tier, used_units, reset_at)
       VALUES ($1, $2, 0, $3)
       ON CONFLICT (user_id) DO UPDATE SET tier = EXCLUDED.tier, updated_at = NOW()
       RETURNING ${QUOTA_COLUMNS}`,
      [userId, tier, new Date(now.getTime() + QUOTA_WINDOW_MS)]
    );
    if (!row) {
      throw new Error(`Quota tier for ${userId} could not be updated`);
    }
    return toQuotaRecord(row);
  }

  // ===========================================================================
  // Media catalog
  // ===========================================================================

  async recordMediaItem(item: MediaItemRecord): Promise<StoredMediaItem> {
    const row = await this.db.queryOne<MediaItemRow>(
      `INSERT INTO media_acq_media_items
         (user_id, url, fingerprint, media_kind, object_key, size_bytes, content_hash,
          plugin, title, duration, resolution, metadata)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       RETURNING *`,
      [
        item.userId,
        item.url,
        item.fingerprint,
        item.mediaKind,
        item.objectKey,
        item.sizeBytes,
        item.contentHash,
        item.plugin,
        item.metadata.title,
        item.metadata.duration ?? null,
        item.metadata.resolution ?? null,
        JSON.stringify(item.metadata),
      ]
    );
    if (!row) {
      throw new Error(`Media item for ${item.fingerprint} was not recorded`);
    }
    return toStoredMediaItem(row);
  }

  async listMediaItems(userId: string, limit = 50): Promise<StoredMediaItem[]> {
    const result = await this.db.query<MediaItemRow>(
      `SELECT * FROM media_acq_media_items
       WHERE user_id = $1
       ORDER BY created_at DESC
       LIMIT $2`,
      [userId, limit]
    );
    return result.rows.map(toStoredMediaItem);
  }
}
