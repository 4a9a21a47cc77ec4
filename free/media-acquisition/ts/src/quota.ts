/**
 * Quota Ledger
 *
 * Tracks per-user daily consumption in ledger units (MiB). The daily counter
 * resets lazily: the first access at or after `resetAt` zeroes it and moves
 * `resetAt` 24 hours ahead. Stores implement reset and increment as single
 * conditional updates so racing workers cannot double-reset or over-admit.
 */

import { createLogger } from '@media-relay/plugin-utils';
import { QuotaExceededError } from './errors.js';
import type { QuotaRecord, QuotaStatus, QuotaTier } from './types.js';

const logger = createLogger('media-acquisition:quota');

export const BYTES_PER_UNIT = 1024 * 1024;
export const QUOTA_WINDOW_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_TIER_LIMITS: Record<QuotaTier, number> = {
  free: 1000,
  premium: 10000,
};

export function bytesToUnits(bytes: number): number {
  return bytes / BYTES_PER_UNIT;
}

export interface UsageIncrement {
  /** Ledger units added to the daily counter. */
  units: number;
  /** Raw bytes added to the lifetime total. */
  bytes: number;
}

export interface QuotaStore {
  /** Loads the record, creating a free-tier one when the user is new. */
  load(userId: string, now: Date): Promise<QuotaRecord>;
  /**
   * Zeroes usage and sets `nextResetAt`, only if `resetAt <= now` still holds.
   * Returns the current record either way.
   */
  resetIfDue(userId: string, now: Date, nextResetAt: Date): Promise<QuotaRecord>;
  /**
   * Adds `usage.units` to the daily counter and one download of `usage.bytes`
   * to the lifetime counters. With `ceiling` set, the increment is applied
   * only when the new daily total stays at or below it; returns null when
   * rejected.
   */
  increment(userId: string, usage: UsageIncrement, ceiling: number | null): Promise<QuotaRecord | null>;
  setTier(userId: string, tier: QuotaTier, now: Date): Promise<QuotaRecord>;
}

export interface QuotaLedgerOptions {
  limits?: Partial<Record<QuotaTier, number>>;
  now?: () => Date;
}

export class QuotaLedger {
  private readonly store: QuotaStore;
  private readonly limits: Record<QuotaTier, number>;
  private readonly now: () => Date;

  constructor(store: QuotaStore, options: QuotaLedgerOptions = {}) {
    this.store = store;
    this.limits = { ...DEFAULT_TIER_LIMITS, ...options.limits };
    this.now = options.now ?? (() => new Date());
  }

  limitFor(tier: QuotaTier): number {
    return this.limits[tier];
  }

  /**
   * Returns the user's current standing, applying the lazy daily reset.
   */
  async checkAndMaybeReset(userId: string): Promise<QuotaStatus> {
    const now = this.now();
    let record = await this.store.load(userId, now);

    if (now.getTime() >= record.resetAt.getTime()) {
      record = await this.store.resetIfDue(userId, now, new Date(now.getTime() + QUOTA_WINDOW_MS));
      logger.info('Daily quota reset', { userId, resetAt: record.resetAt.toISOString() });
    }

    return this.toStatus(record);
  }

  /**
   * Throws QuotaExceededError when the user has nothing left, or when a
   * known upcoming size would carry them past the limit.
   */
  ensureCapacity(status: QuotaStatus, bytes?: number): void {
    if (status.used >= status.limit) {
      throw new QuotaExceededError(status.userId, status.used, status.limit);
    }
    if (bytes !== undefined && status.used + bytesToUnits(bytes) > status.limit) {
      throw new QuotaExceededError(status.userId, status.used, status.limit, bytesToUnits(bytes));
    }
  }

  /**
   * Records consumption. With `enforceLimit` the increment is rejected, and
   * the record left untouched, when it would pass the tier limit.
   */
  async addUsage(userId: string, bytes: number, options: { enforceLimit?: boolean } = {}): Promise<QuotaStatus> {
    if (!Number.isFinite(bytes) || bytes < 0) {
      throw new RangeError(`Usage must be a non-negative byte count (got: ${bytes})`);
    }

    const current = await this.checkAndMaybeReset(userId);
    const units = bytesToUnits(bytes);
    const updated = await this.store.increment(userId, { units, bytes }, options.enforceLimit ? current.limit : null);

    if (!updated) {
      throw new QuotaExceededError(userId, current.used, current.limit, units);
    }

    logger.debug('Usage recorded', { userId, units, used: updated.usedToday });
    return this.toStatus(updated);
  }

  async setTier(userId: string, tier: QuotaTier): Promise<QuotaStatus> {
    const record = await this.store.setTier(userId, tier, this.now());
    logger.info('Quota tier changed', { userId, tier });
    return this.toStatus(record);
  }

  private toStatus(record: QuotaRecord): QuotaStatus {
    const limit = this.limits[record.tier];
    return {
      userId: record.userId,
      tier: record.tier,
      used: record.usedToday,
      limit,
      remaining: Math.max(0, limit - record.usedToday),
      resetAt: record.resetAt,
      totalDownloads: record.totalDownloads,
      totalBytes: record.totalBytes,
    };
  }
}

// =============================================================================
// In-process store (single-process mode and tests)
// =============================================================================

export class MemoryQuotaStore implements QuotaStore {
  private records = new Map<string, QuotaRecord>();

  /** Seeds or overwrites a record; lifetime counters default to zero. */
  put(record: Omit<QuotaRecord, 'totalDownloads' | 'totalBytes'> & Partial<QuotaRecord>): void {
    this.records.set(record.userId, { totalDownloads: 0, totalBytes: 0, ...record });
  }

  async load(userId: string, now: Date): Promise<QuotaRecord> {
    return { ...this.ensure(userId, now) };
  }

  async resetIfDue(userId: string, now: Date, nextResetAt: Date): Promise<QuotaRecord> {
    const record = this.ensure(userId, now);
    if (record.resetAt.getTime() <= now.getTime()) {
      record.usedToday = 0;
      record.resetAt = nextResetAt;
    }
    return { ...record };
  }

  async increment(userId: string, usage: UsageIncrement, ceiling: number | null): Promise<QuotaRecord | null> {
    const record = this.records.get(userId);
    if (!record) {
      throw new Error(`Quota record for ${userId} must be loaded before it is incremented`);
    }
    if (ceiling !== null && record.usedToday + usage.units > ceiling) {
      return null;
    }
    record.usedToday += usage.units;
    record.totalDownloads += 1;
    record.totalBytes += usage.bytes;
    return { ...record };
  }

  async setTier(userId: string, tier: QuotaTier, now: Date): Promise<QuotaRecord> {
    const record = this.ensure(userId, now);
    record.tier = tier;
    return { ...record };
  }

  private ensure(userId: string, now: Date): QuotaRecord {
    let record = this.records.get(userId);
    if (!record) {
      record = {
        userId,
        tier: 'free',
        usedToday: 0,
        resetAt: new Date(now.getTime() + QUOTA_WINDOW_MS),
        totalDownloads: 0,
        totalBytes: 0,
      };
      this.records.set(userId, record);
    }
    return record;
  }
}
