/**
 * Acquisition Orchestrator
 *
 * Runs one acquisition request through the stage machine:
 *   cache check -> quota check -> handler resolution -> metadata extraction
 *     -> content fetch -> persist -> record and cache
 *
 * Every step is a single attempt. Failures come back as an
 * `AcquisitionOutcome` carrying the error kind and the stage it happened in;
 * the fetch directory is removed on every path out.
 */

import { mkdir, mkdtemp, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger, errorMessage, type Logger } from '@media-relay/plugin-utils';
import type { ContentCache } from './cache.js';
import type { MediaCatalog } from './catalog.js';
import {
  ComplianceError,
  FetchError,
  MetadataExtractionError,
  NoHandlerError,
  PersistError,
  ValidationError,
  toFailure,
  type AcquisitionOutcome,
} from './errors.js';
import { canonicalizeUrl, hashFile, sha256Hex } from './fingerprint.js';
import type { FetchLease } from './lease.js';
import { buildObjectKey, type ObjectStore } from './object-store.js';
import type { SourcePlugin } from './plugins/base.js';
import type { PluginRegistry } from './plugins/registry.js';
import type { QuotaLedger } from './quota.js';
import { CachedArtifactSchema } from './schemas.js';
import { StageTracker, type ProgressReporter } from './state-machine.js';
import {
  MEDIA_KINDS,
  type AcquisitionRequest,
  type CachedArtifact,
  type FetchOutcome,
  type MediaInfo,
  type QuotaStatus,
  type QuotaTier,
} from './types.js';

const baseLogger = createLogger('media-acquisition:pipeline');

export const RESULT_CACHE_NAMESPACE = 'downloads';

export const DEFAULT_CACHE_TTL_SECONDS: Record<QuotaTier, number> = {
  free: 24 * 60 * 60,
  premium: 7 * 24 * 60 * 60,
};

/** Poll interval for a single-flight follower waiting on the leader. */
const LEASE_POLL_INTERVAL_MS = 1000;

export interface OrchestratorDependencies {
  cache: ContentCache;
  ledger: QuotaLedger;
  registry: PluginRegistry;
  store: ObjectStore;
  catalog?: MediaCatalog;
  /** Enables single-flight fetching when present. */
  lease?: FetchLease;
}

export interface OrchestratorOptions {
  tempDir?: string;
  cacheTtlSeconds?: Partial<Record<QuotaTier, number>>;
  leasePollIntervalMs?: number;
  now?: () => Date;
}

interface FetchedContent {
  filePath: string;
  sizeBytes: number;
  contentHash: string;
  metadata: MediaInfo;
}

interface LeaderWait {
  artifact: CachedArtifact | null;
  /** Set when the leader let go without a result and this request took the lease. */
  token: string | null;
}

export class AcquisitionOrchestrator {
  private readonly deps: OrchestratorDependencies;
  private readonly tempDir: string;
  private readonly cacheTtl: Record<QuotaTier, number>;
  private readonly leasePollIntervalMs: number;
  private readonly now: () => Date;

  constructor(deps: OrchestratorDependencies, options: OrchestratorOptions = {}) {
    this.deps = deps;
    this.tempDir = options.tempDir ?? join(tmpdir(), 'media-acquisition');
    this.cacheTtl = { ...DEFAULT_CACHE_TTL_SECONDS, ...options.cacheTtlSeconds };
    this.leasePollIntervalMs = options.leasePollIntervalMs ?? LEASE_POLL_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
  }

  // ==========================================================================
  // Main pipeline execution
  // ==========================================================================

  async process(request: AcquisitionRequest, reporter?: ProgressReporter): Promise<AcquisitionOutcome> {
    let fingerprint: string;
    try {
      validateRequest(request);
      fingerprint = sha256Hex(canonicalizeUrl(request.url));
    } catch (error) {
      return { ok: false, error: toFailure(error, 'INIT') };
    }

    const logger = baseLogger.with({ fingerprint: fingerprint.slice(0, 12), userId: request.userId });
    const tracker = new StageTracker(fingerprint.slice(0, 12), reporter);
    let workDir: string | null = null;
    let leaseToken: string | null = null;

    try {
      // Stage 1 -- Cache check
      await tracker.advance('CACHE_CHECK');
      if (!request.options?.forceRefresh) {
        const hit = await this.lookupCache(fingerprint, logger);
        if (hit) {
          const result = { ...hit, url: await this.deps.store.getPublicUrl(hit.objectKey), cacheHit: true };
          await tracker.advance('DONE');
          logger.info('Served from cache', { objectKey: hit.objectKey });
          return { ok: true, result };
        }
      }

      // Stage 2 -- Quota check
      await tracker.advance('QUOTA_CHECK');
      const quota = await this.deps.ledger.checkAndMaybeReset(request.userId);
      this.deps.ledger.ensureCapacity(quota);

      // Stage 3 -- Handler resolution
      await tracker.advance('HANDLER_RESOLUTION');
      const plugin = this.deps.registry.findHandler(request.url);
      if (!plugin) {
        throw new NoHandlerError(request.url);
      }
      logger.debug('Handler resolved', { plugin: plugin.descriptor.name });

      // Stage 4 -- Metadata extraction
      await tracker.advance('METADATA_EXTRACTION');
      const info = await this.extractInfo(plugin, request.url);
      this.deps.ledger.ensureCapacity(quota, info.filesize);

      if (this.deps.lease) {
        leaseToken = await this.deps.lease.acquire(fingerprint);
        if (!leaseToken) {
          const waited = await this.waitForLeader(fingerprint, logger);
          if (waited.artifact) {
            const settled = waited.artifact;
            const result = { ...settled, url: await this.deps.store.getPublicUrl(settled.objectKey), cacheHit: true };
            await tracker.advance('DONE');
            return { ok: true, result };
          }
          leaseToken = waited.token;
          if (!leaseToken) {
            logger.warn('Lease holder did not finish in time, fetching independently');
          }
        }
      }

      // Stage 5 -- Content fetch
      await tracker.advance('CONTENT_FETCH');
      await mkdir(this.tempDir, { recursive: true });
      workDir = await mkdtemp(join(this.tempDir, 'acq-'));
      const fetched = await this.fetchContent(plugin, request, workDir, info);

      // Stage 6 -- Persist
      await tracker.advance('PERSIST');
      const storedAt = this.now();
      const objectKey = buildObjectKey(request.mediaKind, storedAt, fetched.contentHash);
      let url: string;
      try {
        await this.deps.store.upload(fetched.filePath, {
          key: objectKey,
          contentType: fetched.metadata.mimeType,
          metadata: { fingerprint, plugin: plugin.descriptor.name },
        });
        url = await this.deps.store.getPublicUrl(objectKey);
      } catch (error) {
        throw new PersistError(`Upload of ${objectKey} failed: ${errorMessage(error)}`, error);
      }

      // Stage 7 -- Record usage and cache the result
      await tracker.advance('RECORD_AND_CACHE');
      await this.deps.ledger.addUsage(request.userId, fetched.sizeBytes, { enforceLimit: true });

      if (this.deps.catalog) {
        await this.deps.catalog.recordMediaItem({
          userId: request.userId,
          url: request.url,
          fingerprint,
          mediaKind: request.mediaKind,
          objectKey,
          sizeBytes: fetched.sizeBytes,
          contentHash: fetched.contentHash,
          plugin: plugin.descriptor.name,
          metadata: fetched.metadata,
        });
      }

      const artifact = this.buildArtifact(fingerprint, objectKey, url, fetched, request, plugin, quota);
      const cached = await this.deps.cache.set(RESULT_CACHE_NAMESPACE, fingerprint, artifact, this.cacheTtl[quota.tier]);
      if (!cached && this.deps.cache.isEnabled) {
        logger.warn('Result could not be cached', { objectKey });
      }

      await tracker.advance('DONE');
      logger.info('Acquisition completed', { objectKey, sizeBytes: fetched.sizeBytes, plugin: plugin.descriptor.name });
      return { ok: true, result: { ...artifact, cacheHit: false } };
    } catch (error) {
      const failure = toFailure(error, tracker.stage);
      if (!tracker.finished) {
        await tracker.advance('FAILED');
      }
      logger.error(`Acquisition failed at ${failure.stage}`, { kind: failure.kind, error: failure.message });
      return { ok: false, error: failure };
    } finally {
      await this.cleanup(fingerprint, workDir, leaseToken, logger);
    }
  }

  private async cleanup(fingerprint: string, workDir: string | null, leaseToken: string | null, logger: Logger): Promise<void> {
    if (workDir) {
      try {
        await rm(workDir, { recursive: true, force: true });
      } catch (error) {
        logger.warn('Temporary directory was not removed', { workDir, error: errorMessage(error) });
      }
    }
    if (leaseToken && this.deps.lease) {
      try {
        await this.deps.lease.release(fingerprint, leaseToken);
      } catch (error) {
        logger.warn('Fetch lease was not released; it will expire on its own', { error: errorMessage(error) });
      }
    }
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  /**
   * Returns a fresh cache entry whose object still exists. Malformed entries
   * and entries whose object is gone are deleted and reported as a miss.
   */
  private async lookupCache(fingerprint: string, logger: Logger): Promise<CachedArtifact | null> {
    const raw = await this.deps.cache.get<unknown>(RESULT_CACHE_NAMESPACE, fingerprint);
    if (raw === null) return null;

    const parsed = CachedArtifactSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Malformed cache entry discarded', { error: parsed.error.issues[0]?.message });
      await this.deps.cache.delete(RESULT_CACHE_NAMESPACE, fingerprint);
      return null;
    }
    const entry: CachedArtifact = parsed.data;

    if (Date.parse(entry.expiresAt) <= this.now().getTime()) {
      return null;
    }

    if (!(await this.deps.store.exists(entry.objectKey))) {
      logger.warn('Cached object missing from store, refetching', { objectKey: entry.objectKey });
      await this.deps.cache.delete(RESULT_CACHE_NAMESPACE, fingerprint);
      return null;
    }

    return entry;
  }

  private async extractInfo(plugin: SourcePlugin, url: string): Promise<MediaInfo> {
    let info: MediaInfo | null;
    try {
      info = await plugin.extractInfo(url);
    } catch (error) {
      throw new MetadataExtractionError(`${plugin.descriptor.name} could not read ${url}: ${errorMessage(error)}`, error);
    }

    if (!info || !info.title) {
      throw new MetadataExtractionError(`${plugin.descriptor.name} returned no media information for ${url}`);
    }

    if (plugin.screenContent && !(await plugin.screenContent(info))) {
      throw new ComplianceError(plugin.descriptor.name, info.title);
    }

    return info;
  }

  private async fetchContent(
    plugin: SourcePlugin,
    request: AcquisitionRequest,
    workDir: string,
    info: MediaInfo
  ): Promise<FetchedContent> {
    let outcome: FetchOutcome;
    try {
      outcome = await plugin.fetch(request.url, workDir, {
        mediaKind: request.mediaKind,
        quality: request.options?.quality,
        format: request.options?.format,
      });
    } catch (error) {
      throw new FetchError(`${plugin.descriptor.name} fetch failed: ${errorMessage(error)}`, error);
    }

    if (!outcome.success) {
      throw new FetchError(`${plugin.descriptor.name} fetch failed: ${outcome.error}`);
    }

    let sizeBytes: number;
    try {
      const file = await stat(outcome.filePath);
      sizeBytes = file.size;
    } catch (error) {
      throw new FetchError(`Fetched file ${outcome.filePath} is not readable`, error);
    }

    const metadata: MediaInfo = { ...info, filesize: sizeBytes };
    if (outcome.metadata.mimeType) metadata.mimeType = outcome.metadata.mimeType;
    if (outcome.metadata.duration !== undefined) metadata.duration = outcome.metadata.duration;
    if (outcome.metadata.resolution) metadata.resolution = outcome.metadata.resolution;

    return {
      filePath: outcome.filePath,
      sizeBytes,
      contentHash: await hashFile(outcome.filePath),
      metadata,
    };
  }

  /**
   * Polls for the lease holder's cache entry. Stops as soon as the lease is
   * released: either the entry is there, or the holder failed and this
   * request takes the lease over.
   */
  private async waitForLeader(fingerprint: string, logger: Logger): Promise<LeaderWait> {
    const lease = this.deps.lease;
    if (!lease) return { artifact: null, token: null };

    const deadline = Date.now() + lease.leaseTtlMs;
    logger.info('Another worker is fetching this content, waiting for its result');

    while (Date.now() < deadline) {
      await sleep(this.leasePollIntervalMs);
      const entry = await this.lookupCache(fingerprint, logger);
      if (entry) return { artifact: entry, token: null };
      if (await lease.isHeld(fingerprint)) continue;

      const token = await lease.acquire(fingerprint);
      if (!token) continue;

      // The holder may have cached its result just before letting go.
      const late = await this.lookupCache(fingerprint, logger);
      if (late) {
        await lease.release(fingerprint, token);
        return { artifact: late, token: null };
      }
      logger.info('Lease holder finished without a result, fetching');
      return { artifact: null, token };
    }
    return { artifact: null, token: null };
  }

  private buildArtifact(
    fingerprint: string,
    objectKey: string,
    url: string,
    fetched: FetchedContent,
    request: AcquisitionRequest,
    plugin: SourcePlugin,
    quota: QuotaStatus
  ): CachedArtifact {
    const cachedAt = this.now();
    const expiresAt = new Date(cachedAt.getTime() + this.cacheTtl[quota.tier] * 1000);
    return {
      fingerprint,
      objectKey,
      url,
      sizeBytes: fetched.sizeBytes,
      mediaKind: request.mediaKind,
      metadata: fetched.metadata,
      plugin: plugin.descriptor.name,
      cachedAt: cachedAt.toISOString(),
      expiresAt: expiresAt.toISOString(),
    };
  }
}

function validateRequest(request: AcquisitionRequest): void {
  if (!request.userId || !request.userId.trim()) {
    throw new ValidationError('userId is required');
  }
  if (!MEDIA_KINDS.includes(request.mediaKind)) {
    throw new ValidationError(`Unsupported media kind: ${String(request.mediaKind)}`);
  }
  if (request.options?.quality !== undefined && (!Number.isInteger(request.options.quality) || request.options.quality <= 0)) {
    throw new ValidationError('quality must be a positive integer');
  }
}
