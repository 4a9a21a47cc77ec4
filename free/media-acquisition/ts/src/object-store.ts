/**
 * Object Store
 *
 * Content-addressed blob storage. Keys are `{mediaKind}/{YYYY}/{MM}/{DD}/{sha256}`
 * (UTC date of the upload), so identical bytes uploaded on the same day land
 * on the same key and a second upload is a no-op.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import { copyFile, mkdir, readdir, rm, stat } from 'node:fs/promises';
import { createReadStream, type ReadStream, type Stats } from 'node:fs';
import { dirname, join, resolve, sep } from 'node:path';
import { Client } from 'minio';
import { createLogger, errorMessage } from '@media-relay/plugin-utils';
import { ConfigurationError, ValidationError } from './errors.js';
import type { MediaKind } from './types.js';

const logger = createLogger('media-acquisition:object-store');

export const DEFAULT_PRESIGNED_EXPIRY_SECONDS = 3600;

export interface UploadOptions {
  key: string;
  contentType?: string;
  metadata?: Record<string, string>;
}

export interface ObjectInfo {
  key: string;
  size: number;
  lastModified: Date;
}

export interface ObjectStore {
  /** Verifies the bucket; a missing bucket is a ConfigurationError unless creation is enabled. */
  initialize(): Promise<void>;
  upload(localPath: string, options: UploadOptions): Promise<string>;
  exists(key: string): Promise<boolean>;
  /** Copies the object to `destination`; null when it does not exist. */
  retrieve(key: string, destination: string): Promise<string | null>;
  delete(key: string): Promise<boolean>;
  stat(key: string): Promise<ObjectInfo | null>;
  getTemporaryAccessUrl(key: string, expirySeconds?: number): Promise<string>;
  /** CDN URL when a CDN prefix is configured, otherwise a temporary URL. */
  getPublicUrl(key: string): Promise<string>;
  /** Every object under `prefix`, sorted by key. */
  list(prefix?: string): Promise<ObjectInfo[]>;
  /** Deletes objects last modified more than `maxAgeDays` ago; returns how many went. */
  cleanupExpired(maxAgeDays: number): Promise<number>;
  ping(): Promise<boolean>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function buildObjectKey(mediaKind: MediaKind, date: Date, contentHash: string): string {
  if (!/^[a-f0-9]{64}$/.test(contentHash)) {
    throw new ValidationError(`Content hash must be a sha256 hex digest (got: ${contentHash})`);
  }
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${mediaKind}/${year}/${month}/${day}/${contentHash}`;
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function joinCdnUrl(cdnUrl: string, key: string): string {
  return `${cdnUrl.replace(/\/+$/, '')}/${key}`;
}

function byKey(a: ObjectInfo, b: ObjectInfo): number {
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

async function removeOlderThan(store: ObjectStore, maxAgeDays: number, now: number): Promise<number> {
  if (!Number.isFinite(maxAgeDays) || maxAgeDays <= 0) {
    throw new ValidationError(`maxAgeDays must be a positive number (got: ${maxAgeDays})`);
  }

  const cutoff = now - maxAgeDays * DAY_MS;
  let removed = 0;
  for (const object of await store.list()) {
    if (object.lastModified.getTime() < cutoff && (await store.delete(object.key))) {
      removed++;
    }
  }
  logger.info('Expired objects removed', { removed, maxAgeDays });
  return removed;
}

// =============================================================================
// MinIO / S3
// =============================================================================

export interface MinioObjectStoreOptions {
  endpoint: string;
  port: number;
  useSsl: boolean;
  accessKey: string;
  secretKey: string;
  bucket: string;
  createBucket?: boolean;
  cdnUrl?: string;
  presignedExpirySeconds?: number;
  now?: () => number;
}

/** Reads one entry of a bucket listing; prefixes (no name) are skipped. */
export function toObjectInfo(item: unknown): ObjectInfo | null {
  if (typeof item !== 'object' || item === null) return null;
  if (!('name' in item) || typeof item.name !== 'string' || !item.name) return null;
  return {
    key: item.name,
    size: 'size' in item && typeof item.size === 'number' ? item.size : 0,
    lastModified: 'lastModified' in item && item.lastModified instanceof Date ? item.lastModified : new Date(0),
  };
}

function isMissingObjectError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return error.code === 'NotFound' || error.code === 'NoSuchKey';
}

export class MinioObjectStore implements ObjectStore {
  private readonly client: Client;
  private readonly options: MinioObjectStoreOptions;

  constructor(options: MinioObjectStoreOptions, client?: Client) {
    this.options = options;
    this.client = client ?? new Client({
      endPoint: options.endpoint,
      port: options.port,
      useSSL: options.useSsl,
      accessKey: options.accessKey,
      secretKey: options.secretKey,
    });
  }

  async initialize(): Promise<void> {
    let present: boolean;
    try {
      present = await this.client.bucketExists(this.options.bucket);
    } catch (error) {
      throw new ConfigurationError(`Cannot reach object store at ${this.options.endpoint}:${this.options.port}`, error);
    }

    if (present) {
      logger.info('Object store bucket verified', { bucket: this.options.bucket });
      return;
    }
    if (!this.options.createBucket) {
      throw new ConfigurationError(`Object store bucket "${this.options.bucket}" does not exist`);
    }

    await this.client.makeBucket(this.options.bucket);
    logger.info('Object store bucket created', { bucket: this.options.bucket });
  }

  async upload(localPath: string, options: UploadOptions): Promise<string> {
    if (await this.exists(options.key)) {
      logger.debug('Object already stored, skipping upload', { key: options.key });
      return options.key;
    }

    await this.client.fPutObject(this.options.bucket, options.key, localPath, {
      'Content-Type': options.contentType ?? 'application/octet-stream',
      ...options.metadata,
    });
    logger.info('Object uploaded', { key: options.key });
    return options.key;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.stat(key)) !== null;
  }

  async stat(key: string): Promise<ObjectInfo | null> {
    try {
      const info = await this.client.statObject(this.options.bucket, key);
      return { key, size: info.size, lastModified: info.lastModified };
    } catch (error) {
      if (isMissingObjectError(error)) return null;
      throw error;
    }
  }

  async retrieve(key: string, destination: string): Promise<string | null> {
    if (!(await this.exists(key))) return null;
    await this.client.fGetObject(this.options.bucket, key, destination);
    return destination;
  }

  async delete(key: string): Promise<boolean> {
    if (!(await this.exists(key))) return false;
    await this.client.removeObject(this.options.bucket, key);
    logger.info('Object deleted', { key });
    return true;
  }

  async getTemporaryAccessUrl(key: string, expirySeconds?: number): Promise<string> {
    return this.client.presignedGetObject(
      this.options.bucket,
      key,
      expirySeconds ?? this.options.presignedExpirySeconds ?? DEFAULT_PRESIGNED_EXPIRY_SECONDS
    );
  }

  async getPublicUrl(key: string): Promise<string> {
    if (this.options.cdnUrl) {
      return joinCdnUrl(this.options.cdnUrl, key);
    }
    return this.getTemporaryAccessUrl(key);
  }

  list(prefix = ''): Promise<ObjectInfo[]> {
    return new Promise((resolve, reject) => {
      const objects: ObjectInfo[] = [];
      const stream = this.client.listObjectsV2(this.options.bucket, prefix, true);
      stream.on('data', (item: unknown) => {
        const info = toObjectInfo(item);
        if (info) objects.push(info);
      });
      stream.on('error', reject);
      stream.on('end', () => resolve(objects.sort(byKey)));
    });
  }

  async cleanupExpired(maxAgeDays: number): Promise<number> {
    return removeOlderThan(this, maxAgeDays, (this.options.now ?? Date.now)());
  }

  async ping(): Promise<boolean> {
    try {
      return await this.client.bucketExists(this.options.bucket);
    } catch (error) {
      logger.warn('Object store ping failed', { error: errorMessage(error) });
      return false;
    }
  }
}

// =============================================================================
// Local directory store
// =============================================================================

export interface LocalObjectStoreOptions {
  root: string;
  baseUrl: string;
  signingSecret: string;
  createBucket?: boolean;
  cdnUrl?: string;
  presignedExpirySeconds?: number;
  now?: () => number;
}

/**
 * Stores objects under a directory. Temporary URLs carry an expiry and an
 * HMAC-SHA256 signature that `verifySignedUrl` checks.
 */
export class LocalObjectStore implements ObjectStore {
  private readonly root: string;
  private readonly options: LocalObjectStoreOptions;
  private readonly now: () => number;

  constructor(options: LocalObjectStoreOptions) {
    this.options = options;
    this.root = resolve(options.root);
    this.now = options.now ?? Date.now;
  }

  async initialize(): Promise<void> {
    const info = await statOrNull(this.root);
    if (info?.isDirectory()) {
      logger.info('Local object store verified', { root: this.root });
      return;
    }
    if (info) {
      throw new ConfigurationError(`Local storage path ${this.root} is not a directory`);
    }
    if (!this.options.createBucket) {
      throw new ConfigurationError(`Local storage path ${this.root} does not exist`);
    }
    await mkdir(this.root, { recursive: true });
    logger.info('Local object store created', { root: this.root });
  }

  async upload(localPath: string, options: UploadOptions): Promise<string> {
    const target = this.pathFor(options.key);
    if (await this.exists(options.key)) {
      logger.debug('Object already stored, skipping upload', { key: options.key });
      return options.key;
    }
    await mkdir(dirname(target), { recursive: true });
    await copyFile(localPath, target);
    logger.info('Object uploaded', { key: options.key });
    return options.key;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.stat(key)) !== null;
  }

  async stat(key: string): Promise<ObjectInfo | null> {
    const info = await statOrNull(this.pathFor(key));
    if (!info?.isFile()) return null;
    return { key, size: info.size, lastModified: info.mtime };
  }

  async retrieve(key: string, destination: string): Promise<string | null> {
    if (!(await this.exists(key))) return null;
    await mkdir(dirname(destination), { recursive: true });
    await copyFile(this.pathFor(key), destination);
    return destination;
  }

  async delete(key: string): Promise<boolean> {
    if (!(await this.exists(key))) return false;
    await rm(this.pathFor(key));
    logger.info('Object deleted', { key });
    return true;
  }

  async getTemporaryAccessUrl(key: string, expirySeconds?: number): Promise<string> {
    const expires = Math.floor(this.now() / 1000) + (expirySeconds ?? this.options.presignedExpirySeconds ?? DEFAULT_PRESIGNED_EXPIRY_SECONDS);
    const signature = this.sign(key, expires);
    return `${this.options.baseUrl.replace(/\/+$/, '')}/${key}?expires=${expires}&signature=${signature}`;
  }

  async getPublicUrl(key: string): Promise<string> {
    if (this.options.cdnUrl) {
      return joinCdnUrl(this.options.cdnUrl, key);
    }
    return this.getTemporaryAccessUrl(key);
  }

  /** Opens a stored object for reading; null when the key is absent. */
  async openReadStream(key: string): Promise<ReadStream | null> {
    if (!(await this.exists(key))) return null;
    return createReadStream(this.pathFor(key));
  }

  /**
   * Checks a key/expires/signature triple produced by getTemporaryAccessUrl.
   */
  verifySignedUrl(key: string, expires: number, signature: string): boolean {
    if (expires * 1000 < this.now()) return false;
    const expected = Buffer.from(this.sign(key, expires));
    const provided = Buffer.from(signature);
    return expected.length === provided.length && timingSafeEqual(expected, provided);
  }

  async list(prefix = ''): Promise<ObjectInfo[]> {
    if (!(await statOrNull(this.root))?.isDirectory()) return [];

    const objects: ObjectInfo[] = [];
    for (const entry of await readdir(this.root, { recursive: true })) {
      const key = entry.split(sep).join('/');
      if (!key.startsWith(prefix)) continue;
      const info = await this.stat(key);
      if (info) objects.push(info);
    }
    return objects.sort(byKey);
  }

  async cleanupExpired(maxAgeDays: number): Promise<number> {
    return removeOlderThan(this, maxAgeDays, this.now());
  }

  async ping(): Promise<boolean> {
    try {
      return Boolean((await statOrNull(this.root))?.isDirectory());
    } catch (error) {
      logger.warn('Local object store ping failed', { error: errorMessage(error) });
      return false;
    }
  }

  private sign(key: string, expires: number): string {
    return createHmac('sha256', this.options.signingSecret).update(`${key}:${expires}`).digest('hex');
  }

  private pathFor(key: string): string {
    const target = resolve(join(this.root, key));
    if (!target.startsWith(this.root + sep)) {
      throw new ValidationError(`Object key escapes the storage root: ${key}`);
    }
    return target;
  }
}
