/**
 * Direct HTTP source plugin
 *
 * Fallback for plain links to media files (`.../clip.mp4`, `.../cover.jpg`).
 * Metadata comes from a HEAD request; content is streamed to disk and the
 * transfer is aborted once it passes the configured size cap.
 */

import { createWriteStream } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { Transform, type Readable, type TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import axios, { type AxiosInstance } from 'axios';
import { createLogger, errorMessage } from '@media-relay/plugin-utils';
import type { FetchOptions, FetchOutcome, MediaInfo, MediaKind, PluginDescriptor } from '../types.js';
import { BaseSourcePlugin } from './base.js';

const logger = createLogger('media-acquisition:direct-http');

const MEDIA_EXTENSIONS: Record<string, { kind: MediaKind; mimeType: string }> = {
  '.mp4': { kind: 'video', mimeType: 'video/mp4' },
  '.webm': { kind: 'video', mimeType: 'video/webm' },
  '.mkv': { kind: 'video', mimeType: 'video/x-matroska' },
  '.mov': { kind: 'video', mimeType: 'video/quicktime' },
  '.mp3': { kind: 'audio', mimeType: 'audio/mpeg' },
  '.m4a': { kind: 'audio', mimeType: 'audio/mp4' },
  '.ogg': { kind: 'audio', mimeType: 'audio/ogg' },
  '.flac': { kind: 'audio', mimeType: 'audio/flac' },
  '.wav': { kind: 'audio', mimeType: 'audio/wav' },
  '.jpg': { kind: 'image', mimeType: 'image/jpeg' },
  '.jpeg': { kind: 'image', mimeType: 'image/jpeg' },
  '.png': { kind: 'image', mimeType: 'image/png' },
  '.gif': { kind: 'image', mimeType: 'image/gif' },
  '.webp': { kind: 'image', mimeType: 'image/webp' },
  '.pdf': { kind: 'document', mimeType: 'application/pdf' },
  '.epub': { kind: 'document', mimeType: 'application/epub+zip' },
  '.zip': { kind: 'document', mimeType: 'application/zip' },
};

function headerValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function contentLength(value: unknown): number | undefined {
  const raw = headerValue(value);
  if (raw === undefined) return undefined;
  const length = Number(raw);
  return Number.isFinite(length) && length >= 0 ? length : undefined;
}

export class SizeLimitExceededError extends Error {
  constructor(limit: number) {
    super(`Response exceeds the ${limit}-byte limit`);
    this.name = 'SizeLimitExceededError';
  }
}

/** Passes bytes through, failing the stream once more than `limit` went by. */
class ByteLimit extends Transform {
  bytes = 0;

  constructor(private readonly limit: number) {
    super();
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    if (this.bytes > this.limit) {
      callback(new SizeLimitExceededError(this.limit));
      return;
    }
    callback(null, chunk);
  }
}

export interface DirectHttpPluginOptions {
  timeoutMs?: number;
  maxBytes?: number;
  client?: AxiosInstance;
}

export class DirectHttpPlugin extends BaseSourcePlugin {
  readonly descriptor: PluginDescriptor = {
    name: 'direct-http',
    version: '1.0.0',
    description: 'Direct links to media files over HTTP(S)',
    supportedDomains: [],
    supportedKinds: ['video', 'audio', 'image', 'document'],
    priority: 10,
  };

  private readonly client: AxiosInstance;
  private readonly maxBytes: number;

  constructor(options: DirectHttpPluginOptions = {}) {
    super();
    this.client = options.client ?? axios.create({ timeout: options.timeoutMs ?? 30_000, maxRedirects: 5 });
    this.maxBytes = options.maxBytes ?? 2048 * 1024 * 1024;
  }

  override canHandle(url: string): boolean {
    try {
      const parsed = new URL(url);
      if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;
      return extname(parsed.pathname).toLowerCase() in MEDIA_EXTENSIONS;
    } catch {
      return false;
    }
  }

  async extractInfo(url: string): Promise<MediaInfo | null> {
    const response = await this.client.head(url, { validateStatus: () => true });
    if (response.status >= 400) {
      logger.debug('HEAD request rejected', { url, status: response.status });
      return null;
    }

    const pathname = new URL(url).pathname;
    const known = MEDIA_EXTENSIONS[extname(pathname).toLowerCase()];
    return {
      title: this.fileNameOf(pathname),
      filesize: contentLength(response.headers['content-length']),
      mimeType: headerValue(response.headers['content-type'])?.split(';')[0].trim() ?? known?.mimeType,
      webpageUrl: url,
      extra: known ? { detectedKind: known.kind } : undefined,
    };
  }

  async fetch(url: string, destinationDir: string, _options: FetchOptions): Promise<FetchOutcome> {
    const pathname = new URL(url).pathname;
    const filePath = join(destinationDir, this.fileNameOf(pathname));

    let body: Readable | null = null;
    try {
      const response = await this.client.get<Readable>(url, {
        responseType: 'stream',
        validateStatus: () => true,
      });
      body = response.data;

      if (response.status >= 400) {
        body.destroy();
        return this.failure(`HTTP ${response.status} from ${url}`);
      }

      const declared = contentLength(response.headers['content-length']);
      if (declared !== undefined && declared > this.maxBytes) {
        body.destroy();
        return this.failure(`Declared size ${declared} exceeds the ${this.maxBytes}-byte limit`);
      }

      const limiter = new ByteLimit(this.maxBytes);
      await pipeline(body, limiter, createWriteStream(filePath));

      return {
        success: true,
        filePath,
        metadata: {
          filesize: limiter.bytes,
          mimeType: headerValue(response.headers['content-type'])?.split(';')[0].trim(),
        },
      };
    } catch (error) {
      body?.destroy();
      logger.warn('Direct download failed', { url, error: errorMessage(error) });
      return this.failure(errorMessage(error));
    }
  }

  private fileNameOf(pathname: string): string {
    const raw = basename(pathname);
    let name: string;
    try {
      name = decodeURIComponent(raw);
    } catch {
      name = raw;
    }
    return this.sanitizeFilename(name);
  }
}
