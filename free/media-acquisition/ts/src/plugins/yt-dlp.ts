/**
 * yt-dlp source plugin
 *
 * Covers the video platforms yt-dlp supports by shelling out to the binary:
 * `--dump-json --skip-download` for metadata, a regular download with
 * `--print after_move:filepath` for content.
 */

import { spawn } from 'node:child_process';
import { join } from 'node:path';
import { z } from 'zod';
import { createLogger, errorMessage } from '@media-relay/plugin-utils';
import type { FetchOptions, FetchOutcome, MediaInfo, PluginDescriptor } from '../types.js';
import { BaseSourcePlugin } from './base.js';

const logger = createLogger('media-acquisition:yt-dlp');

const MAX_STDERR_BYTES = 8192;
const DEFAULT_TIMEOUT_MS = 15 * 60 * 1000;
const METADATA_TIMEOUT_MS = 60 * 1000;

const SUPPORTED_DOMAINS = [
  'youtube.com',
  'youtu.be',
  'vimeo.com',
  'instagram.com',
  'tiktok.com',
  'twitter.com',
  'x.com',
  'reddit.com',
  'soundcloud.com',
  'twitch.tv',
  'dailymotion.com',
];

const YtDlpInfoSchema = z
  .object({
    id: z.string().optional(),
    title: z.string().nullish(),
    fulltitle: z.string().nullish(),
    duration: z.number().nullish(),
    width: z.number().nullish(),
    height: z.number().nullish(),
    resolution: z.string().nullish(),
    filesize: z.number().nullish(),
    filesize_approx: z.number().nullish(),
    uploader: z.string().nullish(),
    channel: z.string().nullish(),
    thumbnail: z.string().nullish(),
    webpage_url: z.string().nullish(),
    extractor: z.string().nullish(),
    ext: z.string().nullish(),
  })
  .passthrough();

/**
 * Maps a `--dump-json` document onto MediaInfo. Returns null when the
 * document carries no usable title.
 */
export function toMediaInfo(raw: unknown): MediaInfo | null {
  const parsed = YtDlpInfoSchema.safeParse(raw);
  if (!parsed.success) return null;

  const info = parsed.data;
  const title = info.title ?? info.fulltitle;
  if (!title) return null;

  const resolution = info.width && info.height ? `${info.width}x${info.height}` : info.resolution ?? undefined;

  return {
    title,
    duration: info.duration ?? undefined,
    resolution,
    filesize: info.filesize ?? info.filesize_approx ?? undefined,
    uploader: info.uploader ?? info.channel ?? undefined,
    thumbnail: info.thumbnail ?? undefined,
    webpageUrl: info.webpage_url ?? undefined,
    extra: { id: info.id, extractor: info.extractor ?? undefined, ext: info.ext ?? undefined },
  };
}

export function buildFetchArgs(url: string, destinationDir: string, options: FetchOptions, maxFileSizeMb?: number): string[] {
  const args = [
    '--no-playlist',
    '--no-warnings',
    '--no-progress',
    '--restrict-filenames',
    '-o',
    join(destinationDir, '%(id)s.%(ext)s'),
    '--print',
    'after_move:filepath',
  ];

  if (maxFileSizeMb) {
    args.push('--max-filesize', `${maxFileSizeMb}M`);
  }

  if (options.mediaKind === 'audio') {
    args.push('-x', '--audio-format', options.format ?? 'mp3');
  } else {
    const height = options.quality ? `[height<=${options.quality}]` : '';
    args.push('-f', `bv*${height}+ba/b${height}`, '--merge-output-format', options.format ?? 'mp4');
  }

  args.push(url);
  return args;
}

interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface YtDlpPluginOptions {
  binaryPath?: string;
  timeoutMs?: number;
  maxFileSizeMb?: number;
  blocklist?: string[];
}

export class YtDlpPlugin extends BaseSourcePlugin {
  readonly descriptor: PluginDescriptor = {
    name: 'yt-dlp',
    version: '1.0.0',
    description: 'Video and audio from YouTube, Vimeo, Instagram, TikTok and other yt-dlp supported sites',
    supportedDomains: SUPPORTED_DOMAINS,
    supportedKinds: ['video', 'audio'],
    priority: 100,
  };

  private readonly binaryPath: string;
  private readonly timeoutMs: number;
  private readonly maxFileSizeMb?: number;
  private readonly blocklist: string[];

  constructor(options: YtDlpPluginOptions = {}) {
    super();
    this.binaryPath = options.binaryPath ?? 'yt-dlp';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxFileSizeMb = options.maxFileSizeMb;
    this.blocklist = (options.blocklist ?? []).map((term) => term.toLowerCase());
  }

  async extractInfo(url: string): Promise<MediaInfo | null> {
    const result = await this.run(
      ['--dump-json', '--skip-download', '--no-playlist', '--no-warnings', url],
      Math.min(this.timeoutMs, METADATA_TIMEOUT_MS)
    );

    if (result.timedOut) {
      throw new Error(`yt-dlp metadata lookup timed out for ${url}`);
    }
    if (result.code !== 0) {
      throw new Error(`yt-dlp exited with code ${result.code}: ${lastLine(result.stderr)}`);
    }

    const document = result.stdout.trim();
    if (!document) return null;
    return toMediaInfo(JSON.parse(document));
  }

  async fetch(url: string, destinationDir: string, options: FetchOptions): Promise<FetchOutcome> {
    const result = await this.run(buildFetchArgs(url, destinationDir, options, this.maxFileSizeMb), this.timeoutMs);

    if (result.timedOut) {
      return this.failure(`yt-dlp download timed out after ${this.timeoutMs}ms`);
    }
    if (result.code !== 0) {
      return this.failure(`yt-dlp exited with code ${result.code}: ${lastLine(result.stderr)}`);
    }

    const filePath = lastLine(result.stdout);
    if (!filePath) {
      return this.failure('yt-dlp finished without reporting an output file');
    }

    return { success: true, filePath, metadata: {} };
  }

  async screenContent(info: MediaInfo): Promise<boolean> {
    if (this.blocklist.length === 0) return true;
    const haystack = `${info.title} ${info.uploader ?? ''}`.toLowerCase();
    const blocked = this.blocklist.find((term) => haystack.includes(term));
    if (blocked) {
      logger.warn('Content matched blocklist', { title: info.title, term: blocked });
    }
    return blocked === undefined;
  }

  private run(args: string[], timeoutMs: number): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.binaryPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const timeout = setTimeout(() => {
        timedOut = true;
        proc.kill('SIGKILL');
      }, timeoutMs);

      // Decode across chunk boundaries; titles are often multibyte
      proc.stdout.setEncoding('utf8');
      proc.stderr.setEncoding('utf8');
      proc.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      proc.stderr.on('data', (chunk: string) => {
        stderr += chunk;
        if (stderr.length > MAX_STDERR_BYTES) {
          stderr = stderr.slice(-MAX_STDERR_BYTES);
        }
      });

      proc.on('error', (error) => {
        clearTimeout(timeout);
        logger.error('Failed to start yt-dlp', { binary: this.binaryPath, error: errorMessage(error) });
        reject(error);
      });
      proc.on('close', (code) => {
        clearTimeout(timeout);
        resolve({ code, stdout, stderr, timedOut });
      });
    });
  }
}

function lastLine(output: string): string {
  const lines = output.split('\n').map((line) => line.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? '';
}
