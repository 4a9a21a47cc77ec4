/**
 * Source plugin contract
 */

import type { FetchOptions, FetchOutcome, MediaInfo, PluginDescriptor } from '../types.js';

export interface SourcePlugin {
  readonly descriptor: PluginDescriptor;
  /** Pure predicate; no I/O. */
  canHandle(url: string): boolean;
  /** Metadata without downloading. null when the source has nothing to offer. */
  extractInfo(url: string): Promise<MediaInfo | null>;
  /** Downloads into `destinationDir`, which the caller owns and removes. */
  fetch(url: string, destinationDir: string, options: FetchOptions): Promise<FetchOutcome>;
  /** Optional compliance gate; false rejects the request. */
  screenContent?(info: MediaInfo): Promise<boolean>;
}

const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;

export abstract class BaseSourcePlugin implements SourcePlugin {
  abstract readonly descriptor: PluginDescriptor;

  abstract extractInfo(url: string): Promise<MediaInfo | null>;
  abstract fetch(url: string, destinationDir: string, options: FetchOptions): Promise<FetchOutcome>;

  canHandle(url: string): boolean {
    const host = hostnameOf(url);
    if (!host) return false;
    return this.descriptor.supportedDomains.some((domain) => host === domain || host.endsWith(`.${domain}`));
  }

  protected sanitizeFilename(name: string, maxLength = 200): string {
    const cleaned = name.replace(UNSAFE_FILENAME_CHARS, '_').replace(/\s+/g, ' ').trim();
    return (cleaned || 'download').slice(0, maxLength);
  }

  protected failure(error: string): FetchOutcome {
    return { success: false, error };
  }
}

export function hostnameOf(url: string): string | null {
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null;
    return parsed.hostname.toLowerCase();
  } catch {
    return null;
  }
}
