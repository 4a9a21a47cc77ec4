/**
 * Per-fingerprint fetch lease (opt-in single-flight)
 *
 * The first worker to reach CONTENT_FETCH for a fingerprint takes the lease;
 * others wait for its cache entry instead of fetching the same bytes again.
 * Leases expire on their own so a crashed holder only delays followers.
 */

import { randomUUID } from 'node:crypto';
import { createLogger } from '@media-relay/plugin-utils';
import type { CacheBackend } from './cache.js';

const logger = createLogger('media-acquisition:lease');

export interface FetchLeaseOptions {
  ttlMs: number;
  prefix?: string;
}

export class FetchLease {
  private readonly backend: CacheBackend;
  private readonly ttlMs: number;
  private readonly prefix: string;

  constructor(backend: CacheBackend, options: FetchLeaseOptions) {
    this.backend = backend;
    this.ttlMs = options.ttlMs;
    this.prefix = options.prefix ?? 'lease:fetch';
  }

  get leaseTtlMs(): number {
    return this.ttlMs;
  }

  /**
   * Returns a release token when the lease was taken, or null when another
   * worker holds it.
   */
  async acquire(fingerprint: string): Promise<string | null> {
    const token = randomUUID();
    const acquired = await this.backend.setIfAbsent(this.key(fingerprint), token, this.ttlMs);
    logger.debug(acquired ? 'Fetch lease acquired' : 'Fetch lease held elsewhere', { fingerprint });
    return acquired ? token : null;
  }

  async release(fingerprint: string, token: string): Promise<boolean> {
    return this.backend.deleteIfEquals(this.key(fingerprint), token);
  }

  async isHeld(fingerprint: string): Promise<boolean> {
    return this.backend.exists(this.key(fingerprint));
  }

  private key(fingerprint: string): string {
    return `${this.prefix}:${fingerprint}`;
  }
}
