/**
 * Media catalog: one record per successful fetch.
 */

import { randomUUID } from 'node:crypto';
import type { MediaItemRecord, StoredMediaItem } from './types.js';

export interface MediaCatalog {
  recordMediaItem(item: MediaItemRecord): Promise<StoredMediaItem>;
  listMediaItems(userId: string, limit?: number): Promise<StoredMediaItem[]>;
}

export class MemoryMediaCatalog implements MediaCatalog {
  private items: StoredMediaItem[] = [];

  async recordMediaItem(item: MediaItemRecord): Promise<StoredMediaItem> {
    const stored: StoredMediaItem = { ...item, id: randomUUID(), createdAt: new Date() };
    this.items.push(stored);
    return stored;
  }

  async listMediaItems(userId: string, limit = 50): Promise<StoredMediaItem[]> {
    return this.items
      .filter((item) => item.userId === userId)
      .reverse()
      .slice(0, limit);
  }
}
