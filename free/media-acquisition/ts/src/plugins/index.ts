/**
 * Built-in source plugins
 */

import type { MediaAcquisitionConfig } from '../types.js';
import { DirectHttpPlugin } from './direct-http.js';
import { PluginRegistry } from './registry.js';
import { YtDlpPlugin } from './yt-dlp.js';

export * from './base.js';
export * from './registry.js';
export * from './yt-dlp.js';
export * from './direct-http.js';

export function createDefaultRegistry(config: MediaAcquisitionConfig): PluginRegistry {
  const registry = new PluginRegistry();
  registry.register(
    new YtDlpPlugin({
      binaryPath: config.yt_dlp_path,
      timeoutMs: config.yt_dlp_timeout_ms,
      maxFileSizeMb: config.max_file_size_mb,
      blocklist: config.content_blocklist,
    })
  );
  registry.register(
    new DirectHttpPlugin({
      timeoutMs: config.http_timeout_ms,
      maxBytes: config.max_file_size_mb * 1024 * 1024,
    })
  );
  return registry;
}
