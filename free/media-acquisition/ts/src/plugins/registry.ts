/**
 * Plugin Registry
 *
 * Plugins are kept sorted by descending priority; equal priorities keep
 * registration order. `findHandler` returns the first plugin that accepts a
 * URL.
 */

import { createLogger } from '@media-relay/plugin-utils';
import type { PluginDescriptor } from '../types.js';
import type { SourcePlugin } from './base.js';

const logger = createLogger('media-acquisition:registry');

interface Registration {
  plugin: SourcePlugin;
  sequence: number;
}

export class PluginRegistry {
  private registrations: Registration[] = [];
  private sequence = 0;

  register(plugin: SourcePlugin): void {
    const { name } = plugin.descriptor;
    if (this.registrations.some((entry) => entry.plugin.descriptor.name === name)) {
      throw new Error(`Plugin "${name}" is already registered`);
    }

    this.registrations.push({ plugin, sequence: this.sequence++ });
    this.registrations.sort(
      (a, b) => b.plugin.descriptor.priority - a.plugin.descriptor.priority || a.sequence - b.sequence
    );
    logger.info('Plugin registered', { name, priority: plugin.descriptor.priority });
  }

  unregister(name: string): boolean {
    const before = this.registrations.length;
    this.registrations = this.registrations.filter((entry) => entry.plugin.descriptor.name !== name);
    const removed = this.registrations.length < before;
    if (removed) {
      logger.info('Plugin unregistered', { name });
    }
    return removed;
  }

  findHandler(url: string): SourcePlugin | null {
    for (const { plugin } of this.registrations) {
      if (plugin.canHandle(url)) {
        return plugin;
      }
    }
    return null;
  }

  get(name: string): SourcePlugin | null {
    return this.registrations.find((entry) => entry.plugin.descriptor.name === name)?.plugin ?? null;
  }

  list(): PluginDescriptor[] {
    return this.registrations.map(({ plugin }) => ({ ...plugin.descriptor }));
  }

  supportedDomains(): string[] {
    const domains = new Set<string>();
    for (const { plugin } of this.registrations) {
      plugin.descriptor.supportedDomains.forEach((domain) => domains.add(domain));
    }
    return [...domains].sort();
  }

  get size(): number {
    return this.registrations.length;
  }
}
