/**
 * Plugin registry
 */

import { ConfigError } from '../errors.js';
import type { Plugin } from './base.js';
import { FieldsPlugin } from './builtin/fields.js';
import { InspectPlugin } from './builtin/inspect.js';

export class PluginRegistry {
  private plugins: Map<string, Plugin> = new Map();

  /**
   * Register a plugin under its name
   */
  register(plugin: Plugin): void {
    if (this.plugins.has(plugin.name)) {
      throw new ConfigError(`Plugin already registered: ${plugin.name}`, { plugin: plugin.name });
    }
    this.plugins.set(plugin.name, plugin);
  }

  get(name: string): Plugin | undefined {
    return this.plugins.get(name);
  }

  /**
   * Get a plugin by name, failing for unknown names
   */
  require(name: string): Plugin {
    const plugin = this.plugins.get(name);
    if (!plugin) {
      throw new ConfigError(`Unknown plugin: ${name}`, { plugin: name, available: this.names() });
    }
    return plugin;
  }

  /**
   * Registered plugins sorted by name
   */
  list(): Plugin[] {
    return Array.from(this.plugins.values()).sort((a, b) => a.name.localeCompare(b.name));
  }

  names(): string[] {
    return this.list().map(plugin => plugin.name);
  }
}

/**
 * Create a plugin registry with the built-in plugins
 */
export function createDefaultRegistry(): PluginRegistry {
  const registry = new PluginRegistry();
  registry.register(new InspectPlugin());
  registry.register(new FieldsPlugin());
  return registry;
}

// Singleton registry instance
let defaultRegistry: PluginRegistry | null = null;

export function getDefaultRegistry(): PluginRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createDefaultRegistry();
  }
  return defaultRegistry;
}

export function resetRegistry(): void {
  defaultRegistry = null;
}
