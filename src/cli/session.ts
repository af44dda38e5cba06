/**
 * Shared setup of the run and watch commands
 */

import path from 'node:path';
import { CacheStore } from '../cache/cache-store.js';
import { loadConfig, loadConfigOrDefault, type ResolvedConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { ConfigError } from '../errors.js';
import { DeclarationExtractor } from '../extractor/index.js';
import { parsePluginSelector, type PluginEntry } from '../plugins/run.js';
import { getDefaultRegistry } from '../plugins/registry.js';
import { ModuleResolver } from '../resolver/module-resolver.js';
import { SourceLoader } from '../source/loader.js';

export interface SessionOptions {
  config?: string;
  prefix?: string;
  cache?: boolean;
}

export interface Session {
  config: Config;
  extractor: DeclarationExtractor;
  resolver: ModuleResolver;
  caches: CacheStore;
  /** Absolute cache file path, null when caching is disabled */
  cachePath: string | null;
  close(): Promise<void>;
}

export async function openSession(target: string, options: SessionOptions): Promise<Session> {
  const resolved: ResolvedConfig = options.config
    ? { config: await loadConfig(options.config), filePath: path.resolve(options.config) }
    : await loadConfigOrDefault(path.dirname(path.resolve(target)));

  const config: Config = options.prefix ? { ...resolved.config, prefix: options.prefix } : resolved.config;
  const baseDir = resolved.filePath ? path.dirname(resolved.filePath) : process.cwd();
  const cachePath = options.cache === false ? null : path.resolve(baseDir, config.cacheFile);

  const caches = new CacheStore();
  if (cachePath) {
    await caches.load(cachePath);
  }

  const loader = new SourceLoader();
  return {
    config,
    extractor: new DeclarationExtractor({ prefix: config.prefix, skipDirs: config.skipDirs, loader }),
    resolver: new ModuleResolver({ caches, loader }),
    caches,
    cachePath,
    async close(): Promise<void> {
      if (cachePath) {
        await caches.flush(cachePath);
      }
    },
  };
}

/**
 * Plugins selected by `name[:k=v...]` selectors, or every plugin named in
 * the configuration when no selector is given. Selector options override
 * configured ones.
 */
export function selectPlugins(selectors: string[], config: Config): PluginEntry[] {
  const registry = getDefaultRegistry();
  const requested =
    selectors.length > 0
      ? selectors.map(parsePluginSelector)
      : Object.keys(config.plugins).map(name => ({ name, options: {} }));

  if (requested.length === 0) {
    throw new ConfigError('No plugin selected; pass --plugin or list plugins in the configuration');
  }

  return requested.map(({ name, options }) => ({
    plugin: registry.require(name),
    options: { ...config.plugins[name], ...options },
  }));
}
