/**
 * Persisted string caches for module resolution
 */

import fs from 'node:fs';
import path from 'node:path';

export const DEFAULT_CACHE_FILE = '.annokitcache';

/** Names of the resolver caches, used as section keys of the cache file */
export const CACHE_NAMES = [
  'importName',
  'importPath',
  'importPackageName',
  'importPackageDir',
  'modFile',
] as const;

export type CacheName = (typeof CACHE_NAMES)[number];

/**
 * String to string memo with in-flight de-duplication.
 * Only non-empty results are stored: an empty result means "unresolvable"
 * and is computed again on the next load.
 */
export class KeyedStore {
  private values: Map<string, string> = new Map();
  private pending: Map<string, Promise<string>> = new Map();

  async load(key: string, compute: () => Promise<string>): Promise<string> {
    const cached = this.values.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const inflight = this.pending.get(key);
    if (inflight) {
      return inflight;
    }

    const promise = compute().then(
      result => {
        this.pending.delete(key);
        if (result.length > 0) {
          this.values.set(key, result);
        }
        return result;
      },
      (error: unknown) => {
        this.pending.delete(key);
        throw error;
      }
    );
    this.pending.set(key, promise);
    return promise;
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  entries(): Array<[string, string]> {
    return Array.from(this.values.entries());
  }

  clear(): void {
    this.values.clear();
  }

  get size(): number {
    return this.values.size;
  }
}

type CacheSnapshot = Record<string, Record<string, string>>;

/**
 * Holds the named resolver caches and their on-disk snapshot.
 * Construct once per process, `load` at start and `flush` at shutdown.
 */
export class CacheStore {
  private stores: Map<CacheName, KeyedStore> = new Map();
  // sections written by other versions of the tool
  private foreign: CacheSnapshot = {};

  constructor() {
    for (const name of CACHE_NAMES) {
      this.stores.set(name, new KeyedStore());
    }
  }

  store(name: CacheName): KeyedStore {
    let store = this.stores.get(name);
    if (!store) {
      store = new KeyedStore();
      this.stores.set(name, store);
    }
    return store;
  }

  /**
   * Restore caches from a snapshot file. A missing or malformed file leaves
   * the caches empty.
   */
  async load(filePath: string = DEFAULT_CACHE_FILE): Promise<void> {
    let content: string;
    try {
      content = await fs.promises.readFile(path.resolve(filePath), 'utf-8');
    } catch {
      // no snapshot yet
      return;
    }

    let snapshot: unknown;
    try {
      snapshot = JSON.parse(content);
    } catch {
      // a corrupt snapshot is rebuilt on the next flush
      return;
    }
    if (!isRecord(snapshot)) {
      return;
    }

    for (const [section, values] of Object.entries(snapshot)) {
      if (!isRecord(values)) continue;

      const strings: Record<string, string> = {};
      for (const [key, value] of Object.entries(values)) {
        if (typeof value === 'string') {
          strings[key] = value;
        }
      }

      if (isCacheName(section)) {
        const store = this.store(section);
        for (const [key, value] of Object.entries(strings)) {
          store.set(key, value);
        }
      } else {
        this.foreign[section] = strings;
      }
    }
  }

  snapshot(): CacheSnapshot {
    const snapshot: CacheSnapshot = { ...this.foreign };
    for (const name of CACHE_NAMES) {
      snapshot[name] = Object.fromEntries(this.store(name).entries());
    }
    return snapshot;
  }

  /**
   * Overwrite the snapshot file with the current cache contents
   */
  async flush(filePath: string = DEFAULT_CACHE_FILE): Promise<void> {
    await fs.promises.writeFile(path.resolve(filePath), JSON.stringify(this.snapshot()), 'utf-8');
  }

  clear(): void {
    for (const store of this.stores.values()) {
      store.clear();
    }
    this.foreign = {};
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const cacheNames: ReadonlySet<string> = new Set(CACHE_NAMES);

function isCacheName(name: string): name is CacheName {
  return cacheNames.has(name);
}
