/**
 * Content-versioned memo store
 *
 * A value is served only while the version it was computed for is still the
 * current one. Loading a key with a different version recomputes and replaces
 * the entry, so stale results are never returned.
 */

interface VersionEntry<V> {
  version: string;
  value: Promise<V>;
}

export class VersionStore<K, V> {
  private entries: Map<K, VersionEntry<V>> = new Map();

  /**
   * Load value of `key` computed for `version`, or compute it with `compute`.
   * Concurrent loads of the same key and version share one computation.
   */
  async load(key: K, version: string, compute: () => V | Promise<V>): Promise<V> {
    const existing = this.entries.get(key);
    if (existing && existing.version === version) {
      return existing.value;
    }

    const entry: VersionEntry<V> = {
      version,
      value: Promise.resolve().then(compute),
    };
    this.entries.set(key, entry);

    try {
      const value = await entry.value;
      return value;
    } catch (error) {
      // failed computations are not memoized
      if (this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
      throw error;
    }
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
