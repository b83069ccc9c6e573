/**
 * In-memory cache whose entries are valid only for the fingerprint they were
 * stored under. Lives for the session; nothing is written to disk.
 */
import type { CacheStats, FingerprintEntry } from './types.js';

export class FingerprintCache<K, V> {
  private readonly entries = new Map<K, FingerprintEntry<V>>();
  private stats = { hits: 0, misses: 0, invalidated: 0 };

  /**
   * Returns the value stored under `key` when it was stored with the same
   * fingerprint. A stale entry counts as a miss and stays until replaced.
   */
  get(key: K, fingerprint: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.stats.misses++;
      return undefined;
    }
    if (entry.fingerprint !== fingerprint) {
      this.stats.invalidated++;
      this.stats.misses++;
      return undefined;
    }
    this.stats.hits++;
    return entry.value;
  }

  set(key: K, fingerprint: string, value: V): void {
    this.entries.set(key, { fingerprint, value });
  }

  has(key: K): boolean {
    return this.entries.has(key);
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

  getStats(): CacheStats {
    return {
      ...this.stats,
      totalCached: this.entries.size,
    };
  }
}
