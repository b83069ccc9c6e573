/**
 * Cache type definitions.
 */

export interface FingerprintEntry<V> {
  /** Identity of the inputs the value was computed from. */
  fingerprint: string;
  value: V;
}

export interface CacheStats {
  /** Lookups answered from the cache */
  hits: number;
  /** Lookups that found nothing usable */
  misses: number;
  /** Misses caused by a changed fingerprint */
  invalidated: number;
  /** Entries currently held */
  totalCached: number;
}
