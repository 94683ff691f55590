/**
 * Options for cache operations
 */
export interface CacheOptions {
  /**
   * Time To Live in seconds.
   * Falls back to the configured default when omitted.
   */
  ttl?: number;
}

/**
 * A value paired with the absolute time (epoch ms) it stops being fresh.
 */
export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Result of a store lookup. `found` is false for absent and expired entries.
 */
export type CacheLookup<T> = { found: true; value: T } | { found: false };

/**
 * Reads data from the source (the accounting API)
 */
export type CacheFetcher<T> = () => Promise<T>;

/**
 * Writes to the source and returns the write's result
 */
export type CacheMutator<T> = () => Promise<T>;
