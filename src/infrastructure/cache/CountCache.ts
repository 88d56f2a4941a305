/**
 * Count Cache
 *
 * Bounded in-process cache of last-known counts. Entries older than the TTL
 * read as a miss and are dropped; a full cache evicts the least recently
 * used entry. Recency is the Map's insertion order: a hit or a write
 * re-inserts the key at the end, so the first key is always the LRU one.
 *
 * All methods are synchronous, so a lookup and its hit/miss accounting
 * happen in one step on the event loop.
 *
 * @module infrastructure/cache/CountCache
 */

import type { Logger } from 'pino';
import type { CacheStats } from '../../types.js';
import { REAL_CLOCK, type Clock } from '../../utils/clock.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface CountCacheConfig {
  /** Maximum number of entries */
  capacity: number;
  /** Age after which an entry reads as absent */
  ttlMs: number;
}

interface CacheEntry {
  value: number;
  insertedAt: number;
}

export const DEFAULT_COUNT_CACHE_CONFIG: CountCacheConfig = {
  capacity: 1000,
  ttlMs: 5000,
};

// --------------------------------------------------------------------------
// Cache
// --------------------------------------------------------------------------

export class CountCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly log: Logger;
  private readonly config: CountCacheConfig;
  private readonly clock: Clock;

  // Statistics
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(logger: Logger, config: Partial<CountCacheConfig> = {}, clock: Clock = REAL_CLOCK) {
    this.log = logger.child({ component: 'CountCache' });
    this.config = { ...DEFAULT_COUNT_CACHE_CONFIG, ...config };
    this.clock = clock;

    if (!Number.isInteger(this.config.capacity) || this.config.capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${this.config.capacity}`);
    }
  }

  /**
   * Cached count, or undefined on a miss (absent or expired)
   */
  get(key: string): number | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    const age = this.clock.now() - entry.insertedAt;
    if (age > this.config.ttlMs) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      this.log.debug({ key, ageMs: age }, 'Cache entry expired');
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  /**
   * Live cached count without touching recency or hit/miss statistics
   */
  peek(key: string): number | undefined {
    const entry = this.entries.get(key);
    if (!entry || this.clock.now() - entry.insertedAt > this.config.ttlMs) {
      return undefined;
    }
    return entry.value;
  }

  /**
   * Store `value` with a fresh timestamp, evicting the LRU entry if full
   */
  put(key: string, value: number): void {
    this.write(key, value);
  }

  /**
   * Add `by` to a live entry, or seed an absent or expired one with `by`.
   * The entry's TTL restarts either way. Returns the new cached value.
   */
  increment(key: string, by: number): number {
    const entry = this.entries.get(key);
    const live = entry !== undefined && this.clock.now() - entry.insertedAt <= this.config.ttlMs;
    const value = live ? entry.value + by : by;
    this.write(key, value);
    return value;
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    const size = this.entries.size;
    this.entries.clear();
    this.log.info({ entriesCleared: size }, 'Cache cleared');
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      capacity: this.config.capacity,
      evictions: this.evictions,
      expirations: this.expirations,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private write(key: string, value: number): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.config.capacity) {
      this.evictLRU();
    }

    this.entries.set(key, { value, insertedAt: this.clock.now() });
  }

  private evictLRU(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
      this.evictions++;
      this.log.debug({ key: oldest.value }, 'Cache evicted LRU entry');
    }
  }
}
