/**
 * In-process LRU cache with per-entry TTL
 *
 * Backed by a Map: insertion order doubles as recency order, so the first
 * key is always the least recently used one.
 *
 * @module @casecontext/core/cache/lru-cache
 */

export type CaseStatus = 'active' | 'closed';

export interface CacheEntry<T> {
  key: string;
  value: T;
  createdAt: number;
  expiresAt: number;
  hitCount: number;
  lastAccessed: number;
  caseStatus: CaseStatus;
}

export interface LRUCacheOptions {
  /** Maximum number of entries (default: 1000) */
  maxSize?: number;
  /** TTL applied when set() gets none (default: 600) */
  defaultTtlSeconds?: number;
}

export interface LRUCacheStats {
  size: number;
  max_size: number;
  utilization: number;
  total_hits: number;
  expired_entries: number;
  default_ttl_seconds: number;
}

export class LRUCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  readonly maxSize: number;
  readonly defaultTtlSeconds: number;

  constructor(options: LRUCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 1000;
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? 600;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Get a live value, promoting it to most recently used
   */
  get(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    const now = Date.now();
    if (now > entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }

    entry.hitCount++;
    entry.lastAccessed = now;
    this.entries.delete(key);
    this.entries.set(key, entry);

    return entry.value;
  }

  set(key: string, value: T, ttlSeconds?: number, caseStatus: CaseStatus = 'active'): void {
    const now = Date.now();
    const ttl = ttlSeconds || this.defaultTtlSeconds;

    this.entries.delete(key);
    this.entries.set(key, {
      key,
      value,
      createdAt: now,
      expiresAt: now + ttl * 1000,
      hitCount: 0,
      lastAccessed: now,
      caseStatus,
    });

    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Remove every entry, returning how many were removed
   */
  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  getStats(): LRUCacheStats {
    const now = Date.now();
    let totalHits = 0;
    let expired = 0;

    for (const entry of this.entries.values()) {
      totalHits += entry.hitCount;
      if (now > entry.expiresAt) expired++;
    }

    return {
      size: this.entries.size,
      max_size: this.maxSize,
      utilization: this.maxSize > 0 ? this.entries.size / this.maxSize : 0,
      total_hits: totalHits,
      expired_entries: expired,
      default_ttl_seconds: this.defaultTtlSeconds,
    };
  }
}
