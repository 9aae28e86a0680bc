/**
 * Three-tier context cache
 *
 * Lookup order is memory → Redis → database. A hit in a slower tier is
 * copied back into the faster ones. Writes go to every enabled tier; a tier
 * that fails is logged and skipped so the cache never breaks a request.
 *
 * Cache key format: context:{client_id}:{case_id}:{scope}:{md5[0..8]}
 * TTL: memory 10 min; Redis/DB 1 h for active cases, 24 h for closed ones
 *
 * @module @casecontext/core/cache/context-cache-manager
 */

import { createHash } from 'node:crypto';
import { createLogger } from '../logger.js';
import { LRUCache, type CaseStatus, type LRUCacheStats } from './lru-cache.js';

const logger = createLogger({ name: 'context-cache' });

export const MEMORY_TTL_SECONDS = 600;
export const ACTIVE_CASE_TTL_SECONDS = 3600;
export const CLOSED_CASE_TTL_SECONDS = 86400;

export const CACHE_SCOPES = ['minimal', 'standard', 'comprehensive'] as const;

export type CacheTier = 'memory' | 'redis' | 'database';

/**
 * Redis client interface (compatible with ioredis)
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
}

export interface PersistedCacheEntry {
  cacheKey: string;
  clientId: string;
  caseId: string;
  scope: string;
  payload: unknown;
  caseStatus: CaseStatus;
  expiresAt: Date;
}

/**
 * Durable tier, e.g. a database table keyed by cache key
 */
export interface PersistentCacheStore {
  /** Returns the stored payload, or null when absent or expired */
  get(cacheKey: string): Promise<{ payload: unknown } | null>;
  set(entry: PersistedCacheEntry): Promise<void>;
  delete(cacheKey: string): Promise<number>;
}

export interface ContextCacheManagerOptions<T> {
  /** Turns a payload read from Redis or the database back into a value */
  parse: (payload: unknown) => T;
  redis?: RedisCacheClient | null;
  store?: PersistentCacheStore | null;
  memoryMaxSize?: number;
  memoryTtlSeconds?: number;
  activeCaseTtlSeconds?: number;
  closedCaseTtlSeconds?: number;
  onHit?: (tier: CacheTier) => void;
}

interface CacheCounters {
  memory_hits: number;
  memory_misses: number;
  redis_hits: number;
  redis_misses: number;
  db_hits: number;
  db_misses: number;
  total_sets: number;
  total_deletes: number;
}

export interface ContextCacheStats extends CacheCounters {
  memory_cache: LRUCacheStats;
  memory_hit_rate: number;
  redis_hit_rate: number;
  db_hit_rate: number;
  overall_hit_rate: number;
  redis_enabled: boolean;
  db_enabled: boolean;
}

export interface ContextCacheConfig {
  tiers: {
    memory: { enabled: true; ttl_seconds: number; max_size: number };
    redis: {
      enabled: boolean;
      active_case_ttl_seconds: number;
      closed_case_ttl_seconds: number;
    };
    database: { enabled: boolean };
  };
  ttl_strategy: {
    memory: string;
    active_cases: string;
    closed_cases: string;
  };
}

function emptyCounters(): CacheCounters {
  return {
    memory_hits: 0,
    memory_misses: 0,
    redis_hits: 0,
    redis_misses: 0,
    db_hits: 0,
    db_misses: 0,
    total_sets: 0,
    total_deletes: 0,
  };
}

function hitRate(hits: number, misses: number): number {
  const total = hits + misses;
  return total > 0 ? hits / total : 0;
}

function describeSeconds(seconds: number): string {
  if (seconds % 3600 === 0) {
    const hours = seconds / 3600;
    return `${hours} ${hours === 1 ? 'hour' : 'hours'}`;
  }
  if (seconds % 60 === 0) {
    const minutes = seconds / 60;
    return `${minutes} ${minutes === 1 ? 'minute' : 'minutes'}`;
  }
  return `${seconds} seconds`;
}

/**
 * Build the cache key for a case context
 */
export function buildContextCacheKey(
  clientId: string,
  caseId: string,
  scope: string,
  dimension?: string
): string {
  const raw = [clientId, caseId, scope, dimension].filter((part) => part !== undefined).join(':');
  const digest = createHash('md5').update(raw).digest('hex').substring(0, 8);
  return `context:${clientId}:${caseId}:${scope}:${digest}`;
}

export class ContextCacheManager<T> {
  private readonly memory: LRUCache<T>;
  private readonly redis: RedisCacheClient | null;
  private readonly store: PersistentCacheStore | null;
  private readonly parse: (payload: unknown) => T;
  private readonly onHit: ((tier: CacheTier) => void) | undefined;
  private readonly activeTtl: number;
  private readonly closedTtl: number;
  private counters: CacheCounters = emptyCounters();

  constructor(options: ContextCacheManagerOptions<T>) {
    this.memory = new LRUCache<T>({
      maxSize: options.memoryMaxSize ?? 1000,
      defaultTtlSeconds: options.memoryTtlSeconds ?? MEMORY_TTL_SECONDS,
    });
    this.redis = options.redis ?? null;
    this.store = options.store ?? null;
    this.parse = options.parse;
    this.onHit = options.onHit;
    this.activeTtl = options.activeCaseTtlSeconds ?? ACTIVE_CASE_TTL_SECONDS;
    this.closedTtl = options.closedCaseTtlSeconds ?? CLOSED_CASE_TTL_SECONDS;

    logger.info(
      {
        memoryMaxSize: this.memory.maxSize,
        redisEnabled: this.redisEnabled,
        dbEnabled: this.dbEnabled,
      },
      'Context cache initialized'
    );
  }

  get redisEnabled(): boolean {
    return this.redis !== null;
  }

  get dbEnabled(): boolean {
    return this.store !== null;
  }

  private ttlFor(caseStatus: CaseStatus): number {
    return caseStatus === 'closed' ? this.closedTtl : this.activeTtl;
  }

  private recordHit(tier: CacheTier): void {
    this.onHit?.(tier);
  }

  async get(clientId: string, caseId: string, scope: string): Promise<T | null> {
    const key = buildContextCacheKey(clientId, caseId, scope);

    const fromMemory = this.memory.get(key);
    if (fromMemory !== null) {
      this.counters.memory_hits++;
      this.recordHit('memory');
      logger.debug({ key }, 'Memory cache hit');
      return fromMemory;
    }
    this.counters.memory_misses++;

    if (this.redis) {
      try {
        const raw = await this.redis.get(key);
        if (raw !== null) {
          const value = this.parse(JSON.parse(raw));
          this.counters.redis_hits++;
          this.recordHit('redis');
          this.memory.set(key, value);
          logger.debug({ key }, 'Redis cache hit');
          return value;
        }
        this.counters.redis_misses++;
      } catch (error) {
        this.counters.redis_misses++;
        logger.warn({ err: error, key }, 'Redis cache read failed');
      }
    }

    if (this.store) {
      try {
        const row = await this.store.get(key);
        if (row !== null) {
          const value = this.parse(row.payload);
          this.counters.db_hits++;
          this.recordHit('database');
          await this.writeRedis(key, value, this.activeTtl);
          this.memory.set(key, value);
          logger.debug({ key }, 'Database cache hit');
          return value;
        }
        this.counters.db_misses++;
      } catch (error) {
        this.counters.db_misses++;
        logger.warn({ err: error, key }, 'Database cache read failed');
      }
    }

    return null;
  }

  async set(
    clientId: string,
    caseId: string,
    value: T,
    scope: string,
    caseStatus: CaseStatus = 'active'
  ): Promise<void> {
    const key = buildContextCacheKey(clientId, caseId, scope);
    const ttl = this.ttlFor(caseStatus);

    this.memory.set(key, value, undefined, caseStatus);
    await this.writeRedis(key, value, ttl);

    if (this.store) {
      try {
        await this.store.set({
          cacheKey: key,
          clientId,
          caseId,
          scope,
          payload: value,
          caseStatus,
          expiresAt: new Date(Date.now() + ttl * 1000),
        });
      } catch (error) {
        logger.warn({ err: error, key }, 'Database cache write failed');
      }
    }

    this.counters.total_sets++;
  }

  private async writeRedis(key: string, value: T, ttlSeconds: number): Promise<void> {
    if (!this.redis) return;
    try {
      await this.redis.setex(key, ttlSeconds, JSON.stringify(value));
    } catch (error) {
      logger.warn({ err: error, key }, 'Redis cache write failed');
    }
  }

  /**
   * Delete one scope, or every scope when none is given.
   * Returns the number of entries removed across all tiers.
   */
  async delete(clientId: string, caseId: string, scope?: string): Promise<number> {
    const scopes = scope !== undefined ? [scope] : [...CACHE_SCOPES];
    let deleted = 0;

    for (const s of scopes) {
      const key = buildContextCacheKey(clientId, caseId, s);

      if (this.memory.delete(key)) deleted++;

      if (this.redis) {
        try {
          deleted += await this.redis.del(key);
        } catch (error) {
          logger.warn({ err: error, key }, 'Redis cache delete failed');
        }
      }

      if (this.store) {
        try {
          deleted += await this.store.delete(key);
        } catch (error) {
          logger.warn({ err: error, key }, 'Database cache delete failed');
        }
      }
    }

    this.counters.total_deletes += deleted;
    logger.info({ clientId, caseId, scope: scope ?? 'all', deleted }, 'Context cache invalidated');
    return deleted;
  }

  invalidateCase(clientId: string, caseId: string): Promise<number> {
    return this.delete(clientId, caseId);
  }

  getStats(): ContextCacheStats {
    const c = this.counters;
    const totalHits = c.memory_hits + c.redis_hits + c.db_hits;
    const totalOps = totalHits + c.memory_misses + c.redis_misses + c.db_misses;

    return {
      ...c,
      memory_cache: this.memory.getStats(),
      memory_hit_rate: hitRate(c.memory_hits, c.memory_misses),
      redis_hit_rate: hitRate(c.redis_hits, c.redis_misses),
      db_hit_rate: hitRate(c.db_hits, c.db_misses),
      overall_hit_rate: totalOps > 0 ? totalHits / totalOps : 0,
      redis_enabled: this.redisEnabled,
      db_enabled: this.dbEnabled,
    };
  }

  resetStats(): void {
    this.counters = emptyCounters();
    logger.info('Context cache statistics reset');
  }

  getConfig(): ContextCacheConfig {
    return {
      tiers: {
        memory: {
          enabled: true,
          ttl_seconds: this.memory.defaultTtlSeconds,
          max_size: this.memory.maxSize,
        },
        redis: {
          enabled: this.redisEnabled,
          active_case_ttl_seconds: this.activeTtl,
          closed_case_ttl_seconds: this.closedTtl,
        },
        database: { enabled: this.dbEnabled },
      },
      ttl_strategy: {
        memory: describeSeconds(this.memory.defaultTtlSeconds),
        active_cases: `${describeSeconds(this.activeTtl)} (Redis/DB)`,
        closed_cases: `${describeSeconds(this.closedTtl)} (Redis/DB)`,
      },
    };
  }
}
