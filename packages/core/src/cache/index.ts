export {
  LRUCache,
  type CacheEntry,
  type CaseStatus,
  type LRUCacheOptions,
  type LRUCacheStats,
} from './lru-cache.js';
export {
  ContextCacheManager,
  buildContextCacheKey,
  MEMORY_TTL_SECONDS,
  ACTIVE_CASE_TTL_SECONDS,
  CLOSED_CASE_TTL_SECONDS,
  CACHE_SCOPES,
  type CacheTier,
  type RedisCacheClient,
  type PersistentCacheStore,
  type PersistedCacheEntry,
  type ContextCacheManagerOptions,
  type ContextCacheStats,
  type ContextCacheConfig,
} from './context-cache-manager.js';
