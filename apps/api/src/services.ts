/**
 * Service container
 *
 * Wires the GraphRAG client, the case repository, the three-tier context
 * cache and the context builder. Routes receive the container; tests build
 * one from fakes with assembleServices().
 */

import { Redis } from 'ioredis';
import {
  ContextCacheManager,
  createLogger,
  type PersistentCacheStore,
  type RedisCacheClient,
} from '@casecontext/core';
import {
  InMemoryCaseRepository,
  createContextBuilder,
  type CaseRepository,
  type ContextBuilder,
  type GraphInsights,
} from '@casecontext/domain';
import { createIntegrationClients, type GraphRAGHealth } from '@casecontext/integrations';
import { ContextResponseSchema, type ContextResponse } from '@casecontext/types';
import type { AppConfig } from './config.js';
import type { ApiMetrics } from './metrics.js';

const logger = createLogger({ name: 'services' });

/**
 * Knowledge graph as the API sees it: analyzer queries plus readiness
 */
export interface GraphService extends GraphInsights {
  healthCheck(): Promise<GraphRAGHealth>;
}

/**
 * Redis connection used by the cache tier and dependency health
 */
export interface RedisClient extends RedisCacheClient {
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export interface ContextServices {
  builder: ContextBuilder;
  cache: ContextCacheManager<ContextResponse>;
  repository: CaseRepository;
  graph: GraphService;
  /** Round trip to the case database; null when none is configured */
  databasePing: (() => Promise<void>) | null;
  redis: RedisClient | null;
  close(): Promise<void>;
}

export interface AssembleServicesOptions {
  repository: CaseRepository;
  graph: GraphService;
  metrics: ApiMetrics;
  redis?: RedisClient | null;
  store?: PersistentCacheStore | null;
  databasePing?: (() => Promise<void>) | null;
  memoryMaxSize?: number;
  memoryTtlSeconds?: number;
  now?: () => Date;
}

export function assembleServices(options: AssembleServicesOptions): ContextServices {
  const { metrics } = options;
  const redis = options.redis ?? null;

  const cache = new ContextCacheManager<ContextResponse>({
    parse: (payload) => ContextResponseSchema.parse(payload),
    redis,
    store: options.store ?? null,
    ...(options.memoryMaxSize !== undefined && { memoryMaxSize: options.memoryMaxSize }),
    ...(options.memoryTtlSeconds !== undefined && { memoryTtlSeconds: options.memoryTtlSeconds }),
    onHit: (tier) => metrics.cacheHits.inc({ tier }),
  });

  const builder = createContextBuilder({
    repository: options.repository,
    graph: options.graph,
    cache,
    ...(options.now && { now: options.now }),
    onContextBuilt: (context, scope) => {
      metrics.contextBuilds.inc({ scope, complete: String(context.is_complete) });
      metrics.contextScore.observe(context.context_score);
    },
  });

  return {
    builder,
    cache,
    repository: options.repository,
    graph: options.graph,
    databasePing: options.databasePing ?? null,
    redis,
    async close() {
      if (redis) {
        await redis.quit();
        logger.info('Redis connection closed');
      }
    },
  };
}

function createRedis(url: string): Redis {
  const redis = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 1 });
  redis.on('error', (err: Error) => {
    logger.warn({ err }, 'Redis connection error');
  });
  return redis;
}

/**
 * Production wiring from the application config
 */
export function createServices(config: AppConfig, metrics: ApiMetrics): ContextServices {
  const clients = createIntegrationClients({
    graphrag: {
      baseUrl: config.graphrag.baseUrl,
      timeoutMs: config.graphrag.timeoutMs,
      maxRetries: config.graphrag.maxRetries,
    },
    supabase: config.supabase,
  });

  const database = clients.database;
  if (!database) {
    logger.warn('No database configured - using an empty in-memory case repository');
  }

  return assembleServices({
    repository: database?.repository ?? new InMemoryCaseRepository(),
    graph: clients.graphrag,
    metrics,
    redis: config.redisUrl ? createRedis(config.redisUrl) : null,
    store: database?.cacheStore ?? null,
    databasePing: database ? () => database.repository.ping() : null,
    memoryMaxSize: config.cache.memoryMaxSize,
    memoryTtlSeconds: config.cache.memoryTtlSeconds,
  });
}
