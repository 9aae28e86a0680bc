import type { FastifyPluginAsync } from 'fastify';
import { errorMessage } from '@casecontext/core';
import {
  CacheInvalidateQuerySchema,
  CacheWarmupRequestSchema,
  CaseCacheInvalidateQuerySchema,
} from '@casecontext/types';
import type { ContextServices } from '../services.js';
import { parseRequest } from '../validation.js';

/**
 * Hit rate above which a cache tier counts as healthy
 */
const HEALTHY_HIT_RATE = 0.5;

export interface CacheRoutesDeps {
  services: ContextServices;
}

/**
 * Cache management routes (prefix /api/v1/cache)
 */
export function createCacheRoutes(deps: CacheRoutesDeps): FastifyPluginAsync {
  const { cache, builder, repository } = deps.services;

  // eslint-disable-next-line @typescript-eslint/require-await
  return async (fastify) => {
    fastify.get(
      '/stats',
      { schema: { description: 'Hit and miss counters per tier', tags: ['Cache'] } },
      async () => cache.getStats()
    );

    fastify.post(
      '/stats/reset',
      { schema: { description: 'Reset cache statistics', tags: ['Cache'] } },
      async () => {
        const previousStats = cache.getStats();
        cache.resetStats();
        return {
          message: 'Cache statistics reset successfully',
          previous_stats: previousStats,
          new_stats: cache.getStats(),
        };
      }
    );

    fastify.delete(
      '/invalidate',
      { schema: { description: 'Invalidate one scope, or every scope, of a case', tags: ['Cache'] } },
      async (request) => {
        const query = parseRequest(CacheInvalidateQuerySchema, request.query, 'invalidate query');

        const deleted = await cache.delete(query.client_id, query.case_id, query.scope);

        return {
          message: 'Cache invalidated successfully',
          client_id: query.client_id,
          case_id: query.case_id,
          scope: query.scope ?? 'all',
          entries_deleted: deleted,
        };
      }
    );

    fastify.post(
      '/invalidate/case',
      { schema: { description: 'Invalidate every cached scope of a case', tags: ['Cache'] } },
      async (request) => {
        const query = parseRequest(CaseCacheInvalidateQuerySchema, request.query, 'invalidate query');

        const deleted = await cache.invalidateCase(query.client_id, query.case_id);

        return {
          message: 'All cache for case invalidated successfully',
          case_id: query.case_id,
          entries_deleted: deleted,
        };
      }
    );

    fastify.post(
      '/warmup',
      { schema: { description: 'Build and cache contexts ahead of traffic', tags: ['Cache'] } },
      async (request) => {
        const body = parseRequest(CacheWarmupRequestSchema, request.body, 'warmup request');
        const errors: Record<string, string> = {};
        let successful = 0;
        let failed = 0;

        for (const caseId of body.case_ids) {
          try {
            const context = await builder.buildContext({
              clientId: body.client_id,
              caseId,
              scope: body.scope,
              useCache: false,
            });

            if (context.is_complete) {
              const record = await repository.getCase(body.client_id, caseId);
              await cache.set(
                body.client_id,
                caseId,
                context,
                body.scope,
                record?.status === 'closed' ? 'closed' : 'active'
              );
            }
            successful++;
          } catch (error) {
            request.log.error({ err: error, caseId }, 'Cache warmup failed for case');
            errors[caseId] = errorMessage(error);
            failed++;
          }
        }

        request.log.info(
          { successful, total: body.case_ids.length },
          'Cache warmup complete'
        );

        return {
          message: 'Cache warmup completed',
          total_cases: body.case_ids.length,
          successful,
          failed,
          errors,
        };
      }
    );

    fastify.get(
      '/config',
      { schema: { description: 'Cache tiers and TTL strategy', tags: ['Cache'] } },
      async () => cache.getConfig()
    );

    fastify.get(
      '/health',
      { schema: { description: 'Cache health from hit rates', tags: ['Cache'] } },
      async () => {
        const stats = cache.getStats();
        const memoryHealthy = stats.memory_hit_rate > HEALTHY_HIT_RATE;
        const healthy = memoryHealthy || stats.overall_hit_rate > HEALTHY_HIT_RATE;

        return {
          status: healthy ? 'healthy' : 'degraded',
          tiers: {
            memory: {
              status: memoryHealthy ? 'healthy' : 'degraded',
              utilization: stats.memory_cache.utilization,
              hit_rate: stats.memory_hit_rate,
            },
            redis: { status: stats.redis_enabled ? 'enabled' : 'disabled' },
            database: { status: stats.db_enabled ? 'enabled' : 'disabled' },
          },
          overall_hit_rate: stats.overall_hit_rate,
        };
      }
    );
  };
}
