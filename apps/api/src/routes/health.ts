import type { FastifyPluginAsync } from 'fastify';
import { errorMessage } from '@casecontext/core';
import type { ApiMetrics } from '../metrics.js';
import type { ContextServices } from '../services.js';

export const SERVICE_NAME = 'context-engine';
export const SERVICE_VERSION = '1.0.0';

export interface DependencyHealth {
  name: string;
  status: 'healthy' | 'unhealthy' | 'not_configured';
  latencyMs?: number;
  message?: string;
  critical: boolean;
}

interface DependenciesResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  dependencies: DependencyHealth[];
}

export interface HealthRoutesDeps {
  services: ContextServices;
  metrics: ApiMetrics;
  port: number;
}

/**
 * Time a probe; any rejection marks the dependency unhealthy
 */
async function probe(
  name: string,
  critical: boolean,
  check: () => Promise<string | undefined>
): Promise<DependencyHealth> {
  const startTime = Date.now();
  try {
    const message = await check();
    return {
      name,
      status: 'healthy',
      latencyMs: Date.now() - startTime,
      ...(message !== undefined && { message }),
      critical,
    };
  } catch (error) {
    return {
      name,
      status: 'unhealthy',
      latencyMs: Date.now() - startTime,
      message: errorMessage(error),
      critical,
    };
  }
}

async function checkGraphRAG(services: ContextServices): Promise<DependencyHealth> {
  return probe('graphrag', true, async () => {
    const health = await services.graph.healthCheck();
    if (!health.ready) {
      throw new Error(health.error ?? `GraphRAG not ready (status: ${health.status})`);
    }
    return `status: ${health.status}`;
  });
}

async function checkDatabase(services: ContextServices): Promise<DependencyHealth> {
  const ping = services.databasePing;
  if (!ping) {
    return {
      name: 'supabase',
      status: 'not_configured',
      message: 'using in-memory repository',
      critical: false,
    };
  }
  return probe('supabase', true, async () => {
    await ping();
    return undefined;
  });
}

async function checkRedis(services: ContextServices): Promise<DependencyHealth> {
  const redis = services.redis;
  if (!redis) {
    return { name: 'redis', status: 'not_configured', message: 'cache tier disabled', critical: false };
  }
  return probe('redis', false, async () => {
    const reply = await redis.ping();
    if (reply !== 'PONG') {
      throw new Error(`Unexpected PING reply: ${reply}`);
    }
    return undefined;
  });
}

/**
 * Service-level routes
 *
 * GET /                             service descriptor
 * GET /api/v1/health                liveness
 * GET /api/v1/health/dependencies   GraphRAG, Supabase and Redis checks
 */
export function createHealthRoutes(deps: HealthRoutesDeps): FastifyPluginAsync {
  const { services, metrics, port } = deps;

  // eslint-disable-next-line @typescript-eslint/require-await
  return async (fastify) => {
    fastify.get(
      '/',
      { schema: { description: 'Service descriptor', tags: ['Health'] } },
      async () => ({
        service: 'context-engine-service',
        version: SERVICE_VERSION,
        port,
        status: 'running',
        description: 'Case-centric WHO/WHAT/WHERE/WHEN/WHY context for legal matters',
        endpoints: {
          docs: '/docs',
          health: '/api/v1/health',
          metrics: '/metrics',
        },
      })
    );

    fastify.get(
      '/api/v1/health',
      { schema: { description: 'Liveness check', tags: ['Health'] } },
      async () => ({
        status: 'healthy',
        service: SERVICE_NAME,
        port,
        version: SERVICE_VERSION,
      })
    );

    fastify.get(
      '/api/v1/health/dependencies',
      { schema: { description: 'Dependency health', tags: ['Health'] } },
      async (request, reply) => {
        const dependencies = await Promise.all([
          checkGraphRAG(services),
          checkDatabase(services),
          checkRedis(services),
        ]);

        for (const dependency of dependencies) {
          metrics.dependencyHealth.set(
            { dependency: dependency.name },
            dependency.status === 'healthy' ? 1 : 0
          );
        }

        const criticalDown = dependencies.some((d) => d.critical && d.status === 'unhealthy');
        const optionalDown = dependencies.some((d) => !d.critical && d.status === 'unhealthy');

        const response: DependenciesResponse = {
          status: criticalDown ? 'unhealthy' : optionalDown ? 'degraded' : 'healthy',
          timestamp: new Date().toISOString(),
          dependencies,
        };

        if (criticalDown) {
          request.log.warn({ dependencies }, 'Critical dependency unhealthy');
        }

        return reply.status(criticalDown ? 503 : 200).send(response);
      }
    );
  };
}
