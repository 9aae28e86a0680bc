/**
 * @fileoverview Prometheus Metrics Endpoint
 *
 * Exposes the app's prom-client registry: default process metrics plus the
 * request, cache, dependency and context-build series.
 *
 * @module routes/metrics
 */

import type { FastifyPluginAsync } from 'fastify';
import type { Registry } from 'prom-client';

export function createMetricsRoutes(registry: Registry): FastifyPluginAsync {
  // eslint-disable-next-line @typescript-eslint/require-await
  return async (fastify) => {
    /**
     * GET /metrics
     * Returns Prometheus-formatted metrics
     *
     * @example
     * curl http://localhost:8015/metrics
     */
    fastify.get(
      '/metrics',
      {
        schema: {
          description: 'Prometheus metrics',
          tags: ['Metrics'],
        },
      },
      async (_request, reply) => {
        void reply.type(registry.contentType);
        return registry.metrics();
      }
    );
  };
}
