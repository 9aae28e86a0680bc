import { type FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import type { ApiMetrics } from '../metrics.js';

/**
 * Counts every response and records its latency, labelled by route pattern
 */
const requestMetricsPlugin: FastifyPluginAsync<{ metrics: ApiMetrics }> = async (
  fastify,
  { metrics }
) => {
  fastify.addHook('onResponse', async (request, reply) => {
    const endpoint = request.routeOptions.url ?? 'unmatched';

    metrics.requestsTotal.inc({ endpoint, method: request.method });
    metrics.requestLatency.observe({ endpoint }, reply.elapsedTime / 1000);
  });
};

export default fp(requestMetricsPlugin, {
  name: 'request-metrics',
  fastify: '5.x',
});
