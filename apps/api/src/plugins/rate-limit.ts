import rateLimit from '@fastify/rate-limit';
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { createLogger } from '@casecontext/core';

const logger = createLogger({ name: 'rate-limit' });

/**
 * IP-based rate limiting for the whole API
 *
 * The health probe and the metrics scrape are exempt so monitoring keeps
 * working while a client is throttled.
 */

export interface RateLimitConfig {
  /** Requests per minute per IP */
  max: number;
  /** IPs that bypass rate limiting */
  allowlist: string[];
}

const defaultConfig: RateLimitConfig = {
  max: 300,
  allowlist: [],
};

const EXEMPT_ROUTES = new Set(['/api/v1/health', '/metrics']);

function generateKey(request: FastifyRequest): string {
  return `ratelimit:${request.ip}`;
}

const rateLimitPluginAsync: FastifyPluginAsync<Partial<RateLimitConfig>> = async (
  fastify,
  options
) => {
  const config: RateLimitConfig = { ...defaultConfig, ...options };

  logger.info(
    { max: config.max, allowlistCount: config.allowlist.length },
    'Initializing rate limiting'
  );

  await fastify.register(rateLimit, {
    global: true,
    max: config.max,
    timeWindow: '1 minute',
    keyGenerator: generateKey,
    allowList: (request) =>
      config.allowlist.includes(request.ip) ||
      EXEMPT_ROUTES.has(request.routeOptions.url ?? ''),
    onExceeded: (_request, key) => {
      logger.debug({ key }, 'Rate limit key exhausted');
    },
    errorResponseBuilder: (_request, context) => ({
      code: 'RATE_LIMIT_EXCEEDED',
      message: 'Too many requests. Please slow down.',
      statusCode: 429,
      retryAfter: context.after,
    }),
  });
};

export const rateLimitPlugin = fp(rateLimitPluginAsync, {
  name: 'rate-limit',
  fastify: '5.x',
});
