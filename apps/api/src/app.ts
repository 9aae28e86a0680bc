import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ValidationError, createLogger, isOperationalError, toSafeErrorResponse } from '@casecontext/core';
import { ZodError } from 'zod';
import type { AppConfig } from './config.js';
import { createApiMetrics, type ApiMetrics } from './metrics.js';
import correlationPlugin from './plugins/correlation.js';
import { rateLimitPlugin } from './plugins/rate-limit.js';
import requestMetricsPlugin from './plugins/request-metrics.js';
import {
  SERVICE_VERSION,
  createCacheRoutes,
  createContextRoutes,
  createHealthRoutes,
  createMetricsRoutes,
} from './routes/index.js';
import { createServices, type ContextServices } from './services.js';

/**
 * Context Engine API
 *
 * Serves case contexts (WHO/WHAT/WHERE/WHEN/WHY), cache management,
 * health and Prometheus metrics.
 */

const logger = createLogger({ name: 'api' });

export interface BuildAppOptions {
  config: AppConfig;
  /** Defaults to production wiring from config */
  services?: ContextServices;
  metrics?: ApiMetrics;
  /** Fastify request logging; off in tests */
  logger?: boolean;
}

interface ErrorBody {
  code: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

function toErrorBody(error: FastifyError | Error): ErrorBody {
  if (error instanceof ZodError) {
    return {
      code: 'VALIDATION_ERROR',
      message: 'Invalid request',
      statusCode: 400,
      details: error.flatten(),
    };
  }

  if (error instanceof ValidationError) {
    const safe = error.toSafeError();
    return error.details !== undefined ? { ...safe, details: error.details } : safe;
  }

  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // Fastify's own client errors (malformed JSON, rate limit, body too large)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return {
      code: 'code' in error && typeof error.code === 'string' ? error.code : 'BAD_REQUEST',
      message: error.message,
      statusCode: error.statusCode,
    };
  }

  return toSafeErrorResponse(error);
}

async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;
  const metrics = options.metrics ?? createApiMetrics();
  const services = options.services ?? createServices(config, metrics);

  const fastify = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            level: config.logger.level,
            serializers: {
              req(request) {
                return {
                  method: request.method,
                  url: request.url,
                  hostname: request.hostname,
                  remoteAddress: request.ip,
                };
              },
              res(reply) {
                return {
                  statusCode: reply.statusCode,
                };
              },
            },
          },
  });

  fastify.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const body = toErrorBody(error);

    if (body.statusCode >= 500) {
      request.log.error({ correlationId: request.correlationId, err: error }, 'Unhandled error');
    } else {
      request.log.warn({ correlationId: request.correlationId, code: body.code }, body.message);
    }

    return reply.status(body.statusCode).send(body);
  });

  fastify.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({
      code: 'NOT_FOUND',
      message: 'Route not found',
      statusCode: 404,
    });
  });

  await fastify.register(correlationPlugin);
  await fastify.register(requestMetricsPlugin, { metrics });

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
    frameguard: { action: 'deny' },
    noSniff: true,
    hidePoweredBy: true,
  });

  await fastify.register(swagger, {
    openapi: {
      openapi: '3.1.0',
      info: {
        title: 'Context Engine API',
        version: SERVICE_VERSION,
        description: `
Case-centric context for legal matters.

- **Context**: WHO/WHAT/WHERE/WHEN/WHY context per case, scored for completeness
- **Cache**: three-tier cache statistics, invalidation and warmup
- **Health & Metrics**: liveness, dependency checks and Prometheus metrics
        `.trim(),
      },
      servers: [
        {
          url: `http://localhost:${config.server.port}`,
          description: config.isProd ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'Health', description: 'Liveness and dependency checks' },
        { name: 'Context', description: 'Case context retrieval' },
        { name: 'Cache', description: 'Context cache management' },
        { name: 'Metrics', description: 'Prometheus metrics for monitoring' },
      ],
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
      displayRequestDuration: true,
    },
  });

  if (config.cors.origins) {
    await fastify.register(cors, {
      origin: config.cors.origins,
      methods: ['GET', 'POST', 'DELETE'],
    });
  }

  await fastify.register(rateLimitPlugin, {
    max: config.rateLimit.max,
    allowlist: config.rateLimit.allowlist,
  });

  await fastify.register(createHealthRoutes({ services, metrics, port: config.server.port }));
  await fastify.register(createMetricsRoutes(metrics.registry));
  await fastify.register(createContextRoutes({ services }), { prefix: '/api/v1/context' });
  await fastify.register(createCacheRoutes({ services }), { prefix: '/api/v1/cache' });

  fastify.addHook('onClose', async () => {
    await services.close();
  });

  logger.info(
    { redisEnabled: services.redis !== null, databaseEnabled: services.databasePing !== null },
    'Context engine app built'
  );

  return fastify;
}

export { buildApp };
