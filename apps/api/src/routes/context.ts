/**
 * Context retrieval routes (prefix /api/v1/context)
 *
 * POST /retrieve            build or fetch a cached context
 * GET  /retrieve            same, from the querystring
 * POST /dimension/retrieve  one dimension, uncached
 * GET  /dimension/quality   completeness metrics for one dimension
 * POST /refresh             rebuild, bypassing the cache
 * POST /batch/retrieve      several cases, built concurrently
 */

import type { FastifyPluginAsync } from 'fastify';
import { AppError, errorMessage, isOperationalError } from '@casecontext/core';
import type { BuildContextRequest } from '@casecontext/domain';
import {
  BatchContextRequestSchema,
  ContextRefreshQuerySchema,
  ContextRetrieveQuerySchema,
  ContextRetrieveRequestSchema,
  DimensionRequestSchema,
  type ContextResponse,
} from '@casecontext/types';
import type { ContextServices } from '../services.js';
import { parseRequest } from '../validation.js';

export interface ContextRoutesDeps {
  services: ContextServices;
}

/**
 * Operational errors keep their status; anything else becomes a 500 naming the operation
 */
function asRouteError(error: unknown, operation: string): AppError {
  if (isOperationalError(error)) return error;
  return new AppError(`${operation} failed: ${errorMessage(error)}`, 'INTERNAL_ERROR', 500);
}

export function createContextRoutes(deps: ContextRoutesDeps): FastifyPluginAsync {
  const { builder } = deps.services;

  async function retrieve(request: BuildContextRequest): Promise<ContextResponse> {
    try {
      return await builder.buildContext(request);
    } catch (error) {
      throw asRouteError(error, 'Context retrieval');
    }
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  return async (fastify) => {
    fastify.post(
      '/retrieve',
      {
        schema: {
          description: 'Retrieve the context of a case for a scope or an explicit dimension list',
          tags: ['Context'],
        },
      },
      async (request) => {
        const body = parseRequest(ContextRetrieveRequestSchema, request.body, 'context request');

        request.log.info(
          { clientId: body.client_id, caseId: body.case_id, scope: body.scope },
          'Context retrieval requested'
        );

        return retrieve({
          clientId: body.client_id,
          caseId: body.case_id,
          scope: body.scope,
          useCache: body.use_cache,
          ...(body.include_dimensions && { includeDimensions: body.include_dimensions }),
        });
      }
    );

    fastify.get(
      '/retrieve',
      { schema: { description: 'Retrieve the context of a case', tags: ['Context'] } },
      async (request) => {
        const query = parseRequest(ContextRetrieveQuerySchema, request.query, 'context query');

        return retrieve({
          clientId: query.client_id,
          caseId: query.case_id,
          scope: query.scope,
          useCache: query.use_cache,
        });
      }
    );

    fastify.post(
      '/dimension/retrieve',
      { schema: { description: 'Analyze one dimension of a case', tags: ['Context'] } },
      async (request) => {
        const body = parseRequest(DimensionRequestSchema, request.body, 'dimension request');

        try {
          const result = await builder.refreshDimension(body.client_id, body.case_id, body.dimension);
          return { case_id: body.case_id, dimension: result.dimension, data: result.context };
        } catch (error) {
          throw asRouteError(error, 'Dimension retrieval');
        }
      }
    );

    fastify.get(
      '/dimension/quality',
      { schema: { description: 'Completeness metrics for one dimension', tags: ['Context'] } },
      async (request) => {
        const query = parseRequest(DimensionRequestSchema, request.query, 'dimension query');

        try {
          return await builder.getDimensionQuality(query.client_id, query.case_id, query.dimension);
        } catch (error) {
          throw asRouteError(error, 'Quality assessment');
        }
      }
    );

    fastify.post(
      '/refresh',
      { schema: { description: 'Rebuild a context, bypassing the cache', tags: ['Context'] } },
      async (request) => {
        const query = parseRequest(ContextRefreshQuerySchema, request.query, 'refresh query');

        const context = await retrieve({
          clientId: query.client_id,
          caseId: query.case_id,
          scope: query.scope,
          useCache: false,
        });

        return {
          message: 'Context refreshed successfully',
          case_id: query.case_id,
          scope: query.scope,
          new_context_score: context.context_score,
          execution_time_ms: context.execution_time_ms,
        };
      }
    );

    fastify.post(
      '/batch/retrieve',
      { schema: { description: 'Retrieve contexts for several cases', tags: ['Context'] } },
      async (request) => {
        const body = parseRequest(BatchContextRequestSchema, request.body, 'batch request');

        request.log.info(
          { clientId: body.client_id, cases: body.case_ids.length, scope: body.scope },
          'Batch context retrieval requested'
        );

        const settled = await Promise.allSettled(
          body.case_ids.map((caseId) =>
            builder.buildContext({
              clientId: body.client_id,
              caseId,
              scope: body.scope,
              useCache: body.use_cache,
            })
          )
        );

        const contexts: Record<string, ContextResponse> = {};
        const errors: Record<string, string> = {};
        let successful = 0;
        let failed = 0;
        settled.forEach((outcome, index) => {
          const caseId = body.case_ids[index] ?? '';
          if (outcome.status === 'fulfilled') {
            contexts[caseId] = outcome.value;
            successful++;
          } else {
            request.log.error({ err: outcome.reason, caseId }, 'Batch context build failed');
            errors[caseId] = errorMessage(outcome.reason);
            failed++;
          }
        });

        return {
          total_cases: body.case_ids.length,
          successful,
          failed,
          contexts,
          errors,
        };
      }
    );
  };
}
