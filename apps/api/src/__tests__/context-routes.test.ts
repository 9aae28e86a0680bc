import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ContextBuilder, type BuildContextRequest } from '@casecontext/domain';
import type { ContextResponse } from '@casecontext/types';
import {
  CLIENT_ID,
  EMPTY_CASE_ID,
  FULL_CASE_ID,
  buildTestApp,
  createSeededRepository,
  type TestContext,
} from './helpers.js';

/**
 * Context Routes Tests
 *
 * - POST/GET /api/v1/context/retrieve
 * - POST /api/v1/context/dimension/retrieve
 * - GET /api/v1/context/dimension/quality
 * - POST /api/v1/context/refresh
 * - POST /api/v1/context/batch/retrieve
 */

class ExplodingBuilder extends ContextBuilder {
  override buildContext(_request: BuildContextRequest): Promise<ContextResponse> {
    return Promise.reject(new Error('repository offline'));
  }
}

describe('Context Routes', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  function retrieve(body: Record<string, unknown>) {
    return ctx.app.inject({ method: 'POST', url: '/api/v1/context/retrieve', payload: body });
  }

  // ==========================================================================
  // POST /retrieve
  // ==========================================================================

  describe('POST /api/v1/context/retrieve', () => {
    it('should build a complete minimal context', async () => {
      const response = await retrieve({ client_id: CLIENT_ID, case_id: FULL_CASE_ID, scope: 'minimal' });

      expect(response.statusCode).toBe(200);
      const body = response.json<ContextResponse>();
      expect(body.case_id).toBe(FULL_CASE_ID);
      expect(body.case_name).toBe('State v. Roe');
      expect(body.context_score).toBe(1);
      expect(body.is_complete).toBe(true);
      expect(body.cached).toBe(false);
      expect(body.who?.parties).toHaveLength(10);
      expect(body.where?.court).toBe('District Court');
      expect(body.what).toBeNull();
      expect(body.when).toBeNull();
      expect(body.why).toBeNull();
    });

    it('should serve the second request from the cache', async () => {
      const first = await retrieve({ client_id: CLIENT_ID, case_id: FULL_CASE_ID, scope: 'minimal' });
      const second = await retrieve({ client_id: CLIENT_ID, case_id: FULL_CASE_ID, scope: 'minimal' });

      const firstBody = first.json<ContextResponse>();
      const secondBody = second.json<ContextResponse>();
      expect(secondBody.cached).toBe(true);
      expect(secondBody.query_id).toBe(firstBody.query_id);
    });

    it('should rebuild when use_cache is false', async () => {
      const first = await retrieve({ client_id: CLIENT_ID, case_id: FULL_CASE_ID, scope: 'minimal' });
      const second = await retrieve({
        client_id: CLIENT_ID,
        case_id: FULL_CASE_ID,
        scope: 'minimal',
        use_cache: false,
      });

      const secondBody = second.json<ContextResponse>();
      expect(secondBody.cached).toBe(false);
      expect(secondBody.query_id).not.toBe(first.json<ContextResponse>().query_id);
    });

    it('should build only the requested dimensions', async () => {
      const response = await retrieve({
        client_id: CLIENT_ID,
        case_id: FULL_CASE_ID,
        include_dimensions: ['where'],
      });

      const body = response.json<ContextResponse>();
      expect(body.who).toBeNull();
      expect(body.where?.primary_jurisdiction).toBe('Federal');
      expect(body.where?.venue).toBe('Oakland');
      expect(body.context_score).toBe(1);
    });

    it('should score an unknown case as empty', async () => {
      const response = await retrieve({ client_id: CLIENT_ID, case_id: EMPTY_CASE_ID, scope: 'minimal' });

      const body = response.json<ContextResponse>();
      expect(body.case_name).toBe('Case case-empty');
      expect(body.context_score).toBe(0);
      expect(body.is_complete).toBe(false);
      expect(body.who?.parties).toEqual([]);
      expect(body.where?.primary_jurisdiction).toBe('Unknown');
    });

    it('should return 400 for an invalid scope', async () => {
      const response = await retrieve({ client_id: CLIENT_ID, case_id: FULL_CASE_ID, scope: 'bogus' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid scope: bogus. Valid: minimal, standard, comprehensive',
        statusCode: 400,
      });
    });

    it('should return 400 for an unknown dimension', async () => {
      const response = await retrieve({
        client_id: CLIENT_ID,
        case_id: FULL_CASE_ID,
        include_dimensions: ['how'],
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<{ message: string }>().message).toBe(
        'Invalid dimension: HOW. Valid: WHO, WHAT, WHERE, WHEN, WHY'
      );
    });

    it('should return 400 with field errors when case_id is missing', async () => {
      const response = await retrieve({ client_id: CLIENT_ID });

      expect(response.statusCode).toBe(400);
      const body = response.json<{
        code: string;
        message: string;
        details: { fieldErrors: Record<string, string[]> };
      }>();
      expect(body.code).toBe('VALIDATION_ERROR');
      expect(body.message).toBe('Invalid context request');
      expect(body.details.fieldErrors.case_id).toEqual(['Required']);
    });

    it('should return 500 naming the operation when the build fails unexpectedly', async () => {
      await ctx.app.close();
      ctx = await buildTestApp({
        services: (defaults) => ({
          ...defaults,
          builder: new ExplodingBuilder({ repository: createSeededRepository() }),
        }),
      });

      const response = await retrieve({ client_id: CLIENT_ID, case_id: FULL_CASE_ID });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'Context retrieval failed: repository offline',
        statusCode: 500,
      });
    });
  });

  // ==========================================================================
  // GET /retrieve
  // ==========================================================================

  describe('GET /api/v1/context/retrieve', () => {
    it('should read parameters from the querystring', async () => {
      const response = await ctx.app.inject({
        method: 'GET',
        url: `/api/v1/context/retrieve?client_id=${CLIENT_ID}&case_id=${FULL_CASE_ID}&scope=minimal&use_cache=false`,
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<ContextResponse>();
      expect(body.context_score).toBe(1);
      expect(body.cached).toBe(false);
    });

    it('should reject a non-boolean use_cache', async () => {
      const response = await ctx.app.inject({
        method: 'GET',
        url: `/api/v1/context/retrieve?client_id=${CLIENT_ID}&case_id=${FULL_CASE_ID}&use_cache=maybe`,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<{ message: string }>().message).toBe('Invalid context query');
    });
  });

  // ==========================================================================
  // Dimensions
  // ==========================================================================

  describe('POST /api/v1/context/dimension/retrieve', () => {
    it('should return the dimension context', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/v1/context/dimension/retrieve',
        payload: { client_id: CLIENT_ID, case_id: FULL_CASE_ID, dimension: 'where' },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<{
        case_id: string;
        dimension: string;
        data: { primary_jurisdiction: string; court: string; venue: string };
      }>();
      expect(body.case_id).toBe(FULL_CASE_ID);
      expect(body.dimension).toBe('WHERE');
      expect(body.data.primary_jurisdiction).toBe('Federal');
      expect(body.data.court).toBe('District Court');
      expect(body.data.venue).toBe('Oakland');
    });
  });

  describe('GET /api/v1/context/dimension/quality', () => {
    it('should report a sufficient WHERE dimension', async () => {
      const response = await ctx.app.inject({
        method: 'GET',
        url: `/api/v1/context/dimension/quality?client_id=${CLIENT_ID}&case_id=${FULL_CASE_ID}&dimension=WHERE`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        dimension_name: 'WHERE',
        completeness_score: 1,
        data_points: 3,
        confidence_avg: 0.9,
        is_sufficient: true,
      });
    });

    it('should report an empty WHO dimension as insufficient', async () => {
      const response = await ctx.app.inject({
        method: 'GET',
        url: `/api/v1/context/dimension/quality?client_id=${CLIENT_ID}&case_id=${EMPTY_CASE_ID}&dimension=who`,
      });

      expect(response.json()).toEqual({
        dimension_name: 'WHO',
        completeness_score: 0,
        data_points: 0,
        confidence_avg: 0.9,
        is_sufficient: false,
      });
    });

    it('should return 400 for an unknown dimension', async () => {
      const response = await ctx.app.inject({
        method: 'GET',
        url: `/api/v1/context/dimension/quality?client_id=${CLIENT_ID}&case_id=${FULL_CASE_ID}&dimension=HOW`,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<{ code: string }>().code).toBe('VALIDATION_ERROR');
    });
  });

  // ==========================================================================
  // POST /refresh
  // ==========================================================================

  describe('POST /api/v1/context/refresh', () => {
    it('should rebuild and report the new score', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: `/api/v1/context/refresh?client_id=${CLIENT_ID}&case_id=${FULL_CASE_ID}&scope=minimal`,
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<Record<string, unknown>>();
      expect(body.message).toBe('Context refreshed successfully');
      expect(body.case_id).toBe(FULL_CASE_ID);
      expect(body.scope).toBe('minimal');
      expect(body.new_context_score).toBe(1);
      expect(typeof body.execution_time_ms).toBe('number');
    });

    it('should not touch the cache', async () => {
      await ctx.app.inject({
        method: 'POST',
        url: `/api/v1/context/refresh?client_id=${CLIENT_ID}&case_id=${FULL_CASE_ID}&scope=minimal`,
      });

      expect(ctx.services.cache.getStats().total_sets).toBe(0);
    });
  });

  // ==========================================================================
  // POST /batch/retrieve
  // ==========================================================================

  describe('POST /api/v1/context/batch/retrieve', () => {
    it('should build every case', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/v1/context/batch/retrieve',
        payload: { client_id: CLIENT_ID, case_ids: [FULL_CASE_ID, EMPTY_CASE_ID], scope: 'minimal' },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<{
        total_cases: number;
        successful: number;
        failed: number;
        contexts: Record<string, ContextResponse>;
        errors: Record<string, string>;
      }>();
      expect(body.total_cases).toBe(2);
      expect(body.successful).toBe(2);
      expect(body.failed).toBe(0);
      expect(Object.keys(body.contexts)).toEqual([FULL_CASE_ID, EMPTY_CASE_ID]);
      expect(body.contexts[FULL_CASE_ID]?.context_score).toBe(1);
      expect(body.contexts[EMPTY_CASE_ID]?.context_score).toBe(0);
      expect(body.errors).toEqual({});
    });

    it('should report each failed case', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/v1/context/batch/retrieve',
        payload: { client_id: CLIENT_ID, case_ids: [FULL_CASE_ID], scope: 'bogus' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        total_cases: 1,
        successful: 0,
        failed: 1,
        contexts: {},
        errors: {
          [FULL_CASE_ID]: 'Invalid scope: bogus. Valid: minimal, standard, comprehensive',
        },
      });
    });

    it('should reject an empty case list', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/v1/context/batch/retrieve',
        payload: { client_id: CLIENT_ID, case_ids: [] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<{ message: string }>().message).toBe('Invalid batch request');
    });
  });
});
