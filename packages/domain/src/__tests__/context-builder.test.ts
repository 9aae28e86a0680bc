/**
 * Context builder tests
 *
 * Scores follow from context-fixtures:
 * WHO 0.6, WHAT 0.5, WHERE 1, WHEN 0.8, WHY 0.3
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ValidationError, type CaseStatus } from '@casecontext/core';
import type { ContextResponse, WhyContext } from '@casecontext/types';
import { WhyAnalyzer } from '../context/analyzers/index.js';
import {
  ContextBuilder,
  calculateContextScore,
  validateDimension,
  validateScope,
  type ContextCache,
} from '../context/context-builder.js';
import type { InMemoryCaseRepository } from '../context/in-memory-case-repository.js';
import {
  CASE_ID,
  CLIENT_ID,
  FULL_CASE_ID,
  FakeGraph,
  createSeededRepository,
  now,
} from './context-fixtures.js';

class RecordingCache implements ContextCache {
  entries = new Map<string, ContextResponse>();
  writes: { caseId: string; scope: string; caseStatus: CaseStatus }[] = [];

  get(clientId: string, caseId: string, scope: string): Promise<ContextResponse | null> {
    return Promise.resolve(this.entries.get(`${clientId}:${caseId}:${scope}`) ?? null);
  }

  set(
    clientId: string,
    caseId: string,
    value: ContextResponse,
    scope: string,
    caseStatus: CaseStatus
  ): Promise<boolean> {
    this.entries.set(`${clientId}:${caseId}:${scope}`, value);
    this.writes.push({ caseId, scope, caseStatus });
    return Promise.resolve(true);
  }
}

class RejectingWhyAnalyzer extends WhyAnalyzer {
  override analyze(): Promise<WhyContext> {
    return Promise.reject(new Error('analyzer crashed'));
  }
}

describe('ContextBuilder', () => {
  let repository: InMemoryCaseRepository;
  let graph: FakeGraph;
  let cache: RecordingCache;
  let builder: ContextBuilder;

  beforeEach(() => {
    repository = createSeededRepository();
    graph = new FakeGraph();
    cache = new RecordingCache();
    builder = new ContextBuilder({ repository, graph, cache, now });
  });

  describe('buildContext', () => {
    it('should build all five dimensions for the comprehensive scope', async () => {
      const context = await builder.buildContext({ clientId: CLIENT_ID, caseId: CASE_ID });

      expect(context.case_id).toBe(CASE_ID);
      expect(context.case_name).toBe('Doe v. Acme');
      expect(context.who).not.toBeNull();
      expect(context.what).not.toBeNull();
      expect(context.where).not.toBeNull();
      expect(context.when).not.toBeNull();
      expect(context.why).not.toBeNull();
      expect(context.context_score).toBeCloseTo(0.64);
      expect(context.is_complete).toBe(false);
      expect(context.cached).toBe(false);
      expect(context.timestamp).toBe('2025-03-01T00:00:00.000Z');
    });

    it('should build only WHO and WHERE for the minimal scope', async () => {
      const context = await builder.buildContext({
        clientId: CLIENT_ID,
        caseId: CASE_ID,
        scope: 'minimal',
      });

      expect(context.who).not.toBeNull();
      expect(context.where).not.toBeNull();
      expect(context.what).toBeNull();
      expect(context.when).toBeNull();
      expect(context.why).toBeNull();
      expect(context.context_score).toBeCloseTo(0.8);
    });

    it('should build WHO, WHAT, WHERE and WHEN for the standard scope', async () => {
      const context = await builder.buildContext({
        clientId: CLIENT_ID,
        caseId: CASE_ID,
        scope: 'standard',
      });

      expect(context.why).toBeNull();
      expect(context.context_score).toBeCloseTo(0.725);
    });

    it('should build explicit dimensions regardless of scope', async () => {
      const context = await builder.buildContext({
        clientId: CLIENT_ID,
        caseId: CASE_ID,
        scope: 'minimal',
        includeDimensions: ['when', 'WHEN'],
      });

      expect(context.when).not.toBeNull();
      expect(context.who).toBeNull();
      expect(context.where).toBeNull();
      expect(context.context_score).toBeCloseTo(0.8);
    });

    it('should scale the score down when an analyzer rejects', async () => {
      builder = new ContextBuilder({
        repository,
        graph,
        now,
        analyzers: { WHY: new RejectingWhyAnalyzer({ repository, graph, now }) },
      });

      const context = await builder.buildContext({ clientId: CLIENT_ID, caseId: CASE_ID });

      expect(context.why).toBeNull();
      expect(context.context_score).toBeCloseTo(0.464);
    });

    it('should reject an invalid scope', async () => {
      await expect(
        builder.buildContext({ clientId: CLIENT_ID, caseId: CASE_ID, scope: 'full' })
      ).rejects.toThrow('Invalid scope: full. Valid: minimal, standard, comprehensive');
    });

    it('should reject an invalid dimension', async () => {
      await expect(
        builder.buildContext({ clientId: CLIENT_ID, caseId: CASE_ID, includeDimensions: ['how'] })
      ).rejects.toThrow('Invalid dimension: HOW. Valid: WHO, WHAT, WHERE, WHEN, WHY');
    });

    it('should report every fresh build with its scope', async () => {
      const onContextBuilt = vi.fn();
      builder = new ContextBuilder({ repository, now, onContextBuilt });

      await builder.buildContext({ clientId: CLIENT_ID, caseId: CASE_ID, scope: 'minimal' });
      await builder.buildContext({
        clientId: CLIENT_ID,
        caseId: CASE_ID,
        includeDimensions: ['WHO'],
      });

      expect(onContextBuilt.mock.calls.map((call) => call[1])).toEqual(['minimal', 'custom']);
    });
  });

  describe('caching', () => {
    it('should cache a complete context with the case status', async () => {
      const context = await builder.buildContext({
        clientId: CLIENT_ID,
        caseId: FULL_CASE_ID,
        scope: 'minimal',
      });

      expect(context.context_score).toBe(1);
      expect(context.is_complete).toBe(true);
      expect(cache.writes).toEqual([{ caseId: FULL_CASE_ID, scope: 'minimal', caseStatus: 'closed' }]);
    });

    it('should not cache an incomplete context', async () => {
      await builder.buildContext({ clientId: CLIENT_ID, caseId: CASE_ID });

      expect(cache.writes).toEqual([]);
    });

    it('should serve a cached context flagged as cached', async () => {
      const first = await builder.buildContext({
        clientId: CLIENT_ID,
        caseId: FULL_CASE_ID,
        scope: 'minimal',
      });
      graph.calls = [];

      const second = await builder.buildContext({
        clientId: CLIENT_ID,
        caseId: FULL_CASE_ID,
        scope: 'minimal',
      });

      expect(second.cached).toBe(true);
      expect(second.query_id).toBe(first.query_id);
      expect(graph.calls).toEqual([]);
    });

    it('should bypass the cache when asked', async () => {
      const first = await builder.buildContext({
        clientId: CLIENT_ID,
        caseId: FULL_CASE_ID,
        scope: 'minimal',
      });

      const second = await builder.buildContext({
        clientId: CLIENT_ID,
        caseId: FULL_CASE_ID,
        scope: 'minimal',
        useCache: false,
      });

      expect(second.cached).toBe(false);
      expect(second.query_id).not.toBe(first.query_id);
      expect(cache.writes).toHaveLength(1);
    });

    it('should ignore the cache for explicit dimensions', async () => {
      const getSpy = vi.spyOn(cache, 'get');

      await builder.buildContext({
        clientId: CLIENT_ID,
        caseId: FULL_CASE_ID,
        includeDimensions: ['WHO'],
      });

      expect(getSpy).not.toHaveBeenCalled();
      expect(cache.writes).toEqual([]);
    });

    it('should build fresh when the cache read fails', async () => {
      vi.spyOn(cache, 'get').mockRejectedValue(new Error('redis down'));

      const context = await builder.buildContext({
        clientId: CLIENT_ID,
        caseId: CASE_ID,
        scope: 'minimal',
      });

      expect(context.cached).toBe(false);
    });
  });

  describe('getDimensionQuality', () => {
    it('should score WHERE from known location fields', async () => {
      const metrics = await builder.getDimensionQuality(CLIENT_ID, CASE_ID, 'where');

      expect(metrics).toEqual({
        dimension_name: 'WHERE',
        completeness_score: 1,
        data_points: 3,
        confidence_avg: 0.9,
        is_sufficient: true,
      });
    });

    it('should report WHO as insufficient below the threshold', async () => {
      const metrics = await builder.getDimensionQuality(CLIENT_ID, CASE_ID, 'WHO');

      expect(metrics.data_points).toBe(6);
      expect(metrics.completeness_score).toBeCloseTo(0.6);
      expect(metrics.is_sufficient).toBe(false);
    });

    it('should reject an unknown dimension', async () => {
      await expect(builder.getDimensionQuality(CLIENT_ID, CASE_ID, 'HOW')).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  describe('refreshDimension', () => {
    it('should return the tagged dimension context', async () => {
      const result = await builder.refreshDimension(CLIENT_ID, CASE_ID, 'when');

      expect(result.dimension).toBe('WHEN');
      if (result.dimension === 'WHEN') {
        expect(result.context.case_age_days).toBe(59);
      }
    });
  });
});

describe('validateDimension', () => {
  it('should upper-case valid names', () => {
    expect(validateDimension('why')).toBe('WHY');
  });
});

describe('validateScope', () => {
  it('should accept known scopes unchanged', () => {
    expect(validateScope('standard')).toBe('standard');
  });

  it('should be case-sensitive', () => {
    expect(() => validateScope('Standard')).toThrow(ValidationError);
  });
});

describe('calculateContextScore', () => {
  it('should be zero without results', () => {
    expect(calculateContextScore([], 3)).toBe(0);
  });

  it('should count a missing dimension as zero and scale by the success ratio', () => {
    const where = {
      dimension: 'WHERE' as const,
      context: {
        case_id: CASE_ID,
        case_name: 'Doe v. Acme',
        primary_jurisdiction: 'Federal',
        court: 'N.D. Cal.',
        venue: 'San Francisco',
        judge_chambers: null,
        local_rules: [],
        filing_requirements: [],
        related_proceedings: [],
      },
    };

    // (1 + 0) / 2 × 1/2
    expect(calculateContextScore([where], 2)).toBeCloseTo(0.25);
    expect(calculateContextScore([where], 1)).toBe(1);
  });
});
