/**
 * Context Builder
 *
 * Assembles the WHO/WHAT/WHERE/WHEN/WHY context for a case:
 * - scope (or an explicit dimension list) picks the analyzers to run
 * - analyzers run concurrently; a rejected analyzer leaves its dimension null
 * - each dimension is scored and the context score is the mean score scaled
 *   by the share of requested dimensions that succeeded
 * - complete contexts are cached, with a longer TTL for closed cases
 *
 * @module domain/context/context-builder
 */

import { randomUUID } from 'node:crypto';
import { ValidationError, clamp, createLogger, type CaseStatus } from '@casecontext/core';
import {
  COMPLETENESS_THRESHOLD,
  CONTEXT_SCOPES,
  DIMENSIONS,
  DimensionQualityMetricsSchema,
  DimensionSchema,
  type ContextResponse,
  type ContextScope,
  type Dimension,
  type DimensionQualityMetrics,
  type WhatContext,
  type WhenContext,
  type WhereContext,
  type WhoContext,
  type WhyContext,
} from '@casecontext/types';
import {
  fallbackCaseName,
  type AnalyzerDependencies,
  type DimensionAnalyzer,
} from './analyzers/base-analyzer.js';
import { WhatAnalyzer } from './analyzers/what-analyzer.js';
import { WhenAnalyzer } from './analyzers/when-analyzer.js';
import { WhereAnalyzer } from './analyzers/where-analyzer.js';
import { WhoAnalyzer } from './analyzers/who-analyzer.js';
import { WhyAnalyzer } from './analyzers/why-analyzer.js';
import { countDataPoints, scoreDimension, type DimensionResult } from './scoring.js';

const logger = createLogger({ name: 'context-builder' });

export const SCOPE_DIMENSIONS: Readonly<Record<ContextScope, readonly Dimension[]>> = {
  minimal: ['WHO', 'WHERE'],
  standard: ['WHO', 'WHAT', 'WHERE', 'WHEN'],
  comprehensive: DIMENSIONS,
};

/**
 * Confidence reported for every dimension until analyzers carry their own
 */
const DEFAULT_CONFIDENCE = 0.9;

/**
 * Cache used by the builder (satisfied by ContextCacheManager<ContextResponse>)
 */
export interface ContextCache {
  get(clientId: string, caseId: string, scope: string): Promise<ContextResponse | null>;
  set(
    clientId: string,
    caseId: string,
    value: ContextResponse,
    scope: string,
    caseStatus: CaseStatus
  ): Promise<unknown>;
}

export interface DimensionAnalyzers {
  WHO: DimensionAnalyzer<WhoContext>;
  WHAT: DimensionAnalyzer<WhatContext>;
  WHERE: DimensionAnalyzer<WhereContext>;
  WHEN: DimensionAnalyzer<WhenContext>;
  WHY: DimensionAnalyzer<WhyContext>;
}

export interface ContextBuilderOptions extends AnalyzerDependencies {
  cache?: ContextCache | null;
  /** Replace individual analyzers */
  analyzers?: Partial<DimensionAnalyzers>;
  /** Called after every fresh (non-cached) build */
  onContextBuilt?: (context: ContextResponse, scope: string) => void;
}

export interface BuildContextRequest {
  clientId: string;
  caseId: string;
  /** Default: comprehensive */
  scope?: string;
  /** Overrides scope; names are case-insensitive */
  includeDimensions?: readonly string[];
  /** Default: true */
  useCache?: boolean;
}

export function validateDimension(name: string): Dimension {
  const upper = name.toUpperCase();
  const parsed = DimensionSchema.safeParse(upper);
  if (!parsed.success) {
    throw new ValidationError(`Invalid dimension: ${upper}. Valid: ${DIMENSIONS.join(', ')}`);
  }
  return parsed.data;
}

export function validateScope(scope: string): ContextScope {
  const match = CONTEXT_SCOPES.find((s) => s === scope);
  if (!match) {
    throw new ValidationError(`Invalid scope: ${scope}. Valid: ${CONTEXT_SCOPES.join(', ')}`);
  }
  return match;
}

export class ContextBuilder {
  private readonly analyzers: DimensionAnalyzers;
  private readonly cache: ContextCache | null;
  private readonly deps: AnalyzerDependencies;
  private readonly onContextBuilt: ((context: ContextResponse, scope: string) => void) | undefined;
  private readonly now: () => Date;

  constructor(options: ContextBuilderOptions) {
    const now = options.now ?? (() => new Date());
    const deps: AnalyzerDependencies = {
      repository: options.repository,
      graph: options.graph ?? null,
      now,
    };

    this.deps = deps;
    this.now = now;
    this.cache = options.cache ?? null;
    this.onContextBuilt = options.onContextBuilt;
    this.analyzers = {
      WHO: options.analyzers?.WHO ?? new WhoAnalyzer(deps),
      WHAT: options.analyzers?.WHAT ?? new WhatAnalyzer(deps),
      WHERE: options.analyzers?.WHERE ?? new WhereAnalyzer(deps),
      WHEN: options.analyzers?.WHEN ?? new WhenAnalyzer(deps),
      WHY: options.analyzers?.WHY ?? new WhyAnalyzer(deps),
    };

    logger.info(
      { cacheEnabled: this.cache !== null, graphEnabled: options.graph != null },
      'Context builder initialized'
    );
  }

  async buildContext(request: BuildContextRequest): Promise<ContextResponse> {
    const { clientId, caseId } = request;
    const scope = request.scope ?? 'comprehensive';
    const explicitDimensions =
      request.includeDimensions && request.includeDimensions.length > 0
        ? request.includeDimensions
        : null;
    const explicit = explicitDimensions !== null;
    // An explicit dimension list does not match any cached scope
    const useCache = (request.useCache ?? true) && !explicit && this.cache !== null;
    const startedAt = Date.now();

    if (useCache) {
      const cached = await this.readCache(clientId, caseId, scope);
      if (cached) {
        logger.info({ clientId, caseId, scope }, 'Context served from cache');
        return { ...cached, cached: true };
      }
    }

    const dimensions = explicitDimensions
      ? [...new Set(explicitDimensions.map(validateDimension))]
      : SCOPE_DIMENSIONS[validateScope(scope)];

    logger.info({ clientId, caseId, scope, dimensions }, 'Building context');

    const results = await this.runAnalyzers(dimensions, clientId, caseId);
    const context = this.assemble(caseId, dimensions, results, startedAt);

    logger.info(
      {
        clientId,
        caseId,
        contextScore: context.context_score,
        isComplete: context.is_complete,
        executionTimeMs: context.execution_time_ms,
      },
      'Context built'
    );

    this.onContextBuilt?.(context, explicit ? 'custom' : scope);

    if (useCache && context.is_complete) {
      await this.writeCache(clientId, caseId, context, scope);
    }

    return context;
  }

  async getDimensionQuality(
    clientId: string,
    caseId: string,
    dimensionName: string
  ): Promise<DimensionQualityMetrics> {
    const dimension = validateDimension(dimensionName);
    const result = await this.analyzeDimension(dimension, clientId, caseId);

    return DimensionQualityMetricsSchema.parse({
      dimension_name: dimension,
      completeness_score: scoreDimension(result),
      data_points: countDataPoints(result),
      confidence_avg: DEFAULT_CONFIDENCE,
    });
  }

  /**
   * Fresh dimension context, bypassing the cache
   */
  async refreshDimension(
    clientId: string,
    caseId: string,
    dimensionName: string
  ): Promise<DimensionResult> {
    const dimension = validateDimension(dimensionName);
    logger.info({ clientId, caseId, dimension }, 'Refreshing dimension');
    return this.analyzeDimension(dimension, clientId, caseId);
  }

  private async analyzeDimension(
    dimension: Dimension,
    clientId: string,
    caseId: string
  ): Promise<DimensionResult> {
    switch (dimension) {
      case 'WHO':
        return { dimension, context: await this.analyzers.WHO.analyze(clientId, caseId) };
      case 'WHAT':
        return { dimension, context: await this.analyzers.WHAT.analyze(clientId, caseId) };
      case 'WHERE':
        return { dimension, context: await this.analyzers.WHERE.analyze(clientId, caseId) };
      case 'WHEN':
        return { dimension, context: await this.analyzers.WHEN.analyze(clientId, caseId) };
      case 'WHY':
        return { dimension, context: await this.analyzers.WHY.analyze(clientId, caseId) };
    }
  }

  private async runAnalyzers(
    dimensions: readonly Dimension[],
    clientId: string,
    caseId: string
  ): Promise<DimensionResult[]> {
    const settled = await Promise.allSettled(
      dimensions.map((dimension) => this.analyzeDimension(dimension, clientId, caseId))
    );

    const results: DimensionResult[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
      } else {
        logger.error(
          { err: outcome.reason, caseId, dimension: dimensions[index] },
          'Dimension analysis rejected'
        );
      }
    });
    return results;
  }

  private assemble(
    caseId: string,
    dimensions: readonly Dimension[],
    results: readonly DimensionResult[],
    startedAt: number
  ): ContextResponse {
    const context: ContextResponse = {
      query_id: randomUUID(),
      case_id: caseId,
      case_name: fallbackCaseName(caseId),
      who: null,
      what: null,
      where: null,
      when: null,
      why: null,
      context_score: 0,
      is_complete: false,
      cached: false,
      execution_time_ms: 0,
      timestamp: this.now().toISOString(),
    };

    for (const result of results) {
      switch (result.dimension) {
        case 'WHO':
          context.who = result.context;
          break;
        case 'WHAT':
          context.what = result.context;
          break;
        case 'WHERE':
          context.where = result.context;
          break;
        case 'WHEN':
          context.when = result.context;
          break;
        case 'WHY':
          context.why = result.context;
          break;
      }
    }

    const named = results.find((r) => r.context.case_name !== fallbackCaseName(caseId));
    if (named) context.case_name = named.context.case_name;

    context.context_score = calculateContextScore(results, dimensions.length);
    context.is_complete = context.context_score >= COMPLETENESS_THRESHOLD;
    context.execution_time_ms = Math.max(0, Date.now() - startedAt);

    return context;
  }

  private async readCache(
    clientId: string,
    caseId: string,
    scope: string
  ): Promise<ContextResponse | null> {
    if (!this.cache) return null;
    try {
      return await this.cache.get(clientId, caseId, scope);
    } catch (error) {
      logger.warn({ err: error, caseId }, 'Context cache read failed');
      return null;
    }
  }

  private async writeCache(
    clientId: string,
    caseId: string,
    context: ContextResponse,
    scope: string
  ): Promise<void> {
    if (!this.cache) return;
    try {
      const caseStatus = await this.getCaseStatus(clientId, caseId);
      await this.cache.set(clientId, caseId, context, scope, caseStatus);
    } catch (error) {
      logger.warn({ err: error, caseId }, 'Failed to cache context');
    }
  }

  private async getCaseStatus(clientId: string, caseId: string): Promise<CaseStatus> {
    const record = await this.deps.repository.getCase(clientId, caseId);
    return record?.status === 'closed' ? 'closed' : 'active';
  }
}

/**
 * Mean over every requested dimension (a failed one scores 0), scaled by
 * the share of requested dimensions that succeeded
 */
export function calculateContextScore(
  results: readonly DimensionResult[],
  requested: number
): number {
  if (results.length === 0 || requested === 0) return 0;

  const average = results.reduce((sum, r) => sum + scoreDimension(r), 0) / requested;
  return clamp(average * (results.length / requested));
}

export function createContextBuilder(options: ContextBuilderOptions): ContextBuilder {
  return new ContextBuilder(options);
}
