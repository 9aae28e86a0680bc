/**
 * Dimension Analyzer Base
 *
 * Analyzers never fail a context build: an error inside analysis is logged
 * and the empty context for the dimension is returned instead.
 *
 * @module domain/context/analyzers/base-analyzer
 */

import { CaseIsolationError, createLogger, type Logger } from '@casecontext/core';
import type { Dimension } from '@casecontext/types';
import type { CaseRepository, GraphInsights } from '../ports.js';

export interface AnalyzerDependencies {
  repository: CaseRepository;
  /** Optional knowledge graph; analyzers that use it degrade without it */
  graph?: GraphInsights | null;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export function fallbackCaseName(caseId: string): string {
  return `Case ${caseId}`;
}

export abstract class DimensionAnalyzer<TContext> {
  abstract readonly dimension: Dimension;

  protected readonly repository: CaseRepository;
  protected readonly graph: GraphInsights | null;
  protected readonly now: () => Date;
  protected readonly logger: Logger;

  constructor(deps: AnalyzerDependencies, loggerName: string) {
    this.repository = deps.repository;
    this.graph = deps.graph ?? null;
    this.now = deps.now ?? (() => new Date());
    this.logger = createLogger({ name: loggerName });
  }

  /**
   * Build the dimension context for one case
   *
   * @throws {CaseIsolationError} when caseId is empty
   */
  async analyze(clientId: string, caseId: string): Promise<TContext> {
    if (!caseId) {
      throw new CaseIsolationError(`analyze_${this.dimension.toLowerCase()}`);
    }

    this.logger.info({ clientId, caseId }, `Analyzing ${this.dimension} dimension`);

    try {
      return await this.build(clientId, caseId);
    } catch (error) {
      this.logger.error({ err: error, clientId, caseId }, `${this.dimension} analysis failed`);
      return this.empty(caseId, fallbackCaseName(caseId));
    }
  }

  protected abstract build(clientId: string, caseId: string): Promise<TContext>;

  protected abstract empty(caseId: string, caseName: string): TContext;

  protected async getCaseName(clientId: string, caseId: string): Promise<string> {
    try {
      const record = await this.repository.getCase(clientId, caseId);
      return record?.case_name ?? fallbackCaseName(caseId);
    } catch (error) {
      this.logger.warn({ err: error, caseId }, 'Failed to get case name');
      return fallbackCaseName(caseId);
    }
  }
}
