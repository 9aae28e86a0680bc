/**
 * WHY: legal theories, precedents and argument strength
 */

import type {
  LegalTheory,
  PrecedentAnalysis,
  RawPrecedent,
  WhyContext,
} from '@casecontext/types';
import { DimensionAnalyzer, type AnalyzerDependencies } from './base-analyzer.js';

type Favorability = 'supporting' | 'opposing';

function categorize(precedents: readonly RawPrecedent[], category: Favorability): PrecedentAnalysis[] {
  return precedents
    .filter((p) => p.category === category)
    .map((p) => ({
      case_name: p.name ?? 'Unknown Case',
      citation: p.citation ?? '',
      relevance_score: p.relevance ?? 0.5,
      holding: p.holding ?? '',
      distinguishing_factors: p.distinguishing_factors ?? [],
      favorability: category,
    }));
}

/**
 * Share of total precedent relevance that supports the case
 */
export function calculateArgumentStrength(
  supporting: readonly PrecedentAnalysis[],
  opposing: readonly PrecedentAnalysis[]
): number {
  const support = supporting.reduce((sum, p) => sum + p.relevance_score, 0);
  const oppose = opposing.reduce((sum, p) => sum + p.relevance_score, 0);
  const total = support + oppose;
  return total > 0 ? support / total : 0.5;
}

export class WhyAnalyzer extends DimensionAnalyzer<WhyContext> {
  readonly dimension = 'WHY' as const;

  constructor(deps: AnalyzerDependencies) {
    super(deps, 'why-analyzer');
  }

  protected async build(clientId: string, caseId: string): Promise<WhyContext> {
    const precedents = await this.queryPrecedents(clientId, caseId);
    const theoryRows = await this.repository.findLegalTheories(clientId, caseId);

    const theories: LegalTheory[] = theoryRows.map((row) => ({
      id: row.id,
      name: row.name,
      description: row.description,
      strength: row.strength,
      supporting_precedents: row.supporting_precedents,
      case_id: caseId,
    }));
    const supporting = categorize(precedents, 'supporting');
    const opposing = categorize(precedents, 'opposing');

    const caseName = await this.getCaseName(clientId, caseId);

    this.logger.info(
      { caseId, supporting: supporting.length, opposing: opposing.length },
      'WHY analysis complete'
    );

    return {
      ...this.empty(caseId, caseName),
      legal_theories: theories,
      supporting_precedents: supporting,
      opposing_precedents: opposing,
      argument_strength: calculateArgumentStrength(supporting, opposing),
    };
  }

  protected empty(caseId: string, caseName: string): WhyContext {
    return {
      case_id: caseId,
      case_name: caseName,
      legal_theories: [],
      argument_outline: [],
      supporting_precedents: [],
      opposing_precedents: [],
      distinguishing_factors: [],
      argument_strength: 0.5,
      risk_factors: [],
      mitigation_strategies: [],
      similar_case_outcomes: {},
      judge_ruling_patterns: {},
    };
  }

  private async queryPrecedents(clientId: string, caseId: string): Promise<RawPrecedent[]> {
    if (!this.graph) return [];

    try {
      const result = await this.graph.queryCaseGraph({
        clientId,
        caseId,
        query: `Find relevant precedent cases for case ${caseId}`,
        searchType: 'GLOBAL',
      });
      return result.precedents ?? [];
    } catch (error) {
      this.logger.warn({ err: error, caseId }, 'Precedent query failed');
      return [];
    }
  }
}
