/**
 * Per-dimension completeness scores in [0, 1]
 */

import type {
  WhatContext,
  WhenContext,
  WhereContext,
  WhoContext,
  WhyContext,
} from '@casecontext/types';
import { isKnownLocation } from './analyzers/where-analyzer.js';

/**
 * A dimension context tagged with its name
 */
export type DimensionResult =
  | { dimension: 'WHO'; context: WhoContext }
  | { dimension: 'WHAT'; context: WhatContext }
  | { dimension: 'WHERE'; context: WhereContext }
  | { dimension: 'WHEN'; context: WhenContext }
  | { dimension: 'WHY'; context: WhyContext };

function whereFields(where: WhereContext): string[] {
  return [where.primary_jurisdiction, where.court, where.venue];
}

/**
 * Items the dimension carries; WHERE counts 3 only when every location field is known
 */
export function countDataPoints(result: DimensionResult): number {
  switch (result.dimension) {
    case 'WHO': {
      const c = result.context;
      return c.parties.length + c.judges.length + c.attorneys.length + c.witnesses.length;
    }
    case 'WHAT': {
      const c = result.context;
      return (
        c.causes_of_action.length + c.legal_issues.length + c.statutes.length + c.case_citations.length
      );
    }
    case 'WHERE':
      return whereFields(result.context).every(isKnownLocation) ? 3 : 0;
    case 'WHEN': {
      const c = result.context;
      return c.timeline.length + c.upcoming_deadlines.length + c.past_deadlines.length;
    }
    case 'WHY': {
      const c = result.context;
      return c.legal_theories.length + c.supporting_precedents.length + c.opposing_precedents.length;
    }
  }
}

export function scoreDimension(result: DimensionResult): number {
  switch (result.dimension) {
    case 'WHERE':
      return whereFields(result.context).filter(isKnownLocation).length / 3;
    case 'WHEN': {
      const timeScore = Math.min(1, countDataPoints(result) / 10);
      const filingBonus = result.context.filing_date ? 0.3 : 0;
      return Math.min(1, timeScore + filingBonus);
    }
    default:
      return Math.min(1, countDataPoints(result) / 10);
  }
}
