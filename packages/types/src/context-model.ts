/**
 * Read-only helpers over context models
 */
import type { ContextResponse } from './schemas/context.js';
import type {
  Deadline,
  Dimension,
  Party,
  PartyRole,
  WhenContext,
  WhereContext,
  WhoContext,
  WhyContext,
} from './schemas/dimensions.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function getPartyCount(who: WhoContext): number {
  return who.parties.length;
}

export function getPartiesByRole(who: WhoContext, role: PartyRole): Party[] {
  return who.parties.filter((party) => party.role === role);
}

export function getFullCourtName(where: WhereContext): string {
  return `${where.court}, ${where.primary_jurisdiction}`;
}

/**
 * Whole days since filing, never negative
 */
export function calculateCaseAge(when: WhenContext, now: Date = new Date()): number {
  const filed = Date.parse(when.filing_date);
  return Math.max(0, Math.floor((now.getTime() - filed) / MS_PER_DAY));
}

export function getNextDeadline(when: WhenContext): Deadline | null {
  let next: Deadline | null = null;
  for (const deadline of when.upcoming_deadlines) {
    if (next === null || Date.parse(deadline.deadline_date) < Date.parse(next.deadline_date)) {
      next = deadline;
    }
  }
  return next;
}

export function getSupportingPrecedentCount(why: WhyContext): number {
  return why.supporting_precedents.length;
}

export function getAverageRelevance(why: WhyContext): number {
  const all = [...why.supporting_precedents, ...why.opposing_precedents];
  if (all.length === 0) return 0;
  return all.reduce((sum, precedent) => sum + precedent.relevance_score, 0) / all.length;
}

function dimensionValue(context: ContextResponse, dimension: Dimension): object | null {
  switch (dimension) {
    case 'WHO':
      return context.who;
    case 'WHAT':
      return context.what;
    case 'WHERE':
      return context.where;
    case 'WHEN':
      return context.when;
    case 'WHY':
      return context.why;
  }
}

export function isDimensionComplete(context: ContextResponse, dimension: Dimension): boolean {
  return dimensionValue(context, dimension) !== null;
}

export function getDimensionCount(context: ContextResponse): number {
  return [context.who, context.what, context.where, context.when, context.why].filter(
    (value) => value !== null
  ).length;
}

export interface ContextSummary {
  query_id: string;
  case_id: string;
  case_name: string;
  dimensions_populated: number;
  context_score: number;
  is_complete: boolean;
  execution_time_ms: number;
  cached: boolean;
  who_summary: { parties: number; judges: number; attorneys: number } | null;
  what_summary: { causes_of_action: number; statutes: number; case_citations: number } | null;
  when_summary: { timeline_events: number; upcoming_deadlines: number; case_age_days: number } | null;
  why_summary: {
    legal_theories: number;
    supporting_precedents: number;
    opposing_precedents: number;
  } | null;
}

export function getContextSummary(context: ContextResponse): ContextSummary {
  const { who, what, when, why } = context;

  return {
    query_id: context.query_id,
    case_id: context.case_id,
    case_name: context.case_name,
    dimensions_populated: getDimensionCount(context),
    context_score: context.context_score,
    is_complete: context.is_complete,
    execution_time_ms: context.execution_time_ms,
    cached: context.cached,
    who_summary: who
      ? { parties: who.parties.length, judges: who.judges.length, attorneys: who.attorneys.length }
      : null,
    what_summary: what
      ? {
          causes_of_action: what.causes_of_action.length,
          statutes: what.statutes.length,
          case_citations: what.case_citations.length,
        }
      : null,
    when_summary: when
      ? {
          timeline_events: when.timeline.length,
          upcoming_deadlines: when.upcoming_deadlines.length,
          case_age_days: when.case_age_days,
        }
      : null,
    why_summary: why
      ? {
          legal_theories: why.legal_theories.length,
          supporting_precedents: why.supporting_precedents.length,
          opposing_precedents: why.opposing_precedents.length,
        }
      : null,
  };
}
