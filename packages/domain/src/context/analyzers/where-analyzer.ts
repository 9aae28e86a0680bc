/**
 * WHERE: jurisdiction, court, venue and chambers from the case record
 */

import type { WhereContext } from '@casecontext/types';
import { DimensionAnalyzer, fallbackCaseName, type AnalyzerDependencies } from './base-analyzer.js';

export const UNKNOWN_JURISDICTION = 'Unknown';
export const UNKNOWN_COURT = 'Unknown Court';
export const UNKNOWN_VENUE = 'Unknown Venue';

export class WhereAnalyzer extends DimensionAnalyzer<WhereContext> {
  readonly dimension = 'WHERE' as const;

  constructor(deps: AnalyzerDependencies) {
    super(deps, 'where-analyzer');
  }

  protected async build(clientId: string, caseId: string): Promise<WhereContext> {
    const record = await this.repository.getCase(clientId, caseId);

    const jurisdiction = record?.jurisdiction || UNKNOWN_JURISDICTION;
    const court = record?.court || UNKNOWN_COURT;

    this.logger.info({ caseId, jurisdiction, court }, 'WHERE analysis complete');

    return {
      case_id: caseId,
      case_name: record?.case_name ?? fallbackCaseName(caseId),
      primary_jurisdiction: jurisdiction,
      court,
      venue: record?.venue || UNKNOWN_VENUE,
      judge_chambers: record?.judge_chambers ?? null,
      // TODO: load local_rules from a court rules table once one exists
      local_rules: [],
      filing_requirements: [],
      related_proceedings: [],
    };
  }

  protected empty(caseId: string, caseName: string): WhereContext {
    return {
      case_id: caseId,
      case_name: caseName,
      primary_jurisdiction: UNKNOWN_JURISDICTION,
      court: UNKNOWN_COURT,
      venue: UNKNOWN_VENUE,
      judge_chambers: null,
      local_rules: [],
      filing_requirements: [],
      related_proceedings: [],
    };
  }
}

/**
 * Whether a WHERE field carries real data rather than a default
 */
export function isKnownLocation(value: string): boolean {
  return (
    value.length > 0 &&
    value !== UNKNOWN_JURISDICTION &&
    value !== UNKNOWN_COURT &&
    value !== UNKNOWN_VENUE
  );
}
