/**
 * WHEN: filing date, timeline, deadlines and urgency
 */

import type { Deadline, TimelineEvent, WhenContext } from '@casecontext/types';
import { DimensionAnalyzer, fallbackCaseName, type AnalyzerDependencies } from './base-analyzer.js';
import { validDate } from './properties.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function daysBetween(from: number, to: number): number {
  return Math.floor((to - from) / MS_PER_DAY);
}

/**
 * 0.3 without upcoming deadlines, 1.0 within a week, 0.7 within a month,
 * 0.5 otherwise
 */
export function calculateUrgency(upcoming: readonly Deadline[], now: Date): number {
  if (upcoming.length === 0) return 0.3;

  const daysAway = upcoming.map((d) => daysBetween(now.getTime(), Date.parse(d.deadline_date)));
  if (daysAway.some((days) => days <= 7)) return 1;
  if (daysAway.some((days) => days <= 30)) return 0.7;
  return 0.5;
}

export class WhenAnalyzer extends DimensionAnalyzer<WhenContext> {
  readonly dimension = 'WHEN' as const;

  constructor(deps: AnalyzerDependencies) {
    super(deps, 'when-analyzer');
  }

  protected async build(clientId: string, caseId: string): Promise<WhenContext> {
    const [record, events, deadlineRows] = await Promise.all([
      this.repository.getCase(clientId, caseId),
      this.repository.findTimelineEvents(clientId, caseId),
      this.repository.findDeadlines(clientId, caseId),
    ]);

    const now = this.now();
    const nowMs = now.getTime();

    const timeline: TimelineEvent[] = events.map((event) => ({
      date: event.event_date,
      event_type: event.event_type,
      description: event.description,
      case_id: caseId,
    }));

    const deadlines: Deadline[] = deadlineRows.map((row) => ({
      deadline_date: row.deadline_date,
      deadline_type: row.deadline_type,
      description: row.description,
      case_id: caseId,
      is_met: row.is_met,
      priority: row.priority,
    }));

    const upcoming = deadlines.filter((d) => Date.parse(d.deadline_date) > nowMs);
    const past = deadlines.filter((d) => Date.parse(d.deadline_date) <= nowMs);

    const filingDate = validDate(record?.filing_date) ?? now.toISOString();
    const caseAge = Math.max(0, daysBetween(Date.parse(filingDate), nowMs));

    const nextDeadlineMs =
      upcoming.length > 0 ? Math.min(...upcoming.map((d) => Date.parse(d.deadline_date))) : null;

    this.logger.info(
      { caseId, events: timeline.length, upcoming: upcoming.length },
      'WHEN analysis complete'
    );

    return {
      case_id: caseId,
      case_name: record?.case_name ?? fallbackCaseName(caseId),
      filing_date: filingDate,
      incident_date: validDate(record?.incident_date),
      timeline,
      upcoming_deadlines: upcoming,
      past_deadlines: past,
      discovery_cutoff: validDate(record?.discovery_cutoff),
      motion_deadline: validDate(record?.motion_deadline),
      trial_date: validDate(record?.trial_date),
      statute_of_limitations: validDate(record?.statute_of_limitations),
      days_until_next_deadline: nextDeadlineMs === null ? null : daysBetween(nowMs, nextDeadlineMs),
      urgency_score: calculateUrgency(upcoming, now),
      case_age_days: caseAge,
    };
  }

  protected empty(caseId: string, caseName: string): WhenContext {
    return {
      case_id: caseId,
      case_name: caseName,
      filing_date: this.now().toISOString(),
      incident_date: null,
      timeline: [],
      upcoming_deadlines: [],
      past_deadlines: [],
      discovery_cutoff: null,
      motion_deadline: null,
      trial_date: null,
      statute_of_limitations: null,
      days_until_next_deadline: null,
      urgency_score: 0.5,
      case_age_days: 0,
    };
  }
}
