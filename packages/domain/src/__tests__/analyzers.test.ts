/**
 * Dimension analyzer tests
 *
 * Each analyzer runs against the seeded in-memory repository and the graph
 * stand-in; values are derived from context-fixtures.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CaseIsolationError } from '@casecontext/core';
import type { CaseRepository } from '../context/ports.js';
import {
  WhatAnalyzer,
  WhenAnalyzer,
  WhereAnalyzer,
  WhoAnalyzer,
  WhyAnalyzer,
  calculateArgumentStrength,
  calculateQualityScore,
  calculateUrgency,
} from '../context/analyzers/index.js';
import { InMemoryCaseRepository } from '../context/in-memory-case-repository.js';
import {
  CASE_ID,
  CLIENT_ID,
  FakeGraph,
  NOW,
  createSeededRepository,
  now,
} from './context-fixtures.js';

describe('WhoAnalyzer', () => {
  let graph: FakeGraph;
  let analyzer: WhoAnalyzer;

  beforeEach(() => {
    graph = new FakeGraph();
    analyzer = new WhoAnalyzer({ repository: createSeededRepository(), graph, now });
  });

  it('should extract participants and skip parties with unknown roles', async () => {
    const who = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(who.case_name).toBe('Doe v. Acme');
    expect(who.parties.map((p) => [p.id, p.role])).toEqual([
      ['p-1', 'plaintiff'],
      ['p-2', 'defendant'],
    ]);
    expect(who.parties[1]?.entity_type).toBe('corporation');
    expect(who.judges).toHaveLength(1);
    expect(who.attorneys.map((a) => a.firm)).toEqual(['Lee LLP', null]);
    expect(who.witnesses[0]).toMatchObject({ witness_type: 'expert', expertise: 'toxicology' });
  });

  it('should map each party to its last listed attorney', async () => {
    const who = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(who.representation_map).toEqual({ 'p-1': 'a-2', 'p-2': 'a-2' });
  });

  it('should group edges by source node', async () => {
    const who = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(who.party_relationships).toEqual({ 'p-1': ['p-2', 'a-1'], 'p-2': ['a-2'] });
  });

  it('should run a LOCAL graph search for the case', async () => {
    await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(graph.calls).toHaveLength(1);
    expect(graph.calls[0]).toMatchObject({ clientId: CLIENT_ID, caseId: CASE_ID, searchType: 'LOCAL' });
  });

  it('should still build the context when the graph search fails', async () => {
    graph.failing = true;

    const who = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(who.parties).toHaveLength(2);
  });

  it('should throw CaseIsolationError for an empty case id', async () => {
    await expect(analyzer.analyze(CLIENT_ID, '')).rejects.toBeInstanceOf(CaseIsolationError);
    await expect(analyzer.analyze(CLIENT_ID, '')).rejects.toThrow(
      'case_id is REQUIRED for case-specific operation: analyze_who'
    );
  });

  it('should return the empty context when the repository fails', async () => {
    const broken: CaseRepository = {
      getCase: () => Promise.reject(new Error('connection refused')),
      findGraphNodes: () => Promise.reject(new Error('connection refused')),
      findGraphEdges: () => Promise.reject(new Error('connection refused')),
      findTimelineEvents: () => Promise.reject(new Error('connection refused')),
      findDeadlines: () => Promise.reject(new Error('connection refused')),
      findLegalTheories: () => Promise.reject(new Error('connection refused')),
    };

    const who = await new WhoAnalyzer({ repository: broken }).analyze(CLIENT_ID, CASE_ID);

    expect(who).toEqual({
      case_id: CASE_ID,
      case_name: 'Case case-1',
      parties: [],
      judges: [],
      attorneys: [],
      witnesses: [],
      party_relationships: {},
      representation_map: {},
    });
  });
});

describe('WhatAnalyzer', () => {
  it('should collect causes, issues, doctrines and citations', async () => {
    const analyzer = new WhatAnalyzer({ repository: createSeededRepository() });

    const what = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(what.causes_of_action[0]).toMatchObject({ name: 'Negligence', elements: ['duty', 'breach'] });
    expect(what.legal_issues).toEqual(['Proximate cause', 'Foreseeability']);
    expect(what.doctrines).toEqual(['Res ipsa loquitur']);
    expect(what.primary_legal_theory).toBe('Negligence');
    expect(what.issue_complexity).toBeCloseTo(0.2);
  });

  it('should default citation jurisdiction and confidence', async () => {
    const analyzer = new WhatAnalyzer({ repository: createSeededRepository() });

    const what = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(what.statutes).toEqual([
      {
        text: 'Cal. Civ. Code 1714',
        type: 'statute',
        jurisdiction: 'California',
        confidence: 0.95,
        case_id: CASE_ID,
      },
    ]);
    expect(what.case_citations).toEqual([
      {
        text: 'Smith v. Jones, 1 F.4th 1',
        type: 'case_law',
        jurisdiction: 'federal',
        confidence: 0.9,
        case_id: CASE_ID,
      },
    ]);
  });

  it('should leave the primary theory empty without causes or issues', async () => {
    const analyzer = new WhatAnalyzer({ repository: new InMemoryCaseRepository() });

    const what = await analyzer.analyze(CLIENT_ID, 'case-x');

    expect(what.primary_legal_theory).toBeNull();
    expect(what.issue_complexity).toBe(0);
    expect(what.case_name).toBe('Case case-x');
  });
});

describe('WhereAnalyzer', () => {
  it('should read the location from the case record', async () => {
    const analyzer = new WhereAnalyzer({ repository: createSeededRepository() });

    const where = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(where).toMatchObject({
      primary_jurisdiction: 'California',
      court: 'Superior Court',
      venue: 'San Francisco',
      judge_chambers: 'Dept. 302',
      local_rules: [],
    });
  });

  it('should fall back to unknown values for a missing case', async () => {
    const analyzer = new WhereAnalyzer({ repository: new InMemoryCaseRepository() });

    const where = await analyzer.analyze(CLIENT_ID, 'case-x');

    expect(where).toMatchObject({
      primary_jurisdiction: 'Unknown',
      court: 'Unknown Court',
      venue: 'Unknown Venue',
      judge_chambers: null,
    });
  });
});

describe('WhenAnalyzer', () => {
  it('should split deadlines around now and derive urgency', async () => {
    const analyzer = new WhenAnalyzer({ repository: createSeededRepository(), now });

    const when = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(when.upcoming_deadlines.map((d) => d.deadline_type)).toEqual(['motion', 'expert']);
    expect(when.past_deadlines.map((d) => d.deadline_type)).toEqual(['discovery']);
    expect(when.days_until_next_deadline).toBe(4);
    expect(when.urgency_score).toBe(1);
    expect(when.case_age_days).toBe(59);
  });

  it('should order the timeline by date', async () => {
    const analyzer = new WhenAnalyzer({ repository: createSeededRepository(), now });

    const when = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(when.timeline.map((e) => e.event_type)).toEqual(['filing', 'answer']);
    expect(when.trial_date).toBe('2025-09-01');
    expect(when.discovery_cutoff).toBeNull();
  });

  it('should use now as the filing date when the case has none', async () => {
    const analyzer = new WhenAnalyzer({ repository: new InMemoryCaseRepository(), now });

    const when = await analyzer.analyze(CLIENT_ID, 'case-x');

    expect(when.filing_date).toBe('2025-03-01T00:00:00.000Z');
    expect(when.case_age_days).toBe(0);
    expect(when.urgency_score).toBe(0.3);
    expect(when.days_until_next_deadline).toBeNull();
  });

  it('should drop unparseable dates from the case record', async () => {
    const repository = new InMemoryCaseRepository();
    repository.seed(CLIENT_ID, 'case-x', {
      record: { id: 'case-x', client_id: CLIENT_ID, trial_date: 'someday', filing_date: 'never' },
    });

    const when = await new WhenAnalyzer({ repository, now }).analyze(CLIENT_ID, 'case-x');

    expect(when.trial_date).toBeNull();
    expect(when.filing_date).toBe(NOW.toISOString());
  });
});

describe('calculateUrgency', () => {
  const deadline = (date: string) => ({
    deadline_date: date,
    deadline_type: 'motion',
    description: '',
    case_id: CASE_ID,
    is_met: false,
    priority: 'medium' as const,
  });

  it('should rate a deadline within a month at 0.7', () => {
    expect(calculateUrgency([deadline('2025-03-21T00:00:00Z')], NOW)).toBe(0.7);
  });

  it('should rate distant deadlines at 0.5', () => {
    expect(calculateUrgency([deadline('2025-04-30T00:00:00Z')], NOW)).toBe(0.5);
  });

  it('should rate no deadlines at 0.3', () => {
    expect(calculateUrgency([], NOW)).toBe(0.3);
  });
});

describe('WhyAnalyzer', () => {
  it('should categorize precedents and weigh argument strength', async () => {
    const graph = new FakeGraph();
    const analyzer = new WhyAnalyzer({ repository: createSeededRepository(), graph });

    const why = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(why.supporting_precedents).toEqual([
      {
        case_name: 'Smith v. Jones',
        citation: '1 F.4th 1',
        relevance_score: 0.9,
        holding: 'Duty owed',
        distinguishing_factors: [],
        favorability: 'supporting',
      },
    ]);
    expect(why.opposing_precedents[0]).toMatchObject({ case_name: 'Roe v. Co', citation: '' });
    expect(why.argument_strength).toBeCloseTo(0.75);
    expect(why.legal_theories.map((t) => t.name)).toEqual(['Negligence per se']);
    expect(graph.calls[0]?.searchType).toBe('GLOBAL');
  });

  it('should keep theories when the precedent search fails', async () => {
    const graph = new FakeGraph();
    graph.failing = true;
    const analyzer = new WhyAnalyzer({ repository: createSeededRepository(), graph });

    const why = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(why.supporting_precedents).toEqual([]);
    expect(why.argument_strength).toBe(0.5);
    expect(why.legal_theories).toHaveLength(1);
  });

  it('should skip the precedent search without a graph', async () => {
    const analyzer = new WhyAnalyzer({ repository: createSeededRepository() });

    const why = await analyzer.analyze(CLIENT_ID, CASE_ID);

    expect(why.opposing_precedents).toEqual([]);
  });
});

describe('calculateArgumentStrength', () => {
  it('should be neutral without relevance on either side', () => {
    expect(calculateArgumentStrength([], [])).toBe(0.5);
  });
});

describe('calculateQualityScore', () => {
  it('should scale completeness by ten data points', () => {
    const metrics = calculateQualityScore('WHO', 5, [0.8, 0.6]);

    expect(metrics.dimension_name).toBe('WHO');
    expect(metrics.completeness_score).toBe(0.5);
    expect(metrics.confidence_avg).toBeCloseTo(0.7);
    expect(metrics.is_sufficient).toBe(false);
  });

  it('should cap completeness at 1 and mark it sufficient', () => {
    const metrics = calculateQualityScore('WHAT', 14, []);

    expect(metrics.completeness_score).toBe(1);
    expect(metrics.confidence_avg).toBe(0);
    expect(metrics.is_sufficient).toBe(true);
  });
});
