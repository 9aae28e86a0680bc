/**
 * Schema parsing tests
 */

import { describe, it, expect } from 'vitest';
import {
  PartySchema,
  DimensionQualityMetricsSchema,
  GraphEntitySchema,
  GraphQueryResponseSchema,
  BatchContextRequestSchema,
  ContextRetrieveQuerySchema,
  ContextRetrieveRequestSchema,
  DeadlineRecordSchema,
  GraphNodeRecordSchema,
  WhenContextSchema,
  CacheInvalidateQuerySchema,
} from '../index.js';

describe('PartySchema', () => {
  it('should lower-case the role and apply defaults', () => {
    const party = PartySchema.parse({ name: 'Acme Corp', role: 'DEFENDANT', case_id: 'case-1' });

    expect(party.role).toBe('defendant');
    expect(party.entity_type).toBe('person');
    expect(party.metadata).toEqual({});
    expect(party.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should reject an unknown role', () => {
    const result = PartySchema.safeParse({ name: 'Bob', role: 'bystander', case_id: 'case-1' });
    expect(result.success).toBe(false);
  });
});

describe('WhenContextSchema', () => {
  it('should reject a filing date that is not a date', () => {
    const result = WhenContextSchema.safeParse({
      case_id: 'case-1',
      case_name: 'Doe v. Acme',
      filing_date: 'not-a-date',
      case_age_days: 0,
    });
    expect(result.success).toBe(false);
  });

  it('should default optional dates to null', () => {
    const when = WhenContextSchema.parse({
      case_id: 'case-1',
      case_name: 'Doe v. Acme',
      filing_date: '2025-01-01',
      case_age_days: 3,
    });

    expect(when.trial_date).toBeNull();
    expect(when.days_until_next_deadline).toBeNull();
    expect(when.urgency_score).toBe(0.5);
  });
});

describe('DimensionQualityMetricsSchema', () => {
  it.each([
    [0.9, true],
    [0.85, true],
    [0.8, false],
  ])('should derive is_sufficient from completeness %s', (completeness, expected) => {
    const metrics = DimensionQualityMetricsSchema.parse({
      dimension_name: 'WHO',
      completeness_score: completeness,
      data_points: 8,
      confidence_avg: 0.9,
      is_sufficient: !expected,
    });
    expect(metrics.is_sufficient).toBe(expected);
  });
});

describe('GraphRAG schemas', () => {
  it('should upper-case entity types', () => {
    const entity = GraphEntitySchema.parse({
      entity_id: 'e-1',
      entity_text: 'Smith v. Jones',
      entity_type: 'case_citation',
      confidence_score: 0.9,
    });

    expect(entity.entity_type).toBe('CASE_CITATION');
    expect(entity.case_id).toBeNull();
    expect(entity.document_ids).toEqual([]);
  });

  it('should keep precedents on a query response', () => {
    const response = GraphQueryResponseSchema.parse({
      query: 'q',
      search_type: 'GLOBAL',
      mode: 'LAZY_GRAPHRAG',
      response: '',
      execution_time_ms: 4,
      precedents: [{ name: 'Smith v. Jones', category: 'supporting', relevance: 0.8 }],
    });

    expect(response.precedents).toEqual([
      { name: 'Smith v. Jones', category: 'supporting', relevance: 0.8 },
    ]);
    expect(response.communities).toBeNull();
  });
});

describe('record schemas', () => {
  it('should default null deadline columns', () => {
    const row = DeadlineRecordSchema.parse({
      case_id: 'case-1',
      deadline_date: '2025-04-01',
      deadline_type: 'motion',
      description: null,
      is_met: null,
      priority: null,
    });

    expect(row.description).toBe('');
    expect(row.is_met).toBe(false);
    expect(row.priority).toBe('medium');
  });

  it('should turn missing node properties into an empty object', () => {
    const node = GraphNodeRecordSchema.parse({ node_id: 'n-1', entity_type: 'PARTY' });
    expect(node.properties).toEqual({});
  });
});

describe('request schemas', () => {
  it('should default retrieve requests to a comprehensive cached build', () => {
    const request = ContextRetrieveRequestSchema.parse({ client_id: 'client-1', case_id: 'case-1' });
    expect(request).toEqual({
      client_id: 'client-1',
      case_id: 'case-1',
      scope: 'comprehensive',
      use_cache: true,
    });
  });

  it('should read use_cache from the query string', () => {
    const query = ContextRetrieveQuerySchema.parse({
      client_id: 'client-1',
      case_id: 'case-1',
      use_cache: 'false',
    });
    expect(query.use_cache).toBe(false);
  });

  it('should require between 1 and 100 case ids', () => {
    const ids = (n: number) => Array.from({ length: n }, (_, i) => `case-${i}`);

    expect(BatchContextRequestSchema.safeParse({ client_id: 'c', case_ids: [] }).success).toBe(false);
    expect(BatchContextRequestSchema.safeParse({ client_id: 'c', case_ids: ids(101) }).success).toBe(
      false
    );

    const batch = BatchContextRequestSchema.parse({ client_id: 'c', case_ids: ids(100) });
    expect(batch.scope).toBe('standard');
    expect(batch.use_cache).toBe(true);
  });

  it('should only accept known scopes for invalidation', () => {
    expect(
      CacheInvalidateQuerySchema.safeParse({ client_id: 'c', case_id: 'k', scope: 'full' }).success
    ).toBe(false);
  });
});
