import { http, HttpResponse } from 'msw';

/**
 * MSW Handlers for External Service Mocks
 * Used in tests to mock the GraphRAG service and the Supabase REST API
 */

export const GRAPHRAG_TEST_URL = 'http://graphrag.test';
export const SUPABASE_TEST_URL = 'http://supabase.test';

type Row = Record<string, unknown>;

// =============================================================================
// Test Fixtures
// =============================================================================

export const testFixtures = {
  clientId: 'client-1',
  caseId: 'case-1',
  entities: [
    {
      entity_id: 'e-1',
      entity_text: 'Doe v. Acme',
      entity_type: 'case_citation',
      confidence_score: 0.95,
      case_id: 'case-1',
    },
    {
      entity_id: 'e-2',
      entity_text: 'Smith v. Jones',
      entity_type: 'CASE_LAW',
      confidence_score: 0.9,
      case_id: 'case-9',
    },
    {
      entity_id: 'e-3',
      entity_text: 'Res ipsa loquitur',
      entity_type: 'LEGAL_DOCTRINE',
      confidence_score: 0.85,
      case_id: null,
    },
    {
      entity_id: 'e-4',
      entity_text: 'Jane Doe',
      entity_type: 'PARTY',
      confidence_score: 0.99,
      case_id: 'case-1',
    },
  ],
  precedents: [
    { name: 'Smith v. Jones', citation: '1 F.4th 1', relevance: 0.9, category: 'supporting' },
    { name: 'Roe v. Co', relevance: 0.3, category: 'opposing' },
  ],
  relationships: [
    {
      relationship_id: 'r-1',
      source_entity_id: 'e-1',
      target_entity_id: 'e-2',
      relationship_type: 'CITES',
      confidence: 0.8,
      case_id: 'case-1',
    },
  ],
  communities: [
    {
      community_id: 'cm-1',
      title: 'Negligence',
      summary: 'Negligence cluster',
      size: 4,
      level: 1,
      entities: ['e-1', 'e-2'],
      coherence_score: 0.7,
    },
  ],
  tables: {
    client_cases: [
      {
        id: 'case-1',
        client_id: 'client-1',
        case_name: 'Doe v. Acme',
        status: 'active',
        jurisdiction: 'California',
        court: 'Superior Court',
        venue: 'San Francisco',
        filing_date: '2025-01-01',
        created_by: 'ignored-column',
      },
    ],
    nodes: [
      {
        node_id: 'p-1',
        client_id: 'client-1',
        case_id: 'case-1',
        entity_type: 'PARTY',
        properties: { name: 'Jane Doe', role: 'plaintiff' },
      },
      {
        node_id: 'j-1',
        client_id: 'client-1',
        case_id: 'case-1',
        entity_type: 'JUDGE',
        properties: null,
      },
      {
        node_id: 'c-1',
        client_id: 'client-1',
        case_id: 'case-1',
        entity_type: 'CAUSE_OF_ACTION',
        properties: { name: 'Negligence' },
      },
      {
        node_id: 'p-9',
        client_id: 'client-1',
        case_id: 'case-9',
        entity_type: 'PARTY',
        properties: { name: 'Other', role: 'defendant' },
      },
    ],
    edges: [
      { source_node_id: 'p-1', target_node_id: 'j-1', client_id: 'client-1', case_id: 'case-1' },
    ],
    case_timeline_events: [
      {
        case_id: 'case-1',
        client_id: 'client-1',
        event_date: '2025-02-01',
        event_type: 'answer',
        description: null,
      },
      {
        case_id: 'case-1',
        client_id: 'client-1',
        event_date: '2025-01-01',
        event_type: 'filing',
        description: 'Complaint filed',
      },
    ],
    case_deadlines: [
      {
        case_id: 'case-1',
        client_id: 'client-1',
        deadline_date: '2025-03-05',
        deadline_type: 'motion',
        description: 'Opposition due',
        is_met: null,
        priority: null,
      },
    ],
    case_legal_theories: [
      {
        id: 't-1',
        case_id: 'case-1',
        client_id: 'client-1',
        name: 'Negligence per se',
        description: null,
        strength: null,
        supporting_precedents: null,
      },
    ],
    cached_contexts: [
      {
        cache_key: 'context:client-1:case-1:standard:abcd1234',
        payload: { case_id: 'case-1' },
        expires_at: '2099-01-01T00:00:00.000Z',
      },
      {
        cache_key: 'context:client-1:case-1:minimal:abcd1234',
        payload: { case_id: 'case-1' },
        expires_at: '2000-01-01T00:00:00.000Z',
      },
    ],
  } satisfies Record<string, Row[]>,
};

// =============================================================================
// GraphRAG Mocks
// =============================================================================

const graphragHandlers = [
  http.post(`${GRAPHRAG_TEST_URL}/api/v1/graphrag/query`, async ({ request }) => {
    const body = (await request.json()) as { query?: string; search_type?: string };
    const global = body.search_type === 'GLOBAL';

    return HttpResponse.json({
      query: body.query ?? '',
      search_type: body.search_type ?? 'LOCAL',
      mode: 'LAZY_GRAPHRAG',
      response: global ? 'Research summary' : 'Case summary',
      entities: testFixtures.entities,
      relationships: testFixtures.relationships,
      communities: null,
      metadata: {},
      ...(global ? { precedents: testFixtures.precedents } : {}),
    });
  }),

  http.get(`${GRAPHRAG_TEST_URL}/api/v1/graphrag/entities/:clientId`, ({ request }) => {
    const entityType = new URL(request.url).searchParams.get('entity_type');
    const entities = entityType
      ? testFixtures.entities.filter((e) => e.entity_type.toUpperCase() === entityType)
      : testFixtures.entities;
    return HttpResponse.json({ entities });
  }),

  http.post(`${GRAPHRAG_TEST_URL}/api/v1/graph/query`, async ({ request }) => {
    const body = (await request.json()) as { query_type?: string };
    if (body.query_type === 'communities') {
      return HttpResponse.json({ communities: testFixtures.communities });
    }
    return HttpResponse.json({ relationships: testFixtures.relationships });
  }),

  http.post(`${GRAPHRAG_TEST_URL}/api/v1/graph/create`, async ({ request }) => {
    const body = (await request.json()) as { case_id: string; client_id: string };
    return HttpResponse.json({
      success: true,
      graph_id: 'graph-1',
      case_id: body.case_id,
      client_id: body.client_id,
      processing_results: { entities_processed: 4, communities_detected: 1 },
      processing_time_seconds: 1.5,
      timestamp: '2025-03-01T00:00:00Z',
    });
  }),

  http.get(`${GRAPHRAG_TEST_URL}/api/v1/graph/stats`, () => {
    return HttpResponse.json({
      statistics: { total_entities: 120, total_relationships: 300 },
      entity_breakdown: { PARTY: 20 },
    });
  }),

  http.get(`${GRAPHRAG_TEST_URL}/api/v1/health/ready`, () => {
    return HttpResponse.json({ status: 'healthy', ready: true, version: '2.1.0' });
  }),

  http.get(`${GRAPHRAG_TEST_URL}/api/v1/graphrag/graph/visualization/:clientId`, ({ request }) => {
    const params = new URL(request.url).searchParams;
    return HttpResponse.json({
      nodes: [],
      edges: [],
      metadata: {
        max_nodes: params.get('max_nodes'),
        node_types: params.getAll('node_types'),
      },
    });
  }),
];

// =============================================================================
// Supabase (PostgREST) Mocks
// =============================================================================

/**
 * Minimal PostgREST filter support: eq, gt, in
 */
function matchesFilter(row: Row, column: string, filter: string): boolean {
  const value = row[column];
  if (filter.startsWith('eq.')) return String(value) === filter.slice(3);
  if (filter.startsWith('gt.')) return typeof value === 'string' && value > filter.slice(3);
  if (filter.startsWith('in.(')) {
    const options = filter
      .slice(4, -1)
      .split(',')
      .map((option) => option.replace(/^"|"$/g, ''));
    return options.includes(String(value));
  }
  return true;
}

const RESERVED_PARAMS = new Set(['select', 'order', 'limit', 'offset', 'on_conflict', 'columns']);

function selectRows(table: string, url: URL): Row[] {
  const tables: Record<string, Row[]> = testFixtures.tables;
  let rows = tables[table] ?? [];

  for (const [column, filter] of url.searchParams.entries()) {
    if (RESERVED_PARAMS.has(column)) continue;
    rows = rows.filter((row) => matchesFilter(row, column, filter));
  }

  const order = url.searchParams.get('order');
  if (order) {
    const [column = '', direction] = order.split('.');
    const sign = direction === 'desc' ? -1 : 1;
    rows = [...rows].sort((a, b) => sign * String(a[column]).localeCompare(String(b[column])));
  }

  return rows;
}

const supabaseHandlers = [
  http.get(`${SUPABASE_TEST_URL}/rest/v1/:table`, ({ params, request }) => {
    return HttpResponse.json(selectRows(String(params.table), new URL(request.url)));
  }),

  http.head(`${SUPABASE_TEST_URL}/rest/v1/:table`, ({ params, request }) => {
    const count = selectRows(String(params.table), new URL(request.url)).length;
    return new HttpResponse(null, {
      status: 200,
      headers: { 'Content-Range': `0-${Math.max(0, count - 1)}/${count}` },
    });
  }),

  http.post(`${SUPABASE_TEST_URL}/rest/v1/:table`, () => {
    return new HttpResponse(null, { status: 201 });
  }),

  http.delete(`${SUPABASE_TEST_URL}/rest/v1/:table`, ({ params, request }) => {
    const count = selectRows(String(params.table), new URL(request.url)).length;
    return new HttpResponse(null, {
      status: 204,
      headers: { 'Content-Range': `*/${count}` },
    });
  }),
];

export const handlers = [...graphragHandlers, ...supabaseHandlers];

// =============================================================================
// Handler Factories
// =============================================================================

/**
 * Creates a handler that answers 429 on every call
 */
export function createRateLimitedHandler(
  url: string,
  method: 'get' | 'post' = 'post',
  retryAfter = 5
) {
  return http[method](url, () => {
    return new HttpResponse(null, {
      status: 429,
      headers: { 'Retry-After': String(retryAfter) },
    });
  });
}

/**
 * Creates a handler that fails N times then returns the given body
 */
export function createFailingHandler(
  url: string,
  options: {
    method?: 'get' | 'post';
    failCount?: number;
    errorStatus?: number;
    body?: Record<string, unknown>;
  } = {}
) {
  const { method = 'post', failCount = 2, errorStatus = 503, body = { success: true } } = options;
  let callCount = 0;
  return http[method](url, () => {
    callCount++;
    if (callCount <= failCount) {
      return new HttpResponse('Service Unavailable', { status: errorStatus });
    }
    return HttpResponse.json(body);
  });
}

/**
 * Creates a handler that drops the connection N times then returns the given body
 */
export function createNetworkErrorHandler(
  url: string,
  options: { method?: 'get' | 'post'; failCount?: number; body?: Record<string, unknown> } = {}
) {
  const { method = 'post', failCount = 1, body = { success: true } } = options;
  let callCount = 0;
  return http[method](url, () => {
    callCount++;
    if (callCount <= failCount) {
      return HttpResponse.error();
    }
    return HttpResponse.json(body);
  });
}
