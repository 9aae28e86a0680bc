import {
  CaseIsolationError,
  ExternalServiceError,
  RateLimitError,
  createLogger,
  errorMessage,
  globalCircuitBreakerRegistry,
  withRetry,
  type CircuitBreaker,
  type CircuitBreakerRegistry,
} from '@casecontext/core';
import type { CaseGraphQuery, GraphInsights } from '@casecontext/domain';
import {
  GraphBuildResponseSchema,
  GraphCommunitySchema,
  GraphEntitySchema,
  GraphQueryResponseSchema,
  GraphRelationshipSchema,
  GraphStatsSchema,
  type GraphBuildResponse,
  type GraphCommunity,
  type GraphEntity,
  type GraphQueryMode,
  type GraphQueryResponse,
  type GraphRelationship,
  type GraphStats,
} from '@casecontext/types';
import { z } from 'zod';

const logger = createLogger({ name: 'graphrag' });

/**
 * GraphRAG knowledge graph service client
 *
 * Every call goes through the `graphrag` circuit breaker. Timeouts and
 * connection failures are retried with exponential backoff; HTTP errors are not.
 */

const SERVICE_NAME = 'GraphRAG';
export const GRAPHRAG_CIRCUIT_NAME = 'graphrag';

const SIMILAR_CASE_TYPES = new Set(['CASE_CITATION', 'CASE_LAW']);
const PRECEDENT_TYPES = new Set(['CASE_CITATION', 'CASE_LAW', 'LEGAL_DOCTRINE', 'HOLDING']);

export const GraphRAGClientConfigSchema = z.object({
  baseUrl: z
    .string()
    .url('GraphRAG base URL must be a valid URL')
    .default('http://localhost:8010')
    .transform((url) => url.replace(/\/+$/, '')),
  timeoutMs: z.number().int().min(100).max(300000).default(30000),
  maxRetries: z.number().int().min(0).max(10).default(3),
  retryDelayMs: z.number().int().min(0).max(30000).default(1000),
});

export type GraphRAGClientConfig = z.input<typeof GraphRAGClientConfigSchema>;

export interface GraphRAGClientOptions {
  /** Registry holding the `graphrag` breaker (default: the global registry) */
  circuitBreakerRegistry?: CircuitBreakerRegistry;
}

/**
 * Timeout or connection failure; the only kind of error that is retried
 */
export class GraphRAGTransportError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super(SERVICE_NAME, message, originalError);
    this.name = 'GraphRAGTransportError';
  }
}

type HttpMethod = 'GET' | 'POST' | 'DELETE';
type QueryValue = string | number | boolean | readonly string[] | undefined;

interface RequestOptions {
  body?: Record<string, unknown>;
  params?: Record<string, QueryValue>;
}

// ============================================
// Operation inputs
// ============================================

export interface CaseEntitiesQuery {
  clientId: string;
  caseId: string;
  entityType?: string;
  /** Default: 0.7 */
  minConfidence?: number;
  /** Default: 100 */
  limit?: number;
}

export interface CaseRelationshipsQuery {
  caseId: string;
  relationshipType?: string;
  minConfidence?: number;
  limit?: number;
}

export interface CaseCommunitiesQuery {
  clientId: string;
  caseId: string;
  /** Default: 3 */
  minSize?: number;
}

export interface GraphBuildOptions {
  enableDeduplication?: boolean;
  enableCommunityDetection?: boolean;
  enableCrossDocumentLinking?: boolean;
  enableAnalytics?: boolean;
  /** FULL mode summaries; LAZY mode when false */
  useAiSummaries?: boolean;
  leidenResolution?: number;
  minCommunitySize?: number;
  similarityThreshold?: number;
}

export interface CreateCaseGraphInput {
  documentId: string;
  caseId: string;
  clientId: string;
  markdownContent: string;
  entities: Record<string, unknown>[];
  citations?: Record<string, unknown>[];
  relationships?: Record<string, unknown>[];
  enhancedChunks?: Record<string, unknown>[];
  options?: GraphBuildOptions;
}

export interface LegalResearchQuery {
  clientId: string;
  query: string;
  jurisdiction?: string;
  searchType?: 'GLOBAL' | 'HYBRID';
  mode?: GraphQueryMode;
  relevanceBudget?: number;
  communityLevel?: number;
  vectorWeight?: number;
}

export interface SimilarCasesQuery {
  clientId: string;
  referenceCaseId: string;
  /** Default: 10 */
  maxResults?: number;
}

export interface PrecedentSearch {
  clientId: string;
  legalIssue: string;
  jurisdiction?: string;
  courtLevel?: string;
  /** Default: 20 */
  maxResults?: number;
}

export interface GraphStatsQuery {
  caseId?: string;
  clientId?: string;
  /** Default: true */
  includeDetails?: boolean;
}

export interface VisualizationQuery {
  clientId: string;
  caseId?: string;
  /** Default: 100 */
  maxNodes?: number;
  nodeTypes?: readonly string[];
}

export interface GraphRAGHealth {
  status: string;
  ready: boolean;
  error?: string;
  [key: string]: unknown;
}

// ============================================
// Response shapes
// ============================================

const EntityListSchema = z.object({ entities: z.array(GraphEntitySchema).default([]) });
const RelationshipListSchema = z.object({
  relationships: z.array(GraphRelationshipSchema).default([]),
});
const CommunityListSchema = z.object({ communities: z.array(GraphCommunitySchema).default([]) });

const CountRecordSchema = z.record(z.number()).default({});

const RawGraphStatsSchema = z.object({
  statistics: z
    .object({
      total_entities: z.number().int().default(0),
      total_relationships: z.number().int().default(0),
      total_communities: z.number().int().default(0),
      total_documents: z.number().int().default(0),
    })
    .default({}),
  entity_breakdown: CountRecordSchema,
  relationship_breakdown: CountRecordSchema,
  graph_metrics: CountRecordSchema,
  quality_metrics: CountRecordSchema,
});

const HealthResponseSchema = z
  .object({
    status: z.string().default('unknown'),
    ready: z.boolean().default(false),
    error: z.string().optional(),
  })
  .passthrough();

const JsonObjectSchema = z.record(z.unknown());

/**
 * GraphRAG client
 */
export class GraphRAGClient implements GraphInsights {
  private readonly config: z.output<typeof GraphRAGClientConfigSchema>;
  private readonly breaker: CircuitBreaker;

  constructor(config: GraphRAGClientConfig = {}, options: GraphRAGClientOptions = {}) {
    this.config = GraphRAGClientConfigSchema.parse(config);
    const registry = options.circuitBreakerRegistry ?? globalCircuitBreakerRegistry;
    this.breaker = registry.get(GRAPHRAG_CIRCUIT_NAME, {
      isFailure: (error) => !(error instanceof RateLimitError),
    });

    logger.info(
      {
        baseUrl: this.config.baseUrl,
        timeoutMs: this.config.timeoutMs,
        maxRetries: this.config.maxRetries,
      },
      'GraphRAG client initialized'
    );
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  // ============================================
  // Case-scoped operations
  // ============================================

  /**
   * Query the knowledge graph of one case
   */
  async queryCaseGraph(input: CaseGraphQuery): Promise<GraphQueryResponse> {
    requireCaseId(input.caseId, 'query_case_graph');

    const startedAt = Date.now();
    const body: Record<string, unknown> = {
      query: input.query,
      client_id: input.clientId,
      case_id: input.caseId,
      search_type: input.searchType ?? 'LOCAL',
      mode: input.mode ?? 'LAZY_GRAPHRAG',
      community_level: input.communityLevel ?? 2,
      vector_weight: input.vectorWeight ?? 0.7,
    };
    if (input.relevanceBudget !== undefined) body.relevance_budget = input.relevanceBudget;

    logger.info(
      { caseId: input.caseId, searchType: body.search_type, mode: body.mode },
      'Querying case graph'
    );

    const raw = await this.request('POST', '/api/v1/graphrag/query', { body });
    const result = this.parseQueryResponse(raw, startedAt);

    const unscoped = countUnscopedEntities(result.entities);
    if (unscoped > 0) {
      logger.warn(
        { caseId: input.caseId, count: unscoped },
        'Entities without case_id returned for a case query'
      );
    }

    return result;
  }

  async getCaseEntities(input: CaseEntitiesQuery): Promise<GraphEntity[]> {
    requireCaseId(input.caseId, 'get_case_entities');

    const raw = await this.request(
      'GET',
      `/api/v1/graphrag/entities/${encodeURIComponent(input.clientId)}`,
      {
        params: {
          case_id: input.caseId,
          min_confidence: input.minConfidence ?? 0.7,
          limit: input.limit ?? 100,
          entity_type: input.entityType,
        },
      }
    );

    const { entities } = parseResponse(EntityListSchema, raw, 'entities');
    logger.info({ caseId: input.caseId, count: entities.length }, 'Retrieved case entities');
    return entities;
  }

  async getCaseRelationships(input: CaseRelationshipsQuery): Promise<GraphRelationship[]> {
    requireCaseId(input.caseId, 'get_case_relationships');

    const filters: Record<string, unknown> = {
      case_id: input.caseId,
      confidence_threshold: input.minConfidence ?? 0.7,
    };
    if (input.relationshipType) filters.relationship_type = input.relationshipType;

    const raw = await this.request('POST', '/api/v1/graph/query', {
      body: { query_type: 'relationships', filters, max_results: input.limit ?? 100 },
    });

    const { relationships } = parseResponse(RelationshipListSchema, raw, 'relationships');
    logger.info(
      { caseId: input.caseId, count: relationships.length },
      'Retrieved case relationships'
    );
    return relationships;
  }

  async getCaseCommunities(input: CaseCommunitiesQuery): Promise<GraphCommunity[]> {
    requireCaseId(input.caseId, 'get_case_communities');

    const raw = await this.request('POST', '/api/v1/graph/query', {
      body: {
        query_type: 'communities',
        filters: {
          case_id: input.caseId,
          client_id: input.clientId,
          min_size: input.minSize ?? 3,
        },
        include_communities: true,
      },
    });

    const { communities } = parseResponse(CommunityListSchema, raw, 'communities');
    logger.info({ caseId: input.caseId, count: communities.length }, 'Retrieved case communities');
    return communities;
  }

  /**
   * Build the knowledge graph for a case document
   */
  async createCaseGraph(input: CreateCaseGraphInput): Promise<GraphBuildResponse> {
    requireCaseId(input.caseId, 'create_case_graph');

    const options = input.options ?? {};
    const body = {
      document_id: input.documentId,
      case_id: input.caseId,
      client_id: input.clientId,
      markdown_content: input.markdownContent,
      entities: input.entities,
      citations: input.citations ?? [],
      relationships: input.relationships ?? [],
      enhanced_chunks: input.enhancedChunks ?? [],
      graph_options: {
        enable_deduplication: options.enableDeduplication ?? true,
        enable_community_detection: options.enableCommunityDetection ?? true,
        enable_cross_document_linking: options.enableCrossDocumentLinking ?? true,
        enable_analytics: options.enableAnalytics ?? true,
        use_ai_summaries: options.useAiSummaries ?? false,
        leiden_resolution: options.leidenResolution ?? 1.0,
        min_community_size: options.minCommunitySize ?? 3,
        similarity_threshold: options.similarityThreshold ?? 0.85,
      },
      metadata: {
        processing_timestamp: new Date().toISOString(),
      },
    };

    logger.info(
      { documentId: input.documentId, caseId: input.caseId, entities: input.entities.length },
      'Creating case graph'
    );

    const raw = await this.request('POST', '/api/v1/graph/create', { body });
    const result = parseResponse(GraphBuildResponseSchema, raw, 'graph build');

    logger.info(
      { graphId: result.graph_id, processing: result.processing_results },
      'Case graph created'
    );
    return result;
  }

  // ============================================
  // Cross-case research
  // ============================================

  /**
   * Research query across all cases of a client (no case filter)
   */
  async queryLegalResearch(input: LegalResearchQuery): Promise<GraphQueryResponse> {
    const startedAt = Date.now();
    const body: Record<string, unknown> = {
      query: input.query,
      client_id: input.clientId,
      search_type: input.searchType ?? 'GLOBAL',
      mode: input.mode ?? 'LAZY_GRAPHRAG',
      community_level: input.communityLevel ?? 2,
      vector_weight: input.vectorWeight ?? 0.7,
    };
    if (input.relevanceBudget !== undefined) body.relevance_budget = input.relevanceBudget;
    if (input.jurisdiction) body.filters = { jurisdiction: input.jurisdiction };

    logger.info(
      { jurisdiction: input.jurisdiction, searchType: body.search_type },
      'Legal research query'
    );

    const raw = await this.request('POST', '/api/v1/graphrag/query', { body });
    const result = this.parseQueryResponse(raw, startedAt);

    logger.info(
      { entities: result.entities.length, executionTimeMs: result.execution_time_ms },
      'Legal research completed'
    );
    return result;
  }

  async findSimilarCases(input: SimilarCasesQuery): Promise<GraphEntity[]> {
    const maxResults = input.maxResults ?? 10;
    const response = await this.queryLegalResearch({
      clientId: input.clientId,
      query: `Find cases similar to case ${input.referenceCaseId} based on legal issues and entities`,
      searchType: 'GLOBAL',
    });

    const similar = response.entities.filter(
      (entity) =>
        SIMILAR_CASE_TYPES.has(entity.entity_type) && entity.case_id !== input.referenceCaseId
    );

    logger.info(
      { referenceCaseId: input.referenceCaseId, count: similar.length },
      'Found similar cases'
    );
    return similar.slice(0, maxResults);
  }

  async searchPrecedents(input: PrecedentSearch): Promise<GraphEntity[]> {
    const maxResults = input.maxResults ?? 20;
    let query = `Find legal precedents related to: ${input.legalIssue}`;
    if (input.jurisdiction) query += ` in ${input.jurisdiction} jurisdiction`;
    if (input.courtLevel) query += ` from ${input.courtLevel} court`;

    const response = await this.queryLegalResearch({
      clientId: input.clientId,
      query,
      jurisdiction: input.jurisdiction,
      searchType: 'GLOBAL',
    });

    const precedents = response.entities.filter((entity) => PRECEDENT_TYPES.has(entity.entity_type));
    logger.info({ count: precedents.length }, 'Found precedents');
    return precedents.slice(0, maxResults);
  }

  // ============================================
  // Graph-wide
  // ============================================

  async getGraphStats(input: GraphStatsQuery = {}): Promise<GraphStats> {
    const raw = await this.request('GET', '/api/v1/graph/stats', {
      params: {
        include_details: (input.includeDetails ?? true) ? 'true' : undefined,
        case_id: input.caseId,
        client_id: input.clientId,
      },
    });

    const { statistics, ...breakdowns } = parseResponse(RawGraphStatsSchema, raw, 'graph stats');
    return parseResponse(GraphStatsSchema, { ...statistics, ...breakdowns }, 'graph stats');
  }

  /**
   * Graph data laid out for visualization; passed through as returned
   */
  async getVisualizationData(input: VisualizationQuery): Promise<Record<string, unknown>> {
    const raw = await this.request(
      'GET',
      `/api/v1/graphrag/graph/visualization/${encodeURIComponent(input.clientId)}`,
      {
        params: {
          max_nodes: input.maxNodes ?? 100,
          case_id: input.caseId,
          node_types: input.nodeTypes,
        },
      }
    );
    return parseResponse(JsonObjectSchema, raw, 'visualization');
  }

  /**
   * Readiness of the GraphRAG service; never throws
   */
  async healthCheck(): Promise<GraphRAGHealth> {
    try {
      const raw = await this.send('GET', '/api/v1/health/ready', {});
      const health = parseResponse(HealthResponseSchema, raw, 'health');
      logger.info({ status: health.status }, 'GraphRAG service health');
      return health;
    } catch (error) {
      logger.error({ err: error }, 'GraphRAG health check failed');
      return { status: 'unhealthy', error: errorMessage(error), ready: false };
    }
  }

  // ============================================
  // Transport
  // ============================================

  private parseQueryResponse(raw: unknown, startedAt: number): GraphQueryResponse {
    const body = JsonObjectSchema.safeParse(raw);
    return parseResponse(
      GraphQueryResponseSchema,
      { ...(body.success ? body.data : {}), execution_time_ms: Date.now() - startedAt },
      'query'
    );
  }

  /**
   * Breaker → retry → single HTTP exchange
   */
  private request(method: HttpMethod, path: string, options: RequestOptions): Promise<unknown> {
    return this.breaker.execute(() =>
      withRetry(() => this.send(method, path, options), {
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.retryDelayMs,
        shouldRetry: (error) => error instanceof GraphRAGTransportError,
        onRetry: (error, attempt, delayMs) => {
          logger.warn(
            { err: error, attempt, maxRetries: this.config.maxRetries, delayMs, path },
            'GraphRAG request failed, retrying'
          );
        },
      })
    );
  }

  private async send(method: HttpMethod, path: string, options: RequestOptions): Promise<unknown> {
    const url = `${this.config.baseUrl}${path}${buildQueryString(options.params)}`;
    const timeoutMs = this.config.timeoutMs;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      const init: RequestInit = {
        method,
        signal: controller.signal,
        headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
      };
      if (options.body) init.body = JSON.stringify(options.body);
      response = await fetch(url, init);
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new GraphRAGTransportError(`Request timeout after ${timeoutMs}ms`, error);
      }
      throw new GraphRAGTransportError(
        `Connection failed for ${method} ${path}: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (response.status === 429) {
      const retryAfter = parseInt(response.headers.get('Retry-After') ?? '60', 10);
      throw new RateLimitError(Number.isNaN(retryAfter) ? 60 : retryAfter);
    }

    if (!response.ok) {
      const errorBody = await response.text();
      logger.error(
        { status: response.status, method, path, errorBody },
        'GraphRAG request failed'
      );
      throw new ExternalServiceError(SERVICE_NAME, `HTTP ${response.status} for ${method} ${path}`);
    }

    try {
      const json: unknown = await response.json();
      return json;
    } catch (error) {
      throw new ExternalServiceError(
        SERVICE_NAME,
        `Invalid JSON from ${method} ${path}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}

function requireCaseId(caseId: string, operation: string): void {
  if (!caseId) {
    const error = new CaseIsolationError(operation);
    logger.error({ operation }, error.message);
    throw error;
  }
}

/**
 * Entities with a missing or empty case_id
 */
export function countUnscopedEntities(entities: readonly GraphEntity[]): number {
  return entities.filter((entity) => !entity.case_id).length;
}

function parseResponse<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logger.error({ issues: parsed.error.issues, what }, 'Unexpected GraphRAG response');
    throw new ExternalServiceError(SERVICE_NAME, `Invalid ${what} response`, parsed.error);
  }
  return parsed.data;
}

/**
 * Undefined values are skipped; arrays become repeated parameters
 */
function buildQueryString(params: Record<string, QueryValue> | undefined): string {
  if (!params) return '';

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (typeof value === 'object') {
      for (const item of value) search.append(key, item);
    } else {
      search.append(key, String(value));
    }
  }

  const query = search.toString();
  return query ? `?${query}` : '';
}

/**
 * Create a configured GraphRAG client
 */
export function createGraphRAGClient(
  config: GraphRAGClientConfig = {},
  options: GraphRAGClientOptions = {}
): GraphRAGClient {
  return new GraphRAGClient(config, options);
}
