/**
 * GraphRAG service models
 *
 * Responses of the knowledge graph service are parsed with these schemas
 * before they reach the analyzers.
 */
import { z } from 'zod';

export const GRAPH_SEARCH_TYPES = ['LOCAL', 'GLOBAL', 'HYBRID'] as const;
export const GRAPH_QUERY_MODES = ['FULL_GRAPHRAG', 'LAZY_GRAPHRAG', 'HYBRID_MODE'] as const;

export const GraphSearchTypeSchema = z.enum(GRAPH_SEARCH_TYPES);
export const GraphQueryModeSchema = z.enum(GRAPH_QUERY_MODES);

const ConfidenceSchema = z.number().min(0).max(1);

export const GraphEntitySchema = z.object({
  entity_id: z.string(),
  entity_text: z.string(),
  entity_type: z
    .string()
    .transform((value) => value.toUpperCase())
    .describe('CASE_CITATION, COURT, PARTY, ...'),
  confidence_score: ConfidenceSchema,
  document_ids: z.array(z.string()).default([]),
  case_id: z.string().nullish().transform((value) => value ?? null),
  properties: z.record(z.unknown()).default({}),
  metadata: z.record(z.unknown()).default({}),
});

export const GraphRelationshipSchema = z.object({
  relationship_id: z.string(),
  source_entity_id: z.string(),
  target_entity_id: z.string(),
  relationship_type: z.string().describe('CITES, DECIDED_CASE, ...'),
  confidence: ConfidenceSchema,
  case_id: z.string().nullish().transform((value) => value ?? null),
  context: z.string().nullish().transform((value) => value ?? null),
  metadata: z.record(z.unknown()).default({}),
});

export const GraphCommunitySchema = z.object({
  community_id: z.string(),
  title: z.string(),
  summary: z.string(),
  size: z.number().int().min(0),
  level: z.number().int().min(0),
  entities: z.array(z.string()).default([]),
  coherence_score: ConfidenceSchema,
  key_relationships: z.array(z.string()).default([]),
  client_id: z.string().nullish().transform((value) => value ?? null),
});

/**
 * Precedent as returned by a GLOBAL search. Every field is optional on the
 * wire; the WHY analyzer fills in defaults.
 */
export const RawPrecedentSchema = z.object({
  name: z.string().optional(),
  citation: z.string().optional(),
  relevance: z.number().min(0).max(1).optional(),
  holding: z.string().optional(),
  distinguishing_factors: z.array(z.string()).optional(),
  category: z.string().optional(),
});

export const GraphQueryResponseSchema = z.object({
  query: z.string(),
  search_type: z.string(),
  mode: z.string(),
  response: z.string(),
  entities: z.array(GraphEntitySchema).default([]),
  relationships: z.array(GraphRelationshipSchema).default([]),
  communities: z
    .array(GraphCommunitySchema)
    .nullish()
    .transform((value) => value ?? null),
  metadata: z.record(z.unknown()).default({}),
  precedents: z.array(RawPrecedentSchema).optional(),
  execution_time_ms: z.number().int().min(0),
});

export const GraphStatsSchema = z.object({
  total_entities: z.number().int().min(0),
  total_relationships: z.number().int().min(0),
  total_communities: z.number().int().min(0),
  total_documents: z.number().int().min(0),
  entity_breakdown: z.record(z.number()).default({}),
  relationship_breakdown: z.record(z.number()).default({}),
  graph_metrics: z.record(z.number()).default({}),
  quality_metrics: z.record(z.number()).default({}),
});

export const GraphBuildResponseSchema = z.object({
  success: z.boolean(),
  graph_id: z.string(),
  case_id: z.string().nullish().transform((value) => value ?? null),
  client_id: z.string(),
  processing_results: z.record(z.number()).default({}),
  graph_metrics: z.record(z.number()).default({}),
  quality_metrics: z.record(z.number()).default({}),
  communities: z.array(GraphCommunitySchema).default([]),
  processing_time_seconds: z.number().min(0),
  timestamp: z.string(),
});

export type GraphSearchType = z.infer<typeof GraphSearchTypeSchema>;
export type GraphQueryMode = z.infer<typeof GraphQueryModeSchema>;
export type GraphEntity = z.infer<typeof GraphEntitySchema>;
export type GraphRelationship = z.infer<typeof GraphRelationshipSchema>;
export type GraphCommunity = z.infer<typeof GraphCommunitySchema>;
export type RawPrecedent = z.infer<typeof RawPrecedentSchema>;
export type GraphQueryResponse = z.infer<typeof GraphQueryResponseSchema>;
export type GraphStats = z.infer<typeof GraphStatsSchema>;
export type GraphBuildResponse = z.infer<typeof GraphBuildResponseSchema>;
