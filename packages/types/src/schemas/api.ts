/**
 * Request schemas for the HTTP API
 *
 * Scope and dimension stay plain strings here; the context builder validates
 * them so callers get the list of valid values in the error message.
 */
import { z } from 'zod';
import { ContextScopeSchema } from './dimensions.js';

export const MAX_BATCH_CASES = 100;

const IdSchema = z.string().min(1);

/**
 * Query string booleans arrive as "true" / "false"
 */
export const QueryBooleanSchema = z.preprocess((value) => {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}, z.boolean());

const CaseIdListSchema = z
  .array(IdSchema)
  .min(1)
  .max(MAX_BATCH_CASES)
  .describe(`Between 1 and ${MAX_BATCH_CASES} case ids`);

export const ContextRetrieveRequestSchema = z.object({
  client_id: IdSchema,
  case_id: IdSchema,
  scope: z.string().default('comprehensive'),
  include_dimensions: z.array(z.string()).optional(),
  use_cache: z.boolean().default(true),
});

export const ContextRetrieveQuerySchema = z.object({
  client_id: IdSchema,
  case_id: IdSchema,
  scope: z.string().default('comprehensive'),
  use_cache: QueryBooleanSchema.default(true),
});

export const DimensionRequestSchema = z.object({
  client_id: IdSchema,
  case_id: IdSchema,
  dimension: z.string().min(1).describe('WHO, WHAT, WHERE, WHEN or WHY'),
});

export const ContextRefreshQuerySchema = z.object({
  client_id: IdSchema,
  case_id: IdSchema,
  scope: z.string().default('comprehensive'),
});

export const BatchContextRequestSchema = z.object({
  client_id: IdSchema,
  case_ids: CaseIdListSchema,
  scope: z.string().default('standard'),
  use_cache: z.boolean().default(true),
});

export const CacheInvalidateQuerySchema = z.object({
  client_id: IdSchema,
  case_id: IdSchema,
  scope: ContextScopeSchema.optional(),
});

export const CaseCacheInvalidateQuerySchema = z.object({
  client_id: IdSchema,
  case_id: IdSchema,
});

export const CacheWarmupRequestSchema = z.object({
  client_id: IdSchema,
  case_ids: CaseIdListSchema,
  scope: z.string().default('standard'),
});

export type ContextRetrieveRequest = z.infer<typeof ContextRetrieveRequestSchema>;
export type ContextRetrieveQuery = z.infer<typeof ContextRetrieveQuerySchema>;
export type DimensionRequest = z.infer<typeof DimensionRequestSchema>;
export type ContextRefreshQuery = z.infer<typeof ContextRefreshQuerySchema>;
export type BatchContextRequest = z.infer<typeof BatchContextRequestSchema>;
export type CacheInvalidateQuery = z.infer<typeof CacheInvalidateQuerySchema>;
export type CaseCacheInvalidateQuery = z.infer<typeof CaseCacheInvalidateQuerySchema>;
export type CacheWarmupRequest = z.infer<typeof CacheWarmupRequestSchema>;
