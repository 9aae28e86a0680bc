/**
 * Assembled context and per-dimension quality
 */
import { z } from 'zod';
import {
  IsoDateSchema,
  WhatContextSchema,
  WhenContextSchema,
  WhereContextSchema,
  WhoContextSchema,
  WhyContextSchema,
} from './dimensions.js';

/**
 * Score at or above which a context (or a single dimension) counts as complete
 */
export const COMPLETENESS_THRESHOLD = 0.85;

export const ContextResponseSchema = z.object({
  query_id: z.string().uuid(),
  case_id: z.string(),
  case_name: z.string(),
  who: WhoContextSchema.nullable().default(null),
  what: WhatContextSchema.nullable().default(null),
  where: WhereContextSchema.nullable().default(null),
  when: WhenContextSchema.nullable().default(null),
  why: WhyContextSchema.nullable().default(null),
  context_score: z.number().min(0).max(1),
  is_complete: z.boolean(),
  cached: z.boolean().default(false),
  execution_time_ms: z.number().int().min(0),
  timestamp: IsoDateSchema,
});

/**
 * is_sufficient is derived; any value supplied for it is replaced
 */
export const DimensionQualityMetricsSchema = z
  .object({
    dimension_name: z.string(),
    completeness_score: z.number().min(0).max(1),
    data_points: z.number().int().min(0),
    confidence_avg: z.number().min(0).max(1),
    is_sufficient: z.boolean().optional(),
  })
  .transform((metrics) => ({
    ...metrics,
    is_sufficient: metrics.completeness_score >= COMPLETENESS_THRESHOLD,
  }));

export type ContextResponse = z.infer<typeof ContextResponseSchema>;
export type DimensionQualityMetrics = z.infer<typeof DimensionQualityMetricsSchema>;
