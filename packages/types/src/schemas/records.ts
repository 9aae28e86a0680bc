/**
 * Persistence rows read from the case database
 *
 * Columns the engine does not use are stripped on parse.
 */
import { z } from 'zod';

const OptionalText = z.string().nullish();

/**
 * client.client_cases row
 */
export const CaseRecordSchema = z.object({
  id: z.string(),
  client_id: z.string(),
  case_name: OptionalText,
  status: OptionalText.describe('open, active, closed, ...'),
  jurisdiction: OptionalText,
  court: OptionalText,
  venue: OptionalText,
  judge_chambers: OptionalText,
  filing_date: OptionalText,
  incident_date: OptionalText,
  discovery_cutoff: OptionalText,
  motion_deadline: OptionalText,
  trial_date: OptionalText,
  statute_of_limitations: OptionalText,
});

/**
 * graph.nodes row
 */
export const GraphNodeRecordSchema = z.object({
  node_id: z.string(),
  client_id: OptionalText,
  case_id: OptionalText,
  entity_type: z.string(),
  properties: z.record(z.unknown()).nullish().transform((value) => value ?? {}),
});

/**
 * graph.edges row
 */
export const GraphEdgeRecordSchema = z.object({
  source_node_id: z.string(),
  target_node_id: z.string(),
  relationship_type: OptionalText,
  client_id: OptionalText,
  case_id: OptionalText,
});

/**
 * client.case_timeline_events row
 */
export const TimelineEventRecordSchema = z.object({
  id: OptionalText,
  client_id: OptionalText,
  case_id: z.string(),
  event_date: z.string(),
  event_type: z.string(),
  description: z.string().nullish().transform((value) => value ?? ''),
});

/**
 * client.case_deadlines row
 */
export const DeadlineRecordSchema = z.object({
  id: OptionalText,
  client_id: OptionalText,
  case_id: z.string(),
  deadline_date: z.string(),
  deadline_type: z.string(),
  description: z.string().nullish().transform((value) => value ?? ''),
  is_met: z.boolean().nullish().transform((value) => value ?? false),
  priority: z.enum(['low', 'medium', 'high', 'critical']).nullish().transform((value) => value ?? 'medium'),
});

/**
 * client.case_legal_theories row
 */
export const LegalTheoryRecordSchema = z.object({
  id: z.string(),
  client_id: OptionalText,
  case_id: z.string(),
  name: z.string(),
  description: z.string().nullish().transform((value) => value ?? ''),
  strength: z.number().min(0).max(1).nullish().transform((value) => value ?? 0.5),
  supporting_precedents: z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []),
});

export type CaseRecord = z.infer<typeof CaseRecordSchema>;
export type GraphNodeRecord = z.infer<typeof GraphNodeRecordSchema>;
export type GraphEdgeRecord = z.infer<typeof GraphEdgeRecordSchema>;
export type TimelineEventRecord = z.infer<typeof TimelineEventRecordSchema>;
export type DeadlineRecord = z.infer<typeof DeadlineRecordSchema>;
export type LegalTheoryRecord = z.infer<typeof LegalTheoryRecordSchema>;
