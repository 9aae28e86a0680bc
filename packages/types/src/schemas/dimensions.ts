/**
 * Context dimension models: WHO, WHAT, WHERE, WHEN, WHY
 *
 * Field names are snake_case because these objects are served over HTTP
 * and cached as JSON unchanged.
 */
import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export const DIMENSIONS = ['WHO', 'WHAT', 'WHERE', 'WHEN', 'WHY'] as const;
export const DimensionSchema = z.enum(DIMENSIONS).describe('Context dimension');

export const CONTEXT_SCOPES = ['minimal', 'standard', 'comprehensive'] as const;
export const ContextScopeSchema = z.enum(CONTEXT_SCOPES).describe('Context retrieval scope');

const ScoreSchema = z.number().min(0).max(1);

/**
 * ISO 8601 date or date-time string
 */
export const IsoDateSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'Invalid ISO date')
  .describe('ISO 8601 date or date-time');

// =============================================================================
// WHO
// =============================================================================

export const PARTY_ROLES = [
  'plaintiff',
  'defendant',
  'third_party',
  'intervenor',
  'petitioner',
  'respondent',
  'appellant',
  'appellee',
] as const;

export const PartyRoleSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.toLowerCase() : value),
  z.enum(PARTY_ROLES)
);

export const PartySchema = z.object({
  id: z.string().default(() => randomUUID()),
  name: z.string(),
  role: PartyRoleSchema,
  entity_type: z.string().default('person').describe('person, corporation, government, ...'),
  case_id: z.string(),
  metadata: z.record(z.unknown()).default({}),
});

export const JudgeSchema = z.object({
  id: z.string(),
  name: z.string(),
  court: z.string(),
  case_id: z.string(),
  assignment_date: IsoDateSchema.nullable().default(null),
  history_with_parties: z
    .record(z.number().int().min(0))
    .default({})
    .describe('Prior rulings per party id'),
});

export const AttorneySchema = z.object({
  id: z.string(),
  name: z.string(),
  firm: z.string().nullable().default(null),
  bar_number: z.string().nullable().default(null),
  representing: z.array(z.string()).default([]).describe('Party ids represented'),
  case_id: z.string(),
});

export const WitnessSchema = z.object({
  id: z.string(),
  name: z.string(),
  witness_type: z.string().default('fact').describe('fact, expert, character'),
  representing_party: z.string().nullable().default(null),
  case_id: z.string(),
  expertise: z.string().nullable().default(null),
});

export const WhoContextSchema = z.object({
  case_id: z.string(),
  case_name: z.string(),
  parties: z.array(PartySchema).default([]),
  judges: z.array(JudgeSchema).default([]),
  attorneys: z.array(AttorneySchema).default([]),
  witnesses: z.array(WitnessSchema).default([]),
  party_relationships: z.record(z.array(z.string())).default({}),
  representation_map: z.record(z.string()).default({}).describe('party_id -> attorney_id'),
});

// =============================================================================
// WHAT
// =============================================================================

export const CitationSchema = z.object({
  text: z.string(),
  type: z.enum(['statute', 'case_law']),
  jurisdiction: z.string(),
  confidence: ScoreSchema,
  case_id: z.string().nullable().default(null),
});

export const CauseOfActionSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  elements: z.array(z.string()).default([]),
  case_id: z.string(),
});

export const WhatContextSchema = z.object({
  case_id: z.string(),
  case_name: z.string(),
  causes_of_action: z.array(CauseOfActionSchema).default([]),
  legal_issues: z.array(z.string()).default([]),
  doctrines: z.array(z.string()).default([]),
  statutes: z.array(CitationSchema).default([]),
  case_citations: z.array(CitationSchema).default([]),
  primary_legal_theory: z.string().nullable().default(null),
  issue_complexity: ScoreSchema.default(0.5),
  jurisdiction_type: z.string().default('federal'),
});

// =============================================================================
// WHERE
// =============================================================================

export const LocalRuleSchema = z.object({
  rule_number: z.string(),
  description: z.string(),
  jurisdiction: z.string(),
});

export const WhereContextSchema = z.object({
  case_id: z.string(),
  case_name: z.string(),
  primary_jurisdiction: z.string(),
  court: z.string(),
  venue: z.string(),
  judge_chambers: z.string().nullable().default(null),
  local_rules: z.array(LocalRuleSchema).default([]),
  filing_requirements: z.array(z.string()).default([]),
  related_proceedings: z.array(z.string()).default([]),
});

// =============================================================================
// WHEN
// =============================================================================

export const DEADLINE_PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;

export const TimelineEventSchema = z.object({
  date: IsoDateSchema,
  event_type: z.string(),
  description: z.string(),
  case_id: z.string(),
});

export const DeadlineSchema = z.object({
  deadline_date: IsoDateSchema,
  deadline_type: z.string(),
  description: z.string(),
  case_id: z.string(),
  is_met: z.boolean().default(false),
  priority: z.enum(DEADLINE_PRIORITIES).default('medium'),
});

export const WhenContextSchema = z.object({
  case_id: z.string(),
  case_name: z.string(),
  filing_date: IsoDateSchema,
  incident_date: IsoDateSchema.nullable().default(null),
  timeline: z.array(TimelineEventSchema).default([]),
  upcoming_deadlines: z.array(DeadlineSchema).default([]),
  past_deadlines: z.array(DeadlineSchema).default([]),
  discovery_cutoff: IsoDateSchema.nullable().default(null),
  motion_deadline: IsoDateSchema.nullable().default(null),
  trial_date: IsoDateSchema.nullable().default(null),
  statute_of_limitations: IsoDateSchema.nullable().default(null),
  days_until_next_deadline: z.number().int().nullable().default(null),
  urgency_score: ScoreSchema.default(0.5),
  case_age_days: z.number().int().min(0),
});

// =============================================================================
// WHY
// =============================================================================

export const PrecedentAnalysisSchema = z.object({
  case_name: z.string(),
  citation: z.string(),
  relevance_score: ScoreSchema,
  holding: z.string(),
  distinguishing_factors: z.array(z.string()).default([]),
  favorability: z.enum(['supporting', 'opposing', 'neutral']),
});

export const LegalTheorySchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  strength: ScoreSchema,
  supporting_precedents: z.array(z.string()).default([]),
  case_id: z.string(),
});

export const WhyContextSchema = z.object({
  case_id: z.string(),
  case_name: z.string(),
  legal_theories: z.array(LegalTheorySchema).default([]),
  argument_outline: z.array(z.string()).default([]),
  supporting_precedents: z.array(PrecedentAnalysisSchema).default([]),
  opposing_precedents: z.array(PrecedentAnalysisSchema).default([]),
  distinguishing_factors: z.array(z.string()).default([]),
  argument_strength: ScoreSchema.default(0.5),
  risk_factors: z.array(z.string()).default([]),
  mitigation_strategies: z.array(z.string()).default([]),
  similar_case_outcomes: z.record(z.string()).default({}),
  judge_ruling_patterns: z.record(z.string()).default({}),
});

export type Dimension = z.infer<typeof DimensionSchema>;
export type ContextScope = z.infer<typeof ContextScopeSchema>;
export type PartyRole = (typeof PARTY_ROLES)[number];
export type Party = z.infer<typeof PartySchema>;
export type Judge = z.infer<typeof JudgeSchema>;
export type Attorney = z.infer<typeof AttorneySchema>;
export type Witness = z.infer<typeof WitnessSchema>;
export type WhoContext = z.infer<typeof WhoContextSchema>;
export type Citation = z.infer<typeof CitationSchema>;
export type CauseOfAction = z.infer<typeof CauseOfActionSchema>;
export type WhatContext = z.infer<typeof WhatContextSchema>;
export type LocalRule = z.infer<typeof LocalRuleSchema>;
export type WhereContext = z.infer<typeof WhereContextSchema>;
export type TimelineEvent = z.infer<typeof TimelineEventSchema>;
export type Deadline = z.infer<typeof DeadlineSchema>;
export type WhenContext = z.infer<typeof WhenContextSchema>;
export type PrecedentAnalysis = z.infer<typeof PrecedentAnalysisSchema>;
export type LegalTheory = z.infer<typeof LegalTheorySchema>;
export type WhyContext = z.infer<typeof WhyContextSchema>;
