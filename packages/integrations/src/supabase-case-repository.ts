/**
 * @fileoverview SupabaseCaseRepository
 *
 * CaseRepository over the case database. Case rows, timelines, deadlines
 * and theories live in the `client` schema; the knowledge graph mirror in
 * the `graph` schema. Every query filters by client and case.
 *
 * @module integrations/supabase-case-repository
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { DatabaseOperationError, createLogger } from '@casecontext/core';
import type { CaseRepository } from '@casecontext/domain';
import {
  CaseRecordSchema,
  DeadlineRecordSchema,
  GraphEdgeRecordSchema,
  GraphNodeRecordSchema,
  LegalTheoryRecordSchema,
  TimelineEventRecordSchema,
  type CaseRecord,
  type DeadlineRecord,
  type GraphEdgeRecord,
  type GraphNodeRecord,
  type LegalTheoryRecord,
  type TimelineEventRecord,
} from '@casecontext/types';
import { z } from 'zod';

const logger = createLogger({ name: 'supabase-case-repository' });

// ============================================================================
// TYPES
// ============================================================================

interface PostgrestErrorLike {
  message: string;
  code?: string;
}

interface QueryResult {
  data: unknown;
  error: PostgrestErrorLike | null;
}

export interface SupabaseCaseRepositoryDeps {
  supabase: SupabaseClient;
}

// ============================================================================
// REPOSITORY IMPLEMENTATION
// ============================================================================

export class SupabaseCaseRepository implements CaseRepository {
  private readonly supabase: SupabaseClient;

  constructor(deps: SupabaseCaseRepositoryDeps) {
    this.supabase = deps.supabase;
  }

  async getCase(clientId: string, caseId: string): Promise<CaseRecord | null> {
    const result = await this.supabase
      .schema('client')
      .from('client_cases')
      .select('*')
      .eq('client_id', clientId)
      .eq('id', caseId)
      .maybeSingle();

    const data = this.unwrap('getCase', result);
    return data === null ? null : parseRows(CaseRecordSchema, [data], 'client_cases')[0] ?? null;
  }

  async findGraphNodes(
    clientId: string,
    caseId: string,
    entityTypes: readonly string[]
  ): Promise<GraphNodeRecord[]> {
    const result = await this.supabase
      .schema('graph')
      .from('nodes')
      .select('*')
      .eq('client_id', clientId)
      .eq('case_id', caseId)
      .in('entity_type', [...entityTypes]);

    return parseRows(GraphNodeRecordSchema, this.unwrapList('findGraphNodes', result), 'nodes');
  }

  async findGraphEdges(clientId: string, caseId: string): Promise<GraphEdgeRecord[]> {
    const result = await this.supabase
      .schema('graph')
      .from('edges')
      .select('*')
      .eq('client_id', clientId)
      .eq('case_id', caseId);

    return parseRows(GraphEdgeRecordSchema, this.unwrapList('findGraphEdges', result), 'edges');
  }

  async findTimelineEvents(clientId: string, caseId: string): Promise<TimelineEventRecord[]> {
    const result = await this.supabase
      .schema('client')
      .from('case_timeline_events')
      .select('*')
      .eq('client_id', clientId)
      .eq('case_id', caseId)
      .order('event_date', { ascending: true });

    return parseRows(
      TimelineEventRecordSchema,
      this.unwrapList('findTimelineEvents', result),
      'case_timeline_events'
    );
  }

  async findDeadlines(clientId: string, caseId: string): Promise<DeadlineRecord[]> {
    const result = await this.supabase
      .schema('client')
      .from('case_deadlines')
      .select('*')
      .eq('client_id', clientId)
      .eq('case_id', caseId)
      .order('deadline_date', { ascending: true });

    return parseRows(
      DeadlineRecordSchema,
      this.unwrapList('findDeadlines', result),
      'case_deadlines'
    );
  }

  async findLegalTheories(clientId: string, caseId: string): Promise<LegalTheoryRecord[]> {
    const result = await this.supabase
      .schema('client')
      .from('case_legal_theories')
      .select('*')
      .eq('client_id', clientId)
      .eq('case_id', caseId);

    return parseRows(
      LegalTheoryRecordSchema,
      this.unwrapList('findLegalTheories', result),
      'case_legal_theories'
    );
  }

  /**
   * Round trip to the database; used by dependency health
   */
  async ping(): Promise<void> {
    const result = await this.supabase
      .schema('graph')
      .from('nodes')
      .select('node_id', { count: 'exact', head: true })
      .limit(1);

    this.unwrap('ping', result);
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private unwrap(operation: string, result: QueryResult): unknown {
    if (result.error) {
      logger.error({ operation, code: result.error.code, error: result.error.message }, 'Query failed');
      throw new DatabaseOperationError(operation, result.error.message);
    }
    return result.data;
  }

  private unwrapList(operation: string, result: QueryResult): unknown[] {
    const data = this.unwrap(operation, result);
    return Array.isArray(data) ? data : [];
  }
}

/**
 * Parse rows, skipping (and logging) any that do not match the schema
 */
function parseRows<S extends z.ZodTypeAny>(
  schema: S,
  rows: readonly unknown[],
  table: string
): z.output<S>[] {
  const parsed: z.output<S>[] = [];
  for (const row of rows) {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      logger.warn({ table, issues: result.error.issues }, 'Skipping malformed row');
    }
  }
  return parsed;
}

export function createSupabaseCaseRepository(supabase: SupabaseClient): SupabaseCaseRepository {
  return new SupabaseCaseRepository({ supabase });
}
