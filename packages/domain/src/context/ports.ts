/**
 * Context Ports
 *
 * Contracts the context builder needs from the outside world. Adapters live
 * in @casecontext/integrations (Supabase, GraphRAG); an in-memory repository
 * is provided here for development and tests.
 *
 * Every case-scoped method filters by both client id and case id.
 *
 * @module domain/context/ports
 */

import type {
  CaseRecord,
  DeadlineRecord,
  GraphEdgeRecord,
  GraphNodeRecord,
  GraphQueryMode,
  GraphQueryResponse,
  GraphSearchType,
  LegalTheoryRecord,
  TimelineEventRecord,
} from '@casecontext/types';

/**
 * Case data store (Port)
 */
export interface CaseRepository {
  /**
   * client_cases row, or null when the case does not exist for this client
   */
  getCase(clientId: string, caseId: string): Promise<CaseRecord | null>;

  findGraphNodes(
    clientId: string,
    caseId: string,
    entityTypes: readonly string[]
  ): Promise<GraphNodeRecord[]>;

  findGraphEdges(clientId: string, caseId: string): Promise<GraphEdgeRecord[]>;

  /** Ordered by event date */
  findTimelineEvents(clientId: string, caseId: string): Promise<TimelineEventRecord[]>;

  /** Ordered by deadline date */
  findDeadlines(clientId: string, caseId: string): Promise<DeadlineRecord[]>;

  findLegalTheories(clientId: string, caseId: string): Promise<LegalTheoryRecord[]>;
}

export interface CaseGraphQuery {
  clientId: string;
  caseId: string;
  query: string;
  searchType?: GraphSearchType;
  mode?: GraphQueryMode;
  relevanceBudget?: number;
  communityLevel?: number;
  vectorWeight?: number;
}

/**
 * Knowledge graph queries used by the analyzers (Port)
 */
export interface GraphInsights {
  queryCaseGraph(query: CaseGraphQuery): Promise<GraphQueryResponse>;
}
