/**
 * In-Memory Case Repository
 *
 * Seedable adapter for development and tests.
 *
 * WARNING: Not suitable for production - data is lost on restart.
 *
 * @module domain/context/in-memory-case-repository
 */

import type {
  CaseRecord,
  DeadlineRecord,
  GraphEdgeRecord,
  GraphNodeRecord,
  LegalTheoryRecord,
  TimelineEventRecord,
} from '@casecontext/types';
import type { CaseRepository } from './ports.js';

export interface CaseSeed {
  record?: CaseRecord;
  nodes?: GraphNodeRecord[];
  edges?: GraphEdgeRecord[];
  timeline?: TimelineEventRecord[];
  deadlines?: DeadlineRecord[];
  theories?: LegalTheoryRecord[];
}

interface CaseData {
  record: CaseRecord | null;
  nodes: GraphNodeRecord[];
  edges: GraphEdgeRecord[];
  timeline: TimelineEventRecord[];
  deadlines: DeadlineRecord[];
  theories: LegalTheoryRecord[];
}

/**
 * @example
 * ```typescript
 * const repository = new InMemoryCaseRepository();
 * repository.seed('client-1', 'case-1', {
 *   record: { id: 'case-1', client_id: 'client-1', case_name: 'Doe v. Acme' },
 * });
 * ```
 */
export class InMemoryCaseRepository implements CaseRepository {
  private cases = new Map<string, CaseData>();

  private getKey(clientId: string, caseId: string): string {
    return `${clientId}:${caseId}`;
  }

  private data(clientId: string, caseId: string): CaseData | undefined {
    return this.cases.get(this.getKey(clientId, caseId));
  }

  /**
   * Add data for a case; arrays are appended, the record is replaced
   */
  seed(clientId: string, caseId: string, seed: CaseSeed): void {
    const key = this.getKey(clientId, caseId);
    const existing = this.cases.get(key);

    this.cases.set(key, {
      record: seed.record ?? existing?.record ?? null,
      nodes: [...(existing?.nodes ?? []), ...(seed.nodes ?? [])],
      edges: [...(existing?.edges ?? []), ...(seed.edges ?? [])],
      timeline: [...(existing?.timeline ?? []), ...(seed.timeline ?? [])],
      deadlines: [...(existing?.deadlines ?? []), ...(seed.deadlines ?? [])],
      theories: [...(existing?.theories ?? []), ...(seed.theories ?? [])],
    });
  }

  clear(): void {
    this.cases.clear();
  }

  getCase(clientId: string, caseId: string): Promise<CaseRecord | null> {
    return Promise.resolve(this.data(clientId, caseId)?.record ?? null);
  }

  findGraphNodes(
    clientId: string,
    caseId: string,
    entityTypes: readonly string[]
  ): Promise<GraphNodeRecord[]> {
    const nodes = this.data(clientId, caseId)?.nodes ?? [];
    return Promise.resolve(nodes.filter((node) => entityTypes.includes(node.entity_type)));
  }

  findGraphEdges(clientId: string, caseId: string): Promise<GraphEdgeRecord[]> {
    return Promise.resolve(this.data(clientId, caseId)?.edges ?? []);
  }

  findTimelineEvents(clientId: string, caseId: string): Promise<TimelineEventRecord[]> {
    const events = this.data(clientId, caseId)?.timeline ?? [];
    return Promise.resolve(
      [...events].sort((a, b) => Date.parse(a.event_date) - Date.parse(b.event_date))
    );
  }

  findDeadlines(clientId: string, caseId: string): Promise<DeadlineRecord[]> {
    const deadlines = this.data(clientId, caseId)?.deadlines ?? [];
    return Promise.resolve(
      [...deadlines].sort((a, b) => Date.parse(a.deadline_date) - Date.parse(b.deadline_date))
    );
  }

  findLegalTheories(clientId: string, caseId: string): Promise<LegalTheoryRecord[]> {
    return Promise.resolve(this.data(clientId, caseId)?.theories ?? []);
  }
}
