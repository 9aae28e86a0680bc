/**
 * WHO: parties, judges, attorneys, witnesses and how they relate
 */

import {
  PartyRoleSchema,
  type Attorney,
  type GraphNodeRecord,
  type Judge,
  type Party,
  type WhoContext,
  type Witness,
} from '@casecontext/types';
import { DimensionAnalyzer, type AnalyzerDependencies } from './base-analyzer.js';
import { stringArrayProp, stringProp, validDate } from './properties.js';

export const WHO_ENTITY_TYPES = ['PARTY', 'JUDGE', 'ATTORNEY', 'WITNESS'] as const;

export class WhoAnalyzer extends DimensionAnalyzer<WhoContext> {
  readonly dimension = 'WHO' as const;

  constructor(deps: AnalyzerDependencies) {
    super(deps, 'who-analyzer');
  }

  protected async build(clientId: string, caseId: string): Promise<WhoContext> {
    await this.queryGraph(clientId, caseId);

    const nodes = await this.repository.findGraphNodes(clientId, caseId, WHO_ENTITY_TYPES);

    const parties = this.extractParties(nodes, caseId);
    const judges = nodes.filter((n) => n.entity_type === 'JUDGE').map((n) => toJudge(n, caseId));
    const attorneys = nodes
      .filter((n) => n.entity_type === 'ATTORNEY')
      .map((n) => toAttorney(n, caseId));
    const witnesses = nodes
      .filter((n) => n.entity_type === 'WITNESS')
      .map((n) => toWitness(n, caseId));

    const partyRelationships = await this.buildPartyRelationships(clientId, caseId);
    const caseName = await this.getCaseName(clientId, caseId);

    this.logger.info(
      {
        caseId,
        parties: parties.length,
        judges: judges.length,
        attorneys: attorneys.length,
        witnesses: witnesses.length,
      },
      'WHO analysis complete'
    );

    return {
      case_id: caseId,
      case_name: caseName,
      parties,
      judges,
      attorneys,
      witnesses,
      party_relationships: partyRelationships,
      representation_map: buildRepresentationMap(attorneys),
    };
  }

  protected empty(caseId: string, caseName: string): WhoContext {
    return {
      case_id: caseId,
      case_name: caseName,
      parties: [],
      judges: [],
      attorneys: [],
      witnesses: [],
      party_relationships: {},
      representation_map: {},
    };
  }

  /**
   * LOCAL graph search over the case; the result is informational only
   */
  private async queryGraph(clientId: string, caseId: string): Promise<void> {
    if (!this.graph) return;

    try {
      const result = await this.graph.queryCaseGraph({
        clientId,
        caseId,
        query:
          `Find all parties, judges, attorneys, and witnesses in case ${caseId}. ` +
          'Include their roles, relationships, and metadata.',
        searchType: 'LOCAL',
      });
      this.logger.debug(
        { caseId, entities: result.entities.length, relationships: result.relationships.length },
        'GraphRAG participants query complete'
      );
    } catch (error) {
      this.logger.warn({ err: error, caseId }, 'GraphRAG query failed');
    }
  }

  private extractParties(nodes: GraphNodeRecord[], caseId: string): Party[] {
    const parties: Party[] = [];

    for (const node of nodes) {
      if (node.entity_type !== 'PARTY') continue;

      const props = node.properties;
      const role = PartyRoleSchema.safeParse(props.role);
      if (!role.success) {
        this.logger.warn({ caseId, nodeId: node.node_id, role: props.role }, 'Skipping party with invalid role');
        continue;
      }

      parties.push({
        id: node.node_id,
        name: stringProp(props, 'name') ?? 'Unknown Party',
        role: role.data,
        entity_type: stringProp(props, 'entity_type') ?? 'person',
        case_id: caseId,
        metadata: props,
      });
    }

    return parties;
  }

  private async buildPartyRelationships(
    clientId: string,
    caseId: string
  ): Promise<Record<string, string[]>> {
    const relationships: Record<string, string[]> = {};

    try {
      const edges = await this.repository.findGraphEdges(clientId, caseId);
      for (const edge of edges) {
        const targets = relationships[edge.source_node_id] ?? [];
        targets.push(edge.target_node_id);
        relationships[edge.source_node_id] = targets;
      }
    } catch (error) {
      this.logger.warn({ err: error, caseId }, 'Failed to build party relationships');
    }

    return relationships;
  }
}

function toJudge(node: GraphNodeRecord, caseId: string): Judge {
  const props = node.properties;
  return {
    id: node.node_id,
    name: stringProp(props, 'name') ?? 'Unknown Judge',
    court: stringProp(props, 'court') ?? 'Unknown Court',
    case_id: caseId,
    assignment_date: validDate(stringProp(props, 'assignment_date')),
    history_with_parties: {},
  };
}

function toAttorney(node: GraphNodeRecord, caseId: string): Attorney {
  const props = node.properties;
  return {
    id: node.node_id,
    name: stringProp(props, 'name') ?? 'Unknown Attorney',
    firm: stringProp(props, 'firm') ?? null,
    bar_number: stringProp(props, 'bar_number') ?? null,
    representing: stringArrayProp(props, 'representing') ?? [],
    case_id: caseId,
  };
}

function toWitness(node: GraphNodeRecord, caseId: string): Witness {
  const props = node.properties;
  return {
    id: node.node_id,
    name: stringProp(props, 'name') ?? 'Unknown Witness',
    witness_type: stringProp(props, 'witness_type') ?? 'fact',
    representing_party: stringProp(props, 'representing_party') ?? null,
    case_id: caseId,
    expertise: stringProp(props, 'expertise') ?? null,
  };
}

/**
 * party id -> attorney id; a later attorney for the same party wins
 */
function buildRepresentationMap(attorneys: Attorney[]): Record<string, string> {
  const map: Record<string, string> = {};
  for (const attorney of attorneys) {
    for (const partyId of attorney.representing) {
      map[partyId] = attorney.id;
    }
  }
  return map;
}
