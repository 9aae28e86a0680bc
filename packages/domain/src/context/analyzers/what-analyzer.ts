/**
 * WHAT: causes of action, legal issues, doctrines and citations
 */

import { clamp } from '@casecontext/core';
import type { CauseOfAction, Citation, GraphNodeRecord, WhatContext } from '@casecontext/types';
import { DimensionAnalyzer, type AnalyzerDependencies } from './base-analyzer.js';
import { numberProp, stringArrayProp, stringProp } from './properties.js';

export const WHAT_ENTITY_TYPES = [
  'STATUTE_CITATION',
  'CASE_CITATION',
  'LEGAL_PRINCIPLE',
  'CAUSE_OF_ACTION',
  'DOCTRINE',
] as const;

export class WhatAnalyzer extends DimensionAnalyzer<WhatContext> {
  readonly dimension = 'WHAT' as const;

  constructor(deps: AnalyzerDependencies) {
    super(deps, 'what-analyzer');
  }

  protected async build(clientId: string, caseId: string): Promise<WhatContext> {
    const nodes = await this.repository.findGraphNodes(clientId, caseId, WHAT_ENTITY_TYPES);

    const causes = nodes
      .filter((n) => n.entity_type === 'CAUSE_OF_ACTION')
      .map((n) => toCauseOfAction(n, caseId));
    const issues = uniqueLabels(nodes, 'LEGAL_PRINCIPLE');
    const doctrines = uniqueLabels(nodes, 'DOCTRINE');
    const statutes = nodes
      .filter((n) => n.entity_type === 'STATUTE_CITATION')
      .map((n) => toCitation(n, 'statute', caseId));
    const caseCitations = nodes
      .filter((n) => n.entity_type === 'CASE_CITATION')
      .map((n) => toCitation(n, 'case_law', caseId));

    const caseName = await this.getCaseName(clientId, caseId);

    this.logger.info(
      { caseId, causes: causes.length, statutes: statutes.length, cases: caseCitations.length },
      'WHAT analysis complete'
    );

    return {
      case_id: caseId,
      case_name: caseName,
      causes_of_action: causes,
      legal_issues: issues,
      doctrines,
      statutes,
      case_citations: caseCitations,
      primary_legal_theory: causes[0]?.name ?? issues[0] ?? null,
      issue_complexity: Math.min(1, (causes.length + issues.length + statutes.length) / 20),
      jurisdiction_type: 'federal',
    };
  }

  protected empty(caseId: string, caseName: string): WhatContext {
    return {
      case_id: caseId,
      case_name: caseName,
      causes_of_action: [],
      legal_issues: [],
      doctrines: [],
      statutes: [],
      case_citations: [],
      primary_legal_theory: null,
      issue_complexity: 0.5,
      jurisdiction_type: 'federal',
    };
  }
}

function toCauseOfAction(node: GraphNodeRecord, caseId: string): CauseOfAction {
  const props = node.properties;
  return {
    id: node.node_id,
    name: stringProp(props, 'name') ?? 'Unknown Cause',
    description: stringProp(props, 'description') ?? '',
    elements: stringArrayProp(props, 'elements') ?? [],
    case_id: caseId,
  };
}

function toCitation(node: GraphNodeRecord, type: Citation['type'], caseId: string): Citation {
  const props = node.properties;
  return {
    text: stringProp(props, 'text') ?? '',
    type,
    jurisdiction: stringProp(props, 'jurisdiction') ?? 'federal',
    confidence: clamp(numberProp(props, 'confidence') ?? 0.9),
    case_id: caseId,
  };
}

/**
 * name (or text) of each node of a type, deduplicated in first-seen order
 */
function uniqueLabels(nodes: GraphNodeRecord[], entityType: string): string[] {
  const labels = new Set<string>();
  for (const node of nodes) {
    if (node.entity_type !== entityType) continue;
    const label = stringProp(node.properties, 'name') ?? stringProp(node.properties, 'text');
    if (label) labels.add(label);
  }
  return [...labels];
}
