/**
 * Consistency Validator
 *
 * Checks the structural invariants every graph must satisfy before any
 * document, query or update is derived from it. All invariants are checked
 * in a single pass; nothing short-circuits on the first failure.
 *
 * @module services/knowledge-graph/validator
 */

import { isNonEmptyValue, isPerson, type KnowledgeEdge } from '../../models/knowledge-graph.js';
import { ValidationError } from '../../utils/validation.js';
import type { KnowledgeGraph } from './graph.js';

// ============================================================
// Types
// ============================================================

/** Invariant identifiers, in reporting order */
export const GRAPH_INVARIANTS = [
  'DANGLING_EDGE',
  'DUPLICATE_PERSON_NAME',
  'EMPTY_NODE',
  'DUPLICATE_NODE_ID',
] as const;

export type GraphInvariant = (typeof GRAPH_INVARIANTS)[number];

export interface GraphViolation {
  invariant: GraphInvariant;
  message: string;
  node_id?: string;
  edge?: Pick<KnowledgeEdge, 'source_id' | 'relation' | 'target_id'>;
}

export interface GraphValidationResult {
  ok: boolean;
  violations: GraphViolation[];
}

// ============================================================
// Validation
// ============================================================

/**
 * Validate a graph against every invariant.
 *
 * Violations are grouped by invariant (in GRAPH_INVARIANTS order) and, within
 * an invariant, ordered by node or edge creation.
 */
export function validateGraph(graph: KnowledgeGraph): GraphValidationResult {
  const nodes = graph.nodes();
  const edges = graph.edges();
  const byInvariant = new Map<GraphInvariant, GraphViolation[]>(GRAPH_INVARIANTS.map((id) => [id, []]));
  const report = (violation: GraphViolation): void => {
    byInvariant.get(violation.invariant)?.push(violation);
  };

  const ids = new Set<string>();
  const reportedIds = new Set<string>();
  const personNames = new Map<string, string>();
  const incident = new Set<string>();

  for (const edge of edges) {
    incident.add(edge.source_id);
    incident.add(edge.target_id);
    const missing = [edge.source_id, edge.target_id].filter((id) => !graph.hasNode(id));
    if (missing.length > 0) {
      report({
        invariant: 'DANGLING_EDGE',
        message: `Edge ${edge.source_id} -${edge.relation}-> ${edge.target_id} references missing node(s): ${missing.join(', ')}`,
        edge: { source_id: edge.source_id, relation: edge.relation, target_id: edge.target_id },
      });
    }
  }

  for (const node of nodes) {
    if (isPerson(node)) {
      const firstId = personNames.get(node.name);
      if (firstId !== undefined) {
        report({
          invariant: 'DUPLICATE_PERSON_NAME',
          message: `Person name "${node.name}" is used by ${firstId} and ${node.id}`,
          node_id: node.id,
        });
      } else {
        personNames.set(node.name, node.id);
      }
    }

    const hasAttribute = [...node.attributes.values()].some(isNonEmptyValue);
    if (!hasAttribute && !incident.has(node.id)) {
      report({
        invariant: 'EMPTY_NODE',
        message: `Node ${node.id} ("${node.name}") has no non-empty attribute and no incident edge`,
        node_id: node.id,
      });
    }

    if (ids.has(node.id)) {
      if (!reportedIds.has(node.id)) {
        report({
          invariant: 'DUPLICATE_NODE_ID',
          message: `Node id ${node.id} is used by more than one node`,
          node_id: node.id,
        });
        reportedIds.add(node.id);
      }
    } else {
      ids.add(node.id);
    }
  }

  const violations = GRAPH_INVARIANTS.flatMap((id) => byInvariant.get(id) ?? []);
  return { ok: violations.length === 0, violations };
}

/**
 * Validate and throw when the graph breaks any invariant.
 *
 * @throws ValidationError (code GRAPH_INVALID) carrying every violation
 */
export function assertValidGraph(graph: KnowledgeGraph): void {
  const result = validateGraph(graph);
  if (!result.ok) {
    const summary = result.violations.map((v) => `${v.invariant}: ${v.message}`).join('; ');
    throw new ValidationError(
      `Graph failed consistency validation with ${result.violations.length} violation(s): ${summary}`,
      'GRAPH_INVALID',
      { violations: result.violations }
    );
  }
}
