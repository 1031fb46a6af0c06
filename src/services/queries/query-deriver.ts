/**
 * Multi-Hop Query Deriver
 *
 * Enumerates the facts reachable within two hops of a focal node and turns
 * each into a (path, answer) record with a template question:
 *
 * - 0 hops: every attribute of the focal node
 * - 1 hop: identity and every attribute of each directly connected node,
 *   once per connecting edge
 * - 2 hops: every attribute of each node at shortest distance 2, once per
 *   distinct focal -> intermediate -> end edge path
 *
 * hop_distance always comes from the BFS distance of the fact's source node.
 *
 * @module services/queries/query-deriver
 */

import type { KnowledgeNode, NeighborEntry } from '../../models/knowledge-graph.js';
import {
  HOP_DISTANCES,
  type HopCounts,
  type HopDistance,
  type PathStep,
  type QueryDerivation,
  type QueryRecord,
  type QueryShortfall,
} from '../../models/query.js';
import { sampleIndices, type Rng } from '../../utils/random.js';
import type { KnowledgeGraph } from '../knowledge-graph/graph.js';
import { distancesFrom } from '../knowledge-graph/traversal.js';

export interface DeriveQueriesOptions {
  /** Requested records per hop; an omitted hop returns every fact */
  counts?: HopCounts;
  rng: Rng;
}

type Fact = Omit<QueryRecord, 'id' | 'hop_distance'>;

// ═══════════════════════════════════════════════════════════════════════════════
// PHRASE TEMPLATES
// ═══════════════════════════════════════════════════════════════════════════════

/** `works_at` -> `works at` */
function phrase(label: string): string {
  return label.replace(/_/g, ' ').trim();
}

/**
 * Noun phrase for `node`, reached from the thing described by `from`:
 * `the restaurant that Ana works at` (out) or
 * `the person that manages Ana` (in).
 */
function describeVia(node: KnowledgeNode, entry: NeighborEntry, from: string): string {
  const kind = phrase(node.type).toLowerCase();
  const relation = phrase(entry.edge.relation);
  return entry.direction === 'out' ? `the ${kind} that ${from} ${relation}` : `the ${kind} that ${relation} ${from}`;
}

function relationStep(node: KnowledgeNode, entry: NeighborEntry): PathStep {
  return {
    node_id: node.id,
    node_name: node.name,
    label: entry.edge.relation,
    label_kind: 'relation',
    direction: entry.direction,
  };
}

function attributeStep(node: KnowledgeNode, attribute: string): PathStep {
  return { node_id: node.id, node_name: node.name, label: attribute, label_kind: 'attribute', direction: null };
}

function terminalStep(node: KnowledgeNode): PathStep {
  return { node_id: node.id, node_name: node.name, label: null, label_kind: null, direction: null };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENUMERATION
// ═══════════════════════════════════════════════════════════════════════════════

function attributeFacts(node: KnowledgeNode, prefix: PathStep[], subject: string): Fact[] {
  return [...node.attributes].map(([attribute, value]) => ({
    kind: 'attribute' as const,
    source_node_id: node.id,
    attribute,
    path: [...prefix, attributeStep(node, attribute)],
    question: `What is the ${phrase(attribute)} of ${subject}?`,
    answer: String(value),
  }));
}

/**
 * Every fact within two hops of the focal node, grouped by hop distance, in
 * enumeration order (edge creation, then attribute insertion).
 */
export function enumerateFacts(graph: KnowledgeGraph, focalNodeId: string): Record<HopDistance, Fact[]> {
  const focal = graph.requireNode(focalNodeId);
  const distances = distancesFrom(graph, focalNodeId, 2);
  const facts: Record<HopDistance, Fact[]> = { 0: [], 1: [], 2: [] };

  facts[0].push(...attributeFacts(focal, [], focal.name));

  for (const first of graph.neighbors(focalNodeId)) {
    const mid = graph.getNode(first.node_id);
    if (!mid || distances.get(mid.id) !== 1) continue;

    const firstStep = relationStep(focal, first);
    const midPhrase = describeVia(mid, first, focal.name);

    facts[1].push({
      kind: 'identity',
      source_node_id: mid.id,
      attribute: null,
      path: [firstStep, terminalStep(mid)],
      question: `What is the name of ${midPhrase}?`,
      answer: mid.name,
    });
    facts[1].push(...attributeFacts(mid, [firstStep], midPhrase));

    for (const second of graph.neighbors(mid.id)) {
      const end = graph.getNode(second.node_id);
      if (!end || distances.get(end.id) !== 2) continue;
      facts[2].push(
        ...attributeFacts(end, [firstStep, relationStep(mid, second)], describeVia(end, second, midPhrase))
      );
    }
  }

  return facts;
}

/**
 * Derive query records for a focal node, sampling each hop down to the
 * requested count.
 *
 * @throws GraphError NODE_NOT_FOUND for an unknown focal node
 */
export function deriveQueries(graph: KnowledgeGraph, focalNodeId: string, options: DeriveQueriesOptions): QueryDerivation {
  const facts = enumerateFacts(graph, focalNodeId);
  const distances = distancesFrom(graph, focalNodeId, 2);
  const records: QueryRecord[] = [];
  const shortfalls: QueryShortfall[] = [];

  for (const hop of HOP_DISTANCES) {
    const available = facts[hop];
    const requested = options.counts?.[hop];
    let selected = available;

    if (requested !== undefined) {
      if (requested < available.length) {
        selected = sampleIndices(options.rng, available.length, requested).map((i) => available[i]);
      } else if (requested > available.length) {
        shortfalls.push({ hop, requested, available: available.length });
      }
    }

    for (const fact of selected) {
      const distance = distances.get(fact.source_node_id);
      if (distance !== hop) {
        // enumeration filters by BFS distance; a mismatch is a defect here
        throw new Error(`Fact source ${fact.source_node_id} is at distance ${distance ?? 'unreachable'}, expected ${hop}`);
      }
      records.push({ id: `q${hop}_${records.length}`, hop_distance: hop, ...fact });
    }
  }

  if (shortfalls.length > 0) {
    console.error(
      `[QueryDeriver] WARN focal ${focalNodeId}: fewer facts than requested for hop(s) ${shortfalls.map((s) => `${s.hop} (${s.available}/${s.requested})`).join(', ')}`
    );
  }

  return { focal_node_id: focalNodeId, records, shortfalls };
}
