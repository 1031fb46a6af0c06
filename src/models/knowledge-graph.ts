/**
 * Knowledge Graph Models
 *
 * Node, edge and persisted payload shapes for the synthetic knowledge graph.
 * The payload schemas are the single source for graph.json validation.
 *
 * @module models/knowledge-graph
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Tag used for person nodes (compared case-insensitively) */
export const PERSON_TYPE = 'person';

/** Scalar attribute value */
export type AttributeValue = string | number | boolean;

/**
 * Node of the knowledge graph.
 *
 * `attributes` keeps insertion order, which drives rendering order.
 * `created_at` is the insertion ordinal assigned by the owning graph.
 */
export interface KnowledgeNode {
  readonly id: string;
  readonly type: string;
  readonly name: string;
  readonly attributes: ReadonlyMap<string, AttributeValue>;
  readonly created_at: number;
}

/** Directed, labeled edge */
export interface KnowledgeEdge {
  readonly source_id: string;
  readonly relation: string;
  readonly target_id: string;
  readonly created_at: number;
}

export type EdgeDirection = 'out' | 'in';

/**
 * One adjacency entry seen from a node: the edge, the node on the other end,
 * and whether the edge leaves (`out`) or enters (`in`) the node.
 */
export interface NeighborEntry {
  edge: KnowledgeEdge;
  node_id: string;
  direction: EdgeDirection;
}

/** Input accepted by KnowledgeGraph.addNode */
export interface NodeInput {
  /** Generated with uuid v4 when omitted */
  id?: string;
  type: string;
  name: string;
  attributes?: Record<string, AttributeValue>;
}

export interface GraphStats {
  node_count: number;
  edge_count: number;
  person_count: number;
  nodes_by_type: Record<string, number>;
  edges_by_relation: Record<string, number>;
}

export function isPerson(node: Pick<KnowledgeNode, 'type'>): boolean {
  return node.type.trim().toLowerCase() === PERSON_TYPE;
}

/**
 * An attribute counts as non-empty when it is a number, a boolean, or a
 * string with visible characters.
 */
export function isNonEmptyValue(value: AttributeValue): boolean {
  return typeof value !== 'string' || value.trim().length > 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PERSISTED PAYLOAD
// ═══════════════════════════════════════════════════════════════════════════════

export const GRAPH_PAYLOAD_VERSION = 1;

export const AttributeValueSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

export const AttributePairSchema = z.object({
  key: z.string().min(1, 'Attribute key must not be empty'),
  value: AttributeValueSchema,
});

export const NodePayloadSchema = z.object({
  id: z.string().min(1, 'Node id must not be empty'),
  type: z.string().min(1, 'Node type must not be empty'),
  name: z.string(),
  created_at: z.number().int().nonnegative(),
  attributes: z.array(AttributePairSchema).default([]),
});

export const EdgePayloadSchema = z.object({
  source_id: z.string().min(1),
  relation: z.string().min(1, 'Relation label must not be empty'),
  target_id: z.string().min(1),
  created_at: z.number().int().nonnegative(),
});

export const GraphPayloadSchema = z.object({
  version: z.literal(GRAPH_PAYLOAD_VERSION),
  nodes: z.array(NodePayloadSchema),
  edges: z.array(EdgePayloadSchema),
});

export type AttributePair = z.infer<typeof AttributePairSchema>;
export type NodePayload = z.infer<typeof NodePayloadSchema>;
export type EdgePayload = z.infer<typeof EdgePayloadSchema>;
export type GraphPayload = z.infer<typeof GraphPayloadSchema>;
