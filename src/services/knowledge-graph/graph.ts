/**
 * Knowledge Graph
 *
 * Adjacency-list container for typed nodes and labeled directed edges,
 * indexed by node id in both directions.
 *
 * A repeated node id or an edge whose endpoint is missing is stored as-is
 * and left for the consistency validator to report. Self-loops and
 * duplicate (source, relation, target) triples are rejected immediately.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/knowledge-graph/graph
 */

import { v4 as uuidv4 } from 'uuid';
import {
  GRAPH_PAYLOAD_VERSION,
  GraphPayloadSchema,
  isPerson,
  type AttributeValue,
  type EdgePayload,
  type GraphPayload,
  type GraphStats,
  type KnowledgeEdge,
  type KnowledgeNode,
  type NeighborEntry,
  type NodeInput,
  type NodePayload,
} from '../../models/knowledge-graph.js';
import { validateInput } from '../../utils/validation.js';
import { distancesFrom, shortestPath, type PathHop } from './traversal.js';

// ============================================================
// Errors
// ============================================================

export type GraphErrorCode = 'NODE_NOT_FOUND' | 'EDGE_NOT_FOUND' | 'SELF_LOOP' | 'DUPLICATE_EDGE';

export class GraphError extends Error {
  constructor(
    message: string,
    public readonly code: GraphErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GraphError';
    Error.captureStackTrace?.(this, GraphError);
  }
}

// ============================================================
// Internal records
// ============================================================

interface StoredNode {
  id: string;
  type: string;
  name: string;
  attributes: Map<string, AttributeValue>;
  created_at: number;
}

interface StoredEdge {
  source_id: string;
  relation: string;
  target_id: string;
  created_at: number;
}

function tripleKey(sourceId: string, relation: string, targetId: string): string {
  return JSON.stringify([sourceId, relation, targetId]);
}

function byCreatedAt(a: { created_at: number }, b: { created_at: number }): number {
  return a.created_at - b.created_at;
}

// ============================================================
// KnowledgeGraph
// ============================================================

export class KnowledgeGraph {
  private readonly nodeList: StoredNode[] = [];
  private readonly nodeIndex = new Map<string, StoredNode>();
  private readonly edgeList: StoredEdge[] = [];
  private readonly triples = new Set<string>();
  private readonly outIndex = new Map<string, StoredEdge[]>();
  private readonly inIndex = new Map<string, StoredEdge[]>();
  private nextNodeOrdinal = 0;
  private nextEdgeOrdinal = 0;

  // ----------------------------------------------------------
  // Construction
  // ----------------------------------------------------------

  /**
   * Add a node. A repeated id is kept in the node list (lookups keep
   * resolving to the first node with that id).
   */
  addNode(input: NodeInput): KnowledgeNode {
    const node: StoredNode = {
      id: input.id ?? uuidv4(),
      type: input.type,
      name: input.name,
      attributes: new Map(Object.entries(input.attributes ?? {})),
      created_at: this.nextNodeOrdinal++,
    };
    this.storeNode(node);
    return node;
  }

  /**
   * Set (or overwrite in place) an attribute. Overwriting keeps the
   * attribute's original position.
   */
  setAttribute(nodeId: string, key: string, value: AttributeValue): void {
    this.requireStoredNode(nodeId).attributes.set(key, value);
  }

  /**
   * Add a directed edge. Endpoints are not required to exist.
   *
   * @throws GraphError SELF_LOOP or DUPLICATE_EDGE
   */
  addEdge(sourceId: string, relation: string, targetId: string): KnowledgeEdge {
    return this.storeEdge({
      source_id: sourceId,
      relation,
      target_id: targetId,
      created_at: this.nextEdgeOrdinal++,
    });
  }

  /**
   * Point an existing edge at a new target. The edge keeps its creation
   * ordinal, so it stays in the same rendering position.
   */
  retargetEdge(sourceId: string, relation: string, oldTargetId: string, newTargetId: string): KnowledgeEdge {
    const key = tripleKey(sourceId, relation, oldTargetId);
    const edge = this.edgeList.find(
      (e) => e.source_id === sourceId && e.relation === relation && e.target_id === oldTargetId
    );
    if (!edge) {
      throw new GraphError(`Edge not found: ${sourceId} -${relation}-> ${oldTargetId}`, 'EDGE_NOT_FOUND', {
        source_id: sourceId,
        relation,
        target_id: oldTargetId,
      });
    }
    this.assertInsertable(sourceId, relation, newTargetId);

    const inbound = this.inIndex.get(oldTargetId) ?? [];
    this.inIndex.set(
      oldTargetId,
      inbound.filter((e) => e !== edge)
    );
    this.triples.delete(key);

    edge.target_id = newTargetId;
    this.triples.add(tripleKey(sourceId, relation, newTargetId));
    this.indexEdge(this.inIndex, newTargetId, edge);
    return edge;
  }

  // ----------------------------------------------------------
  // Lookup
  // ----------------------------------------------------------

  hasNode(id: string): boolean {
    return this.nodeIndex.has(id);
  }

  getNode(id: string): KnowledgeNode | undefined {
    return this.nodeIndex.get(id);
  }

  /**
   * @throws GraphError NODE_NOT_FOUND
   */
  requireNode(id: string): KnowledgeNode {
    return this.requireStoredNode(id);
  }

  /** All nodes in insertion order, including repeated ids */
  nodes(): readonly KnowledgeNode[] {
    return this.nodeList;
  }

  edges(): readonly KnowledgeEdge[] {
    return this.edgeList;
  }

  persons(): KnowledgeNode[] {
    return this.nodeList.filter((n) => isPerson(n));
  }

  outgoing(id: string): readonly KnowledgeEdge[] {
    return this.outIndex.get(id) ?? [];
  }

  incoming(id: string): readonly KnowledgeEdge[] {
    return this.inIndex.get(id) ?? [];
  }

  hasEdge(sourceId: string, relation: string, targetId: string): boolean {
    return this.triples.has(tripleKey(sourceId, relation, targetId));
  }

  /**
   * Edges incident to a node in both directions, ordered by edge creation.
   */
  neighbors(id: string): NeighborEntry[] {
    const entries: NeighborEntry[] = [
      ...this.outgoing(id).map((edge) => ({ edge, node_id: edge.target_id, direction: 'out' as const })),
      ...this.incoming(id).map((edge) => ({ edge, node_id: edge.source_id, direction: 'in' as const })),
    ];
    return entries.sort((a, b) => byCreatedAt(a.edge, b.edge));
  }

  /**
   * Node ids reachable within `maxHops` over the undirected view, mapped to
   * their shortest distance. Iteration order is BFS discovery order.
   */
  neighborsWithin(id: string, maxHops: number): Map<string, number> {
    this.requireStoredNode(id);
    return distancesFrom(this, id, maxHops);
  }

  /**
   * Shortest undirected path between two nodes, or null when unreachable.
   */
  pathBetween(fromId: string, toId: string): PathHop[] | null {
    this.requireStoredNode(fromId);
    this.requireStoredNode(toId);
    return shortestPath(this, fromId, toId);
  }

  getStats(): GraphStats {
    const nodesByType: Record<string, number> = {};
    const edgesByRelation: Record<string, number> = {};
    for (const node of this.nodeList) {
      nodesByType[node.type] = (nodesByType[node.type] ?? 0) + 1;
    }
    for (const edge of this.edgeList) {
      edgesByRelation[edge.relation] = (edgesByRelation[edge.relation] ?? 0) + 1;
    }
    return {
      node_count: this.nodeList.length,
      edge_count: this.edgeList.length,
      person_count: this.persons().length,
      nodes_by_type: nodesByType,
      edges_by_relation: edgesByRelation,
    };
  }

  // ----------------------------------------------------------
  // Copy and persistence
  // ----------------------------------------------------------

  /** Deep copy; mutations on the copy never reach this graph */
  clone(): KnowledgeGraph {
    return KnowledgeGraph.restore(this.toPayload());
  }

  toPayload(): GraphPayload {
    return {
      version: GRAPH_PAYLOAD_VERSION,
      nodes: this.nodeList.map((node) => ({
        id: node.id,
        type: node.type,
        name: node.name,
        created_at: node.created_at,
        attributes: [...node.attributes].map(([key, value]) => ({ key, value })),
      })),
      edges: this.edgeList.map((edge) => ({
        source_id: edge.source_id,
        relation: edge.relation,
        target_id: edge.target_id,
        created_at: edge.created_at,
      })),
    };
  }

  /**
   * Rebuild a graph from its persisted payload.
   *
   * @throws ValidationError when the payload does not match GraphPayloadSchema
   * @throws GraphError when the payload holds a self-loop or duplicate edge
   */
  static fromPayload(payload: unknown): KnowledgeGraph {
    return KnowledgeGraph.restore(validateInput(GraphPayloadSchema, payload));
  }

  private static restore(payload: GraphPayload): KnowledgeGraph {
    const graph = new KnowledgeGraph();
    const nodes: NodePayload[] = [...payload.nodes].sort(byCreatedAt);
    const edges: EdgePayload[] = [...payload.edges].sort(byCreatedAt);

    for (const node of nodes) {
      graph.storeNode({
        id: node.id,
        type: node.type,
        name: node.name,
        attributes: new Map(node.attributes.map((pair) => [pair.key, pair.value] as const)),
        created_at: node.created_at,
      });
      graph.nextNodeOrdinal = Math.max(graph.nextNodeOrdinal, node.created_at + 1);
    }
    for (const edge of edges) {
      graph.storeEdge({ ...edge });
      graph.nextEdgeOrdinal = Math.max(graph.nextEdgeOrdinal, edge.created_at + 1);
    }
    return graph;
  }

  // ----------------------------------------------------------
  // Internals
  // ----------------------------------------------------------

  private storeNode(node: StoredNode): void {
    this.nodeList.push(node);
    if (!this.nodeIndex.has(node.id)) {
      this.nodeIndex.set(node.id, node);
    }
  }

  private storeEdge(edge: StoredEdge): KnowledgeEdge {
    this.assertInsertable(edge.source_id, edge.relation, edge.target_id);
    this.edgeList.push(edge);
    this.triples.add(tripleKey(edge.source_id, edge.relation, edge.target_id));
    this.indexEdge(this.outIndex, edge.source_id, edge);
    this.indexEdge(this.inIndex, edge.target_id, edge);
    return edge;
  }

  private assertInsertable(sourceId: string, relation: string, targetId: string): void {
    if (sourceId === targetId) {
      throw new GraphError(`Self-loop rejected on node ${sourceId} (${relation})`, 'SELF_LOOP', {
        node_id: sourceId,
        relation,
      });
    }
    if (this.triples.has(tripleKey(sourceId, relation, targetId))) {
      throw new GraphError(`Duplicate edge rejected: ${sourceId} -${relation}-> ${targetId}`, 'DUPLICATE_EDGE', {
        source_id: sourceId,
        relation,
        target_id: targetId,
      });
    }
  }

  /** Keeps each index list ordered by edge creation */
  private indexEdge(index: Map<string, StoredEdge[]>, nodeId: string, edge: StoredEdge): void {
    const list = index.get(nodeId) ?? [];
    list.push(edge);
    list.sort(byCreatedAt);
    index.set(nodeId, list);
  }

  private requireStoredNode(id: string): StoredNode {
    const node = this.nodeIndex.get(id);
    if (!node) {
      throw new GraphError(`Node not found: ${id}`, 'NODE_NOT_FOUND', { node_id: id });
    }
    return node;
  }
}
