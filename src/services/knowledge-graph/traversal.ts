/**
 * Graph Traversal
 *
 * Breadth-first search over the undirected view of a KnowledgeGraph.
 * Neighbors are expanded in edge creation order, so the parent chosen for
 * each node (and therefore every reconstructed path) is deterministic.
 *
 * @module services/knowledge-graph/traversal
 */

import type { EdgeDirection, KnowledgeEdge, NeighborEntry } from '../../models/knowledge-graph.js';
import type { KnowledgeGraph } from './graph.js';

/** BFS visit record */
export interface TraversalVisit {
  node_id: string;
  distance: number;
  /** Node the visit was discovered from; null for the start node */
  parent_id: string | null;
  /** Edge used to reach this node, seen from the parent */
  via: NeighborEntry | null;
}

/**
 * One hop of a path. `edge` and `direction` describe how this node was
 * entered from the previous hop; both are null on the first hop.
 */
export interface PathHop {
  node_id: string;
  edge: KnowledgeEdge | null;
  direction: EdgeDirection | null;
}

/**
 * Visit every existing node within `maxHops` of `startId`.
 * Edges pointing at missing nodes are not followed.
 *
 * @returns visits keyed by node id, in discovery order
 */
export function breadthFirst(
  graph: KnowledgeGraph,
  startId: string,
  maxHops: number = Number.POSITIVE_INFINITY
): Map<string, TraversalVisit> {
  const visits = new Map<string, TraversalVisit>();
  if (!graph.hasNode(startId)) return visits;

  visits.set(startId, { node_id: startId, distance: 0, parent_id: null, via: null });
  let frontier = [startId];
  let depth = 0;

  while (frontier.length > 0 && depth < maxHops) {
    depth++;
    const next: string[] = [];
    for (const nodeId of frontier) {
      for (const entry of graph.neighbors(nodeId)) {
        if (visits.has(entry.node_id) || !graph.hasNode(entry.node_id)) continue;
        visits.set(entry.node_id, { node_id: entry.node_id, distance: depth, parent_id: nodeId, via: entry });
        next.push(entry.node_id);
      }
    }
    frontier = next;
  }

  return visits;
}

/**
 * Shortest undirected path from `fromId` to `toId`, start node included.
 */
export function shortestPath(graph: KnowledgeGraph, fromId: string, toId: string): PathHop[] | null {
  const visits = breadthFirst(graph, fromId);
  if (!visits.has(toId)) return null;

  const hops: PathHop[] = [];
  let current = visits.get(toId);
  while (current) {
    hops.unshift({
      node_id: current.node_id,
      edge: current.via ? current.via.edge : null,
      direction: current.via ? current.via.direction : null,
    });
    current = current.parent_id === null ? undefined : visits.get(current.parent_id);
  }
  return hops;
}

/**
 * Shortest distance from the start node to every node within `maxHops`.
 */
export function distancesFrom(graph: KnowledgeGraph, startId: string, maxHops?: number): Map<string, number> {
  const distances = new Map<string, number>();
  for (const [nodeId, visit] of breadthFirst(graph, startId, maxHops)) {
    distances.set(nodeId, visit.distance);
  }
  return distances;
}
