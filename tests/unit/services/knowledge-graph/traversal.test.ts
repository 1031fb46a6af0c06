/**
 * Graph Traversal Tests
 *
 * @module tests/unit/services/knowledge-graph/traversal
 */

import { describe, it, expect } from 'vitest';
import {
  breadthFirst,
  distancesFrom,
  shortestPath,
} from '../../../../src/services/knowledge-graph/traversal.js';
import { buildOfficeGraph } from '../../helpers/graphs.js';

describe('breadthFirst', () => {
  it('visits nodes in discovery order with their distances', () => {
    const visits = breadthFirst(buildOfficeGraph(), 'A');
    expect([...visits.values()].map((v) => [v.node_id, v.distance, v.parent_id])).toEqual([
      ['A', 0, null],
      ['B', 1, 'A'],
      ['E', 1, 'A'],
      ['C', 2, 'B'],
      ['D', 2, 'B'],
    ]);
  });

  it('records the edge used to reach each node', () => {
    const visit = breadthFirst(buildOfficeGraph(), 'A').get('D');
    expect(visit?.via?.edge.relation).toBe('works_at');
    expect(visit?.via?.edge.source_id).toBe('D');
    expect(visit?.via?.direction).toBe('in');
  });

  it('stops at the hop limit', () => {
    expect([...breadthFirst(buildOfficeGraph(), 'A', 1).keys()]).toEqual(['A', 'B', 'E']);
    expect([...breadthFirst(buildOfficeGraph(), 'A', 0).keys()]).toEqual(['A']);
  });

  it('does not follow edges to missing nodes', () => {
    const graph = buildOfficeGraph();
    graph.addEdge('A', 'knows', 'GHOST');
    expect(breadthFirst(graph, 'A').has('GHOST')).toBe(false);
  });

  it('returns nothing for an unknown start node', () => {
    expect(breadthFirst(buildOfficeGraph(), 'Z').size).toBe(0);
  });
});

describe('shortestPath', () => {
  it('walks edges against their direction', () => {
    const path = shortestPath(buildOfficeGraph(), 'A', 'D');
    expect(path?.map((hop) => [hop.node_id, hop.edge?.relation ?? null, hop.direction])).toEqual([
      ['A', null, null],
      ['B', 'works_at', 'out'],
      ['D', 'works_at', 'in'],
    ]);
  });

  it('returns the start node alone for a zero-length path', () => {
    expect(shortestPath(buildOfficeGraph(), 'C', 'C')).toEqual([{ node_id: 'C', edge: null, direction: null }]);
  });
});

describe('distancesFrom', () => {
  it('maps node ids to hop distances', () => {
    expect(Object.fromEntries(distancesFrom(buildOfficeGraph(), 'C'))).toEqual({ C: 0, B: 1, A: 2, D: 2, E: 3 });
  });
});
