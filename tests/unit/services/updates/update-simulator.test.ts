/**
 * Update Simulator Tests
 *
 * @module tests/unit/services/updates/update-simulator
 */

import { describe, it, expect } from 'vitest';
import { KnowledgeGraph } from '../../../../src/services/knowledge-graph/graph.js';
import { GenerationError } from '../../../../src/services/generation/types.js';
import { renderNeighborhood } from '../../../../src/services/rendering/renderer.js';
import { applyDiff, changedKeys, invertDiff } from '../../../../src/services/updates/diff-service.js';
import type { MutationProposer } from '../../../../src/services/updates/proposer.js';
import {
  MutationExhaustedError,
  NoMutableFactError,
  collectMutableFacts,
  formatUpdatePath,
  simulateUpdate,
} from '../../../../src/services/updates/update-simulator.js';
import { createRng } from '../../../../src/utils/random.js';
import { buildRestaurantGraph } from '../../helpers/graphs.js';

function sequenceIds(...ids: string[]): () => string {
  const queue = [...ids];
  return () => queue.shift() ?? 'id-exhausted';
}

/** Proposer that never changes anything */
const noChangeProposer: MutationProposer = {
  proposeAttributeValue: async ({ current }) => current,
  proposePlaceholder: async ({ previous }) => ({ name: previous.name, attributes: new Map() }),
};

describe('collectMutableFacts', () => {
  it('lists attributes within two hops and relationships that stay within two hops', () => {
    const graph = buildRestaurantGraph();
    const documents = renderNeighborhood(graph, 'A');
    const candidates = collectMutableFacts(graph, documents, 'A');

    expect(
      candidates.map((c) =>
        c.fact.kind === 'attribute'
          ? `${c.hop_distance}:${c.fact.node_id}.${c.fact.attribute}`
          : `${c.hop_distance}:${c.fact.source_id}-${c.fact.relation}->${c.fact.old_target_id}`
      )
    ).toEqual(['0:A.age', '1:A-works_at->B', '1:B.cuisine', '2:B-located_in->C', '2:C.population']);
  });

  it('skips immutable attributes and links back to the focal node', () => {
    const graph = new KnowledgeGraph();
    graph.addNode({ id: 'A', type: 'person', name: 'Ana Ruiz', attributes: { birth_date: '1990-04-02' } });
    graph.addNode({ id: 'B', type: 'person', name: 'Ben Okafor', attributes: { age: 41 } });
    graph.addEdge('B', 'mentors', 'A');
    const candidates = collectMutableFacts(graph, renderNeighborhood(graph, 'A'), 'A');
    expect(candidates.map((c) => c.fact.kind + ':' + c.changed_node_id)).toEqual(['attribute:B']);
  });
});

describe('simulateUpdate', () => {
  it('retargets a two-hop relationship to a new placeholder node', async () => {
    const graph = buildRestaurantGraph();
    const documents = renderNeighborhood(graph, 'A');

    const scenario = await simulateUpdate(graph, documents, 'A', {
      rng: createRng('relocate'),
      kind: 'relationship',
      hop: 2,
      idFactory: sequenceIds('D', 'update-1'),
    });

    expect(scenario.id).toBe('update-1');
    expect(scenario.kind).toBe('relationship');
    expect(scenario.hop_distance).toBe(2);
    expect(scenario.changed_node_id).toBe('B');
    expect(scenario.attempts).toBe(1);
    expect(scenario.fact).toEqual({
      kind: 'relationship',
      source_id: 'B',
      relation: 'located_in',
      old_target_id: 'C',
      new_target_id: 'D',
    });
    expect(formatUpdatePath(scenario.old_path)).toEqual(['Ana Ruiz', 'works_at', 'Blue Fig', 'located_in', 'Porto']);
    expect(formatUpdatePath(scenario.new_path).slice(0, 4)).toEqual(['Ana Ruiz', 'works_at', 'Blue Fig', 'located_in']);
    expect(scenario.new_path[scenario.new_path.length - 1].node_name).toMatch(/^New City [0-9a-z]{4}$/);
  });

  it('produces a diff that leaves the user document alone', async () => {
    const graph = buildRestaurantGraph();
    const documents = renderNeighborhood(graph, 'A');
    const scenario = await simulateUpdate(graph, documents, 'A', {
      rng: createRng('relocate'),
      kind: 'relationship',
      hop: 2,
      idFactory: sequenceIds('D', 'update-1'),
    });

    expect(scenario.diff.documents.map((d) => d.status)).toEqual(['modified', 'removed', 'added']);
    expect(changedKeys(scenario.diff).slice(0, 2)).toEqual(['restaurant/blue_fig', 'city/porto']);
    expect(scenario.diff.documents[0].changed.map((c) => c.id)).toEqual(['rel:located_in']);
    expect(scenario.diff.documents[2].added).toEqual([
      { id: 'attr:population', section: 'City Information', label: 'Population', value: 'unknown population' },
    ]);
  });

  it('never modifies the source graph', async () => {
    const graph = buildRestaurantGraph();
    const payload = graph.toPayload();
    await simulateUpdate(graph, renderNeighborhood(graph, 'A'), 'A', { rng: createRng(7), kind: 'relationship' });
    expect(graph.toPayload()).toEqual(payload);
  });

  it('yields a diff that round-trips between the old and new documents', async () => {
    const graph = buildRestaurantGraph();
    const documents = renderNeighborhood(graph, 'A');
    const scenario = await simulateUpdate(graph, documents, 'A', { rng: createRng(11) });

    const updated = applyDiff(documents, scenario.diff);
    expect(updated.documents.map((d) => d.key)).toEqual(scenario.diff.after_keys);
    expect(applyDiff(updated, invertDiff(scenario.diff))).toEqual(documents);
  });

  it('changes a focal attribute at hop 0', async () => {
    const graph = buildRestaurantGraph();
    const scenario = await simulateUpdate(graph, renderNeighborhood(graph, 'A'), 'A', {
      rng: createRng(5),
      kind: 'attribute',
      hop: 0,
    });

    expect(scenario.fact.kind).toBe('attribute');
    if (scenario.fact.kind !== 'attribute') return;
    expect(scenario.fact.attribute).toBe('age');
    expect(scenario.fact.old_value).toBe(34);
    expect(typeof scenario.fact.new_value === 'number' && scenario.fact.new_value - 34).toBeGreaterThanOrEqual(1);
    expect(formatUpdatePath(scenario.old_path)).toEqual(['Ana Ruiz', 'age=34']);
    expect(changedKeys(scenario.diff)).toEqual(['user']);
  });

  it('keeps every changed document on the old or new fact path', async () => {
    const graph = buildRestaurantGraph();
    const documents = renderNeighborhood(graph, 'A');
    for (const seed of [1, 2, 3, 4, 5, 6]) {
      const scenario = await simulateUpdate(graph, documents, 'A', { rng: createRng(seed) });
      const pathNodes = new Set([...scenario.old_path, ...scenario.new_path].map((s) => s.node_id));
      for (const doc of scenario.diff.documents) {
        const nodeIds = [doc.node_id, doc.node_id_change?.before].filter((id): id is string => id !== undefined);
        expect(nodeIds.some((id) => pathNodes.has(id))).toBe(true);
      }
    }
  });

  it('is reproducible for the same seed', async () => {
    const graph = buildRestaurantGraph();
    const documents = renderNeighborhood(graph, 'A');
    const run = () => simulateUpdate(graph, documents, 'A', { rng: createRng('same'), idFactory: sequenceIds('N', 'S') });
    expect(await run()).toEqual(await run());
  });

  it('throws NoMutableFactError when nothing matches the filters', async () => {
    const graph = buildRestaurantGraph();
    const documents = renderNeighborhood(graph, 'A', { radius: 1 });
    await expect(simulateUpdate(graph, documents, 'A', { rng: createRng(1), hop: 2 })).rejects.toThrow(
      NoMutableFactError
    );
  });

  it('throws NoMutableFactError for a focal node with only immutable facts', async () => {
    const graph = new KnowledgeGraph();
    graph.addNode({ id: 'A', type: 'person', name: 'Ana Ruiz', attributes: { full_name: 'Ana Maria Ruiz' } });
    await expect(simulateUpdate(graph, renderNeighborhood(graph, 'A'), 'A', { rng: createRng(1) })).rejects.toThrow(
      'No mutable fact for focal node A'
    );
  });

  it('gives up after the attempt budget', async () => {
    const graph = buildRestaurantGraph();
    const documents = renderNeighborhood(graph, 'A');

    try {
      await simulateUpdate(graph, documents, 'A', {
        rng: createRng(1),
        kind: 'attribute',
        maxAttempts: 2,
        proposer: noChangeProposer,
      });
      expect.unreachable('simulateUpdate should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(MutationExhaustedError);
      if (!(error instanceof MutationExhaustedError)) return;
      expect(error.message).toBe('No valid update for focal node A after 2 attempt(s)');
      expect(error.failures).toHaveLength(2);
      expect(error.failures[0].reason).toMatch(/equals the current value$/);
    }
  });

  it('discards a change that reaches a document off the fact path', async () => {
    const graph = buildRestaurantGraph();
    graph.addNode({ id: 'C2', type: 'city', name: 'Porto', attributes: { population: 1200 } });
    graph.addEdge('A', 'born_in', 'C2');
    const documents = renderNeighborhood(graph, 'A');

    try {
      await simulateUpdate(graph, documents, 'A', { rng: createRng(1), kind: 'relationship', hop: 2 });
      expect.unreachable('simulateUpdate should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(MutationExhaustedError);
      if (!(error instanceof MutationExhaustedError)) return;
      expect(error.failures.map((f) => f.reason)).toEqual([
        'Diff reaches documents off the fact path: city/porto_2',
      ]);
    }
  });

  it('counts generation failures as discarded attempts', async () => {
    const failing: MutationProposer = {
      proposeAttributeValue: async () => {
        throw new GenerationError('service unavailable', 'REQUEST_FAILED');
      },
      proposePlaceholder: async () => {
        throw new GenerationError('service unavailable', 'REQUEST_FAILED');
      },
    };
    const graph = buildRestaurantGraph();
    await expect(
      simulateUpdate(graph, renderNeighborhood(graph, 'A'), 'A', { rng: createRng(1), proposer: failing })
    ).rejects.toThrow(MutationExhaustedError);
  });

  it('propagates unexpected errors', async () => {
    const broken: MutationProposer = {
      proposeAttributeValue: async () => {
        throw new TypeError('boom');
      },
      proposePlaceholder: async () => {
        throw new TypeError('boom');
      },
    };
    const graph = buildRestaurantGraph();
    await expect(
      simulateUpdate(graph, renderNeighborhood(graph, 'A'), 'A', { rng: createRng(1), proposer: broken })
    ).rejects.toThrow('boom');
  });

  it('round-trips when a relation label contains a hash', async () => {
    const graph = buildRestaurantGraph();
    graph.addNode({ id: 'D', type: 'club', name: 'Chess Club', attributes: { members: 40 } });
    graph.addEdge('A', 'member', 'B');
    graph.addEdge('A', 'member', 'C');
    graph.addEdge('A', 'member#2', 'D');
    const documents = renderNeighborhood(graph, 'A');

    const scenario = await simulateUpdate(graph, documents, 'A', { rng: createRng(3), kind: 'attribute', hop: 0 });

    const updated = applyDiff(documents, scenario.diff);
    expect(updated.documents[0].fields.find((f) => f.id === 'attr:age')?.value).toBe(
      scenario.fact.kind === 'attribute' ? String(scenario.fact.new_value) : undefined
    );
    expect(applyDiff(updated, invertDiff(scenario.diff))).toEqual(documents);
  });

  it('renders placeholder attributes in proposed order', async () => {
    const ordered: MutationProposer = {
      proposeAttributeValue: async ({ current }) => current,
      proposePlaceholder: async () => ({
        name: 'Braga',
        attributes: new Map([
          ['region', 'Minho'],
          ['2024', 'city of culture'],
        ]),
      }),
    };
    const graph = buildRestaurantGraph();
    const scenario = await simulateUpdate(graph, renderNeighborhood(graph, 'A'), 'A', {
      rng: createRng(1),
      kind: 'relationship',
      hop: 2,
      proposer: ordered,
    });

    const added = scenario.diff.documents.find((d) => d.status === 'added');
    expect(added?.added.map((f) => f.id)).toEqual(['attr:region', 'attr:2024']);
  });
});

describe('simulateUpdate below the default radius', () => {
  /** A works at B and lives in C; B is located in C */
  function buildTriangleGraph(): KnowledgeGraph {
    const graph = new KnowledgeGraph();
    graph.addNode({ id: 'A', type: 'person', name: 'Ana Ruiz', attributes: { age: 34 } });
    graph.addNode({ id: 'B', type: 'restaurant', name: 'Fig', attributes: { cuisine: 'Greek' } });
    graph.addNode({ id: 'C', type: 'city', name: 'Porto', attributes: { population: 230000 } });
    graph.addEdge('A', 'works_at', 'B');
    graph.addEdge('A', 'lives_in', 'C');
    graph.addEdge('B', 'located_in', 'C');
    return graph;
  }

  it('offers only relationships whose new target stays within radius 1', () => {
    const graph = buildTriangleGraph();
    const candidates = collectMutableFacts(graph, renderNeighborhood(graph, 'A', { radius: 1 }), 'A');
    expect(
      candidates.map((c) =>
        c.fact.kind === 'attribute'
          ? `${c.hop_distance}:${c.fact.node_id}.${c.fact.attribute}`
          : `${c.hop_distance}:${c.fact.source_id}-${c.fact.relation}->${c.fact.old_target_id}`
      )
    ).toEqual(['0:A.age', '1:A-works_at->B', '1:A-lives_in->C', '1:B.cuisine', '1:C.population']);
  });

  it('has no two-hop relationship to change at radius 1', async () => {
    const graph = buildTriangleGraph();
    await expect(
      simulateUpdate(graph, renderNeighborhood(graph, 'A', { radius: 1 }), 'A', {
        rng: createRng(1),
        kind: 'relationship',
        hop: 2,
      })
    ).rejects.toThrow(NoMutableFactError);
  });

  it('adds the new target document for a relationship change at radius 1', async () => {
    const graph = buildTriangleGraph();
    const documents = renderNeighborhood(graph, 'A', { radius: 1 });
    const scenario = await simulateUpdate(graph, documents, 'A', { rng: createRng(1), kind: 'relationship' });

    expect(scenario.hop_distance).toBe(1);
    expect(scenario.fact.kind).toBe('relationship');
    if (scenario.fact.kind !== 'relationship') return;
    // moving lives_in would drop the Fig -> Porto link from an off-path document
    expect(scenario.fact.old_target_id).toBe('B');
    const newTargetId = scenario.fact.new_target_id;
    expect(newTargetId).toBeDefined();
    expect(scenario.diff.documents.filter((d) => d.status === 'added').map((d) => d.node_id)).toEqual([newTargetId]);
    expect(scenario.diff.documents.filter((d) => d.status === 'removed').map((d) => d.key)).toEqual(['restaurant/fig']);
    expect(applyDiff(applyDiff(documents, scenario.diff), invertDiff(scenario.diff))).toEqual(documents);
  });

  it('only changes focal attributes at radius 0', async () => {
    const graph = buildTriangleGraph();
    const documents = renderNeighborhood(graph, 'A', { radius: 0 });

    expect(collectMutableFacts(graph, documents, 'A').map((c) => c.fact.kind + ':' + c.changed_node_id)).toEqual([
      'attribute:A',
    ]);
    await expect(simulateUpdate(graph, documents, 'A', { rng: createRng(1), kind: 'relationship' })).rejects.toThrow(
      NoMutableFactError
    );
    const scenario = await simulateUpdate(graph, documents, 'A', { rng: createRng(1) });
    expect(changedKeys(scenario.diff)).toEqual(['user']);
  });
});
