/**
 * World build driver tests
 *
 * Generation is answered by FakeTextGenerator; the graph mutations are real.
 */

import { describe, it, expect } from 'vitest';
import {
  buildWorldGraph,
  describeNodeForEnrichment,
  normalizeEntityType,
  resolveNodeReference,
} from '../../../../src/services/world/build-driver.js';
import { GenerationError } from '../../../../src/services/generation/types.js';
import { FakeTextGenerator, buildRestaurantGraph } from '../../helpers/graphs.js';

const STUBS = {
  people: [
    { id: 'p1', name: 'Ana Ruiz' },
    { id: 'p2', name: 'Ben Okafor' },
  ],
  entities: [
    { id: 'e1', name: 'Blue Fig', entity_type: 'Italian Restaurant' },
    { id: 'e2', name: 'Porto', entity_type: null },
  ],
};

const EDGES = {
  edges: [
    { subject_id: 'p1', predicate: 'works_at', object_id: 'Blue Fig' },
    { subject_id: 'p2', predicate: 'knows', object_id: 'p9' },
    { subject_id: 'p1', predicate: 'works_at', object_id: 'e1' },
    { subject_id: 'e1', predicate: 'located_in', object_id: 'e2' },
    { subject_id: 'Ben Okafor', predicate: 'friend_of', object_id: 'p2' },
  ],
};

function worldGenerator(): FakeTextGenerator {
  return new FakeTextGenerator([
    STUBS,
    EDGES,
    { attributes: [{ key: 'age', value: 34 }, { key: 'name', value: 'Someone Else' }] },
    new Error('quota exceeded'),
    { attributes: [{ key: 'cuisine', value: 'Italian' }] },
    { attributes: [] },
  ]);
}

describe('buildWorldGraph', () => {
  it('creates people and typed entities from the stub phase', async () => {
    const { graph } = await buildWorldGraph(worldGenerator(), {
      worldDescription: 'a small coastal town',
      numPeople: 2,
      numEntities: 2,
    });

    expect(graph.nodes().map((n) => [n.id, n.type, n.name])).toEqual([
      ['p1', 'person', 'Ana Ruiz'],
      ['p2', 'person', 'Ben Okafor'],
      ['e1', 'italian_restaurant', 'Blue Fig'],
      ['e2', 'entity', 'Porto'],
    ]);
  });

  it('resolves names to ids and skips unusable edges', async () => {
    const result = await buildWorldGraph(worldGenerator(), {
      worldDescription: 'a small coastal town',
      numPeople: 2,
      numEntities: 2,
    });

    expect(result.graph.edges().map((e) => `${e.source_id}-${e.relation}->${e.target_id}`)).toEqual([
      'p1-works_at->e1',
      'e1-located_in->e2',
    ]);
    expect(result.skipped_edges).toEqual([
      { subject: 'p2', predicate: 'knows', object: 'p9', reason: 'object p9 not found by id or name' },
      {
        subject: 'p1',
        predicate: 'works_at',
        object: 'e1',
        reason: 'Duplicate edge rejected: p1 -works_at-> e1',
      },
      {
        subject: 'Ben Okafor',
        predicate: 'friend_of',
        object: 'p2',
        reason: 'Self-loop rejected on node p2 (friend_of)',
      },
    ]);
  });

  it('applies enrichment per node and reports failures without aborting', async () => {
    const result = await buildWorldGraph(worldGenerator(), {
      worldDescription: 'a small coastal town',
      numPeople: 2,
      numEntities: 2,
    });

    expect([...(result.graph.getNode('p1')?.attributes ?? [])]).toEqual([['age', 34]]);
    expect(result.graph.getNode('p2')?.attributes.size).toBe(0);
    expect(result.graph.getNode('e1')?.attributes.get('cuisine')).toBe('Italian');
    expect(result.enrichment_failures).toEqual([{ node_id: 'p2', message: 'quota exceeded' }]);
  });

  it('sends the world description and node context to the generator', async () => {
    const generator = worldGenerator();
    await buildWorldGraph(generator, { worldDescription: 'a small coastal town', numPeople: 2, numEntities: 2 });

    expect(generator.requests.map((r) => r.schemaName)).toEqual([
      'StubResponse',
      'EdgeResponse',
      'AttributeList',
      'AttributeList',
      'AttributeList',
      'AttributeList',
    ]);
    expect(generator.requests[0].prompt).toBe('Create people=2 and entities=2 using: a small coastal town');
    expect(generator.requests[2].prompt).toBe(
      'Node:\nNODE: Ana Ruiz (ID: p1, Type: person)\nATTRIBUTES:\n\nRELATIONS:\n  Ana Ruiz --[works_at]--> Blue Fig'
    );
  });

  it('fails when the stub phase cannot be generated', async () => {
    const generator = new FakeTextGenerator([new GenerationError('StubResponse generation failed', 'REQUEST_FAILED')]);
    await expect(
      buildWorldGraph(generator, { worldDescription: 'anywhere', numPeople: 1, numEntities: 0 })
    ).rejects.toThrow(GenerationError);
  });
});

describe('normalizeEntityType', () => {
  it('snake-cases the type and defaults to entity', () => {
    expect(normalizeEntityType('  Italian   Restaurant ')).toBe('italian_restaurant');
    expect(normalizeEntityType('')).toBe('entity');
    expect(normalizeEntityType(undefined)).toBe('entity');
  });
});

describe('resolveNodeReference', () => {
  it('prefers ids and falls back to names', () => {
    const graph = buildRestaurantGraph();
    expect(resolveNodeReference(graph, 'B')).toBe('B');
    expect(resolveNodeReference(graph, 'Porto')).toBe('C');
    expect(resolveNodeReference(graph, 'Lisbon')).toBeNull();
  });
});

describe('describeNodeForEnrichment', () => {
  it('lists attributes and relations in both directions', () => {
    expect(describeNodeForEnrichment(buildRestaurantGraph(), 'B')).toBe(
      [
        'NODE: Blue Fig (ID: B, Type: restaurant)',
        'ATTRIBUTES:',
        '  - cuisine: Greek',
        '',
        'RELATIONS:',
        '  Ana Ruiz --[works_at]--> Blue Fig',
        '  Blue Fig --[located_in]--> Porto',
      ].join('\n')
    );
  });

  it('marks a missing node', () => {
    expect(describeNodeForEnrichment(buildRestaurantGraph(), 'Z')).toBe('[!] Node Z does not exist.');
  });
});
