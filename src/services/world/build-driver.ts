/**
 * World Build Driver
 *
 * Builds a knowledge graph for a world description in three generation
 * phases:
 *
 * 1. stubs: people and entities with ids and names
 * 2. edges: relations between existing ids (names are accepted as a fallback
 *    for ids; unresolvable, self-loop and duplicate edges are skipped)
 * 3. enrichment: attributes for every node, given a readable summary of the
 *    node and its neighbors
 *
 * The result is not validated here; callers run the consistency validator.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/world/build-driver
 */

import { z } from 'zod';
import { AttributeValueSchema, PERSON_TYPE } from '../../models/knowledge-graph.js';
import { GraphError, KnowledgeGraph } from '../knowledge-graph/graph.js';
import type { TextGenerator } from '../generation/types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const StubResponseSchema = z.object({
  people: z.array(z.object({ id: z.string().min(1), name: z.string().min(1) })),
  entities: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      entity_type: z.string().nullish(),
    })
  ),
});

export const EdgeResponseSchema = z.object({
  edges: z.array(
    z.object({
      subject_id: z.string().min(1),
      predicate: z.string().min(1),
      object_id: z.string().min(1),
    })
  ),
});

export const AttributeListSchema = z
  .object({
    attributes: z.array(z.object({ key: z.string().min(1), value: AttributeValueSchema })),
  })
  .strict();

export type StubResponse = z.infer<typeof StubResponseSchema>;
export type EdgeResponse = z.infer<typeof EdgeResponseSchema>;

/** Keys that describe the node itself and are never stored as attributes */
const RESERVED_ATTRIBUTE_KEYS = new Set(['id', 'name', 'type']);

const DEFAULT_ENTITY_TYPE = 'entity';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface BuildWorldOptions {
  worldDescription: string;
  numPeople: number;
  numEntities: number;
}

export interface SkippedEdge {
  subject: string;
  predicate: string;
  object: string;
  reason: string;
}

export interface EnrichmentFailure {
  node_id: string;
  message: string;
}

export interface BuildWorldResult {
  graph: KnowledgeGraph;
  skipped_edges: SkippedEdge[];
  enrichment_failures: EnrichmentFailure[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/** `Italian Restaurant` -> `italian_restaurant` */
export function normalizeEntityType(entityType: string | null | undefined): string {
  const normalized = (entityType ?? '').trim().toLowerCase().replace(/\s+/g, '_');
  return normalized.length > 0 ? normalized : DEFAULT_ENTITY_TYPE;
}

/**
 * Resolve a reference returned by the model to a node id: an exact id first,
 * then the first node whose name matches.
 */
export function resolveNodeReference(graph: KnowledgeGraph, reference: string): string | null {
  if (graph.hasNode(reference)) return reference;
  const byName = graph.nodes().find((n) => n.name === reference);
  return byName ? byName.id : null;
}

/**
 * Readable summary of a node, its attributes, neighbors and relations, used
 * as enrichment context.
 */
export function describeNodeForEnrichment(graph: KnowledgeGraph, nodeId: string): string {
  const node = graph.getNode(nodeId);
  if (!node) return `[!] Node ${nodeId} does not exist.`;

  const parts = [`NODE: ${node.name} (ID: ${node.id}, Type: ${node.type})`, 'ATTRIBUTES:'];
  for (const [key, value] of node.attributes) {
    parts.push(`  - ${key}: ${String(value)}`);
  }

  const neighbors = graph.neighbors(nodeId);
  if (neighbors.length > 0) {
    parts.push('', 'RELATIONS:');
    for (const entry of neighbors) {
      const other = graph.getNode(entry.node_id);
      const otherName = other ? other.name : entry.node_id;
      parts.push(
        entry.direction === 'out'
          ? `  ${node.name} --[${entry.edge.relation}]--> ${otherName}`
          : `  ${otherName} --[${entry.edge.relation}]--> ${node.name}`
      );
    }
  }
  return parts.join('\n');
}

// ═══════════════════════════════════════════════════════════════════════════════
// PHASES
// ═══════════════════════════════════════════════════════════════════════════════

export async function generateStubs(
  generator: TextGenerator,
  graph: KnowledgeGraph,
  options: BuildWorldOptions
): Promise<void> {
  const stubs = await generator.generate({
    system:
      'You are a knowledge graph stub generator and world builder. Think through the world description ' +
      'and create fictional people and entities that fit it. Be creative. Every id must be unique.',
    prompt: `Create people=${options.numPeople} and entities=${Math.max(1, options.numEntities)} using: ${options.worldDescription}`,
    schema: StubResponseSchema,
    schemaName: 'StubResponse',
    schemaHint:
      '{"people": [{"id": string, "name": string}], "entities": [{"id": string, "name": string, "entity_type": string}]}',
  });

  for (const person of stubs.people) {
    graph.addNode({ id: person.id, type: PERSON_TYPE, name: person.name });
  }
  for (const entity of stubs.entities) {
    graph.addNode({ id: entity.id, type: normalizeEntityType(entity.entity_type), name: entity.name });
  }
  console.error(`[WorldBuilder] Stubs: ${stubs.people.length} people, ${stubs.entities.length} entities`);
}

export async function generateEdges(
  generator: TextGenerator,
  graph: KnowledgeGraph,
  worldDescription: string
): Promise<SkippedEdge[]> {
  const nodes = graph.nodes().map((n) => ({ id: n.id, name: n.name, type: n.type }));
  const response = await generator.generate({
    system: `Given a world description, plan plausible relations. No self-loops or duplicates.\n\nWorld: ${worldDescription}`,
    prompt: JSON.stringify(nodes),
    schema: EdgeResponseSchema,
    schemaName: 'EdgeResponse',
    schemaHint: '{"edges": [{"subject_id": string, "predicate": snake_case string, "object_id": string}]}',
  });

  const skipped: SkippedEdge[] = [];
  const skip = (edge: EdgeResponse['edges'][number], reason: string): void => {
    console.error(`[WorldBuilder] WARN skipping edge ${edge.subject_id} -${edge.predicate}-> ${edge.object_id}: ${reason}`);
    skipped.push({ subject: edge.subject_id, predicate: edge.predicate, object: edge.object_id, reason });
  };

  for (const edge of response.edges) {
    const sourceId = resolveNodeReference(graph, edge.subject_id);
    if (sourceId === null) {
      skip(edge, `subject ${edge.subject_id} not found by id or name`);
      continue;
    }
    const targetId = resolveNodeReference(graph, edge.object_id);
    if (targetId === null) {
      skip(edge, `object ${edge.object_id} not found by id or name`);
      continue;
    }
    try {
      graph.addEdge(sourceId, edge.predicate, targetId);
    } catch (error) {
      if (!(error instanceof GraphError)) throw error;
      skip(edge, error.message);
    }
  }

  console.error(`[WorldBuilder] Edges: ${graph.edges().length} added, ${skipped.length} skipped`);
  return skipped;
}

/**
 * Ask for attributes of every node concurrently (the generator bounds
 * concurrency), then apply them in node order. A failed node keeps its
 * current attributes and is reported.
 */
export async function enrichNodes(
  generator: TextGenerator,
  graph: KnowledgeGraph,
  worldDescription: string
): Promise<EnrichmentFailure[]> {
  const nodes = graph.nodes();
  const system =
    'You are a knowledge graph enricher. Given the world description and a node, add attributes that enrich ' +
    'the node data. Give people distinct attributes for diversity. Add made-up details that do NOT conflict ' +
    `with existing information.\n${worldDescription}`;

  const results = await Promise.allSettled(
    nodes.map((node) =>
      generator.generate({
        system,
        prompt: `Node:\n${describeNodeForEnrichment(graph, node.id)}`,
        schema: AttributeListSchema,
        schemaName: 'AttributeList',
        schemaHint: '{"attributes": [{"key": snake_case string, "value": string | number | boolean}]}',
      })
    )
  );

  const failures: EnrichmentFailure[] = [];
  results.forEach((result, index) => {
    const node = nodes[index];
    if (result.status === 'rejected') {
      const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
      console.error(`[WorldBuilder] WARN enrichment failed for ${node.name} (${node.id}): ${message}`);
      failures.push({ node_id: node.id, message });
      return;
    }
    for (const pair of result.value.attributes) {
      if (RESERVED_ATTRIBUTE_KEYS.has(pair.key)) continue;
      graph.setAttribute(node.id, pair.key, pair.value);
    }
  });

  return failures;
}

/**
 * Build a world graph: stubs, then edges, then enrichment.
 *
 * @throws GenerationError when the stub or edge phase fails
 */
export async function buildWorldGraph(generator: TextGenerator, options: BuildWorldOptions): Promise<BuildWorldResult> {
  const graph = new KnowledgeGraph();
  await generateStubs(generator, graph, options);
  const skippedEdges = await generateEdges(generator, graph, options.worldDescription);
  const enrichmentFailures = await enrichNodes(generator, graph, options.worldDescription);

  const stats = graph.getStats();
  console.error(`[WorldBuilder] Built graph: ${stats.node_count} nodes, ${stats.edge_count} edges`);
  return { graph, skipped_edges: skippedEdges, enrichment_failures: enrichmentFailures };
}
