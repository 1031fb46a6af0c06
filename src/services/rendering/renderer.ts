/**
 * Neighborhood Renderer
 *
 * Turns the bounded-radius neighborhood of a focal node into a set of
 * cross-linked documents: one document per collected node, attribute fields
 * under a type heading, and one relationship field per outgoing edge whose
 * target is also collected.
 *
 * Output is a pure function of (graph, focal node, radius): ordering follows
 * node creation, then attribute and edge insertion order.
 *
 * @module services/rendering/renderer
 */

import {
  RELATIONSHIPS_SECTION,
  USER_DOCUMENT_KEY,
  documentLinks,
  type DocumentField,
  type DocumentSet,
  type KnowledgeDocument,
} from '../../models/document.js';
import type { KnowledgeNode } from '../../models/knowledge-graph.js';
import type { KnowledgeGraph } from '../knowledge-graph/graph.js';
import { breadthFirst } from '../knowledge-graph/traversal.js';

export const DEFAULT_RADIUS = 2;

export interface RenderOptions {
  radius?: number;
}

/**
 * Raised when a rendered link points at a key missing from its own set.
 * Rendering only links collected nodes, so this signals a renderer defect.
 */
export class LinkResolutionError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LinkResolutionError';
    Error.captureStackTrace?.(this, LinkResolutionError);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// KEY AND LABEL HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Filesystem and reference safe slug: lowercase, whitespace to `_`,
 * anything other than letters, digits, `_` and `-` dropped.
 */
export function slugify(value: string): string {
  const slug = value
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}_-]/gu, '');
  return slug.length > 0 ? slug : 'unnamed';
}

/**
 * Field id of the `occurrence`-th outgoing edge with `relation`. The relation
 * is percent-encoded so a `#` inside a label never reads as an occurrence.
 */
export function relationFieldId(relation: string, occurrence: number): string {
  const encoded = encodeURIComponent(relation);
  return occurrence === 1 ? `rel:${encoded}` : `rel:${encoded}#${occurrence}`;
}

/** `works_at` -> `Works At` */
export function humanizeLabel(value: string): string {
  return value
    .split(/[_\s]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

export function sectionHeading(type: string): string {
  return `${humanizeLabel(type)} Information`;
}

/**
 * Assign a unique document key to every collected node, walking nodes in
 * creation order so suffixes are stable.
 */
export function assignDocumentKeys(nodes: readonly KnowledgeNode[], focalNodeId: string): Map<string, string> {
  const keys = new Map<string, string>();
  const used = new Set<string>([USER_DOCUMENT_KEY]);
  keys.set(focalNodeId, USER_DOCUMENT_KEY);

  for (const node of nodes) {
    if (node.id === focalNodeId) continue;
    const base = `${slugify(node.type)}/${slugify(node.name)}`;
    let key = base;
    let suffix = 2;
    while (used.has(key)) {
      key = `${base}_${suffix++}`;
    }
    used.add(key);
    keys.set(node.id, key);
  }
  return keys;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Render the focal node's neighborhood.
 *
 * @throws GraphError NODE_NOT_FOUND for an unknown focal node
 * @throws LinkResolutionError if a produced link does not resolve
 */
export function renderNeighborhood(
  graph: KnowledgeGraph,
  focalNodeId: string,
  options: RenderOptions = {}
): DocumentSet {
  const radius = options.radius ?? DEFAULT_RADIUS;
  graph.requireNode(focalNodeId);

  const collectedIds = new Set(breadthFirst(graph, focalNodeId, radius).keys());
  const nodes: KnowledgeNode[] = [];
  for (const id of collectedIds) {
    const node = graph.getNode(id);
    if (node) nodes.push(node);
  }
  nodes.sort((a, b) => {
    if (a.id === focalNodeId) return -1;
    if (b.id === focalNodeId) return 1;
    return a.created_at - b.created_at;
  });

  const keys = assignDocumentKeys(nodes, focalNodeId);
  const documents = nodes.map((node) => renderNode(graph, node, keys));
  const set: DocumentSet = { focal_node_id: focalNodeId, radius, documents };

  assertLinkClosure(set);
  return set;
}

function renderNode(graph: KnowledgeGraph, node: KnowledgeNode, keys: Map<string, string>): KnowledgeDocument {
  const heading = sectionHeading(node.type);
  const fields: DocumentField[] = [];

  for (const [name, value] of node.attributes) {
    fields.push({ id: `attr:${name}`, section: heading, label: humanizeLabel(name), value: String(value) });
  }

  const relationCounts = new Map<string, number>();
  for (const edge of graph.outgoing(node.id)) {
    const targetKey = keys.get(edge.target_id);
    const target = graph.getNode(edge.target_id);
    if (targetKey === undefined || !target) continue;

    const occurrence = (relationCounts.get(edge.relation) ?? 0) + 1;
    relationCounts.set(edge.relation, occurrence);
    fields.push({
      id: relationFieldId(edge.relation, occurrence),
      section: RELATIONSHIPS_SECTION,
      label: humanizeLabel(edge.relation),
      value: target.name,
      link: { relation: edge.relation, target_key: targetKey, target_node_id: target.id },
    });
  }

  const key = keys.get(node.id);
  if (key === undefined) {
    throw new LinkResolutionError(`No document key assigned to node ${node.id}`, { node_id: node.id });
  }
  return { key, node_id: node.id, title: node.name, fields };
}

/**
 * @throws LinkResolutionError listing every dangling link, or every field id
 * repeated within one document
 */
export function assertLinkClosure(set: DocumentSet): void {
  const repeated = set.documents.flatMap((doc) => {
    const seen = new Set<string>();
    return doc.fields.flatMap((field) => {
      if (!seen.has(field.id)) {
        seen.add(field.id);
        return [];
      }
      return [`${doc.key}#${field.id}`];
    });
  });
  if (repeated.length > 0) {
    throw new LinkResolutionError(`Rendered document set repeats field id(s): ${repeated.join(', ')}`, {
      repeated,
    });
  }

  const keys = new Set(set.documents.map((d) => d.key));
  const dangling = set.documents.flatMap((doc) =>
    documentLinks(doc)
      .filter((link) => !keys.has(link.target_key))
      .map((link) => ({ from: doc.key, relation: link.relation, target_key: link.target_key }))
  );
  if (dangling.length > 0) {
    throw new LinkResolutionError(
      `Rendered document set has ${dangling.length} dangling link(s): ` +
        dangling.map((d) => `${d.from} -${d.relation}-> ${d.target_key}`).join(', '),
      { dangling }
    );
  }
}
