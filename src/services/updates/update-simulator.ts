/**
 * Update Simulator
 *
 * Picks one changeable fact of a rendered neighborhood, applies the change to
 * a private clone of the graph, re-validates and re-renders, and returns the
 * scenario with the exact document diff it produced.
 *
 * An attempt is discarded (and the next candidate tried) when the mutated
 * graph is invalid, when the diff is empty, or when the diff reaches a
 * document outside the old and new fact paths.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/updates/update-simulator
 */

import { v4 as uuidv4 } from 'uuid';
import type { DocumentSet } from '../../models/document.js';
import type { HopDistance, PathStep } from '../../models/query.js';
import type { MutableFact, UpdateKind, UpdateScenario } from '../../models/update.js';
import { shuffle, type Rng } from '../../utils/random.js';
import { ValidationError } from '../../utils/validation.js';
import { GenerationError } from '../generation/types.js';
import { GraphError, type KnowledgeGraph } from '../knowledge-graph/graph.js';
import { distancesFrom } from '../knowledge-graph/traversal.js';
import { validateGraph } from '../knowledge-graph/validator.js';
import { renderNeighborhood } from '../rendering/renderer.js';
import { changedKeys, diffDocumentSets } from './diff-service.js';
import { DeterministicProposer, type MutationProposer } from './proposer.js';

export const DEFAULT_MAX_ATTEMPTS = 5;

/** Identity-like attributes that an update never touches */
export const DEFAULT_IMMUTABLE_ATTRIBUTES: readonly string[] = [
  'entity_type',
  'full_name',
  'birth_date',
  'birth_place',
  'death_date',
  'death_place',
];

export interface SimulateUpdateOptions {
  rng: Rng;
  kind?: UpdateKind;
  hop?: HopDistance;
  maxAttempts?: number;
  proposer?: MutationProposer;
  /** Ids for the scenario and for placeholder nodes */
  idFactory?: () => string;
  immutableAttributes?: readonly string[];
}

export interface MutationCandidate {
  fact: MutableFact;
  hop_distance: HopDistance;
  changed_node_id: string;
}

export interface MutationAttemptFailure {
  fact: MutableFact;
  reason: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export class NoMutableFactError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'NoMutableFactError';
    Error.captureStackTrace?.(this, NoMutableFactError);
  }
}

export class MutationExhaustedError extends Error {
  constructor(
    message: string,
    public readonly failures: MutationAttemptFailure[],
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MutationExhaustedError';
    Error.captureStackTrace?.(this, MutationExhaustedError);
  }
}

/** Attempt-level rejection; never leaves this module */
class AttemptRejected extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AttemptRejected';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CANDIDATES
// ═══════════════════════════════════════════════════════════════════════════════

function asHop(distance: number | undefined): HopDistance | null {
  return distance === 0 || distance === 1 || distance === 2 ? distance : null;
}

/**
 * Every fact of `documents` an update may change, in document then field
 * order. A relationship is offered only when its placeholder target still
 * falls within the rendering radius.
 */
export function collectMutableFacts(
  graph: KnowledgeGraph,
  documents: DocumentSet,
  focalNodeId: string,
  immutableAttributes: readonly string[] = DEFAULT_IMMUTABLE_ATTRIBUTES
): MutationCandidate[] {
  const distances = distancesFrom(graph, focalNodeId, documents.radius);
  const immutable = new Set(immutableAttributes);
  const candidates: MutationCandidate[] = [];

  for (const document of documents.documents) {
    const node = graph.getNode(document.node_id);
    if (!node) continue;
    const distance = distances.get(node.id);

    const attributeHop = asHop(distance);
    if (attributeHop !== null) {
      for (const [attribute, value] of node.attributes) {
        if (immutable.has(attribute)) continue;
        candidates.push({
          fact: { kind: 'attribute', node_id: node.id, attribute, old_value: value },
          hop_distance: attributeHop,
          changed_node_id: node.id,
        });
      }
    }

    if (distance === undefined || distance + 1 > documents.radius) continue;
    const relationshipHop = asHop(distance + 1);
    if (relationshipHop === null) continue;
    for (const field of document.fields) {
      if (!field.link || field.link.target_node_id === focalNodeId) continue;
      candidates.push({
        fact: {
          kind: 'relationship',
          source_id: node.id,
          relation: field.link.relation,
          old_target_id: field.link.target_node_id,
        },
        hop_distance: relationshipHop,
        changed_node_id: node.id,
      });
    }
  }

  return candidates;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PATHS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Steps from the focal node to the changed fact: the route to the owning
 * node, then the attribute (with its value) or the relationship to the
 * fact's target. `side` selects the old or new value/target.
 */
export function buildUpdatePath(
  graph: KnowledgeGraph,
  focalNodeId: string,
  fact: MutableFact,
  side: 'old' | 'new'
): PathStep[] {
  const ownerId = fact.kind === 'attribute' ? fact.node_id : fact.source_id;
  const hops = graph.pathBetween(focalNodeId, ownerId);
  if (!hops) {
    throw new AttemptRejected(`No path from ${focalNodeId} to ${ownerId}`);
  }

  const steps: PathStep[] = hops.slice(0, -1).map((hop, i) => {
    const next = hops[i + 1];
    return {
      node_id: hop.node_id,
      node_name: graph.requireNode(hop.node_id).name,
      label: next.edge ? next.edge.relation : null,
      label_kind: 'relation',
      direction: next.direction,
    };
  });

  const owner = graph.requireNode(ownerId);
  if (fact.kind === 'attribute') {
    const value = side === 'old' ? fact.old_value : fact.new_value;
    steps.push({
      node_id: owner.id,
      node_name: owner.name,
      label: fact.attribute,
      label_kind: 'attribute',
      direction: null,
      value: value === undefined ? undefined : String(value),
    });
    return steps;
  }

  const targetId = side === 'old' ? fact.old_target_id : fact.new_target_id;
  steps.push({ node_id: owner.id, node_name: owner.name, label: fact.relation, label_kind: 'relation', direction: 'out' });
  if (targetId !== undefined) {
    const target = graph.requireNode(targetId);
    steps.push({ node_id: target.id, node_name: target.name, label: null, label_kind: null, direction: null });
  }
  return steps;
}

/** `[Ana, works_at, Blue Fig, rating=4]` */
export function formatUpdatePath(path: readonly PathStep[]): string[] {
  const tokens: string[] = [];
  for (const step of path) {
    tokens.push(step.node_name);
    if (step.label === null) continue;
    if (step.label_kind === 'attribute') {
      tokens.push(step.value === undefined ? step.label : `${step.label}=${step.value}`);
    } else {
      tokens.push(step.label);
    }
  }
  return tokens;
}

function describeFact(fact: MutableFact): string {
  return fact.kind === 'attribute'
    ? `${fact.node_id}.${fact.attribute}`
    : `${fact.source_id} -${fact.relation}-> ${fact.old_target_id}`;
}

function documentKeysByNode(set: DocumentSet): Map<string, string> {
  return new Map(set.documents.map((d) => [d.node_id, d.key]));
}

// ═══════════════════════════════════════════════════════════════════════════════
// SIMULATION
// ═══════════════════════════════════════════════════════════════════════════════

interface AttemptContext {
  graph: KnowledgeGraph;
  documents: DocumentSet;
  focalNodeId: string;
  rng: Rng;
  proposer: MutationProposer;
  idFactory: () => string;
}

async function attemptMutation(
  context: AttemptContext,
  candidate: MutationCandidate
): Promise<Omit<UpdateScenario, 'id' | 'attempts'>> {
  const { graph, documents, focalNodeId, rng, proposer, idFactory } = context;
  const clone = graph.clone();
  let fact: MutableFact;

  if (candidate.fact.kind === 'attribute') {
    const { node_id, attribute, old_value } = candidate.fact;
    const node = clone.requireNode(node_id);
    const value = await proposer.proposeAttributeValue({ node, attribute, current: old_value, rng });
    if (value === old_value) {
      throw new AttemptRejected(`Proposed value for ${attribute} equals the current value`);
    }
    clone.setAttribute(node_id, attribute, value);
    fact = { ...candidate.fact, new_value: value };
  } else {
    const { source_id, relation, old_target_id } = candidate.fact;
    const previous = clone.requireNode(old_target_id);
    const placeholder = await proposer.proposePlaceholder({
      source: clone.requireNode(source_id),
      relation,
      previous,
      rng,
    });
    const created = clone.addNode({ id: idFactory(), type: previous.type, name: placeholder.name });
    for (const [key, value] of placeholder.attributes) {
      clone.setAttribute(created.id, key, value);
    }
    clone.retargetEdge(source_id, relation, old_target_id, created.id);
    fact = { ...candidate.fact, new_target_id: created.id };
  }

  const validation = validateGraph(clone);
  if (!validation.ok) {
    throw new AttemptRejected(
      `Mutated graph is invalid: ${validation.violations.map((v) => v.message).join('; ')}`
    );
  }

  const after = renderNeighborhood(clone, focalNodeId, { radius: documents.radius });
  const diff = diffDocumentSets(documents, after);
  if (diff.documents.length === 0) {
    throw new AttemptRejected('Mutation produced no document change');
  }

  const oldPath = buildUpdatePath(graph, focalNodeId, fact, 'old');
  const newPath = buildUpdatePath(clone, focalNodeId, fact, 'new');

  const beforeKeys = documentKeysByNode(documents);
  const afterKeys = documentKeysByNode(after);
  const allowed = new Set<string>();
  for (const nodeId of [...oldPath, ...newPath].map((s) => s.node_id).concat(candidate.changed_node_id)) {
    const beforeKey = beforeKeys.get(nodeId);
    const afterKey = afterKeys.get(nodeId);
    if (beforeKey !== undefined) allowed.add(beforeKey);
    if (afterKey !== undefined) allowed.add(afterKey);
  }
  const outside = changedKeys(diff).filter((key) => !allowed.has(key));
  if (outside.length > 0) {
    throw new AttemptRejected(`Diff reaches documents off the fact path: ${outside.join(', ')}`);
  }

  return {
    focal_node_id: focalNodeId,
    kind: fact.kind,
    hop_distance: candidate.hop_distance,
    changed_node_id: candidate.changed_node_id,
    fact,
    old_path: oldPath,
    new_path: newPath,
    diff,
  };
}

function isAttemptFailure(error: unknown): error is Error {
  return (
    error instanceof AttemptRejected ||
    error instanceof ValidationError ||
    error instanceof GraphError ||
    error instanceof GenerationError
  );
}

/**
 * Simulate one knowledge-base update for a focal node.
 *
 * `documents` must be the rendering of `graph` for `focalNodeId`; the diff is
 * taken against it. `graph` is never modified.
 *
 * @throws NoMutableFactError when no candidate matches the kind/hop filters
 * @throws MutationExhaustedError when every attempt was discarded
 */
export async function simulateUpdate(
  graph: KnowledgeGraph,
  documents: DocumentSet,
  focalNodeId: string,
  options: SimulateUpdateOptions
): Promise<UpdateScenario> {
  graph.requireNode(focalNodeId);
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const idFactory = options.idFactory ?? uuidv4;
  const context: AttemptContext = {
    graph,
    documents,
    focalNodeId,
    rng: options.rng,
    proposer: options.proposer ?? new DeterministicProposer(),
    idFactory,
  };

  const candidates = collectMutableFacts(graph, documents, focalNodeId, options.immutableAttributes).filter(
    (c) =>
      (options.kind === undefined || c.fact.kind === options.kind) &&
      (options.hop === undefined || c.hop_distance === options.hop)
  );
  if (candidates.length === 0) {
    throw new NoMutableFactError(
      `No mutable fact for focal node ${focalNodeId}` +
        `${options.kind ? ` (kind ${options.kind})` : ''}${options.hop !== undefined ? ` (hop ${options.hop})` : ''}`,
      { focal_node_id: focalNodeId, kind: options.kind, hop: options.hop }
    );
  }

  const failures: MutationAttemptFailure[] = [];
  for (const candidate of shuffle(options.rng, candidates)) {
    if (failures.length >= maxAttempts) break;
    try {
      const scenario = await attemptMutation(context, candidate);
      return { id: idFactory(), ...scenario, attempts: failures.length + 1 };
    } catch (error) {
      if (!isAttemptFailure(error)) throw error;
      failures.push({ fact: candidate.fact, reason: error.message });
      console.error(
        `[UpdateSimulator] Attempt ${failures.length}/${maxAttempts} on ${describeFact(candidate.fact)} discarded: ${error.message}`
      );
    }
  }

  throw new MutationExhaustedError(
    `No valid update for focal node ${focalNodeId} after ${failures.length} attempt(s)`,
    failures,
    { focal_node_id: focalNodeId, reasons: failures.map((f) => f.reason) }
  );
}
