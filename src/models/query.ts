/**
 * Query and path models
 *
 * @module models/query
 */

import type { EdgeDirection } from './knowledge-graph.js';

export type HopDistance = 0 | 1 | 2;

export const HOP_DISTANCES: readonly HopDistance[] = [0, 1, 2];

/**
 * One step of a fact path. `label` names what is taken from this node:
 * the relation followed to the next step, or the attribute that is asked
 * about (last step only). `direction` is set for relation steps.
 */
export interface PathStep {
  node_id: string;
  node_name: string;
  label: string | null;
  label_kind: 'relation' | 'attribute' | null;
  direction: EdgeDirection | null;
  /** Attribute value on the last step of update paths */
  value?: string;
}

export type QueryKind = 'attribute' | 'identity';

export interface QueryRecord {
  id: string;
  hop_distance: HopDistance;
  kind: QueryKind;
  source_node_id: string;
  attribute: string | null;
  path: PathStep[];
  question: string;
  answer: string;
}

export interface QueryShortfall {
  hop: HopDistance;
  requested: number;
  available: number;
}

export interface QueryDerivation {
  focal_node_id: string;
  records: QueryRecord[];
  shortfalls: QueryShortfall[];
}

export type HopCounts = Partial<Record<HopDistance, number>>;

/**
 * Node names interleaved with relation labels, e.g.
 * `[Ana, works_at, Blue Fig, located_in, Porto]`.
 */
export function pathTokens(path: readonly PathStep[]): string[] {
  const tokens: string[] = [];
  for (const step of path) {
    tokens.push(step.node_name);
    if (step.label_kind === 'relation' && step.label !== null) {
      tokens.push(step.label);
    }
  }
  return tokens;
}
