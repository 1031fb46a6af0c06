/**
 * Update scenario and document diff models
 *
 * @module models/update
 */

import type { DocumentField } from './document.js';
import type { AttributeValue } from './knowledge-graph.js';
import type { HopDistance, PathStep } from './query.js';

export type UpdateKind = 'attribute' | 'relationship';

export interface AttributeFact {
  kind: 'attribute';
  node_id: string;
  attribute: string;
  old_value: AttributeValue;
  new_value?: AttributeValue;
}

export interface RelationshipFact {
  kind: 'relationship';
  source_id: string;
  relation: string;
  old_target_id: string;
  new_target_id?: string;
}

/** A single changeable fact of the rendered neighborhood */
export type MutableFact = AttributeFact | RelationshipFact;

// ── Diff ────────────────────────────────────────────────────────────

export type DocumentDiffStatus = 'added' | 'removed' | 'modified';

export interface FieldChange {
  id: string;
  before: DocumentField;
  after: DocumentField;
}

/**
 * Field-level delta of one document. `order_before` / `order_after` are the
 * full field id sequences, which make reconstruction exact in both
 * directions. `patch` is a unified diff of the markdown renderings.
 */
export interface DocumentDiff {
  key: string;
  status: DocumentDiffStatus;
  node_id: string;
  title?: { before: string | null; after: string | null };
  node_id_change?: { before: string; after: string };
  added: DocumentField[];
  removed: DocumentField[];
  changed: FieldChange[];
  order_before: string[];
  order_after: string[];
  patch: string;
}

export interface DiffStats {
  documents_added: number;
  documents_removed: number;
  documents_modified: number;
  fields_added: number;
  fields_removed: number;
  fields_changed: number;
  lines_added: number;
  lines_removed: number;
}

export interface DocumentSetDiff {
  before_keys: string[];
  after_keys: string[];
  documents: DocumentDiff[];
  stats: DiffStats;
}

// ── Scenario ────────────────────────────────────────────────────────

export interface UpdateScenario {
  id: string;
  focal_node_id: string;
  kind: UpdateKind;
  hop_distance: HopDistance;
  changed_node_id: string;
  fact: MutableFact;
  old_path: PathStep[];
  new_path: PathStep[];
  diff: DocumentSetDiff;
  attempts: number;
  instructions?: string[];
}
