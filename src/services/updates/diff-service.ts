/**
 * Document Set Diff Service
 *
 * Field-level structural diffs between two rendered document sets, exact
 * enough to rebuild either side from the other, plus a unified text patch of
 * each document's markdown. Uses the `diff` npm package (jsdiff) for the
 * text side.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 */

import { createTwoFilesPatch, diffLines, parsePatch } from 'diff';
import type { DocumentField, DocumentSet, KnowledgeDocument } from '../../models/document.js';
import type { DiffStats, DocumentDiff, DocumentSetDiff, FieldChange } from '../../models/update.js';
import { renderMarkdown } from '../rendering/markdown.js';

export class DiffApplicationError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DiffApplicationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEXT HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Count added and removed lines between two texts (line-level diff)
 */
export function lineDelta(text1: string, text2: string): { lines_added: number; lines_removed: number } {
  let added = 0;
  let removed = 0;
  for (const change of diffLines(text1, text2)) {
    if (change.added) added += change.count ?? 0;
    else if (change.removed) removed += change.count ?? 0;
  }
  return { lines_added: added, lines_removed: removed };
}

/**
 * Git-style unified patch of one document; an absent side is the empty text.
 */
export function documentPatch(key: string, before: string, after: string): string {
  return createTwoFilesPatch(`a/${key}.md`, `b/${key}.md`, before, after);
}

/**
 * Swap the direction of a unified patch produced by documentPatch.
 * Within each run of changes, removals are written before additions.
 */
export function reversePatch(patch: string): string {
  const [parsed] = parsePatch(patch);
  if (!parsed) return patch;

  const out = [
    '===================================================================',
    `--- ${parsed.newFileName ?? ''}\t${parsed.newHeader ?? ''}`,
    `+++ ${parsed.oldFileName ?? ''}\t${parsed.oldHeader ?? ''}`,
  ];

  for (const hunk of parsed.hunks) {
    out.push(`@@ -${hunk.newStart},${hunk.newLines} +${hunk.oldStart},${hunk.oldLines} @@`);
    let removals: string[] = [];
    let additions: string[] = [];
    const flush = (): void => {
      out.push(...removals, ...additions);
      removals = [];
      additions = [];
    };
    for (const line of hunk.lines) {
      if (line.startsWith('+')) removals.push(`-${line.slice(1)}`);
      else if (line.startsWith('-')) additions.push(`+${line.slice(1)}`);
      else {
        flush();
        out.push(line);
      }
    }
    flush();
  }

  return out.join('\n') + '\n';
}

// ═══════════════════════════════════════════════════════════════════════════════
// FIELD HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function fieldsEqual(a: DocumentField, b: DocumentField): boolean {
  if (a.id !== b.id || a.section !== b.section || a.label !== b.label || a.value !== b.value) return false;
  if (!a.link || !b.link) return a.link === b.link;
  return (
    a.link.relation === b.link.relation &&
    a.link.target_key === b.link.target_key &&
    a.link.target_node_id === b.link.target_node_id
  );
}

function cloneField(field: DocumentField): DocumentField {
  return field.link ? { ...field, link: { ...field.link } } : { ...field };
}

function sameOrder(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((id, i) => id === b[i]);
}

// ═══════════════════════════════════════════════════════════════════════════════
// DIFF
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Diff two versions of one document key. Returns null when they are
 * identical (or both absent).
 */
export function diffDocument(
  key: string,
  before: KnowledgeDocument | undefined,
  after: KnowledgeDocument | undefined
): DocumentDiff | null {
  if (!before && !after) return null;

  const beforeFields = before?.fields ?? [];
  const afterFields = after?.fields ?? [];
  const beforeById = new Map(beforeFields.map((f) => [f.id, f]));
  const afterById = new Map(afterFields.map((f) => [f.id, f]));

  const added = afterFields.filter((f) => !beforeById.has(f.id)).map(cloneField);
  const removed = beforeFields.filter((f) => !afterById.has(f.id)).map(cloneField);
  const changed: FieldChange[] = [];
  for (const field of afterFields) {
    const previous = beforeById.get(field.id);
    if (previous && !fieldsEqual(previous, field)) {
      changed.push({ id: field.id, before: cloneField(previous), after: cloneField(field) });
    }
  }

  const orderBefore = beforeFields.map((f) => f.id);
  const orderAfter = afterFields.map((f) => f.id);
  const titleChanged = (before?.title ?? null) !== (after?.title ?? null);
  const nodeChanged = before !== undefined && after !== undefined && before.node_id !== after.node_id;

  if (
    before &&
    after &&
    added.length === 0 &&
    removed.length === 0 &&
    changed.length === 0 &&
    !titleChanged &&
    !nodeChanged &&
    sameOrder(orderBefore, orderAfter)
  ) {
    return null;
  }

  const beforeText = before ? renderMarkdown(before) : '';
  const afterText = after ? renderMarkdown(after) : '';
  const nodeId = after?.node_id ?? before?.node_id ?? '';

  const diff: DocumentDiff = {
    key,
    status: !before ? 'added' : !after ? 'removed' : 'modified',
    node_id: nodeId,
    added,
    removed,
    changed,
    order_before: orderBefore,
    order_after: orderAfter,
    patch: documentPatch(key, beforeText, afterText),
  };
  if (titleChanged) {
    diff.title = { before: before?.title ?? null, after: after?.title ?? null };
  }
  if (before && after && nodeChanged) {
    diff.node_id_change = { before: before.node_id, after: after.node_id };
  }
  return diff;
}

function emptyStats(): DiffStats {
  return {
    documents_added: 0,
    documents_removed: 0,
    documents_modified: 0,
    fields_added: 0,
    fields_removed: 0,
    fields_changed: 0,
    lines_added: 0,
    lines_removed: 0,
  };
}

/**
 * Structural diff between two document sets. Unchanged documents do not
 * appear. Order: keys of `before` in order, then keys new in `after`.
 */
export function diffDocumentSets(before: DocumentSet, after: DocumentSet): DocumentSetDiff {
  const beforeByKey = new Map(before.documents.map((d) => [d.key, d]));
  const afterByKey = new Map(after.documents.map((d) => [d.key, d]));
  const keys = [...beforeByKey.keys(), ...[...afterByKey.keys()].filter((k) => !beforeByKey.has(k))];

  const documents: DocumentDiff[] = [];
  const stats = emptyStats();

  for (const key of keys) {
    const beforeDoc = beforeByKey.get(key);
    const afterDoc = afterByKey.get(key);
    const diff = diffDocument(key, beforeDoc, afterDoc);
    if (!diff) continue;

    documents.push(diff);
    if (diff.status === 'added') stats.documents_added++;
    else if (diff.status === 'removed') stats.documents_removed++;
    else stats.documents_modified++;
    stats.fields_added += diff.added.length;
    stats.fields_removed += diff.removed.length;
    stats.fields_changed += diff.changed.length;

    const delta = lineDelta(beforeDoc ? renderMarkdown(beforeDoc) : '', afterDoc ? renderMarkdown(afterDoc) : '');
    stats.lines_added += delta.lines_added;
    stats.lines_removed += delta.lines_removed;
  }

  return {
    before_keys: before.documents.map((d) => d.key),
    after_keys: after.documents.map((d) => d.key),
    documents,
    stats,
  };
}

/** Keys of every document the diff touches */
export function changedKeys(diff: DocumentSetDiff): string[] {
  return diff.documents.map((d) => d.key);
}

// ═══════════════════════════════════════════════════════════════════════════════
// APPLY / INVERT
// ═══════════════════════════════════════════════════════════════════════════════

function applyToDocument(existing: KnowledgeDocument, diff: DocumentDiff): KnowledgeDocument {
  const currentOrder = existing.fields.map((f) => f.id);
  if (!sameOrder(currentOrder, diff.order_before)) {
    throw new DiffApplicationError(`Document ${diff.key} does not match the diff's starting field order`, {
      key: diff.key,
      expected: diff.order_before,
      actual: currentOrder,
    });
  }

  const fields = new Map(existing.fields.map((f) => [f.id, cloneField(f)]));
  for (const field of diff.removed) {
    const current = fields.get(field.id);
    if (!current || !fieldsEqual(current, field)) {
      throw new DiffApplicationError(`Field ${field.id} of ${diff.key} does not match the removed value`, {
        key: diff.key,
        field_id: field.id,
      });
    }
    fields.delete(field.id);
  }
  for (const change of diff.changed) {
    const current = fields.get(change.id);
    if (!current || !fieldsEqual(current, change.before)) {
      throw new DiffApplicationError(`Field ${change.id} of ${diff.key} does not match the changed-from value`, {
        key: diff.key,
        field_id: change.id,
      });
    }
    fields.set(change.id, cloneField(change.after));
  }
  for (const field of diff.added) {
    fields.set(field.id, cloneField(field));
  }

  const ordered = diff.order_after.map((id) => {
    const field = fields.get(id);
    if (!field) {
      throw new DiffApplicationError(`Field ${id} of ${diff.key} is missing after applying the diff`, {
        key: diff.key,
        field_id: id,
      });
    }
    return field;
  });

  return {
    key: existing.key,
    node_id: diff.node_id_change ? diff.node_id_change.after : existing.node_id,
    title: diff.title?.after ?? existing.title,
    fields: ordered,
  };
}

/**
 * Apply a diff to the set it was computed from.
 *
 * @throws DiffApplicationError when `set` is not the diff's starting point
 */
export function applyDiff(set: DocumentSet, diff: DocumentSetDiff): DocumentSet {
  const keys = set.documents.map((d) => d.key);
  if (!sameOrder(keys, diff.before_keys)) {
    throw new DiffApplicationError('Document set keys do not match the diff', {
      expected: diff.before_keys,
      actual: keys,
    });
  }

  const documents = new Map(set.documents.map((d) => [d.key, d]));
  for (const docDiff of diff.documents) {
    const existing = documents.get(docDiff.key);
    if (docDiff.status === 'added') {
      if (existing) {
        throw new DiffApplicationError(`Document ${docDiff.key} already exists`, { key: docDiff.key });
      }
      const created: KnowledgeDocument = {
        key: docDiff.key,
        node_id: docDiff.node_id,
        title: docDiff.title?.after ?? '',
        fields: [],
      };
      documents.set(docDiff.key, applyToDocument(created, docDiff));
    } else if (!existing) {
      throw new DiffApplicationError(`Document ${docDiff.key} is missing`, { key: docDiff.key });
    } else if (docDiff.status === 'removed') {
      applyToDocument(existing, docDiff);
      documents.delete(docDiff.key);
    } else {
      documents.set(docDiff.key, applyToDocument(existing, docDiff));
    }
  }

  const result = diff.after_keys.map((key) => {
    const document = documents.get(key);
    if (!document) {
      throw new DiffApplicationError(`Document ${key} is missing after applying the diff`, { key });
    }
    return document;
  });

  return { focal_node_id: set.focal_node_id, radius: set.radius, documents: result };
}

/**
 * Diff that undoes `diff`: applyDiff(after, invertDiff(diff)) rebuilds before.
 */
export function invertDiff(diff: DocumentSetDiff): DocumentSetDiff {
  const documents = diff.documents.map((d): DocumentDiff => {
    const inverted: DocumentDiff = {
      key: d.key,
      status: d.status === 'added' ? 'removed' : d.status === 'removed' ? 'added' : 'modified',
      node_id: d.node_id_change ? d.node_id_change.before : d.node_id,
      added: d.removed.map(cloneField),
      removed: d.added.map(cloneField),
      changed: d.changed.map((c) => ({ id: c.id, before: cloneField(c.after), after: cloneField(c.before) })),
      order_before: [...d.order_after],
      order_after: [...d.order_before],
      patch: reversePatch(d.patch),
    };
    if (d.title) inverted.title = { before: d.title.after, after: d.title.before };
    if (d.node_id_change) inverted.node_id_change = { before: d.node_id_change.after, after: d.node_id_change.before };
    return inverted;
  });

  const s = diff.stats;
  return {
    before_keys: [...diff.after_keys],
    after_keys: [...diff.before_keys],
    documents,
    stats: {
      documents_added: s.documents_removed,
      documents_removed: s.documents_added,
      documents_modified: s.documents_modified,
      fields_added: s.fields_removed,
      fields_removed: s.fields_added,
      fields_changed: s.fields_changed,
      lines_added: s.lines_removed,
      lines_removed: s.lines_added,
    },
  };
}
