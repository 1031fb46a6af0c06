/**
 * Rendered document models
 *
 * @module models/document
 */

/** Reserved key of the focal node's document */
export const USER_DOCUMENT_KEY = 'user';

/** Default namespace used in the rendered link syntax `(namespace/key)` */
export const DEFAULT_LINK_NAMESPACE = 'memory';

export const RELATIONSHIPS_SECTION = 'Relationships';

export interface DocumentLink {
  relation: string;
  target_key: string;
  target_node_id: string;
}

/**
 * One labeled field. `id` is stable across re-renders of the same fact
 * (`attr:<name>` or `rel:<percent-encoded relation>`, with `#n` for repeated
 * relations), which is what lets diffs match fields between document versions.
 */
export interface DocumentField {
  id: string;
  section: string;
  label: string;
  value: string;
  link?: DocumentLink;
}

export interface KnowledgeDocument {
  key: string;
  node_id: string;
  title: string;
  fields: DocumentField[];
}

/** Documents of one focal node's neighborhood: `user` first, then by node creation */
export interface DocumentSet {
  focal_node_id: string;
  radius: number;
  documents: KnowledgeDocument[];
}

export function documentLinks(document: KnowledgeDocument): DocumentLink[] {
  return document.fields.flatMap((field) => (field.link ? [field.link] : []));
}

export function getDocument(set: DocumentSet, key: string): KnowledgeDocument | undefined {
  return set.documents.find((d) => d.key === key);
}
