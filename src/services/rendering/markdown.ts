/**
 * Markdown serialization of rendered documents.
 *
 * ```
 * # Ana Ruiz
 *
 * ## Person Information
 * - **Age**: 34
 *
 * ## Relationships
 * - **Works At**: [Blue Fig](memory/restaurant/blue_fig)
 * ```
 *
 * @module services/rendering/markdown
 */

import { DEFAULT_LINK_NAMESPACE, type DocumentSet, type KnowledgeDocument } from '../../models/document.js';

export interface MarkdownFile {
  key: string;
  path: string;
  content: string;
}

export function renderMarkdown(document: KnowledgeDocument, namespace: string = DEFAULT_LINK_NAMESPACE): string {
  const lines = [`# ${document.title}`];
  let section: string | null = null;

  for (const field of document.fields) {
    if (field.section !== section) {
      section = field.section;
      lines.push('', `## ${section}`);
    }
    const value = field.link ? `[${field.value}](${namespace}/${field.link.target_key})` : field.value;
    lines.push(`- **${field.label}**: ${value}`);
  }

  return lines.join('\n') + '\n';
}

/** One markdown file per document, named `<key>.md` */
export function renderMarkdownFiles(set: DocumentSet, namespace?: string): MarkdownFile[] {
  return set.documents.map((document) => ({
    key: document.key,
    path: `${document.key}.md`,
    content: renderMarkdown(document, namespace),
  }));
}
