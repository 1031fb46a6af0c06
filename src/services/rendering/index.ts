/**
 * Rendering Services
 */

export {
  renderNeighborhood,
  assertLinkClosure,
  assignDocumentKeys,
  slugify,
  relationFieldId,
  humanizeLabel,
  sectionHeading,
  LinkResolutionError,
  DEFAULT_RADIUS,
} from './renderer.js';

export type { RenderOptions } from './renderer.js';

export { renderMarkdown, renderMarkdownFiles } from './markdown.js';

export type { MarkdownFile } from './markdown.js';
