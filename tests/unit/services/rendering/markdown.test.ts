/**
 * Markdown Serialization Tests
 *
 * @module tests/unit/services/rendering/markdown
 */

import { describe, it, expect } from 'vitest';
import { renderMarkdown, renderMarkdownFiles } from '../../../../src/services/rendering/markdown.js';
import { renderNeighborhood } from '../../../../src/services/rendering/renderer.js';
import { buildRestaurantGraph } from '../../helpers/graphs.js';

describe('renderMarkdown', () => {
  it('writes a title, one heading per section and one bullet per field', () => {
    const set = renderNeighborhood(buildRestaurantGraph(), 'A');
    expect(renderMarkdown(set.documents[0])).toBe(
      '# Ana Ruiz\n' +
        '\n' +
        '## Person Information\n' +
        '- **Age**: 34\n' +
        '\n' +
        '## Relationships\n' +
        '- **Works At**: [Blue Fig](memory/restaurant/blue_fig)\n'
    );
  });

  it('uses the given link namespace', () => {
    const set = renderNeighborhood(buildRestaurantGraph(), 'A');
    expect(renderMarkdown(set.documents[1], 'kb')).toContain('- **Located In**: [Porto](kb/city/porto)');
  });

  it('renders a document without fields as its title only', () => {
    expect(renderMarkdown({ key: 'user', node_id: 'A', title: 'Ana Ruiz', fields: [] })).toBe('# Ana Ruiz\n');
  });
});

describe('renderMarkdownFiles', () => {
  it('names each file after its document key', () => {
    const files = renderMarkdownFiles(renderNeighborhood(buildRestaurantGraph(), 'A'));
    expect(files.map((f) => f.path)).toEqual(['user.md', 'restaurant/blue_fig.md', 'city/porto.md']);
    expect(files[2].content).toBe('# Porto\n\n## City Information\n- **Population**: 230000\n');
  });
});
