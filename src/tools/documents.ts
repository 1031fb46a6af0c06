/**
 * Document Rendering MCP Tools
 *
 * Tools: kb_render
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/documents
 */

import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import { validateInput, RenderInput } from '../utils/validation.js';
import { requireGraph, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { assertValidGraph } from '../services/knowledge-graph/validator.js';
import { renderMarkdownFiles, renderNeighborhood } from '../services/rendering/index.js';

/**
 * Handle kb_render - Render a focal node's neighborhood as linked documents
 */
async function handleRender(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(RenderInput, params);
    const graph = requireGraph();
    assertValidGraph(graph);

    const set = renderNeighborhood(graph, input.focal_node_id, {
      radius: input.radius ?? state.config.defaultRadius,
    });

    if (input.format === 'structured') {
      return formatResponse(successResult(set));
    }
    return formatResponse(successResult({
      focal_node_id: set.focal_node_id,
      radius: set.radius,
      files: renderMarkdownFiles(set),
    }));
  } catch (error) {
    return handleError(error);
  }
}

export const documentTools: Record<string, ToolDefinition> = {
  'kb_render': {
    description: 'Render the neighborhood of a focal node as cross-linked documents (user document first), as markdown files or structured fields',
    inputSchema: RenderInput.shape,
    handler: handleRender,
  },
};
