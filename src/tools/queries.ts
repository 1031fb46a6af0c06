/**
 * Query Derivation MCP Tools
 *
 * Tools: kb_queries_derive
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/queries
 */

import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import { validateInput, QueryDeriveInput } from '../utils/validation.js';
import { getGenerator, requireGraph, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { USER_DOCUMENT_KEY, getDocument } from '../models/document.js';
import { pathTokens } from '../models/query.js';
import { assertValidGraph } from '../services/knowledge-graph/validator.js';
import { deriveQueries, phraseQueries } from '../services/queries/index.js';
import { renderMarkdown } from '../services/rendering/markdown.js';
import { renderNeighborhood } from '../services/rendering/renderer.js';
import { forkRng } from '../utils/random.js';

/**
 * Handle kb_queries_derive - 0/1/2-hop question and answer records for a focal node
 */
async function handleQueriesDerive(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(QueryDeriveInput, params);
    const graph = requireGraph();
    assertValidGraph(graph);

    const seed = input.seed ?? state.config.defaultSeed;
    const derivation = deriveQueries(graph, input.focal_node_id, {
      counts: { 0: input.counts.hop_0, 1: input.counts.hop_1, 2: input.counts.hop_2 },
      rng: forkRng(seed, `queries:${input.focal_node_id}`),
    });

    if (input.phrase) {
      const documents = renderNeighborhood(graph, input.focal_node_id, { radius: state.config.defaultRadius });
      const userDocument = getDocument(documents, USER_DOCUMENT_KEY);
      derivation.records = await phraseQueries(getGenerator(), {
        focalName: graph.requireNode(input.focal_node_id).name,
        personalInfo: userDocument ? renderMarkdown(userDocument) : '',
        records: derivation.records,
      });
    }

    return formatResponse(successResult({
      seed,
      ...derivation,
      records: derivation.records.map((record) => ({ ...record, path_tokens: pathTokens(record.path) })),
    }));
  } catch (error) {
    return handleError(error);
  }
}

export const queryTools: Record<string, ToolDefinition> = {
  'kb_queries_derive': {
    description: 'Derive 0-, 1- and 2-hop question/answer records from the graph around a focal node, sampled per hop with a seed',
    inputSchema: QueryDeriveInput.shape,
    handler: handleQueriesDerive,
  },
};
