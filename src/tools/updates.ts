/**
 * Update Simulation MCP Tools
 *
 * Tools: kb_update_simulate
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/updates
 */

import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import { validateInput, UpdateSimulateInput } from '../utils/validation.js';
import { getGenerator, requireGraph, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { assertValidGraph } from '../services/knowledge-graph/validator.js';
import { renderNeighborhood } from '../services/rendering/renderer.js';
import { phraseUpdate } from '../services/updates/phrasing.js';
import { DeterministicProposer, GeneratedProposer, type MutationProposer } from '../services/updates/proposer.js';
import { formatUpdatePath, simulateUpdate } from '../services/updates/update-simulator.js';
import { forkRng } from '../utils/random.js';

export function createProposer(kind: 'deterministic' | 'generated'): MutationProposer {
  return kind === 'generated' ? new GeneratedProposer(getGenerator()) : new DeterministicProposer();
}

/**
 * Handle kb_update_simulate - Change one fact near a focal node and report the document diff
 */
async function handleUpdateSimulate(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(UpdateSimulateInput, params);
    const graph = requireGraph();
    assertValidGraph(graph);

    const focal = graph.requireNode(input.focal_node_id);
    const seed = input.seed ?? state.config.defaultSeed;
    const documents = renderNeighborhood(graph, focal.id, { radius: input.radius ?? state.config.defaultRadius });

    const scenario = await simulateUpdate(graph, documents, focal.id, {
      rng: forkRng(seed, `update:${focal.id}`),
      kind: input.kind,
      hop: input.hop,
      maxAttempts: input.max_attempts,
      proposer: createProposer(input.proposer),
    });
    if (input.phrase) {
      scenario.instructions = await phraseUpdate(getGenerator(), scenario, focal.name);
    }

    return formatResponse(successResult({
      seed,
      ...scenario,
      old_path_tokens: formatUpdatePath(scenario.old_path),
      new_path_tokens: formatUpdatePath(scenario.new_path),
    }));
  } catch (error) {
    return handleError(error);
  }
}

export const updateTools: Record<string, ToolDefinition> = {
  'kb_update_simulate': {
    description: 'Simulate one attribute or relationship change within two hops of a focal node on a private copy of the graph; returns the fact, old/new paths and the exact document diff',
    inputSchema: UpdateSimulateInput.shape,
    handler: handleUpdateSimulate,
  },
};
