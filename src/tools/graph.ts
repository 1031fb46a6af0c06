/**
 * Knowledge Graph MCP Tools
 *
 * Tools: kb_graph_load, kb_graph_build, kb_graph_validate,
 *        kb_graph_stats, kb_graph_export
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/graph
 */

import { existsSync } from 'fs';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import {
  validateInput,
  GraphBuildInput,
  GraphExportInput,
  GraphLoadInput,
  GraphStatsInput,
  GraphValidateInput,
} from '../utils/validation.js';
import { getGenerator, requireGraph, setCurrentGraph, state } from '../server/state.js';
import { pathNotFoundError } from '../server/errors.js';
import { successResult } from '../server/types.js';
import { exportGraph, importGraph, validateGraph } from '../services/knowledge-graph/index.js';
import { buildWorldGraph } from '../services/world/build-driver.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle kb_graph_load - Load graph.json as the current graph
 */
async function handleGraphLoad(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphLoadInput, params);
    if (!existsSync(input.path)) {
      throw pathNotFoundError(input.path);
    }

    const graph = importGraph(input.path);
    setCurrentGraph(graph, input.path);

    return formatResponse(successResult({
      source: input.path,
      stats: graph.getStats(),
      validation: validateGraph(graph),
    }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle kb_graph_build - Generate a world graph and make it current
 */
async function handleGraphBuild(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphBuildInput, params);
    const result = await buildWorldGraph(getGenerator(), {
      worldDescription: input.world_description,
      numPeople: input.num_people,
      numEntities: input.num_entities,
    });
    setCurrentGraph(result.graph, 'generated');

    return formatResponse(successResult({
      stats: result.graph.getStats(),
      validation: validateGraph(result.graph),
      skipped_edges: result.skipped_edges,
      enrichment_failures: result.enrichment_failures,
    }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle kb_graph_validate - Check every invariant of the current graph
 */
async function handleGraphValidate(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(GraphValidateInput, params);
    return formatResponse(successResult(validateGraph(requireGraph())));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle kb_graph_stats - Counts by type and relation, plus the person list
 */
async function handleGraphStats(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(GraphStatsInput, params);
    const graph = requireGraph();

    return formatResponse(successResult({
      source: state.currentGraphSource,
      ...graph.getStats(),
      persons: graph.persons().map((p) => ({ id: p.id, name: p.name })),
    }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle kb_graph_export - Write the current graph as graph.json
 */
async function handleGraphExport(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphExportInput, params);
    return formatResponse(successResult(exportGraph(requireGraph(), input.path)));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const graphTools: Record<string, ToolDefinition> = {
  'kb_graph_load': {
    description: 'Load a knowledge graph from a graph.json file and make it the current graph',
    inputSchema: GraphLoadInput.shape,
    handler: handleGraphLoad,
  },
  'kb_graph_build': {
    description: 'Generate a knowledge graph of people and entities for a world description (stubs, relations, attributes) and make it the current graph',
    inputSchema: GraphBuildInput.shape,
    handler: handleGraphBuild,
  },
  'kb_graph_validate': {
    description: 'Check the current graph for dangling edges, duplicate person names, empty nodes and duplicate ids; reports every violation',
    inputSchema: GraphValidateInput.shape,
    handler: handleGraphValidate,
  },
  'kb_graph_stats': {
    description: 'Node and edge counts by type and relation, plus the people in the current graph',
    inputSchema: GraphStatsInput.shape,
    handler: handleGraphStats,
  },
  'kb_graph_export': {
    description: 'Write the current graph to a self-contained graph.json file',
    inputSchema: GraphExportInput.shape,
    handler: handleGraphExport,
  },
};
