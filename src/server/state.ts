/**
 * MCP Server State Management
 *
 * Holds the current knowledge graph, the lazily created text generator and
 * the server configuration.
 * FAIL FAST: state access throws immediately if preconditions are not met.
 *
 * @module server/state
 */

import { GeminiTextGenerator } from '../services/generation/client.js';
import type { TextGenerator } from '../services/generation/types.js';
import type { KnowledgeGraph } from '../services/knowledge-graph/graph.js';
import { graphNotLoadedError } from './errors.js';
import type { ServerConfig, ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

function defaultConfig(): ServerConfig {
  return {
    outputDir: process.env.KB_OUTPUT_DIR ?? './instances',
    defaultRadius: 2,
    defaultSeed: process.env.KB_DEFAULT_SEED ?? 'kb-default',
    focalConcurrency: 2,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export const state: ServerState = {
  currentGraph: null,
  currentGraphSource: null,
  generator: null,
  config: defaultConfig(),
};

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * @throws KnowledgeBaseError GRAPH_NOT_LOADED
 */
export function requireGraph(): KnowledgeGraph {
  if (!state.currentGraph) {
    throw graphNotLoadedError();
  }
  return state.currentGraph;
}

export function setCurrentGraph(graph: KnowledgeGraph, source: string): void {
  state.currentGraph = graph;
  state.currentGraphSource = source;
  const stats = graph.getStats();
  console.error(`[Server] Current graph set from ${source}: ${stats.node_count} nodes, ${stats.edge_count} edges`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// GENERATOR
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Text generator shared by every tool, created on first use so the server
 * starts without GEMINI_API_KEY.
 *
 * @throws ValidationError when the generation config is invalid
 */
export function getGenerator(): TextGenerator {
  if (!state.generator) {
    state.generator = new GeminiTextGenerator();
  }
  return state.generator;
}

/** Replace the generator (tests inject fakes here) */
export function setGenerator(generator: TextGenerator | null): void {
  state.generator = generator;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export function getConfig(): ServerConfig {
  return { ...state.config };
}

export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  state.currentGraph = null;
  state.currentGraphSource = null;
  state.generator = null;
  state.config = defaultConfig();
}
