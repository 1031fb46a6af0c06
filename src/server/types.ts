/**
 * MCP Server Type Definitions
 *
 * Interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { KnowledgeGraph } from '../services/knowledge-graph/graph.js';
import type { TextGenerator } from '../services/generation/types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerConfig {
  /** Base directory for packaged scenario output */
  outputDir: string;

  /** Neighborhood radius used when a tool call gives none */
  defaultRadius: number;

  /** Seed used when a tool call gives none */
  defaultSeed: string;

  /** Concurrent focal-node passes per scenario */
  focalConcurrency: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerState {
  /** Graph the derivation tools operate on */
  currentGraph: KnowledgeGraph | null;

  /** Where the current graph came from (file path or "generated") */
  currentGraphSource: string | null;

  /** Lazily created text generator */
  generator: TextGenerator | null;

  config: ServerConfig;
}
