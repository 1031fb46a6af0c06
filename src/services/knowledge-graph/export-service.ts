/**
 * Knowledge Graph Export Service
 *
 * Writes and reads the self-contained graph.json payload. The payload
 * reconstructs a graph exactly: ids, types, names, attribute order,
 * creation ordinals and the edge list.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module services/knowledge-graph/export-service
 */

import { readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { ValidationError } from '../../utils/validation.js';
import { KnowledgeGraph } from './graph.js';

// ============================================================
// Types
// ============================================================

export interface ExportResult {
  format: 'json';
  files_written: string[];
  node_count: number;
  edge_count: number;
}

// ============================================================
// Export / import
// ============================================================

export function serializeGraph(graph: KnowledgeGraph): string {
  return JSON.stringify(graph.toPayload(), null, 2) + '\n';
}

/**
 * Export the graph as graph.json
 */
export function exportGraph(graph: KnowledgeGraph, outputPath: string): ExportResult {
  const payload = graph.toPayload();

  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, serializeGraph(graph), 'utf-8');

  console.error(
    `[KG-Export] JSON export: ${payload.nodes.length} nodes, ${payload.edges.length} edges -> ${outputPath}`
  );

  return {
    format: 'json',
    files_written: [outputPath],
    node_count: payload.nodes.length,
    edge_count: payload.edges.length,
  };
}

/**
 * Load a graph from a graph.json file
 *
 * @throws ValidationError when the file is not valid JSON or not a graph payload
 */
export function importGraph(inputPath: string): KnowledgeGraph {
  const raw = readFileSync(inputPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Graph file is not valid JSON (${inputPath}): ${message}`);
  }
  const graph = KnowledgeGraph.fromPayload(parsed);
  console.error(`[KG-Export] Loaded ${graph.nodes().length} nodes, ${graph.edges().length} edges from ${inputPath}`);
  return graph;
}
