/**
 * MCP Tool Module Exports
 *
 * Barrel export for all tool modules.
 *
 * @module tools
 */

import type { ToolDefinition } from './shared.js';
import { configTools } from './config.js';
import { documentTools } from './documents.js';
import { graphTools } from './graph.js';
import { queryTools } from './queries.js';
import { scenarioTools } from './scenarios.js';
import { updateTools } from './updates.js';

export * from './shared.js';
export { configTools, documentTools, graphTools, queryTools, scenarioTools, updateTools };

/** Every tool the server registers, keyed by tool name */
export const allTools: Record<string, ToolDefinition> = {
  ...graphTools,
  ...documentTools,
  ...queryTools,
  ...updateTools,
  ...scenarioTools,
  ...configTools,
};
