/**
 * Scenario MCP Tools
 *
 * Tools: kb_scenario_run
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/scenarios
 */

import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import { validateInput, ScenarioRunInput } from '../utils/validation.js';
import { getGenerator, requireGraph, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { writeScenarioOutput } from '../services/pipeline/packager.js';
import { parseScenarioConfig } from '../services/pipeline/scenario-config.js';
import { runScenario } from '../services/pipeline/scenario-runner.js';
import { createProposer } from './updates.js';

/**
 * Handle kb_scenario_run - Build (or reuse), validate, derive and package one world scenario
 */
async function handleScenarioRun(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ScenarioRunInput, params);
    const outputDir = input.output_dir ?? state.config.outputDir;
    const config = parseScenarioConfig({
      num_iter_per_graph: input.num_iter_per_graph,
      num_qa_per_iter: input.num_qa_per_iter,
      num_people: input.num_people,
      num_entities: input.num_entities,
      world_description: input.world_description,
      output_base_dir: outputDir,
      seed: input.seed,
      update_plan: input.update_plan,
      radius: input.radius ?? state.config.defaultRadius,
      focal_concurrency: state.config.focalConcurrency,
      phrase: input.phrase,
    });

    const needsGenerator = !input.use_loaded_graph || input.phrase || input.proposer === 'generated';
    const run = await runScenario(config, {
      graph: input.use_loaded_graph ? requireGraph() : undefined,
      generator: needsGenerator ? getGenerator() : undefined,
      proposer: createProposer(input.proposer),
    });
    const packaged = await writeScenarioOutput(run, outputDir);

    return formatResponse(successResult({
      summary: run.summary,
      output: { scenario_dir: packaged.scenario_dir, files_written: packaged.files_written.length },
    }));
  } catch (error) {
    return handleError(error);
  }
}

export const scenarioTools: Record<string, ToolDefinition> = {
  'kb_scenario_run': {
    description: 'Run a full world scenario: build or reuse a graph, validate it, then per selected person render documents, derive queries and simulate updates; writes graph.json and one memory directory per person',
    inputSchema: ScenarioRunInput.shape,
    handler: handleScenarioRun,
  },
};
