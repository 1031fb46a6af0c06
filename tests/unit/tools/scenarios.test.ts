/**
 * Scenario tool tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { scenarioTools } from '../../../src/tools/scenarios.js';
import { resetState, setCurrentGraph } from '../../../src/server/state.js';
import { buildOfficeGraph } from '../helpers/graphs.js';
import { parseResponse } from './helpers/responses.js';

async function run(params: Record<string, unknown>) {
  return parseResponse(await scenarioTools['kb_scenario_run'].handler(params));
}

describe('kb_scenario_run', () => {
  let dir: string;

  beforeEach(() => {
    resetState();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kb-scenario-tool-'));
  });

  afterEach(() => {
    resetState();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('runs on the loaded graph and writes the dataset', async () => {
    setCurrentGraph(buildOfficeGraph(), 'fixture');

    const result = await run({
      world_description: 'a shipping office in Porto',
      use_loaded_graph: true,
      num_iter_per_graph: 1,
      num_qa_per_iter: 1,
      update_plan: [0],
      seed: 9,
      output_dir: dir,
    });

    expect(result.success).toBe(true);
    expect(result.data?.summary).toMatchObject({ status: 'completed', seed: 9 });
    const entries = fs.readdirSync(dir);
    expect(entries).toHaveLength(1);
    expect(result.data?.output).toMatchObject({ scenario_dir: path.join(dir, entries[0]) });
    expect(fs.existsSync(path.join(dir, entries[0], 'graph.json'))).toBe(true);
  });

  it('requires a loaded graph when asked to reuse it', async () => {
    const result = await run({ world_description: 'anywhere', use_loaded_graph: true, output_dir: dir });
    expect(result.error?.category).toBe('GRAPH_NOT_LOADED');
  });
});
