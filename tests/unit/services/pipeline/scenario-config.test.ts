/**
 * Scenario configuration tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_UPDATE_PLAN,
  loadScenarioConfigs,
  parseScenarioConfig,
} from '../../../../src/services/pipeline/scenario-config.js';
import { ValidationError } from '../../../../src/utils/validation.js';

describe('parseScenarioConfig', () => {
  it('fills in defaults', () => {
    expect(parseScenarioConfig({ world_description: 'a mountain village' })).toEqual({
      world_description: 'a mountain village',
      num_iter_per_graph: 3,
      num_qa_per_iter: 10,
      num_people: 5,
      num_entities: 5,
      output_base_dir: 'instances',
      update_plan: [0, 0, 0, 1, 1, 2],
      radius: 2,
      focal_concurrency: 2,
      phrase: false,
    });
  });

  it('does not share the default update plan between configs', () => {
    const config = parseScenarioConfig({ world_description: 'a mountain village' });
    config.update_plan.push(2);
    expect(DEFAULT_UPDATE_PLAN).toEqual([0, 0, 0, 1, 1, 2]);
    expect(parseScenarioConfig({ world_description: 'a harbor' }).update_plan).toHaveLength(6);
  });

  it('rejects hop distances outside 0..2', () => {
    expect(() => parseScenarioConfig({ world_description: 'x', update_plan: [3] })).toThrow(ValidationError);
  });

  it('requires a world description', () => {
    expect(() => parseScenarioConfig({})).toThrow(ValidationError);
  });
});

describe('loadScenarioConfigs', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kb-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads and validates a list of scenarios', () => {
    const file = path.join(dir, 'scenarios.json');
    fs.writeFileSync(file, JSON.stringify([{ world_description: 'a harbor', seed: 11 }, { world_description: 'a lab' }]));

    const configs = loadScenarioConfigs(file);
    expect(configs.map((c) => [c.world_description, c.seed])).toEqual([
      ['a harbor', 11],
      ['a lab', undefined],
    ]);
  });

  it('fails on a missing file', () => {
    expect(() => loadScenarioConfigs(path.join(dir, 'missing.json'))).toThrow(/^Cannot read scenario configs from /);
  });

  it('fails on an empty list', () => {
    const file = path.join(dir, 'scenarios.json');
    fs.writeFileSync(file, '[]');
    expect(() => loadScenarioConfigs(file)).toThrow('At least one scenario is required');
  });
});
