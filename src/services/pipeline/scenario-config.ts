/**
 * Scenario configuration
 *
 * One entry per world to generate. Loaded from config/scenarios.json and
 * validated with zod before anything is generated.
 *
 * @module services/pipeline/scenario-config
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { HopDistanceSchema, Radius, Seed, ValidationError, validateInput } from '../../utils/validation.js';

/** Hop distance of each update simulated per focal node */
export const DEFAULT_UPDATE_PLAN = [0, 0, 0, 1, 1, 2] as const;

export const ScenarioConfigSchema = z.object({
  id: z.string().min(1).optional(),
  num_iter_per_graph: z.number().int().min(1).default(3),
  num_qa_per_iter: z.number().int().min(0).default(10),
  num_people: z.number().int().min(1).default(5),
  num_entities: z.number().int().min(0).default(5),
  world_description: z.string().min(1, 'World description is required'),
  output_base_dir: z.string().min(1).default('instances'),
  seed: Seed.optional(),
  update_plan: z.array(HopDistanceSchema).default([...DEFAULT_UPDATE_PLAN]),
  radius: Radius,
  focal_concurrency: z.number().int().min(1).max(16).default(2),
  phrase: z.boolean().default(false),
});

export type ScenarioConfig = z.infer<typeof ScenarioConfigSchema>;
export type ScenarioConfigInput = z.input<typeof ScenarioConfigSchema>;

export const ScenarioConfigListSchema = z.array(ScenarioConfigSchema).min(1, 'At least one scenario is required');

export function parseScenarioConfig(input: unknown): ScenarioConfig {
  return validateInput(ScenarioConfigSchema, input);
}

/**
 * @throws ValidationError when the file is missing, not JSON, or fails the schema
 */
export function loadScenarioConfigs(filePath: string): ScenarioConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(
      `Cannot read scenario configs from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_INPUT',
      { path: filePath }
    );
  }
  return validateInput(ScenarioConfigListSchema, raw);
}
