/**
 * Zod Validation Schemas
 *
 * Input validation for every MCP tool, plus the shared helpers that turn
 * zod failures into ValidationError.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * INVALID_INPUT: a tool argument or external payload failed its schema.
 * GRAPH_INVALID: a knowledge graph broke one or more consistency invariants.
 */
export type ValidationErrorCode = 'INVALID_INPUT' | 'GRAPH_INVALID';

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly code: ValidationErrorCode = 'INVALID_INPUT',
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const NodeId = z.string().min(1, 'Node id is required');

/** Seed for the pseudo-random source: a number or any string */
export const Seed = z.union([z.number().int(), z.string().min(1)]);

export const RadiusValue = z.number().int().min(0).max(4);

export const Radius = RadiusValue.default(2);

export const HopDistanceSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const UpdateKindSchema = z.enum(['attribute', 'relationship']);

export const ProposerKind = z.enum(['deterministic', 'generated']);

export const FilePath = z.string().min(1, 'Path is required');

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const GraphLoadInput = z.object({
  path: FilePath.describe('Path to a graph.json file'),
});

export const GraphExportInput = z.object({
  path: FilePath.describe('Destination path for graph.json'),
});

export const GraphBuildInput = z.object({
  world_description: z.string().min(1, 'World description is required'),
  num_people: z.number().int().min(1).max(50).default(5),
  num_entities: z.number().int().min(0).max(50).default(5),
});

export const GraphValidateInput = z.object({});

export const GraphStatsInput = z.object({});

// ═══════════════════════════════════════════════════════════════════════════════
// DERIVATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const RenderInput = z.object({
  focal_node_id: NodeId,
  radius: RadiusValue.optional().describe('Neighborhood radius (server default when omitted)'),
  format: z.enum(['structured', 'markdown']).default('markdown'),
});

export const HopCountsInput = z.object({
  hop_0: z.number().int().min(0).optional(),
  hop_1: z.number().int().min(0).optional(),
  hop_2: z.number().int().min(0).optional(),
});

export const QueryDeriveInput = z.object({
  focal_node_id: NodeId,
  counts: HopCountsInput.default({}),
  seed: Seed.optional(),
  phrase: z.boolean().default(false),
});

export const UpdateSimulateInput = z.object({
  focal_node_id: NodeId,
  seed: Seed.optional(),
  kind: UpdateKindSchema.optional(),
  hop: HopDistanceSchema.optional(),
  max_attempts: z.number().int().min(1).max(50).default(5),
  radius: RadiusValue.optional(),
  proposer: ProposerKind.default('deterministic'),
  phrase: z.boolean().default(false),
});

// ═══════════════════════════════════════════════════════════════════════════════
// SCENARIO SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ScenarioRunInput = z.object({
  world_description: z.string().min(1, 'World description is required'),
  num_people: z.number().int().min(1).max(50).default(5),
  num_entities: z.number().int().min(0).max(50).default(5),
  num_iter_per_graph: z.number().int().min(1).max(50).default(3),
  num_qa_per_iter: z.number().int().min(0).max(200).default(10),
  update_plan: z.array(HopDistanceSchema).optional(),
  radius: RadiusValue.optional(),
  seed: Seed.optional(),
  output_dir: z.string().optional(),
  use_loaded_graph: z.boolean().default(false),
  proposer: ProposerKind.default('deterministic'),
  phrase: z.boolean().default(false),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ConfigKey = z.enum(['output_dir', 'default_radius', 'default_seed', 'focal_concurrency']);

export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number(), z.boolean()]),
});
