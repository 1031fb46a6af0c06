/**
 * Text generation configuration (Gemini)
 *
 * Loaded from environment variables and validated with zod.
 */

import { z } from 'zod';
import { validateInput } from '../../utils/validation.js';

export const GEMINI_MODELS = {
  FLASH_2: 'gemini-2.0-flash',
  FLASH_2_5: 'gemini-2.5-flash',
  PRO: 'gemini-2.5-pro',
} as const;

export type GeminiModelId = (typeof GEMINI_MODELS)[keyof typeof GEMINI_MODELS];

// Configuration schema
export const GenerationConfigSchema = z.object({
  apiKey: z.string().min(1, 'GEMINI_API_KEY is required'),
  model: z.string().min(1).default(GEMINI_MODELS.FLASH_2),

  // Generation defaults; world building wants varied output
  maxOutputTokens: z.number().int().positive().default(8192),
  temperature: z.number().min(0).max(2).default(1.0),

  // In-flight request cap shared by every caller of one generator
  maxConcurrency: z.number().int().min(1).default(4),

  // Per-call timeout
  requestTimeoutMs: z.number().int().positive().default(60000),

  // Retry configuration (3 attempts, 500ms base)
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().min(0).default(500),
      maxDelayMs: z.number().min(0).default(10000),
    })
    .default({}),

  // Circuit breaker (5 failures, 60s recovery)
  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeMs: z.number().min(0).default(60000),
    })
    .default({}),
});

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type GenerationConfigInput = z.input<typeof GenerationConfigSchema>;

function intFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? parseInt(raw, 10) : undefined;
}

/**
 * Load configuration from environment variables
 *
 * @throws ValidationError when the merged configuration is invalid (e.g. no API key)
 */
export function loadGenerationConfig(overrides?: Partial<GenerationConfigInput>): GenerationConfig {
  const envConfig: GenerationConfigInput = {
    apiKey: process.env.GEMINI_API_KEY || '',
    model: process.env.GEMINI_MODEL || GEMINI_MODELS.FLASH_2,
    maxOutputTokens: intFromEnv('GEMINI_MAX_OUTPUT_TOKENS'),
    temperature: process.env.GEMINI_TEMPERATURE ? parseFloat(process.env.GEMINI_TEMPERATURE) : undefined,
    maxConcurrency: intFromEnv('GEMINI_MAX_CONCURRENCY'),
    requestTimeoutMs: intFromEnv('GEMINI_TIMEOUT_MS'),
  };

  return validateInput(GenerationConfigSchema, { ...envConfig, ...overrides });
}
