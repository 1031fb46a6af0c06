/**
 * Text generation contract
 *
 * Every caller that needs free text (world building, phrasing) depends on
 * this interface only, so tests can swap in a deterministic fake.
 */

import type { z } from 'zod';

export interface GenerationRequest<T> {
  /** System instruction */
  system?: string;
  prompt: string;
  /** Shape the JSON response must satisfy */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Name of the expected object, used in the prompt and in errors */
  schemaName: string;
  /** Plain description of the expected JSON shape, appended to the prompt */
  schemaHint?: string;
  temperature?: number;
}

export interface TextGenerator {
  /**
   * @throws GenerationError when the service fails or the response does not
   *   conform to `request.schema` after the configured attempts
   */
  generate<T>(request: GenerationRequest<T>): Promise<T>;
}

export type GenerationErrorCode = 'REQUEST_FAILED' | 'INVALID_RESPONSE' | 'TIMEOUT' | 'CIRCUIT_OPEN' | 'RATE_LIMITED';

export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly code: GenerationErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GenerationError';
    Error.captureStackTrace?.(this, GenerationError);
  }
}
