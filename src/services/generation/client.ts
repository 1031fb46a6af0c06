/**
 * Gemini-backed text generator
 *
 * JSON-mode generation validated against a zod schema, with:
 * - bounded concurrency (ConcurrencyLimiter)
 * - a circuit breaker that only counts service failures
 * - exponential backoff retry; a non-conforming response also consumes an attempt
 * - a per-call timeout
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';

import { type GenerationConfig, type GenerationConfigInput, loadGenerationConfig } from './config.js';
import { CircuitBreaker, CircuitBreakerOpenError, type CircuitBreakerStatus } from './circuit-breaker.js';
import { ConcurrencyLimiter, type LimiterStatus } from './limiter.js';
import { GenerationError, type GenerationRequest, type TextGenerator } from './types.js';

export { CircuitBreakerOpenError };

export interface GeneratorStatus {
  model: string;
  limiter: LimiterStatus;
  circuitBreaker: CircuitBreakerStatus;
}

/**
 * Strip a ```json fence if the model added one and parse.
 */
export function parseJsonResponse(text: string): unknown {
  const trimmed = text.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return JSON.parse(fenced ? fenced[1] : trimmed);
}

/**
 * Prompt actually sent to the model: the caller's prompt plus the JSON
 * contract.
 */
export function buildPrompt<T>(request: GenerationRequest<T>): string {
  const hint = request.schemaHint ? `: ${request.schemaHint}` : '';
  return `${request.prompt}\n\nRespond with a single JSON object (${request.schemaName})${hint}. Output JSON only.`;
}

function isRateLimit(message: string): boolean {
  return message.includes('429') || message.toLowerCase().includes('rate limit');
}

export class GeminiTextGenerator implements TextGenerator {
  private readonly model: GenerativeModel;
  private readonly config: GenerationConfig;
  private readonly limiter: ConcurrencyLimiter;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(configOverrides?: Partial<GenerationConfigInput>) {
    this.config = loadGenerationConfig(configOverrides);

    const client = new GoogleGenerativeAI(this.config.apiKey);
    this.model = client.getGenerativeModel({ model: this.config.model });

    this.limiter = new ConcurrencyLimiter(this.config.maxConcurrency);
    this.circuitBreaker = new CircuitBreaker({
      name: 'gemini',
      failureThreshold: this.config.circuitBreaker.failureThreshold,
      recoveryTimeMs: this.config.circuitBreaker.recoveryTimeMs,
      countsAsFailure: (error) => !(error instanceof GenerationError && error.code === 'INVALID_RESPONSE'),
    });
  }

  async generate<T>(request: GenerationRequest<T>): Promise<T> {
    try {
      return await this.limiter.run(() => this.circuitBreaker.execute(() => this.executeWithRetry(request)));
    } catch (error) {
      if (error instanceof CircuitBreakerOpenError) {
        throw new GenerationError(error.message, 'CIRCUIT_OPEN', {
          schema: request.schemaName,
          time_to_recovery_ms: error.timeToRecovery,
        });
      }
      throw error;
    }
  }

  /**
   * Execute request with exponential backoff retry
   */
  private async executeWithRetry<T>(request: GenerationRequest<T>): Promise<T> {
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.config.retry;
    let lastError: GenerationError | null = null;
    let attempts = 0;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      attempts = attempt + 1;
      try {
        return await this.attempt(request);
      } catch (error) {
        lastError =
          error instanceof GenerationError
            ? error
            : new GenerationError(error instanceof Error ? error.message : String(error), 'REQUEST_FAILED', {
                schema: request.schemaName,
              });

        console.error(`[Gemini] ${request.schemaName} attempt ${attempt + 1}/${maxAttempts} failed: ${lastError.message}`);
        // A timeout is final for this request
        if (attempt >= maxAttempts - 1 || lastError.code === 'TIMEOUT') break;

        // Rate limits wait one step longer
        const exponent = lastError.code === 'RATE_LIMITED' ? attempt + 1 : attempt;
        const delay = Math.min(baseDelayMs * Math.pow(2, exponent), maxDelayMs);
        await this.sleep(delay);
      }
    }

    throw new GenerationError(
      `${request.schemaName} generation failed after ${attempts} attempt(s): ${lastError?.message ?? 'unknown error'}`,
      lastError?.code ?? 'REQUEST_FAILED',
      { schema: request.schemaName, attempts }
    );
  }

  private async attempt<T>(request: GenerationRequest<T>): Promise<T> {
    let text: string;
    try {
      const result = await this.withTimeout(
        this.model.generateContent({
          contents: [{ role: 'user', parts: [{ text: buildPrompt(request) }] }],
          systemInstruction: request.system,
          generationConfig: {
            temperature: request.temperature ?? this.config.temperature,
            maxOutputTokens: this.config.maxOutputTokens,
            responseMimeType: 'application/json',
          },
        }),
        request.schemaName
      );
      text = result.response.text();
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new GenerationError(message, isRateLimit(message) ? 'RATE_LIMITED' : 'REQUEST_FAILED', {
        schema: request.schemaName,
      });
    }

    let parsed: unknown;
    try {
      parsed = parseJsonResponse(text);
    } catch (error) {
      throw new GenerationError(
        `Response for ${request.schemaName} is not JSON: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_RESPONSE',
        { schema: request.schemaName, preview: text.slice(0, 200) }
      );
    }

    const validated = request.schema.safeParse(parsed);
    if (!validated.success) {
      throw new GenerationError(
        `Response does not match ${request.schemaName}: ${validated.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`,
        'INVALID_RESPONSE',
        { schema: request.schemaName }
      );
    }
    return validated.data;
  }

  private withTimeout<T>(promise: Promise<T>, label: string): Promise<T> {
    const timeoutMs = this.config.requestTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new GenerationError(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT', { timeout_ms: timeoutMs })),
        timeoutMs
      );
    });
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
  }

  getStatus(): GeneratorStatus {
    return {
      model: this.config.model,
      limiter: this.limiter.getStatus(),
      circuitBreaker: this.circuitBreaker.getStatus(),
    };
  }

  /**
   * Reset circuit breaker (for testing)
   */
  reset(): void {
    this.circuitBreaker.reset();
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
