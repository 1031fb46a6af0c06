/**
 * Text Generation Service
 * Exports the generator contract, the Gemini implementation and its support classes
 */

// Contract
export { GenerationError, type GenerationErrorCode, type GenerationRequest, type TextGenerator } from './types.js';

// Client
export {
  GeminiTextGenerator,
  CircuitBreakerOpenError,
  buildPrompt,
  parseJsonResponse,
  type GeneratorStatus,
} from './client.js';

// Configuration
export {
  type GenerationConfig,
  type GenerationConfigInput,
  GenerationConfigSchema,
  loadGenerationConfig,
  GEMINI_MODELS,
  type GeminiModelId,
} from './config.js';

// Concurrency
export { ConcurrencyLimiter, type LimiterStatus } from './limiter.js';

// Circuit Breaker
export {
  CircuitBreaker,
  CircuitState,
  type CircuitBreakerConfig,
  type CircuitBreakerStatus,
} from './circuit-breaker.js';
