/**
 * Knowledge Base Error Handling
 *
 * FAIL FAST: every failure surfaces as a KnowledgeBaseError with a category,
 * a message and the originating error's details.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'
  | 'GRAPH_INVALID'

  // Graph errors
  | 'GRAPH_NOT_LOADED'
  | 'NODE_NOT_FOUND'
  | 'GRAPH_ERROR'

  // Generation errors
  | 'GENERATION_ERROR'

  // Update simulation errors
  | 'NO_MUTABLE_FACT'
  | 'MUTATION_EXHAUSTED'
  | 'DIFF_ERROR'

  // File system errors
  | 'PATH_NOT_FOUND'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default category per error class name. Errors whose `code` refines the
 * category are listed in ERROR_CODE_TO_CATEGORY.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  GraphError: 'GRAPH_ERROR',
  GenerationError: 'GENERATION_ERROR',
  CircuitBreakerOpenError: 'GENERATION_ERROR',
  NoMutableFactError: 'NO_MUTABLE_FACT',
  MutationExhaustedError: 'MUTATION_EXHAUSTED',
  DiffApplicationError: 'DIFF_ERROR',
  LinkResolutionError: 'INTERNAL_ERROR',
};

const ERROR_CODE_TO_CATEGORY: Record<string, Record<string, ErrorCategory>> = {
  ValidationError: { GRAPH_INVALID: 'GRAPH_INVALID' },
  GraphError: { NODE_NOT_FOUND: 'NODE_NOT_FOUND' },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function errorDetails(error: Error): Record<string, unknown> {
  return 'details' in error && isRecord(error.details) ? error.details : {};
}

// ═══════════════════════════════════════════════════════════════════════════════
// KNOWLEDGE BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class KnowledgeBaseError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'KnowledgeBaseError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, KnowledgeBaseError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): KnowledgeBaseError {
    if (error instanceof KnowledgeBaseError) {
      return error;
    }

    if (error instanceof Error) {
      const code = errorCode(error);
      const refined = code === undefined ? undefined : ERROR_CODE_TO_CATEGORY[error.name]?.[code];
      const category = refined ?? ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;

      return new KnowledgeBaseError(category, error.message, {
        ...errorDetails(error),
        ...(code === undefined ? {} : { code }),
        originalName: error.name,
      });
    }

    return new KnowledgeBaseError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format error for tool response
 * ALWAYS includes category, message, and details
 */
export function formatErrorResponse(error: KnowledgeBaseError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): KnowledgeBaseError {
  return new KnowledgeBaseError('VALIDATION_ERROR', message, details);
}

export function graphNotLoadedError(): KnowledgeBaseError {
  return new KnowledgeBaseError(
    'GRAPH_NOT_LOADED',
    'No knowledge graph loaded. Use kb_graph_load or kb_graph_build first.'
  );
}

export function nodeNotFoundError(nodeId: string): KnowledgeBaseError {
  return new KnowledgeBaseError('NODE_NOT_FOUND', `Node not found: ${nodeId}. Use kb_graph_stats to inspect the graph.`, {
    node_id: nodeId,
  });
}

export function pathNotFoundError(path: string): KnowledgeBaseError {
  return new KnowledgeBaseError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}
