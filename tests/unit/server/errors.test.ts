/**
 * Unit tests for error categorization and formatting
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';
import {
  KnowledgeBaseError,
  formatErrorResponse,
  graphNotLoadedError,
  nodeNotFoundError,
  pathNotFoundError,
  validationError,
} from '../../../src/server/errors.js';
import { successResult } from '../../../src/server/types.js';
import { GraphError } from '../../../src/services/knowledge-graph/graph.js';
import { GenerationError } from '../../../src/services/generation/types.js';
import { CircuitBreakerOpenError } from '../../../src/services/generation/circuit-breaker.js';
import { MutationExhaustedError, NoMutableFactError } from '../../../src/services/updates/update-simulator.js';
import { ValidationError } from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// fromUnknown
// ═══════════════════════════════════════════════════════════════════════════════

describe('KnowledgeBaseError.fromUnknown', () => {
  it('returns an existing KnowledgeBaseError unchanged', () => {
    const error = validationError('bad input');
    expect(KnowledgeBaseError.fromUnknown(error)).toBe(error);
  });

  it('maps error classes to categories', () => {
    const cases: Array<[Error, string]> = [
      [new ValidationError('bad'), 'VALIDATION_ERROR'],
      [new GraphError('self loop', 'SELF_LOOP'), 'GRAPH_ERROR'],
      [new GenerationError('down', 'REQUEST_FAILED'), 'GENERATION_ERROR'],
      [new CircuitBreakerOpenError('open', 1000), 'GENERATION_ERROR'],
      [new NoMutableFactError('none'), 'NO_MUTABLE_FACT'],
      [new MutationExhaustedError('exhausted', []), 'MUTATION_EXHAUSTED'],
      [new TypeError('boom'), 'INTERNAL_ERROR'],
    ];
    expect(cases.map(([error]) => KnowledgeBaseError.fromUnknown(error).category)).toEqual(cases.map(([, c]) => c));
  });

  it('refines categories by error code', () => {
    expect(KnowledgeBaseError.fromUnknown(new GraphError('Node not found: Z', 'NODE_NOT_FOUND')).category).toBe(
      'NODE_NOT_FOUND'
    );
    expect(KnowledgeBaseError.fromUnknown(new ValidationError('invalid graph', 'GRAPH_INVALID')).category).toBe(
      'GRAPH_INVALID'
    );
  });

  it('keeps the original details, code and name', () => {
    const error = KnowledgeBaseError.fromUnknown(new GraphError('Node not found: Z', 'NODE_NOT_FOUND', { node_id: 'Z' }));
    expect(error.message).toBe('Node not found: Z');
    expect(error.details).toEqual({ node_id: 'Z', code: 'NODE_NOT_FOUND', originalName: 'GraphError' });
  });

  it('wraps non-Error values with the default category', () => {
    const error = KnowledgeBaseError.fromUnknown('plain failure', 'GRAPH_ERROR');
    expect(error.category).toBe('GRAPH_ERROR');
    expect(error.message).toBe('plain failure');
    expect(error.details).toEqual({ originalValue: 'plain failure' });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORIES AND FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

describe('error factories', () => {
  it('build categorized errors', () => {
    expect(graphNotLoadedError().category).toBe('GRAPH_NOT_LOADED');
    expect(nodeNotFoundError('Z').details).toEqual({ node_id: 'Z' });
    expect(pathNotFoundError('/tmp/none.json').message).toBe('Path does not exist: /tmp/none.json');
  });

  it('format a failure response', () => {
    expect(formatErrorResponse(validationError('bad radius', { value: 9 }))).toEqual({
      success: false,
      error: { category: 'VALIDATION_ERROR', message: 'bad radius', details: { value: 9 } },
    });
  });

  it('wrap successful data', () => {
    expect(successResult({ ok: true })).toEqual({ success: true, data: { ok: true } });
  });
});
