/**
 * Knowledge Graph Services
 *
 * Barrel exports for the graph container, traversal, consistency
 * validation and graph.json persistence.
 */

export { KnowledgeGraph, GraphError } from './graph.js';

export type { GraphErrorCode } from './graph.js';

export { breadthFirst, shortestPath, distancesFrom } from './traversal.js';

export type { TraversalVisit, PathHop } from './traversal.js';

export { validateGraph, assertValidGraph, GRAPH_INVARIANTS } from './validator.js';

export type { GraphInvariant, GraphViolation, GraphValidationResult } from './validator.js';

export { exportGraph, importGraph, serializeGraph } from './export-service.js';

export type { ExportResult } from './export-service.js';
