/**
 * Update Simulation Services
 */

export {
  simulateUpdate,
  collectMutableFacts,
  buildUpdatePath,
  formatUpdatePath,
  NoMutableFactError,
  MutationExhaustedError,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_IMMUTABLE_ATTRIBUTES,
} from './update-simulator.js';

export type { SimulateUpdateOptions, MutationCandidate, MutationAttemptFailure } from './update-simulator.js';

export {
  diffDocumentSets,
  diffDocument,
  applyDiff,
  invertDiff,
  changedKeys,
  lineDelta,
  documentPatch,
  reversePatch,
  fieldsEqual,
  DiffApplicationError,
} from './diff-service.js';

export { DeterministicProposer, GeneratedProposer } from './proposer.js';

export type {
  MutationProposer,
  AttributeProposalContext,
  PlaceholderProposalContext,
  PlaceholderProposal,
} from './proposer.js';

export { phraseUpdate, UPDATE_INSTRUCTION_COUNT } from './phrasing.js';
