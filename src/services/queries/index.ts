/**
 * Query Derivation Services
 */

export { deriveQueries, enumerateFacts } from './query-deriver.js';

export type { DeriveQueriesOptions } from './query-deriver.js';

export { phraseQueries } from './phrasing.js';

export type { PhraseQueriesInput } from './phrasing.js';
