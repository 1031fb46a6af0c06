/**
 * Natural-language phrasing of derived queries through the text generation
 * service. Template questions stay valid on their own; phrasing only
 * rewrites the `question` field and never touches paths or answers.
 *
 * @module services/queries/phrasing
 */

import { z } from 'zod';
import type { QueryRecord } from '../../models/query.js';
import { pathTokens } from '../../models/query.js';
import { GenerationError, type TextGenerator } from '../generation/types.js';

const PhrasedQuestionsSchema = z.object({
  questions: z.array(z.string().min(1)),
});

export interface PhraseQueriesInput {
  focalName: string;
  /** Markdown of the focal node's own document, given as context */
  personalInfo: string;
  records: QueryRecord[];
}

const SYSTEM_PROMPT =
  'You rewrite template questions into natural questions a person would ask their own assistant. ' +
  'The person is the user; refer to them as "I"/"my". Keep every question answerable with exactly the given answer. ' +
  'Return the questions in the same order, one per input.';

/**
 * Rewrite the questions of `records`.
 *
 * @throws GenerationError when the service fails or returns a different number of questions
 */
export async function phraseQueries(generator: TextGenerator, input: PhraseQueriesInput): Promise<QueryRecord[]> {
  if (input.records.length === 0) return [];

  const items = input.records.map((record, index) => ({
    index,
    hop_distance: record.hop_distance,
    question: record.question,
    path: pathTokens(record.path),
    answer: record.answer,
  }));

  const result = await generator.generate({
    system: SYSTEM_PROMPT,
    prompt: `User: ${input.focalName}\n\nPersonal info:\n${input.personalInfo}\n\nQuestions:\n${JSON.stringify(items, null, 2)}`,
    schema: PhrasedQuestionsSchema,
    schemaName: 'PhrasedQuestions',
    schemaHint: '{"questions": string[]} with one rewritten question per input, in order',
  });

  if (result.questions.length !== input.records.length) {
    throw new GenerationError(
      `Expected ${input.records.length} phrased questions, received ${result.questions.length}`,
      'INVALID_RESPONSE',
      { schema: 'PhrasedQuestions' }
    );
  }

  return input.records.map((record, index) => ({ ...record, question: result.questions[index] }));
}
