/**
 * Natural-language update instructions
 *
 * Turns a simulated update into instructions the user might give their
 * assistant ("I moved to ...", "Remember that ..."). The structured fact and
 * diff stay authoritative.
 *
 * @module services/updates/phrasing
 */

import { z } from 'zod';
import type { UpdateScenario } from '../../models/update.js';
import type { TextGenerator } from '../generation/types.js';
import { formatUpdatePath } from './update-simulator.js';

export const UPDATE_INSTRUCTION_COUNT = 2;

const UpdateInstructionsSchema = z.object({
  instructions: z.array(z.string().trim().min(1)).min(1),
});

const SYSTEM_PROMPT =
  'You write short messages a user sends to their personal assistant to update what it remembers. ' +
  'The user speaks in the first person. Each message must state the new fact unambiguously.';

/**
 * @throws GenerationError when the service fails or the response is malformed
 */
export async function phraseUpdate(
  generator: TextGenerator,
  scenario: UpdateScenario,
  focalName: string
): Promise<string[]> {
  const result = await generator.generate({
    system: SYSTEM_PROMPT,
    prompt:
      `User: ${focalName}\n` +
      `Before: ${formatUpdatePath(scenario.old_path).join(' -> ')}\n` +
      `After: ${formatUpdatePath(scenario.new_path).join(' -> ')}\n\n` +
      `Write ${UPDATE_INSTRUCTION_COUNT} different messages announcing this change.`,
    schema: UpdateInstructionsSchema,
    schemaName: 'UpdateInstructions',
    schemaHint: `{"instructions": string[]} with ${UPDATE_INSTRUCTION_COUNT} messages`,
  });
  return result.instructions.slice(0, UPDATE_INSTRUCTION_COUNT);
}
