/**
 * Update Instruction Phrasing Tests
 *
 * @module tests/unit/services/updates/phrasing
 */

import { describe, it, expect } from 'vitest';
import { GenerationError } from '../../../../src/services/generation/types.js';
import { renderNeighborhood } from '../../../../src/services/rendering/renderer.js';
import { phraseUpdate, UPDATE_INSTRUCTION_COUNT } from '../../../../src/services/updates/phrasing.js';
import { simulateUpdate } from '../../../../src/services/updates/update-simulator.js';
import { createRng } from '../../../../src/utils/random.js';
import { FakeTextGenerator, buildRestaurantGraph } from '../../helpers/graphs.js';

async function ageUpdate() {
  const graph = buildRestaurantGraph();
  return simulateUpdate(graph, renderNeighborhood(graph, 'A'), 'A', {
    rng: createRng(5),
    kind: 'attribute',
    hop: 0,
  });
}

describe('phraseUpdate', () => {
  it('keeps at most the configured number of instructions', async () => {
    const generator = new FakeTextGenerator([{ instructions: ['I just turned 36.', 'Update my age.', 'Extra'] }]);
    const instructions = await phraseUpdate(generator, await ageUpdate(), 'Ana Ruiz');

    expect(UPDATE_INSTRUCTION_COUNT).toBe(2);
    expect(instructions).toEqual(['I just turned 36.', 'Update my age.']);
  });

  it('describes the change as before and after paths', async () => {
    const generator = new FakeTextGenerator([{ instructions: ['ok'] }]);
    await phraseUpdate(generator, await ageUpdate(), 'Ana Ruiz');
    expect(generator.requests[0].prompt).toContain('Before: Ana Ruiz -> age=34');
  });

  it('surfaces a malformed response as a generation error', async () => {
    const generator = new FakeTextGenerator([{ instructions: [] }]);
    await expect(phraseUpdate(generator, await ageUpdate(), 'Ana Ruiz')).rejects.toThrow(GenerationError);
  });
});
