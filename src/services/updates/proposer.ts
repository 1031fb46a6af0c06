/**
 * Mutation proposers
 *
 * Supply replacement attribute values and placeholder nodes for update
 * simulation. The deterministic proposer derives everything from the
 * injected Rng; the generated proposer asks the text generation service.
 *
 * @module services/updates/proposer
 */

import { z } from 'zod';
import type { AttributeValue, KnowledgeNode } from '../../models/knowledge-graph.js';
import { AttributeValueSchema } from '../../models/knowledge-graph.js';
import { randInt, randomToken, type Rng } from '../../utils/random.js';
import type { TextGenerator } from '../generation/types.js';
import { humanizeLabel } from '../rendering/renderer.js';

export interface AttributeProposalContext {
  node: KnowledgeNode;
  attribute: string;
  current: AttributeValue;
  rng: Rng;
}

export interface PlaceholderProposalContext {
  /** Node whose edge is being retargeted */
  source: KnowledgeNode;
  relation: string;
  /** Current target; the placeholder takes its type */
  previous: KnowledgeNode;
  rng: Rng;
}

export interface PlaceholderProposal {
  name: string;
  /** In the order they should render */
  attributes: Map<string, AttributeValue>;
}

export interface MutationProposer {
  /** Must return a value different from `context.current` */
  proposeAttributeValue(context: AttributeProposalContext): Promise<AttributeValue>;
  proposePlaceholder(context: PlaceholderProposalContext): Promise<PlaceholderProposal>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DETERMINISTIC
// ═══════════════════════════════════════════════════════════════════════════════

export class DeterministicProposer implements MutationProposer {
  proposeAttributeValue(context: AttributeProposalContext): Promise<AttributeValue> {
    const { current, rng } = context;
    if (typeof current === 'boolean') return Promise.resolve(!current);
    if (typeof current === 'number') {
      const step = Number.isInteger(current) ? randInt(rng, 1, 5) : Math.round(rng() * 100) / 100 + 0.01;
      return Promise.resolve(current + step);
    }
    return Promise.resolve(`${current} (updated ${randomToken(rng, 4)})`);
  }

  proposePlaceholder(context: PlaceholderProposalContext): Promise<PlaceholderProposal> {
    const { previous, rng } = context;
    const attributes = new Map<string, AttributeValue>();
    for (const key of previous.attributes.keys()) {
      attributes.set(key, `unknown ${humanizeLabel(key).toLowerCase()}`);
    }
    return Promise.resolve({
      name: `New ${humanizeLabel(previous.type)} ${randomToken(rng, 4)}`,
      attributes,
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// GENERATED
// ═══════════════════════════════════════════════════════════════════════════════

const AttributeProposalSchema = z.object({ value: AttributeValueSchema });

const PlaceholderSchema = z.object({
  name: z.string().trim().min(1),
  attributes: z.array(z.object({ key: z.string().min(1), value: AttributeValueSchema })).default([]),
});

function describeNode(node: KnowledgeNode): string {
  const attributes = [...node.attributes].map(([key, value]) => `${key}=${String(value)}`).join(', ');
  return `${node.name} (${node.type})${attributes ? `: ${attributes}` : ''}`;
}

export class GeneratedProposer implements MutationProposer {
  constructor(
    private readonly generator: TextGenerator,
    private readonly worldDescription: string = ''
  ) {}

  async proposeAttributeValue(context: AttributeProposalContext): Promise<AttributeValue> {
    const result = await this.generator.generate({
      system: 'You propose realistic changes to facts in a personal knowledge base.',
      prompt:
        `${this.worldDescription ? `World: ${this.worldDescription}\n` : ''}` +
        `Entity: ${describeNode(context.node)}\n` +
        `Propose a new, different value for "${context.attribute}" (currently ${JSON.stringify(context.current)}), ` +
        `keeping the same value type.`,
      schema: AttributeProposalSchema,
      schemaName: 'AttributeProposal',
      schemaHint: '{"value": string | number | boolean}',
    });
    if (result.value === context.current) {
      // an unchanged value falls back to the deterministic change
      return new DeterministicProposer().proposeAttributeValue(context);
    }
    return result.value;
  }

  async proposePlaceholder(context: PlaceholderProposalContext): Promise<PlaceholderProposal> {
    const keys = [...context.previous.attributes.keys()];
    const result = await this.generator.generate({
      system: 'You invent new entities for a personal knowledge base.',
      prompt:
        `${this.worldDescription ? `World: ${this.worldDescription}\n` : ''}` +
        `"${context.source.name}" ${context.relation.replace(/_/g, ' ')} "${context.previous.name}" ` +
        `(a ${context.previous.type}). Invent a different ${context.previous.type} to replace it` +
        `${keys.length > 0 ? ` with the attributes ${keys.join(', ')}` : ''}.`,
      schema: PlaceholderSchema,
      schemaName: 'Placeholder',
      schemaHint: '{"name": string, "attributes": [{"key": string, "value": string | number | boolean}]}',
    });
    return {
      name: result.name,
      attributes: new Map(result.attributes.map((pair) => [pair.key, pair.value] as const)),
    };
  }
}
