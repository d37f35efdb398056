import { z } from 'zod';
import { BaseContent, defineCodec } from './NodeContent.js';

const MAX_WEIGHT = 0xffff_ffff;

/**
 * Weight component of the `"<uint>:<text>"` dialect
 */
export const weightSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'weight must be an unsigned integer')
  .transform(Number)
  .pipe(z.number().int().max(MAX_WEIGHT, `weight must not exceed ${MAX_WEIGHT}`));

/**
 * Content carrying a numeric weight next to its text, written `"<weight>:<text>"`.
 * The text, not the weight, is the node's value.
 */
export class WeightedContent extends BaseContent {
  constructor(
    readonly value: string,
    readonly weight: number
  ) {
    super();
  }

  override serialize(): string {
    return `${this.weight}:${this.value}`;
  }
}

export const weightedCodec = defineCodec<WeightedContent>('weighted', (raw) => {
  const parts = raw.split(':');
  if (parts.length !== 2) {
    return 'expected exactly one ":" separator';
  }

  const [weightText = '', text = ''] = parts;
  const weight = weightSchema.safeParse(weightText);
  if (!weight.success) {
    return weight.error.issues[0]?.message ?? 'invalid weight';
  }

  return new WeightedContent(text, weight.data);
});
