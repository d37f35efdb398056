import { ContentParseError } from '../errors/tree.js';

/**
 * Content stored in a tree node.
 *
 * `value` is the canonical payload used for child lookups and path matching.
 * `serialize()` returns raw text that the owning codec parses back into an
 * equal value.
 */
export interface NodeContent {
  readonly value: string;
  serialize(): string;
}

/**
 * Parses raw node text into typed content. Implementations throw
 * ContentParseError when the text does not match their micro-format.
 */
export interface ContentCodec<C extends NodeContent> {
  readonly name: string;
  parse(raw: string): C;
}

/**
 * Content base class whose serialized form is its value.
 */
export abstract class BaseContent implements NodeContent {
  abstract readonly value: string;

  serialize(): string {
    return this.value;
  }

  toString(): string {
    return this.serialize();
  }
}

/**
 * Build a codec from a parse function. A `string` returned by `parse` is
 * treated as the rejection reason.
 */
export function defineCodec<C extends NodeContent>(
  name: string,
  parse: (raw: string) => C | string
): ContentCodec<C> {
  return {
    name,
    parse(raw: string): C {
      const result = parse(raw);
      if (typeof result === 'string') {
        throw new ContentParseError(raw, name, result);
      }
      return result;
    },
  };
}
