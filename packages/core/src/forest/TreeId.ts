import { z } from 'zod';
import { TreeIdParseError } from '../errors/forest.js';

/**
 * Key under which a Forest stores a tree.
 *
 * Two ids name the same tree when `equals` holds; `hashKey` must agree with
 * `equals` since the forest indexes trees by it.
 */
export interface TreeId {
  readonly id: string;
  equals(other: TreeId): boolean;
  hashKey(): string;
}

/**
 * Parses raw id text. Implementations throw TreeIdParseError on rejection.
 */
export interface TreeIdCodec<Id extends TreeId> {
  parse(text: string): Id;
}

export function equalsById(a: TreeId, b: TreeId): boolean {
  return a.id === b.id;
}

export function hashById(id: TreeId): string {
  return id.id;
}

/**
 * Identifier base class comparing and hashing by `id`
 */
export abstract class BaseTreeId implements TreeId {
  abstract readonly id: string;

  equals(other: TreeId): boolean {
    return equalsById(this, other);
  }

  hashKey(): string {
    return hashById(this);
  }

  toString(): string {
    return this.id;
  }
}

/**
 * Default identifier: any non-empty string, kept verbatim
 */
export class RawTreeId extends BaseTreeId {
  constructor(readonly id: string) {
    super();
  }
}

export const rawTreeIdCodec: TreeIdCodec<RawTreeId> = {
  parse(text: string): RawTreeId {
    if (text.length === 0) {
      throw new TreeIdParseError(text, 'tree ID must not be empty');
    }
    return new RawTreeId(text);
  },
};

export const slugSchema = z
  .string()
  .min(1, 'tree ID must not be empty')
  .max(64, 'tree ID must be at most 64 characters')
  .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'tree ID must be a lower-case slug');

/**
 * Slug identifier such as `release-2024`; surrounding whitespace is trimmed
 */
export class SlugTreeId extends BaseTreeId {
  constructor(readonly id: string) {
    super();
  }
}

export const slugTreeIdCodec: TreeIdCodec<SlugTreeId> = {
  parse(text: string): SlugTreeId {
    const result = slugSchema.safeParse(text.trim());
    if (!result.success) {
      throw new TreeIdParseError(text, result.error.issues[0]?.message);
    }
    return new SlugTreeId(result.data);
  },
};
