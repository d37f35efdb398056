/**
 * Forest error classes
 */

import { GroveError } from './base.js';

export abstract class ForestError extends GroveError {
  constructor(
    message: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'forest', operation, context);
  }
}

/**
 * Thrown when a tree id is already registered in the forest
 */
export class TreeIdAlreadyExistsError extends ForestError {
  readonly code = 'TREE_ID_ALREADY_EXISTS' as const;

  constructor(
    public readonly treeId: string,
    operation: string
  ) {
    super(`Tree ID ${treeId} already exists`, operation, { treeId });
  }
}

/**
 * Thrown when an identifier codec rejects the raw id text
 */
export class TreeIdParseError extends ForestError {
  readonly code = 'TREE_ID_PARSE_FAILED' as const;

  constructor(
    public readonly raw: string,
    reason?: string,
    operation?: string
  ) {
    super(`Tree ID "${raw}" could not be parsed${reason ? `: ${reason}` : ''}`, operation, {
      raw,
      reason,
    });
  }
}

export class TreeNotFoundError extends ForestError {
  readonly code = 'TREE_NOT_FOUND' as const;

  constructor(
    public readonly treeId: string,
    operation: string
  ) {
    super(`Tree ${treeId} not found`, operation, { treeId });
  }
}
