/**
 * Tree and node error classes
 *
 * Raised by structural mutations. Every check runs before the arena is
 * touched, so a thrown error always leaves the tree unchanged.
 */

import { GroveError } from './base.js';

/**
 * Base class for errors raised by Tree and TreeNode operations
 */
export abstract class TreeError extends GroveError {
  constructor(
    message: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'tree', operation, context);
  }
}

/**
 * Thrown by setRoot on a tree that already has a root
 */
export class RootAlreadyExistsError extends TreeError {
  readonly code = 'ROOT_ALREADY_EXISTS' as const;

  constructor(context?: Record<string, unknown>) {
    super('Root already exists', 'setRoot', context);
  }
}

/**
 * Thrown by link when the parent handle does not index the arena
 */
export class ParentNotFoundError extends TreeError {
  readonly code = 'PARENT_NOT_FOUND' as const;

  constructor(
    public readonly parent: number,
    context?: Record<string, unknown>
  ) {
    super(`Parent node ${parent} not found`, 'link', { ...context, parent });
  }
}

/**
 * Thrown when a content codec rejects its raw input
 */
export class ContentParseError extends TreeError {
  readonly code = 'CONTENT_PARSE_FAILED' as const;

  constructor(
    public readonly raw: string,
    public readonly codec: string,
    reason?: string,
    operation?: string
  ) {
    super(
      `Content "${raw}" rejected by ${codec} codec${reason ? `: ${reason}` : ''}`,
      operation,
      { raw, codec, reason }
    );
  }
}

/**
 * Thrown when the target of an update or unlink is missing, is the root,
 * or has already been severed from its parent
 */
export class ChildNotFoundError extends TreeError {
  readonly code = 'CHILD_NOT_FOUND' as const;

  constructor(
    public readonly target: number | string,
    operation: string,
    reason: string
  ) {
    super(`Child ${JSON.stringify(target)} not found: ${reason}`, operation, {
      target,
      reason,
    });
  }
}

/**
 * Thrown when a live sibling already uses the same content value
 */
export class DuplicateChildError extends TreeError {
  readonly code = 'DUPLICATE_CHILD' as const;

  constructor(
    public readonly childName: string,
    public readonly parent: number,
    operation: string
  ) {
    super(`Node ${parent} already has a child named "${childName}"`, operation, {
      childName,
      parent,
    });
  }
}
