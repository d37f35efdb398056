/**
 * Base error classes for Grovekit
 *
 * Every failure raised by the library derives from GroveError so callers can
 * tell library errors apart from anything else with a single instanceof check.
 */

/**
 * Stable, machine readable error codes.
 */
export type GroveErrorCode =
  | 'ROOT_ALREADY_EXISTS'
  | 'PARENT_NOT_FOUND'
  | 'CONTENT_PARSE_FAILED'
  | 'CHILD_NOT_FOUND'
  | 'DUPLICATE_CHILD'
  | 'TREE_ID_ALREADY_EXISTS'
  | 'TREE_ID_PARSE_FAILED'
  | 'TREE_NOT_FOUND'
  | 'UNKNOWN';

/**
 * Base error class for all Grovekit errors
 * Provides consistent structure and context handling
 */
export abstract class GroveError extends Error {
  /**
   * Error code, stable across releases
   */
  public abstract readonly code: GroveErrorCode;

  /**
   * Module where the error originated
   */
  public readonly module: string;

  /**
   * Operation being performed when error occurred
   */
  public readonly operation?: string | undefined;

  /**
   * Additional context information
   */
  public readonly context?: Record<string, unknown> | undefined;

  public readonly timestamp: Date;

  constructor(
    message: string,
    module: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.module = module;
    this.operation = operation;
    this.context = context;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Create a copy of this error with additional context
   */
  withContext(additionalContext: Record<string, unknown>): GroveError {
    const copy: GroveError = Object.create(Object.getPrototypeOf(this));
    Object.assign(copy, this, {
      context: { ...this.context, ...additionalContext },
    });
    copy.stack = this.stack;
    copy.message = this.message;
    return copy;
  }

  /**
   * Convert error to a structured object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      module: this.module,
      operation: this.operation,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Generic error for wrapping unknown errors
 */
class GenericError extends GroveError {
  readonly code = 'UNKNOWN' as const;
}

/**
 * Helper function to wrap unknown errors with module context
 */
export function wrapError(
  error: unknown,
  module: string,
  operation: string,
  context?: Record<string, unknown>
): GroveError {
  if (error instanceof GroveError) {
    return context ? error.withContext(context) : error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new GenericError(message, module, operation, { ...context, cause });
}

/**
 * Type guard to check if an error is a GroveError
 */
export function isGroveError(error: unknown): error is GroveError {
  return error instanceof GroveError;
}
