/**
 * Centralized error handling for Grovekit
 */

// Base error classes and utilities
export {
  GroveError,
  type GroveErrorCode,
  wrapError,
  isGroveError,
} from './base.js';

// Tree errors
export {
  TreeError,
  RootAlreadyExistsError,
  ParentNotFoundError,
  ContentParseError,
  ChildNotFoundError,
  DuplicateChildError,
} from './tree.js';

// Forest errors
export {
  ForestError,
  TreeIdAlreadyExistsError,
  TreeIdParseError,
  TreeNotFoundError,
} from './forest.js';
