/**
 * Grovekit Core - arena-backed n-ary trees with pluggable node content
 *
 * Trees own their nodes in a single array and link them by stable integer
 * handles. Structural edits (link, unlink, update) run in O(1); a family of
 * traversal strategies walks the live structure by handle; forests group
 * named trees under parsed identifiers.
 */

// Node content
export {
  type NodeContent,
  type ContentCodec,
  BaseContent,
  defineCodec,
  RawContent,
  rawCodec,
  WeightedContent,
  weightedCodec,
  weightSchema,
} from './content/index.js';

// Trees
export {
  Tree,
  TreeNode,
  type ReadonlyTreeNode,
  SEVERED,
  type Handle,
  type TreeOptions,
  type ReadonlyTree,
  type CompactionResult,
} from './tree/index.js';

// Traversal
export {
  TreeIterators,
  TRAVERSAL_ORDERS,
  type TraversalOrder,
  type TraversalEntry,
  type TreeIterator,
  type ArenaView,
} from './traversal/index.js';

// Forests
export {
  Forest,
  type ForestOptions,
  type TreeId,
  type TreeIdCodec,
  BaseTreeId,
  RawTreeId,
  rawTreeIdCodec,
  SlugTreeId,
  slugTreeIdCodec,
  equalsById,
  hashById,
} from './forest/index.js';

// Validation
export {
  validateTree,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
  type ValidationOptions,
} from './validation/index.js';

// Errors
export {
  GroveError,
  type GroveErrorCode,
  wrapError,
  isGroveError,
  TreeError,
  RootAlreadyExistsError,
  ParentNotFoundError,
  ContentParseError,
  ChildNotFoundError,
  DuplicateChildError,
  ForestError,
  TreeIdAlreadyExistsError,
  TreeIdParseError,
  TreeNotFoundError,
} from './errors/index.js';

// Utilities
export { cfg, configSchema, type AppConfig } from './utils/config.js';
export {
  logger,
  createModuleLogger,
  LoggerFactory,
  logError,
  type Logger,
} from './utils/logger.js';
export { DEFAULT_CONFIG } from './constants/defaults.js';
