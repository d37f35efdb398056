export {
  type ArenaView,
  type TraversalEntry,
  type TreeIterator,
  sequential,
  inverseSequential,
  bfs,
  inverseBfs,
  preDfs,
  inversePreDfs,
  postDfs,
  inversePostDfs,
  inDfs,
  inverseInDfs,
  children,
} from './strategies.js';
export { TreeIterators, TRAVERSAL_ORDERS, type TraversalOrder } from './TreeIterators.js';
