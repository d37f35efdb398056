import type { NodeContent } from '../content/NodeContent.js';
import type { Handle } from '../tree/TreeNode.js';
import * as strategies from './strategies.js';
import type { ArenaView, TreeIterator } from './strategies.js';

/**
 * Every traversal strategy over one tree, started at the same node.
 *
 * Without a start handle each strategy uses its own default: the root, or the
 * last arena slot for inverseSequential. A start handle outside the arena
 * makes every strategy yield nothing.
 */
export class TreeIterators<C extends NodeContent> {
  constructor(
    private readonly tree: ArenaView<C>,
    private readonly start?: Handle
  ) {}

  /** Arena order, unlinked nodes included */
  sequential(): TreeIterator<C> {
    return strategies.sequential(this.tree, this.start);
  }

  /** Reverse arena order, unlinked nodes included */
  inverseSequential(): TreeIterator<C> {
    return strategies.inverseSequential(this.tree, this.start);
  }

  bfs(): TreeIterator<C> {
    return strategies.bfs(this.tree, this.start);
  }

  inverseBfs(): TreeIterator<C> {
    return strategies.inverseBfs(this.tree, this.start);
  }

  /** Pre-order DFS */
  preDfs(): TreeIterator<C> {
    return strategies.preDfs(this.tree, this.start);
  }

  inversePreDfs(): TreeIterator<C> {
    return strategies.inversePreDfs(this.tree, this.start);
  }

  /** Post-order DFS */
  postDfs(): TreeIterator<C> {
    return strategies.postDfs(this.tree, this.start);
  }

  inversePostDfs(): TreeIterator<C> {
    return strategies.inversePostDfs(this.tree, this.start);
  }

  /** In-order DFS */
  inDfs(): TreeIterator<C> {
    return strategies.inDfs(this.tree, this.start);
  }

  inverseInDfs(): TreeIterator<C> {
    return strategies.inverseInDfs(this.tree, this.start);
  }

  children(): TreeIterator<C> {
    return strategies.children(this.tree, this.start);
  }

  /**
   * Look up a strategy by name
   */
  byOrder(order: TraversalOrder): TreeIterator<C> {
    return this[order]();
  }
}

export const TRAVERSAL_ORDERS = [
  'sequential',
  'inverseSequential',
  'bfs',
  'inverseBfs',
  'preDfs',
  'inversePreDfs',
  'postDfs',
  'inversePostDfs',
  'inDfs',
  'inverseInDfs',
  'children',
] as const;

export type TraversalOrder = (typeof TRAVERSAL_ORDERS)[number];
