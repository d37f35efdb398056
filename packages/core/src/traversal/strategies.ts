/**
 * Traversal strategies over a tree arena.
 *
 * Each strategy is a generator reading the arena by handle. Generators are
 * lazy and one-shot; abandoning one part way leaves the tree untouched.
 * Severed child slots are skipped everywhere, so the BFS and DFS families
 * only reach nodes connected to their start through live links.
 */

import type { NodeContent } from '../content/NodeContent.js';
import { type Handle, type ReadonlyTreeNode, SEVERED } from '../tree/TreeNode.js';

/**
 * Read access to a tree arena
 */
export interface ArenaView<C extends NodeContent> {
  readonly nodeCount: number;
  node(handle: Handle): ReadonlyTreeNode<C> | undefined;
}

export type TraversalEntry<C extends NodeContent> = readonly [node: ReadonlyTreeNode<C>, handle: Handle];

export type TreeIterator<C extends NodeContent> = Generator<TraversalEntry<C>, void, undefined>;

function liveChildren<C extends NodeContent>(node: ReadonlyTreeNode<C>, reverse: boolean): Handle[] {
  const children = node.children.filter((child) => child !== SEVERED);
  return reverse ? children.reverse() : children;
}

/**
 * Arena order, unlinked nodes included
 */
export function* sequential<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle = 0
): TreeIterator<C> {
  for (let handle = start; handle < tree.nodeCount; handle++) {
    const node = tree.node(handle);
    if (!node) return;
    yield [node, handle];
  }
}

/**
 * Reverse arena order, unlinked nodes included
 */
export function* inverseSequential<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle = tree.nodeCount - 1
): TreeIterator<C> {
  for (let handle = start; handle >= 0; handle--) {
    const node = tree.node(handle);
    if (!node) return;
    yield [node, handle];
  }
}

function* levelOrder<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle,
  reverse: boolean
): TreeIterator<C> {
  const queue: Handle[] = [start];
  let head = 0;

  while (head < queue.length) {
    const handle = queue[head++];
    const node = handle === undefined ? undefined : tree.node(handle);
    if (handle === undefined || !node) continue;

    queue.push(...liveChildren(node, reverse));
    yield [node, handle];
  }
}

export function bfs<C extends NodeContent>(tree: ArenaView<C>, start: Handle = 0): TreeIterator<C> {
  return levelOrder(tree, start, false);
}

/**
 * Level order with each node's children taken right to left
 */
export function inverseBfs<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle = 0
): TreeIterator<C> {
  return levelOrder(tree, start, true);
}

function* preOrder<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle,
  reverse: boolean
): TreeIterator<C> {
  const stack: Handle[] = [start];

  for (let handle = stack.pop(); handle !== undefined; handle = stack.pop()) {
    const node = tree.node(handle);
    if (!node) continue;

    // The first child to visit goes on top
    stack.push(...liveChildren(node, !reverse));
    yield [node, handle];
  }
}

export function preDfs<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle = 0
): TreeIterator<C> {
  return preOrder(tree, start, false);
}

export function inversePreDfs<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle = 0
): TreeIterator<C> {
  return preOrder(tree, start, true);
}

function* postOrder<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle,
  reverse: boolean
): TreeIterator<C> {
  // [handle, children already pushed]
  const stack: Array<[Handle, boolean]> = [[start, false]];

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const [handle, expanded] = frame;
    const node = tree.node(handle);
    if (!node) continue;

    if (expanded || node.childCount === 0) {
      yield [node, handle];
      continue;
    }

    stack.push([handle, true]);
    for (const child of liveChildren(node, !reverse)) {
      stack.push([child, false]);
    }
  }
}

export function postDfs<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle = 0
): TreeIterator<C> {
  return postOrder(tree, start, false);
}

export function inversePostDfs<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle = 0
): TreeIterator<C> {
  return postOrder(tree, start, true);
}

interface InOrderFrame {
  handle: Handle;
  children: Handle[];
  next: number;
  visited: boolean;
}

/**
 * In-order generalised to n-ary trees: the first child's subtree, then the
 * node, then the remaining children's subtrees.
 */
function* inOrder<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle,
  reverse: boolean
): TreeIterator<C> {
  const frameFor = (handle: Handle): InOrderFrame | undefined => {
    const node = tree.node(handle);
    return node
      ? { handle, children: liveChildren(node, reverse), next: 0, visited: false }
      : undefined;
  };

  const stack: InOrderFrame[] = [];
  const first = frameFor(start);
  if (first) stack.push(first);

  for (let frame = stack.at(-1); frame !== undefined; frame = stack.at(-1)) {
    const node = tree.node(frame.handle);
    if (!node) {
      stack.pop();
      continue;
    }

    if (frame.next === 0 && frame.children.length > 0) {
      frame.next = 1;
      const child = frameFor(frame.children[0] ?? SEVERED);
      if (child) stack.push(child);
      continue;
    }

    if (!frame.visited) {
      frame.visited = true;
      yield [node, frame.handle];
    }

    const nextChild = frame.children[frame.next];
    if (nextChild === undefined) {
      stack.pop();
      continue;
    }

    frame.next++;
    const child = frameFor(nextChild);
    if (child) stack.push(child);
  }
}

export function inDfs<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle = 0
): TreeIterator<C> {
  return inOrder(tree, start, false);
}

/**
 * Mirror of inDfs: the last child's subtree, the node, then the remaining
 * children right to left.
 */
export function inverseInDfs<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle = 0
): TreeIterator<C> {
  return inOrder(tree, start, true);
}

/**
 * Direct live children of `start`, left to right
 */
export function* children<C extends NodeContent>(
  tree: ArenaView<C>,
  start: Handle = 0
): TreeIterator<C> {
  const parent = tree.node(start);
  if (!parent) return;

  for (const handle of parent.children) {
    if (handle === SEVERED) continue;
    const node = tree.node(handle);
    if (node) yield [node, handle];
  }
}
