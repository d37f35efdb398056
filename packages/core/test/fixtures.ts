/**
 * Shared tree fixtures for the core test suite
 */

import { rawCodec, type RawContent } from '../src/content/RawContent.js';
import type { NodeContent } from '../src/content/NodeContent.js';
import { Tree } from '../src/tree/Tree.js';
import type { TreeIterator } from '../src/traversal/strategies.js';
import type { Handle } from '../src/tree/TreeNode.js';

export interface SampleTree {
  tree: Tree<RawContent>;
  handles: Record<'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G' | 'H', Handle>;
}

/**
 * A -> (B -> (D, E -> H), C -> (F, G)), linked level by level so arena
 * order equals breadth-first order
 */
export function createSampleTree(): SampleTree {
  const tree = new Tree(rawCodec);
  const A = tree.setRoot('A');
  const B = tree.link('B', A);
  const C = tree.link('C', A);
  const D = tree.link('D', B);
  const E = tree.link('E', B);
  const F = tree.link('F', C);
  const G = tree.link('G', C);
  const H = tree.link('H', E);

  return { tree, handles: { A, B, C, D, E, F, G, H } };
}

export function valuesOf<C extends NodeContent>(iterator: TreeIterator<C>): string[] {
  return Array.from(iterator, ([node]) => node.content.value);
}

export function handlesOf<C extends NodeContent>(iterator: TreeIterator<C>): Handle[] {
  return Array.from(iterator, ([, handle]) => handle);
}
