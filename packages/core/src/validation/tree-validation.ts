import type { NodeContent } from '../content/NodeContent.js';
import { DEFAULT_CONFIG } from '../constants/defaults.js';
import { type ArenaView, bfs, sequential } from '../traversal/strategies.js';
import { type Handle, type ReadonlyTreeNode, SEVERED } from '../tree/TreeNode.js';
import { cfg } from '../utils/config.js';

/**
 * Tree validation - checks the arena invariants that every mutation is
 * expected to preserve:
 * - the root sits at handle 0, level 1, without a parent
 * - a linked child is one level below its parent, in the slot it records
 * - the child-name index only points at live children under their current value
 */

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  type:
    | 'root_level'
    | 'invalid_parent'
    | 'level_mismatch'
    | 'slot_mismatch'
    | 'dangling_child'
    | 'index_mismatch';
  handle: Handle;
  message: string;
  details?: Record<string, unknown>;
}

export interface ValidationWarning {
  type: 'deep_nesting' | 'unlinked_nodes';
  handle: Handle;
  message: string;
  details?: Record<string, unknown>;
}

export interface ValidationOptions {
  /** Level past which a linked node is reported as deeply nested */
  maxDepth?: number;
}

const { ROOT_HANDLE, ROOT_LEVEL } = DEFAULT_CONFIG.TREE;

/**
 * Validate the structure of a tree, or of any arena exposing the same view
 */
export function validateTree<C extends NodeContent>(
  tree: ArenaView<C>,
  options: ValidationOptions = {}
): ValidationResult {
  const maxDepth = options.maxDepth ?? cfg.TREE_MAX_DEPTH_WARNING;
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  for (const [node, handle] of sequential(tree)) {
    errors.push(...validateLinkage(tree, node, handle));
    errors.push(...validateChildIndex(tree, node, handle));
  }

  let reachable = 0;
  for (const [node, handle] of bfs(tree, ROOT_HANDLE)) {
    reachable++;
    if (node.level > maxDepth) {
      warnings.push({
        type: 'deep_nesting',
        handle,
        message: `Node exceeds maximum depth of ${maxDepth} (current: ${node.level})`,
        details: { maxDepth, level: node.level },
      });
    }
  }

  const unlinked = tree.nodeCount - reachable;
  if (unlinked > 0) {
    warnings.push({
      type: 'unlinked_nodes',
      handle: ROOT_HANDLE,
      message: `${unlinked} node(s) are unreachable from the root`,
      details: { unlinked, total: tree.nodeCount },
    });
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateLinkage<C extends NodeContent>(
  tree: ArenaView<C>,
  node: ReadonlyTreeNode<C>,
  handle: Handle
): ValidationError[] {
  const errors: ValidationError[] = [];

  if (node.parent === null) {
    if (handle !== ROOT_HANDLE || node.level !== ROOT_LEVEL) {
      errors.push({
        type: 'root_level',
        handle,
        message: `Parentless node must be handle ${ROOT_HANDLE} at level ${ROOT_LEVEL}`,
        details: { level: node.level },
      });
    }
  } else {
    const parent = tree.node(node.parent);
    if (!parent) {
      errors.push({
        type: 'invalid_parent',
        handle,
        message: `Parent ${node.parent} is outside the arena`,
        details: { parent: node.parent },
      });
    } else {
      if (node.level !== parent.level + 1) {
        errors.push({
          type: 'level_mismatch',
          handle,
          message: `Node level ${node.level} does not follow parent level ${parent.level}`,
          details: { level: node.level, parentLevel: parent.level },
        });
      }

      const slotValue = node.parentSlot === null ? undefined : parent.children[node.parentSlot];
      if (slotValue !== handle && slotValue !== SEVERED) {
        errors.push({
          type: 'slot_mismatch',
          handle,
          message: `Parent slot ${node.parentSlot} holds ${slotValue} instead of ${handle}`,
          details: { parent: node.parent, slot: node.parentSlot, found: slotValue },
        });
      }
    }
  }

  for (const child of node.liveChildren()) {
    if (!tree.node(child)) {
      errors.push({
        type: 'dangling_child',
        handle,
        message: `Child ${child} is outside the arena`,
        details: { child },
      });
    }
  }

  return errors;
}

function validateChildIndex<C extends NodeContent>(
  tree: ArenaView<C>,
  node: ReadonlyTreeNode<C>,
  handle: Handle
): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const [name, child] of node.childIndex) {
    const childNode = tree.node(child);
    const isLive =
      childNode !== undefined &&
      childNode.parent === handle &&
      childNode.parentSlot !== null &&
      node.children[childNode.parentSlot] === child;

    if (!isLive || childNode?.content.value !== name) {
      errors.push({
        type: 'index_mismatch',
        handle,
        message: `Index entry "${name}" does not match live child ${child}`,
        details: { name, child, value: childNode?.content.value },
      });
    }
  }

  return errors;
}
