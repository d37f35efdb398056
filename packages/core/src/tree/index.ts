export { Tree, type TreeOptions, type ReadonlyTree, type CompactionResult } from './Tree.js';
export { TreeNode, SEVERED, type Handle, type ReadonlyTreeNode } from './TreeNode.js';
