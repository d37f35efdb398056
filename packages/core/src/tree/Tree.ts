import type { ContentCodec, NodeContent } from '../content/NodeContent.js';
import { DEFAULT_CONFIG } from '../constants/defaults.js';
import {
  ChildNotFoundError,
  ContentParseError,
  DuplicateChildError,
  ParentNotFoundError,
  RootAlreadyExistsError,
  type TreeError,
} from '../errors/tree.js';
import { TreeIterators } from '../traversal/TreeIterators.js';
import { createModuleLogger, type Logger } from '../utils/logger.js';
import { type Handle, type ReadonlyTreeNode, TreeNode } from './TreeNode.js';

const { ROOT_HANDLE, ROOT_LEVEL } = DEFAULT_CONFIG.TREE;

export interface TreeOptions {
  /** Logger for mutations and rejected operations (default: the `tree` module logger) */
  logger?: Logger;
}

/**
 * Read-only view of a tree, as handed out by Forest.get
 */
export interface ReadonlyTree<C extends NodeContent> {
  readonly codec: ContentCodec<C>;
  readonly nodeCount: number;
  readonly isEmpty: boolean;
  readonly root: ReadonlyTreeNode<C> | undefined;
  node(handle: Handle): ReadonlyTreeNode<C> | undefined;
  content(handle: Handle): C | undefined;
  isLinked(handle: Handle): boolean;
  findPath(start: Handle, path: readonly string[]): Handle | undefined;
  iterators(start?: Handle): TreeIterators<C>;
  render(start?: Handle): string;
  compact(): CompactionResult<C>;
}

export interface CompactionResult<C extends NodeContent> {
  tree: Tree<C>;
  /** Old handle -> new handle, for every node that survived */
  remap: Map<Handle, Handle>;
}

/**
 * Arena-backed n-ary tree.
 *
 * Nodes live in a single array and refer to each other by handle. The root is
 * always handle 0; every other node is created by `link` under an existing
 * node. Unlinking only severs the parent arc, so handles stay valid for the
 * lifetime of the tree and the arena never shrinks.
 */
export class Tree<C extends NodeContent> implements ReadonlyTree<C> {
  private readonly nodes: TreeNode<C>[] = [];
  private readonly logger: Logger;

  constructor(
    readonly codec: ContentCodec<C>,
    private readonly options: TreeOptions = {}
  ) {
    this.logger = options.logger ?? createModuleLogger('tree');
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  get isEmpty(): boolean {
    return this.nodes.length === 0;
  }

  get root(): ReadonlyTreeNode<C> | undefined {
    return this.nodes[ROOT_HANDLE];
  }

  /**
   * Create the root node.
   *
   * @returns the root handle, always 0
   * @throws {RootAlreadyExistsError} when the tree already has a root
   * @throws {ContentParseError} when the codec rejects `raw`
   */
  setRoot(raw: string): Handle {
    if (!this.isEmpty) {
      throw this.rejected(new RootAlreadyExistsError({ raw }));
    }

    const content = this.parseContent(raw, 'setRoot');
    this.nodes.push(new TreeNode(content, ROOT_LEVEL));

    this.logger.debug({ handle: ROOT_HANDLE, value: content.value }, 'Root created');
    return ROOT_HANDLE;
  }

  /**
   * Create a node and link it as the last child of `parent`.
   *
   * @returns the new node's handle
   * @throws {ParentNotFoundError} when `parent` is outside the arena
   * @throws {ContentParseError} when the codec rejects `raw`
   * @throws {DuplicateChildError} when `parent` already has a live child with the same value
   */
  link(raw: string, parent: Handle): Handle {
    const parentNode = this.nodes[parent];
    if (!parentNode) {
      throw this.rejected(new ParentNotFoundError(parent, { raw }));
    }

    const content = this.parseContent(raw, 'link');
    if (parentNode.getChild(content.value) !== undefined) {
      throw this.rejected(new DuplicateChildError(content.value, parent, 'link'));
    }

    const handle = this.adopt(content, parent);
    this.logger.debug({ handle, parent, value: content.value }, 'Node linked');
    return handle;
  }

  /**
   * Sever a node from its parent in O(1).
   *
   * The node and its descendants stay in the arena and keep their handles,
   * but no traversal started above them reaches them any more.
   *
   * @throws {ChildNotFoundError} when the handle is outside the arena, is the
   * root, or is already unlinked
   */
  unlink(handle: Handle): Handle {
    const node = this.nodes[handle];
    if (!node) {
      throw this.rejected(new ChildNotFoundError(handle, 'unlink', 'handle out of range'));
    }

    const parentNode = this.liveParent(handle);
    if (!parentNode || node.parentSlot === null) {
      const reason = node.isRoot ? 'the root has no parent' : 'node is already unlinked';
      throw this.rejected(new ChildNotFoundError(handle, 'unlink', reason));
    }

    parentNode.removeChild(node.content.value, node.parentSlot);
    this.logger.debug({ handle, parent: node.parent }, 'Node unlinked');
    return handle;
  }

  /**
   * Replace a node's content, keeping its position and level. The parent's
   * child index is re-keyed from the old value to the new one.
   *
   * @throws {ChildNotFoundError} when the handle is outside the arena or the
   * parent no longer indexes the node under its old value
   * @throws {ContentParseError} when the codec rejects `raw`
   * @throws {DuplicateChildError} when a live sibling already has the new value
   */
  updateContent(raw: string, handle: Handle): Handle {
    const node = this.nodes[handle];
    if (!node) {
      throw this.rejected(new ChildNotFoundError(handle, 'updateContent', 'handle out of range'));
    }

    const content = this.parseContent(raw, 'updateContent');
    const oldName = node.content.value;
    const parentNode = this.liveParent(handle);

    if (parentNode && node.parent !== null && content.value !== oldName) {
      if (parentNode.getChild(content.value) !== undefined) {
        throw this.rejected(new DuplicateChildError(content.value, node.parent, 'updateContent'));
      }
      if (parentNode.getChild(oldName) !== handle) {
        throw this.rejected(
          new ChildNotFoundError(oldName, 'updateContent', 'parent does not index this node')
        );
      }
      parentNode.updateChild(oldName, content.value);
    }

    node.setContent(content);
    this.logger.debug({ handle, from: oldName, to: content.value }, 'Node updated');
    return handle;
  }

  /**
   * Follow `path` from `start` one child name at a time.
   *
   * `path` does not include the start node's own name. Runs in O(path length).
   */
  findPath(start: Handle, path: readonly string[]): Handle | undefined {
    if (!this.nodes[start]) return undefined;

    let current = start;
    for (const name of path) {
      const next = this.nodes[current]?.getChild(name);
      if (next === undefined) return undefined;
      current = next;
    }
    return current;
  }

  node(handle: Handle): ReadonlyTreeNode<C> | undefined {
    return this.nodes[handle];
  }

  content(handle: Handle): C | undefined {
    return this.nodes[handle]?.content;
  }

  /**
   * Whether the node is reachable from the root through live links
   */
  isLinked(handle: Handle): boolean {
    let current = this.nodes[handle];
    let currentHandle = handle;

    while (current && !current.isRoot) {
      if (!this.liveParent(currentHandle) || current.parent === null) return false;
      currentHandle = current.parent;
      current = this.nodes[currentHandle];
    }
    return current !== undefined;
  }

  iterators(start?: Handle): TreeIterators<C> {
    return new TreeIterators(this, start);
  }

  /**
   * Indented outline of the live subtree under `start`, one serialized node
   * per line.
   */
  render(start: Handle = ROOT_HANDLE): string {
    const base = this.nodes[start]?.level ?? ROOT_LEVEL;
    const lines: string[] = [];

    for (const [node] of this.iterators(start).preDfs()) {
      lines.push(`${DEFAULT_CONFIG.RENDER.INDENT.repeat(node.level - base)}${node.content.serialize()}`);
    }
    return lines.join('\n');
  }

  /**
   * Rebuild the tree without its unlinked nodes.
   *
   * Runs in O(n) and never happens implicitly. Surviving nodes are renumbered
   * in breadth-first order; handles of this tree are not valid in the result.
   */
  compact(): CompactionResult<C> {
    const tree = new Tree(this.codec, this.options);
    const remap = new Map<Handle, Handle>();

    for (const [node, handle] of this.iterators().bfs()) {
      const parent = node.parent === null ? undefined : remap.get(node.parent);
      remap.set(handle, tree.adopt(node.content, parent));
    }

    this.logger.debug(
      { before: this.nodeCount, after: tree.nodeCount },
      'Tree compacted'
    );
    return { tree, remap };
  }

  /**
   * Append already parsed content to the arena, as the root when `parent` is
   * undefined.
   */
  private adopt(content: C, parent?: Handle): Handle {
    const handle = this.nodes.length;
    const parentNode = parent === undefined ? undefined : this.nodes[parent];

    if (parent === undefined || !parentNode) {
      this.nodes.push(new TreeNode(content, ROOT_LEVEL));
      return handle;
    }

    this.nodes.push(new TreeNode(content, parentNode.level + 1, parent, parentNode.slotCount));
    parentNode.addChild(content.value, handle);
    return handle;
  }

  /**
   * The parent of `handle`, if its child slot still holds `handle`
   */
  private liveParent(handle: Handle): TreeNode<C> | undefined {
    const node = this.nodes[handle];
    if (!node || node.parent === null || node.parentSlot === null) return undefined;

    const parentNode = this.nodes[node.parent];
    return parentNode?.children[node.parentSlot] === handle ? parentNode : undefined;
  }

  private parseContent(raw: string, operation: string): C {
    try {
      return this.codec.parse(raw);
    } catch (error) {
      const parseError =
        error instanceof ContentParseError
          ? error
          : new ContentParseError(
              raw,
              this.codec.name,
              error instanceof Error ? error.message : String(error),
              operation
            );
      throw this.rejected(parseError);
    }
  }

  private rejected<E extends TreeError>(error: E): E {
    this.logger.debug({ code: error.code, ...error.context }, error.message);
    return error;
  }
}
