import type { NodeContent } from '../content/NodeContent.js';
import { ChildNotFoundError } from '../errors/tree.js';

/**
 * Stable index of a node inside its tree's arena.
 */
export type Handle = number;

/**
 * Tombstone left in a parent's child slots after an unlink.
 */
export const SEVERED = -1;

/**
 * Read access to one arena slot. Trees, traversals and forests hand nodes out
 * through this view; structural changes go through the owning Tree.
 */
export interface ReadonlyTreeNode<C extends NodeContent> {
  readonly content: C;
  readonly level: number;
  readonly parent: Handle | null;
  readonly parentSlot: number | null;
  readonly isRoot: boolean;
  readonly children: readonly Handle[];
  readonly childCount: number;
  readonly slotCount: number;
  readonly childIndex: ReadonlyMap<string, Handle>;
  liveChildren(): Handle[];
  getChild(name: string): Handle | undefined;
}

/**
 * One arena slot: content, depth and local linkage by handle.
 *
 * A node knows nothing about other nodes beyond their handles; the owning
 * Tree keeps parent and child slots consistent. The mutators are meant for
 * the owning Tree only.
 */
export class TreeNode<C extends NodeContent> implements ReadonlyTreeNode<C> {
  private _content: C;
  private readonly _level: number;
  private readonly _parent: Handle | null;
  private readonly _parentSlot: number | null;
  private readonly _children: Handle[] = [];
  private readonly _childIndex = new Map<string, Handle>();
  private _childCount = 0;

  constructor(
    content: C,
    level: number,
    parent: Handle | null = null,
    parentSlot: number | null = null
  ) {
    this._content = content;
    this._level = level;
    this._parent = parent;
    this._parentSlot = parentSlot;
  }

  get content(): C {
    return this._content;
  }

  /** Depth from the root; the root is at level 1 */
  get level(): number {
    return this._level;
  }

  get parent(): Handle | null {
    return this._parent;
  }

  /** Position of this node inside its parent's child slots */
  get parentSlot(): number | null {
    return this._parentSlot;
  }

  get isRoot(): boolean {
    return this._parent === null;
  }

  /** Child slots in sibling order, severed slots included as SEVERED */
  get children(): readonly Handle[] {
    return this._children;
  }

  /** Number of live children */
  get childCount(): number {
    return this._childCount;
  }

  /** Number of child slots ever allocated, severed ones included */
  get slotCount(): number {
    return this._children.length;
  }

  get childIndex(): ReadonlyMap<string, Handle> {
    return this._childIndex;
  }

  liveChildren(): Handle[] {
    return this._children.filter((child) => child !== SEVERED);
  }

  /** @internal */
  setContent(content: C): void {
    this._content = content;
  }

  /** @internal */
  addChild(name: string, handle: Handle): void {
    this._children.push(handle);
    this._childIndex.set(name, handle);
    this._childCount++;
  }

  /**
   * Sever the child at `position`. The slot keeps its place as a tombstone so
   * the parentSlot of every other child stays valid.
   */
  removeChild(name: string, position: number): void {
    const handle = this._children[position];
    if (handle === undefined || handle === SEVERED) {
      return;
    }

    if (this._childIndex.get(name) === handle) {
      this._childIndex.delete(name);
    }
    this._children[position] = SEVERED;
    this._childCount--;
  }

  /**
   * Re-key a child under a new name.
   *
   * @throws {ChildNotFoundError} when no child is indexed under `oldName`
   */
  updateChild(oldName: string, newName: string): Handle {
    const handle = this._childIndex.get(oldName);
    if (handle === undefined) {
      throw new ChildNotFoundError(oldName, 'updateChild', 'no child with that name');
    }

    this._childIndex.delete(oldName);
    this._childIndex.set(newName, handle);
    return handle;
  }

  getChild(name: string): Handle | undefined {
    return this._childIndex.get(name);
  }
}
