import type { ContentCodec, NodeContent } from '../content/NodeContent.js';
import {
  TreeIdAlreadyExistsError,
  TreeIdParseError,
  TreeNotFoundError,
  type ForestError,
} from '../errors/forest.js';
import { type ReadonlyTree, Tree, type TreeOptions } from '../tree/Tree.js';
import { createModuleLogger, type Logger } from '../utils/logger.js';
import type { TreeId, TreeIdCodec } from './TreeId.js';

export interface ForestOptions {
  /** Logger for forest operations (default: the `forest` module logger) */
  logger?: Logger;
  /** Options for trees created by the forest */
  tree?: TreeOptions;
}

interface ForestEntry<Id extends TreeId, C extends NodeContent> {
  id: Id;
  tree: Tree<C>;
}

/**
 * A named collection of independent trees.
 *
 * Ids arrive as raw text and are parsed by the forest's identifier codec;
 * trees are indexed by the parsed id's hash key. Every tree in a forest
 * shares the forest's content codec.
 */
export class Forest<Id extends TreeId, C extends NodeContent> {
  private readonly trees = new Map<string, ForestEntry<Id, C>>();
  private readonly logger: Logger;

  constructor(
    readonly idCodec: TreeIdCodec<Id>,
    readonly contentCodec: ContentCodec<C>,
    private readonly options: ForestOptions = {}
  ) {
    this.logger = options.logger ?? createModuleLogger('forest');
  }

  get size(): number {
    return this.trees.size;
  }

  /**
   * An empty tree using this forest's content codec, not yet registered
   */
  newTree(): Tree<C> {
    return new Tree(this.contentCodec, this.options.tree);
  }

  /**
   * Register a new empty tree under `idText`.
   *
   * @throws {TreeIdParseError} when the id codec rejects `idText`
   * @throws {TreeIdAlreadyExistsError} when the id is taken
   */
  create(idText: string): Tree<C> {
    const tree = this.newTree();
    this.register(idText, tree, 'create');
    return tree;
  }

  /**
   * Register a caller-built tree under `idText`.
   *
   * @throws {TreeIdParseError} when the id codec rejects `idText`
   * @throws {TreeIdAlreadyExistsError} when the id is taken
   */
  add(idText: string, tree: Tree<C>): void {
    this.register(idText, tree, 'add');
  }

  private register(idText: string, tree: Tree<C>, operation: string): void {
    const id = this.parseId(idText, operation);
    const key = id.hashKey();
    if (this.trees.has(key)) {
      throw this.rejected(new TreeIdAlreadyExistsError(id.id, operation));
    }

    this.trees.set(key, { id, tree });
    this.logger.debug({ treeId: id.id, nodes: tree.nodeCount }, 'Tree added');
  }

  /**
   * Take a tree out of the forest.
   *
   * @throws {TreeIdParseError} when the id codec rejects `idText`
   * @throws {TreeNotFoundError} when no tree has that id
   */
  remove(idText: string): Tree<C> {
    const entry = this.lookup(idText, 'remove');
    this.trees.delete(entry.id.hashKey());
    this.logger.debug({ treeId: entry.id.id }, 'Tree removed');
    return entry.tree;
  }

  /**
   * @throws {TreeIdParseError} when the id codec rejects `idText`
   * @throws {TreeNotFoundError} when no tree has that id
   */
  get(idText: string): ReadonlyTree<C> {
    return this.lookup(idText, 'get').tree;
  }

  /**
   * @throws {TreeIdParseError} when the id codec rejects `idText`
   * @throws {TreeNotFoundError} when no tree has that id
   */
  getMut(idText: string): Tree<C> {
    return this.lookup(idText, 'getMut').tree;
  }

  /**
   * @throws {TreeIdParseError} when the id codec rejects `idText`
   */
  has(idText: string): boolean {
    return this.trees.has(this.parseId(idText, 'has').hashKey());
  }

  /**
   * Every tree with its id. No particular order is promised.
   */
  *iterate(): Generator<readonly [id: Id, tree: ReadonlyTree<C>], void, undefined> {
    for (const { id, tree } of this.trees.values()) {
      yield [id, tree];
    }
  }

  [Symbol.iterator](): Generator<readonly [id: Id, tree: ReadonlyTree<C>], void, undefined> {
    return this.iterate();
  }

  private lookup(idText: string, operation: string): ForestEntry<Id, C> {
    const id = this.parseId(idText, operation);
    const entry = this.trees.get(id.hashKey());
    if (!entry) {
      throw this.rejected(new TreeNotFoundError(id.id, operation));
    }
    return entry;
  }

  private parseId(idText: string, operation: string): Id {
    try {
      return this.idCodec.parse(idText);
    } catch (error) {
      const parseError =
        error instanceof TreeIdParseError
          ? error
          : new TreeIdParseError(
              idText,
              error instanceof Error ? error.message : String(error),
              operation
            );
      throw this.rejected(parseError);
    }
  }

  private rejected<E extends ForestError>(error: E): E {
    this.logger.debug({ code: error.code, ...error.context }, error.message);
    return error;
  }
}
