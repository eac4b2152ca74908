import type { Logger } from 'pino';
import {
  Color,
  type Comparator,
  type NodeHandle,
  type RBNodeRef,
  type RebalanceStats,
  type TraversalEntry,
  type TraversalOrder,
  type ValidationReport
} from '../types/tree.js';
import { TreeInvariantError } from '../utils/errors.js';
import { NodeArena } from './node-arena.js';
import { rotateLeft, rotateRight } from './rotations.js';
import { validateRedBlackTree } from './tree-validator.js';

export interface RedBlackTreeOptions {
  /** Receives a debug line for every insertion and fix-up case */
  logger?: Logger;
}

/**
 * Self-balancing binary search tree with insertion and search
 * Guarantees O(log n) height by restoring the Red-Black properties after every insert
 *
 * Key properties:
 * - Root is always BLACK
 * - No RED node has a RED parent
 * - Every path from a node to an absent child has the same number of BLACK nodes
 * - Equal keys are routed right, so the tree behaves as an ordered multiset
 *
 * Nodes live in a NodeArena and refer to each other by handle. There is no removal:
 * a node lives as long as its tree.
 */
export class RedBlackTree<K> {
  private readonly arena = new NodeArena<K>();
  private readonly compareFn: Comparator<K>;
  private readonly logger: Logger | undefined;
  private readonly stats: RebalanceStats = { colorFlips: 0, leftRotations: 0, rightRotations: 0 };

  /**
   * @param compareFn - Returns <0 if a<b, 0 if a==b, >0 if a>b
   *                   naturalOrder for numbers and strings, descending(...) to reverse
   */
  constructor(compareFn: Comparator<K>, options: RedBlackTreeOptions = {}) {
    this.compareFn = compareFn;
    this.logger = options.logger;
  }

  /**
   * Builds a tree by inserting the keys in iteration order
   */
  static from<K>(keys: Iterable<K>, compareFn: Comparator<K>, options: RedBlackTreeOptions = {}): RedBlackTree<K> {
    const tree = new RedBlackTree<K>(compareFn, options);
    for (const key of keys) {
      tree.insert(key);
    }
    return tree;
  }

  /**
   * Inserts a key; duplicates are kept and placed in the right subtree
   * Time complexity: O(log n)
   */
  insert(key: K): void {
    const root = this.arena.root;

    // Empty tree: the new node becomes a BLACK root, nothing to fix
    if (root === null) {
      // Comparing the key with itself rejects keys the comparator cannot order
      this.compareFn(key, key);
      const handle = this.arena.allocate(key);
      this.arena.root = handle;
      this.arena.setColor(handle, Color.BLACK);
      this.logger?.debug(`Inserted ${this.describe(handle)} as root`);
      return;
    }

    // Walk down to an absent child slot
    let current: NodeHandle | null = root;
    let parent: NodeHandle = root;
    let goLeft = false;
    while (current !== null) {
      parent = current;
      goLeft = this.compareFn(key, this.arena.keyOf(current)) < 0;
      current = goLeft ? this.arena.leftOf(current) : this.arena.rightOf(current);
    }

    // Allocate only once the comparator has accepted the key
    const handle = this.arena.allocate(key);
    const node = this.arena.get(handle);
    node.parent = parent;
    if (goLeft) {
      this.arena.get(parent).left = handle;
    } else {
      this.arena.get(parent).right = handle;
    }

    this.fixAfterInsertion(handle);
    this.logger?.debug(`Inserted ${this.describe(handle)} (fixed), parent ${this.describe(node.parent)}`);
  }

  /**
   * Finds the node for a key along the unique search path
   * With duplicates this is the first match on that path, not necessarily the first inserted
   * Time complexity: O(log n)
   * @returns Snapshot of the matching node, or null if the key is absent
   */
  search(key: K): RBNodeRef<K> | null {
    const handle = this.findHandle(key);
    return handle === null ? null : this.toRef(handle);
  }

  has(key: K): boolean {
    return this.findHandle(key) !== null;
  }

  /**
   * Returns the snapshot of a node this tree issued
   * Used to follow the parent/left/right handles of a search result
   */
  node(handle: NodeHandle): RBNodeRef<K> {
    return this.toRef(handle);
  }

  getRoot(): RBNodeRef<K> | null {
    return this.arena.root === null ? null : this.toRef(this.arena.root);
  }

  findMin(): RBNodeRef<K> | null {
    let current = this.arena.root;
    if (current === null) return null;
    // Keep going left until there is no smaller key
    let left = this.arena.leftOf(current);
    while (left !== null) {
      current = left;
      left = this.arena.leftOf(current);
    }
    return this.toRef(current);
  }

  findMax(): RBNodeRef<K> | null {
    let current = this.arena.root;
    if (current === null) return null;
    let right = this.arena.rightOf(current);
    while (right !== null) {
      current = right;
      right = this.arena.rightOf(current);
    }
    return this.toRef(current);
  }

  getSize(): number {
    return this.arena.size;
  }

  isEmpty(): boolean {
    return this.arena.size === 0;
  }

  /**
   * Number of nodes on the longest root-to-leaf path, 0 for an empty tree
   */
  height(): number {
    return this.subtreeHeight(this.arena.root);
  }

  getStats(): RebalanceStats {
    return { ...this.stats };
  }

  /**
   * Checks every Red-Black property over the whole tree
   * Time complexity: O(n)
   */
  validate(): ValidationReport {
    return validateRedBlackTree(this.arena, this.compareFn);
  }

  /**
   * Lazy traversal yielding keys with their colors
   * Each call starts a fresh walk
   */
  *traverse(order: TraversalOrder = 'in'): IterableIterator<TraversalEntry<K>> {
    switch (order) {
      case 'pre':
        yield* this.preOrderNode(this.arena.root);
        break;
      case 'in':
        yield* this.inOrderNode(this.arena.root);
        break;
      case 'post':
        yield* this.postOrderNode(this.arena.root);
        break;
      case 'reverse':
        yield* this.reverseOrderNode(this.arena.root);
        break;
      case 'level':
        yield* this.levelOrder();
        break;
    }
  }

  *inOrderTraversal(): IterableIterator<TraversalEntry<K>> {
    yield* this.inOrderNode(this.arena.root);
  }

  *reverseOrderTraversal(): IterableIterator<TraversalEntry<K>> {
    yield* this.reverseOrderNode(this.arena.root);
  }

  *preOrderTraversal(): IterableIterator<TraversalEntry<K>> {
    yield* this.preOrderNode(this.arena.root);
  }

  /** Keys in ascending order */
  *[Symbol.iterator](): IterableIterator<K> {
    for (const entry of this.inOrderNode(this.arena.root)) {
      yield entry.key;
    }
  }

  private entry(handle: NodeHandle): TraversalEntry<K> {
    const node = this.arena.get(handle);
    return { key: node.key, color: node.color };
  }

  /** Root → left → right */
  private *preOrderNode(handle: NodeHandle | null): IterableIterator<TraversalEntry<K>> {
    if (handle === null) return;
    yield this.entry(handle);
    yield* this.preOrderNode(this.arena.leftOf(handle));
    yield* this.preOrderNode(this.arena.rightOf(handle));
  }

  /** Left → root → right */
  private *inOrderNode(handle: NodeHandle | null): IterableIterator<TraversalEntry<K>> {
    if (handle === null) return;
    yield* this.inOrderNode(this.arena.leftOf(handle));
    yield this.entry(handle);
    yield* this.inOrderNode(this.arena.rightOf(handle));
  }

  /** Left → right → root */
  private *postOrderNode(handle: NodeHandle | null): IterableIterator<TraversalEntry<K>> {
    if (handle === null) return;
    yield* this.postOrderNode(this.arena.leftOf(handle));
    yield* this.postOrderNode(this.arena.rightOf(handle));
    yield this.entry(handle);
  }

  /** Right → root → left */
  private *reverseOrderNode(handle: NodeHandle | null): IterableIterator<TraversalEntry<K>> {
    if (handle === null) return;
    yield* this.reverseOrderNode(this.arena.rightOf(handle));
    yield this.entry(handle);
    yield* this.reverseOrderNode(this.arena.leftOf(handle));
  }

  private *levelOrder(): IterableIterator<TraversalEntry<K>> {
    if (this.arena.root === null) return;
    const queue: NodeHandle[] = [this.arena.root];
    for (let i = 0; i < queue.length; i++) {
      const handle = queue[i];
      if (handle === undefined) break;
      yield this.entry(handle);
      const left = this.arena.leftOf(handle);
      const right = this.arena.rightOf(handle);
      if (left !== null) queue.push(left);
      if (right !== null) queue.push(right);
    }
  }

  private subtreeHeight(handle: NodeHandle | null): number {
    if (handle === null) return 0;
    return 1 + Math.max(
      this.subtreeHeight(this.arena.leftOf(handle)),
      this.subtreeHeight(this.arena.rightOf(handle))
    );
  }

  private findHandle(key: K): NodeHandle | null {
    let current = this.arena.root;
    while (current !== null) {
      const cmp = this.compareFn(key, this.arena.keyOf(current));
      if (cmp === 0) {
        return current;
      }
      current = cmp < 0 ? this.arena.leftOf(current) : this.arena.rightOf(current);
    }
    return null;
  }

  private toRef(handle: NodeHandle): RBNodeRef<K> {
    const node = this.arena.get(handle);
    return {
      handle,
      key: node.key,
      color: node.color,
      parent: node.parent,
      left: node.left,
      right: node.right
    };
  }

  private describe(handle: NodeHandle | null): string {
    if (handle === null) return 'NULL(BLACK)';
    const node = this.arena.get(handle);
    return `${String(node.key)}(${node.color === Color.RED ? 'RED' : 'BLACK'})`;
  }

  /** A RED node always has a parent: the root is BLACK */
  private parentOfRed(handle: NodeHandle): NodeHandle {
    const parent = this.arena.parentOf(handle);
    if (parent === null) {
      throw new TreeInvariantError(`RED node ${this.describe(handle)} has no parent`);
    }
    return parent;
  }

  private rotateLeft(handle: NodeHandle): void {
    rotateLeft(this.arena, handle);
    this.stats.leftRotations++;
  }

  private rotateRight(handle: NodeHandle): void {
    rotateRight(this.arena, handle);
    this.stats.rightRotations++;
  }

  /**
   * Restores the Red-Black properties after inserting a RED node
   * The only possible violation is a RED node under a RED parent; it is either
   * pushed up by recoloring (Case 1) or removed by one or two rotations (Cases 2 and 3)
   * @param inserted - The newly attached RED leaf
   */
  private fixAfterInsertion(inserted: NodeHandle): void {
    let x = inserted;

    while (x !== this.arena.root && this.arena.isRed(this.arena.parentOf(x))) {
      const parent = this.parentOfRed(x);
      const grandparent = this.parentOfRed(parent);

      if (parent === this.arena.leftOf(grandparent)) {
        // Parent is left child of grandparent
        const uncle = this.arena.rightOf(grandparent);
        if (uncle !== null && this.arena.isRed(uncle)) {
          // Case 1: parent and uncle are both RED - recolor and move up
          this.logger?.debug(`Case 1: parent ${this.describe(parent)} and uncle ${this.describe(uncle)} are RED, recoloring`);
          this.arena.setColor(parent, Color.BLACK);
          this.arena.setColor(uncle, Color.BLACK);
          this.arena.setColor(grandparent, Color.RED);
          this.stats.colorFlips++;
          x = grandparent;
        } else {
          if (x === this.arena.rightOf(parent)) {
            // Case 2: x is an inner (right) grandchild - rotate it to the outside
            this.logger?.debug(`Case 2: ${this.describe(x)} is the right child of left child ${this.describe(parent)}, rotating left`);
            x = parent;
            this.rotateLeft(x);
          }
          // Case 3: x is an outer (left) grandchild - recolor and rotate the grandparent
          const outerParent = this.parentOfRed(x);
          const outerGrandparent = this.parentOfRed(outerParent);
          this.logger?.debug(`Case 3: ${this.describe(x)} is the left child of ${this.describe(outerParent)}, rotating ${this.describe(outerGrandparent)} right`);
          this.arena.setColor(outerParent, Color.BLACK);
          this.arena.setColor(outerGrandparent, Color.RED);
          this.rotateRight(outerGrandparent);
        }
      } else {
        // Parent is right child of grandparent (mirror cases)
        const uncle = this.arena.leftOf(grandparent);
        if (uncle !== null && this.arena.isRed(uncle)) {
          // Case 1: parent and uncle are both RED - recolor and move up
          this.logger?.debug(`Case 1: parent ${this.describe(parent)} and uncle ${this.describe(uncle)} are RED, recoloring`);
          this.arena.setColor(parent, Color.BLACK);
          this.arena.setColor(uncle, Color.BLACK);
          this.arena.setColor(grandparent, Color.RED);
          this.stats.colorFlips++;
          x = grandparent;
        } else {
          if (x === this.arena.leftOf(parent)) {
            // Case 2: x is an inner (left) grandchild - rotate it to the outside
            this.logger?.debug(`Case 2: ${this.describe(x)} is the left child of right child ${this.describe(parent)}, rotating right`);
            x = parent;
            this.rotateRight(x);
          }
          // Case 3: x is an outer (right) grandchild - recolor and rotate the grandparent
          const outerParent = this.parentOfRed(x);
          const outerGrandparent = this.parentOfRed(outerParent);
          this.logger?.debug(`Case 3: ${this.describe(x)} is the right child of ${this.describe(outerParent)}, rotating ${this.describe(outerGrandparent)} left`);
          this.arena.setColor(outerParent, Color.BLACK);
          this.arena.setColor(outerGrandparent, Color.RED);
          this.rotateLeft(outerGrandparent);
        }
      }
    }

    // Case 1 can leave a RED root behind
    if (this.arena.root !== null) {
      this.arena.setColor(this.arena.root, Color.BLACK);
    }
  }
}
