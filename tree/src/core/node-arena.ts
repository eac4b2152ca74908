import { Color, type NodeHandle } from '../types/tree.js';
import { TreeInvariantError } from '../utils/errors.js';

/**
 * Arena slot for one tree node
 * Relations are handles into the same arena, used only for navigation:
 * the arena alone owns the nodes
 */
export interface ArenaNode<K> {
  readonly key: K;                  // Immutable once inserted
  color: Color;                     // RED or BLACK for balancing
  parent: NodeHandle | null;        // Back-reference, null for the root
  left: NodeHandle | null;          // Keys strictly smaller
  right: NodeHandle | null;         // Keys greater or equal (ties go right)
}

/**
 * Array-backed node storage for a single Red-Black tree
 *
 * Nodes are appended and never released, so a handle stays valid for the
 * lifetime of the arena. Dropping the arena releases every node at once.
 */
export class NodeArena<K> {
  private readonly nodes: ArenaNode<K>[] = [];
  root: NodeHandle | null = null;

  /**
   * Creates a detached RED node and returns its handle
   */
  allocate(key: K): NodeHandle {
    const handle = this.nodes.length;
    this.nodes.push({
      key,
      color: Color.RED,
      parent: null,
      left: null,
      right: null
    });
    return handle;
  }

  get(handle: NodeHandle): ArenaNode<K> {
    const node = this.nodes[handle];
    if (node === undefined) {
      throw new TreeInvariantError(`Unknown node handle ${handle}`);
    }
    return node;
  }

  /** Total number of allocated nodes */
  get size(): number {
    return this.nodes.length;
  }

  /**
   * Color of a node, treating an absent child as BLACK
   * Every color test of the balancing code goes through here
   */
  colorOf(handle: NodeHandle | null): Color {
    return handle === null ? Color.BLACK : this.get(handle).color;
  }

  isRed(handle: NodeHandle | null): boolean {
    return this.colorOf(handle) === Color.RED;
  }

  isBlack(handle: NodeHandle | null): boolean {
    return this.colorOf(handle) === Color.BLACK;
  }

  setColor(handle: NodeHandle, color: Color): void {
    this.get(handle).color = color;
  }

  parentOf(handle: NodeHandle): NodeHandle | null {
    return this.get(handle).parent;
  }

  leftOf(handle: NodeHandle): NodeHandle | null {
    return this.get(handle).left;
  }

  rightOf(handle: NodeHandle): NodeHandle | null {
    return this.get(handle).right;
  }

  keyOf(handle: NodeHandle): K {
    return this.get(handle).key;
  }

  handles(): IterableIterator<NodeHandle> {
    return this.nodes.keys();
  }
}
