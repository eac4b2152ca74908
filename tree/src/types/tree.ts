/**
 * Red-Black tree node colors
 * RED = 0: freshly inserted nodes, allowed anywhere except under another RED node
 * BLACK = 1: counted by the black-height invariant; absent children are always BLACK
 */
export enum Color {
  RED = 0,
  BLACK = 1
}

/**
 * Stable index of a node inside its tree's arena
 * Handles are issued in insertion order and never reused
 */
export type NodeHandle = number;

/**
 * Ordering function: returns <0 if a<b, 0 if a==b, >0 if a>b
 */
export type Comparator<K> = (a: K, b: K) => number;

export type TraversalOrder = 'pre' | 'in' | 'post' | 'reverse' | 'level';

export interface TraversalEntry<K> {
  key: K;
  color: Color;
}

/**
 * Read-only snapshot of a node, returned by search and the other query methods
 * Relations are handles; follow them with RedBlackTree.node()
 */
export interface RBNodeRef<K> {
  readonly handle: NodeHandle;
  readonly key: K;
  readonly color: Color;
  readonly parent: NodeHandle | null;
  readonly left: NodeHandle | null;
  readonly right: NodeHandle | null;
}

/**
 * Lifetime counters of the insertion fix-up
 */
export interface RebalanceStats {
  colorFlips: number;       // Case 1: parent and uncle both RED
  leftRotations: number;
  rightRotations: number;
}

export interface ValidationReport {
  valid: boolean;
  violations: string[];
  blackHeight: number;      // BLACK nodes per root-to-leaf path, root included; -1 when paths disagree
  height: number;           // nodes on the longest root-to-leaf path
  size: number;             // nodes reachable from the root
}
