export { RedBlackTree, type RedBlackTreeOptions } from './core/red-black-tree.js';
export { NodeArena, type ArenaNode } from './core/node-arena.js';
export { rotateLeft, rotateRight } from './core/rotations.js';
export { validateRedBlackTree } from './core/tree-validator.js';
export {
  Color,
  type Comparator,
  type NodeHandle,
  type RBNodeRef,
  type RebalanceStats,
  type TraversalEntry,
  type TraversalOrder,
  type ValidationReport
} from './types/tree.js';
export { naturalOrder, descending, decimalOrder, isDecimalKey, type NaturallyOrdered } from './utils/comparators.js';
export { describeNode, formatNode, formatTraversal, renderTree } from './utils/tree-printer.js';
export { TreeInvariantError } from './utils/errors.js';
