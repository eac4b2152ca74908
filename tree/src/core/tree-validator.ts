import { Color, type Comparator, type NodeHandle, type ValidationReport } from '../types/tree.js';
import type { NodeArena } from './node-arena.js';

interface KeyBounds<K> {
  lower: { key: K; handle: NodeHandle } | null;   // right-subtree keys are >= their ancestor
  upper: { key: K; handle: NodeHandle } | null;   // left-subtree keys are <= their ancestor
}

/**
 * Walks every node reachable from the root and checks the Red-Black properties:
 * - BST order: in-order keys never decrease. Insertion routes ties right, but a
 *   rotation can carry an equal key into its twin's left subtree
 * - Root is BLACK and has no parent
 * - No RED node has a RED child
 * - Same number of BLACK nodes on every root-to-leaf path
 * - Parent links mirror child links
 * - Every allocated node is reachable
 *
 * Time complexity: O(n)
 */
export function validateRedBlackTree<K>(arena: NodeArena<K>, compareFn: Comparator<K>): ValidationReport {
  const violations: string[] = [];
  const label = (handle: NodeHandle): string => `${String(arena.keyOf(handle))}#${handle}`;

  if (arena.root === null) {
    if (arena.size > 0) {
      violations.push(`${arena.size} allocated nodes are unreachable from an empty root`);
    }
    return { valid: violations.length === 0, violations, blackHeight: 0, height: 0, size: 0 };
  }

  const root = arena.get(arena.root);
  if (root.color !== Color.BLACK) {
    violations.push(`Root ${label(arena.root)} is RED`);
  }
  if (root.parent !== null) {
    violations.push(`Root ${label(arena.root)} has parent ${root.parent}`);
  }

  const leafBlackCounts = new Set<number>();
  let size = 0;
  let height = 0;

  // Iterative depth-first walk: [handle, blacks above it, depth, bounds]
  const stack: Array<[NodeHandle, number, number, KeyBounds<K>]> = [
    [arena.root, 0, 1, { lower: null, upper: null }]
  ];
  const seen = new Set<NodeHandle>();

  while (stack.length > 0) {
    const top = stack.pop();
    if (top === undefined) break;
    const [handle, blacksAbove, depth, bounds] = top;

    if (seen.has(handle)) {
      violations.push(`Node ${label(handle)} is reachable along more than one path`);
      continue;
    }
    seen.add(handle);
    size++;
    height = Math.max(height, depth);

    const node = arena.get(handle);
    const blacks = blacksAbove + (node.color === Color.BLACK ? 1 : 0);

    if (bounds.lower !== null && compareFn(node.key, bounds.lower.key) < 0) {
      violations.push(`Node ${label(handle)} is in the right subtree of ${label(bounds.lower.handle)} but smaller than it`);
    }
    if (bounds.upper !== null && compareFn(node.key, bounds.upper.key) > 0) {
      violations.push(`Node ${label(handle)} is in the left subtree of ${label(bounds.upper.handle)} but greater than it`);
    }

    for (const [child, side] of [[node.left, 'left'], [node.right, 'right']] as const) {
      if (child === null) {
        leafBlackCounts.add(blacks);
        continue;
      }
      const childNode = arena.get(child);
      if (childNode.parent !== handle) {
        violations.push(`Node ${label(child)} is the ${side} child of ${label(handle)} but points to parent ${String(childNode.parent)}`);
      }
      if (node.color === Color.RED && childNode.color === Color.RED) {
        violations.push(`RED node ${label(child)} has RED parent ${label(handle)}`);
      }
      const childBounds: KeyBounds<K> = side === 'left'
        ? { lower: bounds.lower, upper: { key: node.key, handle } }
        : { lower: { key: node.key, handle }, upper: bounds.upper };
      stack.push([child, blacks, depth + 1, childBounds]);
    }
  }

  let blackHeight = -1;
  if (leafBlackCounts.size === 1) {
    for (const count of leafBlackCounts) blackHeight = count;
  } else {
    violations.push(`Black heights differ across leaves: ${[...leafBlackCounts].sort((a, b) => a - b).join(', ')}`);
  }

  if (size !== arena.size) {
    violations.push(`${arena.size - size} allocated nodes are unreachable from the root`);
  }

  return { valid: violations.length === 0, violations, blackHeight, height, size };
}
