import type { NodeHandle } from '../types/tree.js';
import { TreeInvariantError } from '../utils/errors.js';
import type { NodeArena } from './node-arena.js';

/**
 * Rotation primitives shared by the insertion fix-up and its tests
 *
 *         XP                      XP
 *         |      rotateLeft       |
 *         X      -------->        Y
 *        / \     <--------       / \
 *      XL   Y    rotateRight    X   YR
 *          / \                 / \
 *        YL   YR             XL   YL
 *
 * Both run in O(1), allocate nothing and keep the in-order key sequence.
 * Colors are left untouched; the caller recolors.
 */

/**
 * Rotates left around x: x's right child takes x's place, x becomes its left child
 * @returns The pivot (old right child), now in x's former position
 */
export function rotateLeft<K>(arena: NodeArena<K>, x: NodeHandle): NodeHandle {
  const node = arena.get(x);
  const y = node.right;
  if (y === null) {
    throw new TreeInvariantError(`rotateLeft(${String(node.key)}) requires a right child`);
  }
  const pivot = arena.get(y);

  // Move pivot's left subtree under x
  node.right = pivot.left;
  if (pivot.left !== null) {
    arena.get(pivot.left).parent = x;
  }

  // Connect pivot to x's parent
  pivot.parent = node.parent;
  if (node.parent === null) {
    arena.root = y;
  } else {
    const parent = arena.get(node.parent);
    if (parent.left === x) {
      parent.left = y;
    } else {
      parent.right = y;
    }
  }

  pivot.left = x;
  node.parent = y;
  return y;
}

/**
 * Rotates right around x: x's left child takes x's place, x becomes its right child
 * @returns The pivot (old left child), now in x's former position
 */
export function rotateRight<K>(arena: NodeArena<K>, x: NodeHandle): NodeHandle {
  const node = arena.get(x);
  const y = node.left;
  if (y === null) {
    throw new TreeInvariantError(`rotateRight(${String(node.key)}) requires a left child`);
  }
  const pivot = arena.get(y);

  // Move pivot's right subtree under x
  node.left = pivot.right;
  if (pivot.right !== null) {
    arena.get(pivot.right).parent = x;
  }

  // Connect pivot to x's parent
  pivot.parent = node.parent;
  if (node.parent === null) {
    arena.root = y;
  } else {
    const parent = arena.get(node.parent);
    if (parent.right === x) {
      parent.right = y;
    } else {
      parent.left = y;
    }
  }

  pivot.right = x;
  node.parent = y;
  return y;
}
