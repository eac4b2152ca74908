import type { RedBlackTree } from '../core/red-black-tree.js';
import { Color, type NodeHandle, type RBNodeRef, type TraversalEntry, type TraversalOrder } from '../types/tree.js';

/**
 * Key and color of a node, e.g. "20(BLACK)"; an absent node prints as "NULL(BLACK)"
 */
export function formatNode<K>(node: RBNodeRef<K> | TraversalEntry<K> | null): string {
  if (node === null) return 'NULL(BLACK)';
  return `${String(node.key)}(${node.color === Color.RED ? 'RED' : 'BLACK'})`;
}

/**
 * One-line view of a node and its relations:
 * "[ 20(BLACK)  P:40(BLACK)  L:10(BLACK)  R:30(RED) ]"
 */
export function describeNode<K>(tree: RedBlackTree<K>, node: RBNodeRef<K>): string {
  const related = (handle: NodeHandle | null) => formatNode(handle === null ? null : tree.node(handle));
  return `[ ${formatNode(node)}  P:${related(node.parent)}  L:${related(node.left)}  R:${related(node.right)} ]`;
}

/**
 * All nodes in the given order separated by single spaces (pre-order by default)
 */
export function formatTraversal<K>(tree: RedBlackTree<K>, order: TraversalOrder = 'pre'): string {
  return Array.from(tree.traverse(order), (entry) => formatNode(entry)).join(' ');
}

/**
 * Multi-line diagram of the tree, left child listed first
 *
 * 40(BLACK)
 * ├── 20(BLACK)
 * └── 60(BLACK)
 *     ├── NULL(BLACK)
 *     └── 70(RED)
 */
export function renderTree<K>(tree: RedBlackTree<K>): string {
  const root = tree.getRoot();
  if (root === null) return '(empty)';

  const lines: string[] = [formatNode(root)];
  const renderChildren = (node: RBNodeRef<K>, prefix: string): void => {
    if (node.left === null && node.right === null) return;
    const children = [node.left, node.right];
    children.forEach((handle, index) => {
      const last = index === children.length - 1;
      const child = handle === null ? null : tree.node(handle);
      lines.push(`${prefix}${last ? '└── ' : '├── '}${formatNode(child)}`);
      if (child !== null) {
        renderChildren(child, prefix + (last ? '    ' : '│   '));
      }
    });
  };
  renderChildren(root, '');

  return lines.join('\n');
}
