import { describe, it, expect, beforeEach } from 'vitest';
import { NodeArena } from '../node-arena.js';
import { validateRedBlackTree } from '../tree-validator.js';
import { Color, type NodeHandle } from '../../types/tree.js';
import { naturalOrder } from '../../utils/comparators.js';

describe('validateRedBlackTree', () => {
  let arena: NodeArena<number>;

  const add = (key: number, color: Color, parent: NodeHandle | null = null, side: 'left' | 'right' = 'left') => {
    const handle = arena.allocate(key);
    arena.setColor(handle, color);
    if (parent === null) {
      arena.root = handle;
    } else {
      arena.get(parent)[side] = handle;
      arena.get(handle).parent = parent;
    }
    return handle;
  };

  const validate = () => validateRedBlackTree(arena, naturalOrder<number>);

  beforeEach(() => {
    arena = new NodeArena<number>();
  });

  it('should accept an empty arena', () => {
    expect(validate()).toEqual({ valid: true, violations: [], blackHeight: 0, height: 0, size: 0 });
  });

  it('should accept a balanced tree', () => {
    const root = add(10, Color.BLACK);
    add(5, Color.RED, root, 'left');
    add(15, Color.RED, root, 'right');

    expect(validate()).toEqual({ valid: true, violations: [], blackHeight: 1, height: 2, size: 3 });
  });

  it('should reject a RED root', () => {
    add(10, Color.RED);

    expect(validate().violations).toEqual(['Root 10#0 is RED']);
  });

  it('should reject a RED node under a RED parent', () => {
    const root = add(10, Color.BLACK);
    const left = add(5, Color.RED, root, 'left');
    add(3, Color.RED, left, 'left');

    const report = validate();
    expect(report.valid).toBe(false);
    expect(report.violations).toEqual(['RED node 3#2 has RED parent 5#1']);
  });

  it('should reject uneven black heights', () => {
    const root = add(10, Color.BLACK);
    add(5, Color.BLACK, root, 'left');

    const report = validate();
    expect(report.violations).toEqual(['Black heights differ across leaves: 1, 2']);
    expect(report.blackHeight).toBe(-1);
  });

  it('should reject a larger key in a left subtree', () => {
    const root = add(10, Color.BLACK);
    add(12, Color.RED, root, 'left');

    expect(validate().violations).toEqual(['Node 12#1 is in the left subtree of 10#0 but greater than it']);
  });

  it('should reject a smaller key in a right subtree', () => {
    const root = add(10, Color.BLACK);
    add(8, Color.RED, root, 'right');

    expect(validate().violations).toEqual(['Node 8#1 is in the right subtree of 10#0 but smaller than it']);
  });

  it('should accept equal keys on either side', () => {
    const root = add(10, Color.BLACK);
    add(10, Color.RED, root, 'left');
    add(10, Color.RED, root, 'right');

    expect(validate().valid).toBe(true);
  });

  it('should reject a child whose parent link points elsewhere', () => {
    const root = add(10, Color.BLACK);
    const left = add(5, Color.RED, root, 'left');
    arena.get(left).parent = null;

    expect(validate().violations).toEqual(['Node 5#1 is the left child of 10#0 but points to parent null']);
  });

  it('should reject nodes that are not reachable from the root', () => {
    add(10, Color.BLACK);
    arena.allocate(99);

    expect(validate().violations).toEqual(['1 allocated nodes are unreachable from the root']);
  });
});
