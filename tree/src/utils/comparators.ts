/**
 * Ready-made comparators for RedBlackTree
 */
import { BigNumber } from 'bignumber.js';
import type { Comparator } from '../types/tree.js';

export type NaturallyOrdered = number | string | bigint;

/**
 * Ascending order by the built-in `<` operator
 */
export function naturalOrder<K extends NaturallyOrdered>(a: K, b: K): number {
  if (a < b) return -1;
  if (b < a) return 1;
  return 0;
}

/**
 * Reverses a comparator, e.g. for trees iterated from highest to lowest key
 */
export function descending<K>(compareFn: Comparator<K>): Comparator<K> {
  return (a, b) => compareFn(b, a);
}

/**
 * Compares decimal strings by exact value, so "0.1" > "0.02" and "1e3" == "1000"
 * Avoids the rounding of parseFloat for long fractional parts
 */
export function decimalOrder(a: string, b: string): number {
  const numA = new BigNumber(a);
  const numB = new BigNumber(b);
  if (!numA.isFinite() || !numB.isFinite()) {
    throw new TypeError(`Cannot compare non-numeric keys "${a}" and "${b}"`);
  }
  return numA.comparedTo(numB);
}

/** True for strings decimalOrder can compare, e.g. "42", "-0.5" or "1e3" */
export function isDecimalKey(value: string): boolean {
  return new BigNumber(value).isFinite();
}
