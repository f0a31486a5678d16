/**
 * Relational functions over slot vectors.
 *
 * Elements are compared with the traits of the left operand. `equals` and
 * `lessThan` do the work; the other four are derived from them.
 */

import type { SlotVector } from './slot-vector.ts';

/**
 * Same size and element-wise equal. A vector always equals itself,
 * whatever its contents.
 */
export function equals<T>(lhs: SlotVector<T>, rhs: SlotVector<T>): boolean {
  if (lhs === rhs) return true;
  if (lhs.size !== rhs.size) return false;
  const { equals: elementEquals } = lhs.config.traits;
  const left = lhs.cbegin();
  const right = rhs.cbegin();
  for (let i = 0; i < lhs.size; i++) {
    if (!elementEquals(left.peek(i), right.peek(i))) return false;
  }
  return true;
}

export function notEquals<T>(lhs: SlotVector<T>, rhs: SlotVector<T>): boolean {
  return !equals(lhs, rhs);
}

/**
 * Strict lexicographic order. A proper prefix orders first.
 */
export function lessThan<T>(lhs: SlotVector<T>, rhs: SlotVector<T>): boolean {
  const { compare } = lhs.config.traits;
  const left = lhs.cbegin();
  const right = rhs.cbegin();
  const shared = Math.min(lhs.size, rhs.size);
  for (let i = 0; i < shared; i++) {
    const order = compare(left.peek(i), right.peek(i));
    if (order < 0) return true;
    if (order > 0) return false;
  }
  return lhs.size < rhs.size;
}

export function lessOrEqual<T>(lhs: SlotVector<T>, rhs: SlotVector<T>): boolean {
  return !lessThan(rhs, lhs);
}

export function greaterThan<T>(lhs: SlotVector<T>, rhs: SlotVector<T>): boolean {
  return lessThan(rhs, lhs);
}

export function greaterOrEqual<T>(lhs: SlotVector<T>, rhs: SlotVector<T>): boolean {
  return lessOrEqual(rhs, lhs);
}
