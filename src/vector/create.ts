/**
 * Factory functions for slot vectors.
 *
 * `createVector` picks the construction path from its second argument, the
 * way overloaded constructors would:
 *
 * ```typescript
 * const numbers = { traits: numberTraits };
 *
 * createVector(numbers);              // []            capacity 0
 * createVector(numbers, 3);           // [0, 0, 0]     capacity 3
 * createVector(numbers, 3, 7);        // [7, 7, 7]     capacity 3
 * createVector(numbers, [1, 2, 3]);   // [1, 2, 3]     capacity 3
 * createVector(numbers, reserve(3));  // []            capacity 3
 * ```
 */

import type { VectorConfig } from '../types/config.ts';
import { CapacityHint } from './capacity-hint.ts';
import { SlotVector } from './slot-vector.ts';

export function createVector<T>(config: VectorConfig<T>): SlotVector<T>;
export function createVector<T>(config: VectorConfig<T>, size: number): SlotVector<T>;
export function createVector<T>(config: VectorConfig<T>, size: number, value: T): SlotVector<T>;
export function createVector<T>(config: VectorConfig<T>, values: readonly T[]): SlotVector<T>;
export function createVector<T>(config: VectorConfig<T>, hint: CapacityHint): SlotVector<T>;
export function createVector<T>(
  config: VectorConfig<T>,
  init?: number | readonly T[] | CapacityHint,
  ...fill: [] | [value: T]
): SlotVector<T> {
  if (init === undefined) {
    return new SlotVector(config);
  }
  if (init instanceof CapacityHint) {
    return SlotVector.withCapacity(config, init.getCapacityToReserve());
  }
  if (typeof init === 'number') {
    return fill.length === 1
      ? SlotVector.filled(config, init, fill[0])
      : SlotVector.ofSize(config, init);
  }
  return SlotVector.fromValues(config, init);
}

/**
 * Deep copy of `source`, sized to its elements.
 */
export function copyVector<T>(source: SlotVector<T>): SlotVector<T> {
  return SlotVector.copyOf(source);
}

/**
 * Move `source` into a new vector, leaving `source` empty.
 */
export function moveVector<T>(source: SlotVector<T>): SlotVector<T> {
  return SlotVector.moveFrom(source);
}
