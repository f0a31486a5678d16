/**
 * Random-access positions into a vector's slot array.
 *
 * An iterator is an immutable (slot array, index) pair, the equivalent of a
 * raw element pointer: dereferencing is unchecked, and arithmetic produces
 * new iterators. Two iterators address the same buffer only when they hold
 * the same slot array, which is how a vector tells its own positions from
 * stale or foreign ones.
 */

/**
 * Read-only position.
 */
export interface ConstSlotIterator<T> {
  /** Slot array this position points into */
  readonly slots: readonly T[];
  /** Slot index */
  readonly index: number;

  /** Read the addressed slot */
  get(): T;
  /** Read the slot `offset` positions away */
  peek(offset: number): T;
  /** Position `n` slots away (negative moves backwards) */
  advance(n?: number): ConstSlotIterator<T>;
  /** Signed distance `this - other` */
  offsetFrom(other: ConstSlotIterator<T>): number;
  /** Same buffer and same index */
  equals(other: ConstSlotIterator<T>): boolean;
}

/**
 * Mutable position.
 */
export class SlotIterator<T> implements ConstSlotIterator<T> {
  readonly slots: T[];
  readonly index: number;

  constructor(slots: T[], index: number) {
    this.slots = slots;
    this.index = index;
  }

  get(): T {
    return this.slots[this.index];
  }

  /**
   * Overwrite the addressed slot.
   */
  set(value: T): void {
    this.slots[this.index] = value;
  }

  peek(offset: number): T {
    return this.slots[this.index + offset];
  }

  advance(n: number = 1): SlotIterator<T> {
    return new SlotIterator(this.slots, this.index + n);
  }

  offsetFrom(other: ConstSlotIterator<T>): number {
    return this.index - other.index;
  }

  equals(other: ConstSlotIterator<T>): boolean {
    return this.slots === other.slots && this.index === other.index;
  }
}
