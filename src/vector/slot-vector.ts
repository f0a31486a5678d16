/**
 * Contiguous, resizable sequence container.
 *
 * A SlotVector owns one SlotBuffer and tracks its logical `size`; the
 * capacity is the length of the buffer's storage. Slots in [0, size) hold
 * valid elements; slots in [size, capacity) are never read. Appends double
 * the capacity when the buffer is full, so a run of n pushes costs O(n)
 * amortized.
 *
 * Every buffer replacement goes through `adopt`: swap with the new buffer and
 * release the old one. Replacing the buffer invalidates every iterator into
 * the old one. The `reallocate` event is emitted only once the operation that
 * grew the buffer has finished, so listeners always see a consistent vector.
 */

import type { ElementTraits } from '../types/traits.ts';
import type { ResolvedVectorConfig, VectorConfig } from '../types/config.ts';
import {
  OutOfRangeError,
  assertContract,
  isValidCount,
  type ContractId,
} from '../types/errors.ts';
import { SlotBuffer } from './core/slot-buffer.ts';
import { SlotIterator, type ConstSlotIterator } from './iterator.ts';
import { resolveVectorConfig } from './config.ts';
import {
  createReallocateEvent,
  type GrowthReason,
  type ReallocateEvent,
} from './events.ts';

export class SlotVector<T> implements Iterable<T> {
  /** Resolved configuration, shared with copies and moves */
  readonly config: ResolvedVectorConfig<T>;

  private buffer: SlotBuffer<T> = SlotBuffer.empty();
  private length = 0;

  /**
   * Create an empty vector. No allocation happens until the first growth.
   */
  constructor(config: VectorConfig<T> | ResolvedVectorConfig<T>) {
    this.config = resolveVectorConfig(config);
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * `size` default elements, capacity exactly `size`.
   */
  static ofSize<T>(config: VectorConfig<T> | ResolvedVectorConfig<T>, size: number): SlotVector<T> {
    const vector = new SlotVector(config);
    vector.requireCount(size);
    const { traits } = vector.config;
    vector.buffer = SlotBuffer.allocate(size, () => traits.create());
    vector.length = size;
    return vector;
  }

  /**
   * `size` copies of `value`, capacity exactly `size`.
   */
  static filled<T>(
    config: VectorConfig<T> | ResolvedVectorConfig<T>,
    size: number,
    value: T
  ): SlotVector<T> {
    const vector = new SlotVector(config);
    vector.requireCount(size);
    const { traits } = vector.config;
    vector.buffer = SlotBuffer.allocate(size, () => traits.clone(value));
    vector.length = size;
    return vector;
  }

  /**
   * The listed values in order, capacity exactly `values.length`.
   */
  static fromValues<T>(
    config: VectorConfig<T> | ResolvedVectorConfig<T>,
    values: readonly T[]
  ): SlotVector<T> {
    const vector = new SlotVector(config);
    const next = SlotBuffer.allocate<T>(values.length);
    const slots = next.rawPointer();
    for (let i = 0; i < values.length; i++) {
      slots[i] = values[i];
    }
    vector.buffer = next;
    vector.length = values.length;
    return vector;
  }

  /**
   * Empty vector with `capacity` slots reserved. No element is constructed.
   */
  static withCapacity<T>(
    config: VectorConfig<T> | ResolvedVectorConfig<T>,
    capacity: number
  ): SlotVector<T> {
    const vector = new SlotVector(config);
    vector.reserve(capacity);
    return vector;
  }

  /**
   * Deep copy of the logical elements of `source`.
   * Capacity equals `source.size`, not `source.capacity`.
   */
  static copyOf<T>(source: SlotVector<T>): SlotVector<T> {
    const vector = new SlotVector(source.config);
    const { traits } = source.config;
    const next = SlotBuffer.allocate<T>(source.length);
    const from = source.buffer.rawPointer();
    const to = next.rawPointer();
    for (let i = 0; i < source.length; i++) {
      to[i] = traits.clone(from[i]);
    }
    vector.buffer = next;
    vector.length = source.length;
    return vector;
  }

  /**
   * Take over the buffer of `source` in O(1). `source` is left empty.
   */
  static moveFrom<T>(source: SlotVector<T>): SlotVector<T> {
    const vector = new SlotVector(source.config);
    vector.buffer = source.buffer.transfer();
    vector.length = source.length;
    source.length = 0;
    return vector;
  }

  // ===========================================================================
  // Assignment
  // ===========================================================================

  /**
   * Copy-assign: build a copy of `source`, then exchange internals with it.
   * If copying throws, this vector is untouched. Self-assignment is a no-op.
   */
  assign(source: SlotVector<T>): this {
    if (source !== this) {
      const copy = SlotVector.copyOf(source);
      this.swap(copy);
    }
    return this;
  }

  /**
   * Move-assign: adopt the internals of `source`, leaving it empty.
   * Self move-assignment is a no-op.
   */
  moveAssign(source: SlotVector<T>): this {
    if (source !== this) {
      this.buffer.release();
      this.buffer = source.buffer.transfer();
      this.length = source.length;
      source.length = 0;
    }
    return this;
  }

  /**
   * Exchange buffer, size and capacity with another vector.
   * Configurations stay with their vectors.
   */
  swap(other: SlotVector<T>): void {
    this.buffer.swap(other.buffer);
    [this.length, other.length] = [other.length, this.length];
  }

  /**
   * Deep copy of this vector.
   */
  clone(): SlotVector<T> {
    return SlotVector.copyOf(this);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /** Number of logically present elements */
  get size(): number {
    return this.length;
  }

  /** Number of allocated slots */
  get capacity(): number {
    return this.buffer.capacity;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  private get traits(): ElementTraits<T> {
    return this.config.traits;
  }

  // ===========================================================================
  // Element Access
  // ===========================================================================

  /**
   * Unchecked read. Precondition: `index < size`.
   */
  get(index: number): T {
    this.requireIndex(index);
    return this.buffer.rawPointer()[index];
  }

  /**
   * Unchecked write. Precondition: `index < size`.
   */
  set(index: number, value: T): void {
    this.requireIndex(index);
    this.buffer.rawPointer()[index] = value;
  }

  /**
   * Checked read.
   * @throws OutOfRangeError if `index >= size`
   */
  at(index: number): T {
    this.checkRange(index);
    return this.buffer.rawPointer()[index];
  }

  /**
   * Checked write.
   * @throws OutOfRangeError if `index >= size`
   */
  setAt(index: number, value: T): void {
    this.checkRange(index);
    this.buffer.rawPointer()[index] = value;
  }

  // ===========================================================================
  // Capacity
  // ===========================================================================

  /**
   * Grow capacity to exactly `newCapacity` if it is larger. Never shrinks.
   */
  reserve(newCapacity: number): void {
    this.requireCount(newCapacity);
    if (newCapacity > this.capacity) {
      this.notify(this.reallocate(newCapacity, 'reserve'));
    }
  }

  /**
   * Change the logical size.
   * Growing past capacity reallocates to max(newSize, 2 × capacity);
   * newly exposed slots get the default value; shrinking only truncates.
   */
  resize(newSize: number): void {
    this.requireCount(newSize);
    const grown =
      newSize > this.capacity
        ? this.reallocate(Math.max(newSize, this.capacity * 2), 'resize')
        : null;
    if (newSize > this.length) {
      const slots = this.buffer.rawPointer();
      for (let i = this.length; i < newSize; i++) {
        slots[i] = this.traits.create();
      }
    }
    this.length = newSize;
    this.notify(grown);
  }

  /**
   * Drop every element. Capacity and slot contents are kept.
   */
  clear(): void {
    this.length = 0;
  }

  // ===========================================================================
  // Modification
  // ===========================================================================

  /**
   * Append `value`, doubling capacity when full (0 grows to 1).
   */
  pushBack(value: T): void {
    const grown =
      this.length === this.capacity
        ? this.reallocate(this.capacity === 0 ? 1 : this.capacity * 2, 'push')
        : null;
    this.buffer.rawPointer()[this.length] = value;
    this.length++;
    this.notify(grown);
  }

  /**
   * Drop the last element. The slot keeps its value until overwritten.
   * Precondition: not empty.
   */
  popBack(): void {
    this.require(this.length > 0, 'not-empty', 'popBack on an empty vector');
    this.length--;
  }

  /**
   * Insert `value` before `position`, which must lie in [begin, end].
   * Returns an iterator at the inserted element. When the vector was full the
   * iterator points into the new buffer and all earlier iterators are stale.
   */
  insert(position: ConstSlotIterator<T>, value: T): SlotIterator<T> {
    this.requirePosition(position, true, 'insert');
    const index = position.index;

    if (this.length < this.capacity) {
      const slots = this.buffer.rawPointer();
      for (let i = this.length; i > index; i--) {
        slots[i] = slots[i - 1];
      }
      slots[index] = value;
      this.length++;
      return new SlotIterator(slots, index);
    }

    const newCapacity = this.capacity === 0 ? 1 : this.capacity * 2;
    const next = SlotBuffer.allocate<T>(newCapacity);
    const from = this.buffer.rawPointer();
    const to = next.rawPointer();
    for (let i = 0; i < index; i++) {
      to[i] = from[i];
    }
    to[index] = value;
    for (let i = index; i < this.length; i++) {
      to[i + 1] = from[i];
    }
    const grown = this.adopt(next, 'insert');
    this.length++;
    this.notify(grown);
    return new SlotIterator(to, index);
  }

  /**
   * Remove the element at `position`, which must lie in [begin, end).
   * Returns an iterator at the element that followed it. Capacity is kept.
   */
  erase(position: ConstSlotIterator<T>): SlotIterator<T> {
    this.requirePosition(position, false, 'erase');
    const index = position.index;
    const slots = this.buffer.rawPointer();
    for (let i = index + 1; i < this.length; i++) {
      slots[i - 1] = slots[i];
    }
    this.length--;
    return new SlotIterator(slots, index);
  }

  // ===========================================================================
  // Iteration
  // ===========================================================================

  begin(): SlotIterator<T> {
    return new SlotIterator(this.buffer.rawPointer(), 0);
  }

  end(): SlotIterator<T> {
    return new SlotIterator(this.buffer.rawPointer(), this.length);
  }

  cbegin(): ConstSlotIterator<T> {
    return this.begin();
  }

  cend(): ConstSlotIterator<T> {
    return this.end();
  }

  *[Symbol.iterator](): Iterator<T> {
    const slots = this.buffer.rawPointer();
    for (let i = 0; i < this.length; i++) {
      yield slots[i];
    }
  }

  /**
   * Copy of the logical elements as a plain array.
   */
  toArray(): T[] {
    return this.buffer.rawPointer().slice(0, this.length);
  }

  // ===========================================================================
  // Growth
  // ===========================================================================

  /**
   * Allocate exactly `newCapacity` slots, relocate the elements and adopt the
   * new buffer. Elements are moved by reference, never cloned.
   * The caller emits the returned event once it has finished.
   */
  private reallocate(newCapacity: number, reason: GrowthReason): ReallocateEvent {
    const next = SlotBuffer.allocate<T>(newCapacity);
    const from = this.buffer.rawPointer();
    const to = next.rawPointer();
    for (let i = 0; i < this.length; i++) {
      to[i] = from[i];
    }
    return this.adopt(next, reason);
  }

  private adopt(next: SlotBuffer<T>, reason: GrowthReason): ReallocateEvent {
    const prevCapacity = this.capacity;
    this.buffer.swap(next);
    next.release();
    return createReallocateEvent(reason, prevCapacity, this.capacity, this.length);
  }

  private notify(event: ReallocateEvent | null): void {
    if (event) {
      this.config.events?.emit('reallocate', event);
    }
  }

  // ===========================================================================
  // Contracts
  // ===========================================================================

  private require(
    condition: boolean,
    contractId: ContractId,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (this.config.assertions) {
      assertContract(condition, contractId, message, context);
    }
  }

  private requireCount(count: number): void {
    this.require(isValidCount(count), 'valid-count', `${count} is not a valid count`, { count });
  }

  private requireIndex(index: number): void {
    this.require(
      Number.isInteger(index) && index >= 0 && index < this.length,
      'index-in-bounds',
      `index ${index} outside [0, ${this.length})`,
      { index, size: this.length }
    );
  }

  private requirePosition(
    position: ConstSlotIterator<T>,
    allowEnd: boolean,
    operation: string
  ): void {
    const owned = position.slots === this.buffer.rawPointer();
    const last = allowEnd ? this.length : this.length - 1;
    this.require(
      owned &&
        Number.isInteger(position.index) &&
        position.index >= 0 &&
        position.index <= last,
      'iterator-in-range',
      owned
        ? `${operation} at ${position.index} outside [0, ${this.length}${allowEnd ? ']' : ')'}`
        : `${operation} with an iterator into another buffer`,
      { index: position.index, size: this.length, owned }
    );
  }

  private checkRange(index: number): void {
    if (!(Number.isInteger(index) && index >= 0 && index < this.length)) {
      throw new OutOfRangeError(index, this.length);
    }
  }
}
