/**
 * Single-owner handle over a slot array.
 *
 * The handle is the only owner of its storage. Ownership moves with `swap`
 * and `transfer`; nothing is reference counted. Slots are either
 * default-constructed by the `fill` passed to `allocate` or left unset
 * (array holes), and the owner decides which slots hold valid values.
 *
 * The identity of the array returned by `rawPointer()` is stable for as long
 * as the handle owns it, so it doubles as the buffer identity iterators carry.
 */
export class SlotBuffer<T> {
  /** Backing storage; its length is the capacity */
  private slots: T[];

  private constructor(slots: T[]) {
    this.slots = slots;
  }

  /**
   * Create a handle that owns no storage.
   */
  static empty<T>(): SlotBuffer<T> {
    return new SlotBuffer<T>([]);
  }

  /**
   * Allocate `capacity` slots.
   * With `fill`, each slot is default-constructed by calling it once;
   * without, slots are left unset and must be written before they are read.
   */
  static allocate<T>(capacity: number, fill?: () => T): SlotBuffer<T> {
    if (fill) {
      return new SlotBuffer(Array.from({ length: capacity }, () => fill()));
    }
    return new SlotBuffer(new Array<T>(capacity));
  }

  /** Number of allocated slots */
  get capacity(): number {
    return this.slots.length;
  }

  /**
   * The owned slot array itself (not a copy).
   */
  rawPointer(): T[] {
    return this.slots;
  }

  /**
   * Exchange storage with another handle.
   */
  swap(other: SlotBuffer<T>): void {
    const slots = this.slots;
    this.slots = other.slots;
    other.slots = slots;
  }

  /**
   * Move the storage into a new handle, leaving this one empty.
   */
  transfer(): SlotBuffer<T> {
    const moved = SlotBuffer.empty<T>();
    moved.swap(this);
    return moved;
  }

  /**
   * Drop the storage. The handle stays usable and owns an empty array.
   */
  release(): void {
    this.slots = [];
  }
}
