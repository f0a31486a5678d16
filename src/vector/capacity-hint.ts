/**
 * Capacity hint for the reserving construction path.
 *
 * `createVector(config, 10)` builds ten default elements;
 * `createVector(config, reserve(10))` builds none and only pre-allocates.
 */
export class CapacityHint {
  /** Slots to allocate up front */
  readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = capacity;
    Object.freeze(this);
  }

  getCapacityToReserve(): number {
    return this.capacity;
  }
}

/**
 * Create a capacity hint.
 */
export function reserve(capacity: number): CapacityHint {
  return new CapacityHint(capacity);
}
