/**
 * Vector module - container, iterators, buffer and events.
 */

// Container
export { SlotVector } from './slot-vector.ts';

export { createVector, copyVector, moveVector } from './create.ts';

export { resolveVectorConfig } from './config.ts';

// Capacity hint
export { CapacityHint, reserve } from './capacity-hint.ts';

// Relational functions
export {
  equals,
  notEquals,
  lessThan,
  lessOrEqual,
  greaterThan,
  greaterOrEqual,
} from './compare.ts';

// Iterators
export type { ConstSlotIterator } from './iterator.ts';
export { SlotIterator } from './iterator.ts';

// Buffer owner
export { SlotBuffer } from './core/slot-buffer.ts';

// Events
export type {
  VectorEvent,
  GrowthReason,
  ReallocateEvent,
  VectorEventMap,
  EventHandler,
  Unsubscribe,
  VectorEventEmitter,
} from './events.ts';

export { createVectorEventEmitter, createReallocateEvent } from './events.ts';
