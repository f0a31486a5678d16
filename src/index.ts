/**
 * slotvec - A contiguous, resizable sequence container
 *
 * Main entry point exporting core types, the vector and utilities.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  VectorConfig,
  ResolvedVectorConfig,
  ElementTraits,
  TraitsDefinition,
  ContractId,
} from './types/index.ts';

export {
  defineTraits,
  numberTraits,
  stringTraits,
  booleanTraits,
  bigintTraits,
} from './types/index.ts';

// =============================================================================
// Errors
// =============================================================================

export {
  ContractViolationError,
  OutOfRangeError,
  assertContract,
  isValidCount,
} from './types/index.ts';

// =============================================================================
// Vector
// =============================================================================

export {
  SlotVector,
  createVector,
  copyVector,
  moveVector,
  resolveVectorConfig,
  CapacityHint,
  reserve,
  equals,
  notEquals,
  lessThan,
  lessOrEqual,
  greaterThan,
  greaterOrEqual,
  SlotIterator,
  SlotBuffer,
  createVectorEventEmitter,
  createReallocateEvent,
} from './vector/index.ts';

export type {
  ConstSlotIterator,
  VectorEvent,
  GrowthReason,
  ReallocateEvent,
  VectorEventMap,
  EventHandler,
  Unsubscribe,
  VectorEventEmitter,
} from './vector/index.ts';
