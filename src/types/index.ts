/**
 * Type exports for slotvec.
 */

// Configuration types
export type { VectorConfig, ResolvedVectorConfig } from './config.ts';

// Element traits
export type { ElementTraits, TraitsDefinition } from './traits.ts';

export {
  defineTraits,
  numberTraits,
  stringTraits,
  booleanTraits,
  bigintTraits,
} from './traits.ts';

// Errors
export type { ContractId } from './errors.ts';

export {
  ContractViolationError,
  OutOfRangeError,
  assertContract,
  isValidCount,
} from './errors.ts';
