/**
 * Configuration types for slot vectors.
 */

import type { ElementTraits } from './traits.ts';
import type { VectorEventEmitter } from '../vector/events.ts';

/**
 * Configuration options for creating a vector.
 */
export interface VectorConfig<T> {
  /** Element semantics: default value, copy, equality and ordering */
  traits: ElementTraits<T>;
  /** Check preconditions of unchecked operations (default: true) */
  assertions?: boolean;
  /** Receives buffer replacement events (default: none) */
  events?: VectorEventEmitter;
}

/**
 * Configuration with every default applied.
 * Shared by a vector and every copy or move made from it.
 */
export interface ResolvedVectorConfig<T> {
  readonly traits: ElementTraits<T>;
  readonly assertions: boolean;
  readonly events: VectorEventEmitter | null;
}
