/**
 * Configuration defaults for slot vectors.
 */

import type { ResolvedVectorConfig, VectorConfig } from '../types/config.ts';

/**
 * Apply defaults to a vector configuration.
 * A resolved configuration passes through with the same values.
 */
export function resolveVectorConfig<T>(
  config: VectorConfig<T> | ResolvedVectorConfig<T>
): ResolvedVectorConfig<T> {
  return Object.freeze({
    traits: config.traits,
    assertions: config.assertions ?? true,
    events: config.events ?? null,
  });
}
