/**
 * Element traits for slot vectors.
 *
 * A vector knows nothing about its element type on its own. Traits supply the
 * four operations it needs: a default value for freshly exposed slots, a copy
 * for deep copies and fills, equality and ordering for the relational
 * functions.
 *
 * Usage:
 * ```typescript
 * interface Point { x: number; y: number }
 *
 * const pointTraits = defineTraits<Point>({
 *   create: () => ({ x: 0, y: 0 }),
 *   compare: (a, b) => a.x - b.x || a.y - b.y,
 *   clone: (p) => ({ ...p }),
 * });
 * ```
 */

// =============================================================================
// Traits Interface
// =============================================================================

/**
 * Operations a vector performs on its elements.
 */
export interface ElementTraits<T> {
  /** Produce the default value of a slot */
  readonly create: () => T;
  /** Copy one element; used by deep copies and fill construction */
  readonly clone: (value: T) => T;
  /** Element equality */
  readonly equals: (a: T, b: T) => boolean;
  /**
   * Strict weak ordering.
   * Returns negative if a < b, zero if equivalent, positive if a > b.
   */
  readonly compare: (a: T, b: T) => number;
}

/**
 * Minimal description accepted by `defineTraits`.
 */
export interface TraitsDefinition<T> {
  create: () => T;
  compare: (a: T, b: T) => number;
  /** Defaults to `compare(a, b) === 0` */
  equals?: (a: T, b: T) => boolean;
  /** Defaults to identity */
  clone?: (value: T) => T;
}

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Build frozen traits from a definition, filling in the optional members.
 */
export function defineTraits<T>(definition: TraitsDefinition<T>): ElementTraits<T> {
  const { create, compare } = definition;
  return Object.freeze({
    create,
    compare,
    equals: definition.equals ?? ((a: T, b: T) => compare(a, b) === 0),
    clone: definition.clone ?? ((value: T) => value),
  });
}

function compareOrdered<T extends number | string | bigint>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// =============================================================================
// Presets
// =============================================================================

/**
 * Numbers default to 0. `equals` is `===`, so NaN never equals itself.
 */
export const numberTraits: ElementTraits<number> = defineTraits<number>({
  create: () => 0,
  compare: compareOrdered,
  equals: (a, b) => a === b,
});

/**
 * Strings default to ''. Ordering is by UTF-16 code unit.
 */
export const stringTraits: ElementTraits<string> = defineTraits<string>({
  create: () => '',
  compare: compareOrdered,
  equals: (a, b) => a === b,
});

/**
 * Booleans default to false, and false orders before true.
 */
export const booleanTraits: ElementTraits<boolean> = defineTraits<boolean>({
  create: () => false,
  compare: (a, b) => Number(a) - Number(b),
  equals: (a, b) => a === b,
});

export const bigintTraits: ElementTraits<bigint> = defineTraits<bigint>({
  create: () => 0n,
  compare: compareOrdered,
  equals: (a, b) => a === b,
});
