/**
 * Tests for relational functions.
 */

import { describe, it, expect } from 'vitest';
import {
  equals,
  notEquals,
  lessThan,
  lessOrEqual,
  greaterThan,
  greaterOrEqual,
} from './compare.ts';
import { createVector, moveVector } from './create.ts';
import { reserve } from './capacity-hint.ts';
import { defineTraits, numberTraits, stringTraits } from '../types/traits.ts';

const numbers = { traits: numberTraits };

describe('equals', () => {
  it('should be true for a vector and itself', () => {
    const vector = createVector(numbers, [1, 2]);
    expect(equals(vector, vector)).toBe(true);
  });

  it('should be true for a vector and itself after it was moved from', () => {
    const vector = createVector(numbers, [1, 2]);
    moveVector(vector);
    expect(equals(vector, vector)).toBe(true);
  });

  it('should ignore capacity', () => {
    const tight = createVector(numbers, [1, 2, 3]);
    const roomy = createVector(numbers, reserve(16));
    roomy.pushBack(1);
    roomy.pushBack(2);
    roomy.pushBack(3);

    expect(equals(tight, roomy)).toBe(true);
    expect(notEquals(tight, roomy)).toBe(false);
  });

  it('should be false for different sizes', () => {
    expect(equals(createVector(numbers, [1, 2]), createVector(numbers, [1, 2, 3]))).toBe(false);
  });

  it('should be false for different elements', () => {
    const a = createVector(numbers, [1, 2, 3]);
    const b = createVector(numbers, [1, 4, 3]);
    expect(equals(a, b)).toBe(false);
    expect(notEquals(a, b)).toBe(true);
  });

  it('should be true for two empty vectors', () => {
    expect(equals(createVector(numbers), createVector(numbers, reserve(4)))).toBe(true);
  });

  it('should use the equality of the element traits', () => {
    const caseless = {
      traits: defineTraits<string>({
        create: () => '',
        compare: (a, b) => a.toLowerCase().localeCompare(b.toLowerCase()),
      }),
    };
    expect(equals(createVector(caseless, ['A', 'b']), createVector(caseless, ['a', 'B']))).toBe(true);
  });

  it('should not equate NaN elements', () => {
    expect(equals(createVector(numbers, [NaN]), createVector(numbers, [NaN]))).toBe(false);
  });
});

describe('ordering', () => {
  it('should compare lexicographically', () => {
    const a = createVector(numbers, [1, 2, 3]);
    const b = createVector(numbers, [1, 3]);

    expect(lessThan(a, b)).toBe(true);
    expect(lessThan(b, a)).toBe(false);
    expect(greaterThan(b, a)).toBe(true);
    expect(lessOrEqual(a, b)).toBe(true);
    expect(greaterOrEqual(a, b)).toBe(false);
  });

  it('should order a proper prefix first', () => {
    const prefix = createVector(numbers, [1, 2]);
    const longer = createVector(numbers, [1, 2, 0]);

    expect(lessThan(prefix, longer)).toBe(true);
    expect(greaterThan(longer, prefix)).toBe(true);
  });

  it('should treat equal vectors as neither less nor greater', () => {
    const a = createVector(numbers, [4, 5]);
    const b = createVector(numbers, [4, 5]);

    expect(lessThan(a, b)).toBe(false);
    expect(greaterThan(a, b)).toBe(false);
    expect(lessOrEqual(a, b)).toBe(true);
    expect(greaterOrEqual(a, b)).toBe(true);
  });

  it('should order the empty vector before any other', () => {
    const empty = createVector(numbers);
    const one = createVector(numbers, [0]);

    expect(lessThan(empty, one)).toBe(true);
    expect(lessThan(empty, createVector(numbers))).toBe(false);
  });

  it('should use the ordering of the element traits', () => {
    const words = { traits: stringTraits };
    expect(lessThan(createVector(words, ['apple', 'pear']), createVector(words, ['apple', 'plum']))).toBe(
      true
    );
  });
});
