/**
 * Tests for composite position helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  elementIndex,
  endIndex,
  isElementIndex,
  isEndIndex,
  compareFlattenedIndices,
  flattenedIndicesEqual,
  formatFlattenedIndex,
} from './flattened-index.ts';
import { PreconditionError } from './precondition.ts';
import type { FlattenedIndexOrder } from '../../types/flattened-index.ts';

const numericOrder: FlattenedIndexOrder<number, number> = {
  compareOuter: (a, b) => a - b,
  compareInner: (a, b) => a - b,
};

const numEq = (a: number, b: number) => a === b;

describe('FlattenedIndex', () => {
  describe('constructors', () => {
    it('should create element positions', () => {
      expect(elementIndex(2, 5)).toEqual({ kind: 'element', outer: 2, inner: 5 });
    });

    it('should create past-the-end positions without an inner index', () => {
      const end = endIndex(3);
      expect(end).toEqual({ kind: 'end', outer: 3 });
      expect('inner' in end).toBe(false);
    });
  });

  describe('type guards', () => {
    it('should distinguish element and end positions', () => {
      expect(isElementIndex(elementIndex(0, 0))).toBe(true);
      expect(isEndIndex(elementIndex(0, 0))).toBe(false);
      expect(isEndIndex(endIndex(4))).toBe(true);
      expect(isElementIndex(endIndex(4))).toBe(false);
    });
  });

  describe('compareFlattenedIndices', () => {
    it('should order by outer position first', () => {
      expect(compareFlattenedIndices(elementIndex(0, 9), elementIndex(1, 0), numericOrder)).toBeLessThan(0);
      expect(compareFlattenedIndices(elementIndex(2, 0), elementIndex(1, 9), numericOrder)).toBeGreaterThan(0);
    });

    it('should order by inner position when outer positions match', () => {
      expect(compareFlattenedIndices(elementIndex(1, 0), elementIndex(1, 2), numericOrder)).toBeLessThan(0);
      expect(compareFlattenedIndices(elementIndex(1, 2), elementIndex(1, 2), numericOrder)).toBe(0);
    });

    it('should place element positions before the end position', () => {
      expect(compareFlattenedIndices(elementIndex(2, 7), endIndex(3), numericOrder)).toBeLessThan(0);
      expect(compareFlattenedIndices(endIndex(3), elementIndex(2, 7), numericOrder)).toBeGreaterThan(0);
    });

    it('should treat two end positions as equal', () => {
      expect(compareFlattenedIndices(endIndex(3), endIndex(3), numericOrder)).toBe(0);
    });

    it('should reject an element and an end position sharing an outer position', () => {
      expect(() => compareFlattenedIndices(elementIndex(3, 0), endIndex(3), numericOrder)).toThrow(
        PreconditionError
      );
    });
  });

  describe('flattenedIndicesEqual', () => {
    it('should compare both fields', () => {
      expect(flattenedIndicesEqual(elementIndex(1, 2), elementIndex(1, 2), numEq, numEq)).toBe(true);
      expect(flattenedIndicesEqual(elementIndex(1, 2), elementIndex(1, 3), numEq, numEq)).toBe(false);
      expect(flattenedIndicesEqual(elementIndex(1, 2), elementIndex(0, 2), numEq, numEq)).toBe(false);
    });

    it('should never equate an element position with an end position', () => {
      expect(flattenedIndicesEqual(elementIndex(3, 0), endIndex(3), numEq, numEq)).toBe(false);
    });

    it('should equate end positions at the same outer position', () => {
      expect(flattenedIndicesEqual(endIndex(3), endIndex(3), numEq, numEq)).toBe(true);
    });
  });

  describe('formatFlattenedIndex', () => {
    it('should format both variants', () => {
      expect(formatFlattenedIndex(elementIndex(1, 4))).toBe('(1, 4)');
      expect(formatFlattenedIndex(endIndex(3))).toBe('end(3)');
    });
  });
});
