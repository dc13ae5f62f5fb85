/**
 * Tests for the array-backed bidirectional collection.
 */

import { describe, it, expect } from 'vitest';
import { ArrayCollection } from './array-collection.ts';
import { PreconditionError } from '../flatten/core/precondition.ts';

describe('ArrayCollection', () => {
  describe('construction', () => {
    it('should span the whole array by default', () => {
      const c = ArrayCollection.of(['a', 'b', 'c']);
      expect(c.startIndex).toBe(0);
      expect(c.endIndex).toBe(3);
      expect(c.count).toBe(3);
      expect(c.isEmpty).toBe(false);
    });

    it('should restrict to a sub-range without copying', () => {
      const elements = [10, 20, 30, 40, 50];
      const c = ArrayCollection.of(elements, { start: 1, end: 4 });
      expect([...c]).toEqual([20, 30, 40]);
      expect(c.at(1)).toBe(20);
      expect(c.underestimatedCount).toBe(3);
    });

    it('should reject invalid ranges', () => {
      expect(() => ArrayCollection.of([1, 2], { start: 2, end: 1 })).toThrow(PreconditionError);
      expect(() => ArrayCollection.of([1, 2], { end: 3 })).toThrow(PreconditionError);
      expect(() => ArrayCollection.of([1, 2], { start: -1 })).toThrow(PreconditionError);
    });

    it('should wrap nested arrays', () => {
      const nested = ArrayCollection.nested([[1, 2], [], [3]]);
      expect(nested.count).toBe(3);
      expect(nested.at(1).isEmpty).toBe(true);
      expect([...nested.at(2)]).toEqual([3]);
    });
  });

  describe('navigation', () => {
    const c = ArrayCollection.of([1, 2, 3]);

    it('should step forward and backward', () => {
      expect(c.indexAfter(0)).toBe(1);
      expect(c.indexBefore(3)).toBe(2);
    });

    it('should trap past either end', () => {
      expect(() => c.indexAfter(3)).toThrow(PreconditionError);
      expect(() => c.indexBefore(0)).toThrow(PreconditionError);
      expect(() => c.at(3)).toThrow(PreconditionError);
    });

    it('should offset within bounds', () => {
      expect(c.indexOffsetBy(0, 3)).toBe(3);
      expect(c.indexOffsetBy(3, -2)).toBe(1);
      expect(() => c.indexOffsetBy(1, 3)).toThrow(PreconditionError);
      expect(() => c.indexOffsetBy(0, -1)).toThrow(PreconditionError);
    });

    it('should stop at the limit', () => {
      expect(c.indexOffsetByLimited(0, 2, 1)).toBeUndefined();
      expect(c.indexOffsetByLimited(0, 1, 1)).toBe(1);
      expect(c.indexOffsetByLimited(3, -2, 2)).toBeUndefined();
      expect(c.indexOffsetByLimited(3, -1, 2)).toBe(2);
      expect(c.indexOffsetByLimited(3, -3, 0)).toBe(0);
    });

    it('should ignore a limit in the opposite direction', () => {
      expect(c.indexOffsetByLimited(2, 1, 0)).toBe(3);
      expect(c.indexOffsetByLimited(1, -1, 3)).toBe(0);
    });

    it('should measure signed distances', () => {
      expect(c.distance(0, 3)).toBe(3);
      expect(c.distance(3, 1)).toBe(-2);
    });
  });

  it('should visit elements with forEach', () => {
    const seen: string[] = [];
    ArrayCollection.of(['x', 'y']).forEach((e) => seen.push(e));
    expect(seen).toEqual(['x', 'y']);
  });
});
