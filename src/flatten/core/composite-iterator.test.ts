/**
 * Tests for the composite iterator.
 */

import { describe, it, expect } from 'vitest';
import { CompositeIterator } from './composite-iterator.ts';

/**
 * Outer iterator that reports done once, then yields again.
 */
function resumingOuter(): Iterator<Iterable<number>> {
  let calls = 0;
  return {
    next(): IteratorResult<Iterable<number>> {
      calls++;
      if (calls === 1) return { done: false, value: [1] };
      if (calls === 2) return { done: true, value: undefined };
      return { done: false, value: [99] };
    },
  };
}

describe('CompositeIterator', () => {
  it('should concatenate segments in order', () => {
    const iter = new CompositeIterator([[1, 2], [3], [4, 5]][Symbol.iterator]());
    expect([...iter]).toEqual([1, 2, 3, 4, 5]);
  });

  it('should skip empty segments anywhere', () => {
    const iter = new CompositeIterator([[], [], [1], [], [], [2, 3], []][Symbol.iterator]());
    expect([...iter]).toEqual([1, 2, 3]);
  });

  it('should report done for an empty outer iterator', () => {
    const iter = new CompositeIterator<number>([][Symbol.iterator]());
    expect(iter.next()).toEqual({ done: true, value: undefined });
  });

  it('should report done for an outer iterator of empty segments only', () => {
    const iter = new CompositeIterator<number>([[], [], []][Symbol.iterator]());
    expect(iter.next().done).toBe(true);
    expect(iter.exhausted).toBe(true);
  });

  it('should yield elements that are themselves undefined', () => {
    const iter = new CompositeIterator<number | undefined>([[undefined], [2]][Symbol.iterator]());
    expect(iter.next()).toEqual({ done: false, value: undefined });
    expect(iter.next()).toEqual({ done: false, value: 2 });
    expect(iter.next().done).toBe(true);
  });

  it('should stay exhausted even if the outer iterator would resume', () => {
    const iter = new CompositeIterator(resumingOuter());
    expect(iter.next()).toEqual({ done: false, value: 1 });
    expect(iter.next().done).toBe(true);
    expect(iter.next().done).toBe(true);
    expect(iter.next().done).toBe(true);
  });

  it('should accept any iterable segments', () => {
    const segments: Iterable<string>[] = ['ab', new Set(['c']), ['d']];
    const iter = new CompositeIterator(segments[Symbol.iterator]());
    expect([...iter]).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should pull segments lazily', () => {
    const pulled: number[] = [];
    function* segments(): Generator<number[]> {
      pulled.push(0);
      yield [1];
      pulled.push(1);
      yield [2];
    }
    const iter = new CompositeIterator(segments());
    expect(iter.next().value).toBe(1);
    expect(pulled).toEqual([0]);
    expect(iter.next().value).toBe(2);
    expect(pulled).toEqual([0, 1]);
  });

  it('should be its own iterable', () => {
    const iter = new CompositeIterator([[1]][Symbol.iterator]());
    expect(iter[Symbol.iterator]()).toBe(iter);
  });
});
