/**
 * A sequence consisting of all the elements contained in each segment of a
 * base sequence, in order. Nothing is copied; each iteration walks the base.
 */

import type { NestedIterable } from '../../types/collection.ts';
import { $const, type ConstCost } from '../../types/cost.ts';
import { CompositeIterator } from '../core/composite-iterator.ts';

export class FlattenedSequence<E> implements Iterable<E> {
  readonly base: NestedIterable<E>;

  constructor(base: NestedIterable<E>) {
    this.base = base;
  }

  /**
   * Fresh iterator over the concatenated elements.
   * Iterators obtained from separate calls never share state.
   */
  makeIterator(): ConstCost<CompositeIterator<E>> {
    return $const(new CompositeIterator(this.base[Symbol.iterator]()));
  }

  /**
   * Always 0: any estimate would require enumerating segments.
   */
  get underestimatedCount(): number {
    return 0;
  }

  /**
   * Copy the elements into a new array by enumeration.
   */
  toArray(): E[] {
    return Array.from(this);
  }

  [Symbol.iterator](): CompositeIterator<E> {
    return this.makeIterator();
  }
}
