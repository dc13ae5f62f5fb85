/**
 * Addressable flattened view of a collection of collections.
 *
 * The elements of the view are the concatenation of the elements of each
 * inner collection in the base. The view stores nothing but the base.
 *
 * Note: `startIndex`, `first`, `isEmpty` and `indexAfter` cost time
 * proportional to the number of consecutive empty inner collections they
 * cross, so they are not O(1) in general.
 */

import type { Collection, NestedCollection } from '../../types/collection.ts';
import type {
  BoundedOffsetResult,
  ElementFlattenedIndex,
  FlattenedIndex,
} from '../../types/flattened-index.ts';
import { $const, $linear, type ConstCost, type LinearCost } from '../../types/cost.ts';
import { CompositeIterator } from '../core/composite-iterator.ts';
import {
  compareFlattenedIndices,
  elementIndex,
  endIndex,
  flattenedIndicesEqual,
  formatFlattenedIndex,
} from '../core/flattened-index.ts';
import { precondition } from '../core/precondition.ts';

/**
 * @template E - Element type of the inner collections
 * @template OI - Index type of the base
 * @template II - Index type of the inner collections
 */
export class FlattenedCollection<E, OI, II> implements Collection<E, FlattenedIndex<OI, II>> {
  readonly base: NestedCollection<E, OI, II>;

  constructor(base: NestedCollection<E, OI, II>) {
    this.base = base;
  }

  // ===========================================================================
  // Sequential access
  // ===========================================================================

  /**
   * Fresh iterator over the concatenated elements.
   */
  makeIterator(): ConstCost<CompositeIterator<E>> {
    return $const(new CompositeIterator<E>(this.base[Symbol.iterator]()));
  }

  [Symbol.iterator](): CompositeIterator<E> {
    return this.makeIterator();
  }

  /**
   * Visit every element without building composite positions. Errors thrown
   * by `body` propagate unchanged.
   */
  forEach(body: (element: E) => void): void {
    for (const inner of this.base) {
      inner.forEach(body);
    }
  }

  /**
   * Always 0: a tighter estimate would have to count every inner collection.
   */
  get underestimatedCount(): number {
    return 0;
  }

  /**
   * Copy the elements into a new array by enumeration. Inner collections are
   * never asked for their counts.
   */
  toArray(): E[] {
    const result: E[] = [];
    this.forEach((element) => {
      result.push(element);
    });
    return result;
  }

  // ===========================================================================
  // Positions
  // ===========================================================================

  /**
   * Position of the first element of the first non-empty inner collection,
   * or `endIndex` when there is none.
   */
  get startIndex(): LinearCost<FlattenedIndex<OI, II>> {
    return $linear(this.firstElementFrom(this.base.startIndex));
  }

  get endIndex(): ConstCost<FlattenedIndex<OI, II>> {
    return $const(endIndex(this.base.endIndex));
  }

  get isEmpty(): boolean {
    return this.startIndex.kind === 'end';
  }

  get first(): E | undefined {
    const start = this.startIndex;
    return start.kind === 'end' ? undefined : this.at(start);
  }

  /**
   * Element at `position`: `base.at(outer).at(inner)`.
   * Precondition: `position` is a valid position other than `endIndex`.
   */
  at(position: FlattenedIndex<OI, II>): E {
    precondition(
      position.kind === 'element',
      'Cannot access element at endIndex of a flattened collection'
    );
    return this.base.at(position.outer).at(position.inner);
  }

  /**
   * Position following `i`, skipping empty inner collections.
   * Precondition: `i` is not `endIndex`.
   */
  indexAfter(i: FlattenedIndex<OI, II>): FlattenedIndex<OI, II> {
    precondition(i.kind === 'element', 'Cannot advance past endIndex of a flattened collection');

    const inner = this.base.at(i.outer);
    const nextInner = inner.indexAfter(i.inner);
    if (!inner.indicesEqual(nextInner, inner.endIndex)) {
      return elementIndex(i.outer, nextInner);
    }
    return this.firstElementFrom(this.base.indexAfter(i.outer));
  }

  compareIndices(a: FlattenedIndex<OI, II>, b: FlattenedIndex<OI, II>): number {
    return compareFlattenedIndices(a, b, {
      compareOuter: (x, y) => this.base.compareIndices(x, y),
      // Only consulted when both are element positions at the same outer index.
      compareInner: (x, y) => this.base.at(a.outer).compareIndices(x, y),
    });
  }

  indicesEqual(a: FlattenedIndex<OI, II>, b: FlattenedIndex<OI, II>): boolean {
    return flattenedIndicesEqual(
      a,
      b,
      (x, y) => this.base.indicesEqual(x, y),
      (x, y) => this.base.at(a.outer).indicesEqual(x, y)
    );
  }

  // ===========================================================================
  // Offsets & distance
  // ===========================================================================

  /**
   * Signed number of steps from `from` to `to`. Walks every element between
   * the two positions.
   */
  distance(from: FlattenedIndex<OI, II>, to: FlattenedIndex<OI, II>): LinearCost<number> {
    const backward = this.compareIndices(from, to) > 0;
    let current = backward ? to : from;
    const target = backward ? from : to;
    const step = backward ? -1 : 1;

    let count = 0;
    while (!this.indicesEqual(current, target)) {
      count += step;
      current = this.indexAfter(current);
    }
    return $linear(count);
  }

  /**
   * Position `n` steps from `i`. Negative `n` requires a bidirectional base
   * and fails fast on a forward-only one.
   */
  indexOffsetBy(i: FlattenedIndex<OI, II>, n: number): LinearCost<FlattenedIndex<OI, II>> {
    precondition(Number.isInteger(n), `Offset must be an integer: ${n}`);
    const step = Math.sign(n);
    this.ensureBidirectional(step);

    let result = i;
    for (let k = 0; k < Math.abs(n); k++) {
      result = this.advance(result, step);
    }
    return $linear(result);
  }

  /**
   * Position `n` steps from `i`, or `undefined` if `limit` is reached
   * before the offset completes.
   */
  indexOffsetByLimited(
    i: FlattenedIndex<OI, II>,
    n: number,
    limit: FlattenedIndex<OI, II>
  ): LinearCost<FlattenedIndex<OI, II>> | undefined {
    precondition(Number.isInteger(n), `Offset must be an integer: ${n}`);
    const step = Math.sign(n);
    this.ensureBidirectional(step);

    let result = i;
    for (let k = 0; k < Math.abs(n); k++) {
      if (this.indicesEqual(result, limit)) {
        return undefined;
      }
      result = this.advance(result, step);
    }
    return $linear(result);
  }

  /**
   * Bounded offset that reports whether it completed. On failure the
   * returned index is `limit`.
   */
  formIndexOffsetBy(
    i: FlattenedIndex<OI, II>,
    n: number,
    limit: FlattenedIndex<OI, II>
  ): BoundedOffsetResult<FlattenedIndex<OI, II>> {
    const advanced = this.indexOffsetByLimited(i, n, limit);
    if (advanced === undefined) {
      return { index: limit, completed: false };
    }
    return { index: advanced, completed: true };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * First element position at or after outer position `outer`.
   */
  private firstElementFrom(outer: OI): FlattenedIndex<OI, II> {
    const end = this.base.endIndex;
    let position = outer;
    while (!this.base.indicesEqual(position, end)) {
      const inner = this.base.at(position);
      if (!inner.isEmpty) {
        return elementIndex(position, inner.startIndex);
      }
      position = this.base.indexAfter(position);
    }
    return endIndex(end);
  }

  /**
   * Position preceding `i`, skipping empty inner collections backward.
   * Steps the base and the inner collections by offset -1, so a
   * forward-only collection at either level raises a precondition failure.
   */
  protected retreat(i: FlattenedIndex<OI, II>): ElementFlattenedIndex<OI, II> {
    const start = this.base.startIndex;
    const stepOuterBack = (outer: OI): OI => {
      precondition(
        !this.base.indicesEqual(outer, start),
        `Cannot step before startIndex of a flattened collection from ${formatFlattenedIndex(i)}`
      );
      return this.base.indexOffsetBy(outer, -1);
    };

    let outer = i.kind === 'end' ? stepOuterBack(i.outer) : i.outer;
    let inner = this.base.at(outer);
    let position = i.kind === 'element' ? i.inner : inner.endIndex;

    while (inner.indicesEqual(position, inner.startIndex)) {
      outer = stepOuterBack(outer);
      inner = this.base.at(outer);
      position = inner.endIndex;
    }

    return elementIndex(outer, inner.indexOffsetBy(position, -1));
  }

  private advance(i: FlattenedIndex<OI, II>, step: number): FlattenedIndex<OI, II> {
    return step < 0 ? this.retreat(i) : this.indexAfter(i);
  }

  /**
   * Probe the base for backward stepping before taking a backward step.
   * The bounded offset returns `undefined` on a bidirectional base that is
   * too short; a forward-only base raises a precondition failure.
   */
  private ensureBidirectional(step: number): void {
    if (step < 0) {
      this.base.indexOffsetByLimited(this.base.endIndex, step, this.base.startIndex);
    }
  }
}
