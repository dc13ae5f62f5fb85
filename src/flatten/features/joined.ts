/**
 * Entry points returning lazy flattened views.
 *
 * The capability tier of the result is decided by which entry point the
 * caller's static types allow:
 *
 * ```typescript
 * const ranges = ArrayCollection.nested([[0, 1, 2], [8, 9], [15, 16]]);
 * for (const value of joinedBidirectional(ranges)) {
 *   // 0 1 2 8 9 15 16
 * }
 * ```
 *
 * None of these copy the base or its elements.
 */

import type {
  NestedBidirectionalCollection,
  NestedCollection,
  NestedIterable,
} from '../../types/collection.ts';
import { BidirectionalFlattenedCollection } from './bidirectional-flattened-collection.ts';
import { FlattenedCollection } from './flattened-collection.ts';
import { FlattenedSequence } from './flattened-sequence.ts';

/**
 * Concatenate the elements of an iterable of iterables. O(1).
 */
export function flatten<E>(base: NestedIterable<E>): FlattenedSequence<E> {
  return new FlattenedSequence(base);
}

/**
 * Addressable flattened view of a collection of collections. O(1).
 */
export function joined<E, OI, II>(base: NestedCollection<E, OI, II>): FlattenedCollection<E, OI, II> {
  return new FlattenedCollection(base);
}

/**
 * Flattened view of a bidirectional collection of bidirectional
 * collections, with backward navigation. O(1).
 */
export function joinedBidirectional<E, OI, II>(
  base: NestedBidirectionalCollection<E, OI, II>
): BidirectionalFlattenedCollection<E, OI, II> {
  return new BidirectionalFlattenedCollection(base);
}
