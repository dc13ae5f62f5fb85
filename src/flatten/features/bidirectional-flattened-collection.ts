/**
 * Flattened view that can also step backward. Only constructible from a
 * bidirectional collection of bidirectional collections.
 */

import type {
  BidirectionalCollection,
  NestedBidirectionalCollection,
} from '../../types/collection.ts';
import type { ElementFlattenedIndex, FlattenedIndex } from '../../types/flattened-index.ts';
import { FlattenedCollection } from './flattened-collection.ts';

export class BidirectionalFlattenedCollection<E, OI, II>
  extends FlattenedCollection<E, OI, II>
  implements BidirectionalCollection<E, FlattenedIndex<OI, II>>
{
  declare readonly base: NestedBidirectionalCollection<E, OI, II>;

  constructor(base: NestedBidirectionalCollection<E, OI, II>) {
    super(base);
  }

  /**
   * Position preceding `i`, skipping empty inner collections backward.
   * Precondition: `i` is not `startIndex`.
   */
  indexBefore(i: FlattenedIndex<OI, II>): ElementFlattenedIndex<OI, II> {
    return this.retreat(i);
  }

  get last(): E | undefined {
    if (this.isEmpty) {
      return undefined;
    }
    return this.at(this.indexBefore(this.endIndex));
  }

  /**
   * Lazily enumerate the elements from last to first.
   */
  *reversed(): IterableIterator<E> {
    const start = this.startIndex;
    let position: FlattenedIndex<OI, II> = this.endIndex;
    while (!this.indicesEqual(position, start)) {
      position = this.indexBefore(position);
      yield this.at(position);
    }
  }
}
