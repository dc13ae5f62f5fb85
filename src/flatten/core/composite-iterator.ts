/**
 * Single-pass iterator over the elements of each segment produced by an
 * outer iterator.
 *
 * The elements produced are the concatenation of those in each segment.
 * Empty segments are skipped; a run of k empty segments costs O(k) in the
 * call that crosses it.
 */

/**
 * Iterator used by FlattenedSequence, FlattenedCollection and
 * BidirectionalFlattenedCollection.
 *
 * Once `done` has been reported, all subsequent calls report `done`, even if
 * the outer iterator could produce more segments.
 */
export class CompositeIterator<E> implements IterableIterator<E> {
  private outer: Iterator<Iterable<E>> | null;
  private inner: Iterator<E> | null = null;

  constructor(outer: Iterator<Iterable<E>>) {
    this.outer = outer;
  }

  /**
   * Advance to the next element and return it, or report `done`.
   */
  next(): IteratorResult<E> {
    for (;;) {
      if (this.inner !== null) {
        const result = this.inner.next();
        if (!result.done) {
          return result;
        }
      }

      if (this.outer === null) {
        return { done: true, value: undefined };
      }

      const segment = this.outer.next();
      if (segment.done) {
        // Terminal: drop both iterators so nothing can be resumed.
        this.outer = null;
        this.inner = null;
        return { done: true, value: undefined };
      }
      this.inner = segment.value[Symbol.iterator]();
    }
  }

  /** True once the outer iterator has been exhausted */
  get exhausted(): boolean {
    return this.outer === null;
  }

  [Symbol.iterator](): IterableIterator<E> {
    return this;
  }
}
