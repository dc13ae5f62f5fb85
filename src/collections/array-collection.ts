/**
 * Bidirectional collection over a read-only array, addressed by integer
 * indices. Optionally restricted to a sub-range; the array is never copied.
 */

import type { BidirectionalCollection } from '../types/collection.ts';
import { precondition } from '../flatten/core/precondition.ts';

/**
 * Sub-range options for ArrayCollection.
 */
export interface ArrayCollectionOptions {
  /** First index included (default 0) */
  readonly start?: number;
  /** First index excluded (default `elements.length`) */
  readonly end?: number;
}

export class ArrayCollection<E> implements BidirectionalCollection<E, number> {
  readonly startIndex: number;
  readonly endIndex: number;
  private readonly elements: readonly E[];

  constructor(elements: readonly E[], options: ArrayCollectionOptions = {}) {
    const start = options.start ?? 0;
    const end = options.end ?? elements.length;
    precondition(
      Number.isInteger(start) && Number.isInteger(end) && 0 <= start && start <= end && end <= elements.length,
      `Invalid ArrayCollection range [${start}, ${end}) for ${elements.length} elements`
    );
    this.elements = elements;
    this.startIndex = start;
    this.endIndex = end;
  }

  /**
   * Wrap `elements` without copying them.
   */
  static of<E>(elements: readonly E[], options?: ArrayCollectionOptions): ArrayCollection<E> {
    return new ArrayCollection(elements, options);
  }

  /**
   * Wrap an array of arrays as a collection of collections.
   * Only the outer array of wrappers is allocated; inner arrays are shared.
   */
  static nested<E>(rows: readonly (readonly E[])[]): ArrayCollection<ArrayCollection<E>> {
    return new ArrayCollection(rows.map((row) => new ArrayCollection(row)));
  }

  get isEmpty(): boolean {
    return this.startIndex === this.endIndex;
  }

  get count(): number {
    return this.endIndex - this.startIndex;
  }

  get underestimatedCount(): number {
    return this.count;
  }

  at(position: number): E {
    precondition(
      this.startIndex <= position && position < this.endIndex,
      `Index ${position} out of range [${this.startIndex}, ${this.endIndex})`
    );
    return this.elements[position];
  }

  indexAfter(i: number): number {
    precondition(i < this.endIndex, `Cannot advance past endIndex ${this.endIndex}`);
    return i + 1;
  }

  indexBefore(i: number): number {
    precondition(i > this.startIndex, `Cannot step before startIndex ${this.startIndex}`);
    return i - 1;
  }

  indexOffsetBy(i: number, n: number): number {
    const result = i + n;
    precondition(
      this.startIndex <= result && result <= this.endIndex,
      `Offset ${n} from ${i} leaves range [${this.startIndex}, ${this.endIndex}]`
    );
    return result;
  }

  indexOffsetByLimited(i: number, n: number, limit: number): number | undefined {
    const result = i + n;
    if (n > 0 ? i <= limit && limit < result : limit <= i && result < limit) {
      return undefined;
    }
    return this.indexOffsetBy(i, n);
  }

  distance(from: number, to: number): number {
    return to - from;
  }

  compareIndices(a: number, b: number): number {
    return a - b;
  }

  indicesEqual(a: number, b: number): boolean {
    return a === b;
  }

  forEach(body: (element: E) => void): void {
    for (let i = this.startIndex; i < this.endIndex; i++) {
      body(this.elements[i]);
    }
  }

  *[Symbol.iterator](): IterableIterator<E> {
    for (let i = this.startIndex; i < this.endIndex; i++) {
      yield this.elements[i];
    }
  }
}
