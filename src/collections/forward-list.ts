/**
 * Immutable singly linked list.
 * Forward-only: positions can be advanced but never stepped back, so any
 * negative offset is a precondition failure.
 */

import type { Collection } from '../types/collection.ts';
import { precondition, preconditionFailure } from '../flatten/core/precondition.ts';

// =============================================================================
// Types
// =============================================================================

/**
 * Cons cell. Cells are shared between lists built from a common tail.
 */
export interface ListNode<E> {
  readonly value: E;
  readonly next: ListNode<E> | null;
}

/**
 * Position in a ForwardList: the cell at that position and its distance from
 * the head. `node` is null only at the past-the-end position.
 */
export interface ForwardListIndex<E> {
  readonly node: ListNode<E> | null;
  readonly ordinal: number;
}

// =============================================================================
// ForwardList
// =============================================================================

export class ForwardList<E> implements Collection<E, ForwardListIndex<E>> {
  readonly length: number;
  private readonly head: ListNode<E> | null;

  private constructor(head: ListNode<E> | null, length: number) {
    this.head = head;
    this.length = length;
  }

  static empty<E>(): ForwardList<E> {
    return new ForwardList<E>(null, 0);
  }

  /**
   * Build a list holding the elements of `elements` in order. O(n).
   */
  static from<E>(elements: Iterable<E>): ForwardList<E> {
    const values = Array.from(elements);
    let head: ListNode<E> | null = null;
    for (let i = values.length - 1; i >= 0; i--) {
      head = { value: values[i], next: head };
    }
    return new ForwardList(head, values.length);
  }

  static of<E>(...elements: E[]): ForwardList<E> {
    return ForwardList.from(elements);
  }

  /**
   * New list with `value` in front. O(1); the receiver's cells are shared.
   */
  prepend(value: E): ForwardList<E> {
    return new ForwardList({ value, next: this.head }, this.length + 1);
  }

  get startIndex(): ForwardListIndex<E> {
    return { node: this.head, ordinal: 0 };
  }

  get endIndex(): ForwardListIndex<E> {
    return { node: null, ordinal: this.length };
  }

  get isEmpty(): boolean {
    return this.head === null;
  }

  get underestimatedCount(): number {
    return this.length;
  }

  at(position: ForwardListIndex<E>): E {
    precondition(position.node !== null, 'Cannot access element at ForwardList endIndex');
    return position.node.value;
  }

  indexAfter(i: ForwardListIndex<E>): ForwardListIndex<E> {
    precondition(i.node !== null, 'Cannot advance past ForwardList endIndex');
    return { node: i.node.next, ordinal: i.ordinal + 1 };
  }

  indexOffsetBy(i: ForwardListIndex<E>, n: number): ForwardListIndex<E> {
    if (n < 0) {
      preconditionFailure('ForwardList cannot step backward');
    }
    let result = i;
    for (let step = 0; step < n; step++) {
      result = this.indexAfter(result);
    }
    return result;
  }

  indexOffsetByLimited(
    i: ForwardListIndex<E>,
    n: number,
    limit: ForwardListIndex<E>
  ): ForwardListIndex<E> | undefined {
    if (n < 0) {
      preconditionFailure('ForwardList cannot step backward');
    }
    let result = i;
    for (let step = 0; step < n; step++) {
      if (result.ordinal === limit.ordinal) {
        return undefined;
      }
      result = this.indexAfter(result);
    }
    return result;
  }

  distance(from: ForwardListIndex<E>, to: ForwardListIndex<E>): number {
    precondition(from.ordinal <= to.ordinal, 'ForwardList cannot measure a backward distance');
    return to.ordinal - from.ordinal;
  }

  compareIndices(a: ForwardListIndex<E>, b: ForwardListIndex<E>): number {
    return a.ordinal - b.ordinal;
  }

  indicesEqual(a: ForwardListIndex<E>, b: ForwardListIndex<E>): boolean {
    return a.ordinal === b.ordinal;
  }

  forEach(body: (element: E) => void): void {
    for (let node = this.head; node !== null; node = node.next) {
      body(node.value);
    }
  }

  *[Symbol.iterator](): IterableIterator<E> {
    for (let node = this.head; node !== null; node = node.next) {
      yield node.value;
    }
  }
}
