/**
 * Capability contracts for containers consumed and exposed by flattened views.
 *
 * Three tiers:
 * - forward-enumerable: the ECMAScript `Iterable<E>` protocol;
 * - forward-addressable: `Collection<E, I>`;
 * - bidirectional-addressable: `BidirectionalCollection<E, I>`.
 *
 * Indices are opaque values owned by the collection that produced them. Only
 * the producing collection knows how to compare, advance or dereference them.
 */

// =============================================================================
// Forward-addressable
// =============================================================================

/**
 * A multi-pass container with addressable positions.
 *
 * Valid indices are the position of every element plus a past-the-end
 * `endIndex` that is not dereferenceable. `endIndex` is reachable from
 * `startIndex` by zero or more applications of `indexAfter`.
 *
 * @template E - Element type
 * @template I - Index type
 */
export interface Collection<E, I> extends Iterable<E> {
  /** Position of the first element; equals `endIndex` when empty */
  readonly startIndex: I;
  /** Past-the-end position */
  readonly endIndex: I;
  readonly isEmpty: boolean;
  /** Lower bound on the element count that is cheap to compute */
  readonly underestimatedCount: number;

  /**
   * Element at `position`.
   * Precondition: `position` is valid and not `endIndex`.
   */
  at(position: I): E;

  /**
   * Position immediately after `i`.
   * Precondition: `i` is not `endIndex`.
   */
  indexAfter(i: I): I;

  /**
   * Position `n` steps away from `i`. Negative `n` requires a collection
   * that can step backward; forward-only collections raise a precondition
   * failure instead.
   */
  indexOffsetBy(i: I, n: number): I;

  /**
   * Like `indexOffsetBy`, but returns `undefined` when `limit` would be
   * passed before the offset completes. A `limit` lying in the opposite
   * direction of `n` has no effect.
   */
  indexOffsetByLimited(i: I, n: number, limit: I): I | undefined;

  /** Signed number of steps from `from` to `to` */
  distance(from: I, to: I): number;

  /** Negative, zero or positive as `a` is before, at or after `b` */
  compareIndices(a: I, b: I): number;
  indicesEqual(a: I, b: I): boolean;

  /**
   * Call `body` on every element in order. Errors thrown by `body`
   * propagate to the caller.
   */
  forEach(body: (element: E) => void): void;
}

// =============================================================================
// Bidirectional-addressable
// =============================================================================

/**
 * A collection that can also step backward.
 */
export interface BidirectionalCollection<E, I> extends Collection<E, I> {
  /**
   * Position immediately before `i`.
   * Precondition: `i` is not `startIndex`.
   */
  indexBefore(i: I): I;
}

// =============================================================================
// Composite shapes
// =============================================================================

/**
 * Forward-enumerable container of forward-enumerable containers.
 */
export type NestedIterable<E> = Iterable<Iterable<E>>;

/**
 * Forward-addressable container of forward-addressable containers.
 *
 * @template E - Inner element type
 * @template OI - Outer index type
 * @template II - Inner index type
 */
export type NestedCollection<E, OI, II> = Collection<Collection<E, II>, OI>;

/**
 * Bidirectional container of bidirectional containers.
 */
export type NestedBidirectionalCollection<E, OI, II> =
  BidirectionalCollection<BidirectionalCollection<E, II>, OI>;
