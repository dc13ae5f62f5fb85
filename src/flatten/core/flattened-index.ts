/**
 * FlattenedIndex construction, guards, equality and ordering.
 *
 * These helpers know nothing about views: ordering is supplied as a pair of
 * compare functions, one for outer indices and one for inner indices.
 */

import type {
  ElementFlattenedIndex,
  EndFlattenedIndex,
  FlattenedIndex,
  FlattenedIndexOrder,
} from '../../types/flattened-index.ts';
import { precondition } from './precondition.ts';

// =============================================================================
// Constructors
// =============================================================================

/**
 * Create the position of an element at `inner` inside the inner collection
 * found at `outer`.
 */
export function elementIndex<OI, II>(outer: OI, inner: II): ElementFlattenedIndex<OI, II> {
  return { kind: 'element', outer, inner };
}

/**
 * Create the past-the-end position for a base whose end is `outer`.
 */
export function endIndex<OI>(outer: OI): EndFlattenedIndex<OI> {
  return { kind: 'end', outer };
}

// =============================================================================
// Type Guards
// =============================================================================

export function isElementIndex<OI, II>(
  index: FlattenedIndex<OI, II>
): index is ElementFlattenedIndex<OI, II> {
  return index.kind === 'element';
}

export function isEndIndex<OI, II>(
  index: FlattenedIndex<OI, II>
): index is EndFlattenedIndex<OI> {
  return index.kind === 'end';
}

// =============================================================================
// Equality & Ordering
// =============================================================================

/**
 * Lexicographic comparison: outer position first, then inner position.
 *
 * Two past-the-end positions compare equal. An element position and a
 * past-the-end position never share an outer position in a well-formed
 * view; comparing such a pair is a precondition failure.
 *
 * @returns Negative, zero or positive as `a` is before, at or after `b`
 */
export function compareFlattenedIndices<OI, II>(
  a: FlattenedIndex<OI, II>,
  b: FlattenedIndex<OI, II>,
  order: FlattenedIndexOrder<OI, II>
): number {
  const outer = order.compareOuter(a.outer, b.outer);
  if (outer !== 0) {
    return outer;
  }

  if (a.kind === 'element' && b.kind === 'element') {
    return order.compareInner(a.inner, b.inner);
  }

  precondition(
    a.kind === 'end' && b.kind === 'end',
    'Cannot compare an element position with a past-the-end position at the same outer position'
  );
  return 0;
}

/**
 * Structural equality of both fields.
 */
export function flattenedIndicesEqual<OI, II>(
  a: FlattenedIndex<OI, II>,
  b: FlattenedIndex<OI, II>,
  outerEqual: (a: OI, b: OI) => boolean,
  innerEqual: (a: II, b: II) => boolean
): boolean {
  if (a.kind !== b.kind || !outerEqual(a.outer, b.outer)) {
    return false;
  }
  if (a.kind === 'element' && b.kind === 'element') {
    return innerEqual(a.inner, b.inner);
  }
  return true;
}

/**
 * Human-readable form of a position, for error messages.
 */
export function formatFlattenedIndex<OI, II>(index: FlattenedIndex<OI, II>): string {
  return index.kind === 'end'
    ? `end(${String(index.outer)})`
    : `(${String(index.outer)}, ${String(index.inner)})`;
}
