/**
 * Query namespace — O(1) operations on flattened views.
 * Functions here are read-only and touch at most one inner collection.
 */

import type { FlattenedIndex } from '../types/flattened-index.ts';
import { $const, type ConstCost } from '../types/cost.ts';
import type { FlattenedCollection } from '../flatten/features/flattened-collection.ts';
import { isElementIndex, isEndIndex } from '../flatten/core/flattened-index.ts';
import { validateFlattenedIndex } from '../flatten/features/validation.ts';

function endIndex<E, OI, II>(view: FlattenedCollection<E, OI, II>): ConstCost<FlattenedIndex<OI, II>> {
  return view.endIndex;
}

function at<E, OI, II>(view: FlattenedCollection<E, OI, II>, position: FlattenedIndex<OI, II>): ConstCost<E> {
  return $const(view.at(position));
}

function compare<E, OI, II>(
  view: FlattenedCollection<E, OI, II>,
  a: FlattenedIndex<OI, II>,
  b: FlattenedIndex<OI, II>
): ConstCost<number> {
  return $const(view.compareIndices(a, b));
}

function equals<E, OI, II>(
  view: FlattenedCollection<E, OI, II>,
  a: FlattenedIndex<OI, II>,
  b: FlattenedIndex<OI, II>
): ConstCost<boolean> {
  return $const(view.indicesEqual(a, b));
}

export const query = {
  /** @complexity O(1) — wraps the base endIndex */
  endIndex,
  /** @complexity O(1) — two subscripts: base, then inner collection */
  at,
  /** @complexity O(1) — outer comparison, then at most one inner comparison */
  compare,
  /** @complexity O(1) — structural equality */
  equals,
  /** @complexity O(1) — tag check */
  isEndIndex,
  /** @complexity O(1) — tag check */
  isElementIndex,
  /** @complexity O(1) — bounds checks against the base and one inner collection */
  validate: validateFlattenedIndex,
} as const;
