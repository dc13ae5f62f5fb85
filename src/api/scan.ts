/**
 * Scan namespace — O(n) operations on flattened views.
 * n counts traversed elements, plus empty inner collections skipped on the way.
 * Use `query.*` when a position is already at hand.
 */

import type { FlattenedIndex } from '../types/flattened-index.ts';
import { $linear, type LinearCost } from '../types/cost.ts';
import type { FlattenedCollection } from '../flatten/features/flattened-collection.ts';

function startIndex<E, OI, II>(view: FlattenedCollection<E, OI, II>): LinearCost<FlattenedIndex<OI, II>> {
  return view.startIndex;
}

function count<E, OI, II>(view: FlattenedCollection<E, OI, II>): LinearCost<number> {
  return view.distance(view.startIndex, view.endIndex);
}

function distance<E, OI, II>(
  view: FlattenedCollection<E, OI, II>,
  from: FlattenedIndex<OI, II>,
  to: FlattenedIndex<OI, II>
): LinearCost<number> {
  return view.distance(from, to);
}

function offset<E, OI, II>(
  view: FlattenedCollection<E, OI, II>,
  i: FlattenedIndex<OI, II>,
  n: number,
  limit?: FlattenedIndex<OI, II>
): LinearCost<FlattenedIndex<OI, II>> | undefined {
  return limit === undefined ? view.indexOffsetBy(i, n) : view.indexOffsetByLimited(i, n, limit);
}

function toArray<E, OI, II>(view: FlattenedCollection<E, OI, II>): LinearCost<E[]> {
  return $linear(view.toArray());
}

export const scan = {
  /** @complexity O(k) — k leading empty inner collections */
  startIndex,
  /** @complexity O(n) — steps from startIndex to endIndex */
  count,
  /** @complexity O(n) — one step per element between the positions */
  distance,
  /** @complexity O(|n|) — one step per unit of offset */
  offset,
  /** @complexity O(n) — enumeration through inner forEach */
  toArray,
} as const;
