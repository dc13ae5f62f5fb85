/**
 * Structural validation of caller-held flattened positions.
 */

import type { FlattenedIndex, FlattenedIndexValidationResult } from '../../types/flattened-index.ts';
import type { FlattenedCollection } from './flattened-collection.ts';

/**
 * Check that `index` is a position `view` could have produced: a
 * past-the-end position sits at the base's end, and an element position
 * addresses an existing element of a non-empty inner collection.
 *
 * Does not throw; navigation preconditions are left to the view.
 *
 * @example
 * ```typescript
 * const result = validateFlattenedIndex(view, position);
 * if (!result.valid) {
 *   console.error('Invalid position:', result.errors);
 * }
 * ```
 */
export function validateFlattenedIndex<E, OI, II>(
  view: FlattenedCollection<E, OI, II>,
  index: FlattenedIndex<OI, II>
): FlattenedIndexValidationResult {
  const errors: string[] = [];
  const base = view.base;

  switch (index.kind) {
    case 'end': {
      if (!base.indicesEqual(index.outer, base.endIndex)) {
        errors.push('Past-the-end position must sit at the base endIndex');
      }
      break;
    }

    case 'element': {
      if (base.compareIndices(index.outer, base.startIndex) < 0) {
        errors.push('Element position lies before the base startIndex');
        break;
      }
      if (base.compareIndices(index.outer, base.endIndex) >= 0) {
        errors.push('Element position must not sit at or after the base endIndex');
        break;
      }
      const inner = base.at(index.outer);
      if (inner.compareIndices(index.inner, inner.startIndex) < 0) {
        errors.push('Inner position lies before the inner collection startIndex');
      } else if (inner.compareIndices(index.inner, inner.endIndex) >= 0) {
        errors.push('Inner position must address an element of the inner collection');
      }
      break;
    }
  }

  return { valid: errors.length === 0, errors };
}
