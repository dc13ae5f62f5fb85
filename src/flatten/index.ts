/**
 * Flattened view exports.
 */

// Preconditions
export { PreconditionError, precondition, preconditionFailure } from './core/precondition.ts';

// Composite positions
export {
  elementIndex,
  endIndex,
  isElementIndex,
  isEndIndex,
  compareFlattenedIndices,
  flattenedIndicesEqual,
  formatFlattenedIndex,
} from './core/flattened-index.ts';

// Enumeration
export { CompositeIterator } from './core/composite-iterator.ts';
export { FlattenedSequence } from './features/flattened-sequence.ts';

// Addressable views
export { FlattenedCollection } from './features/flattened-collection.ts';
export { BidirectionalFlattenedCollection } from './features/bidirectional-flattened-collection.ts';
export { validateFlattenedIndex } from './features/validation.ts';

// Entry points
export { flatten, joined, joinedBidirectional } from './features/joined.ts';
