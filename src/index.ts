/**
 * flatview - Lazy flattened views over nested collections
 *
 * Main entry point exporting capability contracts, views and reference
 * collections.
 */

// =============================================================================
// Types
// =============================================================================

// Capability contracts
export type {
  Collection,
  BidirectionalCollection,
  NestedIterable,
  NestedCollection,
  NestedBidirectionalCollection,
} from './types/index.ts';

// Composite position types
export type {
  ElementFlattenedIndex,
  EndFlattenedIndex,
  FlattenedIndex,
  FlattenedIndexOrder,
  FlattenedIndexValidationResult,
  BoundedOffsetResult,
} from './types/index.ts';

// Cost brands
export type {
  CostLevel,
  Costed,
  ConstCost,
  LinearCost,
  JoinCostLevel,
} from './types/index.ts';

export { costed, $const, $linear } from './types/index.ts';

// =============================================================================
// Errors
// =============================================================================

export { PreconditionError, precondition, preconditionFailure } from './flatten/index.ts';

// =============================================================================
// Composite Positions
// =============================================================================

export {
  elementIndex,
  endIndex,
  isElementIndex,
  isEndIndex,
  compareFlattenedIndices,
  flattenedIndicesEqual,
  formatFlattenedIndex,
  validateFlattenedIndex,
} from './flatten/index.ts';

// =============================================================================
// Views
// =============================================================================

export {
  CompositeIterator,
  FlattenedSequence,
  FlattenedCollection,
  BidirectionalFlattenedCollection,
  flatten,
  joined,
  joinedBidirectional,
} from './flatten/index.ts';

// =============================================================================
// Reference Collections
// =============================================================================

export { ArrayCollection, ForwardList } from './collections/index.ts';
export type { ArrayCollectionOptions, ListNode, ForwardListIndex } from './collections/index.ts';

// =============================================================================
// Complexity-stratified API
// =============================================================================

export { query, scan } from './api/index.ts';
