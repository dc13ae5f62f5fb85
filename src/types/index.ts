/**
 * Type exports for flatview.
 */

// Capability contracts
export type {
  Collection,
  BidirectionalCollection,
  NestedIterable,
  NestedCollection,
  NestedBidirectionalCollection,
} from './collection.ts';

// Composite positions
export type {
  ElementFlattenedIndex,
  EndFlattenedIndex,
  FlattenedIndex,
  FlattenedIndexOrder,
  FlattenedIndexValidationResult,
  BoundedOffsetResult,
} from './flattened-index.ts';

// Cost brands
export type {
  CostLevel,
  Costed,
  ConstCost,
  LinearCost,
  JoinCostLevel,
} from './cost.ts';
export { costed, $const, $linear } from './cost.ts';
