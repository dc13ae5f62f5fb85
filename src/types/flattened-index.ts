/**
 * Composite position types for flattened views.
 */

// =============================================================================
// Flattened Index
// =============================================================================

/**
 * Position of an element inside a flattened view: the position of an inner
 * collection in the base, and the position of the element inside it.
 * Part of the FlattenedIndex discriminated union.
 */
export interface ElementFlattenedIndex<OI, II> {
  readonly kind: 'element';
  /** Position in the outer collection; never the base's `endIndex` */
  readonly outer: OI;
  /** Valid, dereferenceable position in `base.at(outer)` */
  readonly inner: II;
}

/**
 * Past-the-end position of a flattened view.
 * Part of the FlattenedIndex discriminated union.
 */
export interface EndFlattenedIndex<OI> {
  readonly kind: 'end';
  /** Always the base's `endIndex` */
  readonly outer: OI;
}

/**
 * Discriminated union for positions in a flattened view.
 * Use the `kind` field to distinguish between an element and past-the-end.
 *
 * @template OI - Outer (base) index type
 * @template II - Inner collection index type
 */
export type FlattenedIndex<OI, II> = ElementFlattenedIndex<OI, II> | EndFlattenedIndex<OI>;

/**
 * Orderings needed to compare flattened indices without a view.
 */
export interface FlattenedIndexOrder<OI, II> {
  readonly compareOuter: (a: OI, b: OI) => number;
  readonly compareInner: (a: II, b: II) => number;
}

// =============================================================================
// Validation & Offsets
// =============================================================================

/**
 * Result of validating a flattened index against a view.
 */
export interface FlattenedIndexValidationResult {
  /** Whether the index is a valid position of the view */
  readonly valid: boolean;
  /** Error messages if validation failed */
  readonly errors: readonly string[];
}

/**
 * Outcome of a bounded offset: the advanced position and whether the full
 * offset was applied. When `completed` is false, `index` is the limit.
 */
export interface BoundedOffsetResult<I> {
  readonly index: I;
  readonly completed: boolean;
}
