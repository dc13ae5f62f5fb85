/**
 * Branded algorithmic cost labels.
 *
 * Results of view operations carry a phantom brand naming the complexity
 * class of the operation that produced them. The brand is compile-time only:
 * a `LinearCost<number>` is a plain number at runtime and is assignable to
 * `number` everywhere.
 */

// =============================================================================
// Brands
// =============================================================================

/**
 * Phantom symbol for cost-level branding.
 * Never exists at runtime.
 */
declare const costLevel: unique symbol;

/**
 * Cost labels, ordered from cheapest to most expensive.
 */
export type CostLevel = 'const' | 'linear';

/**
 * All labels less-than-or-equal to L, so a cheaper result widens naturally
 * into a slot that tolerates a more expensive one.
 */
type LevelsUpTo<L extends CostLevel> = L extends 'const' ? 'const' : CostLevel;

type CostBrand<Level extends CostLevel> = { readonly [costLevel]: Level };

/**
 * Value branded by declared cost level.
 */
export type Costed<Level extends CostLevel, T> = T & CostBrand<LevelsUpTo<Level>>;

/** Value from an O(1) operation. */
export type ConstCost<T> = Costed<'const', T>;
/** Value from an O(n) operation (n counts traversed elements or empty inner containers). */
export type LinearCost<T> = Costed<'linear', T>;

/**
 * Join two cost levels to the dominant one.
 */
export type JoinCostLevel<A extends CostLevel, B extends CostLevel> =
  A extends 'linear' ? 'linear' : B;

// =============================================================================
// Boundaries
// =============================================================================

/**
 * Brand a value at a declared cost level.
 * Identity at runtime; the level parameter only selects the brand.
 */
export function costed<L extends CostLevel, T>(_level: L, value: T): Costed<L, T> {
  return value as Costed<L, T>;
}

/**
 * Brand a value as the result of an O(1) operation.
 */
export function $const<T>(value: T): ConstCost<T> {
  return costed('const', value);
}

/**
 * Brand a value as the result of an O(n) operation.
 */
export function $linear<T>(value: T): LinearCost<T> {
  return costed('linear', value);
}
