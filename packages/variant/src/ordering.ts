/**
 * Eq and Ord
 *
 * Eq: Equality comparison
 * Ord: Total ordering
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 *   - Ord Antisymmetry: compare(x, y) <= 0 && compare(y, x) <= 0 => eqv(x, y)
 *   - Ord Totality: compare(x, y) <= 0 || compare(y, x) <= 0
 */

// ============================================================================
// Ordering
// ============================================================================

/**
 * Result of a comparison
 */
export type Ordering = -1 | 0 | 1;

export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

// ============================================================================
// Eq / Ord
// ============================================================================

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

export interface Ord<A> extends Eq<A> {
  readonly compare: (x: A, y: A) => Ordering;
  readonly lessThan: (x: A, y: A) => boolean;
  readonly lessThanOrEqual: (x: A, y: A) => boolean;
  readonly greaterThan: (x: A, y: A) => boolean;
  readonly greaterThanOrEqual: (x: A, y: A) => boolean;
}

/**
 * Build a full Ord from a compare function. `eqv` is `compare(x, y) === EQ`
 * unless an explicit equality is given.
 */
export function ordFromCompare<A>(
  compare: (x: A, y: A) => Ordering,
  eqv: (x: A, y: A) => boolean = (x, y) => compare(x, y) === EQ,
): Ord<A> {
  return {
    eqv,
    compare,
    lessThan: (x, y) => compare(x, y) === LT,
    lessThanOrEqual: (x, y) => compare(x, y) !== GT,
    greaterThan: (x, y) => compare(x, y) === GT,
    greaterThanOrEqual: (x, y) => compare(x, y) !== LT,
  };
}
