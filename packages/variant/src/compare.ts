/**
 * Comparison & Utility
 *
 * Variants of one definition compare lexicographically on
 * (index, value): a lower index orders first whatever the values, a
 * valueless variant orders before every variant holding a value, and two
 * valueless variants are equal. Equal indices defer to the alternative's own
 * `equals` / `compare`.
 */

import { compareOf, equalsOf, type AnyAlternative } from "./alternative.js";
import { EQ, GT, LT, ordFromCompare, type Ord, type Ordering } from "./ordering.js";
import { STORAGE, VALUELESS, requireSameDefinition } from "./storage.js";
import type { Variant } from "./variant.js";

export function compare<Alts extends AnyAlternative[]>(a: Variant<Alts>, b: Variant<Alts>): Ordering {
  const left = a[STORAGE];
  const right = b[STORAGE];
  requireSameDefinition(left, right);

  if (left.index !== right.index) {
    return left.index < right.index ? LT : GT;
  }
  if (left.index === VALUELESS) {
    return EQ;
  }
  return compareOf(left.definition.alternatives[left.index], left.value, right.value);
}

export function equals<Alts extends AnyAlternative[]>(a: Variant<Alts>, b: Variant<Alts>): boolean {
  const left = a[STORAGE];
  const right = b[STORAGE];
  requireSameDefinition(left, right);

  if (left.index !== right.index) return false;
  if (left.index === VALUELESS) return true;
  return equalsOf(left.definition.alternatives[left.index], left.value, right.value);
}

export function notEquals<Alts extends AnyAlternative[]>(a: Variant<Alts>, b: Variant<Alts>): boolean {
  return !equals(a, b);
}

export function lessThan<Alts extends AnyAlternative[]>(a: Variant<Alts>, b: Variant<Alts>): boolean {
  return compare(a, b) === LT;
}

export function lessThanOrEqual<Alts extends AnyAlternative[]>(
  a: Variant<Alts>,
  b: Variant<Alts>,
): boolean {
  return compare(a, b) !== GT;
}

export function greaterThan<Alts extends AnyAlternative[]>(a: Variant<Alts>, b: Variant<Alts>): boolean {
  return compare(a, b) === GT;
}

export function greaterThanOrEqual<Alts extends AnyAlternative[]>(
  a: Variant<Alts>,
  b: Variant<Alts>,
): boolean {
  return compare(a, b) !== LT;
}

/**
 * Ord instance for variants of one definition.
 *
 * @example
 * ```typescript
 * const Value = defineVariant(Alt.number, Alt.string);
 * [Value.from("a"), Value.from(2)].sort(ordVariant<[typeof Alt.number, typeof Alt.string]>().compare);
 * ```
 */
export function ordVariant<Alts extends AnyAlternative[]>(): Ord<Variant<Alts>> {
  return ordFromCompare<Variant<Alts>>(compare, equals);
}

/** Exchange the contents of two variants of the same definition. */
export function swap<Alts extends AnyAlternative[]>(a: Variant<Alts>, b: Variant<Alts>): void {
  a.swap(b);
}
