/**
 * @variantkit/variant: type-safe tagged unions
 *
 * A variant holds exactly one value out of a fixed, ordered list of
 * alternatives. Alternatives are run-time descriptors (see `Alt` and
 * `alternative()`), so membership, conversion and lifetime hooks work on
 * erased types while `tsc` still checks indices, visitor exhaustiveness and
 * value types.
 *
 * @example
 * ```typescript
 * import { defineVariant, Alt, get, visit } from "@variantkit/variant";
 *
 * const Value = defineVariant(Alt.integer, Alt.string);
 * const v = Value.from("hello");
 *
 * visit({ integer: (n) => n + 1, string: (s) => s.length }, v); // 5
 * get(v, 1);                                                    // "hello"
 * ```
 *
 * @packageDocumentation
 */

// Descriptors
export {
  alternative,
  isAlternative,
  comparePrimitives,
} from "./alternative.js";
export type {
  Alternative,
  AnyAlternative,
  ValueOf,
  ArgsOf,
  InputOf,
  NameOf,
  IsDefaultConstructible,
} from "./alternative.js";
export { Alt } from "./builtins.js";
export type { ElementHooks, InstanceHooks } from "./builtins.js";
export { Monostate, monostate, eqMonostate, ordMonostate } from "./monostate.js";

// Registry
export {
  position,
  occurrenceCount,
  isUnique,
  isInRange,
  firstMatching,
  findMatchingType,
  findUniqueMatchingType,
  sameAlternative,
  isExactly,
  isConvertible,
  validateAlternatives,
} from "./registry.js";
export type {
  AlternativePredicate,
  Equals,
  NamesOf,
  Position,
  OccurrenceCount,
  IsUnique,
  IsInRange,
  Indices,
  IndexOf,
  HasDuplicate,
  ValueAt,
  ArgsAt,
} from "./registry.js";

// Core
export { defineVariant, Variant, VariantDefinition, isVariant } from "./variant.js";
export type {
  AnyVariant,
  AlternativesOf,
  VariantSize,
  VariantAlternative,
  DefaultGuard,
  DefineResult,
  DuplicateAlternativeError,
} from "./variant.js";
export { VALUELESS } from "./storage.js";
export { InPlaceIndex, InPlaceType, inPlaceIndex, inPlaceType, isInPlaceTag } from "./tags.js";
export type { InPlaceTag } from "./tags.js";

// Accessors
export { get, getRef, take, getIf, getIfMut, holdsAlternative } from "./accessors.js";
export type { AlternativeRef, ReadonlyAlternativeRef } from "./accessors.js";

// Visitation
export { visit } from "./visit.js";
export type { Visitor, VisitResult } from "./visit.js";

// Comparison
export {
  compare,
  equals,
  notEquals,
  lessThan,
  lessThanOrEqual,
  greaterThan,
  greaterThanOrEqual,
  ordVariant,
  swap,
} from "./compare.js";
export { LT, EQ, GT, ordFromCompare } from "./ordering.js";
export type { Ordering, Eq, Ord } from "./ordering.js";

// Errors
export {
  VariantError,
  VariantDefinitionError,
  BadVariantAccess,
  VariantConstructionError,
} from "./errors.js";
export type { VariantDefinitionErrorReason, BadVariantAccessKind } from "./errors.js";
