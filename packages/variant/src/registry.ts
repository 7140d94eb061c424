/**
 * Alternative Registry
 *
 * Stateless lookups over an ordered alternative list, used whenever a variant
 * has to decide which alternative an input value, index or descriptor refers
 * to. Each run-time function has a type-level counterpart so that the same
 * questions are answered by `tsc` wherever the alternative list is known
 * statically.
 */

import { describeValue } from "@variantkit/core";
import {
  acceptsOf,
  isAlternative,
  type AnyAlternative,
  type NameOf,
  type ValueOf,
  type ArgsOf,
} from "./alternative.js";
import { VariantDefinitionError } from "./errors.js";

// ============================================================================
// Predicates
// ============================================================================

/**
 * Relation between a looked-up value and a candidate alternative.
 */
export type AlternativePredicate<V> = (value: V, candidate: AnyAlternative) => boolean;

/** Same descriptor, or a descriptor with the same name. */
export function sameAlternative(a: AnyAlternative, b: AnyAlternative): boolean {
  return a === b || a.name === b.name;
}

/** `value` already has the candidate's type. */
export const isExactly: AlternativePredicate<unknown> = (value, candidate) => candidate.is(value);

/** `value` converts implicitly into the candidate. */
export const isConvertible: AlternativePredicate<unknown> = (value, candidate) =>
  acceptsOf(candidate, value);

// ============================================================================
// Lookups
// ============================================================================

/**
 * First index of `alt` in `list`, or `list.length` when absent.
 */
export function position(alt: AnyAlternative, list: readonly AnyAlternative[]): number {
  const index = list.findIndex((candidate) => sameAlternative(alt, candidate));
  return index === -1 ? list.length : index;
}

/**
 * Number of entries for which `predicate(value, entry)` holds.
 */
export function occurrenceCount<V>(
  predicate: AlternativePredicate<V>,
  value: V,
  list: readonly AnyAlternative[],
): number {
  let count = 0;
  for (const candidate of list) {
    if (predicate(value, candidate)) count++;
  }
  return count;
}

export function isUnique(alt: AnyAlternative, list: readonly AnyAlternative[]): boolean {
  return occurrenceCount(sameAlternative, alt, list) === 1;
}

export function isInRange(index: number, size: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < size;
}

/**
 * Index of the first entry satisfying the predicate, or `list.length`.
 */
export function firstMatching<V>(
  predicate: AlternativePredicate<V>,
  value: V,
  list: readonly AnyAlternative[],
): number {
  const index = list.findIndex((candidate) => predicate(value, candidate));
  return index === -1 ? list.length : index;
}

/**
 * Index of the first entry, in declaration order, satisfying the predicate.
 *
 * @throws VariantDefinitionError (`no_matching_alternative`) when none does
 */
export function findMatchingType<V>(
  predicate: AlternativePredicate<V>,
  value: V,
  list: readonly AnyAlternative[],
): number {
  const index = firstMatching(predicate, value, list);
  if (index === list.length) {
    throw new VariantDefinitionError(
      "no_matching_alternative",
      `No alternative of ${listName(list)} matches ${describeValue(value)}`,
    );
  }
  return index;
}

/**
 * Like `findMatchingType`, but the match must be the only one.
 *
 * @throws VariantDefinitionError (`ambiguous_conversion`) when several entries match
 */
export function findUniqueMatchingType<V>(
  predicate: AlternativePredicate<V>,
  value: V,
  list: readonly AnyAlternative[],
): number {
  const index = findMatchingType(predicate, value, list);
  const count = occurrenceCount(predicate, value, list);
  if (count > 1) {
    const names = list.filter((candidate) => predicate(value, candidate)).map((c) => c.name);
    throw new VariantDefinitionError(
      "ambiguous_conversion",
      `${describeValue(value)} converts to ${count} alternatives of ${listName(list)}: ${names.join(", ")}`,
    );
  }
  return index;
}

/**
 * Resolve an index-or-descriptor selector against `list`.
 *
 * @throws VariantDefinitionError for an out-of-range index or a descriptor not in the list
 */
export function indexFor(target: number | AnyAlternative, list: readonly AnyAlternative[]): number {
  if (typeof target === "number") {
    if (!isInRange(target, list.length)) {
      throw new VariantDefinitionError(
        "index_out_of_range",
        `Index ${target} is out of range for ${listName(list)} (size ${list.length})`,
      );
    }
    return target;
  }
  const index = position(target, list);
  if (index === list.length) {
    throw new VariantDefinitionError(
      "unknown_alternative",
      `'${target.name}' is not an alternative of ${listName(list)}`,
    );
  }
  return index;
}

/**
 * Definition-time checks: at least one entry, every entry a descriptor
 * whose name has no ',', no two entries naming the same alternative.
 */
export function validateAlternatives(list: readonly unknown[]): asserts list is AnyAlternative[] {
  if (list.length === 0) {
    throw new VariantDefinitionError(
      "empty_alternative_list",
      "A variant needs at least one alternative",
    );
  }

  const seen = new Set<string>();
  list.forEach((entry, index) => {
    if (!isAlternative(entry)) {
      throw new VariantDefinitionError(
        "invalid_alternative",
        `Entry ${index} is not an alternative descriptor`,
      );
    }
    if (entry.name.includes(",")) {
      throw new VariantDefinitionError(
        "invalid_alternative",
        `Alternative name '${entry.name}' contains ','`,
      );
    }
    if (seen.has(entry.name)) {
      throw new VariantDefinitionError(
        "duplicate_alternative",
        `Alternative '${entry.name}' appears more than once`,
      );
    }
    seen.add(entry.name);
  });
}

/** Display name of a variant over `list`, e.g. `Variant<number, string>`. */
export function listName(list: readonly AnyAlternative[]): string {
  return `Variant<${list.map((alt) => alt.name).join(", ")}>`;
}

// ============================================================================
// Type-Level Registry
// ============================================================================

/** Exact type equality. */
export type Equals<A, B> = [A] extends [B] ? ([B] extends [A] ? true : false) : false;

/** Names of an alternative tuple, as a tuple. */
export type NamesOf<Alts extends readonly unknown[]> = { [K in keyof Alts]: NameOf<Alts[K]> };

/**
 * Index of `Name` in `Names`, or the length of `Names` when absent.
 *
 * @example
 * ```typescript
 * type P = Position<"string", ["number", "string"]>; // 1
 * ```
 */
export type Position<
  Name extends string,
  Names extends readonly string[],
  Acc extends unknown[] = [],
> = Names extends readonly [infer Head, ...infer Rest extends readonly string[]]
  ? Equals<Head, Name> extends true
    ? Acc["length"]
    : Position<Name, Rest, [...Acc, unknown]>
  : Acc["length"];

/** How many times `Name` occurs in `Names`. */
export type OccurrenceCount<
  Name extends string,
  Names extends readonly string[],
  Acc extends unknown[] = [],
> = Names extends readonly [infer Head, ...infer Rest extends readonly string[]]
  ? OccurrenceCount<Name, Rest, Equals<Head, Name> extends true ? [...Acc, unknown] : Acc>
  : Acc["length"];

export type IsUnique<Name extends string, Names extends readonly string[]> =
  OccurrenceCount<Name, Names> extends 1 ? true : false;

/** Union of the valid indices of a tuple: `Indices<[A, B, C]>` is `0 | 1 | 2`. */
export type Indices<T extends readonly unknown[]> = Exclude<Partial<T>["length"], T["length"]>;

/** `Indices` usable wherever a numeric index is required. */
export type IndexOf<T extends readonly unknown[]> = Indices<T> & number;

type TupleOf<N extends number, Acc extends unknown[] = []> = Acc["length"] extends N
  ? Acc
  : TupleOf<N, [...Acc, unknown]>;

export type IsInRange<I extends number, N extends number> = number extends N
  ? false
  : [I] extends [Indices<TupleOf<N>>]
    ? true
    : false;

/** Whether a tuple of literal names repeats any of them. Non-literal names are ignored. */
export type HasDuplicate<Names extends readonly string[]> = Names extends readonly [
  infer Head extends string,
  ...infer Rest extends readonly string[],
]
  ? string extends Head
    ? HasDuplicate<Rest>
    : Head extends Rest[number]
      ? true
      : HasDuplicate<Rest>
  : false;

/** Value type of the alternative at index `I`. */
export type ValueAt<Alts extends readonly unknown[], I extends number> = ValueOf<Alts[I]>;

/** In-place construction arguments of the alternative at index `I`. */
export type ArgsAt<Alts extends readonly unknown[], I extends number> = ArgsOf<Alts[I]>;
