/**
 * @variantkit/variant: Alternative Descriptors
 *
 * TypeScript erases types, so each alternative a variant can hold is
 * described at run time by an `Alternative` descriptor: a name, an exact-type
 * guard, and the lifecycle hooks (construct, clone, move, assign, destroy)
 * and comparison hooks the variant calls on the live value.
 *
 * An alternative's identity is its name; names must be unique within one
 * variant.
 */

import { VariantDefinitionError } from "./errors.js";
import { EQ, GT, LT, type Ordering } from "./ordering.js";

// ============================================================================
// Descriptor
// ============================================================================

/**
 * Run-time description of one alternative type `T`.
 *
 * - `Args`: arguments accepted by in-place construction. `[] extends Args`
 *   means the alternative is default-constructible.
 * - `From`: input type implicitly convertible into `T` (via `accepts` and
 *   `convert`).
 * - `Name`: literal name; keys visitor cases and identifies the alternative.
 *
 * @example
 * ```typescript
 * const point = alternative({
 *   name: "point",
 *   is: (v): v is Point => v instanceof Point,
 *   construct: (x: number, y: number) => new Point(x, y),
 *   clone: (p) => new Point(p.x, p.y),
 * });
 * ```
 */
export interface Alternative<
  T,
  Args extends unknown[] = [value: T],
  From = never,
  Name extends string = string,
> {
  readonly name: Name;
  /** Exact-type guard: does `value` already have this alternative's type? */
  is(value: unknown): value is T;
  /** Implicit conversion source guard */
  accepts?(value: unknown): value is From;
  convert?(value: From): T;
  /** In-place construction. Absent: constructible from one `T` only */
  construct?(...args: Args): T;
  /** Copy construction (default: identity) */
  clone?(value: T): T;
  /** Move construction; may leave `value` emptied (default: identity) */
  move?(value: T): T;
  /** Same-alternative assignment; returns the value to store (default: clone of source) */
  assign?(target: T, source: T): T;
  /** Called exactly once when a live value is released */
  destroy?(value: T): void;
  equals?(a: T, b: T): boolean;
  compare?(a: T, b: T): Ordering;
}

/**
 * Widest alternative type; every descriptor is assignable to it.
 */
export type AnyAlternative = Alternative<unknown, unknown[], unknown, string>;

// ============================================================================
// Type-Level Extractors
// ============================================================================

/** Value type held by an alternative. */
export type ValueOf<A> =
  A extends Alternative<infer T, infer _Args extends unknown[], infer _From, infer _Name extends string>
    ? T
    : never;

/** In-place construction arguments of an alternative. */
export type ArgsOf<A> =
  A extends Alternative<infer _T, infer Args extends unknown[], infer _From, infer _Name extends string>
    ? Args
    : never;

/** Types a converting construction accepts for an alternative (exact or convertible). */
export type InputOf<A> =
  A extends Alternative<infer T, infer _Args extends unknown[], infer From, infer _Name extends string>
    ? T | From
    : never;

/** Literal name of an alternative. */
export type NameOf<A> =
  A extends Alternative<infer _T, infer _Args extends unknown[], infer _From, infer N extends string>
    ? N
    : never;

/** Whether in-place construction accepts zero arguments. */
export type IsDefaultConstructible<A> =
  A extends Alternative<infer _T, infer Args extends unknown[], infer _From, infer _Name extends string>
    ? [] extends Args
      ? true
      : false
    : false;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create an alternative descriptor. Type parameters are inferred from the
 * descriptor: `T` from `is`, `Args` from `construct`, `From` from `accepts`, and
 * `Name` from the literal `name`.
 */
export function alternative<
  T,
  Args extends unknown[] = [value: T],
  From = never,
  Name extends string = string,
>(descriptor: Alternative<T, Args, From, Name>): Alternative<T, Args, From, Name> {
  if (typeof descriptor.name !== "string" || descriptor.name.length === 0) {
    throw new VariantDefinitionError("invalid_alternative", "An alternative needs a non-empty name");
  }
  if (descriptor.name.includes(",")) {
    throw new VariantDefinitionError(
      "invalid_alternative",
      `Alternative name '${descriptor.name}' contains ',', which joins visitor keys`,
    );
  }
  if (descriptor.accepts !== undefined && descriptor.convert === undefined) {
    throw new VariantDefinitionError(
      "invalid_alternative",
      `Alternative '${descriptor.name}' defines accepts() without convert()`,
    );
  }
  return Object.freeze({ ...descriptor });
}

export function isAlternative(value: unknown): value is AnyAlternative {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "name") === "string" &&
    typeof Reflect.get(value, "is") === "function"
  );
}

// ============================================================================
// Hook Resolution (defaults applied)
// ============================================================================

export function cloneOf(alt: AnyAlternative, value: unknown): unknown {
  return alt.clone ? alt.clone(value) : value;
}

export function moveOf(alt: AnyAlternative, value: unknown): unknown {
  return alt.move ? alt.move(value) : value;
}

export function assignOf(alt: AnyAlternative, target: unknown, source: unknown): unknown {
  return alt.assign ? alt.assign(target, source) : cloneOf(alt, source);
}

export function destroyOf(alt: AnyAlternative, value: unknown): void {
  alt.destroy?.(value);
}

export function acceptsOf(alt: AnyAlternative, value: unknown): boolean {
  return alt.accepts ? alt.accepts(value) : false;
}

export function equalsOf(alt: AnyAlternative, a: unknown, b: unknown): boolean {
  if (alt.equals) return alt.equals(a, b);
  if (alt.compare) return alt.compare(a, b) === EQ;
  return a === b;
}

export function compareOf(alt: AnyAlternative, a: unknown, b: unknown): Ordering {
  if (alt.compare) return alt.compare(a, b);
  const ordering = comparePrimitives(a, b);
  if (ordering === undefined) {
    throw new VariantDefinitionError(
      "not_comparable",
      `Alternative '${alt.name}' has no compare() and its values are not ordered primitives`,
    );
  }
  return ordering;
}

/**
 * Natural order for two primitives of the same kind; `undefined` otherwise.
 * NaN is unordered.
 */
export function comparePrimitives(a: unknown, b: unknown): Ordering | undefined {
  if (typeof a === "number" && typeof b === "number") {
    if (Number.isNaN(a) || Number.isNaN(b)) return undefined;
    return a < b ? LT : a > b ? GT : EQ;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? LT : a > b ? GT : EQ;
  }
  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? LT : a > b ? GT : EQ;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a === b ? EQ : a ? GT : LT;
  }
  return undefined;
}
