/**
 * Built-in alternative descriptors.
 *
 * @example
 * ```typescript
 * const IntOrText = defineVariant(Alt.integer, Alt.string);
 * const Shape = defineVariant(Alt.monostate, Alt.instanceOf("circle", Circle));
 * const Samples = defineVariant(Alt.array("samples", Alt.number), Alt.string);
 * ```
 */

import {
  alternative,
  comparePrimitives,
  type Alternative,
} from "./alternative.js";
import { VariantDefinitionError } from "./errors.js";
import { monostateAlternative } from "./monostate.js";
import { EQ, GT, LT, type Ordering } from "./ordering.js";

// ============================================================================
// Primitives
// ============================================================================

const number = alternative<number, [value?: number], never, "number">({
  name: "number",
  is: (value): value is number => typeof value === "number",
  construct: (value = 0) => value,
});

/**
 * Integral numbers. Any finite number converts into it by truncation.
 */
const integer = alternative<number, [value?: number], number, "integer">({
  name: "integer",
  is: (value): value is number => typeof value === "number" && Number.isInteger(value),
  accepts: (value): value is number => typeof value === "number" && Number.isFinite(value),
  convert: (value) => Math.trunc(value),
  construct: (value = 0) => Math.trunc(value),
});

const string = alternative<string, [value?: string], never, "string">({
  name: "string",
  is: (value): value is string => typeof value === "string",
  construct: (value = "") => value,
});

const boolean = alternative<boolean, [value?: boolean], never, "boolean">({
  name: "boolean",
  is: (value): value is boolean => typeof value === "boolean",
  construct: (value = false) => value,
});

/**
 * Arbitrary-precision integers. Integral numbers convert into it.
 */
const bigint = alternative<bigint, [value?: bigint], number, "bigint">({
  name: "bigint",
  is: (value): value is bigint => typeof value === "bigint",
  accepts: (value): value is number => typeof value === "number" && Number.isInteger(value),
  convert: (value) => BigInt(value),
  construct: (value = 0n) => value,
});

// ============================================================================
// Arrays
// ============================================================================

/**
 * Element hooks used by `Alt.array`; any alternative descriptor fits.
 */
export interface ElementHooks<T> {
  is(value: unknown): value is T;
  clone?(value: T): T;
  equals?(a: T, b: T): boolean;
  compare?(a: T, b: T): Ordering;
}

/**
 * A mutable array alternative.
 *
 * - construct copies the given items (the sequence-literal form)
 * - clone copies elements through the element's `clone`
 * - move empties the source array and hands its items over
 * - assign replaces the target's contents in place
 * - equality and ordering are element-wise and lexicographic
 */
function array<T = unknown, Name extends string = string>(
  name: Name,
  element?: ElementHooks<T>,
): Alternative<T[], [items?: readonly T[]], never, Name> {
  const cloneItems = (items: readonly T[]): T[] =>
    items.map((item) => (element?.clone ? element.clone(item) : item));

  const equalItems = (a: T, b: T): boolean => {
    if (element?.equals) return element.equals(a, b);
    if (element?.compare) return element.compare(a, b) === EQ;
    return a === b;
  };

  const compareItems = (a: T, b: T): Ordering => {
    const ordering = element?.compare ? element.compare(a, b) : comparePrimitives(a, b);
    if (ordering === undefined) {
      throw new VariantDefinitionError(
        "not_comparable",
        `Elements of '${name}' have no compare() and are not primitives`,
      );
    }
    return ordering;
  };

  return alternative<T[], [items?: readonly T[]], never, Name>({
    name,
    is: (value): value is T[] =>
      Array.isArray(value) && (element === undefined || value.every((item) => element.is(item))),
    construct: (items = []) => [...items],
    clone: cloneItems,
    move: (value) => value.splice(0),
    assign: (target, source) => {
      const items = cloneItems(source);
      target.splice(0, target.length, ...items);
      return target;
    },
    equals: (a, b) => a.length === b.length && a.every((item, i) => equalItems(item, b[i])),
    compare: (a, b) => {
      const shared = Math.min(a.length, b.length);
      for (let i = 0; i < shared; i++) {
        const ordering = compareItems(a[i], b[i]);
        if (ordering !== EQ) return ordering;
      }
      return a.length < b.length ? LT : a.length > b.length ? GT : EQ;
    },
  });
}

// ============================================================================
// Class Instances
// ============================================================================

/**
 * Lifecycle and comparison hooks for `Alt.instanceOf`.
 */
export type InstanceHooks<T> = Pick<
  Alternative<T>,
  "clone" | "move" | "assign" | "destroy" | "equals" | "compare"
>;

/**
 * Instances of a class. In-place construction forwards to the class
 * constructor. Unless `hooks.clone` is given, copies are shallow and keep the
 * prototype.
 */
function instanceOf<T extends object, Args extends unknown[], Name extends string>(
  name: Name,
  ctor: new (...args: Args) => T,
  hooks: InstanceHooks<T> = {},
): Alternative<T, Args, never, Name> {
  return alternative<T, Args, never, Name>({
    clone: (value) => shallowCopy(value),
    ...hooks,
    name,
    is: (value): value is T => value instanceof ctor,
    construct: (...args) => new ctor(...args),
  });
}

function shallowCopy<T extends object>(value: T): T {
  const copy: T = Object.create(Reflect.getPrototypeOf(value));
  return Object.assign(copy, value);
}

// ============================================================================
// Namespace
// ============================================================================

export const Alt = {
  number,
  integer,
  string,
  boolean,
  bigint,
  monostate: monostateAlternative,
  array,
  instanceOf,
} as const;
