/**
 * Visitation
 *
 * `visit(visitor, ...variants)` runs exactly one visitor case: the one named
 * by the active alternatives of all variants, joined by ",". The visitor
 * must have a case for every combination, which `tsc` checks.
 *
 * @example
 * ```typescript
 * const Value = defineVariant(Alt.number, Alt.string);
 *
 * visit({ number: (n) => n * 2, string: (s) => s.length }, Value.from(10)); // 20
 *
 * visit(
 *   {
 *     "number,number": (a, b) => a + b,
 *     "number,string": (a, b) => `${a}${b}`,
 *     "string,number": (a, b) => `${a}${b}`,
 *     "string,string": (a, b) => a + b,
 *   },
 *   Value.from(1),
 *   Value.from("x"),
 * ); // "1x"
 * ```
 */

import type { AnyAlternative, NameOf, ValueOf } from "./alternative.js";
import { BadVariantAccess, VariantDefinitionError } from "./errors.js";
import { STORAGE, VALUELESS } from "./storage.js";
import type { AlternativesOf, AnyVariant } from "./variant.js";

// ============================================================================
// Visitor Types
// ============================================================================

type Singles<A> = A extends AnyAlternative ? [A] : never;

type Prefix<A, Tail> = A extends AnyAlternative
  ? Tail extends unknown[]
    ? [A, ...Tail]
    : never
  : never;

/** Every combination of alternatives across `Vs`, as a union of tuples. */
type Combos<Vs extends readonly unknown[]> = Vs extends readonly [infer V, ...infer Rest]
  ? Rest extends readonly []
    ? Singles<AlternativesOf<V>[number]>
    : Prefix<AlternativesOf<V>[number], Combos<Rest>>
  : never;

type ComboKey<C> = C extends readonly [infer A, ...infer Rest]
  ? Rest extends readonly []
    ? NameOf<A>
    : `${NameOf<A>},${ComboKey<Rest>}`
  : never;

type ComboValues<C> = C extends readonly [infer A, ...infer Rest]
  ? [ValueOf<A>, ...ComboValues<Rest>]
  : [];

/**
 * One case per combination of alternative names across `Vs`.
 */
export type Visitor<Vs extends readonly AnyVariant[]> = {
  readonly [C in Combos<Vs> as ComboKey<C>]: (...values: ComboValues<C>) => unknown;
};

/** Union of the visitor cases' return types. */
export type VisitResult<V> = {
  [K in keyof V]: V[K] extends (...args: never[]) => infer R ? R : never;
}[keyof V];

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Invoke the visitor case matching the active alternatives.
 *
 * @throws BadVariantAccess when any variant is valueless
 * @throws VariantDefinitionError (`missing_visitor_case`) when the visitor has no such case
 */
export function visit<Vs extends [AnyVariant, ...AnyVariant[]], V extends Visitor<Vs>>(
  visitor: V,
  ...variants: Vs
): VisitResult<V>;
export function visit(visitor: object, ...variants: AnyVariant[]): unknown {
  return dispatchVisit(visitor, variants);
}

export function dispatchVisit(visitor: object, variants: readonly AnyVariant[]): unknown {
  const names: string[] = [];
  const values: unknown[] = [];

  for (const variant of variants) {
    const storage = variant[STORAGE];
    if (storage.index === VALUELESS) {
      throw new BadVariantAccess(
        "Valueless",
        VALUELESS,
        VALUELESS,
        `Cannot visit ${storage.definition.name}: it is valueless`,
      );
    }
    names.push(storage.definition.alternatives[storage.index].name);
    values.push(storage.value);
  }

  const key = names.join(",");
  const handler: unknown = Object.prototype.hasOwnProperty.call(visitor, key)
    ? Reflect.get(visitor, key)
    : undefined;
  if (typeof handler !== "function") {
    throw new VariantDefinitionError("missing_visitor_case", `Visitor has no case for '${key}'`);
  }
  return Reflect.apply(handler, visitor, values);
}
