/**
 * Monostate: the zero-data alternative.
 *
 * Placing `Alt.monostate` first makes any alternative set
 * default-constructible. All monostate values are equal under every
 * relational operation.
 */

import { alternative, type Alternative } from "./alternative.js";
import { EQ, ordFromCompare, type Eq, type Ord } from "./ordering.js";

export class Monostate {
  equals(_other: Monostate): boolean {
    return true;
  }

  toString(): string {
    return "Monostate";
  }
}

/** Shared monostate value; `new Monostate()` is equal to it in every respect. */
export const monostate: Monostate = new Monostate();

export const eqMonostate: Eq<Monostate> = {
  eqv: () => true,
};

export const ordMonostate: Ord<Monostate> = ordFromCompare<Monostate>(() => EQ);

export const monostateAlternative: Alternative<Monostate, [], never, "monostate"> = alternative<
  Monostate,
  [],
  never,
  "monostate"
>({
  name: "monostate",
  is: (value): value is Monostate => value instanceof Monostate,
  construct: () => monostate,
  equals: () => true,
  compare: () => EQ,
});
