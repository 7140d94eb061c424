/**
 * Alternatives shared by the variant tests.
 */

import { alternative, VariantDefinitionError } from "../index.js";

/** A value whose lifetime is recorded in a log. */
export class Tracked {
  constructor(readonly label: string) {}
}

export interface LifecycleLog {
  destroyed: string[];
  assigned: string[];
}

export function createLog(): LifecycleLog {
  return { destroyed: [], assigned: [] };
}

export function trackedAlternative(log: LifecycleLog) {
  return alternative<Tracked, [label: string], never, "tracked">({
    name: "tracked",
    is: (value): value is Tracked => value instanceof Tracked,
    construct: (label) => new Tracked(label),
    clone: (value) => new Tracked(value.label),
    assign: (target, source) => {
      log.assigned.push(`${target.label}<-${source.label}`);
      return new Tracked(source.label);
    },
    destroy: (value) => {
      log.destroyed.push(value.label);
    },
  });
}

/** Upper-case codes; plain strings convert into them, other strings fail. */
export class Code {
  constructor(readonly text: string) {}
}

export const code = alternative<Code, [text: string], string, "code">({
  name: "code",
  is: (value): value is Code => value instanceof Code,
  accepts: (value): value is string => typeof value === "string",
  convert: (text) => {
    if (!/^[A-Z]+$/.test(text)) throw new Error(`invalid code: ${text}`);
    return new Code(text);
  },
  construct: (text) => new Code(text),
});

export class Label {
  constructor(readonly text: string) {}
}

export const label = alternative<Label, [text: string], string, "label">({
  name: "label",
  is: (value): value is Label => value instanceof Label,
  accepts: (value): value is string => typeof value === "string",
  convert: (text) => new Label(text),
  construct: (text) => new Label(text),
});

/** Needs two arguments, so it is not default-constructible. */
export class Pair {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {}
}

export const pair = alternative<Pair, [x: number, y: number], never, "pair">({
  name: "pair",
  is: (value): value is Pair => value instanceof Pair,
  construct: (x, y) => new Pair(x, y),
  equals: (a, b) => a.x === b.x && a.y === b.y,
});

/** Construction throws when asked to. */
export class Fragile {
  constructor(readonly id: number) {}
}

export const fragile = alternative<Fragile, [id: number, fail?: boolean], never, "fragile">({
  name: "fragile",
  is: (value): value is Fragile => value instanceof Fragile,
  construct: (id, fail = false) => {
    if (fail) throw new Error(`fragile ${id} refused`);
    return new Fragile(id);
  },
});

/** Reason code of the `VariantDefinitionError` thrown by `fn`. */
export function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof VariantDefinitionError) return error.reason;
    throw error;
  }
  return undefined;
}
