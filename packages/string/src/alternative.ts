/**
 * `BasicString` as a variant payload.
 *
 * Plain strings convert into it, so a variant without `Alt.string` accepts
 * `"text"` directly; one that also lists `Alt.string` keeps plain strings
 * there (exact match first).
 */

import { alternative, type Alternative } from "@variantkit/variant";
import { BasicString, type StringView } from "./basic-string.js";

export const basicStringAlternative: Alternative<
  BasicString,
  [sv?: StringView, pos?: number, count?: number],
  string,
  "BasicString"
> = alternative<BasicString, [sv?: StringView, pos?: number, count?: number], string, "BasicString">({
  name: "BasicString",
  is: (value): value is BasicString => value instanceof BasicString,
  accepts: (value): value is string => typeof value === "string",
  convert: (text) => new BasicString(text),
  construct: (...args) => new BasicString(...args),
  clone: (value) => new BasicString(value),
  move: (value) => {
    const moved = new BasicString(value);
    value.clear();
    return moved;
  },
  assign: (target, source) => target.assign(source),
  equals: (a, b) => a.equals(b),
  compare: (a, b) => a.compare(b),
});
