/**
 * In-place construction tags.
 *
 * A tag selects the alternative to construct, by index or by descriptor,
 * bypassing converting resolution:
 *
 * ```typescript
 * Value.inPlace(inPlaceIndex(1), "abc");
 * Value.inPlace(inPlaceType(Alt.array("items", Alt.number)), [1, 2, 3]);
 * ```
 */

import type { AnyAlternative } from "./alternative.js";

export class InPlaceIndex<I extends number = number> {
  constructor(readonly index: I) {}
}

export class InPlaceType<A extends AnyAlternative = AnyAlternative> {
  constructor(readonly alternative: A) {}
}

export type InPlaceTag = InPlaceIndex | InPlaceType;

export function inPlaceIndex<I extends number>(index: I): InPlaceIndex<I> {
  return new InPlaceIndex(index);
}

export function inPlaceType<A extends AnyAlternative>(alternative: A): InPlaceType<A> {
  return new InPlaceType(alternative);
}

export function isInPlaceTag(value: unknown): value is InPlaceTag {
  return value instanceof InPlaceIndex || value instanceof InPlaceType;
}
