/**
 * @variantkit/variant Showcase
 *
 * Self-documenting examples of type-safe tagged unions: defining a variant,
 * constructing and converting values, reading them back, visiting, and
 * comparing.
 *
 * Type assertions used:
 *   typeAssert<Equals<A, B>>()  - A and B are the same type
 *
 * Run:   npx tsx examples/showcase.ts
 */

import assert from "node:assert/strict";

import {
  Alt,
  alternative,
  defineVariant,
  get,
  getIf,
  getRef,
  holdsAlternative,
  inPlaceIndex,
  inPlaceType,
  lessThan,
  ordVariant,
  take,
  visit,
  BadVariantAccess,
  VariantConstructionError,
  VariantDefinitionError,
  type Equals,
  type VariantAlternative,
  type VariantSize,
} from "../src/index.js";

function typeAssert<_T extends true>(): void {}

// ============================================================================
// 1. DEFINING A VARIANT - An Ordered List of Alternatives
// ============================================================================

const Value = defineVariant(Alt.integer, Alt.string);

assert.equal(Value.name, "Variant<integer, string>");
assert.equal(Value.size, 2);
typeAssert<Equals<VariantSize<typeof Value>, 2>>();
typeAssert<Equals<VariantAlternative<typeof Value, 1>, string>>();

// Defaults come from the first alternative
const zero = Value.create();
assert.equal(zero.index(), 0);
assert.equal(get(zero, 0), 0);

// ============================================================================
// 2. CONVERSION - Exact Types First, Then a Unique Accepting Alternative
// ============================================================================

assert.equal(Value.from("abc").index(), 1);
assert.equal(Value.from(4.9).index(), 0);
assert.equal(get(Value.from(4.9), Alt.integer), 4);

// Whole numbers convert into bigint when no alternative holds numbers
const Big = defineVariant(Alt.bigint, Alt.string);
assert.equal(get(Big.from(7), Alt.bigint), 7n);

// Two alternatives accepting the same input make it ambiguous
const symbolFrom = <N extends string>(name: N) =>
  alternative<symbol, [value: symbol], string, N>({
    name,
    is: (value): value is symbol => typeof value === "symbol",
    accepts: (value): value is string => typeof value === "string",
    convert: (value) => Symbol.for(value),
  });
const Keyed = defineVariant(symbolFrom("tag"), symbolFrom("key"));
assert.equal(Keyed.from(Symbol.for("id")).index(), 0);
assert.throws(() => Keyed.from("id"), VariantDefinitionError);

// ============================================================================
// 3. IN-PLACE CONSTRUCTION - Bypass Conversion
// ============================================================================

class Point {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {}
}

const samples = Alt.array("samples", Alt.number);
const Shape = defineVariant(Alt.monostate, Alt.instanceOf("point", Point), samples);

const origin = Shape.inPlace(inPlaceIndex(1), 0, 0);
const series = Shape.inPlace(inPlaceType(samples), [1, 2, 3]);
assert.equal(origin.index(), 1);
assert.deepEqual(get(series, samples), [1, 2, 3]);

// ============================================================================
// 4. ACCESS - Throwing, Nullable and Mutable Forms
// ============================================================================

const text = Value.from("hello");
assert.equal(get(text, Alt.string), "hello");
assert.equal(getIf(text, Alt.integer), null);
assert.equal(holdsAlternative(text, Alt.string), true);
assert.throws(() => get(text, Alt.integer), BadVariantAccess);

getRef(text, Alt.string).set("world");
assert.equal(get(text, 1), "world");

// take() moves the value out and leaves the index in place
assert.deepEqual(take(series, samples), [1, 2, 3]);
assert.deepEqual(get(series, samples), []);

// ============================================================================
// 5. VISITATION - One Case per Alternative (or per Combination)
// ============================================================================

const size = visit({ integer: (n) => n, string: (s) => s.length }, text);
assert.equal(size, 5);

const joined = visit(
  {
    "integer,integer": (a, b) => `${a + b}`,
    "integer,string": (a, b) => `${a}${b}`,
    "string,integer": (a, b) => `${a}${b}`,
    "string,string": (a, b) => `${a} ${b}`,
  },
  Value.from(1),
  Value.from("x"),
);
assert.equal(joined, "1x");

// ============================================================================
// 6. COMPARISON - Index First, Then Value
// ============================================================================

assert.equal(lessThan(Value.from(100), Value.from("a")), true);
const sorted = [Value.from("b"), Value.from(2), Value.from("a")].sort(
  ordVariant<typeof Value.alternatives>().compare,
);
assert.deepEqual(
  sorted.map((v) => v.toString()),
  [
    "Variant<integer, string>(integer: 2)",
    'Variant<integer, string>(string: "a")',
    'Variant<integer, string>(string: "b")',
  ],
);

// ============================================================================
// 7. FAILURE - A Failed Replacement Leaves the Variant Valueless
// ============================================================================

const isbn = alternative<string, [value: string], never, "isbn">({
  name: "isbn",
  is: (value): value is string => typeof value === "string",
  construct: (value) => {
    if (!/^\d{13}$/.test(value)) throw new Error(`not an ISBN: ${value}`);
    return value;
  },
});

const Book = defineVariant(Alt.integer, isbn);
const book = Book.create();
assert.throws(() => book.emplace(isbn, "12"), VariantConstructionError);
assert.equal(book.valueless(), true);

book.emplace(isbn, "9780000000002");
assert.equal(book.valueless(), false);
