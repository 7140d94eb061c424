/**
 * @variantkit/string Showcase
 *
 * BasicString forwards to the native string; basicStringAlternative lets a
 * variant hold one.
 *
 * Run:   npx tsx examples/showcase.ts
 */

import assert from "node:assert/strict";

import { Alt, defineVariant, get, visit } from "@variantkit/variant";
import { BasicString, basicStringAlternative, npos } from "../src/index.js";

// ============================================================================
// 1. EDITING - Forwarded Modifiers
// ============================================================================

const greeting = new BasicString("hello").append(", world");
assert.equal(greeting.view(), "hello, world");

greeting.replace(0, 5, "HELLO").insert(5, "!");
assert.equal(greeting.view(), "HELLO!, world");

// ============================================================================
// 2. SEARCHING - npos When Nothing Matches
// ============================================================================

assert.equal(greeting.find("world"), 8);
assert.equal(greeting.find("moon"), npos);
assert.equal(greeting.findFirstOf(",!"), 5);
assert.equal(greeting.findLastNotOf("dlrow"), 7);
assert.equal(greeting.substr(8).view(), "world");

// ============================================================================
// 3. AS A VARIANT PAYLOAD
// ============================================================================

const Field = defineVariant(Alt.integer, basicStringAlternative);
const field = Field.from("name");

const width = visit({ integer: (n) => String(n).length, BasicString: (s) => s.size() }, field);
assert.equal(width, 4);

get(field, basicStringAlternative).append("s");
assert.equal(field.toString(), "Variant<integer, BasicString>(BasicString: BasicString)");
assert.equal(get(field, 1).view(), "names");
