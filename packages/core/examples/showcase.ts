/**
 * @variantkit/core Showcase
 *
 * Self-documenting examples of the shared infrastructure: the unified
 * configuration, leveled logging, and resolution tracing.
 *
 * Run:   npx tsx examples/showcase.ts
 */

import assert from "node:assert/strict";

import {
  config,
  createLogger,
  defineConfig,
  describeValue,
  ResolutionTracer,
  type VariantkitConfig,
} from "../src/index.js";

// ============================================================================
// 1. CONFIGURATION SYSTEM - Unified Config API
// ============================================================================

config.reset();
config.set({ debug: true, resolution: { conversion: "first" } });

assert.equal(config.get("debug"), true);
assert.equal(config.getConversionRule(), "first");
assert.equal(config.getLogLevel(), "debug");

const userConfig: VariantkitConfig = defineConfig({
  logLevel: "info",
  resolution: { conversion: "unique" },
});
assert.equal(userConfig.logLevel, "info");

config.reset();

// ============================================================================
// 2. LOGGING - Scoped, Leveled Lines
// ============================================================================

const lines: string[] = [];
const log = createLogger("showcase", { writer: (line) => lines.push(line), level: "info" });

log.debug("hidden below the threshold");
log.info("resolved 'string' (index 1)");
assert.deepEqual(lines, ["[variantkit:showcase] info: resolved 'string' (index 1)"]);

// ============================================================================
// 3. RESOLUTION TRACING
// ============================================================================

const tracer = new ResolutionTracer();
tracer.enable();
tracer.record({
  kind: "exact",
  variant: "Variant<integer, string>",
  input: describeValue("abc"),
  resolvedTo: { index: 1, name: "string" },
  operation: "construct",
});

assert.equal(
  tracer.formatForCLI(),
  '== Variant<integer, string> ==\n  [exact] construct("abc") → string#1',
);
assert.equal(tracer.getSummary("Variant<integer, string>").byAlternative.string, 1);
