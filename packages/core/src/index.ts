/**
 * @variantkit/core: shared infrastructure for the variantkit packages
 *
 * Configuration, leveled logging and resolution tracing.
 *
 * @packageDocumentation
 */

export { config, defineConfig } from "./config.js";
export type { VariantkitConfig, ResolutionConfig, ConversionRule, LogLevel } from "./config.js";

export { createLogger, formatLogLine } from "./logger.js";
export type { Logger, LoggerOptions, LogWriter } from "./logger.js";

export {
  ResolutionTracer,
  globalTracer,
  describeValue,
} from "./resolution-trace.js";
export type { ResolutionKind, ResolutionRecord, VariantSummary } from "./resolution-trace.js";
