/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for the variantkit packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: VARIANTKIT_* (highest priority, for CI overrides)
 * 2. Config files: variantkit.config.js, .variantkitrc, package.json "variantkit" key, etc.
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@variantkit/core";
 *
 * config.get("debug")                    // → boolean
 * config.get("resolution.conversion")    // → "unique" | "first"
 *
 * config.set({ resolution: { conversion: "first" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * How a converting construction picks an alternative when no alternative
 * matches the input's type exactly:
 * - "unique": exactly one alternative may accept the input (default)
 * - "first": the first accepting alternative in declaration order wins
 */
export type ConversionRule = "unique" | "first";

/**
 * Resolution configuration.
 */
export interface ResolutionConfig {
  conversion?: ConversionRule;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Full variantkit configuration schema.
 */
export interface VariantkitConfig {
  /** Enable debug mode (lowers the log level to "debug") */
  debug?: boolean;
  /** Record resolution decisions in the global tracer */
  tracing?: boolean;
  /** Minimum level written by package loggers */
  logLevel?: LogLevel;
  /** Alternative resolution configuration */
  resolution?: ResolutionConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

/** Effective config: defaults < set() < files < environment */
let configStore: Record<string, unknown> = {};
let programmaticConfig: Record<string, unknown> = {};
let fileConfig: Record<string, unknown> = {};
let envConfig: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with VARIANTKIT_ are parsed into the config object.
 *
 * Examples:
 *   VARIANTKIT_DEBUG=1                        → { debug: true }
 *   VARIANTKIT_RESOLUTION_CONVERSION=first    → { resolution: { conversion: "first" } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "VARIANTKIT_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator
    const configPath = envKeyToPath(key.slice(PREFIX.length));

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

/**
 * Convert an environment key suffix into a config path. Segments are
 * lower-cased and split on `_`; a segment that matches a known camelCase
 * key (`LOG_LEVEL` → `logLevel`) is folded back together.
 */
function envKeyToPath(suffix: string): string {
  const lower = suffix.toLowerCase().replace(/__/g, ".");
  if (lower === "log_level" || lower === "loglevel") return "logLevel";
  return lower.replace(/_/g, ".");
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  const parts = path.split(".");
  let current: unknown = obj;

  for (const part of parts) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "variantkit";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });
    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    // A broken config file falls back to defaults; surface it only in development
    if (process.env.NODE_ENV === "development") {
      console.warn(`[variantkit] Failed to load config file:`, error);
    }
  }

  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: VariantkitConfig = {
  debug: false,
  tracing: false,
  logLevel: "warn",
  resolution: {
    conversion: "unique",
  },
};

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  fileConfig = loadConfigFromFiles();
  envConfig = loadConfigFromEnv();
  configLoaded = true;
  rebuildStore();
}

function rebuildStore(): void {
  configStore = deepMerge(
    deepMerge(deepMerge(DEFAULTS, programmaticConfig), fileConfig),
    envConfig,
  );
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  return getNestedValue(configStore, path) as T | undefined;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<VariantkitConfig>): void {
  initializeConfig();
  programmaticConfig = deepMerge(programmaticConfig, values);
  rebuildStore();
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  programmaticConfig = {};
  fileConfig = {};
  envConfig = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Typed Helpers
// ============================================================================

/**
 * The conversion rule used by converting construction and assignment.
 */
function getConversionRule(): ConversionRule {
  return get<ConversionRule>("resolution.conversion") === "first" ? "first" : "unique";
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

/**
 * The effective log level. `debug: true` always lowers it to "debug".
 */
function getLogLevel(): LogLevel {
  if (get<boolean>("debug") === true) return "debug";
  const level = get<unknown>("logLevel");
  return LOG_LEVELS.find((l) => l === level) ?? "warn";
}

/**
 * Check if resolution tracing is enabled.
 */
function isTracingEnabled(): boolean {
  return get<boolean>("tracing") === true;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  getConversionRule,
  getLogLevel,
  isTracingEnabled,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: VariantkitConfig): VariantkitConfig {
  return cfg;
}
