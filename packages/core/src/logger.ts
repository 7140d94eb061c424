/**
 * Leveled logging for variantkit packages.
 *
 * Lines are written as `[variantkit:<scope>] <level>: <message>` through a
 * writer (default: console.error). The threshold comes from the unified
 * config (`logLevel`, or "debug" when `debug` is on) and is re-read on every
 * call, so `config.set()` takes effect immediately.
 */

import { config, type LogLevel } from "./config.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogWriter = (line: string) => void;

export interface LoggerOptions {
  /** Custom writer function (default: console.error) */
  writer?: LogWriter;
  /** Fixed level; overrides the configured one */
  level?: LogLevel;
}

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  isEnabled(level: Exclude<LogLevel, "silent">): boolean;
}

/**
 * Create a logger for one package area.
 *
 * @example
 * ```typescript
 * const log = createLogger("variant");
 * log.debug("resolved \"abc\" to string (index 1)");
 * // [variantkit:variant] debug: resolved "abc" to string (index 1)
 * ```
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? ((line: string) => console.error(line));

  const isEnabled = (level: Exclude<LogLevel, "silent">): boolean => {
    const threshold = options.level ?? config.getLogLevel();
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
  };

  const write = (level: Exclude<LogLevel, "silent">, message: string): void => {
    if (!isEnabled(level)) return;
    writer(formatLogLine(scope, level, message));
  };

  return {
    scope,
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    isEnabled,
  };
}

export function formatLogLine(scope: string, level: LogLevel, message: string): string {
  return `[variantkit:${scope}] ${level}: ${message}`;
}
