/**
 * Resolution Tracing System
 *
 * Records how variant operations picked an alternative, for debugging and
 * for tests that assert on resolution behaviour.
 *
 * Features:
 * - Records every resolution with the variant it happened in
 * - Summaries per variant definition
 * - CLI-style text output
 */

import { config } from "./config.js";

/**
 * Types of resolutions that can be traced.
 */
export type ResolutionKind =
  | "exact" // input matched an alternative's own type
  | "conversion" // input converted into an accepting alternative
  | "in-place-type" // in-place construction selected by alternative
  | "in-place-index" // in-place construction selected by index
  | "valueless"; // construction failed, variant left without a value

/**
 * A single resolution event record.
 */
export interface ResolutionRecord {
  /** What kind of resolution occurred */
  kind: ResolutionKind;
  /** Display name of the variant definition, e.g. `Variant<number, string>` */
  variant: string;
  /** Short rendering of the input that drove the resolution */
  input: string;
  /** What it resolved to (absent for "valueless") */
  resolvedTo?: {
    index: number;
    name: string;
  };
  /** The operation that triggered it */
  operation: "construct" | "assign" | "emplace";
  /** Insertion order */
  sequence: number;
}

/**
 * Summary of resolutions for one variant definition.
 */
export interface VariantSummary {
  variant: string;
  totalResolutions: number;
  byKind: Partial<Record<ResolutionKind, number>>;
  byAlternative: Record<string, number>;
}

/**
 * Tracks resolutions made by variant operations.
 */
export class ResolutionTracer {
  private records: ResolutionRecord[] = [];
  private enabled: boolean | undefined;
  private sequence = 0;

  /**
   * Check if tracing is enabled. Unless set explicitly, follows the
   * `tracing` config key.
   */
  isEnabled(): boolean {
    return this.enabled ?? config.isTracingEnabled();
  }

  /**
   * Enable tracing programmatically.
   */
  enable(): void {
    this.enabled = true;
  }

  /**
   * Disable tracing.
   */
  disable(): void {
    this.enabled = false;
  }

  /**
   * Record a resolution event.
   */
  record(event: Omit<ResolutionRecord, "sequence">): void {
    if (!this.isEnabled()) return;
    this.records.push({ ...event, sequence: this.sequence++ });
  }

  getRecordsForVariant(variant: string): ResolutionRecord[] {
    return this.records.filter((r) => r.variant === variant);
  }

  getAllRecords(): ResolutionRecord[] {
    return [...this.records];
  }

  getSummary(variant: string): VariantSummary {
    const records = this.getRecordsForVariant(variant);

    const byKind: Partial<Record<ResolutionKind, number>> = {};
    const byAlternative: Record<string, number> = {};

    for (const record of records) {
      byKind[record.kind] = (byKind[record.kind] ?? 0) + 1;
      if (record.resolvedTo) {
        const name = record.resolvedTo.name;
        byAlternative[name] = (byAlternative[name] ?? 0) + 1;
      }
    }

    return {
      variant,
      totalResolutions: records.length,
      byKind,
      byAlternative,
    };
  }

  /**
   * Format trace output for CLI.
   */
  formatForCLI(variant?: string): string {
    const records = variant ? this.getRecordsForVariant(variant) : this.records;

    if (records.length === 0) {
      return "No resolutions recorded.";
    }

    const lines: string[] = [];

    const byVariant = new Map<string, ResolutionRecord[]>();
    for (const record of records) {
      const group = byVariant.get(record.variant);
      if (group) {
        group.push(record);
      } else {
        byVariant.set(record.variant, [record]);
      }
    }

    for (const [name, group] of byVariant) {
      lines.push(`== ${name} ==`);
      for (const record of group) {
        const target = record.resolvedTo
          ? `${record.resolvedTo.name}#${record.resolvedTo.index}`
          : "<valueless>";
        lines.push(`  [${record.kind}] ${record.operation}(${record.input}) → ${target}`);
      }
    }

    return lines.join("\n");
  }

  /**
   * Clear all records.
   */
  clear(): void {
    this.records = [];
    this.sequence = 0;
  }

  /**
   * Drop any explicit enable/disable and follow the config again.
   */
  resetEnabled(): void {
    this.enabled = undefined;
  }
}

/**
 * Render an arbitrary input compactly for trace and error messages.
 */
export function describeValue(value: unknown, maxLength = 40): string {
  let text: string;
  if (typeof value === "string") {
    text = JSON.stringify(value);
  } else if (typeof value === "bigint") {
    text = `${value}n`;
  } else if (value === null || typeof value !== "object") {
    text = String(value);
  } else if (Array.isArray(value)) {
    text = `[${value.length} items]`;
  } else {
    const ctor: unknown = Reflect.getPrototypeOf(value)?.constructor;
    text = typeof ctor === "function" && ctor.name ? ctor.name : "object";
  }
  return text.length > maxLength ? `${text.slice(0, maxLength - 1)}…` : text;
}

/**
 * Global tracer instance shared by the variant package.
 */
export const globalTracer = new ResolutionTracer();
