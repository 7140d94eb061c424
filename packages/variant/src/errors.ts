/**
 * Variant Error Types
 *
 * Every failure a variant operation reports is one of three kinds:
 * a broken usage contract (`VariantDefinitionError`), reading an alternative
 * that is not active (`BadVariantAccess`), or an alternative constructor that
 * threw while the variant was being mutated (`VariantConstructionError`).
 */

/**
 * Base class for all variant errors.
 */
export class VariantError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "VariantError";
  }
}

/** Reason codes for usage-contract violations. */
export type VariantDefinitionErrorReason =
  | "empty_alternative_list"
  | "invalid_alternative"
  | "duplicate_alternative"
  | "index_out_of_range"
  | "unknown_alternative"
  | "not_default_constructible"
  | "not_constructible"
  | "no_matching_alternative"
  | "ambiguous_conversion"
  | "variant_not_allowed"
  | "tag_not_allowed"
  | "definition_mismatch"
  | "missing_visitor_case"
  | "not_comparable";

/**
 * Thrown when a variant is defined or used against its contract: duplicate
 * alternatives, an index out of range, an input no alternative accepts, and
 * so on. Always thrown before the variant's storage is touched.
 */
export class VariantDefinitionError extends VariantError {
  constructor(
    readonly reason: VariantDefinitionErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "VariantDefinitionError";
  }
}

export type BadVariantAccessKind = "WrongAlternative" | "Valueless";

/**
 * Thrown by `get`-style accessors and `visit` when the requested alternative
 * is not the active one.
 */
export class BadVariantAccess extends VariantError {
  constructor(
    readonly kind: BadVariantAccessKind,
    /** Index that was asked for (-1 for visitation) */
    readonly expected: number,
    /** Index that is active (-1 when valueless) */
    readonly actual: number,
    message: string,
  ) {
    super(message);
    this.name = "BadVariantAccess";
  }
}

/**
 * Thrown when constructing the newly selected alternative fails. When this
 * happens while switching alternatives or in `emplace`, the variant has
 * already released its previous value and is left valueless. A failed
 * conversion into the active alternative leaves the old value in place.
 */
export class VariantConstructionError extends VariantError {
  constructor(
    readonly index: number,
    readonly alternative: string,
    cause: unknown,
  ) {
    super(
      `Failed to construct alternative '${alternative}' (index ${index}): ${describeCause(cause)}`,
      { cause },
    );
    this.name = "VariantConstructionError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
