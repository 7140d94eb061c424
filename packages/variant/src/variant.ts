/**
 * Variant Core
 *
 * `defineVariant(...alternatives)` fixes an ordered alternative list and
 * returns its definition, which constructs `Variant` instances. A variant
 * holds exactly one live value of its active alternative, or none while it is
 * valueless.
 *
 * Replacing the active alternative destroys the old value before the new one
 * is built. If building throws, the variant stays valueless and the failure
 * surfaces as a `VariantConstructionError`. Assigning to the alternative that
 * is already active goes through that alternative's `assign` hook instead and
 * never destroys the live value.
 *
 * @example
 * ```typescript
 * import { defineVariant, Alt, get, getIf } from "@variantkit/variant";
 *
 * const Value = defineVariant(Alt.integer, Alt.string);
 *
 * const v = Value.create();    // index 0, value 0
 * v.assign("abc");             // index 1
 * get(v, Alt.string);          // "abc"
 * getIf(v, Alt.integer);       // null
 * ```
 */

import {
  config,
  createLogger,
  describeValue,
  globalTracer,
  type ResolutionKind,
} from "@variantkit/core";
import {
  assignOf,
  cloneOf,
  destroyOf,
  moveOf,
  type AnyAlternative,
  type ArgsOf,
  type InputOf,
  type IsDefaultConstructible,
  type NameOf,
  type ValueOf,
} from "./alternative.js";
import { equals as equalsVariants, compare as compareVariants } from "./compare.js";
import { VariantConstructionError, VariantDefinitionError } from "./errors.js";
import type { Ordering } from "./ordering.js";
import {
  findMatchingType,
  findUniqueMatchingType,
  firstMatching,
  indexFor,
  isConvertible,
  isExactly,
  listName,
  position,
  validateAlternatives,
  type ArgsAt,
  type HasDuplicate,
  type IndexOf,
  type NamesOf,
  type ValueAt,
} from "./registry.js";
import {
  STORAGE,
  VALUELESS,
  activeAlternative,
  requireSameDefinition,
  type DefinitionCore,
  type StorageHolder,
  type VariantStorage,
} from "./storage.js";
import { InPlaceIndex, isInPlaceTag, type InPlaceTag, type InPlaceType } from "./tags.js";
import { dispatchVisit, type Visitor, type VisitResult } from "./visit.js";

const log = createLogger("variant");

// ============================================================================
// Types
// ============================================================================

/**
 * Any variant, whatever its alternatives.
 */
export interface AnyVariant extends StorageHolder {
  readonly definition: DefinitionCore;
}

/** Alternative tuple of a variant or of a variant definition. */
export type AlternativesOf<V> = V extends {
  readonly definition: { readonly alternatives: infer Alts extends AnyAlternative[] };
}
  ? Alts
  : V extends { readonly alternatives: infer Alts extends AnyAlternative[] }
    ? Alts
    : never;

/** Number of alternatives of a variant or definition. */
export type VariantSize<V> = AlternativesOf<V>["length"];

/** Value type of alternative `I` of a variant or definition. */
export type VariantAlternative<V, I extends number> = ValueAt<AlternativesOf<V>, I>;

/**
 * Arguments of `create()`: none when the first alternative is
 * default-constructible, otherwise an argument no caller can supply.
 */
export type DefaultGuard<Alts extends AnyAlternative[]> =
  IsDefaultConstructible<Alts[0]> extends true
    ? []
    : [error: `'${NameOf<Alts[0]>}' is not default-constructible`];

export interface DuplicateAlternativeError<Names> {
  readonly error: "Alternative names must be unique";
  readonly names: Names;
}

/** What `defineVariant` returns: a definition, or an error type for duplicate names. */
export type DefineResult<Alts extends AnyAlternative[]> =
  HasDuplicate<NamesOf<Alts>> extends true
    ? DuplicateAlternativeError<NamesOf<Alts>>
    : VariantDefinition<Alts>;

// ============================================================================
// Resolution
// ============================================================================

type Operation = "construct" | "assign" | "emplace";

interface Resolution {
  readonly index: number;
  readonly kind: ResolutionKind;
  readonly input: string;
  /** Produces a fresh value for the selected alternative */
  readonly build: () => unknown;
}

function resolveConversion(definition: DefinitionCore, value: unknown): Resolution {
  if (value instanceof Variant) {
    throw new VariantDefinitionError(
      "variant_not_allowed",
      `A variant cannot be converted into ${definition.name}; use copy() or move()`,
    );
  }
  if (isInPlaceTag(value)) {
    throw new VariantDefinitionError(
      "tag_not_allowed",
      `In-place tags select an alternative through inPlace() or emplace(), not conversion`,
    );
  }

  const list = definition.alternatives;
  const input = describeValue(value);

  const exact = firstMatching(isExactly, value, list);
  if (exact < list.length) {
    const alt = list[exact];
    return { index: exact, kind: "exact", input, build: () => cloneOf(alt, value) };
  }

  const index =
    config.getConversionRule() === "first"
      ? findMatchingType(isConvertible, value, list)
      : findUniqueMatchingType(isConvertible, value, list);
  const alt = list[index];
  const { convert } = alt;
  if (convert === undefined) {
    throw new VariantDefinitionError(
      "invalid_alternative",
      `Alternative '${alt.name}' accepts ${input} but defines no convert()`,
    );
  }
  return { index, kind: "conversion", input, build: () => convert.call(alt, value) };
}

function resolveTarget(
  definition: DefinitionCore,
  target: number | AnyAlternative,
  args: readonly unknown[],
): Resolution {
  const list = definition.alternatives;
  const index = indexFor(target, list);
  const alt = list[index];
  const input = args.map((arg) => describeValue(arg)).join(", ");
  const kind: ResolutionKind = typeof target === "number" ? "in-place-index" : "in-place-type";

  const { construct } = alt;
  if (construct !== undefined) {
    return { index, kind, input, build: () => construct.apply(alt, [...args]) };
  }
  if (args.length === 1 && alt.is(args[0])) {
    const source = args[0];
    return { index, kind, input, build: () => cloneOf(alt, source) };
  }
  throw new VariantDefinitionError(
    "not_constructible",
    `Alternative '${alt.name}' of ${definition.name} cannot be constructed from (${input})`,
  );
}

function trace(definition: DefinitionCore, resolution: Resolution, operation: Operation): void {
  const alt = definition.alternatives[resolution.index];
  globalTracer.record({
    kind: resolution.kind,
    variant: definition.name,
    input: resolution.input,
    resolvedTo: { index: resolution.index, name: alt.name },
    operation,
  });
  log.debug(
    `${definition.name}: ${operation}(${resolution.input}) → '${alt.name}' (index ${resolution.index}, ${resolution.kind})`,
  );
}

// ============================================================================
// Storage Transitions
// ============================================================================

function buildValue(definition: DefinitionCore, index: number, build: () => unknown): unknown {
  try {
    return build();
  } catch (error) {
    throw new VariantConstructionError(index, definition.alternatives[index].name, error);
  }
}

/** Release the live value; the variant is valueless before `destroy` runs. */
function destroyCurrent(storage: VariantStorage): void {
  const alt = activeAlternative(storage);
  if (alt === undefined) return;
  const value = storage.value;
  storage.index = VALUELESS;
  storage.value = undefined;
  destroyOf(alt, value);
}

/**
 * Destroy the live value, then build the new one. A failed build leaves the
 * variant valueless.
 */
function replace(
  storage: VariantStorage,
  index: number,
  build: () => unknown,
  operation: Operation,
  input: string,
): void {
  destroyCurrent(storage);
  const { definition } = storage;
  const alt = definition.alternatives[index];
  try {
    storage.value = build();
    storage.index = index;
  } catch (error) {
    globalTracer.record({ kind: "valueless", variant: definition.name, input, operation });
    log.warn(`${definition.name} is valueless: constructing '${alt.name}' from (${input}) failed`);
    throw new VariantConstructionError(index, alt.name, error);
  }
}

// ============================================================================
// Variant
// ============================================================================

/**
 * A value of one of the alternatives in `Alts`.
 *
 * Instances come from a `VariantDefinition` (`create`, `from`, `copy`,
 * `move`, `inPlace`).
 */
export class Variant<Alts extends AnyAlternative[]> implements AnyVariant {
  readonly [STORAGE]: VariantStorage;

  /** @internal */
  constructor(
    readonly definition: VariantDefinition<Alts>,
    index: number,
    value: unknown,
  ) {
    this[STORAGE] = { index, value, definition };
  }

  /** Index of the active alternative, or `VALUELESS` (-1). */
  index(): number {
    return this[STORAGE].index;
  }

  valueless(): boolean {
    return this[STORAGE].index === VALUELESS;
  }

  holds(alt: Alts[number]): boolean {
    const storage = this[STORAGE];
    return storage.index === indexFor(alt, storage.definition.alternatives);
  }

  // ==========================================================================
  // Assignment
  // ==========================================================================

  /** Converting assignment; resolves like `from`. */
  assign(value: InputOf<Alts[number]>): this {
    const storage = this[STORAGE];
    const resolution = resolveConversion(storage.definition, value);
    trace(storage.definition, resolution, "assign");

    if (resolution.index === storage.index) {
      const alt = storage.definition.alternatives[resolution.index];
      const source =
        resolution.kind === "exact"
          ? value
          : buildValue(storage.definition, resolution.index, resolution.build);
      storage.value = assignOf(alt, storage.value, source);
    } else {
      replace(storage, resolution.index, resolution.build, "assign", resolution.input);
    }
    return this;
  }

  /** Copy assignment; `other` is left unchanged. */
  copyFrom(other: Variant<Alts>): this {
    if (other === this) return this;
    const storage = this[STORAGE];
    const source = other[STORAGE];
    requireSameDefinition(storage, source);

    const alt = activeAlternative(source);
    if (alt === undefined) {
      destroyCurrent(storage);
      return this;
    }
    const value = source.value;
    if (source.index === storage.index) {
      storage.value = assignOf(alt, storage.value, value);
    } else {
      replace(storage, source.index, () => cloneOf(alt, value), "assign", describeValue(value));
    }
    return this;
  }

  /** Move assignment; `other` keeps its index and whatever `move` left behind. */
  moveFrom(other: Variant<Alts>): this {
    if (other === this) return this;
    const storage = this[STORAGE];
    const source = other[STORAGE];
    requireSameDefinition(storage, source);

    const alt = activeAlternative(source);
    if (alt === undefined) {
      destroyCurrent(storage);
      return this;
    }
    const value = source.value;
    const input = describeValue(value);
    if (source.index === storage.index) {
      const moved = moveOf(alt, value);
      storage.value = alt.assign ? alt.assign(storage.value, moved) : moved;
    } else {
      replace(storage, source.index, () => moveOf(alt, value), "assign", input);
    }
    return this;
  }

  /**
   * Destroy the live value and construct alternative `target` in place from
   * `args`. Returns the new value.
   */
  emplace<I extends IndexOf<Alts>>(index: I, ...args: ArgsAt<Alts, I>): ValueAt<Alts, I>;
  emplace<A extends Alts[number]>(alt: A, ...args: ArgsOf<A>): ValueOf<A>;
  emplace(target: number | AnyAlternative, ...args: unknown[]): unknown {
    const storage = this[STORAGE];
    const resolution = resolveTarget(storage.definition, target, args);
    trace(storage.definition, resolution, "emplace");
    replace(storage, resolution.index, resolution.build, "emplace", resolution.input);
    return storage.value;
  }

  swap(other: Variant<Alts>): void {
    if (other === this) return;
    const mine = this[STORAGE];
    const theirs = other[STORAGE];
    requireSameDefinition(mine, theirs);

    const { index, value } = mine;
    mine.index = theirs.index;
    mine.value = theirs.value;
    theirs.index = index;
    theirs.value = value;
  }

  /** Release the live value; a no-op when valueless. */
  destroy(): void {
    destroyCurrent(this[STORAGE]);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  clone(): Variant<Alts> {
    return this.definition.copy(this);
  }

  visit<V extends Visitor<[Variant<Alts>]>>(visitor: V): VisitResult<V>;
  visit(visitor: object): unknown {
    return dispatchVisit(visitor, [this]);
  }

  equals(other: Variant<Alts>): boolean {
    return equalsVariants(this, other);
  }

  compare(other: Variant<Alts>): Ordering {
    return compareVariants(this, other);
  }

  toString(): string {
    const storage = this[STORAGE];
    const alt = activeAlternative(storage);
    const content = alt === undefined ? "<valueless>" : `${alt.name}: ${describeValue(storage.value)}`;
    return `${storage.definition.name}(${content})`;
  }
}

export function isVariant(value: unknown): value is AnyVariant {
  return value instanceof Variant;
}

// ============================================================================
// Definition
// ============================================================================

/**
 * The constructors and metadata of one variant type. Obtained from
 * `defineVariant`.
 */
export class VariantDefinition<Alts extends AnyAlternative[]> {
  /** Display name, e.g. `Variant<number, string>` */
  readonly name: string;
  readonly size: Alts["length"];

  /** @internal */
  constructor(readonly alternatives: Alts) {
    this.name = listName(alternatives);
    this.size = alternatives.length;
    Object.freeze(this);
  }

  /** Default construction: index 0 holding the first alternative's default value. */
  create(..._guard: DefaultGuard<Alts>): Variant<Alts> {
    const first = this.alternatives[0];
    const { construct } = first;
    if (construct === undefined || construct.length > 0) {
      throw new VariantDefinitionError(
        "not_default_constructible",
        `${this.name} cannot be default-constructed: '${first.name}' has no zero-argument construct()`,
      );
    }
    log.debug(`${this.name}: default-constructing '${first.name}'`);
    return new Variant<Alts>(this, 0, buildValue(this, 0, () => construct.call(first)));
  }

  /**
   * Converting construction. An alternative whose type the value already has
   * wins (first in declaration order); otherwise the value is converted by
   * the alternative that accepts it, under the configured conversion rule.
   */
  from(value: InputOf<Alts[number]>): Variant<Alts> {
    const resolution = resolveConversion(this, value);
    trace(this, resolution, "construct");
    return this.instantiate(resolution);
  }

  copy(other: Variant<Alts>): Variant<Alts> {
    const storage = this.requireOwn(other);
    const alt = activeAlternative(storage);
    if (alt === undefined) return new Variant<Alts>(this, VALUELESS, undefined);
    const value = storage.value;
    return new Variant<Alts>(
      this,
      storage.index,
      buildValue(this, storage.index, () => cloneOf(alt, value)),
    );
  }

  /** Move construction; `other` keeps its index and whatever `move` left behind. */
  move(other: Variant<Alts>): Variant<Alts> {
    const storage = this.requireOwn(other);
    const alt = activeAlternative(storage);
    if (alt === undefined) return new Variant<Alts>(this, VALUELESS, undefined);
    const value = storage.value;
    return new Variant<Alts>(
      this,
      storage.index,
      buildValue(this, storage.index, () => moveOf(alt, value)),
    );
  }

  /**
   * In-place construction of the alternative selected by the tag, bypassing
   * conversion.
   */
  inPlace<I extends IndexOf<Alts>>(tag: InPlaceIndex<I>, ...args: ArgsAt<Alts, I>): Variant<Alts>;
  inPlace<A extends Alts[number]>(tag: InPlaceType<A>, ...args: ArgsOf<A>): Variant<Alts>;
  inPlace(tag: InPlaceTag, ...args: unknown[]): Variant<Alts> {
    const target = tag instanceof InPlaceIndex ? tag.index : tag.alternative;
    const resolution = resolveTarget(this, target, args);
    trace(this, resolution, "construct");
    return this.instantiate(resolution);
  }

  alternativeAt<I extends IndexOf<Alts>>(index: I): Alts[I];
  alternativeAt(index: number): AnyAlternative {
    return this.alternatives[indexFor(index, this.alternatives)];
  }

  /** Position of `alt`, or `size` when it is not an alternative. */
  indexOf(alt: AnyAlternative): number {
    return position(alt, this.alternatives);
  }

  isVariant(value: unknown): value is Variant<Alts> {
    return value instanceof Variant && value.definition === this;
  }

  toString(): string {
    return this.name;
  }

  private instantiate(resolution: Resolution): Variant<Alts> {
    return new Variant<Alts>(
      this,
      resolution.index,
      buildValue(this, resolution.index, resolution.build),
    );
  }

  private requireOwn(other: Variant<Alts>): VariantStorage {
    const storage = other[STORAGE];
    if (storage.definition !== this) {
      throw new VariantDefinitionError(
        "definition_mismatch",
        `Cannot build a ${this.name} from a ${storage.definition.name} of another definition`,
      );
    }
    return storage;
  }
}

/**
 * Define a variant type over an ordered list of alternatives.
 *
 * @throws VariantDefinitionError when the list is empty, holds something that
 * is not a descriptor, or repeats an alternative name
 */
export function defineVariant<Alts extends [AnyAlternative, ...AnyAlternative[]]>(
  ...alternatives: Alts
): DefineResult<Alts>;
export function defineVariant(...alternatives: unknown[]): unknown {
  validateAlternatives(alternatives);
  return new VariantDefinition(alternatives);
}
