/**
 * Accessors
 *
 * Read and write access to the live value, selected by index or by
 * alternative descriptor. Read-only and mutable access are separate entry
 * points: `get` / `getIf` read, `getRef` / `getIfMut` hand out a reference
 * whose `set` assigns in place, and `take` moves the value out.
 *
 * Asking for an alternative that is not active throws `BadVariantAccess`
 * from the throwing forms and yields `null` from the `getIf*` forms. An index
 * out of range or a descriptor that is not an alternative of the variant is a
 * usage error (`VariantDefinitionError`) in every form.
 */

import { assignOf, moveOf, type AnyAlternative, type ValueOf } from "./alternative.js";
import { BadVariantAccess } from "./errors.js";
import { indexFor, type IndexOf, type ValueAt } from "./registry.js";
import { STORAGE, VALUELESS, type VariantStorage } from "./storage.js";
import type { AnyVariant, Variant } from "./variant.js";

// ============================================================================
// References
// ============================================================================

export interface ReadonlyAlternativeRef<T> {
  /** Index of the referenced alternative */
  readonly index: number;
  /** Name of the referenced alternative */
  readonly alternative: string;
  /**
   * Current value.
   * @throws BadVariantAccess once the alternative is no longer active
   */
  get(): T;
}

export interface AlternativeRef<T> extends ReadonlyAlternativeRef<T> {
  /**
   * Assign through the alternative's `assign` hook.
   * @throws BadVariantAccess once the alternative is no longer active
   */
  set(value: T): void;
}

function requireActive(storage: VariantStorage, index: number): void {
  if (storage.index === index) return;

  const { definition } = storage;
  const expected = definition.alternatives[index].name;
  if (storage.index === VALUELESS) {
    throw new BadVariantAccess(
      "Valueless",
      index,
      VALUELESS,
      `Bad variant access: requested '${expected}' (index ${index}) but ${definition.name} is valueless`,
    );
  }
  const actual = definition.alternatives[storage.index].name;
  throw new BadVariantAccess(
    "WrongAlternative",
    index,
    storage.index,
    `Bad variant access: requested '${expected}' (index ${index}) but '${actual}' (index ${storage.index}) is active`,
  );
}

function makeRef(storage: VariantStorage, index: number): AlternativeRef<unknown> {
  const alt = storage.definition.alternatives[index];
  return {
    index,
    alternative: alt.name,
    get: () => {
      requireActive(storage, index);
      return storage.value;
    },
    set: (value) => {
      requireActive(storage, index);
      storage.value = assignOf(alt, storage.value, value);
    },
  };
}

function makeReadonlyRef(storage: VariantStorage, index: number): ReadonlyAlternativeRef<unknown> {
  const { get, alternative } = makeRef(storage, index);
  return { index, alternative, get };
}

function targetIndex(variant: AnyVariant, target: number | AnyAlternative): number {
  return indexFor(target, variant[STORAGE].definition.alternatives);
}

// ============================================================================
// Throwing Access
// ============================================================================

/**
 * The live value of the selected alternative.
 *
 * @throws BadVariantAccess when another alternative is active or the variant is valueless
 */
export function get<Alts extends AnyAlternative[], I extends IndexOf<Alts>>(
  variant: Variant<Alts>,
  index: I,
): ValueAt<Alts, I>;
export function get<Alts extends AnyAlternative[], A extends Alts[number]>(
  variant: Variant<Alts>,
  alt: A,
): ValueOf<A>;
export function get(variant: AnyVariant, target: number | AnyAlternative): unknown {
  const index = targetIndex(variant, target);
  const storage = variant[STORAGE];
  requireActive(storage, index);
  return storage.value;
}

/**
 * A mutable reference to the selected alternative.
 *
 * @throws BadVariantAccess when another alternative is active or the variant is valueless
 */
export function getRef<Alts extends AnyAlternative[], I extends IndexOf<Alts>>(
  variant: Variant<Alts>,
  index: I,
): AlternativeRef<ValueAt<Alts, I>>;
export function getRef<Alts extends AnyAlternative[], A extends Alts[number]>(
  variant: Variant<Alts>,
  alt: A,
): AlternativeRef<ValueOf<A>>;
export function getRef(
  variant: AnyVariant,
  target: number | AnyAlternative,
): AlternativeRef<unknown> {
  const index = targetIndex(variant, target);
  const storage = variant[STORAGE];
  requireActive(storage, index);
  return makeRef(storage, index);
}

/**
 * Move the live value out through the alternative's `move` hook. The variant
 * keeps its index and whatever `move` left behind.
 *
 * @throws BadVariantAccess when another alternative is active or the variant is valueless
 */
export function take<Alts extends AnyAlternative[], I extends IndexOf<Alts>>(
  variant: Variant<Alts>,
  index: I,
): ValueAt<Alts, I>;
export function take<Alts extends AnyAlternative[], A extends Alts[number]>(
  variant: Variant<Alts>,
  alt: A,
): ValueOf<A>;
export function take(variant: AnyVariant, target: number | AnyAlternative): unknown {
  const index = targetIndex(variant, target);
  const storage = variant[STORAGE];
  requireActive(storage, index);
  return moveOf(storage.definition.alternatives[index], storage.value);
}

// ============================================================================
// Non-Throwing Access
// ============================================================================

/**
 * A read-only reference to the selected alternative, or `null` when it is not
 * active.
 */
export function getIf<Alts extends AnyAlternative[], I extends IndexOf<Alts>>(
  variant: Variant<Alts>,
  index: I,
): ReadonlyAlternativeRef<ValueAt<Alts, I>> | null;
export function getIf<Alts extends AnyAlternative[], A extends Alts[number]>(
  variant: Variant<Alts>,
  alt: A,
): ReadonlyAlternativeRef<ValueOf<A>> | null;
export function getIf(
  variant: AnyVariant,
  target: number | AnyAlternative,
): ReadonlyAlternativeRef<unknown> | null {
  const index = targetIndex(variant, target);
  const storage = variant[STORAGE];
  return storage.index === index ? makeReadonlyRef(storage, index) : null;
}

/**
 * A mutable reference to the selected alternative, or `null` when it is not
 * active.
 */
export function getIfMut<Alts extends AnyAlternative[], I extends IndexOf<Alts>>(
  variant: Variant<Alts>,
  index: I,
): AlternativeRef<ValueAt<Alts, I>> | null;
export function getIfMut<Alts extends AnyAlternative[], A extends Alts[number]>(
  variant: Variant<Alts>,
  alt: A,
): AlternativeRef<ValueOf<A>> | null;
export function getIfMut(
  variant: AnyVariant,
  target: number | AnyAlternative,
): AlternativeRef<unknown> | null {
  const index = targetIndex(variant, target);
  const storage = variant[STORAGE];
  return storage.index === index ? makeRef(storage, index) : null;
}

/** Whether `alt` is the active alternative. */
export function holdsAlternative<Alts extends AnyAlternative[], A extends Alts[number]>(
  variant: Variant<Alts>,
  alt: A,
): boolean {
  return getIf(variant, alt) !== null;
}
