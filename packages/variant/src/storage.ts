/**
 * Variant storage: the discriminant and the single live value.
 *
 * Kept behind a module-private symbol so that accessors, visitation and
 * comparison can reach it without it being part of the public surface.
 */

import type { AnyAlternative } from "./alternative.js";
import { VariantDefinitionError } from "./errors.js";

/** Discriminant of a variant that holds no value. */
export const VALUELESS = -1;

export const STORAGE: unique symbol = Symbol("variantkit.storage");

/**
 * What storage needs to know about the definition it belongs to.
 */
export interface DefinitionCore {
  readonly name: string;
  readonly alternatives: readonly AnyAlternative[];
}

export interface VariantStorage {
  /** Active alternative index, or `VALUELESS` */
  index: number;
  /** Live value; `undefined` while valueless */
  value: unknown;
  readonly definition: DefinitionCore;
}

export interface StorageHolder {
  readonly [STORAGE]: VariantStorage;
}

/** Descriptor of the active alternative; `undefined` while valueless. */
export function activeAlternative(storage: VariantStorage): AnyAlternative | undefined {
  return storage.index === VALUELESS ? undefined : storage.definition.alternatives[storage.index];
}

/**
 * @throws VariantDefinitionError (`definition_mismatch`) unless both storages
 * belong to the same variant definition
 */
export function requireSameDefinition(a: VariantStorage, b: VariantStorage): void {
  if (a.definition !== b.definition) {
    throw new VariantDefinitionError(
      "definition_mismatch",
      `Cannot combine a ${a.definition.name} with a ${b.definition.name} from another definition`,
    );
  }
}
