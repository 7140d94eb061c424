import { describe, it, expect } from "vitest";
import {
  Alt,
  alternative,
  findMatchingType,
  findUniqueMatchingType,
  firstMatching,
  isConvertible,
  isExactly,
  isInRange,
  isUnique,
  occurrenceCount,
  position,
  sameAlternative,
  validateAlternatives,
  VariantDefinitionError,
} from "../index.js";
import type {
  HasDuplicate,
  Indices,
  IsInRange,
  IsUnique,
  OccurrenceCount,
  Position,
} from "../index.js";
import { reasonOf } from "./fixtures.js";

describe("Alternative Registry", () => {
  describe("position", () => {
    it("finds the first index of an alternative", () => {
      expect(position(Alt.string, [Alt.number, Alt.string, Alt.boolean])).toBe(1);
    });

    it("returns the list length when the alternative is absent", () => {
      expect(position(Alt.bigint, [Alt.number, Alt.string])).toBe(2);
    });

    it("matches descriptors by name", () => {
      const otherString = alternative<string, [value: string], never, "string">({
        name: "string",
        is: (value): value is string => typeof value === "string",
      });
      expect(sameAlternative(otherString, Alt.string)).toBe(true);
      expect(position(otherString, [Alt.number, Alt.string])).toBe(1);
    });
  });

  describe("occurrenceCount and isUnique", () => {
    it("counts entries satisfying the predicate", () => {
      expect(occurrenceCount(isConvertible, 3, [Alt.integer, Alt.bigint, Alt.string])).toBe(2);
      expect(occurrenceCount(isConvertible, 2.5, [Alt.integer, Alt.bigint, Alt.string])).toBe(1);
      expect(occurrenceCount(isExactly, "x", [Alt.integer, Alt.bigint, Alt.string])).toBe(1);
    });

    it("reports uniqueness", () => {
      expect(isUnique(Alt.string, [Alt.number, Alt.string])).toBe(true);
      expect(isUnique(Alt.boolean, [Alt.number, Alt.string])).toBe(false);
    });
  });

  describe("isInRange", () => {
    it("accepts integers in [0, n)", () => {
      expect(isInRange(0, 2)).toBe(true);
      expect(isInRange(1, 2)).toBe(true);
      expect(isInRange(2, 2)).toBe(false);
      expect(isInRange(-1, 2)).toBe(false);
      expect(isInRange(0.5, 2)).toBe(false);
    });
  });

  describe("findMatchingType", () => {
    it("returns the first matching entry in declaration order", () => {
      expect(findMatchingType(isConvertible, 3, [Alt.string, Alt.integer, Alt.bigint])).toBe(1);
      expect(firstMatching(isExactly, true, [Alt.number, Alt.boolean])).toBe(1);
    });

    it("fails when nothing matches", () => {
      expect(() => findMatchingType(isExactly, true, [Alt.number, Alt.string])).toThrow(
        "No alternative of Variant<number, string> matches true",
      );
      expect(firstMatching(isExactly, true, [Alt.number, Alt.string])).toBe(2);
    });

    it("requires a unique match when asked to", () => {
      expect(findUniqueMatchingType(isConvertible, 2.5, [Alt.string, Alt.integer, Alt.bigint])).toBe(
        1,
      );
      expect(
        reasonOf(() => findUniqueMatchingType(isConvertible, 3, [Alt.string, Alt.integer, Alt.bigint])),
      ).toBe("ambiguous_conversion");
    });
  });

  describe("validateAlternatives", () => {
    it("rejects an empty list", () => {
      expect(reasonOf(() => validateAlternatives([]))).toBe("empty_alternative_list");
    });

    it("rejects entries that are not descriptors", () => {
      expect(reasonOf(() => validateAlternatives([Alt.number, { name: "broken" }]))).toBe(
        "invalid_alternative",
      );
    });

    it("rejects names containing a comma", () => {
      const joined = { name: "x,y", is: (value: unknown): value is string => typeof value === "string" };
      expect(reasonOf(() => validateAlternatives([Alt.number, joined]))).toBe("invalid_alternative");
    });

    it("rejects duplicate names", () => {
      expect(() => validateAlternatives([Alt.number, Alt.string, Alt.number])).toThrow(
        VariantDefinitionError,
      );
      expect(reasonOf(() => validateAlternatives([Alt.number, Alt.number]))).toBe(
        "duplicate_alternative",
      );
    });

    it("accepts distinct descriptors", () => {
      expect(() => validateAlternatives([Alt.monostate, Alt.number, Alt.string])).not.toThrow();
    });
  });

  describe("type-level counterparts", () => {
    it("agree with the run-time lookups", () => {
      const found: Position<"string", ["number", "string"]> = 1;
      const missing: Position<"bigint", ["number", "string"]> = 2;
      const twice: OccurrenceCount<"a", ["a", "b", "a"]> = 2;
      const unique: IsUnique<"b", ["a", "b", "a"]> = true;
      const repeated: IsUnique<"a", ["a", "b", "a"]> = false;
      const inRange: IsInRange<1, 2> = true;
      const outOfRange: IsInRange<2, 2> = false;
      const indices: Indices<[unknown, unknown, unknown]>[] = [0, 1, 2];
      const duplicate: HasDuplicate<["a", "b", "a"]> = true;
      const distinct: HasDuplicate<["a", "b"]> = false;

      expect([found, missing, twice]).toEqual([1, 2, 2]);
      expect([unique, repeated, inRange, outOfRange, duplicate, distinct]).toEqual([
        true,
        false,
        true,
        false,
        true,
        false,
      ]);
      expect(indices).toEqual([0, 1, 2]);
    });
  });
});
