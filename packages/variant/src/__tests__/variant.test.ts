import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { config } from "@variantkit/core";
import {
  Alt,
  alternative,
  defineVariant,
  get,
  getIf,
  inPlaceIndex,
  inPlaceType,
  isVariant,
  monostate,
  swap,
  VALUELESS,
  VariantConstructionError,
  VariantDefinitionError,
} from "../index.js";
import {
  Code,
  Label,
  code,
  createLog,
  fragile,
  label,
  Pair,
  pair,
  reasonOf,
  Tracked,
  trackedAlternative,
} from "./fixtures.js";

describe("Variant Core", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  // ==========================================================================
  // Definition
  // ==========================================================================

  describe("defineVariant", () => {
    it("describes its alternatives", () => {
      const Value = defineVariant(Alt.integer, Alt.string);

      expect(Value.name).toBe("Variant<integer, string>");
      expect(Value.size).toBe(2);
      expect(Value.alternatives).toEqual([Alt.integer, Alt.string]);
      expect(Value.alternativeAt(1)).toBe(Alt.string);
      expect(Value.indexOf(Alt.string)).toBe(1);
      expect(Value.indexOf(Alt.boolean)).toBe(2);
      expect(String(Value)).toBe("Variant<integer, string>");
    });

    it("rejects an out-of-range alternative index", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      expect(reasonOf(() => Reflect.apply(Value.alternativeAt, Value, [2]))).toBe(
        "index_out_of_range",
      );
    });

    it("rejects duplicate alternatives", () => {
      expect(() => Reflect.apply(defineVariant, undefined, [Alt.number, Alt.number])).toThrow(
        "Alternative 'number' appears more than once",
      );
    });

    it("rejects an empty alternative list", () => {
      expect(reasonOf(() => Reflect.apply(defineVariant, undefined, []))).toBe(
        "empty_alternative_list",
      );
    });

    it("recognises its own variants", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      const Other = defineVariant(Alt.integer, Alt.string);
      const v = Value.create();

      expect(Value.isVariant(v)).toBe(true);
      expect(Other.isVariant(v)).toBe(false);
      expect(isVariant(v)).toBe(true);
      expect(isVariant(0)).toBe(false);
    });
  });

  // ==========================================================================
  // Construction
  // ==========================================================================

  describe("default construction", () => {
    it("holds the first alternative's default value", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      const v = Value.create();

      expect(v.index()).toBe(0);
      expect(v.valueless()).toBe(false);
      expect(get(v, 0)).toBe(0);
    });

    it("works with a leading monostate when the other alternative needs arguments", () => {
      const Shape = defineVariant(Alt.monostate, pair);
      const v = Shape.create();

      expect(v.index()).toBe(0);
      expect(get(v, Alt.monostate)).toBe(monostate);
    });

    it("fails when the first alternative needs arguments", () => {
      const Shape = defineVariant(pair, Alt.monostate);
      expect(reasonOf(() => Reflect.apply(Shape.create, Shape, []))).toBe(
        "not_default_constructible",
      );
    });
  });

  describe("converting construction", () => {
    it("selects the alternative whose type matches exactly", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      const v = Value.from("abc");

      expect(v.index()).toBe(1);
      expect(get(v, Alt.string)).toBe("abc");
      expect(getIf(v, Alt.integer)).toBeNull();
    });

    it("prefers an exact match over an earlier convertible alternative", () => {
      const Value = defineVariant(Alt.bigint, Alt.integer);
      const v = Value.from(5);

      expect(v.index()).toBe(1);
      expect(get(v, Alt.integer)).toBe(5);
    });

    it("takes the first exact match in declaration order", () => {
      const Value = defineVariant(Alt.number, Alt.integer);
      expect(Value.from(3).index()).toBe(0);
    });

    it("converts when no alternative matches exactly", () => {
      const Value = defineVariant(Alt.bigint, Alt.string);
      const v = Value.from(5);

      expect(v.index()).toBe(0);
      expect(get(v, Alt.bigint)).toBe(5n);
    });

    it("rejects an ambiguous conversion by default", () => {
      const Text = defineVariant(code, label);
      expect(reasonOf(() => Text.from("ABC"))).toBe("ambiguous_conversion");
    });

    it("takes the first convertible alternative under the 'first' rule", () => {
      config.set({ resolution: { conversion: "first" } });
      const Text = defineVariant(code, label);
      const v = Text.from("ABC");

      expect(v.index()).toBe(0);
      expect(get(v, code)).toEqual(new Code("ABC"));
    });

    it("rejects a value no alternative accepts", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      expect(reasonOf(() => Reflect.apply(Value.from, Value, [true]))).toBe(
        "no_matching_alternative",
      );
    });

    it("rejects variants and in-place tags", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      const other = Value.create();

      expect(reasonOf(() => Reflect.apply(Value.from, Value, [other]))).toBe("variant_not_allowed");
      expect(reasonOf(() => Reflect.apply(Value.from, Value, [inPlaceIndex(0)]))).toBe(
        "tag_not_allowed",
      );
    });

    it("resolves with defaults when no configuration file is present", () => {
      const v = defineVariant(Alt.integer, Alt.string).from("abc");

      expect(v.index()).toBe(1);
      expect(config.getConfigFilePath()).toBeUndefined();
    });

    it("reports a failed conversion as a construction error", () => {
      const Value = defineVariant(Alt.integer, code);
      expect(() => Value.from("bad1")).toThrow(
        "Failed to construct alternative 'code' (index 1): invalid code: bad1",
      );
    });
  });

  describe("in-place construction", () => {
    it("constructs by index", () => {
      const Value = defineVariant(Alt.integer, Alt.number);
      const v = Value.inPlace(inPlaceIndex(1), 10.5);

      expect(v.index()).toBe(1);
      expect(get(v, 1)).toBe(10.5);
    });

    it("constructs by alternative from a sequence literal", () => {
      const items = Alt.array("items", Alt.number);
      const Value = defineVariant(Alt.string, items);
      const literal = [1, 2, 3];
      const v = Value.inPlace(inPlaceType(items), literal);

      expect(v.index()).toBe(1);
      expect(get(v, items)).toEqual([1, 2, 3]);
      expect(get(v, items)).not.toBe(literal);
    });

    it("constructs with several arguments", () => {
      const Shape = defineVariant(Alt.monostate, pair);
      const v = Shape.inPlace(inPlaceType(pair), 3, 4);

      expect(get(v, pair).x).toBe(3);
      expect(get(v, pair).y).toBe(4);
    });

    it("yields the requested index for every alternative", () => {
      const Value = defineVariant(Alt.integer, Alt.string, Alt.boolean);

      expect(Value.inPlace(inPlaceIndex(0)).index()).toBe(0);
      expect(Value.inPlace(inPlaceIndex(1)).index()).toBe(1);
      expect(Value.inPlace(inPlaceIndex(2)).index()).toBe(2);
    });

    it("rejects an index out of range and a foreign alternative", () => {
      const Value = defineVariant(Alt.integer, Alt.string);

      expect(reasonOf(() => Reflect.apply(Value.inPlace, Value, [inPlaceIndex(2)]))).toBe(
        "index_out_of_range",
      );
      expect(
        reasonOf(() => Reflect.apply(Value.inPlace, Value, [inPlaceType(Alt.boolean), true])),
      ).toBe("unknown_alternative");
    });

    it("copies a single value of the alternative's own type when it has no construct()", () => {
      const text = alternative<string, [value: string], never, "text">({
        name: "text",
        is: (value): value is string => typeof value === "string",
      });
      const Value = defineVariant(Alt.integer, text);
      const v = Value.inPlace(inPlaceType(text), "x");

      expect(v.index()).toBe(1);
      expect(get(v, text)).toBe("x");
      expect(reasonOf(() => Reflect.apply(Value.inPlace, Value, [inPlaceType(text), 5]))).toBe(
        "not_constructible",
      );
    });
  });

  describe("copy and move construction", () => {
    it("copies have value semantics", () => {
      const items = Alt.array("items", Alt.number);
      const Value = defineVariant(Alt.string, items);
      const source = Value.inPlace(inPlaceType(items), [1, 2]);
      const copy = Value.copy(source);

      get(source, items).push(3);
      source.assign("changed");

      expect(copy.index()).toBe(1);
      expect(get(copy, items)).toEqual([1, 2]);
      expect(source.clone().index()).toBe(0);
    });

    it("moves leave the source holding what move() left behind", () => {
      const items = Alt.array("items", Alt.number);
      const Value = defineVariant(Alt.string, items);
      const source = Value.inPlace(inPlaceType(items), [1, 2, 3]);
      const moved = Value.move(source);

      expect(get(moved, items)).toEqual([1, 2, 3]);
      expect(source.index()).toBe(1);
      expect(get(source, items)).toEqual([]);
    });

    it("rejects variants of another definition", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      const Other = defineVariant(Alt.integer, Alt.string);
      expect(reasonOf(() => Value.copy(Other.create()))).toBe("definition_mismatch");
    });
  });

  // ==========================================================================
  // Assignment
  // ==========================================================================

  describe("assignment", () => {
    it("tracks the index across assignments", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      const v = Value.create();

      v.assign("abc");
      expect(v.index()).toBe(1);
      v.assign(42);
      expect(v.index()).toBe(0);
      expect(get(v, 0)).toBe(42);
    });

    it("assigns in place without destroying when the alternative stays the same", () => {
      const log = createLog();
      const tracked = trackedAlternative(log);
      const Value = defineVariant(tracked, Alt.string);
      const v = Value.inPlace(inPlaceType(tracked), "a");

      v.assign(new Tracked("b"));

      expect(log.destroyed).toEqual([]);
      expect(log.assigned).toEqual(["a<-b"]);
      expect(get(v, tracked).label).toBe("b");
    });

    it("wraps a failed conversion into the active alternative and keeps the old value", () => {
      const Value = defineVariant(Alt.integer, code);
      const v = Value.from("ABC");

      expect(() => v.assign("bad")).toThrow(VariantConstructionError);
      expect(() => v.assign("bad")).toThrow(
        "Failed to construct alternative 'code' (index 1): invalid code: bad",
      );
      expect(v.index()).toBe(1);
      expect(get(v, code).text).toBe("ABC");
    });

    it("destroys the old value when the alternative changes", () => {
      const log = createLog();
      const tracked = trackedAlternative(log);
      const Value = defineVariant(tracked, Alt.string);
      const v = Value.inPlace(inPlaceType(tracked), "a");

      v.assign("text");

      expect(log.destroyed).toEqual(["a"]);
      expect(get(v, Alt.string)).toBe("text");
    });

    it("leaves the variant valueless when building the new value fails", () => {
      const Value = defineVariant(Alt.integer, code);
      const v = Value.from(1);

      let caught: unknown;
      try {
        v.assign("bad1");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(VariantConstructionError);
      expect(caught instanceof VariantConstructionError && caught.alternative).toBe("code");
      expect(caught instanceof Error && caught.cause instanceof Error && caught.cause.message).toBe(
        "invalid code: bad1",
      );
      expect(v.valueless()).toBe(true);
      expect(v.index()).toBe(VALUELESS);
    });

    it("recovers from the valueless state on the next assignment", () => {
      const Value = defineVariant(Alt.integer, code);
      const v = Value.from(1);
      expect(() => v.assign("bad1")).toThrow(VariantConstructionError);

      v.assign("GOOD");

      expect(v.index()).toBe(1);
      expect(get(v, code).text).toBe("GOOD");
    });

    it("copy-assigns through the alternative's assign hook", () => {
      const items = Alt.array("items", Alt.number);
      const Value = defineVariant(Alt.string, items);
      const target = Value.inPlace(inPlaceType(items), [9]);
      const storage = get(target, items);

      target.copyFrom(Value.inPlace(inPlaceType(items), [1, 2]));

      expect(get(target, items)).toBe(storage);
      expect(storage).toEqual([1, 2]);
    });

    it("copy-assigns across alternatives", () => {
      const log = createLog();
      const tracked = trackedAlternative(log);
      const Value = defineVariant(tracked, Alt.string);
      const target = Value.inPlace(inPlaceType(tracked), "old");

      target.copyFrom(Value.from("new"));

      expect(log.destroyed).toEqual(["old"]);
      expect(get(target, 1)).toBe("new");
    });

    it("move-assigns and empties the source", () => {
      const items = Alt.array("items", Alt.number);
      const Value = defineVariant(Alt.string, items);
      const target = Value.from("text");
      const source = Value.inPlace(inPlaceType(items), [4, 5]);

      target.moveFrom(source);

      expect(get(target, items)).toEqual([4, 5]);
      expect(source.index()).toBe(1);
      expect(get(source, items)).toEqual([]);
    });

    it("becomes valueless when copying a valueless variant", () => {
      const Value = defineVariant(Alt.integer, fragile);
      const broken = Value.create();
      expect(() => broken.emplace(fragile, 1, true)).toThrow(VariantConstructionError);

      const target = Value.from(7);
      target.copyFrom(broken);

      expect(target.valueless()).toBe(true);
      expect(Value.copy(broken).valueless()).toBe(true);
    });

    it("ignores self-assignment", () => {
      const log = createLog();
      const tracked = trackedAlternative(log);
      const Value = defineVariant(tracked, Alt.string);
      const v = Value.inPlace(inPlaceType(tracked), "self");

      v.copyFrom(v);
      v.moveFrom(v);

      expect(log.destroyed).toEqual([]);
      expect(log.assigned).toEqual([]);
      expect(get(v, tracked).label).toBe("self");
    });

    it("rejects variants of another definition", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      const Other = defineVariant(Alt.integer, Alt.string);
      expect(reasonOf(() => Value.create().copyFrom(Other.create()))).toBe("definition_mismatch");
    });
  });

  // ==========================================================================
  // emplace / swap / destroy
  // ==========================================================================

  describe("emplace", () => {
    it("constructs the new value in place and returns it", () => {
      const Shape = defineVariant(Alt.monostate, pair);
      const v = Shape.create();

      const created = v.emplace(pair, 1, 2);

      expect(v.index()).toBe(1);
      expect(get(v, pair)).toBe(created);
      expect(pair.equals?.(created, new Pair(1, 2))).toBe(true);
    });

    it("emplaces by index", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      const v = Value.create();

      expect(v.emplace(1, "hello")).toBe("hello");
      expect(v.index()).toBe(1);
    });

    it("always destroys the previous value, even for the same alternative", () => {
      const log = createLog();
      const tracked = trackedAlternative(log);
      const Value = defineVariant(tracked, Alt.string);
      const v = Value.inPlace(inPlaceType(tracked), "first");

      v.emplace(tracked, "second");

      expect(log.destroyed).toEqual(["first"]);
      expect(log.assigned).toEqual([]);
      expect(get(v, tracked).label).toBe("second");
    });

    it("leaves the variant valueless when construction fails", () => {
      const Value = defineVariant(Alt.integer, fragile);
      const v = Value.from(3);

      expect(() => v.emplace(fragile, 9, true)).toThrow(
        "Failed to construct alternative 'fragile' (index 1): fragile 9 refused",
      );
      expect(v.valueless()).toBe(true);

      v.emplace(fragile, 9);
      expect(get(v, fragile).id).toBe(9);
    });

    it("checks arguments before destroying anything", () => {
      const log = createLog();
      const tracked = trackedAlternative(log);
      const Value = defineVariant(tracked, Alt.instanceOf("label", Label, {}));
      const v = Value.inPlace(inPlaceType(tracked), "kept");

      expect(reasonOf(() => Reflect.apply(v.emplace, v, [5, "x"]))).toBe("index_out_of_range");
      expect(log.destroyed).toEqual([]);
      expect(v.index()).toBe(0);
    });
  });

  describe("swap", () => {
    it("exchanges index and value", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      const a = Value.from(1);
      const b = Value.from("b");

      a.swap(b);
      expect(get(a, Alt.string)).toBe("b");
      expect(get(b, Alt.integer)).toBe(1);

      swap(a, b);
      expect(get(a, Alt.integer)).toBe(1);
      expect(get(b, Alt.string)).toBe("b");
    });

    it("rejects variants of another definition", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      const Other = defineVariant(Alt.integer, Alt.string);
      expect(reasonOf(() => Value.create().swap(Other.create()))).toBe("definition_mismatch");
    });
  });

  describe("destroy", () => {
    it("destroys the live value once and leaves the variant valueless", () => {
      const log = createLog();
      const tracked = trackedAlternative(log);
      const Value = defineVariant(tracked, Alt.string);
      const v = Value.inPlace(inPlaceType(tracked), "gone");

      v.destroy();
      v.destroy();

      expect(log.destroyed).toEqual(["gone"]);
      expect(v.valueless()).toBe(true);
    });
  });

  describe("toString", () => {
    it("shows the active alternative and value", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      const v = Value.from("abc");

      expect(v.toString()).toBe('Variant<integer, string>(string: "abc")');
      v.destroy();
      expect(v.toString()).toBe("Variant<integer, string>(<valueless>)");
    });
  });

  describe("errors", () => {
    it("are VariantDefinitionErrors with a reason", () => {
      const Value = defineVariant(Alt.integer, Alt.string);
      let caught: unknown;
      try {
        Reflect.apply(Value.from, Value, [null]);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(VariantDefinitionError);
      expect(caught instanceof VariantDefinitionError && caught.name).toBe("VariantDefinitionError");
    });
  });
});
