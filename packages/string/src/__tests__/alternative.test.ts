import { describe, it, expect } from "vitest";
import { Alt, defineVariant, get, lessThan } from "@variantkit/variant";
import { BasicString, basicStringAlternative } from "../index.js";

const Text = defineVariant(Alt.integer, basicStringAlternative);

describe("basicStringAlternative", () => {
  it("converts plain strings when no alternative holds them", () => {
    const v = Text.from("abc");

    expect(v.index()).toBe(1);
    expect(get(v, basicStringAlternative).view()).toBe("abc");
  });

  it("leaves plain strings to an exact match", () => {
    const Mixed = defineVariant(basicStringAlternative, Alt.string);

    expect(Mixed.from("abc").index()).toBe(1);
    expect(Mixed.from(new BasicString("abc")).index()).toBe(0);
  });

  it("is default-constructible", () => {
    const Mixed = defineVariant(basicStringAlternative, Alt.string);
    const v = Mixed.create();

    expect(v.index()).toBe(0);
    expect(get(v, 0).empty()).toBe(true);
  });

  it("assigns into the live string", () => {
    const v = Text.from("abc");
    const live = get(v, basicStringAlternative);

    v.assign("xyz");

    expect(live.view()).toBe("xyz");
    expect(get(v, basicStringAlternative)).toBe(live);
  });

  it("copies independently and moves by emptying the source", () => {
    const original = Text.from("abc");
    const copy = original.clone();
    get(copy, basicStringAlternative).append("!");

    expect(get(original, 1).view()).toBe("abc");
    expect(get(copy, 1).view()).toBe("abc!");

    const moved = Text.move(original);
    expect(get(moved, 1).view()).toBe("abc");
    expect(get(original, 1).empty()).toBe(true);
  });

  it("orders by text within the alternative", () => {
    expect(lessThan(Text.from("abc"), Text.from("abd"))).toBe(true);
    expect(lessThan(Text.from(5), Text.from("a"))).toBe(true);
    expect(Text.from("same").equals(Text.from("same"))).toBe(true);
  });
});
