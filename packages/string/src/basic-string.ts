/**
 * BasicString
 *
 * A mutable string that forwards to the native string. Positions follow the
 * usual conventions: searches return `npos` (-1) when nothing is found, a
 * `count` of `npos` means "to the end", and a start position past the end
 * throws `StringRangeError`.
 */

import { EQ, GT, LT, type Ordering } from "@variantkit/variant";

/** "Not found" / "until the end". */
export const npos = -1;

/** Anything readable as a string without copying it first. */
export type StringView = string | BasicString;

export class StringRangeError extends RangeError {
  constructor(
    public readonly position: number,
    public readonly size: number,
    operation: string,
  ) {
    super(`${operation}: position ${position} is out of range for a string of size ${size}`);
    this.name = "StringRangeError";
  }
}

export function viewOf(sv: StringView): string {
  return typeof sv === "string" ? sv : sv.view();
}

/** `count` characters of `text` from `pos`; `npos` or an overlong count takes the rest. */
function slice(text: string, pos: number, count: number, operation: string): string {
  if (pos < 0 || pos > text.length) throw new StringRangeError(pos, text.length, operation);
  return count === npos ? text.slice(pos) : text.slice(pos, pos + count);
}

/** Last valid start for a backward search from `pos`. */
function backwardStart(pos: number, size: number): number {
  return pos === npos || pos >= size ? size - 1 : pos;
}

export class BasicString {
  static readonly npos = npos;

  private text: string;

  constructor(sv: StringView = "", pos = 0, count = npos) {
    this.text = slice(viewOf(sv), pos, count, "BasicString");
  }

  // ==========================================================================
  // Modifiers
  // ==========================================================================

  assign(sv: StringView, pos = 0, count = npos): this {
    this.text = slice(viewOf(sv), pos, count, "assign");
    return this;
  }

  append(sv: StringView, pos = 0, count = npos): this {
    this.text += slice(viewOf(sv), pos, count, "append");
    return this;
  }

  insert(at: number, sv: StringView, pos = 0, count = npos): this {
    if (at < 0 || at > this.text.length) throw new StringRangeError(at, this.text.length, "insert");
    const inserted = slice(viewOf(sv), pos, count, "insert");
    this.text = this.text.slice(0, at) + inserted + this.text.slice(at);
    return this;
  }

  /** Replace `length` characters from `at` with (a substring of) `sv`. */
  replace(at: number, length: number, sv: StringView, pos = 0, count = npos): this {
    const removed = slice(this.text, at, length, "replace");
    const replacement = slice(viewOf(sv), pos, count, "replace");
    this.text = this.text.slice(0, at) + replacement + this.text.slice(at + removed.length);
    return this;
  }

  clear(): void {
    this.text = "";
  }

  swap(other: BasicString): void {
    const text = this.text;
    this.text = other.text;
    other.text = text;
  }

  // ==========================================================================
  // Searches
  // ==========================================================================

  find(sv: StringView, pos = 0): number {
    if (pos > this.text.length) return npos;
    return this.text.indexOf(viewOf(sv), pos);
  }

  rfind(sv: StringView, pos = npos): number {
    const needle = viewOf(sv);
    const from = pos === npos ? this.text.length : Math.min(pos, this.text.length);
    return this.text.lastIndexOf(needle, from);
  }

  findFirstOf(sv: StringView, pos = 0): number {
    const set = viewOf(sv);
    for (let i = Math.max(0, pos); i < this.text.length; i++) {
      if (set.includes(this.text[i])) return i;
    }
    return npos;
  }

  findLastOf(sv: StringView, pos = npos): number {
    const set = viewOf(sv);
    for (let i = backwardStart(pos, this.text.length); i >= 0; i--) {
      if (set.includes(this.text[i])) return i;
    }
    return npos;
  }

  findFirstNotOf(sv: StringView, pos = 0): number {
    const set = viewOf(sv);
    for (let i = Math.max(0, pos); i < this.text.length; i++) {
      if (!set.includes(this.text[i])) return i;
    }
    return npos;
  }

  findLastNotOf(sv: StringView, pos = npos): number {
    const set = viewOf(sv);
    for (let i = backwardStart(pos, this.text.length); i >= 0; i--) {
      if (!set.includes(this.text[i])) return i;
    }
    return npos;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  substr(pos = 0, count = npos): BasicString {
    return new BasicString(slice(this.text, pos, count, "substr"));
  }

  /**
   * Three-way comparison by code unit.
   *
   * `compare(sv)` compares the whole string; `compare(at, length, sv, pos?, count?)`
   * compares a substring of this string with (a substring of) `sv`.
   */
  compare(sv: StringView): Ordering;
  compare(at: number, length: number, sv: StringView, pos?: number, count?: number): Ordering;
  compare(
    first: StringView | number,
    length = npos,
    sv: StringView = "",
    pos = 0,
    count = npos,
  ): Ordering {
    if (typeof first !== "number") return compareText(this.text, viewOf(first));
    return compareText(
      slice(this.text, first, length, "compare"),
      slice(viewOf(sv), pos, count, "compare"),
    );
  }

  equals(sv: StringView): boolean {
    return this.text === viewOf(sv);
  }

  at(pos: number): string {
    if (pos < 0 || pos >= this.text.length) throw new StringRangeError(pos, this.text.length, "at");
    return this.text[pos];
  }

  size(): number {
    return this.text.length;
  }

  empty(): boolean {
    return this.text.length === 0;
  }

  view(): string {
    return this.text;
  }

  toString(): string {
    return this.text;
  }
}

function compareText(a: string, b: string): Ordering {
  return a < b ? LT : a > b ? GT : EQ;
}

export function swap(a: BasicString, b: BasicString): void {
  a.swap(b);
}
