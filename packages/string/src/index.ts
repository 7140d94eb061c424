/**
 * @variantkit/string: a forwarding string wrapper
 *
 * `BasicString` forwards its search, edit and comparison operations to the
 * native string; `basicStringAlternative` lets variants hold it.
 *
 * @example
 * ```typescript
 * import { BasicString, basicStringAlternative } from "@variantkit/string";
 * import { Alt, defineVariant } from "@variantkit/variant";
 *
 * const s = new BasicString("hello").append(", world");
 * s.find("world"); // 7
 *
 * const Text = defineVariant(Alt.monostate, basicStringAlternative);
 * Text.from("abc").index(); // 1
 * ```
 *
 * @packageDocumentation
 */

export { BasicString, StringRangeError, npos, swap, viewOf } from "./basic-string.js";
export type { StringView } from "./basic-string.js";
export { basicStringAlternative } from "./alternative.js";
