/**
 * tokenloom
 *
 * Umbrella package: the lexer, the pattern language and the dispatcher in one
 * import.
 *
 * @example
 * ```typescript
 * import { tokenize, compile, tryMatch } from "tokenloom";
 *
 * const call = compile("(\\i) \\Bp");
 * tryMatch(call, tokenize("foo(a, (b + c))"), 0)?.valueAt(0); // "foo"
 * ```
 */

export * from "@tokenloom/core";
export * from "@tokenloom/lexer";
export * from "@tokenloom/pattern";
export * from "@tokenloom/dispatch";
