/**
 * @tokenloom/lexer
 *
 * Contextual TSX lexer: source text to a typed token sequence.
 *
 * @example
 * ```typescript
 * import { tokenize } from "@tokenloom/lexer";
 *
 * const tokens = tokenize("const x: number = 1;");
 * // keyword const, identifier x, colon :, type-name number, operator =, number 1, ...
 * ```
 */

export { tokenize, type TokenizeOptions } from "./lexer.js";
export { TokenStream, findValue } from "./token-stream.js";
