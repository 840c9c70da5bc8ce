/**
 * @tokenloom/pattern
 *
 * A regex-like pattern language over token sequences: a compiler from pattern
 * text to an immutable tree, and a backtracking matcher.
 *
 * @example
 * ```typescript
 * import { tokenize } from "@tokenloom/lexer";
 * import { compile, tryMatch } from "@tokenloom/pattern";
 *
 * const decl = compile('\\k"const" (?<name>\\i) "=" (.*?) ";"');
 * const match = tryMatch(decl, tokenize("const x = 1 + 2;"), 0);
 * match?.valueNamed("name"); // "x"
 * match?.valueAt(1);         // "1+2"
 * ```
 */

export { compile } from "./compiler.js";
export { tryMatch, findFirst, findAll } from "./matcher.js";
export { TokenMatch, type Capture } from "./match.js";
export { MACROS } from "./macros.js";
export { CLASS_SHORTHANDS, CONTEXT_SHORTHANDS, lookupClass } from "./shorthands.js";
export type { CompiledPattern, PatternNode, DepthConstraint } from "./types.js";
export {
  matchAll,
  firstMatch,
  where,
  select,
  values,
  indexOf,
  contains,
  split,
  takeBefore,
  skipAfter,
  trimWhitespace,
  significant,
  identifiers,
  strings,
  sequenceEqual,
  firstOfKind,
  allOfKind,
  valueOfKind,
  asInt,
  asNumber,
  asBool,
  PatternCache,
  type PatternLike,
} from "./query.js";
