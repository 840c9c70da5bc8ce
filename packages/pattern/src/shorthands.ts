/**
 * Token-class shorthands: `\i` is an identifier, `\I` anything else.
 */

import { TokenKind } from "@tokenloom/core";

/** Single-letter classes; the upper-case letter negates. */
export const CLASS_SHORTHANDS: ReadonlyMap<string, TokenKind> = new Map([
  ["k", TokenKind.Keyword],
  ["i", TokenKind.Identifier],
  ["s", TokenKind.String],
  ["n", TokenKind.Number],
  ["o", TokenKind.Operator],
  ["p", TokenKind.Punctuation],
  ["c", TokenKind.Comment],
  ["w", TokenKind.Whitespace],
  ["t", TokenKind.TemplateString],
  ["r", TokenKind.Regex],
  ["z", TokenKind.EndOfInput],
  ["u", TokenKind.Unknown],
]);

/**
 * Two-letter classes for the type and markup contexts.
 *
 * `\Je` is not the negated tag-end class: the compiler reads it as a whole
 * markup element before it looks here. Any token but a tag-end is
 * `(?!\je).`.
 */
export const CONTEXT_SHORTHANDS: ReadonlyMap<string, TokenKind> = new Map([
  // type annotations
  ["tn", TokenKind.TypeName],
  ["co", TokenKind.Colon],
  ["go", TokenKind.GenericOpen],
  ["gc", TokenKind.GenericClose],
  ["qm", TokenKind.QuestionMark],
  ["fa", TokenKind.Arrow],
  ["op", TokenKind.TypeOperator],
  ["xt", TokenKind.Extends],
  ["tl", TokenKind.TupleOpen],
  ["tr", TokenKind.TupleClose],
  ["mn", TokenKind.MappedIn],
  ["ac", TokenKind.AsConst],
  ["dc", TokenKind.Decorator],
  // markup
  ["jo", TokenKind.TagOpen],
  ["jc", TokenKind.TagClose],
  ["js", TokenKind.SelfClose],
  ["je", TokenKind.TagEnd],
  ["ja", TokenKind.AttributeName],
  ["jv", TokenKind.AttributeValue],
  ["jt", TokenKind.Text],
  ["jx", TokenKind.ExpressionStart],
  ["jy", TokenKind.ExpressionEnd],
]);

/** `\B` + letter: balanced bracket pairs. */
export const BALANCED_PAIRS: ReadonlyMap<string, readonly [string, string]> = new Map([
  ["p", ["(", ")"]],
  ["b", ["{", "}"]],
  ["k", ["[", "]"]],
  ["a", ["<", ">"]],
]);

/** `\B` + letter: runs up to a separator at bracket depth 0. */
export const UNTIL_SEPARATORS: ReadonlyMap<string, readonly string[]> = new Map([
  ["c", [","]],
  ["s", [";"]],
]);

/** Resolve a class letter (either case) to its kind and polarity. */
export function lookupClass(code: string): { kind: TokenKind; negated: boolean } | undefined {
  const lower = code.toLowerCase();
  const kind = CLASS_SHORTHANDS.get(lower) ?? CONTEXT_SHORTHANDS.get(lower);
  if (kind === undefined) return undefined;
  // two-letter codes negate on an upper-case first letter: \Tn
  const negated = code[0] !== lower[0];
  return { kind, negated };
}
