/**
 * Character classification helpers
 *
 * Identifier rules defer to TypeScript's own scanner predicates so that
 * Unicode identifiers lex the same way the compiler reads them.
 */

import ts from "typescript";

export function isIdentifierStart(source: string, pos: number): boolean {
  const code = source.codePointAt(pos);
  return code !== undefined && ts.isIdentifierStart(code, ts.ScriptTarget.Latest);
}

export function isIdentifierPart(source: string, pos: number): boolean {
  const code = source.codePointAt(pos);
  return code !== undefined && ts.isIdentifierPart(code, ts.ScriptTarget.Latest);
}

/** Width in UTF-16 code units of the character at `pos`. */
export function charWidth(source: string, pos: number): number {
  const code = source.codePointAt(pos);
  return code !== undefined && code > 0xffff ? 2 : 1;
}

/** Offset just past the identifier starting at `pos`. */
export function scanIdentifierEnd(source: string, pos: number, extra = ""): number {
  let i = pos;
  while (i < source.length) {
    if (isIdentifierPart(source, i)) {
      i += charWidth(source, i);
    } else if (extra.includes(source[i])) {
      i++;
    } else {
      break;
    }
  }
  return i;
}

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

export function isLineBreak(ch: string | undefined): boolean {
  return ch === "\n" || ch === "\r" || ch === "\u2028" || ch === "\u2029";
}

export function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && (ch === " " || ch === "\t" || ch === "\v" || ch === "\f" || ch === "\u00a0" || ch === "\ufeff" || isLineBreak(ch));
}

/** Offset of the first non-whitespace character at or after `pos`. */
export function skipWhitespace(source: string, pos: number): number {
  let i = pos;
  while (i < source.length && isWhitespace(source[i])) i++;
  return i;
}

/** Whether `word` appears at `pos` and is not followed by an identifier character. */
export function startsWithWord(source: string, pos: number, word: string): boolean {
  return source.startsWith(word, pos) && !isIdentifierPart(source, pos + word.length);
}
