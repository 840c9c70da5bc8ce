/**
 * Query helpers over token arrays, driven by patterns.
 *
 * Functions that take a pattern accept its text or a compiled pattern. Text is
 * compiled once and kept in a bounded cache. Scanning functions report
 * non-overlapping matches left to right and always advance by at least one
 * token.
 */

import { TokenKind, isTrivia, type Token } from "@tokenloom/core";
import { compile } from "./compiler.js";
import type { Capture, TokenMatch } from "./match.js";
import { findAll, findFirst } from "./matcher.js";
import type { CompiledPattern } from "./types.js";

export type PatternLike = string | CompiledPattern;

/**
 * Compiled patterns keyed by their text. Holds at most `limit` entries and
 * drops the least recently used one when full.
 */
export class PatternCache {
  private entries = new Map<string, CompiledPattern>();

  constructor(readonly limit = 256) {}

  get(pattern: string): CompiledPattern {
    let entry = this.entries.get(pattern);
    if (entry) {
      this.entries.delete(pattern);
    } else {
      entry = compile(pattern);
      if (this.entries.size >= this.limit) {
        const oldest = this.entries.keys().next();
        if (!oldest.done) this.entries.delete(oldest.value);
      }
    }
    this.entries.set(pattern, entry);
    return entry;
  }

  has(pattern: string): boolean {
    return this.entries.has(pattern);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

const cache = new PatternCache();

function compiled(pattern: PatternLike): CompiledPattern {
  return typeof pattern === "string" ? cache.get(pattern) : pattern;
}

// ============================================================================
// Scanning
// ============================================================================

/** Every match of `pattern` in `tokens`. */
export function matchAll(tokens: readonly Token[], pattern: PatternLike): TokenMatch[] {
  return findAll(compiled(pattern), tokens);
}

/** The first match anywhere in `tokens`, or null. */
export function firstMatch(tokens: readonly Token[], pattern: PatternLike): TokenMatch | null {
  return findFirst(compiled(pattern), tokens);
}

/** The tokens of every match, flattened. `where(tokens, "\\i")` lists identifiers. */
export function where(tokens: readonly Token[], pattern: PatternLike): Token[] {
  return matchAll(tokens, pattern).flatMap((match) => match.fullMatch().tokens);
}

/**
 * The first capture of every match, or what `selector` makes of each match.
 * Matches whose first capture did not participate are left out.
 */
export function select(tokens: readonly Token[], pattern: PatternLike): Array<readonly Token[]>;
export function select<T>(tokens: readonly Token[], pattern: PatternLike, selector: (match: TokenMatch) => T): T[];
export function select<T>(
  tokens: readonly Token[],
  pattern: PatternLike,
  selector?: (match: TokenMatch) => T
): Array<T | readonly Token[]> {
  const matches = matchAll(tokens, pattern);
  if (selector) return matches.map(selector);

  const selected: Array<readonly Token[]> = [];
  for (const match of matches) {
    const capture = match.captureAt(0);
    if (capture) selected.push(capture.tokens);
  }
  return selected;
}

/** Values of the tokens `where` returns. */
export function values(tokens: readonly Token[], pattern: PatternLike): string[] {
  return where(tokens, pattern).map((token) => token.value);
}

/** Index of the first match, or -1. */
export function indexOf(tokens: readonly Token[], pattern: PatternLike): number {
  return firstMatch(tokens, pattern)?.start ?? -1;
}

export function contains(tokens: readonly Token[], pattern: PatternLike): boolean {
  return firstMatch(tokens, pattern) !== null;
}

/**
 * Split at every match of `delimiter`. Empty pieces between adjacent
 * delimiters are dropped; without a delimiter the whole array is one piece.
 */
export function split(tokens: readonly Token[], delimiter: PatternLike): Token[][] {
  const pieces: Token[][] = [];
  let last = 0;
  for (const match of matchAll(tokens, delimiter)) {
    if (match.start > last) pieces.push(tokens.slice(last, match.start));
    last = Math.max(last, match.end);
  }
  if (last < tokens.length) pieces.push(tokens.slice(last));
  return pieces;
}

/** Tokens before the first match; empty when there is none. */
export function takeBefore(tokens: readonly Token[], pattern: PatternLike): Token[] {
  const index = indexOf(tokens, pattern);
  return index > 0 ? tokens.slice(0, index) : [];
}

/** Tokens after the first match; empty when there is none. */
export function skipAfter(tokens: readonly Token[], pattern: PatternLike): Token[] {
  const match = firstMatch(tokens, pattern);
  return match ? tokens.slice(match.end) : [];
}

// ============================================================================
// Filters
// ============================================================================

/** Drop whitespace tokens from both ends. */
export function trimWhitespace(tokens: readonly Token[]): readonly Token[] {
  let start = 0;
  let end = tokens.length;
  while (start < end && tokens[start].kind === TokenKind.Whitespace) start++;
  while (end > start && tokens[end - 1].kind === TokenKind.Whitespace) end--;
  return start === 0 && end === tokens.length ? tokens : tokens.slice(start, end);
}

/** Everything except whitespace, comments and the end-of-input token. */
export function significant(tokens: readonly Token[]): Token[] {
  return tokens.filter((token) => !isTrivia(token) && token.kind !== TokenKind.EndOfInput);
}

export function identifiers(tokens: readonly Token[]): string[] {
  return tokens.filter((token) => token.kind === TokenKind.Identifier).map((token) => token.value);
}

/** String literal contents, quotes removed. */
export function strings(tokens: readonly Token[]): string[] {
  return tokens.filter((token) => token.kind === TokenKind.String).map((token) => unquote(token.value));
}

/** Same length and the same value at every position. */
export function sequenceEqual(a: readonly Token[], b: readonly Token[]): boolean {
  return a.length === b.length && a.every((token, i) => token.value === b[i].value);
}

function unquote(value: string): string {
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value[value.length - 1] === quote) {
    return value.slice(1, -1);
  }
  return value;
}

// ============================================================================
// Capture readers
// ============================================================================
// All of these accept an absent capture and answer null (or nothing).

export function firstOfKind(capture: Capture | null, kind: TokenKind): Token | null {
  return capture?.tokens.find((token) => token.kind === kind) ?? null;
}

export function allOfKind(capture: Capture | null, kind: TokenKind): Token[] {
  return capture ? capture.tokens.filter((token) => token.kind === kind) : [];
}

export function valueOfKind(capture: Capture | null, kind: TokenKind): string | null {
  return firstOfKind(capture, kind)?.value ?? null;
}

/** The first number token as a decimal integer. */
export function asInt(capture: Capture | null): number | null {
  const value = valueOfKind(capture, TokenKind.Number);
  return value !== null && /^\d+$/.test(value) ? Number.parseInt(value, 10) : null;
}

/** The first number token as a number; separators and radix prefixes are understood. */
export function asNumber(capture: Capture | null): number | null {
  const value = valueOfKind(capture, TokenKind.Number);
  if (value === null) return null;
  const parsed = Number(value.replace(/_/g, "").replace(/n$/, ""));
  return Number.isFinite(parsed) ? parsed : null;
}

/** `true` or `false` by the capture's value, else null. */
export function asBool(capture: Capture | null): boolean | null {
  switch (capture?.value.trim()) {
    case "true":
      return true;
    case "false":
      return false;
    default:
      return null;
  }
}
