/**
 * Tests for the query helpers
 */

import { describe, it, expect } from "vitest";
import { TokenKind, tokenText } from "@tokenloom/core";
import { tokenize } from "@tokenloom/lexer";
import {
  compile,
  tryMatch,
  where,
  select,
  values,
  matchAll,
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
} from "@tokenloom/pattern";

describe("query", () => {
  // ---------------------------------------------------------------------------
  // Scanning
  // ---------------------------------------------------------------------------

  describe("scanning", () => {
    const assignments = tokenize("a = 1; b = 2;");

    it("should flatten the tokens of every match", () => {
      expect(values(tokenize("a + b(c)"), "\\i")).toEqual(["a", "b", "c"]);
      expect(where(assignments, '\\i "="').map((t) => t.value)).toEqual(["a", "=", "b", "="]);
    });

    it("should select first captures", () => {
      expect(select(assignments, '(\\i) "="').map(tokenText)).toEqual(["a", "b"]);
    });

    it("should project matches with a selector", () => {
      expect(select(assignments, '(\\i) "=" (\\n)', (m) => `${m.valueAt(0)}:${m.valueAt(1)}`)).toEqual(["a:1", "b:2"]);
    });

    it("should accept compiled patterns", () => {
      expect(matchAll(assignments, compile("\\n"))).toHaveLength(2);
    });

    it("should keep matching after many distinct pattern texts", () => {
      for (let i = 0; i < 300; i++) {
        expect(matchAll(assignments, `"=" \\n"${i + 10}"`)).toHaveLength(0);
      }
      expect(matchAll(assignments, '"=" \\n"2"')).toHaveLength(1);
    });

    it("should locate the first match", () => {
      const lambda = tokenize("(a) => a");
      expect(indexOf(lambda, '"=>"')).toBe(3);
      expect(indexOf(lambda, '"+"')).toBe(-1);
      expect(contains(lambda, "\\fa")).toBe(true);
      expect(contains(lambda, "\\s")).toBe(false);
    });

    it("should take tokens around the first match", () => {
      const lambda = tokenize("(a) => a");
      expect(tokenText(takeBefore(lambda, '"=>"'))).toBe("(a)");
      expect(skipAfter(lambda, '"=>"').map((t) => t.kind)).toEqual([TokenKind.Identifier, TokenKind.EndOfInput]);
      expect(takeBefore(lambda, '"+"')).toEqual([]);
      expect(skipAfter(lambda, '"+"')).toEqual([]);
    });

    it("should split at delimiters", () => {
      const pieces = split(significant(tokenize("a, b c, d")), '","');
      expect(pieces.map(tokenText)).toEqual(["a", "bc", "d"]);
    });

    it("should keep the whole sequence when nothing splits it", () => {
      const tokens = significant(tokenize("a b"));
      expect(split(tokens, '","')).toEqual([tokens]);
    });
  });

  // ---------------------------------------------------------------------------
  // Filters
  // ---------------------------------------------------------------------------

  describe("filters", () => {
    it("should trim whitespace at both ends", () => {
      const tokens = tokenize(" a b ", { includeWhitespace: true }).slice(0, -1);
      expect(trimWhitespace(tokens).map((t) => t.value)).toEqual(["a", " ", "b"]);
    });

    it("should drop trivia and end of input", () => {
      const tokens = tokenize("a /* c */ b", { includeWhitespace: true, includeComments: true });
      expect(significant(tokens).map((t) => t.value)).toEqual(["a", "b"]);
    });

    it("should list identifiers and unquoted strings", () => {
      const tokens = tokenize(`f("x", 'y', z)`);
      expect(identifiers(tokens)).toEqual(["f", "z"]);
      expect(strings(tokens)).toEqual(["x", "y"]);
    });

    it("should compare sequences by value", () => {
      expect(sequenceEqual(tokenize("a+b"), tokenize("a + b"))).toBe(true);
      expect(sequenceEqual(tokenize("a+b"), tokenize("a-b"))).toBe(false);
      expect(sequenceEqual(tokenize("a"), tokenize("a b"))).toBe(false);
    });
  });

  // ---------------------------------------------------------------------------
  // Capture readers
  // ---------------------------------------------------------------------------

  describe("capture readers", () => {
    const assignment = compile('(\\i "=" \\n)');

    it("should read tokens of a kind", () => {
      const capture = tryMatch(assignment, tokenize("x = 42"), 0)?.captureAt(0) ?? null;
      expect(valueOfKind(capture, TokenKind.Identifier)).toBe("x");
      expect(firstOfKind(capture, TokenKind.Number)?.value).toBe("42");
      expect(allOfKind(capture, TokenKind.Number)).toHaveLength(1);
      expect(firstOfKind(capture, TokenKind.String)).toBeNull();
      expect(asInt(capture)).toBe(42);
    });

    it("should parse numbers with separators", () => {
      const capture = tryMatch(assignment, tokenize("x = 1_000.5"), 0)?.captureAt(0) ?? null;
      expect(asNumber(capture)).toBe(1000.5);
      expect(asInt(capture)).toBeNull();
    });

    it("should read booleans", () => {
      const any = compile("(.)");
      expect(asBool(tryMatch(any, tokenize("true"), 0)?.captureAt(0) ?? null)).toBe(true);
      expect(asBool(tryMatch(any, tokenize("false"), 0)?.captureAt(0) ?? null)).toBe(false);
      expect(asBool(tryMatch(any, tokenize("1"), 0)?.captureAt(0) ?? null)).toBeNull();
    });

    it("should answer null for absent captures", () => {
      expect(valueOfKind(null, TokenKind.Identifier)).toBeNull();
      expect(allOfKind(null, TokenKind.Identifier)).toEqual([]);
      expect(asInt(null)).toBeNull();
      expect(asNumber(null)).toBeNull();
      expect(asBool(null)).toBeNull();
    });
  });
});

describe("PatternCache", () => {
  it("should compile a text once", () => {
    const cache = new PatternCache();
    expect(cache.get("\\i")).toBe(cache.get("\\i"));
    expect(cache.size).toBe(1);
  });

  it("should drop the least recently used text when full", () => {
    const cache = new PatternCache(2);
    cache.get("\\i");
    cache.get("\\n");
    cache.get("\\i");
    cache.get("\\s");
    expect(cache.size).toBe(2);
    expect(cache.has("\\i")).toBe(true);
    expect(cache.has("\\n")).toBe(false);
    expect(cache.has("\\s")).toBe(true);
  });

  it("should empty on clear", () => {
    const cache = new PatternCache();
    cache.get("\\i");
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
