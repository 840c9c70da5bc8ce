/**
 * Tests for the token model and bracket helpers
 */

import { describe, it, expect } from "vitest";
import {
  TokenKind,
  TOKEN_KINDS,
  createToken,
  isSynthetic,
  isTrivia,
  isStructural,
  nestingDelta,
  findBalancedEnd,
  matchingClose,
  tokenText,
  describeToken,
  type Token,
} from "@tokenloom/core";

/** Lay tokens out one after another, separated by single spaces. */
function layout(...specs: Array<[TokenKind, string]>): Token[] {
  let offset = 0;
  return specs.map(([kind, value]) => {
    const token: Token = { kind, value, start: offset, end: offset + value.length, line: 1, column: offset + 1 };
    offset += value.length + 1;
    return token;
  });
}

const P = TokenKind.Punctuation;
const I = TokenKind.Identifier;

describe("tokens", () => {
  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  describe("createToken", () => {
    it("should create synthetic tokens with negative offsets", () => {
      const token = createToken(TokenKind.Identifier, "generated");
      expect(token.start).toBe(-1);
      expect(token.end).toBe(-1);
      expect(isSynthetic(token)).toBe(true);
    });

    it("should not treat located tokens as synthetic", () => {
      const [token] = layout([I, "x"]);
      expect(isSynthetic(token)).toBe(false);
    });
  });

  it("should list every kind once", () => {
    expect(new Set(TOKEN_KINDS).size).toBe(TOKEN_KINDS.length);
    expect(TOKEN_KINDS).toContain("tag-open");
    expect(TOKEN_KINDS).toContain("end-of-input");
  });

  it("should classify whitespace and comments as trivia", () => {
    expect(isTrivia(createToken(TokenKind.Whitespace, " "))).toBe(true);
    expect(isTrivia(createToken(TokenKind.Comment, "// x"))).toBe(true);
    expect(isTrivia(createToken(TokenKind.Identifier, "x"))).toBe(false);
  });

  it("should concatenate values without separators", () => {
    expect(tokenText(layout([I, "a"], [TokenKind.Operator, "+"], [I, "b"]))).toBe("a+b");
    expect(tokenText([])).toBe("");
  });

  describe("describeToken", () => {
    it("should include kind, value and position", () => {
      const [token] = layout([I, "foo"]);
      expect(describeToken(token)).toBe('identifier "foo" (1:1)');
    });

    it("should name synthetic tokens and the end of input", () => {
      expect(describeToken(createToken(TokenKind.String, "'a'"))).toBe(`string "'a'" (synthetic)`);
      expect(describeToken(createToken(TokenKind.EndOfInput, ""))).toBe("end of input");
    });
  });

  // ---------------------------------------------------------------------------
  // Nesting
  // ---------------------------------------------------------------------------

  describe("nestingDelta", () => {
    it("should open on brackets and markup openers", () => {
      expect(nestingDelta(createToken(P, "("))).toBe(1);
      expect(nestingDelta(createToken(P, "{"))).toBe(1);
      expect(nestingDelta(createToken(TokenKind.TagOpen, "<div"))).toBe(1);
      expect(nestingDelta(createToken(TokenKind.GenericOpen, "<"))).toBe(1);
      expect(nestingDelta(createToken(TokenKind.ExpressionStart, "{"))).toBe(1);
    });

    it("should close on matching closers", () => {
      expect(nestingDelta(createToken(P, "]"))).toBe(-1);
      expect(nestingDelta(createToken(TokenKind.TagClose, "</div"))).toBe(-1);
      expect(nestingDelta(createToken(TokenKind.SelfClose, "/>"))).toBe(-1);
      expect(nestingDelta(createToken(TokenKind.TupleClose, "]"))).toBe(-1);
    });

    it("should be neutral for everything else", () => {
      expect(nestingDelta(createToken(P, ";"))).toBe(0);
      expect(nestingDelta(createToken(TokenKind.TagEnd, ">"))).toBe(0);
      expect(nestingDelta(createToken(TokenKind.String, '"("'))).toBe(0);
    });
  });

  describe("isStructural", () => {
    it("should exclude text and literal kinds", () => {
      expect(isStructural(createToken(P, "("))).toBe(true);
      expect(isStructural(createToken(TokenKind.Text, "("))).toBe(false);
      expect(isStructural(createToken(TokenKind.String, '"("'))).toBe(false);
    });
  });

  describe("findBalancedEnd", () => {
    // foo ( a , ( b ) )
    const tokens = layout([I, "foo"], [P, "("], [I, "a"], [P, ","], [P, "("], [I, "b"], [P, ")"], [P, ")"]);

    it("should return the index after the balancing close", () => {
      expect(findBalancedEnd(tokens, 1, "(", ")")).toBe(8);
      expect(findBalancedEnd(tokens, 4, "(", ")")).toBe(7);
    });

    it("should fail when the start is not the open token", () => {
      expect(findBalancedEnd(tokens, 0, "(", ")")).toBe(-1);
      expect(findBalancedEnd(tokens, 99, "(", ")")).toBe(-1);
    });

    it("should fail on an unterminated region", () => {
      expect(findBalancedEnd(tokens.slice(0, 7), 1, "(", ")")).toBe(-1);
    });

    it("should ignore brackets inside markup text", () => {
      const withText = layout([P, "("], [TokenKind.Text, ")"], [P, ")"]);
      expect(findBalancedEnd(withText, 0, "(", ")")).toBe(3);
    });
  });

  it("should pair brackets with their closers", () => {
    expect(matchingClose("(")).toBe(")");
    expect(matchingClose("[")).toBe("]");
    expect(matchingClose("{")).toBe("}");
    expect(matchingClose("<")).toBe(">");
    expect(matchingClose("|")).toBe("|");
  });
});
