/**
 * Tests for TokenStream
 */

import { describe, it, expect } from "vitest";
import { tokenize, TokenStream, findValue } from "@tokenloom/lexer";

const source = "f(a, (b)) + 1";
// f ( a , ( b ) ) + 1 <eoi>
const tokens = tokenize(source);

describe("TokenStream", () => {
  it("should advance and peek", () => {
    const stream = new TokenStream(tokens, source);
    expect(stream.current()?.value).toBe("f");
    expect(stream.peek(2)?.value).toBe("a");
    expect(stream.advance()?.value).toBe("f");
    expect(stream.position).toBe(1);
    expect(stream.peek(100)).toBeNull();
  });

  it("should skip a bracket group", () => {
    const stream = new TokenStream(tokens, source);
    stream.seek(1);
    expect(stream.skipBracketGroup()).toBe(8);
    expect(stream.current()?.value).toBe("+");
  });

  it("should stay put on an unbalanced group", () => {
    const stream = new TokenStream(tokenize("(a"), "(a");
    expect(stream.skipBracketGroup()).toBe(-1);
    expect(stream.position).toBe(0);
  });

  it("should slice source text between tokens", () => {
    expect(new TokenStream(tokens, source).getSourceRange(0, 7)).toBe("f(a, (b))");
    expect(new TokenStream(tokens).getSourceRange(0, 7)).toBe("f ( a , ( b ) )");
    expect(new TokenStream(tokens).getSourceRange(3, 1)).toBe("");
  });

  it("should report the end at the end-of-input token", () => {
    const stream = new TokenStream(tokens);
    stream.seek(9);
    expect(stream.atEnd()).toBe(false);
    stream.advance();
    expect(stream.atEnd()).toBe(true);
    expect(stream.length).toBe(11);
  });

  it("should clone at the current position", () => {
    const stream = new TokenStream(tokens);
    stream.seek(4);
    const copy = stream.clone();
    copy.advance(2);
    expect(stream.position).toBe(4);
    expect(copy.position).toBe(6);
  });

  it("should find values", () => {
    expect(findValue(tokens, 0, "+")).toBe(8);
    expect(findValue(tokens, 9, "+")).toBe(-1);
  });
});
