/**
 * Token stream with cursor and lookahead.
 */

import { TokenKind, findBalancedEnd, matchingClose, type Token } from "@tokenloom/core";

/** Index of the first token at or after `from` whose value is `value`, or -1. */
export function findValue(tokens: readonly Token[], from: number, value: string): number {
  for (let i = Math.max(0, from); i < tokens.length; i++) {
    if (tokens[i].value === value) return i;
  }
  return -1;
}

export class TokenStream {
  private tokens: readonly Token[];
  private pos: number = 0;
  private source: string | undefined;

  constructor(tokens: readonly Token[], source?: string) {
    this.tokens = tokens;
    this.source = source;
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.tokens.length;
  }

  atEnd(): boolean {
    const token = this.tokens[this.pos];
    return token === undefined || token.kind === TokenKind.EndOfInput;
  }

  current(): Token | null {
    return this.tokens[this.pos] ?? null;
  }

  peek(offset: number = 0): Token | null {
    return this.tokens[this.pos + offset] ?? null;
  }

  advance(count: number = 1): Token | null {
    const token = this.current();
    this.pos = Math.min(this.pos + count, this.tokens.length);
    return token;
  }

  seek(index: number): void {
    this.pos = Math.max(0, Math.min(index, this.tokens.length));
  }

  /**
   * Get the source text for a range of tokens (inclusive), including the
   * original whitespace between them. Without source text, token values are
   * joined with single spaces.
   */
  getSourceRange(startIndex: number, endIndex: number): string {
    if (startIndex > endIndex || startIndex < 0 || endIndex >= this.tokens.length) {
      return "";
    }
    const first = this.tokens[startIndex];
    const last = this.tokens[endIndex];
    if (this.source !== undefined && first.start >= 0 && last.end >= 0) {
      return this.source.slice(first.start, last.end);
    }
    return this.tokens
      .slice(startIndex, endIndex + 1)
      .map((t) => t.value)
      .join(" ");
  }

  /**
   * Skip over a balanced bracket group from current position.
   * Assumes current token is an open bracket.
   *
   * @returns Index after the matching close bracket, or -1 if unbalanced
   */
  skipBracketGroup(open: string = "(", close: string = matchingClose(open)): number {
    const end = findBalancedEnd(this.tokens, this.pos, open, close);
    if (end >= 0) this.pos = end;
    return end;
  }

  /**
   * Get all tokens
   */
  getTokens(): readonly Token[] {
    return this.tokens;
  }

  /**
   * Clone the stream at its current position
   */
  clone(): TokenStream {
    const cloned = new TokenStream(this.tokens, this.source);
    cloned.pos = this.pos;
    return cloned;
  }
}
