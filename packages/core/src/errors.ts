/**
 * Error types.
 *
 * Only malformed input raises: source text the lexer cannot finish, pattern
 * text the compiler cannot parse, and dispatcher misuse. A pattern that does
 * not match is an ordinary `null` result, never an exception.
 */

import type { SourcePosition } from "./tokens.js";

/** Raised when a literal or comment runs to the end of its line or input. */
export class LexError extends Error {
  readonly position: SourcePosition;
  readonly reason: string;

  constructor(reason: string, position: SourcePosition) {
    super(`${reason} at line ${position.line}, column ${position.column}`);
    this.name = "LexError";
    this.reason = reason;
    this.position = position;
  }

  get offset(): number {
    return this.position.offset;
  }
}

/** Raised by the pattern compiler. Offsets index into the pattern text. */
export class PatternSyntaxError extends Error {
  readonly pattern: string;
  readonly offset: number;
  readonly reason: string;

  constructor(pattern: string, offset: number, reason: string) {
    super(`Pattern syntax error at offset ${offset}: ${reason}\n  ${pattern}\n  ${" ".repeat(offset)}^`);
    this.name = "PatternSyntaxError";
    this.pattern = pattern;
    this.offset = offset;
    this.reason = reason;
  }
}

/** Raised for dispatcher misuse, such as traversing with an unknown name. */
export class DispatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DispatchError";
  }
}
