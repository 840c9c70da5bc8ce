/**
 * Core types for @tokenloom/pattern
 *
 * Defines the pattern tree IR, the compiled pattern, and the internal parse
 * result used by the compiler.
 */

import type { TokenKind } from "@tokenloom/core";

/** Result of a parse attempt: success with a value, or failure with a reason. */
export type ParseResult<T> =
  | { ok: true; value: T; pos: number }
  | { ok: false; pos: number; reason: string };

/** "Depth returns to N" constraint on a backreference, relative to the referenced group's opening. */
export type DepthConstraint = number;

/** Pattern tree nodes. Trees are frozen once compiled. */
export type PatternNode =
  | { type: "class"; kind: TokenKind; value?: string; negated: boolean }
  | { type: "literal"; value: string }
  | { type: "any" }
  | { type: "empty" }
  | { type: "sequence"; nodes: readonly PatternNode[] }
  | { type: "alternation"; branches: readonly PatternNode[] }
  | { type: "group"; node: PatternNode; capture: number | null; name?: string }
  | { type: "quantified"; node: PatternNode; min: number; max: number | null; greedy: boolean }
  | { type: "lookaround"; node: PatternNode; direction: "ahead" | "behind"; negated: boolean }
  | {
      type: "backreference";
      /** 0-based capture index */
      group: number;
      name?: string;
      depth?: DepthConstraint;
      /** `</\1>`: match the closing tag of the element whose opening tag was captured */
      closeTag: boolean;
    }
  | { type: "balanced"; open: string; close: string }
  | {
      type: "until";
      /** Stop before any of these at bracket depth 0 */
      separators: readonly string[];
    }
  | { type: "element" }
  | { type: "content" };

/** A compiled, immutable pattern. */
export interface CompiledPattern {
  /** The pattern text it was compiled from */
  readonly source: string;
  readonly root: PatternNode;
  /** Number of capturing groups, named ones included */
  readonly groupCount: number;
  /** Name to 0-based capture index */
  readonly groupNames: ReadonlyMap<string, number>;
}
