/**
 * Backtracking matcher.
 *
 * Runs a pattern's program over a token sequence with an explicit choice
 * stack. Every `split` pushes the alternative it did not take; a failure pops
 * the most recent choice and undoes slot writes made since, so quantifier and
 * alternation choices are revisited against the whole rest of the pattern.
 * Stack growth is bounded by the number of open choices, never by call depth;
 * only lookaround assertions run a nested machine, so recursion is bounded by
 * the pattern's lookaround nesting.
 */

import { TokenKind, findBalancedEnd, nestingDelta, type Token } from "@tokenloom/core";
import { TokenMatch } from "./match.js";
import { programFor, type Instruction, type TokenTest } from "./program.js";
import type { CompiledPattern } from "./types.js";

interface Choice {
  readonly pc: number;
  readonly index: number;
  /** Trail length to unwind to */
  readonly trail: number;
}

/**
 * Match `pattern` anchored at `start`. Never throws; no match is `null`.
 */
export function tryMatch(pattern: CompiledPattern, tokens: readonly Token[], start = 0): TokenMatch | null {
  if (!Number.isInteger(start) || start < 0 || start > tokens.length) return null;

  const program = programFor(pattern);
  const slots: number[] = new Array<number>(program.slotCount).fill(-1);
  const end = execute(program.code, tokens, start, slots);
  if (end < 0) return null;
  return new TokenMatch(tokens, start, end, slots, pattern.groupCount, pattern.groupNames);
}

/** First match at or after `from`. */
export function findFirst(pattern: CompiledPattern, tokens: readonly Token[], from = 0): TokenMatch | null {
  for (let i = Math.max(0, from); i < tokens.length; i++) {
    const match = tryMatch(pattern, tokens, i);
    if (match) return match;
  }
  return null;
}

/** All non-overlapping matches, scanning left to right. */
export function findAll(pattern: CompiledPattern, tokens: readonly Token[], from = 0): TokenMatch[] {
  const matches: TokenMatch[] = [];
  let i = Math.max(0, from);
  while (i < tokens.length) {
    const match = tryMatch(pattern, tokens, i);
    if (match) {
      matches.push(match);
      i = match.end > i ? match.end : i + 1;
    } else {
      i++;
    }
  }
  return matches;
}

// ---------------------------------------------------------------------------
// Machine
// ---------------------------------------------------------------------------

/**
 * Run `code` from `start`. Returns the end index of the first successful
 * path, or -1. `slots` is updated in place with that path's captures. With
 * `requiredEnd`, only paths ending exactly there succeed.
 */
function execute(
  code: readonly Instruction[],
  tokens: readonly Token[],
  start: number,
  slots: number[],
  requiredEnd?: number
): number {
  const choices: Choice[] = [];
  // slot, previous value pairs
  const trail: number[] = [];
  let pc = 0;
  let index = start;

  const write = (slot: number, value: number): void => {
    trail.push(slot, slots[slot]);
    slots[slot] = value;
  };

  const backtrack = (): boolean => {
    const choice = choices.pop();
    if (!choice) return false;
    while (trail.length > choice.trail) {
      const previous = trail.pop();
      const slot = trail.pop();
      if (slot !== undefined && previous !== undefined) slots[slot] = previous;
    }
    pc = choice.pc;
    index = choice.index;
    return true;
  };

  for (;;) {
    const ins = code[pc];
    let next = -1;

    switch (ins.op) {
      case "test":
        if (index < tokens.length && testToken(ins.test, tokens[index])) next = index + 1;
        break;
      case "split":
        choices.push({ pc: ins.secondary, index, trail: trail.length });
        pc = ins.primary;
        continue;
      case "jump":
        pc = ins.target;
        continue;
      case "open":
        write(2 * ins.group, index);
        write(2 * ins.group + 1, -1);
        next = index;
        break;
      case "close":
        write(2 * ins.group + 1, index);
        next = index;
        break;
      case "mark":
        write(ins.register, index);
        next = index;
        break;
      case "progress":
        if (slots[ins.register] !== index) next = index;
        break;
      case "assert":
        if (assertion(ins.code, ins.direction, tokens, index, slots) !== ins.negated) next = index;
        break;
      case "backreference":
        next = matchReference(ins.group, ins.depth, ins.closeTag, tokens, index, slots);
        break;
      case "balanced":
        next = findBalancedEnd(tokens, index, ins.open, ins.close);
        break;
      case "until":
        next = matchUntil(ins.separators, tokens, index);
        break;
      case "element":
        next = matchElement(tokens, index);
        break;
      case "content":
        next = matchContent(tokens, index);
        break;
      case "match":
        if (requiredEnd === undefined || index === requiredEnd) return index;
        break;
    }

    if (next >= 0) {
      index = next;
      pc++;
    } else if (!backtrack()) {
      return -1;
    }
  }
}

/**
 * Lookaround sees the outer captures but writes only to a copy, so nothing
 * it captures survives.
 */
function assertion(
  code: readonly Instruction[],
  direction: "ahead" | "behind",
  tokens: readonly Token[],
  index: number,
  slots: readonly number[]
): boolean {
  if (direction === "ahead") {
    return execute(code, tokens, index, slots.slice()) >= 0;
  }
  for (let from = index; from >= 0; from--) {
    if (execute(code, tokens, from, slots.slice(), index) >= 0) return true;
  }
  return false;
}

function testToken(test: TokenTest, token: Token): boolean {
  switch (test.type) {
    case "any":
      return token.kind !== TokenKind.EndOfInput;
    case "literal":
      return token.value === test.value;
    case "class": {
      const hit = token.kind === test.kind && (test.value === undefined || token.value === test.value);
      return test.negated ? !hit && token.kind !== TokenKind.EndOfInput : hit;
    }
  }
}

// ---------------------------------------------------------------------------
// Multi-token atoms
// ---------------------------------------------------------------------------

/** Net nesting change across `tokens[from, to)`. */
function depthChange(tokens: readonly Token[], from: number, to: number): number {
  let depth = 0;
  for (let i = from; i < to; i++) depth += nestingDelta(tokens[i]);
  return depth;
}

function tagName(value: string): string {
  return value.replace(/^<\/?/, "");
}

/**
 * Values equal token for token. A close-tag reference instead matches the
 * closing tag (plus its `>`) of the element whose opening tag was captured.
 * With `depth`, nesting counted from the referenced group's start must
 * equal it once the referenced tokens are consumed.
 */
function matchReference(
  group: number,
  depth: number | undefined,
  closeTag: boolean,
  tokens: readonly Token[],
  index: number,
  slots: readonly number[]
): number {
  const from = slots[2 * group];
  const to = slots[2 * group + 1];
  if (from < 0 || to < from) return -1;

  let end: number;
  if (closeTag) {
    const token = tokens[index];
    const name = tagName(tokens.slice(from, to).map((t) => t.value).join(""));
    if (!token || token.kind !== TokenKind.TagClose || tagName(token.value) !== name) return -1;
    end = tokens[index + 1]?.kind === TokenKind.TagEnd ? index + 2 : index + 1;
  } else {
    const length = to - from;
    if (index + length > tokens.length) return -1;
    for (let k = 0; k < length; k++) {
      if (tokens[index + k].value !== tokens[from + k].value) return -1;
    }
    end = index + length;
  }

  if (depth !== undefined && depthChange(tokens, from, end) !== depth) return -1;
  return end;
}

/**
 * One or more tokens up to (not including) a separator at nesting depth 0,
 * a close that would leave the run, or end of input.
 */
function matchUntil(separators: readonly string[], tokens: readonly Token[], index: number): number {
  let depth = 0;
  let i = index;
  while (i < tokens.length) {
    const token = tokens[i];
    if (token.kind === TokenKind.EndOfInput) break;
    if (depth === 0 && separators.includes(token.value)) break;
    const delta = nestingDelta(token);
    if (depth + delta < 0) break;
    depth += delta;
    i++;
  }
  return i > index ? i : -1;
}

/** A whole markup element from its opening tag through its closing `>` or `/>`. */
function matchElement(tokens: readonly Token[], index: number): number {
  if (tokens[index]?.kind !== TokenKind.TagOpen) return -1;

  let depth = 0;
  let i = index;
  while (i < tokens.length) {
    const token = tokens[i];
    i++;
    switch (token.kind) {
      case TokenKind.TagOpen:
        depth++;
        break;
      case TokenKind.SelfClose:
        depth--;
        if (depth === 0) return i;
        break;
      case TokenKind.TagClose:
        depth--;
        if (tokens[i]?.kind === TokenKind.TagEnd) i++;
        if (depth === 0) return i;
        break;
      case TokenKind.EndOfInput:
        return -1;
      default:
        break;
    }
  }
  return -1;
}

/** Element children: everything before the closing tag of the enclosing element, possibly nothing. */
function matchContent(tokens: readonly Token[], index: number): number {
  let depth = 0;
  let i = index;
  while (i < tokens.length) {
    const token = tokens[i];
    switch (token.kind) {
      case TokenKind.TagOpen:
        depth++;
        i++;
        break;
      case TokenKind.SelfClose:
        if (depth === 0) return i;
        depth--;
        i++;
        break;
      case TokenKind.TagClose:
        if (depth === 0) return i;
        depth--;
        i++;
        if (tokens[i]?.kind === TokenKind.TagEnd) i++;
        break;
      case TokenKind.EndOfInput:
        return -1;
      default:
        i++;
        break;
    }
  }
  return -1;
}
