/**
 * Pattern compiler: pattern text to a frozen pattern tree.
 *
 * Recursive descent in parser-combinator style: every rule takes a position
 * and returns a ParseResult. The first failure aborts compilation with a
 * PatternSyntaxError at the failing offset.
 *
 * Syntax:
 * - `\i`, `\k`, `\tn`, ... token class; upper case negates (`\I`, `\Tn`)
 * - `\k"const"` class and value
 * - `"=>"` literal token value
 * - `.` any token except end of input
 * - `(...)`, `(?:...)`, `(?<name>...)` groups; `[a | b]` non-capturing alternation
 * - `(?=...)`, `(?!...)`, `(?<=...)`, `(?<!...)` lookaround
 * - `*`, `+`, `?`, `{n}`, `{n,}`, `{n,m}`, each with a trailing `?` for non-greedy
 * - `\1`, `\k<name>` backreferences, with an optional `@N` depth constraint
 * - `\Bp`, `\Bb`, `\Bk`, `\Ba` balanced regions; `\Bc`, `\Bs` runs up to a separator
 * - `\Je` a whole markup element; `\Bj` element content up to its closing tag
 * - `<div` opening tag; `</div>` closing tag; `</\1@0>` closing tag of a captured opening tag
 * - `\name` macros from `data/macros.json`
 */

import { PatternSyntaxError, TokenKind, createLogger } from "@tokenloom/core";
import { MACROS } from "./macros.js";
import { BALANCED_PAIRS, UNTIL_SEPARATORS, lookupClass } from "./shorthands.js";
import type { CompiledPattern, ParseResult, PatternNode } from "./types.js";

const log = createLogger("pattern");

function ok<T>(value: T, pos: number): ParseResult<T> {
  return { ok: true, value, pos };
}

function fail<T>(pos: number, reason: string): ParseResult<T> {
  return { ok: false, pos, reason };
}

const EMPTY: PatternNode = { type: "empty" };
const QUANTIFIER_CHARS = "*+?{";
const NAME = /^[A-Za-z_][A-Za-z0-9_]*/;
const TAG_NAME = /^[A-Za-z_$][\w$.:-]*/;
const RANGE = /^\{(\d+)(,(\d*))?\}/;
/** Largest count a `{n,m}` quantifier may name; the program unrolls `min` copies */
const MAX_REPEAT = 1000;

function isSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z]/.test(ch);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

/** Macro bodies parse once; their trees contain no captures and are shared. */
const macroTrees = new Map<string, PatternNode>();

/**
 * Compile pattern text. Pure and deterministic: the same text always yields
 * the same tree and capture numbering.
 *
 * @throws PatternSyntaxError with the offending offset in `pattern`
 */
export function compile(pattern: string): CompiledPattern {
  const parser = new PatternParser(pattern, []);
  const result = parser.parse();
  if (!result.ok) {
    throw new PatternSyntaxError(pattern, result.pos, result.reason);
  }
  log.debug(`compiled ${JSON.stringify(pattern)} with ${parser.groupCount} group(s)`);
  return Object.freeze({
    source: pattern,
    root: freezeNode(result.value),
    groupCount: parser.groupCount,
    groupNames: new Map(parser.groupNames),
  });
}

function freezeNode(node: PatternNode): PatternNode {
  if (Object.isFrozen(node)) return node;
  switch (node.type) {
    case "sequence":
      node.nodes.forEach(freezeNode);
      Object.freeze(node.nodes);
      break;
    case "alternation":
      node.branches.forEach(freezeNode);
      Object.freeze(node.branches);
      break;
    case "group":
    case "quantified":
    case "lookaround":
      freezeNode(node.node);
      break;
    case "until":
      Object.freeze(node.separators);
      break;
    default:
      break;
  }
  return Object.freeze(node);
}

class PatternParser {
  groupCount = 0;
  readonly groupNames = new Map<string, number>();

  constructor(
    private readonly input: string,
    /** Macros being expanded, innermost last */
    private readonly macroStack: readonly string[]
  ) {}

  parse(): ParseResult<PatternNode> {
    const result = this.alternation(0);
    if (!result.ok) return result;
    const pos = this.skipSpace(result.pos);
    if (pos < this.input.length) {
      return fail(pos, `unmatched '${this.input[pos]}'`);
    }
    return ok(result.value, pos);
  }

  private skipSpace(pos: number): number {
    let i = pos;
    while (isSpace(this.input[i])) i++;
    return i;
  }

  // ---------------------------------------------------------------------------
  // Structure
  // ---------------------------------------------------------------------------

  /** sequence ('|' sequence)* */
  private alternation(pos: number): ParseResult<PatternNode> {
    const branches: PatternNode[] = [];
    let cur = pos;
    for (;;) {
      const seq = this.sequence(cur);
      if (!seq.ok) return seq;
      branches.push(seq.value);
      cur = this.skipSpace(seq.pos);
      if (this.input[cur] !== "|") break;
      cur++;
    }
    if (branches.length === 1) return ok(branches[0], cur);
    return ok({ type: "alternation", branches }, cur);
  }

  /** quantified* */
  private sequence(pos: number): ParseResult<PatternNode> {
    const nodes: PatternNode[] = [];
    let cur = pos;
    for (;;) {
      cur = this.skipSpace(cur);
      const ch = this.input[cur];
      if (ch === undefined || ch === "|" || ch === ")" || ch === "]") break;
      const item = this.quantified(cur);
      if (!item.ok) return item;
      nodes.push(item.value);
      cur = item.pos;
    }
    if (nodes.length === 0) return ok(EMPTY, cur);
    if (nodes.length === 1) return ok(nodes[0], cur);
    return ok({ type: "sequence", nodes }, cur);
  }

  /** atom quantifier? '?'? */
  private quantified(pos: number): ParseResult<PatternNode> {
    const ch = this.input[pos];
    if (QUANTIFIER_CHARS.includes(ch)) {
      return fail(pos, `nothing to repeat before '${ch}'`);
    }

    const atom = this.atom(pos);
    if (!atom.ok) return atom;
    const range = this.quantifier(atom.pos);
    if (!range.ok) return range;
    if (range.value === null) return atom;

    let cur = range.pos;
    let greedy = true;
    if (this.input[cur] === "?") {
      greedy = false;
      cur++;
    }
    const { min, max } = range.value;
    return ok({ type: "quantified", node: atom.value, min, max, greedy }, cur);
  }

  private quantifier(pos: number): ParseResult<{ min: number; max: number | null } | null> {
    switch (this.input[pos]) {
      case "*":
        return ok({ min: 0, max: null }, pos + 1);
      case "+":
        return ok({ min: 1, max: null }, pos + 1);
      case "?":
        return ok({ min: 0, max: 1 }, pos + 1);
      case "{": {
        const m = RANGE.exec(this.input.slice(pos));
        if (!m) return fail(pos, "malformed quantifier, expected {n}, {n,} or {n,m}");
        const min = Number(m[1]);
        let max: number | null = min;
        if (m[2] !== undefined) {
          max = m[3] === "" ? null : Number(m[3]);
        }
        if (min > MAX_REPEAT || (max !== null && max > MAX_REPEAT)) {
          return fail(pos, `quantifier bound exceeds ${MAX_REPEAT}`);
        }
        if (max !== null && min > max) {
          return fail(pos, `quantifier range {${min},${max}} has min greater than max`);
        }
        return ok({ min, max }, pos + m[0].length);
      }
      default:
        return ok(null, pos);
    }
  }

  // ---------------------------------------------------------------------------
  // Atoms
  // ---------------------------------------------------------------------------

  private atom(pos: number): ParseResult<PatternNode> {
    const ch = this.input[pos];
    switch (ch) {
      case "\\":
        return this.escape(pos);
      case '"': {
        const value = this.quoted(pos);
        if (!value.ok) return value;
        return ok({ type: "literal", value: value.value }, value.pos);
      }
      case ".":
        return ok({ type: "any" }, pos + 1);
      case "(":
        return this.group(pos);
      case "[":
        return this.bracket(pos);
      case "<":
        return this.tag(pos);
      default:
        return fail(pos, `unexpected '${ch}'`);
    }
  }

  /** "..." with \" \\ \n \t \r escapes */
  private quoted(pos: number): ParseResult<string> {
    const input = this.input;
    let value = "";
    let i = pos + 1;
    while (i < input.length && input[i] !== '"') {
      if (input[i] === "\\" && i + 1 < input.length) {
        i++;
        const esc = input[i];
        value += esc === "n" ? "\n" : esc === "t" ? "\t" : esc === "r" ? "\r" : esc;
      } else {
        value += input[i];
      }
      i++;
    }
    if (i >= input.length) return fail(pos, "unterminated literal");
    return ok(value, i + 1);
  }

  private group(pos: number): ParseResult<PatternNode> {
    const input = this.input;
    let cur = pos + 1;
    let capture: number | null = null;
    let name: string | undefined;
    let lookaround: { direction: "ahead" | "behind"; negated: boolean } | null = null;

    if (input.startsWith("?:", cur)) {
      cur += 2;
    } else if (input.startsWith("?=", cur) || input.startsWith("?!", cur)) {
      lookaround = { direction: "ahead", negated: input[cur + 1] === "!" };
      cur += 2;
    } else if (input.startsWith("?<=", cur) || input.startsWith("?<!", cur)) {
      lookaround = { direction: "behind", negated: input[cur + 2] === "!" };
      cur += 3;
    } else if (input.startsWith("?<", cur)) {
      const m = NAME.exec(input.slice(cur + 2));
      if (!m) return fail(cur + 2, "group name expected after '(?<'");
      const end = cur + 2 + m[0].length;
      if (input[end] !== ">") return fail(end, "'>' expected after group name");
      name = m[0];
      if (this.groupNames.has(name)) return fail(cur + 2, `duplicate group name '${name}'`);
      capture = this.groupCount++;
      this.groupNames.set(name, capture);
      cur = end + 1;
    } else if (input[cur] === "?") {
      return fail(cur, "unknown group modifier");
    } else {
      capture = this.groupCount++;
    }

    const body = this.alternation(cur);
    if (!body.ok) return body;
    if (input[body.pos] !== ")") return fail(pos, "unbalanced group, missing ')'");
    const end = body.pos + 1;

    if (lookaround) return ok({ type: "lookaround", node: body.value, ...lookaround }, end);
    if (capture === null) return ok({ type: "group", node: body.value, capture: null }, end);
    return ok({ type: "group", node: body.value, capture, name }, end);
  }

  /** [a | b | c] */
  private bracket(pos: number): ParseResult<PatternNode> {
    const body = this.alternation(pos + 1);
    if (!body.ok) return body;
    if (this.input[body.pos] !== "]") return fail(pos, "unbalanced '[', missing ']'");
    return ok({ type: "group", node: body.value, capture: null }, body.pos + 1);
  }

  /** `<div`, `</div>`, `</>` or `</\1@0>` */
  private tag(pos: number): ParseResult<PatternNode> {
    const input = this.input;

    if (input[pos + 1] !== "/") {
      const m = TAG_NAME.exec(input.slice(pos + 1));
      if (!m) return fail(pos + 1, "tag name expected after '<'");
      return ok({ type: "class", kind: TokenKind.TagOpen, value: `<${m[0]}`, negated: false }, pos + 1 + m[0].length);
    }

    const nameStart = pos + 2;
    let node: PatternNode;
    let cur: number;
    if (input[nameStart] === "\\" && isDigit(input[nameStart + 1])) {
      const ref = this.positionalReference(nameStart, true);
      if (!ref.ok) return ref;
      node = ref.value;
      cur = ref.pos;
    } else {
      const m = TAG_NAME.exec(input.slice(nameStart));
      const tagName = m ? m[0] : "";
      node = {
        type: "sequence",
        nodes: [
          { type: "class", kind: TokenKind.TagClose, value: `</${tagName}`, negated: false },
          { type: "class", kind: TokenKind.TagEnd, value: ">", negated: false },
        ],
      };
      cur = nameStart + tagName.length;
    }

    if (input[cur] !== ">") return fail(cur, "'>' expected to end closing tag");
    return ok(node, cur + 1);
  }

  // ---------------------------------------------------------------------------
  // Escapes
  // ---------------------------------------------------------------------------

  private escape(pos: number): ParseResult<PatternNode> {
    const input = this.input;
    const ch = input[pos + 1];

    if (ch === undefined) return fail(pos, "pattern ends after '\\'");
    if (isDigit(ch)) return this.positionalReference(pos, false);
    if (ch === "k" && input[pos + 2] === "<") return this.namedReference(pos);
    if (!isLetter(ch)) return fail(pos, `unknown escape '\\${ch}'`);

    let end = pos + 1;
    while (isLetter(input[end])) end++;
    const word = input.slice(pos + 1, end);

    const macro = MACROS.get(word);
    if (macro !== undefined) return this.macro(pos, word, macro, end);

    if (word === "Je") return ok({ type: "element" }, end);
    if (word === "Bj") return ok({ type: "content" }, end);
    if (word.length === 2 && word[0] === "B") {
      const pair = BALANCED_PAIRS.get(word[1]);
      if (pair) return ok({ type: "balanced", open: pair[0], close: pair[1] }, end);
      const separators = UNTIL_SEPARATORS.get(word[1]);
      if (separators) return ok({ type: "until", separators }, end);
      return fail(pos, `unknown balanced region \\${word}`);
    }

    const cls = word.length <= 2 ? lookupClass(word) : undefined;
    if (!cls) return fail(pos, `unknown shorthand \\${word}`);
    if (input[end] !== '"') return ok({ type: "class", kind: cls.kind, negated: cls.negated }, end);

    const value = this.quoted(end);
    if (!value.ok) return value;
    return ok({ type: "class", kind: cls.kind, value: value.value, negated: cls.negated }, value.pos);
  }

  /** `\N` or `\N@D`, where N counts groups from 1 */
  private positionalReference(pos: number, closeTag: boolean): ParseResult<PatternNode> {
    let end = pos + 1;
    while (isDigit(this.input[end])) end++;
    const number = Number(this.input.slice(pos + 1, end));
    if (number < 1 || number > this.groupCount) {
      return fail(pos, `reference to undeclared group ${number}`);
    }
    const depth = this.depthSuffix(end);
    if (!depth.ok) return depth;
    return ok({ type: "backreference", group: number - 1, depth: depth.value, closeTag }, depth.pos);
  }

  /** `\k<name>` or `\k<name>@D` */
  private namedReference(pos: number): ParseResult<PatternNode> {
    const nameStart = pos + 3;
    const m = NAME.exec(this.input.slice(nameStart));
    if (!m) return fail(nameStart, "group name expected after '\\k<'");
    const end = nameStart + m[0].length;
    if (this.input[end] !== ">") return fail(end, "'>' expected after group name");

    const group = this.groupNames.get(m[0]);
    if (group === undefined) return fail(pos, `reference to undeclared group name '${m[0]}'`);
    const depth = this.depthSuffix(end + 1);
    if (!depth.ok) return depth;
    return ok({ type: "backreference", group, name: m[0], depth: depth.value, closeTag: false }, depth.pos);
  }

  private depthSuffix(pos: number): ParseResult<number | undefined> {
    if (this.input[pos] !== "@") return ok(undefined, pos);
    const m = /^@([+-]?\d+)/.exec(this.input.slice(pos));
    if (!m) return fail(pos, "depth expected after '@'");
    return ok(Number(m[1]), pos + m[0].length);
  }

  private macro(pos: number, name: string, body: string, end: number): ParseResult<PatternNode> {
    if (this.macroStack.includes(name)) {
      return fail(pos, `macro \\${name} expands to itself`);
    }
    const cached = macroTrees.get(name);
    if (cached) return ok(cached, end);

    const inner = new PatternParser(body, [...this.macroStack, name]);
    const result = inner.parse();
    if (!result.ok) return fail(pos, `in macro \\${name}: ${result.reason}`);
    if (inner.groupCount > 0) return fail(pos, `macro \\${name} must not declare capturing groups`);

    const tree = freezeNode(result.value);
    macroTrees.set(name, tree);
    return ok(tree, end);
  }
}
