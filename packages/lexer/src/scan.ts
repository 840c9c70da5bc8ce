/**
 * Stateless scanning helpers.
 *
 * Each `find*End` function returns the offset just past the construct that
 * starts at `pos`, or -1 when the construct is unterminated. The lexer turns
 * -1 into a LexError; lookahead heuristics treat it as "not this construct".
 */

import {
  isDigit,
  isIdentifierPart,
  isIdentifierStart,
  isLineBreak,
  scanIdentifierEnd,
  skipWhitespace,
  startsWithWord,
} from "./chars.js";

// ---------------------------------------------------------------------------
// Literals and comments
// ---------------------------------------------------------------------------

/** Quoted string. Line breaks end the literal unless `multiline` is set. */
export function findQuoteEnd(source: string, pos: number, multiline = false): number {
  const quote = source[pos];
  let i = pos + 1;
  while (i < source.length) {
    const c = source[i];
    if (c === "\\") {
      i += source.startsWith("\r\n", i + 1) ? 3 : 2;
      continue;
    }
    if (c === quote) return i + 1;
    if (!multiline && isLineBreak(c)) return -1;
    i++;
  }
  return -1;
}

/**
 * Template literal, including every `${...}` interpolation. Interpolations
 * may hold strings, comments and further templates; braces are counted per
 * interpolation on an explicit stack.
 */
export function findTemplateEnd(source: string, pos: number): number {
  // "template" while inside literal text, a brace depth while inside `${...}`
  const stack: Array<"template" | number> = ["template"];
  let i = pos + 1;

  while (i < source.length) {
    const top = stack[stack.length - 1];
    const c = source[i];

    if (top === "template") {
      if (c === "\\") {
        i += 2;
      } else if (c === "`") {
        stack.pop();
        i++;
        if (stack.length === 0) return i;
      } else if (c === "$" && source[i + 1] === "{") {
        stack.push(0);
        i += 2;
      } else {
        i++;
      }
      continue;
    }

    if (c === '"' || c === "'") {
      const end = findQuoteEnd(source, i);
      if (end < 0) return -1;
      i = end;
    } else if (c === "`") {
      stack.push("template");
      i++;
    } else if (c === "/" && source[i + 1] === "/") {
      while (i < source.length && !isLineBreak(source[i])) i++;
    } else if (c === "/" && source[i + 1] === "*") {
      const close = source.indexOf("*/", i + 2);
      if (close < 0) return -1;
      i = close + 2;
    } else if (c === "{") {
      stack[stack.length - 1] = top + 1;
      i++;
    } else if (c === "}") {
      if (top === 0) stack.pop();
      else stack[stack.length - 1] = top - 1;
      i++;
    } else {
      i++;
    }
  }

  return -1;
}

/** Regex literal plus flags. A `/` inside a character class does not close it. */
export function findRegexEnd(source: string, pos: number): number {
  let i = pos + 1;
  let inClass = false;

  while (i < source.length) {
    const c = source[i];
    if (c === "\\") {
      if (isLineBreak(source[i + 1])) return -1;
      i += 2;
      continue;
    }
    if (isLineBreak(c)) return -1;
    if (inClass) {
      if (c === "]") inClass = false;
    } else if (c === "[") {
      inClass = true;
    } else if (c === "/") {
      return scanIdentifierEnd(source, i + 1);
    }
    i++;
  }

  return -1;
}

export function findBlockCommentEnd(source: string, pos: number): number {
  const close = source.indexOf("*/", pos + 2);
  return close < 0 ? -1 : close + 2;
}

export function findLineCommentEnd(source: string, pos: number): number {
  let i = pos + 2;
  while (i < source.length && !isLineBreak(source[i])) i++;
  return i;
}

/** Decimal, hex, octal, binary and bigint literals, with `_` separators. */
export function findNumberEnd(source: string, pos: number): number {
  let i = pos;

  if (source.charAt(i) === "0" && /[xXoObB]/.test(source.charAt(i + 1))) {
    i += 2;
    while (/[0-9a-fA-F_]/.test(source.charAt(i))) i++;
  } else {
    while (isDigit(source[i]) || source[i] === "_") i++;
    if (source[i] === "." && source[i + 1] !== "." && !isIdentifierStart(source, i + 1)) {
      i++;
      while (isDigit(source[i]) || source[i] === "_") i++;
    }
    const sign = source.charAt(i + 1);
    if (/[eE]/.test(source.charAt(i)) && (isDigit(sign) || (/[+-]/.test(sign) && isDigit(source[i + 2])))) {
      i += 2;
      while (isDigit(source[i])) i++;
    }
  }

  if (source[i] === "n") i++;
  return i;
}

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

/** Longest first */
const OPERATORS: readonly string[] = [
  ">>>=",
  "...",
  "===",
  "!==",
  "**=",
  "<<=",
  ">>=",
  ">>>",
  "&&=",
  "||=",
  "??=",
  "=>",
  "==",
  "!=",
  "<=",
  ">=",
  "&&",
  "||",
  "??",
  "++",
  "--",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "|=",
  "^=",
  "**",
  "<<",
  ">>",
  "+",
  "-",
  "*",
  "/",
  "%",
  "=",
  "<",
  ">",
  "!",
  "&",
  "|",
  "^",
  "~",
];

export function matchOperator(source: string, pos: number): string | null {
  for (const op of OPERATORS) {
    if (source.startsWith(op, pos)) return op;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Lookahead heuristics
// ---------------------------------------------------------------------------

const TYPE_ARGUMENT_CHARS = /[\s.,[\]|&(){}:?]/;

/**
 * Whether a `<` at `pos` opens a type-argument list: scans to the matching
 * `>` over characters a type can contain. Returns the offset past the `>`,
 * or -1. `a < b && c > d` fails on `&&`; `i < n; i++` fails on `;`.
 */
export function findTypeArgumentsEnd(source: string, pos: number): number {
  let depth = 0;
  let i = pos;

  while (i < source.length) {
    const c = source[i];
    if (c === "<") {
      depth++;
    } else if (c === ">") {
      depth--;
      if (depth === 0) return i + 1;
    } else if (c === "=") {
      // `=>` of a function type, or a type-parameter default
      if (source[i + 1] === ">") {
        i += 2;
        continue;
      }
      if (source[i + 1] === "=") return -1;
    } else if (c === '"' || c === "'") {
      const end = findQuoteEnd(source, i);
      if (end < 0) return -1;
      i = end;
      continue;
    } else if ((c === "&" || c === "|") && source[i + 1] === c) {
      return -1;
    } else if (!TYPE_ARGUMENT_CHARS.test(c) && !isIdentifierPart(source, i)) {
      return -1;
    }
    i++;
  }

  return -1;
}

/**
 * Classify a `<` in expression position: a markup tag (`<div`, `<Foo.Bar`,
 * the `<>` fragment), the type-parameter list of a generic arrow function
 * (`<T,>(`, `<T extends U>(`, `<T>(`), or neither.
 */
export function classifyAngle(source: string, pos: number): "markup" | "generic" | null {
  if (source[pos + 1] === ">") return "markup";
  if (!isIdentifierStart(source, pos + 1)) return null;

  const nameEnd = scanIdentifierEnd(source, pos + 1, ".-:");
  const after = source[nameEnd];
  if (after === ",") return "generic";
  if (after === ">" && source[nameEnd + 1] === "(" && /^[A-Z]\w*$/.test(source.slice(pos + 1, nameEnd))) {
    return "generic";
  }
  const next = skipWhitespace(source, nameEnd);
  if (next > nameEnd && startsWithWord(source, next, "extends")) return "generic";
  return "markup";
}

/**
 * Offset of the `)` matching the `(` at `pos`, skipping string, template and
 * comment contents; -1 when there is none.
 */
export function findClosingParen(source: string, pos: number): number {
  let depth = 0;
  let i = pos;

  while (i < source.length) {
    const c = source[i];
    let end = -1;
    if (c === '"' || c === "'") {
      end = findQuoteEnd(source, i);
    } else if (c === "`") {
      end = findTemplateEnd(source, i);
    } else if (c === "/" && source[i + 1] === "/") {
      end = findLineCommentEnd(source, i);
    } else if (c === "/" && source[i + 1] === "*") {
      end = findBlockCommentEnd(source, i);
    } else {
      if (c === "(") depth++;
      if (c === ")") {
        depth--;
        if (depth === 0) return i;
      }
      i++;
      continue;
    }
    if (end < 0) return -1;
    i = end;
  }

  return -1;
}

/** Skip whitespace and comments. */
export function skipTrivia(source: string, pos: number): number {
  let i = skipWhitespace(source, pos);
  for (;;) {
    if (source.startsWith("//", i)) {
      i = skipWhitespace(source, findLineCommentEnd(source, i));
    } else if (source.startsWith("/*", i)) {
      const end = findBlockCommentEnd(source, i);
      if (end < 0) return i;
      i = skipWhitespace(source, end);
    } else {
      return i;
    }
  }
}
