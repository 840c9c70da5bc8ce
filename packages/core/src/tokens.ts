/**
 * Token model shared by the lexer, the pattern compiler, the matcher and the
 * dispatcher.
 *
 * Tokens are produced once by the lexer and never mutated. Every other part of
 * the toolkit refers to them by index into the sequence that owns them.
 */

// ============================================================================
// Token Kinds
// ============================================================================

export enum TokenKind {
  Keyword = "keyword",
  Identifier = "identifier",
  String = "string",
  Number = "number",
  Operator = "operator",
  Punctuation = "punctuation",
  Comment = "comment",
  Whitespace = "whitespace",
  TemplateString = "template-string",
  Regex = "regex",
  Decorator = "decorator",
  EndOfInput = "end-of-input",
  Unknown = "unknown",

  // Type context
  Colon = "colon",
  GenericOpen = "generic-open",
  GenericClose = "generic-close",
  TypeName = "type-name",
  QuestionMark = "question-mark",
  Arrow = "arrow",
  TypeOperator = "type-operator",
  Extends = "extends",
  TupleOpen = "tuple-open",
  TupleClose = "tuple-close",
  MappedIn = "mapped-in",
  AsConst = "as-const",

  // Markup context
  TagOpen = "tag-open",
  TagClose = "tag-close",
  SelfClose = "self-close",
  TagEnd = "tag-end",
  AttributeName = "attribute-name",
  AttributeValue = "attribute-value",
  Text = "text",
  ExpressionStart = "expression-start",
  ExpressionEnd = "expression-end",
}

/** All kinds, in declaration order. */
export const TOKEN_KINDS: readonly TokenKind[] = Object.values(TokenKind);

// ============================================================================
// Tokens
// ============================================================================

/** 1-based line/column plus the 0-based character offset. */
export interface SourcePosition {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export interface Token {
  readonly kind: TokenKind;
  /** Exact source substring */
  readonly value: string;
  /** Offset of the first character */
  readonly start: number;
  /** Offset one past the last character */
  readonly end: number;
  readonly line: number;
  readonly column: number;
}

/**
 * Create a token that does not come from any source text, for use in edits.
 * Synthetic tokens carry `-1` offsets and a zero line/column.
 */
export function createToken(kind: TokenKind, value: string): Token {
  return { kind, value, start: -1, end: -1, line: 0, column: 0 };
}

export function isSynthetic(token: Token): boolean {
  return token.start < 0;
}

/** Whitespace and comments. */
export function isTrivia(token: Token): boolean {
  return token.kind === TokenKind.Whitespace || token.kind === TokenKind.Comment;
}

/** Concatenate token values. */
export function tokenText(tokens: Iterable<Token>): string {
  let text = "";
  for (const token of tokens) text += token.value;
  return text;
}

/** Human-readable token description, used in diagnostics. */
export function describeToken(token: Token): string {
  if (token.kind === TokenKind.EndOfInput) return "end of input";
  const where = isSynthetic(token) ? "synthetic" : `${token.line}:${token.column}`;
  return `${token.kind} ${JSON.stringify(token.value)} (${where})`;
}

// ============================================================================
// Bracket structure
// ============================================================================

const STRUCTURAL_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.Punctuation,
  TokenKind.Operator,
  TokenKind.ExpressionStart,
  TokenKind.ExpressionEnd,
  TokenKind.GenericOpen,
  TokenKind.GenericClose,
  TokenKind.TupleOpen,
  TokenKind.TupleClose,
]);

/**
 * Whether a token can take part in bracket balancing. Brackets that appear
 * inside strings, comments, templates or markup text never do.
 */
export function isStructural(token: Token): boolean {
  return STRUCTURAL_KINDS.has(token.kind);
}

const OPEN_VALUES: ReadonlySet<string> = new Set(["(", "[", "{"]);
const CLOSE_VALUES: ReadonlySet<string> = new Set([")", "]", "}"]);

/**
 * Nesting delta of a token: +1 for tokens that open a nested region (brackets,
 * generic and tuple openers, markup tag-opens and expression-starts), -1 for
 * the tokens that close one, 0 otherwise.
 */
export function nestingDelta(token: Token): number {
  switch (token.kind) {
    case TokenKind.TagOpen:
    case TokenKind.ExpressionStart:
    case TokenKind.GenericOpen:
    case TokenKind.TupleOpen:
      return 1;
    case TokenKind.TagClose:
    case TokenKind.SelfClose:
    case TokenKind.ExpressionEnd:
    case TokenKind.GenericClose:
    case TokenKind.TupleClose:
      return -1;
    case TokenKind.Punctuation:
      if (OPEN_VALUES.has(token.value)) return 1;
      if (CLOSE_VALUES.has(token.value)) return -1;
      return 0;
    default:
      return 0;
  }
}

/**
 * Index one past the close token that balances the open token at `index`,
 * or -1 when `tokens[index]` is not `open` or the region never closes.
 * Only structural tokens count, so a `(` inside a string or markup text
 * does not.
 */
export function findBalancedEnd(tokens: readonly Token[], index: number, open: string, close: string): number {
  const first = tokens[index];
  if (!first || !isStructural(first) || first.value !== open) {
    return -1;
  }

  let depth = 0;
  for (let i = index; i < tokens.length; i++) {
    const token = tokens[i];
    if (!isStructural(token)) continue;
    if (token.value === open) {
      depth++;
    } else if (token.value === close) {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/** The close bracket for `open`; other values pair with themselves. */
export function matchingClose(open: string): string {
  switch (open) {
    case "(":
      return ")";
    case "[":
      return "]";
    case "{":
      return "}";
    case "<":
      return ">";
    default:
      return open;
  }
}
