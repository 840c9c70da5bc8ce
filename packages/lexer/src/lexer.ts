/**
 * Contextual lexer for TypeScript with embedded markup (TSX).
 *
 * A single left-to-right pass driven by an explicit mode stack. The same
 * character can produce different kinds depending on context: `<` is a
 * comparison, a generic-open or a tag-open; `/` is division or a regex; `:`
 * is a ternary/object-key operator or the start of a type annotation.
 */

import { TokenKind, LexError, config, createLogger, type Token, type SourcePosition } from "@tokenloom/core";
import {
  charWidth,
  isDigit,
  isIdentifierStart,
  isLineBreak,
  isWhitespace,
  scanIdentifierEnd,
  skipWhitespace,
  startsWithWord,
} from "./chars.js";
import {
  classifyAngle,
  findBlockCommentEnd,
  findClosingParen,
  findLineCommentEnd,
  findNumberEnd,
  findQuoteEnd,
  findRegexEnd,
  findTemplateEnd,
  findTypeArgumentsEnd,
  matchOperator,
  skipTrivia,
} from "./scan.js";
import {
  bracketFrame,
  endStatement,
  typeFrame,
  type BracketFrame,
  type MarkupFrame,
  type ModeFrame,
  type ScriptFrame,
  type TypeFrame,
} from "./modes.js";
import { WORDS } from "./words.js";

const log = createLogger("lexer");

export interface TokenizeOptions {
  /** Keep whitespace tokens (default: the `lexer.whitespace` config value, false) */
  includeWhitespace?: boolean;
  /** Keep comment tokens (default: the `lexer.comments` config value, false) */
  includeComments?: boolean;
}

/**
 * Tokenize `source`. The result always ends with one end-of-input token.
 *
 * @throws LexError on an unterminated string, template, regex, block comment
 * or markup attribute value
 */
export function tokenize(source: string, options: TokenizeOptions = {}): Token[] {
  const lexer = new Lexer(source, {
    includeWhitespace: options.includeWhitespace ?? config.getBoolean("lexer.whitespace", false),
    includeComments: options.includeComments ?? config.getBoolean("lexer.comments", false),
  });
  const tokens = lexer.run();
  log.debug(`${source.length} chars -> ${tokens.length} tokens`);
  return tokens;
}

const CLOSERS: ReadonlySet<string> = new Set([")", "]", "}"]);
const METHOD_MODIFIERS: ReadonlySet<string> = new Set(["async", "get", "set"]);

class Lexer {
  private readonly tokens: Token[] = [];
  private pos = 0;

  private readonly modes: ModeFrame[] = [{ mode: "script", base: -1 }];
  private readonly brackets: BracketFrame[] = [bracketFrame("{", "block")];

  /** Last non-trivia token */
  private last: Token | null = null;
  /** Non-trivia token before `last` */
  private beforeLast: Token | null = null;
  /** `last` is a `)` that closed a parameter list */
  private closedParams = false;

  // Line/column cursor; tokens are emitted in source order
  private cursor = 0;
  private line = 1;
  private column = 1;

  constructor(
    private readonly source: string,
    private readonly options: Required<TokenizeOptions>
  ) {}

  run(): Token[] {
    while (this.pos < this.source.length) {
      const frame = this.modes[this.modes.length - 1];
      switch (frame.mode) {
        case "script":
          this.scanScript(frame);
          break;
        case "type":
          this.scanType(frame);
          break;
        case "markup-tag":
          this.scanMarkupTag(frame);
          break;
        case "markup-text":
          this.scanMarkupText(frame);
          break;
        case "markup-close":
          this.scanMarkupClose();
          break;
      }
    }
    this.emit(TokenKind.EndOfInput, this.source.length);
    return this.tokens;
  }

  // ==========================================================================
  // Emission
  // ==========================================================================

  private positionAt(offset: number): SourcePosition {
    if (offset < this.cursor) {
      this.cursor = 0;
      this.line = 1;
      this.column = 1;
    }
    while (this.cursor < offset) {
      if (this.source[this.cursor] === "\n") {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.cursor++;
    }
    return { offset, line: this.line, column: this.column };
  }

  /** Emit `source[pos, end)` as `kind` and move past it. */
  private emit(kind: TokenKind, end: number): void {
    const start = this.pos;
    this.pos = end;

    const trivia = kind === TokenKind.Whitespace || kind === TokenKind.Comment;
    if (kind === TokenKind.Whitespace && !this.options.includeWhitespace) return;
    if (kind === TokenKind.Comment && !this.options.includeComments) return;

    const { line, column } = this.positionAt(start);
    const token: Token = { kind, value: this.source.slice(start, end), start, end, line, column };
    this.tokens.push(token);
    if (!trivia) {
      this.beforeLast = this.last;
      this.last = token;
      this.closedParams = false;
    }
  }

  private fail(reason: string, offset: number): LexError {
    return new LexError(reason, this.positionAt(offset));
  }

  /** Whitespace and comments, shared by every script-like mode. */
  private scanTrivia(): boolean {
    const src = this.source;
    const start = this.pos;
    const ch = src[start];

    if (isWhitespace(ch)) {
      this.emit(TokenKind.Whitespace, skipWhitespace(src, start));
      return true;
    }
    if (ch === "/" && src[start + 1] === "/") {
      this.emit(TokenKind.Comment, findLineCommentEnd(src, start));
      return true;
    }
    if (ch === "/" && src[start + 1] === "*") {
      const end = findBlockCommentEnd(src, start);
      if (end < 0) throw this.fail("Unterminated block comment", start);
      this.emit(TokenKind.Comment, end);
      return true;
    }
    return false;
  }

  /** String, template and number literals, shared by script and type modes. */
  private scanLiteral(): boolean {
    const src = this.source;
    const start = this.pos;
    const ch = src[start];

    if (ch === '"' || ch === "'") {
      const end = findQuoteEnd(src, start);
      if (end < 0) throw this.fail("Unterminated string literal", start);
      this.emit(TokenKind.String, end);
      return true;
    }
    if (ch === "`") {
      const end = findTemplateEnd(src, start);
      if (end < 0) throw this.fail("Unterminated template string", start);
      this.emit(TokenKind.TemplateString, end);
      return true;
    }
    if (isDigit(ch) || (ch === "." && isDigit(src[start + 1]))) {
      this.emit(TokenKind.Number, findNumberEnd(src, start));
      return true;
    }
    return false;
  }

  // ==========================================================================
  // Script mode
  // ==========================================================================

  private get scope(): BracketFrame {
    return this.brackets[this.brackets.length - 1];
  }

  /** Whether the last token leaves the parser expecting an operand. */
  private atExpressionStart(): boolean {
    const last = this.last;
    if (!last) return true;
    switch (last.kind) {
      case TokenKind.Operator:
        return last.value !== "++" && last.value !== "--";
      case TokenKind.Arrow:
      case TokenKind.Colon:
      case TokenKind.QuestionMark:
      case TokenKind.ExpressionStart:
        return true;
      case TokenKind.Punctuation:
        return !CLOSERS.has(last.value) && last.value !== ".";
      case TokenKind.Keyword:
        return !WORDS.valueKeywords.has(last.value);
      default:
        return false;
    }
  }

  /** Whether `token` can end an operand that `as`/`satisfies` applies to. */
  private endsOperand(token: Token | null): boolean {
    if (!token) return false;
    switch (token.kind) {
      case TokenKind.Identifier:
      case TokenKind.String:
      case TokenKind.Number:
      case TokenKind.TemplateString:
      case TokenKind.GenericClose:
      case TokenKind.TypeName:
      case TokenKind.TupleClose:
      case TokenKind.TagEnd:
      case TokenKind.SelfClose:
        return true;
      case TokenKind.Keyword:
        return WORDS.valueKeywords.has(token.value);
      case TokenKind.Punctuation:
        return CLOSERS.has(token.value);
      default:
        return false;
    }
  }

  private scanScript(frame: ScriptFrame): void {
    if (this.scanTrivia() || this.scanLiteral()) return;

    const src = this.source;
    const start = this.pos;
    const ch = src[start];

    if (isIdentifierStart(src, start) || (ch === "#" && isIdentifierStart(src, start + 1))) {
      this.scanScriptWord(start);
      return;
    }
    if (ch === "@" && isIdentifierStart(src, start + 1)) {
      this.emit(TokenKind.Decorator, scanIdentifierEnd(src, start + 1));
      return;
    }

    switch (ch) {
      case "(":
        this.openParen();
        return;
      case "[":
        this.brackets.push(bracketFrame("[", "index"));
        this.emit(TokenKind.Punctuation, start + 1);
        return;
      case "{":
        this.openBrace();
        return;
      case ")":
      case "]":
        this.closeBracket(frame, ch === ")" ? "(" : "[");
        return;
      case "}":
        this.closeBrace(frame);
        return;
      case ";":
        endStatement(this.scope);
        this.emit(TokenKind.Punctuation, start + 1);
        return;
      case ",":
        if (this.scope.declaring) this.scope.binding = true;
        this.emit(TokenKind.Punctuation, start + 1);
        return;
      case ":":
        this.scanColon();
        return;
      case "?":
        this.scanQuestion();
        return;
      case ".":
        if (!src.startsWith("...", start)) {
          this.emit(TokenKind.Punctuation, start + 1);
          return;
        }
        break;
      case "<":
        if (this.scanAngle()) return;
        break;
      case "/":
        if (this.atExpressionStart()) {
          const end = findRegexEnd(src, start);
          if (end < 0) throw this.fail("Unterminated regex literal", start);
          this.emit(TokenKind.Regex, end);
          return;
        }
        break;
    }

    const op = matchOperator(src, start);
    if (op === null) {
      this.emit(TokenKind.Unknown, start + charWidth(src, start));
      return;
    }
    if (op === "=>") {
      this.emit(TokenKind.Arrow, start + 2);
      return;
    }

    const scope = this.scope;
    this.emit(TokenKind.Operator, start + op.length);
    if (op === "=") {
      scope.binding = false;
      if (scope.typeAlias) {
        scope.typeAlias = false;
        this.modes.push(typeFrame());
      }
    }
  }

  private scanScriptWord(start: number): void {
    const src = this.source;
    const end = scanIdentifierEnd(src, src[start] === "#" ? start + 1 : start);
    const word = src.slice(start, end);
    const before = this.last;
    const scope = this.scope;

    const afterDot = before !== null && (before.value === "." || before.value === "?.");
    if (afterDot || !WORDS.keywords.has(word) || this.isPropertyKey(word, end)) {
      if (word === "of" && scope.declaring) scope.binding = false;
      this.emit(TokenKind.Identifier, end);
      return;
    }

    this.emit(TokenKind.Keyword, end);

    switch (word) {
      case "const":
      case "let":
      case "var":
        scope.declaring = true;
        scope.binding = true;
        scope.moduleClause = false;
        break;
      case "function":
        scope.pendingParams = true;
        scope.moduleClause = false;
        break;
      case "class":
      case "interface":
        scope.pendingBody = true;
        scope.moduleClause = false;
        break;
      case "import":
      case "export":
        scope.moduleClause = true;
        break;
      case "default":
      case "enum":
      case "async":
      case "declare":
        scope.moduleClause = false;
        break;
      case "type":
        if (this.startsTypeAlias(end)) {
          scope.typeAlias = true;
          scope.moduleClause = false;
        }
        break;
      case "in":
        scope.binding = false;
        break;
      case "as":
      case "satisfies":
        if (!scope.moduleClause && this.endsOperand(before)) {
          this.modes.push(typeFrame({ cast: true }));
        }
        break;
    }
  }

  /** A keyword spelled as an object or member key: `{ type: 1 }`, `default?: T`. */
  private isPropertyKey(word: string, end: number): boolean {
    if (word === "case" || word === "default") return false;
    const last = this.last;
    const start = end - word.length;
    if (
      last !== null &&
      !(last.kind === TokenKind.Punctuation && ["{", ",", ";"].includes(last.value)) &&
      !/[\r\n]/.test(this.source.slice(last.end, start))
    ) {
      return false;
    }
    const next = skipWhitespace(this.source, end);
    const ch = this.source[next];
    return (ch === ":" && this.source[next + 1] !== ":") || this.source.startsWith("?:", next);
  }

  /** `type Name =` or `type Name<...> =` */
  private startsTypeAlias(end: number): boolean {
    const src = this.source;
    const nameStart = skipWhitespace(src, end);
    if (!isIdentifierStart(src, nameStart)) return false;
    const after = skipWhitespace(src, scanIdentifierEnd(src, nameStart));
    return src[after] === "=" || src[after] === "<";
  }

  private openParen(): void {
    const scope = this.scope;
    const last = this.last;
    let role: "params" | "group" = "group";

    if (scope.pendingParams) {
      role = "params";
    } else if (
      scope.role === "members" &&
      last !== null &&
      (last.kind === TokenKind.Identifier || last.kind === TokenKind.Keyword || last.kind === TokenKind.GenericClose)
    ) {
      role = "params";
    } else if (scope.role === "block" && scope.ternaries === 0 && this.methodKeyBefore() && this.methodBodyAhead()) {
      role = "params";
    } else if (
      (!this.endsOperand(last) || last?.kind === TokenKind.GenericClose) &&
      this.arrowParamsAhead()
    ) {
      role = "params";
    }

    scope.pendingParams = false;
    this.brackets.push(bracketFrame("(", role));
    this.emit(TokenKind.Punctuation, this.pos + 1);
  }

  /** `last` names a method in an object literal: `{ m(`, `, m(`, `get m(` */
  private methodKeyBefore(): boolean {
    const key = this.last;
    const before = this.beforeLast;
    if (key === null || key.kind !== TokenKind.Identifier || before === null) return false;
    if (before.kind === TokenKind.Punctuation) return before.value === "{" || before.value === ",";
    if (before.kind === TokenKind.Operator) return before.value === "*";
    return (
      (before.kind === TokenKind.Keyword || before.kind === TokenKind.Identifier) &&
      METHOD_MODIFIERS.has(before.value)
    );
  }

  /** `(...) {` or `(...): Type` */
  private methodBodyAhead(): boolean {
    const src = this.source;
    const close = findClosingParen(src, this.pos);
    if (close < 0) return false;
    const next = skipTrivia(src, close + 1);
    return src[next] === "{" || (src[next] === ":" && src[next + 1] !== ":");
  }

  /** `(...) =>` or `(...): Type =>` */
  private arrowParamsAhead(): boolean {
    const src = this.source;
    const close = findClosingParen(src, this.pos);
    if (close < 0) return false;
    const next = skipTrivia(src, close + 1);
    if (src.startsWith("=>", next)) return true;
    return (
      src[next] === ":" &&
      src[next + 1] !== ":" &&
      this.scope.ternaries === 0 &&
      this.last?.value !== "case" &&
      this.last?.value !== "?"
    );
  }

  private openBrace(): void {
    const scope = this.scope;
    const role = scope.pendingBody ? "members" : "block";
    scope.pendingBody = false;
    scope.pendingParams = false;
    this.brackets.push(bracketFrame("{", role));
    this.emit(TokenKind.Punctuation, this.pos + 1);
  }

  private canPop(frame: ScriptFrame): boolean {
    return this.brackets.length > Math.max(1, frame.base);
  }

  private closeBracket(frame: ScriptFrame, open: "(" | "["): void {
    let closedParams = false;
    if (this.canPop(frame) && this.scope.open === open) {
      const closed = this.brackets.pop();
      closedParams = closed?.role === "params";
    }
    this.emit(TokenKind.Punctuation, this.pos + 1);
    this.closedParams = closedParams;
  }

  private closeBrace(frame: ScriptFrame): void {
    if (frame.base >= 0 && this.brackets.length === frame.base) {
      this.brackets.pop();
      this.modes.pop();
      this.emit(TokenKind.ExpressionEnd, this.pos + 1);
      return;
    }
    if (this.canPop(frame) && this.scope.open === "{") this.brackets.pop();
    this.emit(TokenKind.Punctuation, this.pos + 1);
  }

  private scanColon(): void {
    const scope = this.scope;
    const last = this.last;
    let annotation = false;

    if (last?.kind === TokenKind.QuestionMark) {
      annotation = true;
    } else if (scope.ternaries > 0) {
      scope.ternaries--;
    } else if (this.closedParams) {
      annotation = true;
    } else if (
      last !== null &&
      (last.kind === TokenKind.Identifier ||
        (last.kind === TokenKind.Punctuation && (last.value === "}" || last.value === "]")) ||
        (scope.role === "members" && (last.kind === TokenKind.String || last.kind === TokenKind.Number)))
    ) {
      annotation = scope.role === "params" || scope.role === "members" || scope.binding;
    }

    this.emit(annotation ? TokenKind.Colon : TokenKind.Operator, this.pos + 1);
    if (annotation) this.modes.push(typeFrame());
  }

  private scanQuestion(): void {
    const src = this.source;
    const start = this.pos;

    if (src.startsWith("??", start)) {
      this.emit(TokenKind.Operator, start + (src[start + 2] === "=" ? 3 : 2));
      return;
    }
    if (src[start + 1] === "." && !isDigit(src[start + 2])) {
      this.emit(TokenKind.Operator, start + 2);
      return;
    }

    const scope = this.scope;
    const next = skipWhitespace(src, start + 1);
    if (src[next] === ":" && (scope.role === "params" || scope.role === "members" || scope.binding)) {
      this.emit(TokenKind.QuestionMark, start + 1);
      return;
    }
    scope.ternaries++;
    this.emit(TokenKind.Operator, start + 1);
  }

  /** Markup tag, generic argument list, or nothing (plain operator). */
  private scanAngle(): boolean {
    const src = this.source;
    const start = this.pos;
    if (src[start + 1] === "=" || src[start + 1] === "<") return false;

    if (this.atExpressionStart()) {
      const kind = classifyAngle(src, start);
      if (kind === "markup") {
        this.openTag();
        return true;
      }
      if (kind === "generic") {
        this.openGenericArgs();
        return true;
      }
      return false;
    }

    const last = this.last;
    if (last?.kind !== TokenKind.Identifier && !(last?.kind === TokenKind.Keyword && last.value === "function")) {
      return false;
    }
    const end = findTypeArgumentsEnd(src, start);
    if (end < 0) return false;

    const scope = this.scope;
    const next = src[skipWhitespace(src, end)];
    if (next === "(" || next === "`" || scope.pendingBody || scope.pendingParams || scope.typeAlias) {
      this.openGenericArgs();
      return true;
    }
    return false;
  }

  private openGenericArgs(): void {
    this.emit(TokenKind.GenericOpen, this.pos + 1);
    this.modes.push(typeFrame({ genericArgs: true }));
  }

  // ==========================================================================
  // Type mode
  // ==========================================================================

  /** Leave type mode without consuming; the enclosing mode reads the character. */
  private exitType(): void {
    this.modes.pop();
  }

  private scanType(frame: TypeFrame): void {
    const src = this.source;
    const start = this.pos;
    const ch = src[start];

    if (isWhitespace(ch)) {
      const end = skipWhitespace(src, start);
      if (this.typeEndsAtLineBreak(frame, start, end)) {
        this.exitType();
        return;
      }
      this.emit(TokenKind.Whitespace, end);
      return;
    }
    if (this.scanTrivia()) return;

    const afterGroup = frame.afterGroup;
    frame.afterGroup = false;

    if (this.scanLiteral()) {
      frame.fresh = false;
      frame.expectType = false;
      return;
    }
    if (isIdentifierStart(src, start)) {
      this.scanTypeWord(frame, start);
      return;
    }

    const nesting = frame.nesting;
    const top = nesting.length > 0 ? nesting[nesting.length - 1] : undefined;
    const nested = top !== undefined;

    const take = (kind: TokenKind, length: number, expectType: boolean): void => {
      frame.fresh = false;
      frame.expectType = expectType;
      this.emit(kind, start + length);
    };

    switch (ch) {
      case "<":
        nesting.push("<");
        take(TokenKind.GenericOpen, 1, true);
        return;
      case ">":
        if (top !== "<") break;
        nesting.pop();
        take(TokenKind.GenericClose, 1, false);
        if (frame.genericArgs && nesting.length === 0) this.exitType();
        return;
      case "[":
        nesting.push("[");
        take(TokenKind.TupleOpen, 1, true);
        return;
      case "]":
        if (top !== "[") break;
        nesting.pop();
        take(TokenKind.TupleClose, 1, false);
        return;
      case "(":
        nesting.push("(");
        take(TokenKind.Punctuation, 1, true);
        return;
      case ")":
        if (top !== "(") break;
        nesting.pop();
        take(TokenKind.Punctuation, 1, false);
        frame.afterGroup = true;
        return;
      case "{":
        if (!nested && !frame.expectType) break;
        nesting.push("{");
        take(TokenKind.Punctuation, 1, true);
        return;
      case "}":
        if (top !== "{") break;
        nesting.pop();
        take(TokenKind.Punctuation, 1, false);
        return;
      case ";":
        if (top !== "{") break;
        take(TokenKind.Punctuation, 1, true);
        return;
      case ",":
        if (!nested) break;
        take(TokenKind.Punctuation, 1, true);
        return;
      case ":":
        take(TokenKind.Colon, 1, true);
        return;
      case "?":
        take(TokenKind.QuestionMark, 1, true);
        return;
      case ".":
        if (src.startsWith("...", start)) take(TokenKind.Operator, 3, true);
        else take(TokenKind.Punctuation, 1, true);
        return;
      case "=":
        if (src[start + 1] === ">") {
          if (!nested && !afterGroup) break;
          take(TokenKind.Arrow, 2, true);
          return;
        }
        if (!nested || src[start + 1] === "=") break;
        take(TokenKind.Operator, 1, true);
        return;
      case "|":
      case "&":
        if (src[start + 1] === ch || src[start + 1] === "=") break;
        take(TokenKind.Operator, 1, true);
        return;
      case "-":
      case "+":
        if (!nested && !frame.expectType) break;
        take(TokenKind.Operator, 1, true);
        return;
    }

    this.exitType();
  }

  private scanTypeWord(frame: TypeFrame, start: number): void {
    const src = this.source;
    const end = scanIdentifierEnd(src, start);
    const word = src.slice(start, end);

    if (frame.cast && frame.fresh && word === "const") {
      this.emit(TokenKind.AsConst, end);
      this.exitType();
      return;
    }
    if (!frame.expectType && frame.nesting.length === 0 && word !== "extends" && word !== "is") {
      this.exitType();
      return;
    }

    let kind: TokenKind;
    let expectType = true;
    if (WORDS.typeOperators.has(word)) {
      kind = TokenKind.TypeOperator;
    } else if (word === "extends") {
      kind = TokenKind.Extends;
    } else if (word === "in") {
      kind = TokenKind.MappedIn;
    } else if (WORDS.builtinTypes.has(word)) {
      kind = TokenKind.TypeName;
      expectType = false;
    } else if (WORDS.typeKeywords.has(word)) {
      kind = TokenKind.Keyword;
      expectType = word !== "this" && word !== "true" && word !== "false";
    } else if (this.last?.value === "." || src[end] === ".") {
      // qualified name: React.FC
      kind = TokenKind.Identifier;
      expectType = false;
    } else if (WORDS.keywords.has(word)) {
      kind = TokenKind.Keyword;
      expectType = false;
    } else {
      kind = TokenKind.TypeName;
      expectType = false;
    }

    frame.fresh = false;
    frame.expectType = expectType;
    this.emit(kind, end);
  }

  /**
   * A line break ends a complete top-level type unless the next line
   * continues it (`| B`, `& C`, `.D`, `? X : Y`, `extends`).
   */
  private typeEndsAtLineBreak(frame: TypeFrame, start: number, end: number): boolean {
    if (frame.expectType || frame.genericArgs || frame.nesting.length > 0) return false;
    let hasBreak = false;
    for (let i = start; i < end; i++) {
      if (isLineBreak(this.source[i])) hasBreak = true;
    }
    if (!hasBreak) return false;
    const next = this.source.charAt(end);
    return !"|&.?:".includes(next) && !startsWithWord(this.source, end, "extends");
  }

  // ==========================================================================
  // Markup modes
  // ==========================================================================

  /** `<name` or the fragment `<` */
  private openTag(): void {
    const end = scanIdentifierEnd(this.source, this.pos + 1, ".-:");
    this.emit(TokenKind.TagOpen, end);
    this.modes.push({ mode: "markup-tag" });
  }

  /** `{` inside markup: script code until the matching `}`. */
  private openExpression(): void {
    this.brackets.push(bracketFrame("{", "block"));
    this.modes.push({ mode: "script", base: this.brackets.length });
    this.emit(TokenKind.ExpressionStart, this.pos + 1);
  }

  private scanMarkupTag(frame: MarkupFrame): void {
    const src = this.source;
    const start = this.pos;
    const ch = src[start];

    if (isWhitespace(ch)) {
      this.emit(TokenKind.Whitespace, skipWhitespace(src, start));
    } else if (ch === "/" && src[start + 1] === ">") {
      this.modes.pop();
      this.emit(TokenKind.SelfClose, start + 2);
    } else if (ch === ">") {
      frame.mode = "markup-text";
      this.emit(TokenKind.TagEnd, start + 1);
    } else if (ch === "{") {
      this.openExpression();
    } else if (ch === '"' || ch === "'") {
      const end = findQuoteEnd(src, start, true);
      if (end < 0) throw this.fail("Unterminated attribute value", start);
      this.emit(TokenKind.AttributeValue, end);
    } else if (ch === "=") {
      this.emit(TokenKind.Operator, start + 1);
    } else if (isIdentifierStart(src, start)) {
      this.emit(TokenKind.AttributeName, scanIdentifierEnd(src, start, "-:"));
    } else {
      this.emit(TokenKind.Unknown, start + charWidth(src, start));
    }
  }

  private tagAhead(pos: number): boolean {
    const next = this.source[pos + 1];
    return next === "/" || next === ">" || isIdentifierStart(this.source, pos + 1);
  }

  private scanMarkupText(frame: MarkupFrame): void {
    const src = this.source;
    const start = this.pos;
    const ch = src[start];

    if (ch === "<" && src[start + 1] === "/") {
      frame.mode = "markup-close";
      this.emit(TokenKind.TagClose, scanIdentifierEnd(src, start + 2, ".-:"));
      return;
    }
    if (ch === "<" && this.tagAhead(start)) {
      this.openTag();
      return;
    }
    if (ch === "{") {
      this.openExpression();
      return;
    }

    let end = start + 1;
    while (end < src.length && src[end] !== "{" && !(src[end] === "<" && this.tagAhead(end))) end++;

    // Surrounding whitespace is trivia; the text token is the trimmed run
    let textStart = start;
    while (textStart < end && isWhitespace(src[textStart])) textStart++;
    let textEnd = end;
    while (textEnd > textStart && isWhitespace(src[textEnd - 1])) textEnd--;

    if (textStart > start) this.emit(TokenKind.Whitespace, textStart);
    if (textEnd > textStart) this.emit(TokenKind.Text, textEnd);
    if (end > textEnd) this.emit(TokenKind.Whitespace, end);
  }

  private scanMarkupClose(): void {
    const src = this.source;
    const start = this.pos;
    const ch = src[start];

    if (isWhitespace(ch)) {
      this.emit(TokenKind.Whitespace, skipWhitespace(src, start));
    } else if (ch === ">") {
      this.modes.pop();
      this.emit(TokenKind.TagEnd, start + 1);
    } else {
      this.emit(TokenKind.Unknown, start + charWidth(src, start));
    }
  }
}
