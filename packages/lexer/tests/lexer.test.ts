/**
 * Tests for the contextual lexer
 */

import { describe, it, expect } from "vitest";
import { LexError, TokenKind, type Token } from "@tokenloom/core";
import { tokenize } from "@tokenloom/lexer";

/** `kind value` per token, end-of-input included. */
function brief(tokens: readonly Token[]): string[] {
  return tokens.map((t) => `${t.kind} ${t.value}`.trimEnd());
}

function lex(source: string): string[] {
  return brief(tokenize(source));
}

function lexError(source: string): LexError {
  try {
    tokenize(source);
  } catch (error) {
    if (error instanceof LexError) return error;
    throw error;
  }
  throw new Error(`expected a LexError for ${JSON.stringify(source)}`);
}

describe("tokenize", () => {
  // ---------------------------------------------------------------------------
  // Script code
  // ---------------------------------------------------------------------------

  describe("script", () => {
    it("should end every sequence with one end-of-input token", () => {
      const tokens = tokenize("");
      expect(tokens).toHaveLength(1);
      expect(tokens[0].kind).toBe(TokenKind.EndOfInput);
      expect(tokens[0].start).toBe(0);
    });

    it("should classify keywords, identifiers and literals", () => {
      expect(lex("let s = 'a' + 1.5e3;")).toEqual([
        "keyword let",
        "identifier s",
        "operator =",
        "string 'a'",
        "operator +",
        "number 1.5e3",
        "punctuation ;",
        "end-of-input",
      ]);
    });

    it("should keep template strings as one token", () => {
      expect(lex("f(`a ${b} c`)")).toEqual([
        "identifier f",
        "punctuation (",
        "template-string `a ${b} c`",
        "punctuation )",
        "end-of-input",
      ]);
    });

    it("should read optional chaining and nullish coalescing as operators", () => {
      expect(lex("a?.b ?? c")).toEqual(["identifier a", "operator ?.", "identifier b", "operator ??", "identifier c", "end-of-input"]);
    });

    it("should read a ternary's colon as an operator", () => {
      expect(lex("a ? b : c")).toEqual(["identifier a", "operator ?", "identifier b", "operator :", "identifier c", "end-of-input"]);
    });

    it("should read decorators", () => {
      expect(lex("@Component class X {}")).toEqual([
        "decorator @Component",
        "keyword class",
        "identifier X",
        "punctuation {",
        "punctuation }",
        "end-of-input",
      ]);
    });

    it("should read keywords after a dot as identifiers", () => {
      expect(lex("a.default")).toEqual(["identifier a", "punctuation .", "identifier default", "end-of-input"]);
    });

    it("should track line and column", () => {
      const [, b] = tokenize("a\n  b");
      expect(b.value).toBe("b");
      expect(b.start).toBe(4);
      expect(b.line).toBe(2);
      expect(b.column).toBe(3);
    });

    it("should accept Unicode identifiers", () => {
      expect(lex("café")).toEqual(["identifier café", "end-of-input"]);
    });
  });

  // ---------------------------------------------------------------------------
  // Regex versus division
  // ---------------------------------------------------------------------------

  describe("slash", () => {
    it("should start a regex after an operator", () => {
      const tokens = tokenize("let r = /a[/]b/g;");
      expect(tokens[3].kind).toBe(TokenKind.Regex);
      expect(tokens[3].value).toBe("/a[/]b/g");
      expect(tokens[4].value).toBe(";");
    });

    it("should start a regex after return and at stream start", () => {
      expect(tokenize("return /x/;")[1].kind).toBe(TokenKind.Regex);
      expect(tokenize("/x/.test(s)")[0].kind).toBe(TokenKind.Regex);
    });

    it("should divide after an operand", () => {
      expect(lex("a / b / c")).toEqual([
        "identifier a",
        "operator /",
        "identifier b",
        "operator /",
        "identifier c",
        "end-of-input",
      ]);
      expect(lex("(a) / 2")[3]).toBe("operator /");
    });
  });

  // ---------------------------------------------------------------------------
  // Type annotations
  // ---------------------------------------------------------------------------

  describe("types", () => {
    it("should reclassify a binding's annotation", () => {
      expect(lex("const x: Array<string> = [];")).toEqual([
        "keyword const",
        "identifier x",
        "colon :",
        "type-name Array",
        "generic-open <",
        "type-name string",
        "generic-close >",
        "operator =",
        "punctuation [",
        "punctuation ]",
        "punctuation ;",
        "end-of-input",
      ]);
    });

    it("should annotate arrow parameters and return types", () => {
      expect(lex("const f = (a: number): string => a;")).toEqual([
        "keyword const",
        "identifier f",
        "operator =",
        "punctuation (",
        "identifier a",
        "colon :",
        "type-name number",
        "punctuation )",
        "colon :",
        "type-name string",
        "arrow =>",
        "identifier a",
        "punctuation ;",
        "end-of-input",
      ]);
    });

    it("should mark optional parameters", () => {
      expect(lex("function f(a?: string) {}")).toEqual([
        "keyword function",
        "identifier f",
        "punctuation (",
        "identifier a",
        "question-mark ?",
        "colon :",
        "type-name string",
        "punctuation )",
        "punctuation {",
        "punctuation }",
        "end-of-input",
      ]);
    });

    it("should read type operators in an alias", () => {
      expect(lex("type K = keyof typeof obj;")).toEqual([
        "keyword type",
        "identifier K",
        "operator =",
        "type-operator keyof",
        "type-operator typeof",
        "type-name obj",
        "punctuation ;",
        "end-of-input",
      ]);
    });

    it("should read as const", () => {
      expect(lex("x as const;")).toEqual(["identifier x", "keyword as", "as-const const", "punctuation ;", "end-of-input"]);
    });

    it("should read every target of a chained cast as a type", () => {
      expect(lex("const y = x as unknown as Foo;")).toEqual([
        "keyword const",
        "identifier y",
        "operator =",
        "identifier x",
        "keyword as",
        "type-name unknown",
        "keyword as",
        "type-name Foo",
        "punctuation ;",
        "end-of-input",
      ]);
    });

    it("should annotate the parameters of an object-literal method", () => {
      expect(lex("const o = { m(a: number) { return a; } };")).toEqual([
        "keyword const",
        "identifier o",
        "operator =",
        "punctuation {",
        "identifier m",
        "punctuation (",
        "identifier a",
        "colon :",
        "type-name number",
        "punctuation )",
        "punctuation {",
        "keyword return",
        "identifier a",
        "punctuation ;",
        "punctuation }",
        "punctuation }",
        "punctuation ;",
        "end-of-input",
      ]);
    });

    it("should keep a call in a case label out of type context", () => {
      const tokens = lex("switch (v) { case g(x): break; }");
      const label = tokens.indexOf("keyword case");
      expect(tokens.slice(label, label + 7)).toEqual([
        "keyword case",
        "identifier g",
        "punctuation (",
        "identifier x",
        "punctuation )",
        "operator :",
        "keyword break",
      ]);
    });

    it("should read explicit type arguments of a call", () => {
      expect(lex("useState<number>(0)")).toEqual([
        "identifier useState",
        "generic-open <",
        "type-name number",
        "generic-close >",
        "punctuation (",
        "number 0",
        "punctuation )",
        "end-of-input",
      ]);
    });

    it("should keep comparisons as operators", () => {
      expect(lex("a < b && c > d")).toEqual([
        "identifier a",
        "operator <",
        "identifier b",
        "operator &&",
        "identifier c",
        "operator >",
        "identifier d",
        "end-of-input",
      ]);
    });
  });

  // ---------------------------------------------------------------------------
  // Markup
  // ---------------------------------------------------------------------------

  describe("markup", () => {
    it("should read tags, attributes, text and expressions", () => {
      expect(lex('const el = <div className="a">Hi {name}</div>;')).toEqual([
        "keyword const",
        "identifier el",
        "operator =",
        "tag-open <div",
        "attribute-name className",
        "operator =",
        'attribute-value "a"',
        "tag-end >",
        "text Hi",
        "expression-start {",
        "identifier name",
        "expression-end }",
        "tag-close </div",
        "tag-end >",
        "punctuation ;",
        "end-of-input",
      ]);
    });

    it("should read self-closing children", () => {
      expect(lex("<A><b/></A>")).toEqual([
        "tag-open <A",
        "tag-end >",
        "tag-open <b",
        "self-close />",
        "tag-close </A",
        "tag-end >",
        "end-of-input",
      ]);
    });

    it("should read fragments", () => {
      expect(lex("<>x</>")).toEqual(["tag-open <", "tag-end >", "text x", "tag-close </", "tag-end >", "end-of-input"]);
    });

    it("should nest markup inside expressions inside markup", () => {
      expect(lex("<ul>{items.map(i => <li>{i}</li>)}</ul>")).toEqual([
        "tag-open <ul",
        "tag-end >",
        "expression-start {",
        "identifier items",
        "punctuation .",
        "identifier map",
        "punctuation (",
        "identifier i",
        "arrow =>",
        "tag-open <li",
        "tag-end >",
        "expression-start {",
        "identifier i",
        "expression-end }",
        "tag-close </li",
        "tag-end >",
        "punctuation )",
        "expression-end }",
        "tag-close </ul",
        "tag-end >",
        "end-of-input",
      ]);
    });
  });

  // ---------------------------------------------------------------------------
  // Options
  // ---------------------------------------------------------------------------

  describe("options", () => {
    it("should drop whitespace and comments by default", () => {
      expect(lex("a /* c */ b")).toEqual(["identifier a", "identifier b", "end-of-input"]);
    });

    it("should keep comments on request", () => {
      expect(brief(tokenize("a /* c */ b", { includeComments: true }))).toEqual([
        "identifier a",
        "comment /* c */",
        "identifier b",
        "end-of-input",
      ]);
    });

    it("should keep whitespace on request", () => {
      const tokens = tokenize("a // c\nb", { includeWhitespace: true, includeComments: true });
      expect(tokens.map((t) => t.kind)).toEqual([
        TokenKind.Identifier,
        TokenKind.Whitespace,
        TokenKind.Comment,
        TokenKind.Whitespace,
        TokenKind.Identifier,
        TokenKind.EndOfInput,
      ]);
      expect(tokens.map((t) => t.value).join("")).toBe("a // c\nb");
    });
  });

  // ---------------------------------------------------------------------------
  // Errors
  // ---------------------------------------------------------------------------

  describe("errors", () => {
    it("should reject an unterminated string at its start", () => {
      const error = lexError('x = "abc');
      expect(error.reason).toBe("Unterminated string literal");
      expect(error.offset).toBe(4);
      expect(error.position.column).toBe(5);
    });

    it("should reject unterminated templates, regexes and comments", () => {
      expect(lexError("`abc").reason).toBe("Unterminated template string");
      expect(lexError("x = /abc").reason).toBe("Unterminated regex literal");
      expect(lexError("a /* b").reason).toBe("Unterminated block comment");
    });

    it("should report the line of the offending token", () => {
      const error = lexError("a\n'b");
      expect(error.position.line).toBe(2);
      expect(error.position.column).toBe(1);
      expect(error.message).toBe("Unterminated string literal at line 2, column 1");
    });
  });
});
