/**
 * End-to-end tests through the umbrella package
 */

import { describe, it, expect } from "vitest";
import {
  Dispatcher,
  TokenKind,
  allOfKind,
  compile,
  select,
  significant,
  tokenize,
  tryMatch,
  type HandlerScope,
  type TokenMatch,
} from "tokenloom";

describe("tokenloom", () => {
  it("should match a call through the umbrella exports", () => {
    const call = compile("(\\i) \\Bp");
    expect(tryMatch(call, tokenize("foo(a, (b + c))"), 0)?.valueAt(0)).toBe("foo");
  });

  it("should list the props of every element", () => {
    const source = '<div><Button kind="primary" onClick={go}/><img src="a.png"/></div>';
    const props = select(tokenize(source), "\\jo (.*?) [\\je | \\js]", (match) =>
      allOfKind(match.captureAt(0), TokenKind.AttributeName).map((token) => token.value)
    );
    expect(props).toEqual([[], ["kind", "onClick"], ["src"]]);
  });

  it("should rewrite declarations and collect their names", () => {
    const source = "let a = 1;\nfunction f() {\n  let b = 2;\n}\n";
    const names: string[] = [];

    const dispatcher = new Dispatcher();
    dispatcher.register('\\k"let" (\\i)', function declaration(match: TokenMatch, scope: HandlerScope) {
      names.push(match.valueAt(0));
      scope.replace(match.fullMatch().tokens[0], "const");
    });

    const traversal = dispatcher.visit(tokenize(source), { source });
    expect(names).toEqual(["a", "b"]);
    expect(traversal.reconstruct()).toBe("const a = 1;\nfunction f() {\n  const b = 2;\n}\n");
  });

  it("should keep whitespace out of the significant tokens", () => {
    const tokens = tokenize("a  b", { includeWhitespace: true });
    expect(significant(tokens).map((token) => token.value)).toEqual(["a", "b"]);
  });
});
