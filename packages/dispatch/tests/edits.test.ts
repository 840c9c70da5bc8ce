/**
 * Tests for EditList
 */

import { describe, it, expect } from "vitest";
import { TokenKind, createToken } from "@tokenloom/core";
import { tokenize } from "@tokenloom/lexer";
import { compile, tryMatch, type TokenMatch } from "@tokenloom/pattern";
import { EditList } from "@tokenloom/dispatch";

const source = "abc def ghi";
// abc [0,3)  def [4,7)  ghi [8,11)
const [abc, def, ghi] = tokenize(source);

function firstTwo(): TokenMatch {
  const match = tryMatch(compile("\\i \\i"), tokenize(source), 0);
  if (!match) throw new Error("expected two identifiers");
  return match;
}

describe("EditList", () => {
  it("should leave the source alone without edits", () => {
    expect(new EditList().apply(source)).toBe(source);
  });

  it("should replace tokens with text or token values", () => {
    const edits = new EditList();
    edits.replace(abc, "x", createToken(TokenKind.Operator, "+"), "y");
    edits.replace(ghi, createToken(TokenKind.Identifier, "Z"));
    expect(edits.apply(source)).toBe("x+y def Z");
  });

  it("should replace the whole span of a match", () => {
    const edits = new EditList();
    edits.replace(firstTwo(), "both");
    expect(edits.apply(source)).toBe("both ghi");
  });

  it("should replace the span of a capture", () => {
    const match = tryMatch(compile("\\i (\\i \\i)"), tokenize(source), 0);
    const edits = new EditList();
    edits.remove(match?.captureAt(0) ?? def);
    expect(edits.apply(source)).toBe("abc ");
  });

  it("should insert around tokens", () => {
    const edits = new EditList();
    edits.insertBefore(def, "<");
    edits.insertAfter(def, ">");
    edits.insertAfter(def, "!");
    expect(edits.apply(source)).toBe("abc <def>! ghi");
    expect(edits.length).toBe(3);
    expect(edits.list().map((edit) => edit.kind)).toEqual(["insert-before", "insert-after", "insert-after"]);
  });

  it("should keep insertions at the edges of a replaced token", () => {
    const edits = new EditList();
    edits.replace(def, "D");
    edits.insertBefore(def, "<");
    edits.insertAfter(def, ">");
    expect(edits.apply(source)).toBe("abc <D> ghi");
  });

  it("should ignore synthetic targets", () => {
    const synthetic = createToken(TokenKind.Identifier, "x");
    const edits = new EditList();
    edits.replace(synthetic, "y");
    edits.insertBefore(synthetic, "y");
    edits.insertAfter(abc);
    expect(edits.length).toBe(0);
  });

  // ---------------------------------------------------------------------------
  // Conflicts
  // ---------------------------------------------------------------------------

  describe("conflicts", () => {
    it("should prefer the longer of two rewrites with the same start", () => {
      const edits = new EditList();
      edits.replace(abc, "X");
      edits.replace(firstTwo(), "Y");
      expect(edits.apply(source)).toBe("Y ghi");
    });

    it("should prefer the earlier of two overlapping rewrites", () => {
      const edits = new EditList();
      edits.remove(def);
      edits.replace(firstTwo(), "Y");
      expect(edits.apply(source)).toBe("Y ghi");
    });

    it("should drop insertions inside a rewritten range", () => {
      const edits = new EditList();
      edits.replace(firstTwo(), "Y");
      edits.insertAfter(abc, "!");
      edits.insertAfter(ghi, ";");
      expect(edits.apply(source)).toBe("Y ghi;");
    });

    it("should apply rewrites that only touch", () => {
      const edits = new EditList();
      edits.replace(def, "D");
      edits.replace(abc, "A");
      edits.remove(ghi);
      expect(edits.apply(source)).toBe("A D ");
    });
  });

  it("should forget everything on clear", () => {
    const edits = new EditList();
    edits.replace(abc, "X");
    edits.clear();
    expect(edits.apply(source)).toBe(source);
  });
});
