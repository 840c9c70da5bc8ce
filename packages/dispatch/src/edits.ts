/**
 * Token edits, collected during a traversal and replayed once against the
 * original source text.
 *
 * Edits address source offsets, never token indexes, so they are not seen
 * by the matcher and do not disturb a traversal in progress. Regions no edit
 * touches come out byte-identical.
 */

import MagicString from "magic-string";
import { createLogger, isSynthetic, type Token } from "@tokenloom/core";
import type { Capture, TokenMatch } from "@tokenloom/pattern";

const log = createLogger("dispatch");

/** New content: token values or plain text, concatenated. */
export type EditItem = Token | string;

/** What a replace or remove applies to. */
export type EditTarget = Token | TokenMatch | Capture;

type EditKind = "insert-before" | "insert-after" | "replace" | "remove";

export interface Edit {
  readonly kind: EditKind;
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

function itemText(items: readonly EditItem[]): string {
  let text = "";
  for (const item of items) text += typeof item === "string" ? item : item.value;
  return text;
}

function isTokenMatch(target: EditTarget): target is TokenMatch {
  return "fullMatch" in target;
}

function isCapture(target: EditTarget): target is Capture {
  return "tokens" in target && "group" in target;
}

/** Source range `[start, end)` covered by the target, or null when it has none. */
function rangeOf(target: EditTarget): { start: number; end: number } | null {
  let tokens: readonly Token[];
  if (isTokenMatch(target)) tokens = target.fullMatch().tokens;
  else if (isCapture(target)) tokens = target.tokens;
  else tokens = [target];

  const located = tokens.filter((token) => !isSynthetic(token));
  if (located.length === 0) return null;
  return { start: located[0].start, end: located[located.length - 1].end };
}

export class EditList {
  private readonly edits: Edit[] = [];

  get length(): number {
    return this.edits.length;
  }

  /** The recorded edits, in the order they were made. */
  list(): readonly Edit[] {
    return this.edits;
  }

  insertBefore(token: Token, ...items: EditItem[]): void {
    if (isSynthetic(token) || items.length === 0) return;
    this.push({ kind: "insert-before", start: token.start, end: token.start, text: itemText(items) });
  }

  insertAfter(token: Token, ...items: EditItem[]): void {
    if (isSynthetic(token) || items.length === 0) return;
    this.push({ kind: "insert-after", start: token.end, end: token.end, text: itemText(items) });
  }

  replace(target: EditTarget, ...items: EditItem[]): void {
    const range = rangeOf(target);
    if (!range) return;
    this.push({ kind: "replace", ...range, text: itemText(items) });
  }

  remove(target: EditTarget): void {
    const range = rangeOf(target);
    if (!range) return;
    this.push({ kind: "remove", ...range, text: "" });
  }

  clear(): void {
    this.edits.length = 0;
  }

  /**
   * Replay the edits against `source`.
   *
   * Replacements and removals go first, in position order. Where two of them
   * overlap, the one that starts first wins, and of two with the same start
   * the longer one. Insertions follow in the order they were made; one that
   * falls strictly inside a replaced or removed range is dropped.
   */
  apply(source: string): string {
    if (this.edits.length === 0) return source;

    const output = new MagicString(source);
    const rewrites = this.edits
      .filter((edit) => edit.kind === "replace" || edit.kind === "remove")
      .sort((a, b) => a.start - b.start || b.end - a.end);

    const covered: Array<{ start: number; end: number }> = [];
    let coveredEnd = 0;
    for (const edit of rewrites) {
      if (edit.start < coveredEnd) {
        log.debug(`dropping ${edit.kind} of [${edit.start}, ${edit.end}): overlaps an earlier edit`);
        continue;
      }
      if (edit.end > edit.start) {
        if (edit.text === "") output.remove(edit.start, edit.end);
        else output.overwrite(edit.start, edit.end, edit.text);
      } else if (edit.text !== "") {
        output.appendLeft(edit.start, edit.text);
      }
      covered.push(edit);
      coveredEnd = Math.max(coveredEnd, edit.end);
    }

    for (const edit of this.edits) {
      if (edit.kind !== "insert-before" && edit.kind !== "insert-after") continue;
      if (covered.some((range) => edit.start > range.start && edit.start < range.end)) {
        log.debug(`dropping ${edit.kind} at ${edit.start}: inside a rewritten range`);
        continue;
      }
      if (edit.kind === "insert-before") output.appendLeft(edit.start, edit.text);
      else output.appendRight(edit.start, edit.text);
    }

    return output.toString();
  }

  private push(edit: Edit): void {
    this.edits.push(edit);
  }
}
