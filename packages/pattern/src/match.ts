/**
 * Match results.
 */

import { tokenText, type Token } from "@tokenloom/core";

/** A contiguous run of matched tokens. */
export interface Capture {
  /** 0-based capture index, or null for the whole match */
  readonly group: number | null;
  readonly name?: string;
  /** Index of the first token in the matched sequence */
  readonly start: number;
  /** Index one past the last token */
  readonly end: number;
  readonly tokens: readonly Token[];
  /** Token values concatenated without separators */
  readonly value: string;
}

function makeCapture(tokens: readonly Token[], start: number, end: number, group: number | null, name?: string): Capture {
  const slice = tokens.slice(start, end);
  return Object.freeze({ group, name, start, end, tokens: slice, value: tokenText(slice) });
}

/**
 * A successful match. Captures that did not take part in the match (an
 * unmatched optional group, the losing branch of an alternation) are `null`,
 * which is distinct from a group that matched zero tokens.
 */
export class TokenMatch {
  /** Captures by 0-based index */
  readonly captures: readonly (Capture | null)[];
  private readonly names: ReadonlyMap<string, number>;
  private whole: Capture | undefined;

  constructor(
    private readonly source: readonly Token[],
    readonly start: number,
    readonly end: number,
    slots: readonly number[],
    groupCount: number,
    names: ReadonlyMap<string, number>
  ) {
    this.names = names;
    const groupNames = new Map<number, string>();
    for (const [name, index] of names) groupNames.set(index, name);

    const captures: (Capture | null)[] = [];
    for (let g = 0; g < groupCount; g++) {
      const from = slots[2 * g];
      const to = slots[2 * g + 1];
      captures.push(from >= 0 && to >= from ? makeCapture(source, from, to, g, groupNames.get(g)) : null);
    }
    this.captures = Object.freeze(captures);
  }

  /** Number of tokens matched */
  get length(): number {
    return this.end - this.start;
  }

  /** The matched tokens as a single capture */
  fullMatch(): Capture {
    this.whole ??= makeCapture(this.source, this.start, this.end, null);
    return this.whole;
  }

  /** Concatenated value of the whole match */
  get value(): string {
    return this.fullMatch().value;
  }

  captureAt(index: number): Capture | null {
    return this.captures[index] ?? null;
  }

  namedCapture(name: string): Capture | null {
    const index = this.names.get(name);
    return index === undefined ? null : this.captureAt(index);
  }

  /** Tokens of a capture; an absent capture has none. */
  tokensOf(capture: Capture | null): readonly Token[] {
    return capture?.tokens ?? [];
  }

  /** Value of capture `index`, or `fallback` when it did not participate. */
  valueAt(index: number, fallback = ""): string {
    return this.captureAt(index)?.value ?? fallback;
  }

  /** Value of the named capture, or `fallback` when it did not participate. */
  valueNamed(name: string, fallback = ""): string {
    return this.namedCapture(name)?.value ?? fallback;
  }
}
