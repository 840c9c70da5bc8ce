/**
 * What a handler can do besides reading its match: nested traversal, cursor
 * fast-forward, edits, the shared context and other handlers' results.
 */

import { isStructural, matchingClose, type Token } from "@tokenloom/core";
import { TokenStream, findValue } from "@tokenloom/lexer";
import type { Capture, TokenMatch } from "@tokenloom/pattern";
import type { DispatchContext } from "./context.js";
import type { Dispatcher } from "./dispatcher.js";
import type { EditItem, EditTarget } from "./edits.js";
import type { Guard } from "./results.js";
import type { Traversal } from "./traversal.js";

/** Cursor of one traversal loop. */
export interface Frame {
  readonly tokens: readonly Token[];
  /** Handler whose nested traversal this is; null at top level */
  readonly caller: string | null;
  index: number;
  /** Resume index requested by the running handler, or -1 */
  skip: number;
}

export class HandlerScope<State extends object = Record<string, unknown>, Lists extends object = Record<string, unknown>> {
  constructor(
    private readonly dispatcher: Dispatcher<State, Lists>,
    private readonly traversal: Traversal<State, Lists>,
    private readonly frame: Frame,
    /** Identity of the running handler */
    readonly handler: string,
    readonly match: TokenMatch
  ) {}

  get context(): DispatchContext<State, Lists> {
    return this.traversal.context;
  }

  /** The sequence being traversed */
  get tokens(): readonly Token[] {
    return this.frame.tokens;
  }

  /** Index of the match in `tokens` */
  get index(): number {
    return this.match.start;
  }

  /** Handler whose nested traversal reached this one; null at top level */
  get caller(): string | null {
    return this.frame.caller;
  }

  get callStack(): readonly string[] {
    return this.traversal.callStack;
  }

  // ---------------------------------------------------------------------------
  // Nested traversal
  // ---------------------------------------------------------------------------

  /**
   * Traverse `target` with only the named registrations, as this handler.
   * Registrations that allow-list this handler become eligible. An absent
   * capture traverses nothing.
   *
   * @throws DispatchError when a name matches no registration
   */
  traverse(target: readonly Token[] | Capture | null, names: string | Iterable<string>): void {
    const tokens = target === null ? [] : "group" in target ? target.tokens : target;
    this.dispatcher.traverseNested(this.traversal, tokens, names);
  }

  // ---------------------------------------------------------------------------
  // Fast-forward
  // ---------------------------------------------------------------------------

  /** Resume after `token`, found by identity or source range from the match onwards. */
  skipTo(token: Token): boolean {
    const tokens = this.frame.tokens;
    for (let i = this.match.start; i < tokens.length; i++) {
      const candidate = tokens[i];
      if (candidate === token || (candidate.start === token.start && candidate.end === token.end && token.start >= 0)) {
        this.frame.skip = i + 1;
        return true;
      }
    }
    return false;
  }

  /** Resume at `index`. An index at or before the match start is ignored. */
  skipToIndex(index: number): void {
    this.frame.skip = index;
  }

  /**
   * Resume after the balanced region that starts at the first `open` at or
   * after the match start.
   */
  skipBalanced(open = "{", close = matchingClose(open)): boolean {
    const region = this.findRegion(open, close, 0);
    if (!region) return false;
    this.frame.skip = region.end;
    return true;
  }

  /**
   * Tokens strictly inside the balanced region that starts at the first
   * `open` at or after `offset` tokens past the match start.
   */
  extractBalanced(open = "{", close = matchingClose(open), offset = 0): readonly Token[] {
    const region = this.findRegion(open, close, offset);
    return region ? this.frame.tokens.slice(region.start + 1, region.end - 1) : [];
  }

  private findRegion(open: string, close: string, offset: number): { start: number; end: number } | null {
    const tokens = this.frame.tokens;
    let start = findValue(tokens, this.match.start + offset, open);
    while (start >= 0 && !isStructural(tokens[start])) start = findValue(tokens, start + 1, open);
    if (start < 0) return null;

    const stream = new TokenStream(tokens);
    stream.seek(start);
    const end = stream.skipBracketGroup(open, close);
    return end < 0 ? null : { start, end };
  }

  // ---------------------------------------------------------------------------
  // Edits
  // ---------------------------------------------------------------------------

  insertBefore(token: Token, ...items: EditItem[]): void {
    this.traversal.edits.insertBefore(token, ...items);
  }

  insertAfter(token: Token, ...items: EditItem[]): void {
    this.traversal.edits.insertAfter(token, ...items);
  }

  replace(target: EditTarget, ...items: EditItem[]): void {
    this.traversal.edits.replace(target, ...items);
  }

  remove(target: EditTarget): void {
    this.traversal.edits.remove(target);
  }

  // ---------------------------------------------------------------------------
  // Results
  // ---------------------------------------------------------------------------

  /** Most recent value returned by `handler` in this traversal. */
  lastResult(handler: string): unknown;
  lastResult<T>(handler: string, guard: Guard<T>): T | undefined;
  lastResult<T>(handler: string, guard?: Guard<T>): unknown {
    return guard ? this.traversal.results.last(handler, guard) : this.traversal.results.last(handler);
  }

  /** Every value returned by `handler` in this traversal, oldest first. */
  allResults(handler: string): readonly unknown[];
  allResults<T>(handler: string, guard: Guard<T>): T[];
  allResults<T>(handler: string, guard?: Guard<T>): readonly unknown[] {
    return guard ? this.traversal.results.all(handler, guard) : this.traversal.results.all(handler);
  }
}
