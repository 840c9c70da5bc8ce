/**
 * Dispatcher
 *
 * Walks a token sequence left to right. At each index the eligible
 * registrations are tried in priority order; the first one whose pattern
 * matches has its handler invoked, and the cursor moves on:
 *
 * - to the index a handler asked to skip to, when it is past the match start
 * - past the match, for a consuming registration with a non-empty match
 * - by one token otherwise
 *
 * An index where nothing matches is reported to `onUnmatched`. The walk stops
 * at the end of the sequence or at the end-of-input token.
 */

import { DispatchError, TokenKind, createLogger, type Token } from "@tokenloom/core";
import { tryMatch, type CompiledPattern, type TokenMatch } from "@tokenloom/pattern";
import { DispatchContext } from "./context.js";
import { permits, register, type Handler, type RegisterOptions, type Registration } from "./registration.js";
import { HandlerScope, type Frame } from "./scope.js";
import { Traversal } from "./traversal.js";

const log = createLogger("dispatch");

/** Lifecycle callbacks. Begin and end fire once per top-level traversal. */
export interface DispatchHooks<State extends object = Record<string, unknown>, Lists extends object = Record<string, unknown>> {
  onBegin?(tokens: readonly Token[], traversal: Traversal<State, Lists>): void;
  onEnd?(traversal: Traversal<State, Lists>): void;
  /** Called for each index, top level or nested, where no registration fired */
  onUnmatched?(token: Token, traversal: Traversal<State, Lists>): void;
}

export interface TraverseOptions<State extends object = Record<string, unknown>, Lists extends object = Record<string, unknown>> {
  /** Source text the tokens were read from; enables `reconstruct()` */
  source?: string;
  /** Store shared by the handlers; a fresh one when omitted */
  context?: DispatchContext<State, Lists>;
  /** Index to start at. Default 0. */
  from?: number;
}

export class Dispatcher<State extends object = Record<string, unknown>, Lists extends object = Record<string, unknown>> {
  private readonly registrations: Registration<State, Lists>[] = [];
  private ordered: Registration<State, Lists>[] | null = null;

  constructor(
    registrations: Iterable<Registration<State, Lists>> = [],
    private readonly hooks: DispatchHooks<State, Lists> = {}
  ) {
    for (const registration of registrations) this.registrations.push(registration);
  }

  /** Append prebuilt registrations. */
  add(...registrations: Registration<State, Lists>[]): this {
    this.registrations.push(...registrations);
    this.ordered = null;
    return this;
  }

  /**
   * Build and append a registration.
   *
   * @throws PatternSyntaxError when `pattern` is text that does not compile
   */
  register(
    pattern: string | CompiledPattern,
    handler: Handler<State, Lists>,
    options: RegisterOptions = {}
  ): Registration<State, Lists> {
    const registration = register<State, Lists>(pattern, handler, options);
    this.add(registration);
    return registration;
  }

  /** Whether some registration has identity `name`. */
  has(name: string): boolean {
    return this.registrations.some((registration) => registration.id === name);
  }

  get size(): number {
    return this.registrations.length;
  }

  /**
   * Traverse with the default set: every registration that has neither a
   * name nor an allow-list.
   */
  visit(tokens: readonly Token[], options: TraverseOptions<State, Lists> = {}): Traversal<State, Lists> {
    const candidates = this.byPriority().filter(
      (registration) => !registration.named && registration.allowedCallers.size === 0
    );
    return this.runTopLevel(tokens, candidates, options);
  }

  /**
   * Traverse with only the registrations whose identity is in `names`.
   *
   * @throws DispatchError when a name matches no registration
   */
  traverse(
    tokens: readonly Token[],
    names: string | Iterable<string>,
    options: TraverseOptions<State, Lists> = {}
  ): Traversal<State, Lists> {
    return this.runTopLevel(tokens, this.select(names), options);
  }

  /**
   * Nested traversal requested by the running handler. Its identity, the top
   * of the traversal's call stack, is the caller that allow-lists check.
   *
   * @internal Reached through `HandlerScope.traverse`.
   */
  traverseNested(traversal: Traversal<State, Lists>, tokens: readonly Token[], names: string | Iterable<string>): void {
    this.run(traversal, tokens, this.select(names), traversal.currentHandler, 0);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private runTopLevel(
    tokens: readonly Token[],
    candidates: readonly Registration<State, Lists>[],
    options: TraverseOptions<State, Lists>
  ): Traversal<State, Lists> {
    const traversal = new Traversal<State, Lists>(
      tokens,
      options.source,
      options.context ?? new DispatchContext<State, Lists>()
    );
    this.hooks.onBegin?.(tokens, traversal);
    this.run(traversal, tokens, candidates, null, options.from ?? 0);
    this.hooks.onEnd?.(traversal);
    return traversal;
  }

  /** Registrations in dispatch order: priority descending, then registration order. */
  private byPriority(): Registration<State, Lists>[] {
    if (!this.ordered) {
      // Array.prototype.sort is stable, so ties keep registration order
      this.ordered = this.registrations.slice().sort((a, b) => b.priority - a.priority);
    }
    return this.ordered;
  }

  private select(names: string | Iterable<string>): Registration<State, Lists>[] {
    const wanted = new Set(typeof names === "string" ? [names] : names);
    for (const name of wanted) {
      if (!this.has(name)) {
        throw new DispatchError(`No registration named '${name}'`);
      }
    }
    return this.byPriority().filter((registration) => wanted.has(registration.id));
  }

  private run(
    traversal: Traversal<State, Lists>,
    tokens: readonly Token[],
    candidates: readonly Registration<State, Lists>[],
    caller: string | null,
    from: number
  ): void {
    const eligible = candidates.filter((registration) => permits(registration, caller));
    const frame: Frame = { tokens, caller, index: Math.max(0, from), skip: -1 };

    while (frame.index < tokens.length && tokens[frame.index].kind !== TokenKind.EndOfInput) {
      const index = frame.index;
      let fired = false;

      for (const registration of eligible) {
        const match = tryMatch(registration.pattern, tokens, index);
        if (!match) continue;

        frame.skip = -1;
        this.invoke(traversal, frame, registration, match);
        fired = true;

        if (frame.skip > index) frame.index = frame.skip;
        else if (registration.consumes && match.end > index) frame.index = match.end;
        else frame.index = index + 1;
        break;
      }

      if (!fired) {
        this.hooks.onUnmatched?.(tokens[index], traversal);
        frame.index = index + 1;
      }
    }
  }

  private invoke(
    traversal: Traversal<State, Lists>,
    frame: Frame,
    registration: Registration<State, Lists>,
    match: TokenMatch
  ): void {
    const scope = new HandlerScope<State, Lists>(this, traversal, frame, registration.id, match);
    traversal.enter(registration.id);
    try {
      log.trace(`${registration.id} at ${match.start}..${match.end}`, traversal.callStack.join(" > "));
      traversal.results.add(registration.id, registration.handler(match, scope));
    } finally {
      traversal.leave();
    }
  }
}
