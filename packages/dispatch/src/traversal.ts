/**
 * State of one top-level traversal: the shared context, recorded results,
 * pending edits and the stack of active handlers.
 */

import { DispatchError, type Token } from "@tokenloom/core";
import type { DispatchContext } from "./context.js";
import { EditList } from "./edits.js";
import { ResultStore } from "./results.js";

export class Traversal<State extends object = Record<string, unknown>, Lists extends object = Record<string, unknown>> {
  readonly results = new ResultStore();
  readonly edits = new EditList();
  private readonly stack: string[] = [];

  constructor(
    readonly tokens: readonly Token[],
    /** Source text the tokens were read from, needed by `reconstruct` */
    readonly source: string | undefined,
    readonly context: DispatchContext<State, Lists>
  ) {}

  /** Identities of the handlers currently running, outermost first. */
  get callStack(): readonly string[] {
    return this.stack;
  }

  /** The innermost running handler, or null between handlers at top level. */
  get currentHandler(): string | null {
    return this.stack.length > 0 ? this.stack[this.stack.length - 1] : null;
  }

  /** @internal */
  enter(handler: string): void {
    this.stack.push(handler);
  }

  /** @internal */
  leave(): void {
    this.stack.pop();
  }

  /**
   * The source text with every recorded edit applied. Without edits this is
   * the source unchanged.
   *
   * @throws DispatchError when the traversal was started without source text
   */
  reconstruct(): string {
    if (this.source === undefined) {
      throw new DispatchError("reconstruct() needs the source text: pass { source } when starting the traversal");
    }
    return this.edits.apply(this.source);
  }
}
