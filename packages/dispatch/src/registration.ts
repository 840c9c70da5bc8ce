/**
 * Dispatch-table entries.
 */

import { compile, type CompiledPattern, type TokenMatch } from "@tokenloom/pattern";
import type { HandlerScope } from "./scope.js";

/**
 * A handler reads what it needs from the match and the scope. A return value
 * other than `undefined` is recorded under the handler's identity.
 */
export type Handler<State extends object, Lists extends object> = (
  match: TokenMatch,
  scope: HandlerScope<State, Lists>
) => unknown;

export interface RegisterOptions {
  /**
   * Identity used by `traverse`, caller allow-lists and the result store.
   * A named registration is left out of the default set run by `visit`.
   */
  name?: string;
  /** Higher runs first; ties keep registration order. Default 0. */
  priority?: number;
  /** Advance past the match (true, the default) or by a single token */
  consumes?: boolean;
  /**
   * Handlers whose nested traversals may reach this registration. A
   * registration with an allow-list never fires at top level.
   */
  allowedCallers?: Iterable<string>;
}

export interface Registration<State extends object = Record<string, unknown>, Lists extends object = Record<string, unknown>> {
  /** Handler identity: the name, else the handler function's name, else the pattern text */
  readonly id: string;
  readonly named: boolean;
  readonly pattern: CompiledPattern;
  readonly handler: Handler<State, Lists>;
  readonly priority: number;
  readonly consumes: boolean;
  /** Empty when unrestricted */
  readonly allowedCallers: ReadonlySet<string>;
}

/**
 * Build one dispatch-table entry.
 *
 * @throws PatternSyntaxError when `pattern` is text that does not compile
 */
export function register<State extends object = Record<string, unknown>, Lists extends object = Record<string, unknown>>(
  pattern: string | CompiledPattern,
  handler: Handler<State, Lists>,
  options: RegisterOptions = {}
): Registration<State, Lists> {
  const compiled = typeof pattern === "string" ? compile(pattern) : pattern;
  return Object.freeze({
    id: options.name ?? (handler.name || compiled.source),
    named: options.name !== undefined,
    pattern: compiled,
    handler,
    priority: options.priority ?? 0,
    consumes: options.consumes ?? true,
    allowedCallers: new Set<string>(options.allowedCallers ?? []),
  });
}

/** Whether `registration` may fire in a traversal started by `caller` (null at top level). */
export function permits<State extends object, Lists extends object>(
  registration: Registration<State, Lists>,
  caller: string | null
): boolean {
  if (registration.allowedCallers.size === 0) return true;
  return caller !== null && registration.allowedCallers.has(caller);
}
