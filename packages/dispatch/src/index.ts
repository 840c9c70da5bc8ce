/**
 * @tokenloom/dispatch
 *
 * Pattern-driven traversal of a token sequence: a table of registrations
 * tried in priority order at each index, nested traversals restricted to
 * named registrations and allowed callers, a context shared by the handlers,
 * and source edits replayed at the end.
 *
 * @example
 * ```typescript
 * import { tokenize } from "@tokenloom/lexer";
 * import { Dispatcher } from "@tokenloom/dispatch";
 *
 * const source = "let a = 1; let b = 2;";
 * const dispatcher = new Dispatcher();
 * dispatcher.register('\\k"let" (\\i)', function declaration(match, scope) {
 *   scope.replace(match.fullMatch().tokens[0], "const");
 *   return match.valueAt(0);
 * });
 *
 * const traversal = dispatcher.visit(tokenize(source), { source });
 * traversal.results.all("declaration"); // ["a", "b"]
 * traversal.reconstruct();              // "const a = 1; const b = 2;"
 * ```
 */

export { Dispatcher, type DispatchHooks, type TraverseOptions } from "./dispatcher.js";
export { register, permits, type Handler, type RegisterOptions, type Registration } from "./registration.js";
export { HandlerScope, type Frame } from "./scope.js";
export { Traversal } from "./traversal.js";
export { DispatchContext } from "./context.js";
export { ResultStore, type Guard } from "./results.js";
export { EditList, type Edit, type EditItem, type EditTarget } from "./edits.js";
