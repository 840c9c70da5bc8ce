/**
 * tokenloom Showcase
 *
 * Reads a function component the way a markup transpiler would: one
 * registration finds the component, nested traversals over its body collect
 * state hooks and event handlers, and an edit renames the hook calls.
 *
 * Run: npx tsx packages/tokenloom/examples/showcase.ts
 */

import assert from "node:assert/strict";

import {
  Dispatcher,
  DispatchContext,
  TokenKind,
  compile,
  findAll,
  tokenText,
  tokenize,
  type HandlerScope,
  type TokenMatch,
} from "tokenloom";

const source = `export function Counter({ step }) {
  const [count, setCount] = useState(0);
  const [label] = useState("clicks");
  return <button onClick={() => setCount(count + step)}>{label}: {count}</button>;
}
`;

// ============================================================================
// 1. Tokens
// ============================================================================

const tokens = tokenize(source);

// markup and script interleave in one stream
const tags = tokens.filter((t) => t.kind === TokenKind.TagOpen).map((t) => t.value);
assert.deepEqual(tags, ["<button"]);

// ============================================================================
// 2. Patterns
// ============================================================================

const hookCall = compile('\\i"useState" \\Bp');
assert.deepEqual(
  findAll(hookCall, tokens).map((m) => m.value),
  ["useState(0)", 'useState("clicks")']
);

// ============================================================================
// 3. Dispatch
// ============================================================================

interface StateField {
  name: string;
  setter: string | null;
  initial: string;
}

interface Component {
  component: string;
}

interface Collected {
  state: StateField;
  handlers: string;
}

const dispatcher = new Dispatcher<Component, Collected>();

dispatcher.register(
  '\\k"function" (\\i) \\Bp (\\Bb)',
  function component(match: TokenMatch, scope: HandlerScope<Component, Collected>) {
    scope.context.set("component", match.valueAt(0));
    scope.traverse(match.captureAt(1), ["state", "handler"]);
    return match.valueAt(0);
  }
);

dispatcher.register(
  '\\k"const" "[" (\\i) (?:"," (\\i))? "]" "=" (\\i"useState") \\Bp',
  (match, scope) => {
    const initial = tokenText(scope.extractBalanced("("));
    scope.context.addToList("state", { name: match.valueAt(0), setter: match.captureAt(1)?.value ?? null, initial });
    const hook = match.captureAt(2);
    if (hook) scope.replace(hook, "useSignal");
  },
  { name: "state", allowedCallers: ["component"] }
);

dispatcher.register(
  '(\\ja) "=" \\jx',
  (match, scope) => {
    const attribute = match.valueAt(0);
    if (attribute.startsWith("on")) scope.context.addToList("handlers", attribute);
    scope.skipBalanced("{");
  },
  { name: "handler", allowedCallers: ["component"] }
);

const context = new DispatchContext<Component, Collected>();
const traversal = dispatcher.visit(tokens, { source, context });

assert.equal(context.get("component"), "Counter");
assert.deepEqual(traversal.results.all("component"), ["Counter"]);
assert.deepEqual(context.getList("state"), [
  { name: "count", setter: "setCount", initial: "0" },
  { name: "label", setter: null, initial: '"clicks"' },
]);
assert.deepEqual(context.getList("handlers"), ["onClick"]);

// ============================================================================
// 4. Reconstruct
// ============================================================================

// only the edited tokens change; spacing and line breaks survive
assert.equal(traversal.reconstruct(), source.replaceAll("useState", "useSignal"));

console.log("showcase: ok");
