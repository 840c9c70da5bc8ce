/**
 * Lexer state: the mode stack and the bracket stack.
 *
 * The mode stack says how the next character is read (script, type, or one
 * of the markup modes). Markup and script nest into each other through this
 * stack, never through recursion. The bracket stack records what each open
 * `(`, `[` or `{` in script code is, which decides whether a `:` starts a
 * type annotation.
 */

/** Script code, at top level or inside a markup `{...}` expression. */
export interface ScriptFrame {
  readonly mode: "script";
  /** Bracket-stack height at which the closing `}` ends the embedded expression; -1 at top level */
  readonly base: number;
}

/** A type annotation, type alias, cast target or generic argument list. */
export interface TypeFrame {
  readonly mode: "type";
  /** Open `<`, `[`, `(` and `{` inside the type */
  readonly nesting: string[];
  /** Opened by a `<` in script code; ends at its matching `>` */
  readonly genericArgs: boolean;
  /** Opened by `as` or `satisfies` */
  readonly cast: boolean;
  /** No significant token read yet */
  fresh: boolean;
  /** The next token starts a type (after `:`, `|`, `<`, `extends`, ...) */
  expectType: boolean;
  /** The previous token closed a parenthesized group, so `=>` continues a function type */
  afterGroup: boolean;
}

export interface MarkupFrame {
  /**
   * markup-tag: inside `<name ...` before its `>` or `/>`
   * markup-text: children, between the tag's `>` and its closing tag
   * markup-close: inside `</name` before its `>`
   */
  mode: "markup-tag" | "markup-text" | "markup-close";
}

export type ModeFrame = ScriptFrame | TypeFrame | MarkupFrame;

export function typeFrame(options: { genericArgs?: boolean; cast?: boolean } = {}): TypeFrame {
  return {
    mode: "type",
    nesting: options.genericArgs ? ["<"] : [],
    genericArgs: options.genericArgs ?? false,
    cast: options.cast ?? false,
    fresh: true,
    expectType: true,
    afterGroup: false,
  };
}

// ---------------------------------------------------------------------------
// Brackets
// ---------------------------------------------------------------------------

/**
 * params: a parameter list; members: a class or interface body;
 * block: a statement block or object literal; group: any other parenthesis;
 * index: a square bracket.
 */
export type BracketRole = "params" | "members" | "block" | "group" | "index";

export interface BracketFrame {
  readonly open: "(" | "[" | "{";
  readonly role: BracketRole;
  /** `?` operators still waiting for their `:` */
  ternaries: number;
  /** Inside a const/let/var declaration list */
  declaring: boolean;
  /** Before the `=` of the current declarator, where `:` starts an annotation */
  binding: boolean;
  /** Inside an import/export clause, where `as` renames instead of casting */
  moduleClause: boolean;
  /** After `type Name`, waiting for the `=` that starts the aliased type */
  typeAlias: boolean;
  /** After `function`, the next `(` is a parameter list */
  pendingParams: boolean;
  /** After `class` or `interface`, the next `{` is a member body */
  pendingBody: boolean;
}

export function bracketFrame(open: BracketFrame["open"], role: BracketRole): BracketFrame {
  return {
    open,
    role,
    ternaries: 0,
    declaring: false,
    binding: false,
    moduleClause: false,
    typeAlias: false,
    pendingParams: false,
    pendingBody: false,
  };
}

/** Forget statement-level state at a `;`. */
export function endStatement(frame: BracketFrame): void {
  frame.ternaries = 0;
  frame.declaring = false;
  frame.binding = false;
  frame.moduleClause = false;
  frame.typeAlias = false;
  frame.pendingParams = false;
  frame.pendingBody = false;
}
