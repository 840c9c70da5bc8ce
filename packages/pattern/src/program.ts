/**
 * Lowers a pattern tree to a flat instruction list for the backtracking
 * machine in matcher.ts.
 *
 * Slot layout: capture `g` owns slots `2g` (start) and `2g + 1` (end); loop
 * registers follow the capture slots.
 */

import type { CompiledPattern, PatternNode } from "./types.js";

export type TokenTest = Extract<PatternNode, { type: "class" | "literal" | "any" }>;

export type Instruction =
  /** Consume one token that passes `test` */
  | { op: "test"; test: TokenTest }
  /** Try `primary`, and on failure resume at `secondary` */
  | { op: "split"; primary: number; secondary: number }
  | { op: "jump"; target: number }
  | { op: "open"; group: number }
  | { op: "close"; group: number }
  /** Record the position at the start of a loop iteration */
  | { op: "mark"; register: number }
  /** Fail an iteration that consumed nothing */
  | { op: "progress"; register: number }
  | { op: "assert"; code: readonly Instruction[]; direction: "ahead" | "behind"; negated: boolean }
  | { op: "backreference"; group: number; depth: number | undefined; closeTag: boolean }
  | { op: "balanced"; open: string; close: string }
  | { op: "until"; separators: readonly string[] }
  | { op: "element" }
  | { op: "content" }
  | { op: "match" };

export interface Program {
  readonly code: readonly Instruction[];
  /** Capture slots plus loop registers */
  readonly slotCount: number;
}

const programs = new WeakMap<CompiledPattern, Program>();

/** The program for a compiled pattern, built on first use. */
export function programFor(pattern: CompiledPattern): Program {
  let program = programs.get(pattern);
  if (!program) {
    const builder = new ProgramBuilder(pattern.groupCount * 2);
    const code = builder.build(pattern.root);
    program = { code, slotCount: builder.slotCount };
    programs.set(pattern, program);
  }
  return program;
}

class ProgramBuilder {
  private registers = 0;

  constructor(private readonly captureSlots: number) {}

  get slotCount(): number {
    return this.captureSlots + this.registers;
  }

  build(node: PatternNode): Instruction[] {
    const code: Instruction[] = [];
    this.emit(node, code);
    code.push({ op: "match" });
    return code;
  }

  private emit(node: PatternNode, code: Instruction[]): void {
    switch (node.type) {
      case "class":
      case "literal":
      case "any":
        code.push({ op: "test", test: node });
        break;
      case "empty":
        break;
      case "sequence":
        for (const child of node.nodes) this.emit(child, code);
        break;
      case "alternation":
        this.emitAlternation(node.branches, code);
        break;
      case "group":
        if (node.capture === null) {
          this.emit(node.node, code);
        } else {
          code.push({ op: "open", group: node.capture });
          this.emit(node.node, code);
          code.push({ op: "close", group: node.capture });
        }
        break;
      case "quantified":
        this.emitQuantified(node.node, node.min, node.max, node.greedy, code);
        break;
      case "lookaround":
        code.push({ op: "assert", code: this.build(node.node), direction: node.direction, negated: node.negated });
        break;
      case "backreference":
        code.push({ op: "backreference", group: node.group, depth: node.depth, closeTag: node.closeTag });
        break;
      case "balanced":
        code.push({ op: "balanced", open: node.open, close: node.close });
        break;
      case "until":
        code.push({ op: "until", separators: node.separators });
        break;
      case "element":
        code.push({ op: "element" });
        break;
      case "content":
        code.push({ op: "content" });
        break;
    }
  }

  /**
   *     split L1, L2
   * L1: <branch 1>
   *     jump END
   * L2: split L3, ...
   *     ...
   * END:
   */
  private emitAlternation(branches: readonly PatternNode[], code: Instruction[]): void {
    const exits: Array<{ op: "jump"; target: number }> = [];
    branches.forEach((branch, i) => {
      if (i === branches.length - 1) {
        this.emit(branch, code);
        return;
      }
      const split = { op: "split" as const, primary: code.length + 1, secondary: -1 };
      code.push(split);
      this.emit(branch, code);
      const exit = { op: "jump" as const, target: -1 };
      exits.push(exit);
      code.push(exit);
      split.secondary = code.length;
    });
    for (const exit of exits) exit.target = code.length;
  }

  /**
   * The body is repeated `min` times, then either loops (unbounded) or is
   * followed by `max - min` optional copies that all exit to the same place.
   * Greedy splits prefer another iteration; lazy ones prefer leaving.
   */
  private emitQuantified(
    body: PatternNode,
    min: number,
    max: number | null,
    greedy: boolean,
    code: Instruction[]
  ): void {
    for (let i = 0; i < min; i++) this.emit(body, code);

    const splits: Array<{ op: "split"; primary: number; secondary: number }> = [];
    const enter = (split: { primary: number; secondary: number }, target: number): void => {
      if (greedy) split.primary = target;
      else split.secondary = target;
    };
    const leave = (split: { primary: number; secondary: number }, target: number): void => {
      if (greedy) split.secondary = target;
      else split.primary = target;
    };

    if (max === null) {
      const register = this.captureSlots + this.registers++;
      const loop = code.length;
      const split = { op: "split" as const, primary: -1, secondary: -1 };
      code.push(split);
      enter(split, code.length);
      code.push({ op: "mark", register });
      this.emit(body, code);
      code.push({ op: "progress", register });
      code.push({ op: "jump", target: loop });
      leave(split, code.length);
      return;
    }

    for (let i = min; i < max; i++) {
      const split = { op: "split" as const, primary: -1, secondary: -1 };
      code.push(split);
      enter(split, code.length);
      this.emit(body, code);
      splits.push(split);
    }
    for (const split of splits) leave(split, code.length);
  }
}
