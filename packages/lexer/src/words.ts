/**
 * Reserved-word tables, read once from `data/words.json`.
 */

import { readFileSync } from "node:fs";

export interface WordTables {
  /** Words lexed as keywords in script code */
  readonly keywords: ReadonlySet<string>;
  /** Keywords that end an expression, like `this` or `null` */
  readonly valueKeywords: ReadonlySet<string>;
  /** Primitive type names, always type-name tokens inside a type */
  readonly builtinTypes: ReadonlySet<string>;
  /** `typeof`, `keyof`, `infer`, ... inside a type */
  readonly typeOperators: ReadonlySet<string>;
  /** Other words that stay keywords inside a type */
  readonly typeKeywords: ReadonlySet<string>;
}

const WORDS_FILE = new URL("../data/words.json", import.meta.url);

function readList(data: Record<string, unknown>, key: string): ReadonlySet<string> {
  const list = data[key];
  if (!Array.isArray(list) || !list.every((item): item is string => typeof item === "string")) {
    throw new Error(`${WORDS_FILE.pathname}: "${key}" must be an array of strings`);
  }
  return new Set(list);
}

function loadWordTables(): WordTables {
  const data: unknown = JSON.parse(readFileSync(WORDS_FILE, "utf8"));
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error(`${WORDS_FILE.pathname}: expected an object`);
  }
  const record: Record<string, unknown> = { ...data };
  return {
    keywords: readList(record, "keywords"),
    valueKeywords: readList(record, "valueKeywords"),
    builtinTypes: readList(record, "builtinTypes"),
    typeOperators: readList(record, "typeOperators"),
    typeKeywords: readList(record, "typeKeywords"),
  };
}

export const WORDS: WordTables = loadWordTables();
