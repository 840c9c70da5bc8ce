/**
 * Named sub-patterns (`\fc`, `\lambda`, ...), read once from `data/macros.json`.
 *
 * A macro body is pattern text itself and may use other macros. Macros never
 * declare capturing groups, so expanding one leaves the capture numbering of
 * the surrounding pattern unchanged.
 */

import { readFileSync } from "node:fs";

const MACROS_FILE = new URL("../data/macros.json", import.meta.url);

function loadMacros(): ReadonlyMap<string, string> {
  const data: unknown = JSON.parse(readFileSync(MACROS_FILE, "utf8"));
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error(`${MACROS_FILE.pathname}: expected an object`);
  }
  const macros = new Map<string, string>();
  for (const [name, body] of Object.entries(data)) {
    if (typeof body !== "string" || !/^[A-Za-z]{2,}$/.test(name)) {
      throw new Error(`${MACROS_FILE.pathname}: "${name}" must map a name of two or more letters to pattern text`);
    }
    macros.set(name, body);
  }
  return macros;
}

export const MACROS: ReadonlyMap<string, string> = loadMacros();
