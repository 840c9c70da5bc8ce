/**
 * Console logging with a `[tokenloom:<scope>]` prefix.
 *
 * `debug` output is gated on the `debug` config flag (TOKENLOOM_DEBUG=1),
 * `trace` output on `dispatch.trace` or `debug`. Warnings always print.
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  /** Whether `debug` output is currently enabled */
  readonly enabled: boolean;
  debug(message: string, ...details: unknown[]): void;
  trace(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[tokenloom:${scope}]`;

  return {
    scope,
    get enabled(): boolean {
      return config.getBoolean("debug", false);
    },
    debug(message, ...details) {
      if (!config.getBoolean("debug", false)) return;
      console.log(`${prefix} ${message}`, ...details);
    },
    trace(message, ...details) {
      if (!config.getBoolean("dispatch.trace", false) && !config.getBoolean("debug", false)) return;
      console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
  };
}
