/**
 * Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: TOKENLOOM_* (highest priority, for CI overrides)
 * 2. Config files: tokenloom.config.ts, .tokenloomrc, a "tokenloom" key in package.json, etc.
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@tokenloom/core";
 *
 * config.get("lexer.comments")           // → boolean
 * config.set({ dispatch: { trace: true } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/** Defaults for `tokenize` options that the caller leaves unset. */
export interface LexerConfig {
  /** Keep whitespace tokens */
  whitespace?: boolean;
  /** Keep comment tokens */
  comments?: boolean;
}

export interface DispatchConfig {
  /** Log every handler invocation */
  trace?: boolean;
}

export interface TokenloomConfig {
  /** Enable debug logging */
  debug?: boolean;
  lexer?: LexerConfig;
  dispatch?: DispatchConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with TOKENLOOM_ are parsed into the config object.
 *
 * Examples:
 *   TOKENLOOM_DEBUG=1                 → { debug: true }
 *   TOKENLOOM_LEXER_COMMENTS=true     → { lexer: { comments: true } }
 *   TOKENLOOM_DISPATCH__TRACE=0       → { dispatch: { trace: false } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};
  const PREFIX = "TOKENLOOM_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key.slice(PREFIX.length).toLowerCase().replace(/__/g, ".").replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "tokenloom";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): ConfigRecord {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `.${MODULE_NAME}rc.ts`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
        `${MODULE_NAME}.config.ts`,
      ],
    });

    const result = explorer.search();
    if (result && !result.isEmpty) {
      const loaded: unknown = result.config;
      if (isRecord(loaded)) {
        configFilePath = result.filepath;
        return loaded;
      }
      console.warn(`[tokenloom] Ignoring config file ${result.filepath}: expected an object`);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    console.warn(`[tokenloom] Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: TokenloomConfig = {
    debug: false,
    lexer: {
      whitespace: false,
      comments: false,
    },
    dispatch: {
      trace: false,
    },
  };

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Get a boolean configuration value, or `fallback` when the path holds
 * anything else.
 */
function getBoolean(path: string, fallback: boolean): boolean {
  const value = get(path);
  return typeof value === "boolean" ? value : fallback;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<TokenloomConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  get,
  getBoolean,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};

/**
 * Identity helper for typed `tokenloom.config.ts` files.
 */
export function defineConfig(value: TokenloomConfig): TokenloomConfig {
  return value;
}
