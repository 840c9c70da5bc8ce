/**
 * Core module exports for @tokenloom/core
 *
 * This package provides:
 * - The token model shared by every other package
 * - Error types
 * - Configuration and logging
 */

export {
  TokenKind,
  TOKEN_KINDS,
  createToken,
  isSynthetic,
  isTrivia,
  isStructural,
  nestingDelta,
  findBalancedEnd,
  matchingClose,
  tokenText,
  describeToken,
  type Token,
  type SourcePosition,
} from "./tokens.js";

export { LexError, PatternSyntaxError, DispatchError } from "./errors.js";

export {
  config,
  defineConfig,
  type TokenloomConfig,
  type LexerConfig,
  type DispatchConfig,
} from "./config.js";

export { createLogger, type Logger } from "./logger.js";
