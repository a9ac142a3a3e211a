/**
 * runelex
 * Exports the lexing engine, token model and error taxonomy
 */

export * from './lexer/index.js';
export {
  isEofToken,
  isErrorToken,
  Token,
  TOKEN_KIND,
  tokenKindName,
  type TokenKind,
} from './token.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  createError,
  EngineError,
  LexError,
  type LexErrorData,
  ScanError,
  StateError,
} from './error-classes.js';
