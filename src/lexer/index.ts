/**
 * Lexer Module
 * Scanning cursor, run loop and token stream
 */

export {
  EOF_RUNE,
  REPLACEMENT_RUNE,
  InputBuffer,
  type DecodedRune,
  type LexSource,
  type Rune,
} from './input-buffer.js';
export { Lexer, queueCapacity } from './lexer.js';
export type {
  EmitEvent,
  ErrorHandler,
  LexErrorEvent,
  LexerObservability,
  LexerOptions,
  QueueFullEvent,
  RunEndEvent,
  RunMode,
  TransitionEvent,
  UnhandledErrorPolicy,
} from './options.js';
export { NONE_CONSUMED, RewindBuffer } from './rewind-buffer.js';
export { Scanner, type RunePredicate } from './scanner.js';
export { StateLedger } from './state-ledger.js';
export {
  compileStates,
  defineState,
  StateSet,
  type LexState,
  type ScanFn,
  type StateTable,
} from './states.js';
export { TokenQueue, type NextTokenResult } from './token-queue.js';
export { collectTokens, tokenize, tokenizeAsync } from './tokenize.js';
