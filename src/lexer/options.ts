/**
 * Lexer Options
 * Error hook, unhandled-error policy and observability callbacks
 */

import type { ScanError } from '../error-classes.js';
import type { Token } from '../token.js';

export type RunMode = 'async' | 'sync';

/** Receives the exact message passed to `lexer.error()` */
export type ErrorHandler = (message: string) => void;

/**
 * What `lexer.error()` does when no handler is installed:
 * - `abort` throws a ScanError and ends the run
 * - `collect` records the error and lets the run continue
 */
export type UnhandledErrorPolicy = 'abort' | 'collect';

/** Event emitted before a transition runs */
export interface TransitionEvent {
  /** Name of the state about to run */
  state: string;
  lexemeStart: number;
  position: number;
}

/** Event emitted after a token is published */
export interface EmitEvent {
  token: Token;
}

/** Event emitted when a transition reports a lexical error */
export interface LexErrorEvent {
  error: ScanError;
  /** How the error was dealt with */
  disposition: 'handler' | 'collect' | 'abort';
}

/** Event emitted when the token queue reaches its capacity */
export interface QueueFullEvent {
  capacity: number;
  size: number;
  mode: RunMode;
}

/** Event emitted when the run loop reaches a null transition */
export interface RunEndEvent {
  mode: RunMode;
  /** Tokens published during the run */
  tokens: number;
  /** Transitions invoked during the run */
  transitions: number;
  durationMs: number;
}

/** Observability callbacks for monitoring a run */
export interface LexerObservability {
  onTransition?: (event: TransitionEvent) => void;
  onEmit?: (event: EmitEvent) => void;
  onError?: (event: LexErrorEvent) => void;
  onQueueFull?: (event: QueueFullEvent) => void;
  onRunEnd?: (event: RunEndEvent) => void;
}

export interface LexerOptions {
  /** Error hook; same as calling setErrorHandler() before running */
  onError?: ErrorHandler | undefined;
  /** Behaviour of lexer.error() with no handler (default: 'abort') */
  unhandledErrors?: UnhandledErrorPolicy | undefined;
  observability?: LexerObservability | undefined;
}
