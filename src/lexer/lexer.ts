/**
 * Lexer
 * Runs a grammar's states over the input and streams the emitted tokens
 */

import { createError, ScanError } from '../error-classes.js';
import type { Token } from '../token.js';
import type { LexSource } from './input-buffer.js';
import type {
  ErrorHandler,
  LexerObservability,
  LexerOptions,
  RunMode,
  UnhandledErrorPolicy,
} from './options.js';
import { Scanner } from './scanner.js';
import { StateLedger } from './state-ledger.js';
import type { LexState } from './states.js';
import { type NextTokenResult, TokenQueue } from './token-queue.js';

/** Queue capacity for an input of `byteLength` bytes */
export function queueCapacity(byteLength: number): number {
  return Math.max(1, Math.floor(byteLength / 2));
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * A lexer services exactly one input and one run.
 *
 * @example
 * const lexer = new Lexer('12+34', start);
 * const run = lexer.runAsync();
 * for await (const token of lexer) console.log(token.render());
 * await run;
 */
export class Lexer extends Scanner {
  /** Resume points for transitions that delegate to a sub-scan */
  readonly ledger = new StateLedger();
  readonly capacity: number;

  private readonly startState: LexState;
  private readonly unhandledErrors: UnhandledErrorPolicy;
  private readonly observability: LexerObservability;
  private errorHandler: ErrorHandler | undefined;
  private readonly reported: ScanError[] = [];

  private readonly queue: TokenQueue;
  private mode: RunMode | undefined;
  private done = false;
  private fullReported = false;
  private emitted = 0;
  private transitions = 0;

  constructor(
    source: LexSource,
    start: LexState,
    options: LexerOptions = {}
  ) {
    super(source);
    this.startState = start;
    this.capacity = queueCapacity(this.byteLength);
    this.queue = new TokenQueue(this.capacity);
    this.errorHandler = options.onError;
    this.unhandledErrors = options.unhandledErrors ?? 'abort';
    this.observability = options.observability ?? {};
  }

  /** Most recent error reported through error() that the run survived */
  get lastError(): ScanError | undefined {
    return this.reported[this.reported.length - 1];
  }

  /** Every error the run survived, oldest first */
  get errors(): readonly ScanError[] {
    return this.reported;
  }

  get started(): boolean {
    return this.mode !== undefined;
  }

  /** True once the run loop reached a null transition */
  get finished(): boolean {
    return this.done;
  }

  setErrorHandler(handler: ErrorHandler | undefined): void {
    this.errorHandler = handler;
  }

  /**
   * Report a lexical error.
   *
   * With a handler installed the error is recorded and the handler called;
   * the run continues until a transition returns null. Without one, the
   * `unhandledErrors` policy applies: `abort` (default) throws and ends the
   * run without recording the error, `collect` records it and continues.
   */
  error(message: string): void {
    if (this.errorHandler) {
      const error = new ScanError('LEX-S001', message, this.position);
      this.reported.push(error);
      this.observability.onError?.({ error, disposition: 'handler' });
      this.errorHandler(message);
      return;
    }

    if (this.unhandledErrors === 'collect') {
      const error = new ScanError('LEX-S001', message, this.position);
      this.reported.push(error);
      this.observability.onError?.({ error, disposition: 'collect' });
      return;
    }

    const fatal = new ScanError('LEX-S002', message, this.position);
    this.observability.onError?.({ error: fatal, disposition: 'abort' });
    throw fatal;
  }

  // ============================================================
  // RUN MODES
  // ============================================================

  /**
   * Run the states as a separate task. Returns once the run ends; rejects
   * with the ScanError when an unhandled error aborts it.
   *
   * After each transition that leaves the queue at capacity, the run waits
   * for a consumer to take a token.
   */
  async runAsync(): Promise<void> {
    const queue = this.begin('async');
    const startedAt = Date.now();

    try {
      // Let the caller attach its consumer before the first transition
      await Promise.resolve();

      let state: LexState | null = this.startState;
      while (state) {
        state = this.step(state);
        if (state && queue.isFull) {
          this.observability.onQueueFull?.({
            capacity: this.capacity,
            size: queue.size,
            mode: 'async',
          });
          await queue.waitForSpace();
        }
      }
    } catch (err) {
      const error = toError(err);
      queue.fail(error);
      throw error;
    }

    this.finish('async', startedAt);
  }

  /**
   * Run the states to completion on the caller's own stack.
   *
   * Nothing can consume tokens until this returns, so the queue buffers past
   * its capacity; `onQueueFull` reports the first time it does.
   */
  runSync(): void {
    const queue = this.begin('sync');
    const startedAt = Date.now();

    try {
      let state: LexState | null = this.startState;
      while (state) {
        state = this.step(state);
      }
    } catch (err) {
      queue.fail(toError(err));
      throw err;
    }

    this.finish('sync', startedAt);
  }

  // ============================================================
  // CONSUMPTION
  // ============================================================

  /**
   * Next published token; `closed` once the run ended and all were read.
   * A consumer may start before the run does: it waits for the first token.
   */
  async nextToken(): Promise<NextTokenResult> {
    return this.queue.take();
  }

  /** Take every token buffered so far without waiting */
  drainSync(): Token[] {
    return this.queue.drain();
  }

  async *tokens(): AsyncGenerator<Token, void, undefined> {
    for (;;) {
      const result = await this.nextToken();
      if (result.closed) return;
      yield result.token;
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<Token, void, undefined> {
    return this.tokens();
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  protected override publish(token: Token): void {
    if (this.mode === undefined) {
      throw createError('LEX-R002', {});
    }
    this.queue.put(token);
    this.emitted++;
    this.observability.onEmit?.({ token });

    if (this.mode === 'sync' && !this.fullReported && this.queue.isFull) {
      this.fullReported = true;
      this.observability.onQueueFull?.({
        capacity: this.capacity,
        size: this.queue.size,
        mode: 'sync',
      });
    }
  }

  private begin(mode: RunMode): TokenQueue {
    if (this.mode !== undefined) {
      throw createError('LEX-R001', { mode: this.mode });
    }
    this.mode = mode;
    return this.queue;
  }

  private step(state: LexState): LexState | null {
    this.transitions++;
    this.observability.onTransition?.({
      state: state.name,
      lexemeStart: this.lexemeStart,
      position: this.position,
    });
    return state.scan(this);
  }

  private finish(mode: RunMode, startedAt: number): void {
    this.done = true;
    this.queue.close();
    this.observability.onRunEnd?.({
      mode,
      tokens: this.emitted,
      transitions: this.transitions,
      durationMs: Date.now() - startedAt,
    });
  }
}
