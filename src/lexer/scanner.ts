/**
 * Scanner
 * Cursor primitives available to transitions
 */

import { Token, type TokenKind } from '../token.js';
import {
  EOF_RUNE,
  InputBuffer,
  type LexSource,
  type Rune,
} from './input-buffer.js';
import { RewindBuffer } from './rewind-buffer.js';

/** Single-rune test: a pattern matched against one character, or a function */
export type RunePredicate = RegExp | ((rune: Rune) => boolean);

function inCharSet(chars: string, rune: Rune): boolean {
  if (rune === EOF_RUNE) return false;
  for (const ch of chars) {
    if (ch.codePointAt(0) === rune) return true;
  }
  return false;
}

function matches(predicate: RunePredicate, rune: Rune): boolean {
  if (rune === EOF_RUNE) return false;
  if (typeof predicate === 'function') return predicate(rune);
  // Stateful (g/y) patterns would otherwise resume from lastIndex
  predicate.lastIndex = 0;
  return predicate.test(String.fromCodePoint(rune));
}

/**
 * Forward-only, undoable cursor over the input.
 *
 * `lexemeStart` marks the start of the in-progress lexeme and `position` the
 * cursor; both are UTF-8 byte offsets. Every rune consumed since the last
 * `emit()`/`ignore()` is journaled in `rewind` so it can be backed up.
 */
export abstract class Scanner {
  /** Undo journal for the in-progress lexeme */
  readonly rewind = new RewindBuffer();

  private readonly buffer: InputBuffer;
  private start = 0;
  private pos = 0;

  constructor(source: LexSource) {
    this.buffer = new InputBuffer(source);
  }

  /** Current input text, including any `ignoreLastUnit()` edits */
  get input(): string {
    return this.buffer.toString();
  }

  get byteLength(): number {
    return this.buffer.length;
  }

  get lexemeStart(): number {
    return this.start;
  }

  get position(): number {
    return this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.buffer.length;
  }

  /** Consume one rune; returns EOF_RUNE (without advancing) at end of input */
  next(): Rune {
    const decoded = this.buffer.decodeAt(this.pos);
    this.pos += decoded.width;
    this.rewind.push(decoded);
    return decoded.rune;
  }

  /**
   * Undo the most recent `next()`.
   * Returns true when the cursor would have crossed `lexemeStart` and was
   * clamped to it instead.
   */
  backup(): boolean {
    const { width } = this.rewind.pop();
    if (width === 0) return false;
    this.pos -= width;
    if (this.pos < this.start) {
      this.pos = this.start;
      return true;
    }
    return false;
  }

  peek(): Rune {
    const rune = this.next();
    this.backup();
    return rune;
  }

  /** The `n`th rune ahead of the cursor (1 = same as peek()) */
  peekAhead(n: number): Rune {
    let rune = EOF_RUNE;
    for (let i = 0; i < n; i++) {
      rune = this.next();
    }
    for (let i = 0; i < n; i++) {
      this.backup();
    }
    return rune;
  }

  /** Consume the next rune if it is one of `chars` */
  take(chars: string): boolean {
    if (inCharSet(chars, this.next())) return true;
    this.backup();
    return false;
  }

  /** Consume runes while they are in `chars`; returns how many were taken */
  takeRun(chars: string): number {
    let count = 0;
    while (inCharSet(chars, this.next())) count++;
    this.backup();
    return count;
  }

  takeIf(predicate: RunePredicate): boolean {
    if (matches(predicate, this.next())) return true;
    this.backup();
    return false;
  }

  takeRunIf(predicate: RunePredicate): number {
    let count = 0;
    while (matches(predicate, this.next())) count++;
    this.backup();
    return count;
  }

  /** Text of the in-progress lexeme */
  current(): string {
    return this.buffer.slice(this.start, this.pos);
  }

  /** Publish the current lexeme as a token of `kind` and start a new one */
  emit(kind: TokenKind): void {
    this.publish(new Token(kind, this.current(), this.start, this.pos));
    this.start = this.pos;
    this.rewind.clear();
  }

  /** Drop the current lexeme without publishing it */
  ignore(): void {
    this.start = this.pos;
    this.rewind.clear();
  }

  /**
   * Delete the most recently consumed rune from the input itself, e.g. an
   * escape marker that must not appear in the emitted text.
   * No-op when nothing has been consumed since the last boundary.
   */
  ignoreLastUnit(): void {
    const { width } = this.rewind.pop();
    this.buffer.excise(this.pos - width, this.pos);
    this.pos -= width;
  }

  protected abstract publish(token: Token): void;
}
