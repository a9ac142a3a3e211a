/**
 * Token Queue
 * Bounded channel between the run loop and token consumers
 */

import { createError } from '../error-classes.js';
import type { Token } from '../token.js';

export type NextTokenResult =
  | { readonly token: Token; readonly closed: false }
  | { readonly token: null; readonly closed: true };

const CLOSED: NextTokenResult = Object.freeze({ token: null, closed: true });

interface PendingTake {
  resolve: (result: NextTokenResult) => void;
  reject: (error: Error) => void;
}

const MIN_SLOTS = 16;

/**
 * FIFO of tokens with a soft capacity.
 *
 * `put()` never blocks; the producer calls `waitForSpace()` to apply
 * backpressure. `take()` waits while the queue is empty and open. After
 * `close()` or `fail()`, buffered tokens are still handed out first.
 *
 * Tokens live in a ring of slots that is only grown past `capacity` when a
 * producer overfills the queue; taken slots are cleared.
 */
export class TokenQueue {
  private slots: Array<Token | undefined> = [];
  private head = 0;
  private count = 0;
  private readonly takers: PendingTake[] = [];
  private spaceWaiters: Array<() => void> = [];
  private closed = false;
  private failure: Error | undefined;

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.count;
  }

  /** Number of slots allocated for buffered tokens */
  get slotCount(): number {
    return this.slots.length;
  }

  get isFull(): boolean {
    return this.size >= this.capacity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  put(token: Token): void {
    if (this.closed) {
      throw createError('LEX-R003', {});
    }
    const taker = this.takers.shift();
    if (taker) {
      taker.resolve({ token, closed: false });
      return;
    }
    if (this.count === this.slots.length) this.grow();
    this.slots[(this.head + this.count) % this.slots.length] = token;
    this.count++;
  }

  take(): Promise<NextTokenResult> {
    const token = this.shift();
    if (token) {
      const result: NextTokenResult = { token, closed: false };
      return Promise.resolve(result);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.closed) {
      return Promise.resolve(CLOSED);
    }
    return new Promise((resolve, reject) => {
      this.takers.push({ resolve, reject });
    });
  }

  /** Take every buffered token without waiting */
  drain(): Token[] {
    const tokens: Token[] = [];
    for (let token = this.shift(); token; token = this.shift()) {
      tokens.push(token);
    }
    this.notifySpace();
    return tokens;
  }

  /** Resolves once the queue is below capacity (or closed) */
  waitForSpace(): Promise<void> {
    if (!this.isFull || this.closed) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.spaceWaiters.push(resolve);
    });
  }

  /** End of stream: waiting consumers observe `closed` */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const taker of this.takers.splice(0)) {
      taker.resolve(CLOSED);
    }
    this.notifySpace();
  }

  /** Abort the stream: waiting and later consumers reject with `error` */
  fail(error: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = error;
    for (const taker of this.takers.splice(0)) {
      taker.reject(error);
    }
    this.notifySpace();
  }

  private shift(): Token | undefined {
    if (this.count === 0) return undefined;
    const token = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.slots.length;
    this.count--;
    this.notifySpace();
    return token;
  }

  // Up to capacity the ring never holds more slots than the queue allows;
  // past it (sync runs) it doubles.
  private grow(): void {
    const length =
      this.count < this.capacity
        ? Math.min(this.capacity, Math.max(MIN_SLOTS, this.count * 2))
        : Math.max(MIN_SLOTS, this.count * 2);
    const next: Array<Token | undefined> = new Array<Token | undefined>(length);
    for (let i = 0; i < this.count; i++) {
      next[i] = this.slots[(this.head + i) % this.slots.length];
    }
    this.slots = next;
    this.head = 0;
  }

  private notifySpace(): void {
    if (this.isFull && !this.closed) return;
    const waiters = this.spaceWaiters;
    this.spaceWaiters = [];
    for (const resume of waiters) resume();
  }
}
