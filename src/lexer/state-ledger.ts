/**
 * Nested-State Ledger
 * Saved resume points for transitions that delegate to a sub-scan
 */

import type { LexState } from './states.js';

/**
 * LIFO stack of states. The engine never pushes or pops it: a transition
 * pushes the state to resume, and the sub-scan that finishes pops it and
 * returns it as its own next state.
 */
export class StateLedger {
  private readonly stack: LexState[] = [];

  get size(): number {
    return this.stack.length;
  }

  push(state: LexState): void {
    this.stack.push(state);
  }

  pop(): LexState | null {
    return this.stack.pop() ?? null;
  }

  peek(): LexState | null {
    return this.stack[this.stack.length - 1] ?? null;
  }

  clear(): void {
    this.stack.length = 0;
  }
}
