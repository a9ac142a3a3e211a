/**
 * Rewind Buffer
 * Undo journal of the runes consumed since the last lexeme boundary
 */

import { EOF_RUNE, type DecodedRune } from './input-buffer.js';

/** Returned by `pop()` on an empty journal */
export const NONE_CONSUMED: DecodedRune = Object.freeze({
  rune: EOF_RUNE,
  width: 0,
});

export class RewindBuffer {
  private entries: DecodedRune[] = [];

  get size(): number {
    return this.entries.length;
  }

  push(entry: DecodedRune): void {
    this.entries.push(entry);
  }

  pop(): DecodedRune {
    return this.entries.pop() ?? NONE_CONSUMED;
  }

  /** Most recent entry without removing it */
  peek(): DecodedRune {
    return this.entries[this.entries.length - 1] ?? NONE_CONSUMED;
  }

  clear(): void {
    this.entries = [];
  }
}
