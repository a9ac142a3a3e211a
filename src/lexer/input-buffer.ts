/**
 * Input Buffer
 * Mutable UTF-8 view of the text being scanned
 */

import { Buffer } from 'node:buffer';

/** A Unicode code point, or EOF_RUNE */
export type Rune = number;

/** Returned by `next()` when no input remains */
export const EOF_RUNE: Rune = -1;

/** Substituted for each byte of an invalid UTF-8 sequence */
export const REPLACEMENT_RUNE: Rune = 0xfffd;

export interface DecodedRune {
  readonly rune: Rune;
  /** Encoded width in bytes (0 for EOF_RUNE) */
  readonly width: number;
}

const EOF_DECODED: DecodedRune = Object.freeze({ rune: EOF_RUNE, width: 0 });
const INVALID_DECODED: DecodedRune = Object.freeze({
  rune: REPLACEMENT_RUNE,
  width: 1,
});

function isContinuation(byte: number | undefined): byte is number {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

/** Text to scan, or raw bytes that may hold malformed UTF-8 */
export type LexSource = string | Uint8Array;

/**
 * Byte storage for the input. Offsets everywhere in the engine are byte
 * offsets into this buffer; `excise()` removes bytes in place.
 *
 * Byte sources are copied, so excisions never touch the caller's array.
 */
export class InputBuffer {
  private readonly bytes: Buffer;
  private used: number;

  constructor(source: LexSource) {
    this.bytes =
      typeof source === 'string'
        ? Buffer.from(source, 'utf8')
        : Buffer.from(source);
    this.used = this.bytes.length;
  }

  /** Length in bytes */
  get length(): number {
    return this.used;
  }

  /**
   * Decode the rune starting at `offset`.
   * Invalid or truncated sequences decode as U+FFFD with width 1.
   */
  decodeAt(offset: number): DecodedRune {
    if (offset >= this.used) return EOF_DECODED;

    const b0 = this.bytes[offset]!;
    if (b0 < 0x80) return { rune: b0, width: 1 };

    const b1 = this.byteAt(offset + 1);
    if (!isContinuation(b1)) return INVALID_DECODED;

    if (b0 >= 0xc2 && b0 <= 0xdf) {
      return { rune: ((b0 & 0x1f) << 6) | (b1 & 0x3f), width: 2 };
    }

    const b2 = this.byteAt(offset + 2);
    if (b0 >= 0xe0 && b0 <= 0xef) {
      // Overlongs (E0 80..9F) and surrogates (ED A0..BF) are invalid
      if (b0 === 0xe0 && b1 < 0xa0) return INVALID_DECODED;
      if (b0 === 0xed && b1 > 0x9f) return INVALID_DECODED;
      if (!isContinuation(b2)) return INVALID_DECODED;
      return {
        rune: ((b0 & 0x0f) << 12) | ((b1 & 0x3f) << 6) | (b2 & 0x3f),
        width: 3,
      };
    }

    const b3 = this.byteAt(offset + 3);
    if (b0 >= 0xf0 && b0 <= 0xf4) {
      if (b0 === 0xf0 && b1 < 0x90) return INVALID_DECODED;
      if (b0 === 0xf4 && b1 > 0x8f) return INVALID_DECODED;
      if (!isContinuation(b2) || !isContinuation(b3)) return INVALID_DECODED;
      return {
        rune:
          ((b0 & 0x07) << 18) |
          ((b1 & 0x3f) << 12) |
          ((b2 & 0x3f) << 6) |
          (b3 & 0x3f),
        width: 4,
      };
    }

    return INVALID_DECODED;
  }

  /** Decode bytes `[start, end)` as text */
  slice(start: number, end: number): string {
    return this.bytes.toString('utf8', start, Math.min(end, this.used));
  }

  /** Remove bytes `[start, end)`, shifting the tail left */
  excise(start: number, end: number): void {
    if (end <= start) return;
    this.bytes.copyWithin(start, end, this.used);
    this.used -= end - start;
  }

  toString(): string {
    return this.slice(0, this.used);
  }

  private byteAt(offset: number): number | undefined {
    return offset < this.used ? this.bytes[offset] : undefined;
  }
}
