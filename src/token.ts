// ============================================================
// TOKEN KINDS
// ============================================================

/**
 * Reserved token kinds. Grammars define their own kinds as positive
 * integers, e.g. `const Kind = { NUMBER: 1, OPERATOR: 2 } as const`.
 */
export const TOKEN_KIND = {
  /** End of input */
  EOF: -1,
  /** Error token; its value is a message rather than input text */
  ERROR: 0,
} as const;

export type TokenKind = number;

/** Longest value (in code points) rendered before truncation */
const RENDER_LIMIT = 10;

// ============================================================
// TOKEN
// ============================================================

/**
 * A classified slice of the input.
 * `start` and `end` are UTF-8 byte offsets into the input as it stood when
 * the token was emitted.
 */
export class Token {
  constructor(
    readonly kind: TokenKind,
    readonly value: string,
    readonly start: number,
    readonly end: number
  ) {
    Object.freeze(this);
  }

  /** Short human-readable form for diagnostics; not meant to round-trip */
  render(): string {
    switch (this.kind) {
      case TOKEN_KIND.EOF:
        return 'EOF';
      case TOKEN_KIND.ERROR:
        return this.value;
    }
    const chars = Array.from(this.value);
    if (chars.length > RENDER_LIMIT) {
      return `${JSON.stringify(chars.slice(0, RENDER_LIMIT).join(''))}...`;
    }
    return JSON.stringify(this.value);
  }

  toString(): string {
    return this.render();
  }
}

export function isEofToken(token: Token): boolean {
  return token.kind === TOKEN_KIND.EOF;
}

export function isErrorToken(token: Token): boolean {
  return token.kind === TOKEN_KIND.ERROR;
}

/**
 * Look up a display name for `kind` in a grammar's kind table.
 * Falls back to `EOF`, `ERROR` or the numeric kind.
 */
export function tokenKindName(
  kind: TokenKind,
  names: Readonly<Record<string, TokenKind>> = {}
): string {
  for (const [name, value] of Object.entries(names)) {
    if (value === kind) return name;
  }
  if (kind === TOKEN_KIND.EOF) return 'EOF';
  if (kind === TOKEN_KIND.ERROR) return 'ERROR';
  return String(kind);
}
