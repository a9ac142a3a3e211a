/**
 * Tokenize
 * One-call runners for when a token array is all the caller needs
 */

import type { Token } from '../token.js';
import type { LexSource } from './input-buffer.js';
import { Lexer } from './lexer.js';
import type { LexerOptions } from './options.js';
import type { LexState } from './states.js';

/** Read a lexer's stream until it closes */
export async function collectTokens(lexer: Lexer): Promise<Token[]> {
  const tokens: Token[] = [];
  for await (const token of lexer) {
    tokens.push(token);
  }
  return tokens;
}

/** Run `start` over `source` synchronously and return every token */
export function tokenize(
  source: LexSource,
  start: LexState,
  options?: LexerOptions
): Token[] {
  const lexer = new Lexer(source, start, options);
  lexer.runSync();
  return lexer.drainSync();
}

/** Run `start` over `source` with a concurrent consumer */
export async function tokenizeAsync(
  source: LexSource,
  start: LexState,
  options?: LexerOptions
): Promise<Token[]> {
  const lexer = new Lexer(source, start, options);
  const [, tokens] = await Promise.all([
    lexer.runAsync(),
    collectTokens(lexer),
  ]);
  return tokens;
}
