/**
 * Small grammars used across the engine tests
 */

import {
  compileStates,
  defineState,
  EOF_RUNE,
  type LexState,
} from '../../src/index.js';

export const Kind = {
  NUMBER: 1,
  OPERATOR: 2,
  TEXT: 3,
  IDENT: 4,
  STRING: 5,
} as const;

const DIGITS = '0123456789';

/**
 * Numbers separated by operators, spaces ignored.
 * An unexpected character is reported, skipped, and scanning resumes.
 */
export const arithmetic = compileStates({
  number: (lx) => {
    lx.takeRun(' ');
    lx.ignore();
    if (lx.takeRun(DIGITS) > 0) lx.emit(Kind.NUMBER);
    return 'operator';
  },
  operator: (lx) => {
    lx.takeRun(' ');
    lx.ignore();
    if (lx.take('+-*/')) {
      lx.emit(Kind.OPERATOR);
      return 'number';
    }
    if (lx.atEnd()) return null;
    lx.next();
    lx.error(`unexpected character ${JSON.stringify(lx.current())}`);
    lx.ignore();
    return 'number';
  },
});

/**
 * Text with `{name}` placeholders. The placeholder scan is a sub-scan: the
 * text state saves itself on the ledger and the placeholder state resumes it.
 */
export const template: LexState = defineState('text', (lx) => {
  if (lx.takeRunIf((r) => r !== 0x7b) > 0) lx.emit(Kind.TEXT);
  if (!lx.take('{')) return null;
  lx.ignore();
  lx.ledger.push(template);
  return placeholder;
});

const placeholder: LexState = defineState('placeholder', (lx) => {
  lx.takeRunIf(/[a-z]/);
  lx.emit(Kind.IDENT);
  if (!lx.take('}')) {
    lx.error('unterminated placeholder');
    return null;
  }
  lx.ignore();
  return lx.ledger.pop();
});

/**
 * Reads the whole input as one STRING token, deleting each backslash and
 * keeping the character after it.
 */
export const escaped: LexState = defineState('escaped', (lx) => {
  for (let r = lx.next(); r !== EOF_RUNE; r = lx.next()) {
    if (r === 0x5c) {
      lx.ignoreLastUnit();
      lx.next();
    }
  }
  lx.backup();
  lx.emit(Kind.STRING);
  return null;
});

/** Emits each rune as its own TEXT token */
export const perRune: LexState = defineState('per-rune', (lx) => {
  if (lx.next() === EOF_RUNE) return null;
  lx.emit(Kind.TEXT);
  return perRune;
});
