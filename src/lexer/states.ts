/**
 * Lexer States
 * Named transitions driven by the execution loop
 */

import { createError } from '../error-classes.js';
import type { Lexer } from './lexer.js';

/**
 * One state of a grammar: given the lexer, scan some input and return the
 * next state, or null to end the run.
 */
export interface LexState {
  readonly name: string;
  scan(lexer: Lexer): LexState | null;
}

export type ScanFn = (lexer: Lexer) => LexState | null;

export function defineState(name: string, scan: ScanFn): LexState {
  return Object.freeze({ name, scan });
}

function isLexState(value: unknown): value is LexState {
  return typeof value === 'object' && value !== null;
}

// ============================================================
// STATE TABLES
// ============================================================

/**
 * A closed set of named transitions. Each returns the name of the next
 * state, a state popped from the ledger, or null.
 */
export type StateTable<N extends string> = {
  readonly [P in N]: (lexer: Lexer) => N | LexState | null;
};

/** States compiled from a StateTable, addressable by name */
export class StateSet<N extends string> {
  private readonly byName = new Map<N, LexState>();

  constructor(table: StateTable<N>) {
    for (const name in table) {
      const scan = table[name];
      this.byName.set(
        name,
        defineState(name, (lexer) => {
          const next = scan(lexer);
          if (next === null) return null;
          if (isLexState(next)) return next;
          return this.resolve(name, next);
        })
      );
    }
  }

  get names(): N[] {
    return [...this.byName.keys()];
  }

  get(name: N): LexState {
    const state = this.byName.get(name);
    if (!state) {
      throw createError('LEX-T002', { name });
    }
    return state;
  }

  has(name: string): boolean {
    return this.names.some((known) => known === name);
  }

  private resolve(from: N, to: N): LexState {
    const state = this.byName.get(to);
    if (!state) {
      throw createError('LEX-T001', { from, to });
    }
    return state;
  }
}

/**
 * Compile a state table.
 *
 * @example
 * const states = compileStates({
 *   start: (lx) => (lx.atEnd() ? null : 'word'),
 *   word: (lx) => { lx.takeRunIf(/\S/); lx.emit(1); lx.takeRun(' '); lx.ignore(); return 'start'; },
 * });
 * new Lexer('a b', states.get('start')).runSync();
 */
export function compileStates<N extends string>(
  table: StateTable<N>
): StateSet<N> {
  return new StateSet(table);
}
