/**
 * State Definition Tests
 * Named states and compiled state tables
 */

import { describe, expect, it } from 'vitest';

import {
  compileStates,
  defineState,
  Lexer,
  StateError,
  type StateTable,
  tokenize,
} from '../../src/index.js';
import { arithmetic, Kind } from '../helpers/grammars.js';
import { pairs } from '../helpers/scanner.js';

describe('defineState', () => {
  it('creates a frozen named state', () => {
    const state = defineState('only', () => null);

    expect(state.name).toBe('only');
    expect(Object.isFrozen(state)).toBe(true);
  });

  it('receives the lexer driving it', () => {
    const seen: Lexer[] = [];
    const state = defineState('spy', (lexer) => {
      seen.push(lexer);
      return null;
    });
    const lexer = new Lexer('x', state);
    lexer.runSync();

    expect(seen).toEqual([lexer]);
  });
});

describe('compileStates', () => {
  it('lists the table states', () => {
    expect(arithmetic.names).toEqual(['number', 'operator']);
    expect(arithmetic.has('operator')).toBe(true);
    expect(arithmetic.has('string')).toBe(false);
  });

  it('resolves returned names to states', () => {
    const tokens = tokenize('1 + 2', arithmetic.get('number'));

    expect(pairs(tokens)).toEqual([
      [Kind.NUMBER, '1'],
      [Kind.OPERATOR, '+'],
      [Kind.NUMBER, '2'],
    ]);
  });

  it('returns the same state object for each name', () => {
    expect(arithmetic.get('number')).toBe(arithmetic.get('number'));
    expect(arithmetic.get('number').name).toBe('number');
  });

  it('throws StateError for a missing start state', () => {
    const table: StateTable<string> = { start: () => null };
    const states = compileStates(table);

    expect(() => states.get('ghost')).toThrow(StateError);
    expect(() => states.get('ghost')).toThrow(
      'State table has no state named ghost'
    );
  });

  it('throws StateError when a transition names an unknown state', () => {
    const table: StateTable<string> = { start: () => 'ghost' };
    const lexer = new Lexer('', compileStates(table).get('start'));

    expect(() => lexer.runSync()).toThrow(
      'State start returned unknown state ghost'
    );
    expect(lexer.finished).toBe(false);
  });
});
