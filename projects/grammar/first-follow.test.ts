import { logger } from '../utils/debug.js';
import {
  calcFirst,
  calcFollow,
  firstFollowToDebugStr,
  firstOf,
  firstOfString,
  followOf,
  formatSymbolSet,
} from './first-follow.js';
import { buildGrammar } from './grammar.js';
import { LL1Table } from './LL1-parser.js';
import { SLR1Tables } from './SLR1-parser.js';
import { nonTerminal, terminal } from './symbols.js';

const S = nonTerminal('S');
const X = nonTerminal('X');
const T = nonTerminal('T');
const Y = nonTerminal('Y');
const F = nonTerminal('F');

const arithmetic = buildGrammar({
  S: ['TX'],
  X: ['+TX', 'e'],
  T: ['FY'],
  Y: ['*FY', 'e'],
  F: ['(S)', 'i'],
});

describe('calcFirst()', () => {
  const first = calcFirst(arithmetic);

  it('computes FIRST of every nonterminal', () => {
    expect(formatSymbolSet(firstOf(S, first))).toBe('{ ( i }');
    expect(formatSymbolSet(firstOf(T, first))).toBe('{ ( i }');
    expect(formatSymbolSet(firstOf(F, first))).toBe('{ ( i }');
    expect(formatSymbolSet(firstOf(X, first))).toBe('{ ε + }');
    expect(formatSymbolSet(firstOf(Y, first))).toBe('{ ε * }');
  });

  it('maps terminals to themselves', () => {
    expect(formatSymbolSet(firstOf(terminal('+'), first))).toBe('{ + }');
    expect(formatSymbolSet(firstOf(terminal('z'), first))).toBe('{ z }');
  });

  it('logs how many passes it took', () => {
    const logs: string[] = [];
    logger.capture(() => calcFirst(arithmetic), logs);
    expect(logs).toEqual(['calcFirst: fixed point after 4 passes']);
  });

  it('gives up after maxIterations passes', () => {
    expect(() => calcFirst(arithmetic, { maxIterations: 1 })).toThrow(
      'calcFirst did not converge after 1 passes'
    );
  });
});

describe('firstOfString()', () => {
  const first = calcFirst(arithmetic);

  it('is {ε} for the empty string', () => {
    expect(formatSymbolSet(firstOfString([], first))).toBe('{ ε }');
  });
  it('keeps ε only when every symbol derives it', () => {
    expect(formatSymbolSet(firstOfString([X, Y], first))).toBe('{ ε * + }');
    expect(formatSymbolSet(firstOfString([X, F], first))).toBe('{ ( + i }');
  });
  it('never contains nonterminals', () => {
    for (const production of arithmetic.productions) {
      const set = firstOfString(production.symbols, first);
      expect([...set].filter((s) => s.kind === 'nonterminal')).toEqual([]);
    }
  });
});

describe('calcFollow()', () => {
  it('computes FOLLOW of every nonterminal', () => {
    const follow = calcFollow(arithmetic, calcFirst(arithmetic));
    expect(formatSymbolSet(followOf(S, follow))).toBe('{ ) $ }');
    expect(formatSymbolSet(followOf(X, follow))).toBe('{ ) $ }');
    expect(formatSymbolSet(followOf(T, follow))).toBe('{ ) + $ }');
    expect(formatSymbolSet(followOf(Y, follow))).toBe('{ ) + $ }');
    expect(formatSymbolSet(followOf(F, follow))).toBe('{ ) * + $ }');
  });

  it('looks through nullable nonterminals', () => {
    const grammar = buildGrammar({ S: ['AB'], A: ['a', 'e'], B: ['b'] });
    const first = calcFirst(grammar);
    const follow = calcFollow(grammar, first);
    expect(formatSymbolSet(firstOf(S, first))).toBe('{ a b }');
    expect(formatSymbolSet(followOf(nonTerminal('A'), follow))).toBe('{ b }');
    expect(formatSymbolSet(followOf(nonTerminal('B'), follow))).toBe('{ $ }');
  });

  it('handles nonterminals without productions', () => {
    const grammar = buildGrammar({ S: ['aB'] });
    const first = calcFirst(grammar);
    const follow = calcFollow(grammar, first);
    expect(formatSymbolSet(firstOf(nonTerminal('B'), first))).toBe('{  }');
    expect(formatSymbolSet(followOf(nonTerminal('B'), follow))).toBe('{ $ }');
    expect(formatSymbolSet(followOf(nonTerminal('Q'), follow))).toBe('{  }');
  });
});

describe('read-only results', () => {
  it('are not changed by building the parsing tables', () => {
    const first = calcFirst(arithmetic);
    const follow = calcFollow(arithmetic, first);
    const before = firstFollowToDebugStr(arithmetic, first, follow);
    LL1Table.buildOrThrow(arithmetic, first, follow);
    SLR1Tables.buildOrThrow(arithmetic, follow);
    expect(firstFollowToDebugStr(arithmetic, first, follow)).toBe(before);
  });
});

describe('firstFollowToDebugStr()', () => {
  it('lists both sets for every nonterminal in order', () => {
    const first = calcFirst(arithmetic);
    const follow = calcFollow(arithmetic, first);
    expect(firstFollowToDebugStr(arithmetic, first, follow).split('\n')).toEqual(
      [
        'FIRST sets:',
        'FIRST(F) = { ( i }',
        'FIRST(S) = { ( i }',
        'FIRST(T) = { ( i }',
        'FIRST(X) = { ε + }',
        'FIRST(Y) = { ε * }',
        'FOLLOW sets:',
        'FOLLOW(F) = { ) * + $ }',
        'FOLLOW(S) = { ) $ }',
        'FOLLOW(T) = { ) + $ }',
        'FOLLOW(X) = { ) $ }',
        'FOLLOW(Y) = { ) + $ }',
      ]
    );
  });
});
