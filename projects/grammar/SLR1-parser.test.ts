import { NotSLR1Error } from './errors.js';
import { calcFirst, calcFollow } from './first-follow.js';
import { buildGrammar, type Grammar } from './grammar.js';
import { actionToString, SLR1Tables } from './SLR1-parser.js';
import { EOF, nonTerminal, symbolToString, terminal } from './symbols.js';

const tablesFor = (grammar: Grammar) =>
  SLR1Tables.build(grammar, calcFollow(grammar, calcFirst(grammar)));

const tablesForOrThrow = (grammar: Grammar) =>
  SLR1Tables.buildOrThrow(grammar, calcFollow(grammar, calcFirst(grammar)));

describe('SLR1Tables', () => {
  const leftRecursive = tablesForOrThrow(buildGrammar({ S: ['Sa', 'b'] }));

  describe('build()', () => {
    it('fills ACTION and GOTO', () => {
      expect(leftRecursive.numStates).toBe(4);
      expect(leftRecursive.toDebugStr().split('\n')).toEqual([
        'ACTION:',
        '[0, b] = shift 2',
        '[1, a] = shift 3',
        '[1, $] = accept',
        '[2, a] = reduce S -> b',
        '[2, $] = reduce S -> b',
        '[3, a] = reduce S -> Sa',
        '[3, $] = reduce S -> Sa',
        'GOTO:',
        '[0, S] = 1',
      ]);
    });

    it('looks up single cells', () => {
      const shift = leftRecursive.action(0, terminal('b'));
      expect(shift).toEqual({ kind: 'shift', state: 2 });
      expect(leftRecursive.action(0, terminal('a'))).toBeUndefined();
      expect(leftRecursive.action(1, EOF)).toEqual({ kind: 'accept' });
      expect(leftRecursive.goto(0, nonTerminal('S'))).toBe(1);
      expect(leftRecursive.goto(1, nonTerminal('S'))).toBeUndefined();
    });

    it('reports shift/reduce conflicts', () => {
      const result = tablesFor(buildGrammar({ S: ['SS', 'a'] }));
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        const error = result.error;
        expect(error).toBeInstanceOf(NotSLR1Error);
        expect(error.state).toBe(3);
        expect(symbolToString(error.lookahead)).toBe('a');
        expect(error.conflict).toBe('shift/reduce');
        expect(actionToString(error.existing)).toBe('shift 2');
        expect(actionToString(error.incoming)).toBe('reduce S -> SS');
        expect(error.message).toBe('shift/reduce conflict at state 3, symbol a');
      }
    });

    it('reports reduce/reduce conflicts', () => {
      const result = tablesFor(
        buildGrammar({ S: ['A', 'B'], A: ['a'], B: ['a'] })
      );
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        const error = result.error;
        expect(error.state).toBe(4);
        expect(error.lookahead).toEqual(EOF);
        expect(error.conflict).toBe('reduce/reduce');
        expect(actionToString(error.existing)).toBe('reduce A -> a');
        expect(actionToString(error.incoming)).toBe('reduce B -> a');
        expect(error.message).toBe(
          'reduce/reduce conflict at state 4, symbol $'
        );
      }
    });

    it('throws from the OrThrow variant', () => {
      expect(() => tablesForOrThrow(buildGrammar({ S: ['SS', 'a'] }))).toThrow(
        NotSLR1Error
      );
    });
  });

  describe('parse()', () => {
    it('handles left recursion', () => {
      expect(leftRecursive.parse('b')).toBe(true);
      expect(leftRecursive.parse('baa')).toBe(true);
      expect(leftRecursive.parse('ab')).toBe(false);
      expect(leftRecursive.parse('bb')).toBe(false);
      expect(leftRecursive.parse('')).toBe(false);
    });

    it('parses arithmetic expressions', () => {
      const arithmetic = tablesForOrThrow(
        buildGrammar({ S: ['S+T', 'T'], T: ['T*F', 'F'], F: ['(S)', 'i'] })
      );
      expect(arithmetic.parse('i+i*i')).toBe(true);
      expect(arithmetic.parse('(i+i)*i')).toBe(true);
      expect(arithmetic.parse('i+')).toBe(false);
      expect(arithmetic.parse('(i')).toBe(false);
    });

    it('reduces epsilon productions', () => {
      const parens = tablesForOrThrow(buildGrammar({ S: ['(S)S', 'e'] }));
      expect(parens.parse('')).toBe(true);
      expect(parens.parse('(())()')).toBe(true);
      expect(parens.parse('(')).toBe(false);
      expect(parens.parse(')')).toBe(false);
    });
  });

  describe('parseGen()', () => {
    it('yields every step of the parse', () => {
      const steps = [...leftRecursive.parseGen('ba')];
      expect(steps.map((step) => step.action.kind)).toEqual([
        'shift',
        'reduce',
        'shift',
        'reduce',
        'accept',
      ]);
      expect(steps.map((step) => step.states)).toEqual([
        [0],
        [0, 2],
        [0, 1],
        [0, 1, 3],
        [0, 1],
      ]);
      expect(steps[4].symbols.map(symbolToString)).toEqual(['S']);
    });

    it('says why it rejected', () => {
      const steps = [...leftRecursive.parseGen('a')];
      expect(steps).toHaveLength(1);
      expect(steps[0].action).toEqual({
        kind: 'reject',
        reason: 'No action on a',
      });
    });
  });
});
