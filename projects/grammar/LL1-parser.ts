import { err, ok, Result } from 'neverthrow';
import { type IHaveDebugStr, log } from '../utils/debug.js';
import { HashMap } from '../utils/sets.js';
import { NotLL1Error } from './errors.js';
import {
  type FirstMap,
  firstOfString,
  followOf,
  type FollowMap,
} from './first-follow.js';
import type { Grammar, Production } from './grammar.js';
import {
  EOF,
  EPSILON,
  type GrammarSymbol,
  inputSymbols,
  isLookahead,
  isNonTerminal,
  type Lookahead,
  type NonTerminal,
  sortSymbols,
  symbolKey,
  symbolsEqual,
  symbolToString,
} from './symbols.js';

export type LL1Action =
  | { kind: 'match'; symbol: Lookahead }
  | { kind: 'expand'; production: Production }
  | { kind: 'accept' }
  | { kind: 'reject'; reason: string };

/**
 * One step of the predictive parser: the machine before `action` ran.
 */
export type LL1Step = {
  stack: GrammarSymbol[];
  position: number;
  lookahead: Lookahead;
  action: LL1Action;
};

type Row = HashMap<Lookahead, Production>;

/**
 * Predictive parsing table, mapping (nonterminal, lookahead) to the one
 * production to expand.
 */
export class LL1Table implements IHaveDebugStr {
  readonly grammar: Grammar;
  private table: HashMap<NonTerminal, Row>;

  private constructor(grammar: Grammar, table: HashMap<NonTerminal, Row>) {
    this.grammar = grammar;
    this.table = table;
  }

  /**
   * Algorithm for construction of LL1 table.
   * See page 113 of Engineering a Compiler 2nd Edition
   *
   * Fails on the first cell that two different productions claim.
   */
  static build(
    grammar: Grammar,
    first: FirstMap,
    follow: FollowMap
  ): Result<LL1Table, NotLL1Error> {
    const table = new HashMap<NonTerminal, Row>(symbolKey);
    const rowFor = (A: NonTerminal) => {
      let row = table.get(A);
      if (!row) {
        row = new HashMap<Lookahead, Production>(symbolKey);
        table.set(A, row);
      }
      return row;
    };

    for (const p of grammar.productionsIter()) {
      const A = p.rule;
      const firstAlpha = firstOfString(p.symbols, first);
      const lookaheads: Lookahead[] = [...firstAlpha].filter(isLookahead);
      if (firstAlpha.has(EPSILON)) {
        lookaheads.push(...followOf(A, follow));
      }
      const row = rowFor(A);
      for (const w of lookaheads) {
        const existing = row.get(w);
        if (existing && !existing.equals(p)) {
          const error = new NotLL1Error(A, w, existing, p);
          log(`buildLL1Table: ${error.message}`);
          return err(error);
        }
        row.set(w, p);
      }
    }
    return ok(new LL1Table(grammar, table));
  }

  static buildOrThrow(grammar: Grammar, first: FirstMap, follow: FollowMap) {
    const result = LL1Table.build(grammar, first, follow);
    if (result.isOk()) {
      return result.value;
    }
    throw result.error;
  }

  get(nonTerminal: NonTerminal, lookahead: Lookahead): Production | undefined {
    return this.table.get(nonTerminal)?.get(lookahead);
  }

  get size(): number {
    let size = 0;
    for (const row of this.table.values()) {
      size += row.size;
    }
    return size;
  }

  *entries(): Generator<[NonTerminal, Lookahead, Production]> {
    for (const [row, cols] of this.table.entries()) {
      for (const [col, cell] of cols.entries()) {
        yield [row, col, cell];
      }
    }
  }

  /**
   * Decide whether the grammar derives `input`.
   */
  parse(input: string): boolean {
    const generator = this.parseGen(input);
    let state = generator.next();
    while (!state.done) {
      state = generator.next();
    }
    return state.value;
  }

  /**
   * Implements table driven LL(1) skeleton parser as described on
   * page 112 of Engineering a Compiler 2nd Edition, yielding every step.
   * Returns whether the input was accepted.
   */
  *parseGen(input: string): Generator<LL1Step, boolean> {
    const words: Lookahead[] = [...inputSymbols(input), EOF];
    const stack: GrammarSymbol[] = [EOF, this.grammar.start];
    let position = 0;

    const step = (action: LL1Action): LL1Step => ({
      stack: [...stack],
      position,
      lookahead: words[position] ?? EOF,
      action,
    });

    while (stack.length > 0) {
      if (position >= words.length) {
        yield step({ kind: 'reject', reason: 'input exhausted' });
        return false;
      }
      const focus = stack[stack.length - 1];
      const word = words[position];
      if (symbolsEqual(focus, word)) {
        yield step({ kind: 'match', symbol: word });
        stack.pop();
        position++;
      } else if (isNonTerminal(focus)) {
        const production = this.get(focus, word);
        if (!production) {
          yield step({
            kind: 'reject',
            reason: `Failed to expand ${focus.char}`,
          });
          return false;
        }
        yield step({ kind: 'expand', production });
        stack.pop();
        // push body onto the stack in reverse
        const B = production.body;
        for (let i = B.length - 1; i >= 0; i--) {
          stack.push(B[i]);
        }
      } else {
        yield step({
          kind: 'reject',
          reason: `Couldn't find symbol ${symbolToString(focus)}`,
        });
        return false;
      }
    }

    if (position !== words.length) {
      yield step({ kind: 'reject', reason: 'unconsumed input' });
      return false;
    }
    yield step({ kind: 'accept' });
    return true;
  }

  /**
   * One line per filled cell, `M[A, a] = A -> α`, ordered by row then
   * column.
   */
  toDebugStr(): string {
    const lines: string[] = [];
    for (const A of sortSymbols(this.table.keys())) {
      const row = this.table.get(A);
      if (!row) {
        continue;
      }
      for (const w of sortSymbols(row.keys())) {
        const cell = row.get(w);
        if (cell) {
          lines.push(
            `M[${A.char}, ${symbolToString(w)}] = ${cell.toString()}`
          );
        }
      }
    }
    return lines.join('\n');
  }
}
