import { log } from '../utils/debug.js';
import { type ConstSet, HashMap } from '../utils/sets.js';
import type { Grammar } from './grammar.js';
import {
  EOF,
  EPSILON,
  type GrammarSymbol,
  isLookahead,
  isNonTerminal,
  type Lookahead,
  type NonTerminal,
  sortSymbols,
  symbolKey,
  symbolSet,
  type SymbolSet,
  symbolToString,
} from './symbols.js';

export type FirstMap = HashMap<GrammarSymbol, SymbolSet>;
export type FollowMap = HashMap<NonTerminal, SymbolSet<Lookahead>>;

export type SolverOptions = {
  /**
   * Upper bound on full passes over the grammar. Both solvers reach their
   * fixed point long before this on any finite grammar.
   */
  maxIterations?: number;
};

const DEFAULT_MAX_ITERATIONS = 10_000;

/**
 * FIRST of a single symbol. Symbols missing from the map are treated
 * according to their kind, so a nonterminal without productions
 * has an empty FIRST set.
 */
export function firstOf(
  symbol: GrammarSymbol,
  first: FirstMap
): ConstSet<GrammarSymbol> {
  const known = first.get(symbol);
  if (known) {
    return known;
  }
  switch (symbol.kind) {
    case 'terminal':
    case 'epsilon':
    case 'eof':
      return symbolSet<GrammarSymbol>([symbol]);
    case 'nonterminal':
      return symbolSet<GrammarSymbol>();
  }
}

/**
 * FIRST of a sequence of symbols. The result contains epsilon only when
 * every symbol of the sequence can derive the empty string, which makes
 * FIRST of the empty sequence `{ϵ}`.
 */
export function firstOfString(
  symbols: readonly GrammarSymbol[],
  first: FirstMap
): SymbolSet {
  const result = symbolSet();
  for (const symbol of symbols) {
    const firstSymbol = firstOf(symbol, first);
    for (const s of firstSymbol) {
      if (s.kind !== 'epsilon') {
        result.add(s);
      }
    }
    if (!firstSymbol.has(EPSILON)) {
      return result;
    }
  }
  result.add(EPSILON);
  return result;
}

/**
 * Algorithm to calculate the set of terminal symbols
 * that can appear as the first word in some string of symbols.
 * @returns a map from symbols in the given grammar to their "first" sets
 *
 * See Page 104 of Engineering a Compiler 2nd Edition
 */
export function calcFirst(
  grammar: Grammar,
  { maxIterations = DEFAULT_MAX_ITERATIONS }: SolverOptions = {}
): FirstMap {
  const firstMap: FirstMap = new HashMap<GrammarSymbol, SymbolSet>(symbolKey);
  for (const terminal of grammar.getTerminals()) {
    firstMap.set(terminal, symbolSet<GrammarSymbol>([terminal]));
  }
  firstMap.set(EPSILON, symbolSet<GrammarSymbol>([EPSILON]));
  firstMap.set(EOF, symbolSet<GrammarSymbol>([EOF]));
  for (const nonTerminal of grammar.getNonTerminals()) {
    firstMap.set(nonTerminal, symbolSet());
  }

  const getFirst = (k: NonTerminal) => {
    let set = firstMap.get(k);
    if (!set) {
      set = symbolSet();
      firstMap.set(k, set);
    }
    return set;
  };

  let passes = 0;
  let done = false;
  while (!done) {
    if (++passes > maxIterations) {
      throw new Error(
        `calcFirst did not converge after ${maxIterations} passes`
      );
    }
    done = true;
    for (const production of grammar.productionsIter()) {
      const rhs = firstOfString(production.symbols, firstMap);
      if (getFirst(production.rule).addAll(rhs)) {
        done = false;
      }
    }
  }
  log(`calcFirst: fixed point after ${passes} passes`);
  return firstMap;
}

/**
 * Calculate follow sets as described on page 106 of
 * Engineering a Compiler 2nd Edition
 *
 * @param grammar a grammar
 * @param firstMap the first sets calculated with {@link calcFirst}
 * @returns a mapping from non terminal symbols in the given grammar
 * to their follow sets
 */
export function calcFollow(
  grammar: Grammar,
  firstMap: FirstMap,
  { maxIterations = DEFAULT_MAX_ITERATIONS }: SolverOptions = {}
): FollowMap {
  const followMap: FollowMap = new HashMap<
    NonTerminal,
    SymbolSet<Lookahead>
  >(symbolKey);
  for (const nonTerminal of grammar.getNonTerminals()) {
    followMap.set(nonTerminal, symbolSet<Lookahead>());
  }
  const getFollow = (k: NonTerminal) => {
    let set = followMap.get(k);
    if (!set) {
      set = symbolSet<Lookahead>();
      followMap.set(k, set);
    }
    return set;
  };
  getFollow(grammar.start).add(EOF);

  let passes = 0;
  let done = false;
  while (!done) {
    if (++passes > maxIterations) {
      throw new Error(
        `calcFollow did not converge after ${maxIterations} passes`
      );
    }
    done = true;
    for (const production of grammar.productionsIter()) {
      const B = production.symbols;
      for (let i = 0; i < B.length; i++) {
        const Bi = B[i];
        if (!isNonTerminal(Bi)) {
          continue;
        }
        const firstBeta = firstOfString(B.slice(i + 1), firstMap);
        const followBi = getFollow(Bi);
        if (followBi.addAll([...firstBeta].filter(isLookahead))) {
          done = false;
        }
        if (
          firstBeta.has(EPSILON) &&
          followBi.addAll([...getFollow(production.rule)])
        ) {
          done = false;
        }
      }
    }
  }
  log(`calcFollow: fixed point after ${passes} passes`);
  return followMap;
}

export function followOf(
  nonTerminal: NonTerminal,
  follow: FollowMap
): ConstSet<Lookahead> {
  return follow.get(nonTerminal) ?? symbolSet<Lookahead>();
}

export function formatSymbolSet(set: Iterable<GrammarSymbol>): string {
  const symbols = sortSymbols(set).map(symbolToString);
  return `{ ${symbols.join(' ')} }`;
}

/**
 * Render FIRST and FOLLOW of every nonterminal, one per line.
 */
export function firstFollowToDebugStr(
  grammar: Grammar,
  first: FirstMap,
  follow: FollowMap
): string {
  const nonTerminals = sortSymbols(grammar.getNonTerminals());
  const lines = ['FIRST sets:'];
  for (const nt of nonTerminals) {
    lines.push(`FIRST(${nt.char}) = ${formatSymbolSet(firstOf(nt, first))}`);
  }
  lines.push('FOLLOW sets:');
  for (const nt of nonTerminals) {
    lines.push(
      `FOLLOW(${nt.char}) = ${formatSymbolSet(followOf(nt, follow))}`
    );
  }
  return lines.join('\n');
}
