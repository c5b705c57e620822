import { HashSet } from '../utils/sets.js';

export type Terminal = { readonly kind: 'terminal'; readonly char: string };
export type NonTerminal = {
  readonly kind: 'nonterminal';
  readonly char: string;
};
export type Epsilon = { readonly kind: 'epsilon' };
export type Eof = { readonly kind: 'eof' };

export type GrammarSymbol = Terminal | NonTerminal | Epsilon | Eof;

/**
 * Symbols that can appear as a lookahead: a column of the LL(1) table or of
 * the ACTION table.
 */
export type Lookahead = Terminal | Eof;

export const EPSILON: Epsilon = Object.freeze({ kind: 'epsilon' });
export const EOF: Eof = Object.freeze({ kind: 'eof' });

export const EPSILON_CHAR = 'e';
export const EOF_CHAR = '$';

export function terminal(char: string): Terminal {
  return { kind: 'terminal', char };
}

export function nonTerminal(char: string): NonTerminal {
  return { kind: 'nonterminal', char };
}

function isUpperCase(char: string) {
  return char >= 'A' && char <= 'Z';
}

/**
 * Map a single character of grammar notation to the symbol it denotes.
 *
 * Uppercase ASCII letters are nonterminals, `e` is the empty string, `$`
 * is the end marker and every other character is a terminal.
 */
export function classify(char: string): GrammarSymbol {
  if (char === EPSILON_CHAR) {
    return EPSILON;
  }
  if (char === EOF_CHAR) {
    return EOF;
  }
  if (isUpperCase(char)) {
    return nonTerminal(char);
  }
  return terminal(char);
}

export function classifyString(text: string): GrammarSymbol[] {
  return [...text].map(classify);
}

export function isTerminal(s: GrammarSymbol): s is Terminal {
  return s.kind === 'terminal';
}

export function isNonTerminal(s: GrammarSymbol): s is NonTerminal {
  return s.kind === 'nonterminal';
}

export function isLookahead(s: GrammarSymbol): s is Lookahead {
  return s.kind === 'terminal' || s.kind === 'eof';
}

/**
 * A string that identifies a symbol by variant and character. Two symbols
 * have the same key iff they are equal.
 */
export function symbolKey(s: GrammarSymbol): string {
  switch (s.kind) {
    case 'terminal':
      return `t:${s.char}`;
    case 'nonterminal':
      return `n:${s.char}`;
    case 'epsilon':
      return 'ϵ';
    case 'eof':
      return 'EOF';
  }
}

export function symbolsEqual(a: GrammarSymbol, b: GrammarSymbol): boolean {
  return symbolKey(a) === symbolKey(b);
}

function rank(s: GrammarSymbol): number {
  switch (s.kind) {
    case 'epsilon':
      return 0;
    case 'terminal':
      return 1;
    case 'nonterminal':
      return 2;
    case 'eof':
      return 3;
  }
}

function charOf(s: GrammarSymbol): string {
  switch (s.kind) {
    case 'terminal':
    case 'nonterminal':
      return s.char;
    case 'epsilon':
    case 'eof':
      return '';
  }
}

/**
 * Total order over symbols, for stable output only:
 * epsilon < terminals < nonterminals < end marker, then by character.
 */
export function compareSymbols(a: GrammarSymbol, b: GrammarSymbol): number {
  const byRank = rank(a) - rank(b);
  if (byRank !== 0) {
    return byRank;
  }
  const ca = charOf(a);
  const cb = charOf(b);
  return ca < cb ? -1 : ca > cb ? 1 : 0;
}

export type SymbolSet<S extends GrammarSymbol = GrammarSymbol> = HashSet<S>;

export function symbolSet<S extends GrammarSymbol>(
  items: Iterable<S> = []
): SymbolSet<S> {
  return new HashSet<S>(symbolKey, items);
}

export function symbolToString(s: GrammarSymbol): string {
  switch (s.kind) {
    case 'terminal':
    case 'nonterminal':
      return s.char;
    case 'epsilon':
      return 'ε';
    case 'eof':
      return EOF_CHAR;
  }
}

export function sortSymbols<S extends GrammarSymbol>(symbols: Iterable<S>): S[] {
  return [...symbols].sort(compareSymbols);
}

/**
 * Symbols of an input string to parse. Every character is read as a
 * terminal, whatever it would denote in grammar notation, so `e`, `$` and
 * uppercase letters never match anything a grammar produces.
 */
export function inputSymbols(input: string): Terminal[] {
  return [...input].map((char) => terminal(char));
}
