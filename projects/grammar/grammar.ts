import { err, ok, Result } from 'neverthrow';
import { OrderedMap } from '../utils/data-structures/OrderedMap.js';
import { FormatError } from './errors.js';
import {
  classify,
  classifyString,
  EPSILON,
  type GrammarSymbol,
  isNonTerminal,
  isTerminal,
  nonTerminal,
  type NonTerminal,
  type Terminal,
  symbolKey,
  symbolToString,
} from './symbols.js';

export const START: NonTerminal = nonTerminal('S');
export const PRODUCTION_SEPARATOR = '->';

export class Production {
  /**
   * The left hand symbol. So for the production:
   *   E -> TX
   * the `rule` would be `E`
   */
  readonly rule: NonTerminal;

  /**
   * The right hand side as written. An empty right hand side is
   * written as the single symbol epsilon.
   */
  readonly symbols: readonly GrammarSymbol[];

  /**
   * Position of this production in its grammar, or -1 for
   * productions that belong to no grammar (the augmented start).
   */
  readonly index: number;

  constructor(rule: NonTerminal, symbols: GrammarSymbol[], index: number = -1) {
    if (symbols.length === 0) {
      symbols = [EPSILON];
    }
    this.rule = rule;
    this.symbols = Object.freeze(symbols);
    this.index = index;
  }

  get isEpsilon(): boolean {
    return this.symbols.length === 1 && this.symbols[0].kind === 'epsilon';
  }

  /**
   * The symbols this production actually derives: empty for an
   * epsilon production.
   */
  get body(): readonly GrammarSymbol[] {
    return this.isEpsilon ? [] : this.symbols;
  }

  equals(other: Production): boolean {
    if (this.rule.char !== other.rule.char) {
      return false;
    }
    if (this.symbols.length != other.symbols.length) {
      return false;
    }
    for (let i = 0; i < this.symbols.length; i++) {
      if (symbolKey(this.symbols[i]) !== symbolKey(other.symbols[i])) {
        return false;
      }
    }
    return true;
  }

  toString(): string {
    return `${this.rule.char} -> ${this.symbols.map(symbolToString).join('')}`;
  }
}

/**
 * Shorthand for grammars in code: each nonterminal maps to its
 * alternatives, written in the same notation as a production line.
 *
 *   buildGrammar({ S: ['aS', 'b'] })
 */
export type GrammarSpec = { [nonTerminal: string]: string[] };

export class Grammar {
  readonly productions: readonly Production[];
  readonly start: NonTerminal = START;
  private byRule: OrderedMap<string, Production[]> = new OrderedMap();
  private terminals: Terminal[] = [];

  constructor(rules: Iterable<[NonTerminal, GrammarSymbol[]]>) {
    const productions: Production[] = [];
    const seenTerminals = new Set<string>();
    for (const [rule, symbols] of rules) {
      const production = new Production(rule, symbols, productions.length);
      productions.push(production);
      const existing = this.byRule.get(rule.char);
      if (existing) {
        existing.push(production);
      } else {
        this.byRule.push(rule.char, [production]);
      }
      for (const s of production.symbols) {
        if (isTerminal(s) && !seenTerminals.has(s.char)) {
          seenTerminals.add(s.char);
          this.terminals.push(s);
        }
      }
    }
    this.productions = Object.freeze(productions);
  }

  /**
   * Parse production lines of the form `A -> alt1 alt2 ...`. Each
   * whitespace separated alternative becomes its own production.
   *
   * @param declaredCount number of lines the caller announced, checked
   * against the lines actually supplied
   */
  static fromLines(
    lines: readonly string[],
    declaredCount?: number
  ): Result<Grammar, FormatError> {
    if (declaredCount !== undefined && declaredCount !== lines.length) {
      return err(
        new FormatError(
          `Expected ${declaredCount} production lines, got ${lines.length}`
        )
      );
    }
    const rules: [NonTerminal, GrammarSymbol[]][] = [];
    for (const line of lines) {
      const parsed = parseProductionLine(line);
      if (parsed.isErr()) {
        return err(parsed.error);
      }
      rules.push(...parsed.value);
    }
    if (rules.length === 0) {
      return err(new FormatError('Grammar has no productions'));
    }
    if (!rules.some(([rule]) => rule.char === START.char)) {
      return err(
        new FormatError(`Start symbol ${START.char} has no productions`)
      );
    }
    return ok(new Grammar(rules));
  }

  static fromLinesOrThrow(lines: readonly string[], declaredCount?: number) {
    const result = Grammar.fromLines(lines, declaredCount);
    if (result.isOk()) {
      return result.value;
    }
    throw result.error;
  }

  *productionsIter() {
    yield* this.productions;
  }

  productionsFrom(rule: GrammarSymbol): readonly Production[] {
    if (!isNonTerminal(rule)) {
      return [];
    }
    return this.byRule.get(rule.char) ?? [];
  }

  getNonTerminals(): readonly NonTerminal[] {
    return this.byRule.keys().map((char) => nonTerminal(char));
  }

  getTerminals(): readonly Terminal[] {
    return this.terminals;
  }

  toString() {
    let out = '';
    for (const productions of this.byRule.values()) {
      out += `${productions[0].rule.char} →\n`;
      for (const production of productions) {
        out += '  | ';
        out += production.symbols.map(symbolToString).join('');
        out += '\n';
      }
    }
    return out;
  }
}

export function buildGrammar(spec: GrammarSpec): Grammar {
  return Grammar.fromLinesOrThrow(
    Object.entries(spec).map(
      ([rule, alternatives]) =>
        `${rule} ${PRODUCTION_SEPARATOR} ${alternatives.join(' ')}`
    )
  );
}

function parseAlternative(alternative: string): GrammarSymbol[] {
  // epsilon only means something on its own
  const symbols = classifyString(alternative).filter(
    (s) => s.kind !== 'epsilon'
  );
  return symbols.length === 0 ? [EPSILON] : symbols;
}

export function parseProductionLine(
  line: string
): Result<[NonTerminal, GrammarSymbol[]][], FormatError> {
  const separatorAt = line.indexOf(PRODUCTION_SEPARATOR);
  if (separatorAt === -1) {
    return err(new FormatError('Invalid production format', line));
  }
  const lhs = line.slice(0, separatorAt).trim();
  const rhs = line.slice(separatorAt + PRODUCTION_SEPARATOR.length).trim();
  if (lhs.length !== 1) {
    return err(
      new FormatError('Left-hand side must be a single character', line)
    );
  }
  const rule = classify(lhs);
  if (!isNonTerminal(rule)) {
    return err(
      new FormatError('Left-hand side must be an uppercase letter', line)
    );
  }
  const alternatives = rhs.split(/\s+/).filter((alt) => alt.length > 0);
  if (alternatives.length === 0) {
    return err(new FormatError('Production has no alternatives', line));
  }
  return ok(
    alternatives.map((alt): [NonTerminal, GrammarSymbol[]] => [
      rule,
      parseAlternative(alt),
    ])
  );
}

export type GrammarInput = {
  grammar: Grammar;
  /**
   * Lines that follow the productions.
   */
  rest: string[];
};

/**
 * Parse the line-based input format: a line with the number of production
 * lines `n`, then the `n` production lines. Whatever follows is returned
 * untouched as `rest`.
 */
export function parseGrammarInput(
  lines: readonly string[]
): Result<GrammarInput, FormatError> {
  if (lines.length === 0) {
    return err(new FormatError('Empty grammar input'));
  }
  const countLine = lines[0].trim();
  if (!/^\d+$/.test(countLine)) {
    return err(new FormatError('Invalid production count', countLine));
  }
  const count = parseInt(countLine, 10);
  const supplied = Math.min(count, lines.length - 1);
  return Grammar.fromLines(lines.slice(1, 1 + supplied), count).map(
    (grammar) => ({ grammar, rest: lines.slice(1 + count) })
  );
}
