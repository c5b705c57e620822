import { type IHaveDebugStr, log } from '../utils/debug.js';
import { HashMap, HashSet } from '../utils/sets.js';
import { type Grammar, Production } from './grammar.js';
import {
  type GrammarSymbol,
  isNonTerminal,
  nonTerminal,
  type NonTerminal,
  symbolKey,
  symbolsEqual,
  symbolToString,
} from './symbols.js';

/**
 * The synthetic start symbol of the augmented grammar. Grammar symbols are
 * single characters, so it can never collide with one.
 */
export const AUGMENTED_START: NonTerminal = nonTerminal("S'");

export function augmentedStart(grammar: Grammar): Production {
  return new Production(AUGMENTED_START, [grammar.start]);
}

/**
 * A production with a dot marking how much of its body has been
 * recognized.
 */
export class LR0Item {
  readonly production: Production;
  readonly dot: number;

  constructor(production: Production, dot: number = 0) {
    this.production = production;
    this.dot = dot;
  }

  /**
   * The symbol right after the dot, if any
   */
  get next(): GrammarSymbol | undefined {
    return this.production.body[this.dot];
  }

  get isComplete(): boolean {
    return this.dot >= this.production.body.length;
  }

  advance(): LR0Item {
    return new LR0Item(this.production, this.dot + 1);
  }

  key(): string {
    return `${this.production.index}.${this.dot}`;
  }

  equals(other: LR0Item): boolean {
    return this.key() === other.key();
  }

  toString(): string {
    const body = this.production.body.map(symbolToString);
    body.splice(this.dot, 0, '•');
    return `${this.production.rule.char} -> ${body.join('')}`;
  }
}

const itemKey = (item: LR0Item) => item.key();

/**
 * A set of LR(0) items: one state of the automaton once it is closed.
 */
export class ItemSet implements IHaveDebugStr {
  private items: HashSet<LR0Item>;

  constructor(items: Iterable<LR0Item> = []) {
    this.items = new HashSet(itemKey, items);
  }

  get size() {
    return this.items.size;
  }

  has(item: LR0Item) {
    return this.items.has(item);
  }

  [Symbol.iterator]() {
    return this.items.values();
  }

  /**
   * Structural equality: the same items, in whatever order.
   */
  equals(other: ItemSet): boolean {
    return this.items.equals(other.items);
  }

  /**
   * Canonical key of the set: the sorted item keys. Item keys are distinct
   * for distinct items, so two sets share a key iff they are equal.
   */
  key(): string {
    return this.items.hash();
  }

  /**
   * Symbols that appear right after a dot, in order of first appearance.
   */
  nextSymbols(): GrammarSymbol[] {
    const seen = new HashSet(symbolKey);
    const symbols: GrammarSymbol[] = [];
    for (const item of this) {
      const next = item.next;
      if (next && !seen.has(next)) {
        seen.add(next);
        symbols.push(next);
      }
    }
    return symbols;
  }

  toDebugStr(): string {
    return [...this]
      .map((item) => item.toString())
      .sort()
      .join('\n');
  }
}

/**
 * Extend `items` with [B -> •γ] for every item [A -> α•Bβ] until nothing
 * more can be added.
 */
export function closure(grammar: Grammar, items: Iterable<LR0Item>): ItemSet {
  const result = new HashSet(itemKey, items);
  const worklist = [...result];
  while (worklist.length > 0) {
    const item = worklist.shift();
    const B = item?.next;
    if (!B || !isNonTerminal(B)) {
      continue;
    }
    for (const production of grammar.productionsFrom(B)) {
      const newItem = new LR0Item(production, 0);
      if (!result.has(newItem)) {
        result.add(newItem);
        worklist.push(newItem);
      }
    }
  }
  return new ItemSet(result);
}

/**
 * The closure of every item of `state` that can advance over `X`. Empty
 * when no item has `X` after its dot.
 */
export function goto(
  grammar: Grammar,
  state: ItemSet,
  X: GrammarSymbol
): ItemSet {
  const moved: LR0Item[] = [];
  for (const item of state) {
    const next = item.next;
    if (next && symbolsEqual(next, X)) {
      moved.push(item.advance());
    }
  }
  return closure(grammar, moved);
}

/**
 * The canonical collection of LR(0) item sets together with the
 * transitions between them.
 */
export class LR0Automaton implements IHaveDebugStr {
  readonly grammar: Grammar;
  readonly start: Production;
  readonly states: readonly ItemSet[];
  private transitions: readonly HashMap<GrammarSymbol, number>[];

  private constructor(
    grammar: Grammar,
    start: Production,
    states: ItemSet[],
    transitions: HashMap<GrammarSymbol, number>[]
  ) {
    this.grammar = grammar;
    this.start = start;
    this.states = Object.freeze(states);
    this.transitions = Object.freeze(transitions);
  }

  static build(grammar: Grammar): LR0Automaton {
    const start = augmentedStart(grammar);
    const initial = closure(grammar, [new LR0Item(start, 0)]);
    const states: ItemSet[] = [initial];
    const transitions: HashMap<GrammarSymbol, number>[] = [
      new HashMap(symbolKey),
    ];
    const stateIds = new Map<string, number>([[initial.key(), 0]]);

    // states are appended while we walk them, so this is the worklist
    for (let i = 0; i < states.length; i++) {
      const state = states[i];
      for (const X of state.nextSymbols()) {
        const target = goto(grammar, state, X);
        if (target.size === 0) {
          continue;
        }
        let targetId = stateIds.get(target.key());
        if (targetId === undefined) {
          targetId = states.length;
          states.push(target);
          transitions.push(new HashMap(symbolKey));
          stateIds.set(target.key(), targetId);
        }
        transitions[i].set(X, targetId);
      }
    }
    log(`LR0Automaton: ${states.length} states`);
    return new LR0Automaton(grammar, start, states, transitions);
  }

  get size() {
    return this.states.length;
  }

  transition(state: number, symbol: GrammarSymbol): number | undefined {
    return this.transitions[state]?.get(symbol);
  }

  transitionsFrom(state: number): [GrammarSymbol, number][] {
    const outgoing = this.transitions[state];
    return outgoing ? [...outgoing.entries()] : [];
  }

  isAugmentedStart(production: Production): boolean {
    return production === this.start;
  }

  /**
   * Items of a state that did not come from closure: the ones with
   * the dot moved past the start, and [S' -> •S].
   */
  kernel(state: number): LR0Item[] {
    return [...this.states[state]].filter(
      (item) => item.dot > 0 || this.isAugmentedStart(item.production)
    );
  }

  toDebugStr(): string {
    const out: string[] = [];
    for (const [i, state] of this.states.entries()) {
      out.push(`State ${i}:`);
      for (const line of state.toDebugStr().split('\n')) {
        out.push(`  ${line}`);
      }
      for (const [symbol, target] of this.transitionsFrom(i)) {
        out.push(`  ${symbolToString(symbol)} => ${target}`);
      }
    }
    return out.join('\n');
  }
}
