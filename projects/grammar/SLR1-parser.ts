import { err, ok, Result } from 'neverthrow';
import { type IHaveDebugStr, log } from '../utils/debug.js';
import { HashMap } from '../utils/sets.js';
import { type ConflictKind, NotSLR1Error } from './errors.js';
import { followOf, type FollowMap } from './first-follow.js';
import type { Grammar, Production } from './grammar.js';
import { LR0Automaton } from './LR0-automaton.js';
import {
  EOF,
  type GrammarSymbol,
  inputSymbols,
  isLookahead,
  isNonTerminal,
  type Lookahead,
  type NonTerminal,
  sortSymbols,
  symbolKey,
  symbolToString,
} from './symbols.js';

export type Action =
  | { kind: 'shift'; state: number }
  | { kind: 'reduce'; production: Production }
  | { kind: 'accept' };

export function actionsEqual(a: Action, b: Action): boolean {
  switch (a.kind) {
    case 'shift':
      return b.kind === 'shift' && a.state === b.state;
    case 'reduce':
      return b.kind === 'reduce' && a.production.equals(b.production);
    case 'accept':
      return b.kind === 'accept';
  }
}

export function actionToString(action: Action): string {
  switch (action.kind) {
    case 'shift':
      return `shift ${action.state}`;
    case 'reduce':
      return `reduce ${action.production.toString()}`;
    case 'accept':
      return 'accept';
  }
}

function conflictKind(existing: Action, incoming: Action): ConflictKind {
  if (existing.kind === 'shift' && incoming.kind === 'shift') {
    return 'shift/shift';
  }
  if (existing.kind === 'shift' || incoming.kind === 'shift') {
    return 'shift/reduce';
  }
  // accept is the reduction of the augmented start production
  return 'reduce/reduce';
}

export type SLR1Step = {
  states: number[];
  symbols: GrammarSymbol[];
  position: number;
  lookahead: Lookahead;
  action: Action | { kind: 'reject'; reason: string };
};

type ActionRow = HashMap<Lookahead, Action>;
type GotoRow = HashMap<NonTerminal, number>;

/**
 * ACTION and GOTO tables of an SLR(1) parser, built over the LR(0)
 * automaton of a grammar.
 */
export class SLR1Tables implements IHaveDebugStr {
  readonly automaton: LR0Automaton;
  private actions: readonly ActionRow[];
  private gotos: readonly GotoRow[];

  private constructor(
    automaton: LR0Automaton,
    actions: ActionRow[],
    gotos: GotoRow[]
  ) {
    this.automaton = automaton;
    this.actions = Object.freeze(actions);
    this.gotos = Object.freeze(gotos);
  }

  get grammar(): Grammar {
    return this.automaton.grammar;
  }

  /**
   * Fill in the tables state by state. Within a state every shift is
   * written first, then accept, then the reductions, so which conflict gets
   * reported never depends on the order of items in the state.
   */
  static build(
    grammar: Grammar,
    follow: FollowMap
  ): Result<SLR1Tables, NotSLR1Error> {
    const automaton = LR0Automaton.build(grammar);
    const actions: ActionRow[] = [];
    const gotos: GotoRow[] = [];

    for (const [i, state] of automaton.states.entries()) {
      const row: ActionRow = new HashMap<Lookahead, Action>(symbolKey);
      const gotoRow: GotoRow = new HashMap<NonTerminal, number>(symbolKey);
      actions.push(row);
      gotos.push(gotoRow);

      const write = (w: Lookahead, incoming: Action) => {
        const existing = row.get(w);
        if (!existing) {
          row.set(w, incoming);
          return undefined;
        }
        if (actionsEqual(existing, incoming)) {
          return undefined;
        }
        return new NotSLR1Error(
          i,
          w,
          conflictKind(existing, incoming),
          existing,
          incoming
        );
      };

      const complete: Production[] = [];
      for (const item of state) {
        const X = item.next;
        if (X === undefined) {
          complete.push(item.production);
          continue;
        }
        const target = automaton.transition(i, X);
        if (target === undefined) {
          throw new Error(
            `LR(0) automaton has no transition from ${i} on ${symbolToString(
              X
            )}`
          );
        }
        if (isNonTerminal(X)) {
          gotoRow.set(X, target);
        } else if (isLookahead(X)) {
          const conflict = write(X, { kind: 'shift', state: target });
          if (conflict) {
            return fail(conflict);
          }
        }
      }

      const accepting = complete.filter((p) => automaton.isAugmentedStart(p));
      const reducing = complete.filter((p) => !automaton.isAugmentedStart(p));
      if (accepting.length > 0) {
        const conflict = write(EOF, { kind: 'accept' });
        if (conflict) {
          return fail(conflict);
        }
      }
      for (const production of reducing) {
        for (const w of followOf(production.rule, follow)) {
          const conflict = write(w, { kind: 'reduce', production });
          if (conflict) {
            return fail(conflict);
          }
        }
      }
    }
    return ok(new SLR1Tables(automaton, actions, gotos));
  }

  static buildOrThrow(grammar: Grammar, follow: FollowMap) {
    const result = SLR1Tables.build(grammar, follow);
    if (result.isOk()) {
      return result.value;
    }
    throw result.error;
  }

  get numStates() {
    return this.actions.length;
  }

  action(state: number, lookahead: Lookahead): Action | undefined {
    return this.actions[state]?.get(lookahead);
  }

  goto(state: number, nonTerminal: NonTerminal): number | undefined {
    return this.gotos[state]?.get(nonTerminal);
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
   * The shift-reduce skeleton parser, yielding every step. Returns whether
   * the input was accepted.
   */
  *parseGen(input: string): Generator<SLR1Step, boolean> {
    const words: Lookahead[] = [...inputSymbols(input), EOF];
    const states: number[] = [0];
    const symbols: GrammarSymbol[] = [];
    let position = 0;

    const step = (action: SLR1Step['action']): SLR1Step => ({
      states: [...states],
      symbols: [...symbols],
      position,
      lookahead: words[position] ?? EOF,
      action,
    });

    while (true) {
      if (position >= words.length) {
        yield step({ kind: 'reject', reason: 'input exhausted' });
        return false;
      }
      const word = words[position];
      const action = this.action(states[states.length - 1], word);
      if (!action) {
        yield step({
          kind: 'reject',
          reason: `No action on ${symbolToString(word)}`,
        });
        return false;
      }
      yield step(action);
      switch (action.kind) {
        case 'accept':
          return true;
        case 'shift':
          symbols.push(word);
          states.push(action.state);
          position++;
          break;
        case 'reduce': {
          const { rule, body } = action.production;
          if (states.length <= body.length) {
            yield step({ kind: 'reject', reason: 'stack underflow' });
            return false;
          }
          states.splice(states.length - body.length);
          symbols.splice(symbols.length - body.length);
          symbols.push(rule);
          const next = this.goto(states[states.length - 1], rule);
          if (next === undefined) {
            yield step({
              kind: 'reject',
              reason: `No goto on ${rule.char}`,
            });
            return false;
          }
          states.push(next);
          break;
        }
      }
    }
  }

  toDebugStr(): string {
    const lines = ['ACTION:'];
    for (const [i, row] of this.actions.entries()) {
      for (const w of sortSymbols(row.keys())) {
        const action = row.get(w);
        if (action) {
          lines.push(
            `[${i}, ${symbolToString(w)}] = ${actionToString(action)}`
          );
        }
      }
    }
    lines.push('GOTO:');
    for (const [i, row] of this.gotos.entries()) {
      for (const A of sortSymbols(row.keys())) {
        lines.push(`[${i}, ${A.char}] = ${row.get(A)}`);
      }
    }
    return lines.join('\n');
  }
}

function fail(conflict: NotSLR1Error) {
  log(`buildSLR1Tables: ${conflict.message}`);
  return err(conflict);
}
