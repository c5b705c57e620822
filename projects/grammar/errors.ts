import type { Production } from './grammar.js';
import { type Lookahead, type NonTerminal, symbolToString } from './symbols.js';
import type { Action } from './SLR1-parser.js';

/**
 * Malformed grammar text. No grammar is produced.
 */
export class FormatError extends Error {
  readonly line?: string;
  constructor(message: string, line?: string) {
    super(line === undefined ? message : `${message}: ${line}`);
    this.name = 'FormatError';
    this.line = line;
  }
}

/**
 * Two productions compete for the same cell of the predictive table.
 */
export class NotLL1Error extends Error {
  readonly nonTerminal: NonTerminal;
  readonly lookahead: Lookahead;
  readonly existing: Production;
  readonly conflicting: Production;

  constructor(
    nonTerminal: NonTerminal,
    lookahead: Lookahead,
    existing: Production,
    conflicting: Production
  ) {
    super(
      `Conflict at M[${symbolToString(nonTerminal)}, ${symbolToString(
        lookahead
      )}]: ${existing.toString()} and ${conflicting.toString()}`
    );
    this.name = 'NotLL1Error';
    this.nonTerminal = nonTerminal;
    this.lookahead = lookahead;
    this.existing = existing;
    this.conflicting = conflicting;
  }
}

export type ConflictKind = 'shift/shift' | 'shift/reduce' | 'reduce/reduce';

/**
 * Two actions compete for the same cell of the ACTION table.
 */
export class NotSLR1Error extends Error {
  readonly state: number;
  readonly lookahead: Lookahead;
  readonly conflict: ConflictKind;
  readonly existing: Action;
  readonly incoming: Action;

  constructor(
    state: number,
    lookahead: Lookahead,
    conflict: ConflictKind,
    existing: Action,
    incoming: Action
  ) {
    super(
      `${conflict} conflict at state ${state}, symbol ${symbolToString(
        lookahead
      )}`
    );
    this.name = 'NotSLR1Error';
    this.state = state;
    this.lookahead = lookahead;
    this.conflict = conflict;
    this.existing = existing;
    this.incoming = incoming;
  }
}
