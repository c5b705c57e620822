export * from './grammar/symbols.js';
export * from './grammar/grammar.js';
export * from './grammar/first-follow.js';
export * from './grammar/errors.js';
export * from './grammar/LL1-parser.js';
export * from './grammar/LR0-automaton.js';
export * from './grammar/SLR1-parser.js';
export * from './grammar/analyze.js';
export { runSession } from './cli/session.js';
export type { SessionOptions, SessionResult } from './cli/session.js';
