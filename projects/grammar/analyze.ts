import type { Result } from 'neverthrow';
import type { NotLL1Error, NotSLR1Error } from './errors.js';
import {
  calcFirst,
  calcFollow,
  type FirstMap,
  type FollowMap,
  type SolverOptions,
} from './first-follow.js';
import type { Grammar } from './grammar.js';
import { LL1Table } from './LL1-parser.js';
import { SLR1Tables } from './SLR1-parser.js';

export type GrammarClass = 'both' | 'll1' | 'slr1' | 'neither';

export type GrammarAnalysis = {
  grammar: Grammar;
  first: FirstMap;
  follow: FollowMap;
  ll1: Result<LL1Table, NotLL1Error>;
  slr1: Result<SLR1Tables, NotSLR1Error>;
  kind: GrammarClass;
};

export function classifyGrammar(
  ll1: Result<unknown, unknown>,
  slr1: Result<unknown, unknown>
): GrammarClass {
  if (ll1.isOk()) {
    return slr1.isOk() ? 'both' : 'll1';
  }
  return slr1.isOk() ? 'slr1' : 'neither';
}

/**
 * Compute FIRST and FOLLOW once and try both table constructions
 * against them.
 */
export function analyzeGrammar(
  grammar: Grammar,
  options: SolverOptions = {}
): GrammarAnalysis {
  const first = calcFirst(grammar, options);
  const follow = calcFollow(grammar, first, options);
  const ll1 = LL1Table.build(grammar, first, follow);
  const slr1 = SLR1Tables.build(grammar, follow);
  return {
    grammar,
    first,
    follow,
    ll1,
    slr1,
    kind: classifyGrammar(ll1, slr1),
  };
}
