import { analyzeGrammar, type GrammarAnalysis } from '../grammar/analyze.js';
import { firstFollowToDebugStr } from '../grammar/first-follow.js';
import { parseGrammarInput } from '../grammar/grammar.js';
import type { LL1Table } from '../grammar/LL1-parser.js';
import type { SLR1Tables } from '../grammar/SLR1-parser.js';
import { colors } from '../utils/debug.js';

export type ParserChoice = 'll1' | 'slr1';

export type SessionOptions = {
  /**
   * Print FIRST/FOLLOW sets and the tables before parsing.
   */
  verbose?: boolean;
  /**
   * Use this parser directly instead of asking when both apply.
   */
  parser?: ParserChoice;
};

export type SessionResult = {
  stdout: string[];
  stderr: string[];
  exitCode: number;
};

export const MENU_PROMPT =
  'Select a parser (T: for LL(1), B: for SLR(1), Q: quit):';

/**
 * Walks over the input lines one at a time.
 */
class LineReader {
  private lines: readonly string[];
  private position = 0;
  constructor(lines: readonly string[]) {
    this.lines = lines;
  }
  next(): string | undefined {
    if (this.position >= this.lines.length) {
      return undefined;
    }
    return this.lines[this.position++];
  }
}

type Parser = LL1Table | SLR1Tables;

/**
 * Run a whole session over `lines`: the grammar in the counted line format,
 * then the strings to parse (or menu choices, when the grammar is both
 * LL(1) and SLR(1)). Every string gets a `yes` or `no` line; an empty line
 * ends a batch of strings.
 */
export function runSession(
  lines: readonly string[],
  options: SessionOptions = {}
): SessionResult {
  const stdout: string[] = [];
  const stderr: string[] = [];

  const input = parseGrammarInput(lines);
  if (input.isErr()) {
    stderr.push(`Error: ${input.error.message}`);
    return { stdout, stderr, exitCode: 1 };
  }
  const analysis = analyzeGrammar(input.value.grammar);
  const reader = new LineReader(input.value.rest);

  const header = (title: string) =>
    stdout.push(colors.bold(`--- ${title} ---`));

  const describe = (parser: Parser) => {
    if (!options.verbose) {
      return;
    }
    header('FIRST/FOLLOW');
    stdout.push(
      firstFollowToDebugStr(analysis.grammar, analysis.first, analysis.follow)
    );
    if ('automaton' in parser) {
      header('SLR(1) Automaton States');
      stdout.push(parser.automaton.toDebugStr());
      header('SLR(1) Tables');
    } else {
      header('LL(1) Parsing Table');
    }
    stdout.push(parser.toDebugStr());
  };

  const parseStrings = (parser: Parser) => {
    describe(parser);
    for (let line = reader.next(); line !== undefined; line = reader.next()) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        break;
      }
      stdout.push(
        parser.parse(trimmed) ? colors.green('yes') : colors.red('no')
      );
    }
  };

  if (options.parser) {
    const chosen = pick(analysis, options.parser);
    if (!chosen) {
      const name = options.parser === 'll1' ? 'LL(1)' : 'SLR(1)';
      stderr.push(`Error: Grammar is not ${name}.`);
      return { stdout, stderr, exitCode: 1 };
    }
    parseStrings(chosen);
    return { stdout, stderr, exitCode: 0 };
  }

  const { ll1, slr1 } = analysis;
  if (ll1.isOk() && slr1.isOk()) {
    while (true) {
      stdout.push(MENU_PROMPT);
      const choice = reader.next();
      if (choice === undefined) {
        break;
      }
      const key = choice.trim().toUpperCase();
      if (key === 'Q') {
        break;
      } else if (key === 'T') {
        parseStrings(ll1.value);
      } else if (key === 'B') {
        parseStrings(slr1.value);
      }
    }
  } else if (ll1.isOk()) {
    stdout.push('Grammar is LL(1).');
    parseStrings(ll1.value);
  } else if (slr1.isOk()) {
    stdout.push('Grammar is SLR(1).');
    parseStrings(slr1.value);
  } else {
    stdout.push('Grammar is neither LL(1) nor SLR(1).');
    if (options.verbose) {
      stdout.push(ll1.error.message, slr1.error.message);
    }
  }
  return { stdout, stderr, exitCode: 0 };
}

function pick(
  analysis: GrammarAnalysis,
  choice: ParserChoice
): Parser | undefined {
  if (choice === 'll1') {
    return analysis.ll1.isOk() ? analysis.ll1.value : undefined;
  }
  return analysis.slr1.isOk() ? analysis.slr1.value : undefined;
}
