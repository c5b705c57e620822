#!/usr/bin/env node
import fs from 'fs';
import type { Argv } from 'yargs';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import { analyzeGrammar } from '../grammar/analyze.js';
import { firstFollowToDebugStr } from '../grammar/first-follow.js';
import { parseGrammarInput } from '../grammar/grammar.js';
import { colors, log, useColors } from '../utils/debug.js';
import { runSession, type ParserChoice } from './session.js';

/**
 * Read the whole input, from a file or from stdin when no file is given.
 */
function readLines(file: string | undefined): string[] {
  const text = fs.readFileSync(file ?? process.stdin.fd, { encoding: 'utf-8' });
  const lines = text.split(/\r?\n/);
  // a trailing newline does not start another line
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function builder<T>(yargs: Argv<T>) {
  return yargs
    .positional('file', {
      describe: 'grammar input file; stdin when omitted',
      type: 'string',
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      description: 'Print FIRST/FOLLOW sets and parsing tables',
      default: false,
    })
    .option('color', {
      type: 'boolean',
      description: 'Color the output',
      default: false,
    });
}

const parser = yargs(hideBin(process.argv))
  .scriptName('grammar-tables')
  .command({
    command: 'run [file]',
    describe: 'classify a grammar and parse the strings that follow it',
    aliases: ['$0'],
    builder: (y) =>
      builder(y).option('parser', {
        alias: 'p',
        choices: ['ll1', 'slr1'] as const,
        description: 'parse with this parser instead of asking',
      }),
    handler: (args) => {
      useColors(args.color);
      const parserChoice: ParserChoice | undefined = args.parser;
      const result = runSession(readLines(args.file), {
        verbose: args.verbose,
        parser: parserChoice,
      });
      for (const line of result.stdout) {
        console.log(line);
      }
      for (const line of result.stderr) {
        console.error(line);
      }
      process.exitCode = result.exitCode;
    },
  })
  .command({
    command: 'analyze [file]',
    describe: 'print FIRST/FOLLOW sets and both parsing tables',
    builder,
    handler: (args) => {
      useColors(args.color);
      const input = parseGrammarInput(readLines(args.file));
      if (input.isErr()) {
        console.error(colors.red(`Error: ${input.error.message}`));
        process.exitCode = 1;
        return;
      }
      const analysis = analyzeGrammar(input.value.grammar);
      log(`analyze: grammar is ${analysis.kind}`);
      console.log(
        firstFollowToDebugStr(analysis.grammar, analysis.first, analysis.follow)
      );
      const { ll1, slr1 } = analysis;
      console.log(colors.bold('--- LL(1) ---'));
      console.log(
        ll1.isOk() ? ll1.value.toDebugStr() : colors.red(ll1.error.message)
      );
      console.log(colors.bold('--- SLR(1) ---'));
      if (slr1.isOk()) {
        console.log(slr1.value.automaton.toDebugStr());
        console.log(slr1.value.toDebugStr());
      } else {
        console.log(colors.red(slr1.error.message));
      }
    },
  })
  .strict();

parser.parseSync();
