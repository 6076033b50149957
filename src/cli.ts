#!/usr/bin/env node

/**
 * linetint - CLI entry
 *
 * Colors regular expression matches in stdin or files and writes the result
 * to stdout, e.g. `tail -f app.log | linetint -r 9=ERROR -r 11=WARN`.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import type { Color } from './core/types.js';
import { ColorSpecError, formatColor, parseColorSpec } from './config/ColorSpec.js';
import { createHighlighter, resolveHighlightConfig } from './config/ConfigResolver.js';
import { loadRuleFile } from './config/RuleFile.js';
import { formatStressResult, runStressTest, DEFAULT_STRESS_ITERATIONS } from './demo/stressTest.js';
import { renderRainbow } from './demo/rainbow.js';
import type { PatternRule } from './models/HighlightConfig.js';
import { ConsoleLogger } from './outputs/ConsoleLogger.js';
import { highlightInputs, type HighlightStreams } from './stream/highlightInputs.js';
import { VERSION } from './version.js';

const __filename = fileURLToPath(import.meta.url);

interface CliOptions {
  pattern?: string;
  rule?: string;
  defaultColor?: Color;
  ignoreCase?: boolean;
  nest?: boolean;
  rules?: string;
  rainbow?: boolean;
  stress?: number | true;
  debug?: boolean;
}

function parseColorOption(value: string): Color {
  try {
    return parseColorSpec(value);
  } catch (err) {
    if (err instanceof ColorSpecError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

/**
 * `<color>=<regex>`, split at the first '=' (color specs never contain one).
 */
export function parseRuleOption(value: string): PatternRule {
  const separator = value.indexOf('=');
  if (separator === -1) {
    throw new InvalidArgumentError('Expected <color>=<regex>, e.g. 9=ERROR or 15:1=FATAL');
  }
  const pattern = value.slice(separator + 1);
  if (pattern === '') {
    throw new InvalidArgumentError('Pattern after "=" must not be empty');
  }
  return { pattern, color: parseColorOption(value.slice(0, separator)) };
}

function parseIterations(value: string): number {
  const iterations = Number(value);
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new InvalidArgumentError('Iterations must be a positive integer');
  }
  return iterations;
}

function defaultStreams(): HighlightStreams {
  return { stdin: process.stdin, stdout: process.stdout };
}

/**
 * Build a fresh program per run so repeated -p/-r values never leak between runs.
 */
export function createProgram(streams: HighlightStreams): Command {
  // -p and -r share one list so registration order follows the command line
  const rules: PatternRule[] = [];
  const program = new Command();

  program
    .name('linetint')
    .description('Highlight regular expression matches with ANSI 256-color codes')
    .version(VERSION)
    .argument('[files...]', 'files to highlight ("-" or none reads stdin)')
    .option('-p, --pattern <regex>', 'highlight matches in the default color (repeatable)', (value: string) => {
      rules.push({ pattern: value });
      return value;
    })
    .option('-r, --rule <color=regex>', 'highlight matches in <color>, e.g. 9=ERROR or 15:1=FATAL (repeatable)', (value: string) => {
      rules.push(parseRuleOption(value));
      return value;
    })
    .option('-c, --default-color <color>', 'default color as <fg>, <fg>:<bg> or :<bg>', parseColorOption)
    .option('-i, --ignore-case', 'match patterns case-insensitively')
    .option('-n, --nest', 'restore the enclosing color after an inner match ends')
    .option('--rules <file>', 'load pattern rules from a JSON file')
    .option('--rainbow', 'print the 256-color palette and exit')
    .option('--stress [iterations]', `benchmark color code lookups (default: ${DEFAULT_STRESS_ITERATIONS} iterations)`, parseIterations)
    .option('--debug', 'log diagnostics to stderr')
    .configureOutput({
      writeOut: (str) => {
        streams.stdout.write(str);
      },
    })
    .exitOverride()
    .action(async (files: string[], options: CliOptions) => {
      const logger = new ConsoleLogger({
        colors: process.stderr.isTTY === true,
        debug: options.debug ?? false,
        prefix: '[linetint]',
      });

      if (options.rainbow) {
        streams.stdout.write(renderRainbow().join('\n') + '\n');
        return;
      }

      if (options.stress !== undefined) {
        const iterations = options.stress === true ? DEFAULT_STRESS_ITERATIONS : options.stress;
        streams.stdout.write(formatStressResult(runStressTest(iterations)) + '\n');
        return;
      }

      const ruleFile = options.rules ? loadRuleFile(options.rules) : undefined;
      const config = resolveHighlightConfig(
        {
          defaultColor: options.defaultColor,
          ignoreCase: options.ignoreCase,
          restoreOuterColor: options.nest,
          debug: options.debug,
          rules,
        },
        ruleFile
      );

      logger.debug('Resolved configuration', {
        defaultColor: formatColor(config.defaultColor),
        rules: config.rules.length,
        ignoreCase: config.ignoreCase,
        restoreOuterColor: config.restoreOuterColor,
      });
      if (config.rules.length === 0) {
        logger.warn('No patterns given; input passes through unchanged');
      }

      const highlighter = createHighlighter(config, logger);
      await highlightInputs(highlighter, files, streams, logger);
    });

  return program;
}

export async function run(argv: string[], streams: HighlightStreams = defaultStreams()): Promise<void> {
  const program = createProgram(streams);
  try {
    await program.parseAsync(argv);
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exitCode = 0;
        return;
      }
      // commander has already printed the usage error
      process.exitCode = err.exitCode ?? 1;
      return;
    }
    const logger = new ConsoleLogger({ colors: process.stderr.isTTY === true });
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

const invokedAsEntry = (() => {
  const argvPath = process.argv[1];
  if (!argvPath) return false;
  try {
    return fs.realpathSync(argvPath) === fs.realpathSync(__filename);
  } catch {
    return false;
  }
})();

if (invokedAsEntry) {
  void run(process.argv);
}
