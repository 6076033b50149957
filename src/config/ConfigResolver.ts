/**
 * ConfigResolver - merge command-line options and a rules file into a
 * HighlightConfig, then build the Highlighter it describes.
 */

import type { Color } from '../core/types.js';
import { Highlighter } from '../core/Highlighter.js';
import type { ILogger } from '../interfaces/ILogger.js';
import {
  DEFAULT_HIGHLIGHT_CONFIG,
  type HighlightConfig,
  type PatternRule,
} from '../models/HighlightConfig.js';
import type { RuleFile } from './RuleFile.js';

export interface CliConfigInput {
  defaultColor?: Color;
  ignoreCase?: boolean;
  restoreOuterColor?: boolean;
  debug?: boolean;
  /** -p / -r values in command-line order */
  rules: PatternRule[];
}

/**
 * Default color precedence: command line, then rules file, then built-in.
 * Rules file entries are registered before command-line patterns.
 */
export function resolveHighlightConfig(cli: CliConfigInput, ruleFile?: RuleFile): HighlightConfig {
  return {
    defaultColor: cli.defaultColor ?? ruleFile?.defaultColor ?? DEFAULT_HIGHLIGHT_CONFIG.defaultColor,
    ignoreCase: cli.ignoreCase ?? DEFAULT_HIGHLIGHT_CONFIG.ignoreCase,
    restoreOuterColor: cli.restoreOuterColor ?? DEFAULT_HIGHLIGHT_CONFIG.restoreOuterColor,
    debug: cli.debug ?? DEFAULT_HIGHLIGHT_CONFIG.debug,
    rules: [...(ruleFile?.rules ?? []), ...cli.rules],
  };
}

/**
 * @throws PatternError for the first rule whose pattern does not compile
 */
export function createHighlighter(config: HighlightConfig, logger: ILogger): Highlighter {
  const highlighter = new Highlighter(config.defaultColor, {
    flags: config.ignoreCase ? 'i' : '',
    restoreOuterColor: config.restoreOuterColor,
    logger,
  });

  for (const rule of config.rules) {
    highlighter.addPattern(rule.pattern, rule.color);
  }

  return highlighter;
}
