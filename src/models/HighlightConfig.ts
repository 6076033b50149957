/**
 * HighlightConfig - resolved settings for one linetint run
 *
 * Built from command-line options and an optional rules file by
 * ConfigResolver; nothing here is persisted between runs.
 */

import type { Color } from '../core/types.js';

export interface PatternRule {
  pattern: string;
  /** Falls back to the run's default color when omitted */
  color?: Color;
}

export interface HighlightConfig {
  defaultColor: Color;
  /** Compile string patterns case-insensitively */
  ignoreCase: boolean;
  /** Reassert enclosing colors after an inner match ends */
  restoreOuterColor: boolean;
  /** Rules file entries first, then command-line patterns, in order */
  rules: PatternRule[];
  debug: boolean;
}

export const DEFAULT_COLOR: Color = { fg: 1 };

export const DEFAULT_HIGHLIGHT_CONFIG: HighlightConfig = {
  defaultColor: DEFAULT_COLOR,
  ignoreCase: false,
  restoreOuterColor: false,
  rules: [],
  debug: false,
};
