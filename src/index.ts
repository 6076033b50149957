/**
 * linetint
 *
 * Streaming ANSI highlighter for regular expression matches.
 *
 * @packageDocumentation
 */

export { VERSION } from './version.js';

// Core
export type { Color, PatternSource, PatternRegistration, MatchEvent, MatchEventKind, Span } from './core/types.js';
export { colorCode, colorCodeFor, resetCode, clearColorCodeCache, colorCodeCacheSize } from './core/ColorCode.js';
export { Highlighter, type HighlighterOptions } from './core/Highlighter.js';
export { PatternError } from './core/PatternError.js';

// Logging
export type { ILogger, LogLevel } from './interfaces/ILogger.js';
export { SilentLogger } from './interfaces/ILogger.js';
export { ConsoleLogger, type ConsoleLoggerOptions } from './outputs/ConsoleLogger.js';

// Configuration
export {
  DEFAULT_COLOR,
  DEFAULT_HIGHLIGHT_CONFIG,
  type HighlightConfig,
  type PatternRule,
} from './models/HighlightConfig.js';
export { parseColorSpec, formatColor, ColorSpecError, MAX_COLOR_INDEX } from './config/ColorSpec.js';
export { loadRuleFile, parseRuleFile, type RuleFile } from './config/RuleFile.js';
export { resolveHighlightConfig, createHighlighter, type CliConfigInput } from './config/ConfigResolver.js';
export { SchemaValidationError, validateRuleFile } from './utils/SchemaValidator.js';

// Streams
export { HighlightTransform } from './stream/HighlightTransform.js';
export {
  highlightInputs,
  STDIN_MARKER,
  type HighlightStreams,
  type InputStats,
} from './stream/highlightInputs.js';

// Demo
export { renderRainbow, PALETTE_SIZE } from './demo/rainbow.js';
export {
  runStressTest,
  formatStressResult,
  DEFAULT_STRESS_ITERATIONS,
  type StressResult,
} from './demo/stressTest.js';
