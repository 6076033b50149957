import { describe, it, expect } from 'vitest';
import { createHighlighter, resolveHighlightConfig } from '../../../src/config/ConfigResolver.js';
import { PatternError } from '../../../src/core/PatternError.js';
import { SilentLogger } from '../../../src/interfaces/ILogger.js';
import { DEFAULT_HIGHLIGHT_CONFIG } from '../../../src/models/HighlightConfig.js';
import { RESET, fg } from '../testUtils.js';

describe('ConfigResolver', () => {
  describe('resolveHighlightConfig', () => {
    it('applies defaults when nothing is given', () => {
      expect(resolveHighlightConfig({ rules: [] })).toEqual(DEFAULT_HIGHLIGHT_CONFIG);
    });

    it('prefers the command-line default color over the rules file', () => {
      const config = resolveHighlightConfig(
        { rules: [], defaultColor: { fg: 4 } },
        { defaultColor: { fg: 11 }, rules: [] }
      );
      expect(config.defaultColor).toEqual({ fg: 4 });
    });

    it('falls back to the rules file default color', () => {
      const config = resolveHighlightConfig({ rules: [] }, { defaultColor: { bg: 2 }, rules: [] });
      expect(config.defaultColor).toEqual({ bg: 2 });
    });

    it('puts rules file entries before command-line patterns', () => {
      const config = resolveHighlightConfig(
        { rules: [{ pattern: 'cli-1' }, { pattern: 'cli-2', color: { fg: 2 } }] },
        { rules: [{ pattern: 'file-1' }] }
      );
      expect(config.rules.map(r => r.pattern)).toEqual(['file-1', 'cli-1', 'cli-2']);
    });

    it('carries the flags through', () => {
      const config = resolveHighlightConfig({ rules: [], ignoreCase: true, restoreOuterColor: true, debug: true });
      expect(config.ignoreCase).toBe(true);
      expect(config.restoreOuterColor).toBe(true);
      expect(config.debug).toBe(true);
    });
  });

  describe('createHighlighter', () => {
    it('registers rules in order with the resolved default color', () => {
      const config = resolveHighlightConfig({
        rules: [{ pattern: 'ab' }, { pattern: 'bc', color: { fg: 4 } }],
        defaultColor: { fg: 2 },
      });
      const highlighter = createHighlighter(config, new SilentLogger());

      expect(highlighter.highlight('abc')).toBe(fg(2) + 'a' + fg(4) + 'b' + RESET + 'c' + RESET);
    });

    it('compiles case-insensitively when asked', () => {
      const config = resolveHighlightConfig({ rules: [{ pattern: 'WARN' }], ignoreCase: true });
      const highlighter = createHighlighter(config, new SilentLogger());

      expect(highlighter.highlight('warn')).toBe(fg(1) + 'warn' + RESET);
    });

    it('propagates pattern errors', () => {
      const config = resolveHighlightConfig({ rules: [{ pattern: '(' }] });
      expect(() => createHighlighter(config, new SilentLogger())).toThrow(PatternError);
    });
  });
});
