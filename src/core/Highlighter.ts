/**
 * Highlighter - overlap-safe ANSI highlighting of regex matches
 *
 * Every match is turned into two point events (activation at its start,
 * reset at its end) instead of wrapping intervals one after another, so a
 * code inserted for one pattern never shifts the offsets another pattern
 * matched at. Patterns may overlap freely; the text between events is copied
 * exactly once.
 */

import type { ILogger } from '../interfaces/ILogger.js';
import { SilentLogger } from '../interfaces/ILogger.js';
import { DEFAULT_COLOR } from '../models/HighlightConfig.js';
import { colorCodeFor, resetCode } from './ColorCode.js';
import { PatternError } from './PatternError.js';
import type { Color, MatchEvent, PatternRegistration, PatternSource, Span } from './types.js';

export interface HighlighterOptions {
  /** Flags used when compiling string patterns (e.g. 'i'). `g` and `d` are always added. */
  flags?: string;
  /**
   * After a reset, re-emit the codes of spans that still enclose that offset.
   * Off by default: an inner match ending inside an outer one drops back to
   * the terminal default for the rest of the outer match.
   */
  restoreOuterColor?: boolean;
  logger?: ILogger;
}

const REQUIRED_FLAGS = 'gd';

function mergeFlags(flags: string, extra: string): string {
  return Array.from(new Set(flags + extra)).join('');
}

function describeColor(color: Color): Record<string, unknown> {
  return { fg: color.fg ?? null, bg: color.bg ?? null };
}

/**
 * Rank of an event among others at the same offset. Resets sort ahead of
 * activations so adjacent matches close the first color before opening the
 * second; an empty span's activation sorts ahead of its own reset.
 */
function tieRank(event: MatchEvent): number {
  if (event.kind === 'reset') return 1;
  return event.zeroWidth ? 0 : 2;
}

function compareEvents(a: MatchEvent, b: MatchEvent): number {
  if (a.offset !== b.offset) return a.offset - b.offset;
  const rank = tieRank(a) - tieRank(b);
  if (rank !== 0) return rank;
  return a.order - b.order;
}

function compareSpans(a: Span, b: Span): number {
  return a.start - b.start || a.order - b.order;
}

export class Highlighter {
  private readonly patterns: PatternRegistration[] = [];
  private defaultColor: Color;
  private readonly flags: string;
  private readonly restoreOuterColor: boolean;
  private readonly logger: ILogger;

  constructor(defaultColor: Color = DEFAULT_COLOR, options: HighlighterOptions = {}) {
    this.defaultColor = { ...defaultColor };
    this.flags = options.flags ?? '';
    this.restoreOuterColor = options.restoreOuterColor ?? false;
    this.logger = options.logger ?? new SilentLogger();
  }

  get patternCount(): number {
    return this.patterns.length;
  }

  registrations(): readonly PatternRegistration[] {
    return [...this.patterns];
  }

  getDefaultColor(): Color {
    return this.defaultColor;
  }

  /**
   * Only affects patterns registered afterwards.
   */
  setDefaultColor(color: Color): void {
    this.defaultColor = { ...color };
  }

  /**
   * Register a pattern. Without an explicit color the current default is bound now.
   *
   * @throws PatternError when a pattern string does not compile
   */
  addPattern(pattern: PatternSource, color?: Color): void {
    const compiled = this.compile(pattern);
    const registration: PatternRegistration = {
      pattern: compiled,
      color: { ...(color ?? this.defaultColor) },
      order: this.patterns.length,
    };
    this.patterns.push(registration);

    this.logger.debug('Registered pattern', {
      pattern: compiled.source,
      flags: compiled.flags,
      order: registration.order,
      ...describeColor(registration.color),
    });
  }

  highlight(text: string): string {
    if (this.patterns.length === 0 || text.length === 0) {
      return text;
    }

    const spans = this.collectSpans(text);
    if (spans.length === 0) {
      return text;
    }

    const events = this.collectEvents(spans);
    const enclosing = this.restoreOuterColor ? new EnclosingSpans(spans) : null;
    let result = '';
    let last = 0;

    for (const event of events) {
      result += text.slice(last, event.offset) + event.code;
      last = event.offset;
      if (enclosing && event.kind === 'reset') {
        result += enclosing.codesAt(event.offset);
      }
    }

    return result + text.slice(last);
  }

  private compile(pattern: PatternSource): RegExp {
    if (pattern instanceof RegExp) {
      return new RegExp(pattern.source, mergeFlags(pattern.flags, REQUIRED_FLAGS));
    }
    try {
      return new RegExp(pattern, mergeFlags(this.flags, REQUIRED_FLAGS));
    } catch (err) {
      throw new PatternError(pattern, err instanceof Error ? err : new Error(String(err)));
    }
  }

  private collectSpans(text: string): Span[] {
    const spans: Span[] = [];

    for (const { pattern, color, order } of this.patterns) {
      const code = colorCodeFor(color);
      const push = (start: number, end: number): void => {
        spans.push({ start, end, code, order });
      };

      for (const match of text.matchAll(pattern)) {
        if (match.length > 1) {
          // Only the groups are colored; group 0 is skipped.
          for (let group = 1; group < match.length; group++) {
            const range = match.indices?.[group];
            if (range) {
              push(range[0], range[1]);
            }
          }
        } else {
          const start = match.index ?? 0;
          push(start, start + match[0].length);
        }
      }
    }

    return spans;
  }

  private collectEvents(spans: Span[]): MatchEvent[] {
    const reset = resetCode();
    const events = new Map<string, MatchEvent>();

    const add = (event: MatchEvent): void => {
      const key = `${event.offset}\u0000${event.code}`;
      const existing = events.get(key);
      if (!existing) {
        events.set(key, event);
        return;
      }
      events.set(key, {
        ...existing,
        order: Math.min(existing.order, event.order),
        zeroWidth: existing.zeroWidth && event.zeroWidth,
      });
    };

    for (const span of spans) {
      const zeroWidth = span.end === span.start;
      add({ offset: span.start, code: span.code, kind: 'activate', order: span.order, zeroWidth });
      add({ offset: span.end, code: reset, kind: 'reset', order: span.order, zeroWidth });
    }

    return Array.from(events.values()).sort(compareEvents);
  }
}

/**
 * Sweeps spans in start order alongside the event walk, keeping only those
 * still open. Offsets passed to codesAt must be non-decreasing.
 */
class EnclosingSpans {
  private readonly pending: Span[];
  private next = 0;
  private open: Span[] = [];

  constructor(spans: Span[]) {
    this.pending = [...spans].sort(compareSpans);
  }

  /**
   * Codes of the spans with start < offset < end, outermost first.
   */
  codesAt(offset: number): string {
    while (this.next < this.pending.length && this.pending[this.next].start < offset) {
      this.open.push(this.pending[this.next]);
      this.next++;
    }
    this.open = this.open.filter(span => span.end > offset);

    const codes = new Set<string>();
    for (const span of this.open) {
      if (span.code !== '') codes.add(span.code);
    }
    return Array.from(codes).join('');
  }
}
