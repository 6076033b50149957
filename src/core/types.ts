/**
 * Core value types shared by the color code generator and the highlighter.
 */

/**
 * A 256-color palette pair. Either channel may be left unspecified.
 */
export interface Color {
  readonly fg?: number;
  readonly bg?: number;
}

/**
 * Anything `addPattern` accepts: a pattern string to compile, or a compiled RegExp.
 */
export type PatternSource = string | RegExp;

export interface PatternRegistration {
  readonly pattern: RegExp;
  readonly color: Color;
  /** Insertion index; decides precedence between activations at the same offset */
  readonly order: number;
}

export type MatchEventKind = 'activate' | 'reset';

/**
 * A single code insertion point, derived per highlight call.
 */
export interface MatchEvent {
  readonly offset: number;
  readonly code: string;
  readonly kind: MatchEventKind;
  readonly order: number;
  /** Derived from an empty span (zero-length match or group) */
  readonly zeroWidth: boolean;
}

/**
 * Half-open [start, end) range of a match or capture group.
 */
export interface Span {
  readonly start: number;
  readonly end: number;
  readonly code: string;
  readonly order: number;
}
