/**
 * ANSI 256-color escape sequences.
 *
 * Activation codes are memoized: a log stream repeats the same handful of
 * colors on every line.
 */

import type { Color } from './types.js';

const RESET = '\x1b[0;0;0m';

const cache = new Map<string, string>();

function cacheKey(fg: number | undefined, bg: number | undefined): string {
  return `${fg ?? ''}:${bg ?? ''}`;
}

/**
 * Build the SGR sequence selecting palette foreground `fg` and background `bg`.
 * Returns an empty string when both are absent. Values are passed through
 * to the terminal unchecked.
 */
export function colorCode(fg?: number, bg?: number): string {
  const key = cacheKey(fg, bg);
  const cached = cache.get(key);
  if (cached !== undefined) {
    return cached;
  }

  let code = '';
  if (fg !== undefined) {
    code += `\x1b[38;5;${fg}m`;
  }
  if (bg !== undefined) {
    code += `\x1b[48;5;${bg}m`;
  }

  cache.set(key, code);
  return code;
}

export function colorCodeFor(color: Color): string {
  return colorCode(color.fg, color.bg);
}

/**
 * Clears every SGR attribute.
 */
export function resetCode(): string {
  return RESET;
}

export function colorCodeCacheSize(): number {
  return cache.size;
}

export function clearColorCodeCache(): void {
  cache.clear();
}
