/**
 * Parsing of color specs given on the command line.
 *
 * Accepted forms: `fg`, `fg:bg`, `:bg` and `fg:`, where each side is a
 * 256-color palette index.
 */

import type { Color } from '../core/types.js';

export const MAX_COLOR_INDEX = 255;

export class ColorSpecError extends Error {
  constructor(public readonly spec: string, reason: string) {
    super(`Invalid color "${spec}": ${reason}`);
    this.name = 'ColorSpecError';
  }
}

function parseChannel(spec: string, value: string, channel: 'foreground' | 'background'): number | undefined {
  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }
  if (!/^\d+$/.test(trimmed)) {
    throw new ColorSpecError(spec, `${channel} must be an integer between 0 and ${MAX_COLOR_INDEX}`);
  }
  const index = Number(trimmed);
  if (index > MAX_COLOR_INDEX) {
    throw new ColorSpecError(spec, `${channel} ${index} is out of range (0-${MAX_COLOR_INDEX})`);
  }
  return index;
}

export function parseColorSpec(spec: string): Color {
  const parts = spec.split(':');
  if (parts.length > 2) {
    throw new ColorSpecError(spec, 'expected <fg>, <fg>:<bg> or :<bg>');
  }

  const [fgPart, bgPart = ''] = parts;
  const fg = parseChannel(spec, fgPart, 'foreground');
  const bg = parseChannel(spec, bgPart, 'background');

  if (fg === undefined && bg === undefined) {
    throw new ColorSpecError(spec, 'at least one of foreground or background is required');
  }

  const color: { fg?: number; bg?: number } = {};
  if (fg !== undefined) color.fg = fg;
  if (bg !== undefined) color.bg = bg;
  return color;
}

/**
 * Render a color the way it was written on the command line.
 */
export function formatColor(color: Color): string {
  const fg = color.fg !== undefined ? String(color.fg) : '';
  const bg = color.bg !== undefined ? `:${color.bg}` : '';
  return `${fg}${bg}` || 'none';
}
