import { colorCode, resetCode } from '../core/ColorCode.js';

export const PALETTE_SIZE = 256;

/**
 * One swatch line per palette index, e.g. `  7: <code>-=-<reset>`.
 */
export function renderRainbow(): string[] {
  const lines: string[] = [];
  for (let c = 0; c < PALETTE_SIZE; c++) {
    lines.push(`${String(c).padStart(3)}: ${colorCode(c)}-=-${resetCode()}`);
  }
  return lines;
}
