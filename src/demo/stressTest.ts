/**
 * Exercises the color code cache the way a busy log stream does: the same
 * small palette requested over and over.
 */

import { colorCode, colorCodeCacheSize } from '../core/ColorCode.js';
import { PALETTE_SIZE } from './rainbow.js';

export const DEFAULT_STRESS_ITERATIONS = 50000;

export interface StressResult {
  iterations: number;
  calls: number;
  elapsedMs: number;
  cacheSize: number;
}

export function runStressTest(iterations: number = DEFAULT_STRESS_ITERATIONS): StressResult {
  const started = performance.now();
  for (let i = 0; i < iterations; i++) {
    for (let c = 0; c < PALETTE_SIZE; c++) {
      colorCode(c);
    }
  }
  const elapsedMs = performance.now() - started;

  return {
    iterations,
    calls: iterations * PALETTE_SIZE,
    elapsedMs,
    cacheSize: colorCodeCacheSize(),
  };
}

export function formatStressResult(result: StressResult): string {
  const perCallNs = result.calls > 0 ? (result.elapsedMs * 1e6) / result.calls : 0;
  return (
    `${result.calls} color lookups in ${result.elapsedMs.toFixed(1)} ms ` +
    `(${perCallNs.toFixed(1)} ns/call, ${result.cacheSize} cached codes)`
  );
}
