import { describe, it, expect, beforeEach } from 'vitest';
import { clearColorCodeCache } from '../../../src/core/ColorCode.js';
import { renderRainbow } from '../../../src/demo/rainbow.js';
import { formatStressResult, runStressTest } from '../../../src/demo/stressTest.js';

describe('renderRainbow', () => {
  it('prints one swatch per palette index', () => {
    const lines = renderRainbow();

    expect(lines).toHaveLength(256);
    expect(lines[0]).toBe('  0: \x1b[38;5;0m-=-\x1b[0;0;0m');
    expect(lines[42]).toBe(' 42: \x1b[38;5;42m-=-\x1b[0;0;0m');
    expect(lines[255]).toBe('255: \x1b[38;5;255m-=-\x1b[0;0;0m');
  });
});

describe('stress test', () => {
  beforeEach(() => {
    clearColorCodeCache();
  });

  it('counts every lookup and fills the cache once per color', () => {
    const result = runStressTest(3);

    expect(result.iterations).toBe(3);
    expect(result.calls).toBe(768);
    expect(result.cacheSize).toBe(256);
    expect(result.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it('formats a one-line summary', () => {
    const line = formatStressResult({ iterations: 1, calls: 1000, elapsedMs: 2, cacheSize: 256 });

    expect(line).toBe('1000 color lookups in 2.0 ms (2000.0 ns/call, 256 cached codes)');
  });
});
