import { describe, it, expect } from 'vitest';
import { pipeline } from 'stream/promises';
import { Highlighter } from '../../../src/core/Highlighter.js';
import { HighlightTransform } from '../../../src/stream/HighlightTransform.js';
import { RESET, fg, memorySink, memorySource } from '../testUtils.js';

function highlighterFor(pattern: string): Highlighter {
  const highlighter = new Highlighter({ fg: 1 });
  highlighter.addPattern(pattern);
  return highlighter;
}

async function runThrough(
  transform: HighlightTransform,
  ...chunks: Array<string | Buffer>
): Promise<string> {
  const sink = memorySink();
  await pipeline(memorySource(...chunks), transform, sink.stream);
  return sink.text();
}

describe('HighlightTransform', () => {
  it('highlights each line and keeps the newlines', async () => {
    const transform = new HighlightTransform(highlighterFor('b'));
    const output = await runThrough(transform, 'abc\nxbx\n');

    expect(output).toBe('a' + fg(1) + 'b' + RESET + 'c\n' + 'x' + fg(1) + 'b' + RESET + 'x\n');
    expect(transform.lineCount).toBe(2);
  });

  it('joins lines split across chunks before matching', async () => {
    const transform = new HighlightTransform(highlighterFor('bc'));
    const output = await runThrough(transform, 'ab', 'c\nab', 'c');

    expect(output).toBe('a' + fg(1) + 'bc' + RESET + '\n' + 'a' + fg(1) + 'bc' + RESET);
    expect(transform.lineCount).toBe(2);
  });

  it('keeps CRLF terminators outside the matched text', async () => {
    const transform = new HighlightTransform(highlighterFor('c$'));
    const output = await runThrough(transform, 'abc\r\n');

    expect(output).toBe('ab' + fg(1) + 'c' + RESET + '\r\n');
  });

  it('decodes multibyte characters split between chunks', async () => {
    const bytes = Buffer.from('héllo\n', 'utf8');
    const transform = new HighlightTransform(highlighterFor('é'));
    const output = await runThrough(transform, bytes.subarray(0, 2), bytes.subarray(2));

    expect(output).toBe('h' + fg(1) + 'é' + RESET + 'llo\n');
  });

  it('passes blank lines through', async () => {
    const transform = new HighlightTransform(highlighterFor('x'));
    const output = await runThrough(transform, '\n\nx\n');

    expect(output).toBe('\n\n' + fg(1) + 'x' + RESET + '\n');
    expect(transform.lineCount).toBe(3);
  });

  it('produces nothing for empty input', async () => {
    const transform = new HighlightTransform(highlighterFor('x'));
    expect(await runThrough(transform)).toBe('');
    expect(transform.lineCount).toBe(0);
  });
});
