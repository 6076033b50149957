/**
 * Feed stdin or a list of files through a Highlighter into one output stream.
 */

import * as fs from 'fs';
import type { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import type { Highlighter } from '../core/Highlighter.js';
import type { ILogger } from '../interfaces/ILogger.js';
import { SilentLogger } from '../interfaces/ILogger.js';
import { HighlightTransform } from './HighlightTransform.js';

export const STDIN_MARKER = '-';

export interface HighlightStreams {
  stdin: Readable;
  stdout: Writable;
}

export interface InputStats {
  source: string;
  lines: number;
}

/**
 * Inputs are processed one after another; stdout is left open. Every named
 * file is checked before any output is written.
 */
export async function highlightInputs(
  highlighter: Highlighter,
  files: string[],
  streams: HighlightStreams,
  logger: ILogger = new SilentLogger()
): Promise<InputStats[]> {
  const sources = files.length > 0 ? files : [STDIN_MARKER];
  const missing = sources.filter(source => source !== STDIN_MARKER && !fs.existsSync(source));
  if (missing.length > 0) {
    const label = missing.length === 1 ? 'Input file not found' : 'Input files not found';
    throw new Error(`${label}: ${missing.join(', ')}`);
  }

  const stats: InputStats[] = [];

  for (const source of sources) {
    const input = source === STDIN_MARKER ? streams.stdin : fs.createReadStream(source);
    const transform = new HighlightTransform(highlighter);

    await pipeline(input, transform, streams.stdout, { end: false });

    stats.push({ source, lines: transform.lineCount });
    logger.debug('Finished input', { source, lines: transform.lineCount });
  }

  return stats;
}
