/**
 * HighlightTransform - line-oriented stream filter around a Highlighter
 *
 * Splits decoded input on '\n' and highlights each line body on its own;
 * the '\r\n' / '\n' terminator is written back exactly as it arrived, and a
 * last line without one stays without one.
 */

import { Transform, type TransformCallback } from 'stream';
import { StringDecoder } from 'string_decoder';
import type { Highlighter } from '../core/Highlighter.js';

export class HighlightTransform extends Transform {
  private readonly decoder = new StringDecoder('utf8');
  private pending = '';
  private lines = 0;

  constructor(private readonly highlighter: Highlighter) {
    super();
  }

  get lineCount(): number {
    return this.lines;
  }

  override _transform(chunk: Buffer | string, _encoding: BufferEncoding, callback: TransformCallback): void {
    const text = this.pending + (typeof chunk === 'string' ? chunk : this.decoder.write(chunk));
    const lastNewline = text.lastIndexOf('\n');

    if (lastNewline === -1) {
      this.pending = text;
      callback();
      return;
    }

    this.pending = text.slice(lastNewline + 1);
    const complete = text.slice(0, lastNewline + 1);
    let output = '';
    let start = 0;

    while (start < complete.length) {
      const end = complete.indexOf('\n', start);
      output += this.highlightLine(complete.slice(start, end + 1));
      start = end + 1;
    }

    callback(null, output);
  }

  override _flush(callback: TransformCallback): void {
    const rest = this.pending + this.decoder.end();
    this.pending = '';
    callback(null, rest.length > 0 ? this.highlightLine(rest) : undefined);
  }

  private highlightLine(line: string): string {
    this.lines++;
    const terminator = line.endsWith('\r\n') ? '\r\n' : line.endsWith('\n') ? '\n' : '';
    const body = line.slice(0, line.length - terminator.length);
    return this.highlighter.highlight(body) + terminator;
  }
}
