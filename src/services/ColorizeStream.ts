/**
 * ColorizeStream - line-at-a-time colorizing transform
 *
 * Splits raw input on the `\n` byte and pushes each styled line as soon as it
 * is complete. A trailing `\r` is kept out of matching and written back after
 * the styled line. A final line without a newline is emitted without one.
 * Lines that are not valid UTF-8 are written out byte for byte, unstyled.
 */

import { Transform } from 'stream';
import type { TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import { TextDecoder } from 'util';
import type { ILogger } from '../interfaces/ILogger.js';
import { SilentLogger } from '../interfaces/ILogger.js';
import type { GroupStyles } from '../models/GroupInfo.js';
import { colorizeLine } from './LineColorizer.js';
import type { CompiledPattern } from './PatternCompiler.js';

export interface ColorizeStreamOptions {
  pattern: CompiledPattern;
  groupStyles: GroupStyles;
  logger?: ILogger;
}

const LF = 0x0a;
const CR = 0x0d;
const NEWLINE = Buffer.from([LF]);

export class ColorizeStream extends Transform {
  // ignoreBOM keeps a leading byte order mark in the line instead of dropping it
  private readonly decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  private pending: Buffer = Buffer.alloc(0);
  private readonly pattern: CompiledPattern;
  private readonly groupStyles: GroupStyles;
  private readonly logger: ILogger;

  /** Lines seen so far, including a final partial line */
  lineCount = 0;

  constructor(options: ColorizeStreamOptions) {
    super();
    this.pattern = options.pattern;
    this.groupStyles = options.groupStyles;
    this.logger = options.logger ?? new SilentLogger();
  }

  override _transform(chunk: Buffer | string, _encoding: BufferEncoding, callback: TransformCallback): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, bytes]) : bytes;

    const out: Buffer[] = [];
    let start = 0;
    let newline = data.indexOf(LF, start);
    while (newline !== -1) {
      out.push(this.colorize(data.subarray(start, newline)), NEWLINE);
      start = newline + 1;
      newline = data.indexOf(LF, start);
    }
    // copy, so the caller's chunk is not retained
    this.pending = Buffer.from(data.subarray(start));

    if (out.length > 0) {
      this.push(Buffer.concat(out));
    }
    callback();
  }

  override _flush(callback: TransformCallback): void {
    const rest = this.pending;
    this.pending = Buffer.alloc(0);
    if (rest.length > 0) {
      this.push(this.colorize(rest));
    }
    this.logger.debug('input finished', { lines: this.lineCount });
    callback();
  }

  private colorize(line: Buffer): Buffer {
    this.lineCount++;
    const hasCr = line.length > 0 && line[line.length - 1] === CR;
    const body = hasCr ? line.subarray(0, -1) : line;

    let text: string;
    try {
      text = this.decoder.decode(body);
    } catch (err: unknown) {
      this.logger.debug('line is not valid UTF-8, passing it through', {
        line: this.lineCount,
        reason: err instanceof Error ? err.message : String(err),
      });
      return line;
    }

    const styled = colorizeLine(text, this.pattern, this.groupStyles);
    return Buffer.from(hasCr ? `${styled}\r` : styled);
  }
}

function isBrokenPipe(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EPIPE';
}

/**
 * Pipe input through a ColorizeStream into output until input ends.
 *
 * A reader that goes away early (`recolor ... | head`) ends the run normally.
 */
export async function colorizeStream(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  options: ColorizeStreamOptions
): Promise<void> {
  try {
    await pipeline(input, new ColorizeStream(options), output);
  } catch (err: unknown) {
    if (isBrokenPipe(err)) {
      options.logger?.debug('output closed early, stopping');
      return;
    }
    throw err;
  }
}
