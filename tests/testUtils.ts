/**
 * Stream helpers shared by the stream and CLI tests
 */

import { Readable, Writable } from 'stream';
import type { CliIO } from '../src/cli.js';
import type { Env } from '../src/config/RecolorConfig.js';

export interface CollectingStream {
  stream: Writable;
  text(): string;
  bytes(): Buffer;
}

export function collectingStream(): CollectingStream {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      callback();
    },
  });
  const bytes = (): Buffer => Buffer.concat(chunks);
  return { stream, text: () => bytes().toString('utf8'), bytes };
}

export interface FakeIO {
  io: CliIO;
  stdout: () => string;
  stdoutBytes: () => Buffer;
  stderr: () => string;
}

export function fakeIO(input: Array<string | Buffer>, env: Env = { NO_COLOR: '1' }): FakeIO {
  const stdout = collectingStream();
  const stderr = collectingStream();
  return {
    io: {
      stdin: Readable.from(input),
      stdout: stdout.stream,
      stderr: stderr.stream,
      env,
    },
    stdout: stdout.text,
    stdoutBytes: stdout.bytes,
    stderr: stderr.text,
  };
}
