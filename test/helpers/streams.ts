import { EventEmitter } from 'node:events';
import { PassThrough, Readable, Writable } from 'node:stream';

import type { ChildLike } from '../../src/process/command.js';

/**
 * Readable over `text`, as Buffers of `chunkSize` bytes (one chunk when omitted).
 */
export function textStream(text: string, chunkSize = 0): Readable {
  const bytes = Buffer.from(text, 'utf8');
  if (chunkSize <= 0) return Readable.from([bytes]);
  const chunks: Buffer[] = [];
  for (let i = 0; i < bytes.length; i += chunkSize) {
    chunks.push(bytes.subarray(i, i + chunkSize));
  }
  return Readable.from(chunks);
}

export interface Collector {
  stream: Writable;
  text(): string;
}

/**
 * Writable that keeps everything written to it.
 */
export function collector(): Collector {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

export function failingReader(message: string): Readable {
  return new Readable({
    read() {
      this.destroy(new Error(message));
    },
  });
}

/**
 * Stand-in for a spawned `ChildProcess`: an emitter with in-memory stdio pipes. Tests emit `close` /
 * `error` on it to play the process's exit.
 */
export function fakeChild(pipes: { stdin?: PassThrough; stdout?: PassThrough } = {}): ChildLike {
  return Object.assign(new EventEmitter(), {
    stdin: pipes.stdin ?? null,
    stdout: pipes.stdout ?? null,
  });
}
