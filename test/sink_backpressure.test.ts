import { describe, expect, it, vi } from 'vitest';
import { Writable } from 'node:stream';

import { createStreamSink } from '../src/formats/sink.js';
import { collector } from './helpers/streams.js';

function slowWritable(chunks: string[]): Writable {
  return new Writable({
    highWaterMark: 4,
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'));
      setImmediate(callback);
    },
  });
}

describe('stream sink', () => {
  it('queues writes until drained', async () => {
    const out = collector();
    const sink = createStreamSink(out.stream);
    sink.write('  nop\n');

    expect(out.text()).toBe('');
    await sink.drain();
    expect(out.text()).toBe('  nop\n');
  });

  it('waits for the stream to drain under back-pressure', async () => {
    const chunks: string[] = [];
    const out = slowWritable(chunks);
    const sink = createStreamSink(out);
    sink.write('hello ');
    sink.write('world');
    await sink.drain();

    expect(out.writableNeedDrain).toBe(false);
    expect(chunks.join('')).toBe('hello world');
  });

  it('ends the stream only once', async () => {
    const out = collector();
    const end = vi.spyOn(out.stream, 'end');
    const sink = createStreamSink(out.stream);
    sink.end();
    sink.end();

    expect(end).toHaveBeenCalledTimes(1);
    await expect(sink.finished()).resolves.toBeUndefined();
  });

  it('refuses to drain into an ended stream', async () => {
    const out = collector();
    const sink = createStreamSink(out.stream);
    sink.end();
    sink.write('late\n');

    await expect(sink.drain()).rejects.toMatchObject({
      name: 'IoError',
      operation: 'write',
      message: 'write failed: output is already closed',
    });
  });

  it('reports a failure to finish', async () => {
    const out = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
      final(callback) {
        callback(new Error('flush failed'));
      },
    });
    const sink = createStreamSink(out);
    sink.end();

    await expect(sink.finished()).rejects.toMatchObject({
      name: 'IoError',
      id: 'MCA002',
      message: 'write failed: flush failed',
    });
  });

  it('fails a pending drain when the stream closes', async () => {
    const out = new Writable({
      highWaterMark: 1,
      write() {
        // never completes
      },
    });
    const sink = createStreamSink(out);
    sink.write('abc');
    const pending = sink.drain();
    out.destroy();

    await expect(pending).rejects.toMatchObject({ name: 'IoError', operation: 'write' });
  });
});
