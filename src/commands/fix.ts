import { createReadStream, createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Writable } from 'node:stream';

import { ioError } from '../diagnostics/errors.js';
import { createStreamSink } from '../formats/sink.js';
import type { RenderConfig } from '../formats/types.js';
import { transform } from '../transform.js';

export interface FixOptions {
  /** Saved `go tool objdump -gnu` output. */
  inputPath: string;
  /** Destination file; `stdout` is used when absent. */
  outputPath?: string;
  render: RenderConfig;
}

/**
 * Rewrite a saved disassembly listing as llvm-mca input.
 *
 * An output file is created (with its parent directories) and closed afterwards; `stdout` is written
 * to but never ended.
 */
export async function fixFile(options: FixOptions, stdout: Writable): Promise<void> {
  const input = createReadStream(options.inputPath);
  try {
    if (options.outputPath === undefined) {
      await transform(createStreamSink(stdout), input, options.render);
      return;
    }

    try {
      await mkdir(dirname(options.outputPath), { recursive: true });
    } catch (err) {
      throw ioError('write', err);
    }
    const sink = createStreamSink(createWriteStream(options.outputPath));
    try {
      await transform(sink, input, options.render);
    } finally {
      sink.end();
    }
    await sink.finished();
  } finally {
    input.destroy();
  }
}
