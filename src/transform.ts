import type { Readable } from 'node:stream';

import { ioError, isIoError, isLineSyntaxError } from './diagnostics/errors.js';
import { parseInstructionLine } from './frontend/parser.js';
import { HEADER_PREFIX, RETURN_MNEMONIC } from './frontend/record.js';
import { readLines } from './frontend/source.js';
import { renderInstruction, renderLabel, renderStop } from './formats/render.js';
import type { StreamSink } from './formats/sink.js';
import { MCA_TAB_LAYOUT, createTabWriter } from './formats/tabwriter.js';
import type { RenderConfig } from './formats/types.js';

/**
 * Rewrite `go tool objdump -gnu` output from `input` into llvm-mca input on `sink`.
 *
 * Header lines become labels; instruction lines become their GNU mnemonic plus the annotations enabled
 * in `config`. Processing ends at the first `ret`, even when more symbols follow. The first malformed
 * line aborts the run with a `LineSyntaxError` carrying its 1-based `inputLine`; read and write failures
 * surface as `IoError`. The sink is drained but not ended.
 */
export async function transform(
  sink: StreamSink,
  input: Readable,
  config: RenderConfig,
): Promise<void> {
  const writer = createTabWriter(sink, MCA_TAB_LAYOUT);
  let inputLine = 0;
  try {
    for await (const line of readLines(input)) {
      inputLine++;
      if (line.startsWith(HEADER_PREFIX)) {
        writer.write(renderLabel(line.slice(HEADER_PREFIX.length)));
        await sink.drain();
        continue;
      }

      const record = parseInstructionLine(line);
      if (record.architectureAsm === RETURN_MNEMONIC) {
        writer.write(renderStop(record.architectureAsm));
        break;
      }
      writer.write(renderInstruction(record, config));
      await sink.drain();
    }
  } catch (err) {
    if (isLineSyntaxError(err)) throw Object.assign(err, { inputLine });
    if (isIoError(err)) throw err;
    throw ioError('read', err);
  }
  writer.flush();
  await sink.drain();
}
