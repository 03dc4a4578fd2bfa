import type { Readable } from 'node:stream';

function decode(decoder: TextDecoder, bytes?: Uint8Array): string {
  try {
    return bytes ? decoder.decode(bytes, { stream: true }) : decoder.decode();
  } catch (err) {
    throw new Error('disassembly input is not valid UTF-8', { cause: err });
  }
}

function decodeChunk(decoder: TextDecoder, chunk: unknown): string {
  if (typeof chunk === 'string') return chunk;
  if (chunk instanceof Uint8Array) return decode(decoder, chunk);
  throw new TypeError(`Unexpected chunk of type ${typeof chunk} in disassembly input`);
}

function dropCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Split a byte stream into lines on `\n`, dropping one trailing `\r` per line.
 *
 * A final line without a terminator is still yielded; an empty stream yields nothing. Bytes that are
 * not valid UTF-8 fail the read instead of being replaced. Returning early
 * (e.g. `break` in a `for await`) leaves `input` open and unread rather than destroying it, so a
 * producer writing into it is not killed by a broken pipe.
 */
export async function* readLines(input: Readable): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  let pending = '';
  for await (const chunk of input.iterator({ destroyOnReturn: false })) {
    pending += decodeChunk(decoder, chunk);
    let newline = pending.indexOf('\n');
    while (newline >= 0) {
      yield dropCarriageReturn(pending.slice(0, newline));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');
    }
  }
  pending += decode(decoder);
  if (pending.length > 0) yield dropCarriageReturn(pending);
}
