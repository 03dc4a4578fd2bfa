import type { InstructionRecord } from './record.js';
import { lineSyntaxError } from '../diagnostics/errors.js';

const COMMENT_MARKER = '// ';

function isDecimalDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isHexDigit(ch: string): boolean {
  return isDecimalDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

/**
 * Length of the longest prefix of `s` whose characters all satisfy `accept`.
 */
function runLength(s: string, accept: (ch: string) => boolean): number {
  let i = 0;
  while (i < s.length && accept(s.charAt(i))) i++;
  return i;
}

function decodeHexPairs(hex: string): Uint8Array {
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/**
 * Parse one instruction line of `go tool objdump -gnu` output.
 *
 * Column widths vary between disassembler versions, so any run of whitespace separates elements; the
 * order and presence of elements is fixed. Throws a {@link LineSyntaxError} naming the first missing or
 * malformed element, with `line` attached verbatim.
 */
export function parseInstructionLine(line: string): InstructionRecord {
  let rest = line.trim();

  const colon = rest.indexOf(':');
  if (colon < 0) {
    throw lineSyntaxError('MissingColon', 'missing colon in file name', line);
  }
  const sourceFile = rest.slice(0, colon);
  rest = rest.slice(colon + 1);

  const lineDigits = rest.slice(0, runLength(rest, isDecimalDigit));
  const sourceLine = Number.parseInt(lineDigits, 10);
  if (lineDigits.length === 0 || !Number.isSafeInteger(sourceLine)) {
    throw lineSyntaxError('InvalidNumber', 'invalid line number', line);
  }
  rest = rest.slice(lineDigits.length).trimStart();

  if (!rest.startsWith('0x')) {
    throw lineSyntaxError('MissingOffsetPrefix', 'missing 0x prefix for offset', line);
  }
  rest = rest.slice(2);

  // Offsets are machine words; anything past the exact integer range of a number is rejected.
  const offsetDigits = rest.slice(0, runLength(rest, isHexDigit));
  const offset = Number.parseInt(offsetDigits, 16);
  if (offsetDigits.length === 0 || !Number.isSafeInteger(offset)) {
    throw lineSyntaxError('InvalidNumber', 'invalid offset', line);
  }
  rest = rest.slice(offsetDigits.length).trimStart();

  const encoded = rest.slice(0, runLength(rest, isHexDigit));
  if (encoded.length % 2 !== 0) {
    throw lineSyntaxError('InvalidHex', `odd-length instruction encoding "${encoded}"`, line);
  }
  const encodedBytes = decodeHexPairs(encoded);
  rest = rest.slice(encoded.length).trimStart();

  const marker = rest.indexOf(COMMENT_MARKER);
  if (marker < 0) {
    throw lineSyntaxError('MissingCommentMarker', 'missing GNU assembly comment', line);
  }

  return {
    sourceFile,
    sourceLine,
    offset,
    encodedBytes,
    highLevelAsm: rest.slice(0, marker).trim(),
    architectureAsm: rest.slice(marker + COMMENT_MARKER.length).trim(),
  };
}
