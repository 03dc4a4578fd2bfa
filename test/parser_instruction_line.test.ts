import { describe, expect, it } from 'vitest';

import { isLineSyntaxError } from '../src/diagnostics/errors.js';
import type { LineSyntaxError } from '../src/diagnostics/errors.js';
import { parseInstructionLine } from '../src/frontend/parser.js';

function syntaxErrorOf(line: string): LineSyntaxError {
  try {
    parseInstructionLine(line);
  } catch (err) {
    if (isLineSyntaxError(err)) return err;
    throw err;
  }
  throw new Error(`expected a syntax error for ${JSON.stringify(line)}`);
}

describe('instruction line parser', () => {
  it('parses tab-aligned objdump -gnu output', () => {
    const record = parseInstructionLine(
      'blake2b_arm64.s:334\t0xfbf40\t\t\tf94007e0\t\tMOVD 8(RSP), R0                      // ldr x0, [sp,#8]',
    );

    expect(record.sourceFile).toBe('blake2b_arm64.s');
    expect(record.sourceLine).toBe(334);
    expect(record.offset).toBe(0xfbf40);
    expect(Array.from(record.encodedBytes)).toEqual([0xf9, 0x40, 0x07, 0xe0]);
    expect(record.highLevelAsm).toBe('MOVD 8(RSP), R0');
    expect(record.architectureAsm).toBe('ldr x0, [sp,#8]');
  });

  it('accepts any whitespace width between elements and around the line', () => {
    const record = parseInstructionLine(
      '   foo.s:10  0x20 f94007e0   MOVD 8(RSP), R0  //  ldr x0, [sp,#8]   ',
    );

    expect(record.sourceFile).toBe('foo.s');
    expect(record.sourceLine).toBe(10);
    expect(record.offset).toBe(0x20);
    expect(record.highLevelAsm).toBe('MOVD 8(RSP), R0');
    expect(record.architectureAsm).toBe('ldr x0, [sp,#8]');
  });

  it('accepts upper-case hex in offsets and encodings', () => {
    const record = parseInstructionLine('x.s:1 0xFF 9101C3FF SUB $112, RSP, RSP // sub sp, sp, #0x70');

    expect(record.offset).toBe(255);
    expect(Array.from(record.encodedBytes)).toEqual([0x91, 0x01, 0xc3, 0xff]);
    expect(record.highLevelAsm).toBe('SUB $112, RSP, RSP');
  });

  it('yields zero bytes when no encoding is printed', () => {
    const record = parseInstructionLine('main.go:7\t0x1000\tRET\t// ret');

    expect(record.encodedBytes).toHaveLength(0);
    expect(record.highLevelAsm).toBe('RET');
    expect(record.architectureAsm).toBe('ret');
  });

  it('keeps paths up to the first colon as the file name', () => {
    const record = parseInstructionLine('/src/pkg/a_amd64.s:42 0x8 90 NOP // nop');

    expect(record.sourceFile).toBe('/src/pkg/a_amd64.s');
    expect(record.sourceLine).toBe(42);
  });

  it('splits the two renderings at the first comment marker', () => {
    const record = parseInstructionLine('x.s:3 0x0 d503201f NOOP // nop // trailing');

    expect(record.highLevelAsm).toBe('NOOP');
    expect(record.architectureAsm).toBe('nop // trailing');
  });

  it('fails with MissingColon when the file name has no colon', () => {
    const line = 'foo.s 10 0x20 f94007e0 MOVD 8(RSP), R0 // ldr x0, [sp,#8]';
    const err = syntaxErrorOf(line);

    expect(err.reason).toBe('MissingColon');
    expect(err.id).toBe('MCA100');
    expect(err.offendingLine).toBe(line);
    expect(err.message).toBe(`syntax error: missing colon in file name (${line})`);
  });

  it('fails with InvalidNumber when the line number is missing', () => {
    const line = 'foo.s: 10 0x20 f94007e0 MOVD 8(RSP), R0 // ldr x0, [sp,#8]';
    const err = syntaxErrorOf(line);

    expect(err.reason).toBe('InvalidNumber');
    expect(err.id).toBe('MCA101');
    expect(err.message).toBe(`syntax error: invalid line number (${line})`);
  });

  it('fails with MissingOffsetPrefix when the offset lacks 0x', () => {
    const line = 'foo.s:10 20 f94007e0 MOVD 8(RSP), R0 // ldr x0, [sp,#8]';
    const err = syntaxErrorOf(line);

    expect(err.reason).toBe('MissingOffsetPrefix');
    expect(err.id).toBe('MCA102');
    expect(err.offendingLine).toBe(line);
  });

  it('fails with InvalidNumber when the offset has no digits', () => {
    const line = 'foo.s:10 0x f94007e0 MOVD 8(RSP), R0 // ldr x0, [sp,#8]';

    expect(syntaxErrorOf(line).reason).toBe('InvalidNumber');
  });

  it('fails with InvalidNumber when the offset is beyond exact integer range', () => {
    const line = `foo.s:10 0x${'f'.repeat(16)} f94007e0 MOVD 8(RSP), R0 // ldr x0, [sp,#8]`;
    const err = syntaxErrorOf(line);

    expect(err.reason).toBe('InvalidNumber');
    expect(err.message).toBe(`syntax error: invalid offset (${line})`);
  });

  it('fails with InvalidHex on an odd-length encoding', () => {
    const line = 'foo.s:10 0x20 f94007e MOVD 8(RSP), R0 // ldr x0, [sp,#8]';
    const err = syntaxErrorOf(line);

    expect(err.reason).toBe('InvalidHex');
    expect(err.id).toBe('MCA103');
    expect(err.message).toBe(`syntax error: odd-length instruction encoding "f94007e" (${line})`);
  });

  it('reads a hex-letter mnemonic as the encoding when no bytes are printed', () => {
    const err = syntaxErrorOf('foo.s:10 0x20 ADD R1, R2 // add x2, x2, x1');

    expect(err.reason).toBe('InvalidHex');
  });

  it('fails with MissingCommentMarker when the GNU rendering is absent', () => {
    const line = '  foo.s:10 0x20 f94007e0 MOVD 8(RSP), R0';
    const err = syntaxErrorOf(line);

    expect(err.reason).toBe('MissingCommentMarker');
    expect(err.id).toBe('MCA104');
    expect(err.offendingLine).toBe(line);
    expect(err.message).toBe(`syntax error: missing GNU assembly comment (${line})`);
  });

  it('requires a space after the comment slashes', () => {
    expect(syntaxErrorOf('foo.s:10 0x20 f94007e0 MOVD 8(RSP), R0 //ldr x0, [sp,#8]').reason).toBe(
      'MissingCommentMarker',
    );
  });

  it('rejects a blank line', () => {
    expect(syntaxErrorOf('').reason).toBe('MissingColon');
  });
});
