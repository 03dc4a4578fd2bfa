/**
 * One parsed line of `go tool objdump -gnu` output.
 *
 * Matches lines such as
 *
 * ```
 * blake2b_arm64.s:334	0xfbf40		f94007e0	MOVD 8(RSP), R0		// ldr x0, [sp,#8]
 * ```
 */
export interface InstructionRecord {
  /** File name as reported by the disassembler. */
  sourceFile: string;
  /** 1-based line within `sourceFile`. */
  sourceLine: number;
  /** Byte offset of the instruction. */
  offset: number;
  /** Raw encoding; empty when the disassembler printed none. */
  encodedBytes: Uint8Array;
  /** The disassembler's own mnemonic form. */
  highLevelAsm: string;
  /** Target instruction set form, the text handed to the analyzer. */
  architectureAsm: string;
}

/** Prefix of a symbol header line. */
export const HEADER_PREFIX = 'TEXT ';

/** Architecture mnemonic that ends the transformed stream. */
export const RETURN_MNEMONIC = 'ret';
