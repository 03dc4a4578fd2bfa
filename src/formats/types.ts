/**
 * Annotation toggles for one transform run.
 *
 * Enabled annotations are appended to each instruction as comment segments, in declaration order.
 */
export interface RenderConfig {
  /** Append `file:line`. */
  readonly showFile: boolean;
  /** Append the `0x`-prefixed byte offset. */
  readonly showOffset: boolean;
  /** Append the hex-encoded instruction bytes. */
  readonly showInstructionBytes: boolean;
  /** Append the disassembler's own mnemonic. */
  readonly showHighLevelAsm: boolean;
}

/**
 * Destination for rendered text. Writes are synchronous; any buffering is the sink's concern.
 */
export interface TextSink {
  write(text: string): void;
}

/**
 * Column layout for {@link TabWriter}.
 */
export interface TabWriterOptions {
  /** Minimal cell width including padding. */
  minWidth: number;
  /** Width of one tab stop; cells are widened to a multiple of it. */
  tabWidth: number;
  /** Padding added to the widest cell of a column. */
  padding: number;
}

/**
 * Elastic tab-stop writer: cells are tab-terminated, and each column of a run of adjacent lines is
 * padded with tabs to a common width.
 */
export interface TabWriter extends TextSink {
  /** Format and emit everything buffered, including an unterminated last line. */
  flush(): void;
}
