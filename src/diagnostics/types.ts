/**
 * Severity level for a diagnostic. Every failure this tool reports is fatal.
 */
export type DiagnosticSeverity = 'error';

/**
 * A user-facing diagnostic with an optional input location.
 *
 * Diagnostics must have stable IDs so scripts wrapping the tool can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `MCA100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  /** Input the diagnostic refers to: a path, or the producing command. */
  file?: string;
  /** 1-based line number in `file`, when known. */
  line?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified failure. */
  Unknown: 'MCA000',

  /** Failed to read the disassembly input. */
  IoReadFailed: 'MCA001',

  /** Failed to write the transformed output. */
  IoWriteFailed: 'MCA002',

  /** Instruction line has no `:` after the file name. */
  MissingColon: 'MCA100',

  /** Line number or offset is empty or out of range. */
  InvalidNumber: 'MCA101',

  /** Offset is not introduced by `0x`. */
  MissingOffsetPrefix: 'MCA102',

  /** Encoded instruction bytes are not whole hex pairs. */
  InvalidHex: 'MCA103',

  /** No `// ` marker separates the two assembly renderings. */
  MissingCommentMarker: 'MCA104',

  /** An external program could not be started. */
  ProcessSpawnFailed: 'MCA200',

  /** An external program exited with a non-zero status or a signal. */
  ProcessExitFailed: 'MCA201',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * Parser failure points; each maps onto the diagnostic ID of the same name.
 */
export type SyntaxReason =
  | 'MissingColon'
  | 'InvalidNumber'
  | 'MissingOffsetPrefix'
  | 'InvalidHex'
  | 'MissingCommentMarker';
