import type { Diagnostic, DiagnosticId, SyntaxReason } from './types.js';
import { DiagnosticIds } from './types.js';

/**
 * Malformed instruction line. Always fatal to the transform that hit it.
 */
export interface LineSyntaxError extends Error {
  name: 'LineSyntaxError';
  id: DiagnosticId;
  reason: SyntaxReason;
  /** The line exactly as read, before trimming. */
  offendingLine: string;
  /** 1-based position of the line in the input stream, once the transform knows it. */
  inputLine?: number;
}

/**
 * Failure reading the disassembly or writing the transformed stream.
 */
export interface IoError extends Error {
  name: 'IoError';
  id: DiagnosticId;
  operation: 'read' | 'write';
}

/**
 * An external program failed to start or exited abnormally.
 */
export interface ProcessError extends Error {
  name: 'ProcessError';
  id: DiagnosticId;
  command: string;
  exitCode?: number;
  signal?: string;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function lineSyntaxError(
  reason: SyntaxReason,
  description: string,
  offendingLine: string,
): LineSyntaxError {
  return Object.assign(new Error(`syntax error: ${description} (${offendingLine})`), {
    name: 'LineSyntaxError' as const,
    id: DiagnosticIds[reason],
    reason,
    offendingLine,
  });
}

export function ioError(operation: 'read' | 'write', cause: unknown): IoError {
  const id = operation === 'read' ? DiagnosticIds.IoReadFailed : DiagnosticIds.IoWriteFailed;
  return Object.assign(new Error(`${operation} failed: ${describe(cause)}`, { cause }), {
    name: 'IoError' as const,
    id,
    operation,
  });
}

export function spawnFailed(command: string, cause: unknown): ProcessError {
  return Object.assign(new Error(`${command}: ${describe(cause)}`, { cause }), {
    name: 'ProcessError' as const,
    id: DiagnosticIds.ProcessSpawnFailed,
    command,
  });
}

export function exitFailed(
  command: string,
  exitCode: number | null,
  signal: string | null,
): ProcessError {
  const status = signal !== null ? `signal: ${signal}` : `exit status ${String(exitCode)}`;
  return Object.assign(new Error(`${command}: ${status}`), {
    name: 'ProcessError' as const,
    id: DiagnosticIds.ProcessExitFailed,
    command,
    ...(exitCode !== null ? { exitCode } : {}),
    ...(signal !== null ? { signal } : {}),
  });
}

export function isLineSyntaxError(err: unknown): err is LineSyntaxError {
  return err instanceof Error && err.name === 'LineSyntaxError';
}

export function isIoError(err: unknown): err is IoError {
  return err instanceof Error && err.name === 'IoError';
}

export function isProcessError(err: unknown): err is ProcessError {
  return err instanceof Error && err.name === 'ProcessError';
}

/**
 * Convert any thrown value into a printable diagnostic.
 *
 * `file` names the input a syntax error's line number refers to.
 */
export function toDiagnostic(err: unknown, file?: string): Diagnostic {
  if (isLineSyntaxError(err)) {
    return {
      id: err.id,
      severity: 'error',
      message: err.message,
      ...(file !== undefined ? { file } : {}),
      ...(err.inputLine !== undefined ? { line: err.inputLine } : {}),
    };
  }
  if (isIoError(err) || isProcessError(err)) {
    return { id: err.id, severity: 'error', message: err.message };
  }
  return { id: DiagnosticIds.Unknown, severity: 'error', message: describe(err) };
}
