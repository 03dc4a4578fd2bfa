import { spawn } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';

import { exitFailed, spawnFailed } from '../diagnostics/errors.js';

/**
 * The part of `ChildProcess` a command relies on.
 */
export interface ChildLike extends EventEmitter {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildLike;

export const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

/**
 * Where a command's stdin/stdout go. stderr is always shared with this process.
 */
export interface CommandStdio {
  stdin: 'pipe' | 'inherit' | 'ignore';
  stdout: 'pipe' | 'inherit' | 'ignore';
}

/**
 * An external program run once.
 *
 * `start()` must be called first; `wait()` must be called in the same tick as `start()` so that an
 * early failure is never an unhandled rejection.
 */
export interface ExternalCommand {
  /** Program name, used in error messages. */
  readonly name: string;
  start(): void;
  /** Readable end of the program's piped stdout. */
  stdout(): Readable;
  /** Writable end of the program's piped stdin. */
  stdin(): Writable;
  /**
   * Resolve when the program exits with status 0 and its stdio is closed. Reject with a
   * `ProcessError` if it could not be spawned or exited otherwise.
   */
  wait(): Promise<void>;
}

export function createCommand(
  name: string,
  args: readonly string[],
  stdio: CommandStdio,
  spawnFn: SpawnFn = defaultSpawn,
): ExternalCommand {
  let child: ChildLike | undefined;
  let exited: Promise<void> | undefined;

  const started = (): ChildLike => {
    if (!child) throw new Error(`${name} has not been started`);
    return child;
  };

  return {
    name,

    start(): void {
      if (child) throw new Error(`${name} has already been started`);
      const spawned = spawnFn(name, args, { stdio: [stdio.stdin, stdio.stdout, 'inherit'] });
      child = spawned;
      exited = new Promise<void>((resolve, reject) => {
        spawned.once('error', (err: Error) => reject(spawnFailed(name, err)));
        spawned.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
          if (code === 0) resolve();
          else reject(exitFailed(name, code, signal));
        });
      });
    },

    stdout(): Readable {
      const out = started().stdout;
      if (!out) throw new Error(`${name} stdout is not piped`);
      return out;
    },

    stdin(): Writable {
      const input = started().stdin;
      if (!input) throw new Error(`${name} stdin is not piped`);
      return input;
    },

    wait(): Promise<void> {
      if (!exited) return Promise.reject(new Error(`${name} has not been started`));
      return exited;
    },
  };
}
