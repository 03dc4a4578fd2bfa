import type { RenderConfig } from '../formats/types.js';
import { runPipeline } from '../pipeline.js';
import { createCommand, defaultSpawn } from '../process/command.js';
import type { ExternalCommand, SpawnFn } from '../process/command.js';

export interface RunOptions {
  /** Regular expression selecting the symbols to disassemble. */
  symbolPattern: string;
  binary: string;
  /** Arguments passed through to llvm-mca. */
  mcaArgs: string[];
  render: RenderConfig;
}

export function objdumpCommand(options: RunOptions, spawnFn: SpawnFn = defaultSpawn): ExternalCommand {
  return createCommand(
    'go',
    ['tool', 'objdump', '-gnu', '-s', options.symbolPattern, options.binary],
    { stdin: 'ignore', stdout: 'pipe' },
    spawnFn,
  );
}

export function mcaCommand(options: RunOptions, spawnFn: SpawnFn = defaultSpawn): ExternalCommand {
  return createCommand('llvm-mca', options.mcaArgs, { stdin: 'pipe', stdout: 'inherit' }, spawnFn);
}

/**
 * Disassemble the selected symbols of a Go binary and analyze them with llvm-mca.
 */
export async function runObjdumpMca(
  options: RunOptions,
  spawnFn: SpawnFn = defaultSpawn,
): Promise<void> {
  await runPipeline(objdumpCommand(options, spawnFn), mcaCommand(options, spawnFn), options.render);
}
