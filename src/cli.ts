#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, resolve } from 'node:path';
import type { Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';

import { fixFile } from './commands/fix.js';
import { runObjdumpMca } from './commands/run.js';
import { toDiagnostic } from './diagnostics/errors.js';
import type { Diagnostic } from './diagnostics/types.js';
import type { RenderConfig } from './formats/types.js';
import type { SpawnFn } from './process/command.js';

type CliExit = { code: number };

/** Process streams the CLI prints to; tests substitute in-memory ones. */
export type CliIo = { stdout: Writable; stderr: Writable; spawn?: SpawnFn };

type FixCommand = {
  command: 'fix';
  inputPath: string;
  outputPath?: string;
  render: RenderConfig;
};

type RunCommand = {
  command: 'run';
  symbolPattern: string;
  binary: string;
  mcaArgs: string[];
  render: RenderConfig;
};

type CliCommand = FixCommand | RunCommand;

const PROGRAM = 'objdump-mca';

function usage(): string {
  return [
    `${PROGRAM} <command> [options]`,
    '',
    'Commands:',
    '  fix <objdump.txt>          Rewrite saved `go tool objdump -gnu` output as llvm-mca input',
    '  run -s <regexp> <binary>   Disassemble <binary> and feed the result to llvm-mca',
    '  help [command]             Show help for a command',
    '',
    'Options:',
    '  -V, --version              Print version',
    '  -h, --help                 Show help',
    '',
  ].join('\n');
}

function fixUsage(): string {
  return [
    `${PROGRAM} fix [options] <objdump.txt>`,
    '',
    'Options:',
    '  -o, --out <file>    Output path (default: stdout)',
    '      --[no-]file     Annotate with source file:line (default: on)',
    '      --[no-]offset   Annotate with the instruction offset (default: off)',
    '      --[no-]instr    Annotate with the encoded instruction (default: off)',
    '      --[no-]goasm    Annotate with the Go assembly form (default: on)',
    '  -h, --help          Show help',
    '',
  ].join('\n');
}

function runUsage(): string {
  return [
    `${PROGRAM} run [options] -s <regexp> <binary> [-- <llvm-mca args...>]`,
    '',
    'Options:',
    '  -s, --symbols <regexp>  Only disassemble symbols matching <regexp> (required)',
    '      --[no-]file         Annotate with source file:line (default: off)',
    '      --[no-]offset       Annotate with the instruction offset (default: off)',
    '      --[no-]instr        Annotate with the encoded instruction (default: off)',
    '      --[no-]goasm        Annotate with the Go assembly form (default: off)',
    '  -h, --help              Show help',
    '',
    'Arguments after `--` are passed to llvm-mca unchanged.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts when run from sources, dist/src/cli.js once built.
  const candidates = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')];
  const packageJsonPath = candidates.find((p) => existsSync(p));
  if (!packageJsonPath) return '0.0.0';
  const pkg: unknown = require(packageJsonPath);
  if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const RENDER_FLAGS = {
  file: 'showFile',
  offset: 'showOffset',
  instr: 'showInstructionBytes',
  goasm: 'showHighLevelAsm',
} as const satisfies Record<string, keyof RenderConfig>;

function isRenderFlag(name: string): name is keyof typeof RENDER_FLAGS {
  return Object.prototype.hasOwnProperty.call(RENDER_FLAGS, name);
}

/**
 * Apply `--<flag>` / `--no-<flag>` to `render`. Returns false when `arg` is not an annotation flag.
 */
function applyRenderFlag(arg: string, render: { -readonly [K in keyof RenderConfig]: boolean }): boolean {
  if (!arg.startsWith('--')) return false;
  const negated = arg.startsWith('--no-');
  const name = arg.slice(negated ? '--no-'.length : '--'.length);
  if (!isRenderFlag(name)) return false;
  render[RENDER_FLAGS[name]] = !negated;
  return true;
}

/**
 * Read the value of `-x <v>`, `--long <v>` or `--long=<v>`. Returns the value and the index of the
 * last argument consumed.
 */
function optionValue(argv: string[], i: number, long: string): { value: string; next: number } {
  const a = argv[i] ?? '';
  if (a.startsWith(`${long}=`)) {
    const v = a.slice(long.length + 1);
    if (!v) fail(`${long} expects a value`);
    return { value: v, next: i };
  }
  const v = argv[i + 1];
  if (!v) fail(`${a} expects a value`);
  return { value: v, next: i + 1 };
}

function parseFixArgs(argv: string[], io: CliIo): FixCommand | CliExit {
  const render = { showFile: true, showOffset: false, showInstructionBytes: false, showHighLevelAsm: true };
  let outputPath: string | undefined;
  let inputPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      io.stdout.write(fixUsage());
      return { code: 0 };
    }
    if (a === '-o' || a === '--out' || a.startsWith('--out=')) {
      const { value, next } = optionValue(argv, i, '--out');
      outputPath = value;
      i = next;
      continue;
    }
    if (applyRenderFlag(a, render)) continue;
    if (a.startsWith('-') && a !== '-') fail(`Unknown option "${a}"`);
    if (inputPath !== undefined) fail(`Expected exactly one <objdump.txt> argument`);
    inputPath = a;
  }

  if (inputPath === undefined) fail(`Expected exactly one <objdump.txt> argument`);
  return {
    command: 'fix',
    inputPath,
    ...(outputPath !== undefined ? { outputPath } : {}),
    render: Object.freeze(render),
  };
}

function parseRunArgs(argv: string[], io: CliIo): RunCommand | CliExit {
  const render = { showFile: false, showOffset: false, showInstructionBytes: false, showHighLevelAsm: false };
  const separator = argv.indexOf('--');
  const ours = separator >= 0 ? argv.slice(0, separator) : argv;
  const mcaArgs = separator >= 0 ? argv.slice(separator + 1) : [];
  let symbolPattern: string | undefined;
  let binary: string | undefined;

  for (let i = 0; i < ours.length; i++) {
    const a = ours[i] ?? '';
    if (a === '-h' || a === '--help') {
      io.stdout.write(runUsage());
      return { code: 0 };
    }
    if (a === '-s' || a === '--symbols' || a.startsWith('--symbols=')) {
      const { value, next } = optionValue(ours, i, '--symbols');
      symbolPattern = value;
      i = next;
      continue;
    }
    if (applyRenderFlag(a, render)) continue;
    if (a.startsWith('-')) fail(`Unknown option "${a}"`);
    if (binary !== undefined) fail(`Expected exactly one <binary> argument`);
    binary = a;
  }

  if (symbolPattern === undefined) fail(`run requires -s <regexp>`);
  if (binary === undefined) fail(`Expected exactly one <binary> argument`);
  return { command: 'run', symbolPattern, binary, mcaArgs, render: Object.freeze(render) };
}

function parseArgs(argv: string[], io: CliIo): CliCommand | CliExit {
  const [command, ...rest] = argv;
  switch (command) {
    case undefined:
    case '-h':
    case '--help':
      io.stdout.write(usage());
      return { code: 0 };
    case '-V':
    case '--version':
      io.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    case 'help': {
      const topic = rest[0];
      if (topic === undefined) {
        io.stdout.write(usage());
        return { code: 0 };
      }
      if (topic === 'fix') return parseFixArgs(['--help'], io);
      if (topic === 'run') return parseRunArgs(['--help'], io);
      return fail(`Unknown command "${topic}" (see '${PROGRAM} help')`);
    }
    case 'fix':
      return parseFixArgs(rest, io);
    case 'run':
      return parseRunArgs(rest, io);
    default:
      return fail(`Unknown command "${command}" (see '${PROGRAM} help')`);
  }
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.file !== undefined ? (d.line !== undefined ? `${d.file}:${d.line}` : d.file) : PROGRAM;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}\n`;
}

async function execute(parsed: CliCommand, io: CliIo): Promise<void> {
  if (parsed.command === 'fix') {
    await fixFile(
      {
        inputPath: parsed.inputPath,
        ...(parsed.outputPath !== undefined ? { outputPath: parsed.outputPath } : {}),
        render: parsed.render,
      },
      io.stdout,
    );
    return;
  }
  await runObjdumpMca(
    {
      symbolPattern: parsed.symbolPattern,
      binary: parsed.binary,
      mcaArgs: parsed.mcaArgs,
      render: parsed.render,
    },
    io.spawn,
  );
}

/**
 * Run the command line `argv` (without the node and script paths).
 *
 * Exit codes: 0 on success, 1 when the transform or an external program fails, 2 for usage errors.
 */
export async function runCli(
  argv: string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
): Promise<number> {
  let parsed: CliCommand | CliExit;
  try {
    parsed = parseArgs(argv, io);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    io.stderr.write(`${PROGRAM}: ${msg}\n`);
    io.stderr.write(`${usage()}\n`);
    return 2;
  }
  if ('code' in parsed) return parsed.code;

  try {
    await execute(parsed, io);
    return 0;
  } catch (err) {
    const file = parsed.command === 'fix' ? parsed.inputPath : 'go tool objdump';
    io.stderr.write(formatDiagnostic(toDiagnostic(err, file)));
    return 1;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  // Exit through exitCode so output still queued on a pipe is flushed.
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
