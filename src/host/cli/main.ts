/* eslint-disable no-console */
import { loadProgramFile } from '@core/loader/program';
import { ProgramLoadError } from '@core/cpu/errors';
import { runProgram } from '@core/harness/headless';
import { listProgram } from '@utils/disasmLs8';
import { formatTraceLine } from '@utils/trace';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_STEP_LIMIT = 3;

export const USAGE = 'Usage: ls8 <program.ls8> [--trace] [--list] [--max-steps=N]';

export interface CliArgs {
  file: string | null;
  trace: boolean;
  list: boolean;
  maxSteps: number; // 0 = no limit
  errors: string[];
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

type Env = Record<string, string | undefined>;

function getEnv(env: Env, name: string): string | null {
  const v = env[name];
  return v && v.length > 0 ? v : null;
}

function parseCount(raw: string | null): number {
  if (raw === null || !/^\d+$/.test(raw)) return 0;
  return parseInt(raw, 10);
}

export function parseArgs(argv: string[], env: Env = {}): CliArgs {
  let trace = getEnv(env, 'LS8_TRACE') === '1';
  let list = false;
  let maxSteps = parseCount(getEnv(env, 'LS8_MAX_STEPS'));
  const files: string[] = [];
  const errors: string[] = [];
  for (const a of argv) {
    if (a === '--trace') trace = true;
    else if (a === '--list') list = true;
    else if (a.startsWith('--max-steps=')) maxSteps = parseCount(a.slice(12));
    else if (a.startsWith('--')) errors.push(`Unknown option: ${a}`);
    else files.push(a);
  }
  if (files.length !== 1) errors.push(files.length === 0 ? 'Missing program file' : 'Expected exactly one program file');
  return { file: files.length === 1 ? files[0] : null, trace, list, maxSteps, errors };
}

/** Runs the simulator for the given command line and returns the process exit code. */
export function runCli(argv: string[], env: Env = {}, io: CliIO = consoleIO): number {
  const args = parseArgs(argv, env);
  if (args.errors.length > 0 || args.file === null) {
    for (const e of args.errors) io.err(e);
    io.err(USAGE);
    return EXIT_USAGE;
  }

  let program: Uint8Array;
  try {
    program = loadProgramFile(args.file);
  } catch (e) {
    if (e instanceof ProgramLoadError) {
      io.err(`${args.file}: ${e.message}`);
      return EXIT_FAILURE;
    }
    throw e;
  }

  if (args.list) {
    const read = (addr: number) => (addr < program.length ? program[addr] : 0);
    for (const line of listProgram(read, 0, program.length)) io.out(line);
    return EXIT_OK;
  }

  const result = runProgram(program, {
    maxSteps: args.maxSteps,
    output: io.out,
    trace: args.trace ? (cpu) => io.err(formatTraceLine(cpu)) : undefined,
  });
  switch (result.reason) {
    case 'halt': return EXIT_OK;
    case 'error':
      io.err(`${args.file}: ${result.message ?? 'execution failed'}`);
      return EXIT_FAILURE;
    case 'step-limit':
      io.err(`${args.file}: ${result.message ?? 'step limit reached'}`);
      return EXIT_STEP_LIMIT;
  }
}
