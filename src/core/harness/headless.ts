import { LS8CPU } from '@core/cpu/cpu';
import type { TraceHook } from '@core/cpu/cpu';

export interface RunOpts {
  maxSteps?: number; // 0 or absent = run until HLT
  output?: (line: string) => void;
  trace?: TraceHook;
}

export interface RunResult {
  steps: number;
  reason: 'halt' | 'error' | 'step-limit';
  output: string[];
  message?: string;
  cpu: LS8CPU;
}

/** Loads `program` at address 0 into a fresh CPU and runs it. Errors are reported, not thrown. */
export function runProgram(program: ArrayLike<number>, opts: RunOpts = {}): RunResult {
  const output: string[] = [];
  const cpu = new LS8CPU({
    output: (line) => {
      output.push(line);
      if (opts.output) opts.output(line);
    },
  });
  cpu.load(program);
  if (opts.trace) cpu.setTraceHook(opts.trace);

  const maxSteps = opts.maxSteps && opts.maxSteps > 0 ? opts.maxSteps : Number.POSITIVE_INFINITY;
  while (!cpu.halted) {
    if (cpu.state.steps >= maxSteps) {
      return { steps: cpu.state.steps, reason: 'step-limit', output, message: `Stopped after ${cpu.state.steps} instructions`, cpu };
    }
    try {
      cpu.step();
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      return { steps: cpu.state.steps, reason: 'error', output, message, cpu };
    }
  }
  return { steps: cpu.state.steps, reason: 'halt', output, cpu };
}
