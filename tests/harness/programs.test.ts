import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadProgramFile } from '@core/loader/program';
import { runProgram } from '@core/harness/headless';
import { OP } from '@test/helpers/cpuh';

const programPath = (name: string) => fileURLToPath(new URL(`../../programs/${name}`, import.meta.url));

describe('sample programs', () => {
  const cases: [string, string[]][] = [
    ['print8.ls8', ['8']],
    ['add.ls8', ['17']],
    ['mult.ls8', ['72']],
    ['stack.ls8', ['5']],
    ['countdown.ls8', ['0']],
    ['call.ls8', ['20', '30']],
    ['branch.ls8', ['1', '2']],
  ];
  for (const [name, expected] of cases) {
    it(`${name} halts and prints ${expected.join(', ')}`, () => {
      const result = runProgram(loadProgramFile(programPath(name)));
      expect(result.reason).toBe('halt');
      expect(result.output).toEqual(expected);
      expect(result.cpu.reg.sp).toBe(0xF4);
    });
  }
});

describe('runProgram', () => {
  it('reports fatal errors instead of throwing', () => {
    const result = runProgram([OP.LDI, 0, 1, 0b11111111]);
    expect(result.reason).toBe('error');
    expect(result.steps).toBe(1);
    expect(result.message).toBe('Invalid opcode $FF (0b11111111) at $03');
    expect(result.cpu.halted).toBe(true);
  });

  it('stops a runaway program at maxSteps', () => {
    const result = runProgram([OP.JMP, 0], { maxSteps: 50 }); // R0 = 0: jumps to itself
    expect(result.reason).toBe('step-limit');
    expect(result.steps).toBe(50);
    expect(result.message).toBe('Stopped after 50 instructions');
    expect(result.cpu.halted).toBe(false);
  });

  it('forwards output and calls the trace hook per instruction', () => {
    const seen: string[] = [];
    const pcs: number[] = [];
    const result = runProgram([OP.LDI, 0, 42, OP.PRN, 0, OP.HLT], {
      output: (line) => seen.push(line),
      trace: (cpu) => pcs.push(cpu.state.pc),
    });
    expect(result.output).toEqual(['42']);
    expect(seen).toEqual(['42']);
    expect(pcs).toEqual([0, 3, 5]);
    expect(result.steps).toBe(3);
  });
});
