import type { Byte, CompareFlag, CPUState, Word } from './types';
import { SP_INIT } from './types';
import { Memory } from '@core/bus/memory';
import { RegisterFile } from './registers';
import { ALU } from './alu';
import { decode } from './dispatch';
import type { ExecContext } from './dispatch';

export type OutputSink = (line: string) => void;
export type TraceHook = (cpu: LS8CPU) => void;

// eslint-disable-next-line no-console
const stdoutSink: OutputSink = (line) => console.log(line);

export class LS8CPU implements ExecContext {
  readonly mem = new Memory();
  readonly reg = new RegisterFile();
  readonly alu = new ALU(this.reg);
  state: CPUState = { pc: 0, fl: null, status: 'running', steps: 0 };
  // The error that stopped the CPU, if it did not stop on HLT
  haltReason: Error | null = null;
  private output: OutputSink = stdoutSink;
  private traceHook: TraceHook | null = null;

  constructor(opts: { output?: OutputSink } = {}) {
    if (opts.output) this.output = opts.output;
    this.reset();
  }

  setOutput(fn: OutputSink) { this.output = fn; }
  // Called before every instruction (for trace printers and debuggers)
  setTraceHook(fn: TraceHook | null) { this.traceHook = fn; }

  get pc(): Word { return this.state.pc; }
  get fl(): CompareFlag | null { return this.state.fl; }
  get halted(): boolean { return this.state.status === 'halted'; }

  setFlag(fl: CompareFlag | null): void { this.state.fl = fl; }
  halt(): void { this.state.status = 'halted'; }
  print(value: Byte): void { this.output(String(value)); }

  load(program: ArrayLike<number>, offset = 0): void {
    this.mem.load(program, offset);
  }

  // Registers, PC and flag back to power-on; memory (the loaded program) is kept.
  reset(): void {
    this.reg.reset(SP_INIT);
    this.state = { pc: 0, fl: null, status: 'running', steps: 0 };
    this.haltReason = null;
  }

  clearMemory(): void { this.mem.reset(); }

  step(): void {
    if (this.halted) return;
    if (this.traceHook) this.traceHook(this);

    const pc = this.state.pc;
    try {
      const opcode = this.mem.read(pc);
      // Operands are always prefetched; only `operands` of them are meaningful.
      const a = this.mem.read((pc + 1) & 0xFF);
      const b = this.mem.read((pc + 2) & 0xFF);
      const ins = decode(opcode, pc);
      const target = ins.handler(this, a, b);
      this.state.pc = typeof target === 'number' ? target & 0xFF : (pc + 1 + ins.operands) & 0xFF;
      this.state.steps++;
    } catch (e) {
      this.haltReason = e instanceof Error ? e : new Error(String(e));
      this.halt();
      throw e;
    }
  }

  /** Steps until HLT. Returns the number of instructions executed by this call. */
  runToHalt(): number {
    const start = this.state.steps;
    while (!this.halted) this.step();
    return this.state.steps - start;
  }
}
