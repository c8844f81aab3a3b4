import type { LS8CPU } from '@core/cpu/cpu';
import { disasmAt } from './disasmLs8';

const hex2 = (v: number) => (v & 0xFF).toString(16).toUpperCase().padStart(2, '0');

/**
 * One line of CPU state before an instruction executes:
 * `TRACE: PC | OP A B | R0 .. R7 | MNEMONIC OPERANDS`
 */
export function formatTraceLine(cpu: LS8CPU): string {
  const pc = cpu.state.pc;
  const rd = (addr: number) => cpu.mem.read(addr & 0xFF);
  const fetched = [rd(pc), rd(pc + 1), rd(pc + 2)].map(hex2).join(' ');
  const regs = cpu.reg.snapshot().map(hex2).join(' ');
  const d = disasmAt(rd, pc);
  const text = d.operand ? `${d.mnemonic} ${d.operand}` : d.mnemonic;
  return `TRACE: ${hex2(pc)} | ${fetched} | ${regs} | ${text}`;
}
