import type { Byte, Word } from '@core/cpu/types';
import { lookup } from '@core/cpu/dispatch';
import type { Mnemonic } from '@core/cpu/dispatch';

export type ReadByteFn = (addr: Word) => Byte;

export interface Disasm {
  pc: Word;
  opcode: Byte;
  bytes: Byte[];
  len: 1 | 2 | 3;
  mnemonic: string;
  operand: string;
}

type OperandKind = 'REG' | 'IMM';

// How each operand slot prints. Everything not listed takes register operands.
const IMMEDIATE_SECOND: ReadonlySet<Mnemonic> = new Set<Mnemonic>(['LDI']);

const hex2 = (v: number) => (v & 0xFF).toString(16).toUpperCase().padStart(2, '0');

function formatOperand(kind: OperandKind, v: Byte): string {
  return kind === 'IMM' ? `#$${hex2(v)}` : `R${v & 0x07}`;
}

export function disasmAt(read: ReadByteFn, pc: Word): Disasm {
  const at = pc & 0xFF;
  const opcode = read(at) & 0xFF;
  const d = lookup(opcode);
  if (!d) {
    return { pc: at, opcode, bytes: [opcode], len: 1, mnemonic: '.byte', operand: `$${hex2(opcode)}` };
  }
  const bytes = [opcode];
  for (let i = 1; i <= d.operands; i++) bytes.push(read((at + i) & 0xFF) & 0xFF);
  const parts: string[] = [];
  if (d.operands >= 1) parts.push(formatOperand('REG', bytes[1]));
  if (d.operands === 2) parts.push(formatOperand(IMMEDIATE_SECOND.has(d.mnemonic) ? 'IMM' : 'REG', bytes[2]));
  const len: 1 | 2 | 3 = d.operands === 0 ? 1 : d.operands === 1 ? 2 : 3;
  return { pc: at, opcode, bytes, len, mnemonic: d.mnemonic, operand: parts.join(',') };
}

// "AA  OP A B   MNEMONIC OPERANDS"
export function formatDisasmLine(d: Disasm): string {
  const raw = d.bytes.map(hex2).join(' ').padEnd(8, ' ');
  const text = d.operand ? `${d.mnemonic} ${d.operand}` : d.mnemonic;
  return `${hex2(d.pc)}  ${raw}  ${text}`;
}

/** Linear listing from `start` up to (not including) `end`. */
export function listProgram(read: ReadByteFn, start: Word, end: Word): string[] {
  const lines: string[] = [];
  let pc = start;
  while (pc < end) {
    const d = disasmAt(read, pc);
    lines.push(formatDisasmLine(d));
    pc += d.len;
  }
  return lines;
}
