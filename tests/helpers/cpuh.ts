import { LS8CPU } from '@core/cpu/cpu';

// Fresh CPU with `bytes` loaded at address 0 and PRN output captured.
export function cpuWithProgram(bytes: number[]) {
  const output: string[] = [];
  const cpu = new LS8CPU({ output: (line) => output.push(line) });
  cpu.load(bytes);
  return { cpu, output };
}

// Opcode bytes, for readable test programs
export const OP = {
  HLT: 0b00000001,
  LDI: 0b10000010,
  PRN: 0b01000111,
  ADD: 0b10100000,
  SUB: 0b10100001,
  MUL: 0b10100010,
  INC: 0b01100101,
  DEC: 0b01100110,
  CMP: 0b10100111,
  PUSH: 0b01000101,
  POP: 0b01000110,
  CALL: 0b01010000,
  RET: 0b00010001,
  JMP: 0b01010100,
  JEQ: 0b01010101,
  JNE: 0b01010110,
} as const;
