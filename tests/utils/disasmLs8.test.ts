import { describe, it, expect } from 'vitest';
import { disasmAt, formatDisasmLine, listProgram } from '@utils/disasmLs8';
import { OP } from '../helpers/cpuh';

const reader = (bytes: number[]) => (addr: number) => (addr < bytes.length ? bytes[addr] : 0);

describe('disasmLs8', () => {
  it('formats LDI with a register and an immediate', () => {
    const d = disasmAt(reader([OP.LDI, 0, 8]), 0);
    expect(d.mnemonic).toBe('LDI');
    expect(d.operand).toBe('R0,#$08');
    expect(d.len).toBe(3);
    expect(formatDisasmLine(d)).toBe('00  82 00 08  LDI R0,#$08');
  });

  it('formats register-register, single-register and bare instructions', () => {
    const read = reader([OP.CMP, 0, 1, OP.PUSH, 9, OP.RET]);
    expect(disasmAt(read, 0).operand).toBe('R0,R1');
    expect(disasmAt(read, 3).operand).toBe('R1'); // index masked like the CPU does
    const ret = disasmAt(read, 5);
    expect(ret.operand).toBe('');
    expect(formatDisasmLine(ret)).toBe('05  11        RET');
  });

  it('shows unknown opcodes as data bytes', () => {
    const d = disasmAt(reader([0xFF]), 0);
    expect(d.mnemonic).toBe('.byte');
    expect(d.len).toBe(1);
    expect(formatDisasmLine(d)).toBe('00  FF        .byte $FF');
  });

  it('lists a program linearly', () => {
    const prog = [OP.LDI, 0, 8, OP.PRN, 0, OP.HLT];
    expect(listProgram(reader(prog), 0, prog.length)).toEqual([
      '00  82 00 08  LDI R0,#$08',
      '03  47 00     PRN R0',
      '05  01        HLT',
    ]);
  });
});
