import type { Byte, CompareFlag, Word } from './types';
import { InvalidOpcodeError } from './errors';
import type { RegisterFile } from './registers';
import type { ALU } from './alu';
import type { Memory } from '@core/bus/memory';

export type Mnemonic =
  | 'HLT' | 'LDI' | 'PRN'
  | 'ADD' | 'SUB' | 'MUL' | 'INC' | 'DEC' | 'CMP'
  | 'PUSH' | 'POP' | 'CALL' | 'RET'
  | 'JMP' | 'JEQ' | 'JNE';

export type OperandCount = 0 | 1 | 2;

// What a handler may touch. The CPU implements this; tests can too.
export interface ExecContext {
  readonly pc: Word;
  readonly fl: CompareFlag | null;
  readonly reg: RegisterFile;
  readonly mem: Memory;
  readonly alu: ALU;
  setFlag(fl: CompareFlag | null): void;
  halt(): void;
  print(value: Byte): void;
}

// Return a word to redirect the PC; return nothing to fall through to the next instruction.
export type Handler = (ctx: ExecContext, a: Byte, b: Byte) => Word | void;

export interface InstructionDef {
  readonly opcode: Byte;
  readonly mnemonic: Mnemonic;
  readonly operands: OperandCount;
  readonly handler: Handler;
}

const push = (ctx: ExecContext, value: Byte) => {
  ctx.reg.sp = ctx.reg.sp - 1;
  ctx.mem.write(ctx.reg.sp, value);
};

const pop = (ctx: ExecContext): Byte => {
  const v = ctx.mem.read(ctx.reg.sp);
  ctx.reg.sp = ctx.reg.sp + 1;
  return v;
};

const T: (InstructionDef | undefined)[] = new Array(256).fill(undefined);
export const INSTRUCTIONS: InstructionDef[] = [];

function def(opcode: Byte, mnemonic: Mnemonic, operands: OperandCount, handler: Handler) {
  if (T[opcode]) throw new Error(`Duplicate opcode $${opcode.toString(16)}: ${mnemonic}`);
  const d: InstructionDef = { opcode, mnemonic, operands, handler };
  T[opcode] = d;
  INSTRUCTIONS.push(d);
}

// Opcode layout: AABCDDDD, AA = operand count, B = ALU op, C = sets PC.
def(0b00000001, 'HLT', 0, (ctx) => { ctx.halt(); });
def(0b10000010, 'LDI', 2, (ctx, a, b) => { ctx.reg.set(a, b); });
def(0b01000111, 'PRN', 1, (ctx, a) => { ctx.print(ctx.reg.get(a)); });

def(0b10100000, 'ADD', 2, (ctx, a, b) => { ctx.alu.execute('ADD', a, b); });
def(0b10100001, 'SUB', 2, (ctx, a, b) => { ctx.alu.execute('SUB', a, b); });
def(0b10100010, 'MUL', 2, (ctx, a, b) => { ctx.alu.execute('MUL', a, b); });
def(0b01100101, 'INC', 1, (ctx, a) => { ctx.alu.execute('INC', a, 0); });
def(0b01100110, 'DEC', 1, (ctx, a) => { ctx.alu.execute('DEC', a, 0); });
def(0b10100111, 'CMP', 2, (ctx, a, b) => { ctx.setFlag(ctx.alu.execute('CMP', a, b)); });

def(0b01000101, 'PUSH', 1, (ctx, a) => { push(ctx, ctx.reg.get(a)); });
def(0b01000110, 'POP', 1, (ctx, a) => { ctx.reg.set(a, pop(ctx)); });
// return address = the byte after CALL's single operand
def(0b01010000, 'CALL', 1, (ctx, a) => { push(ctx, (ctx.pc + 2) & 0xFF); return ctx.reg.get(a); });
def(0b00010001, 'RET', 0, (ctx) => pop(ctx));

def(0b01010100, 'JMP', 1, (ctx, a) => ctx.reg.get(a));
def(0b01010101, 'JEQ', 1, (ctx, a) => { if (ctx.fl === 'EQUAL') return ctx.reg.get(a); });
def(0b01010110, 'JNE', 1, (ctx, a) => { if (ctx.fl !== 'EQUAL') return ctx.reg.get(a); });

export const lookup = (opcode: Byte): InstructionDef | undefined => T[opcode & 0xFF];

export function decode(opcode: Byte, pc: Word): InstructionDef {
  const d = lookup(opcode);
  if (!d) throw new InvalidOpcodeError(opcode, pc);
  return d;
}

