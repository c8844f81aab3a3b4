export type Byte = number; // 0..255
export type Word = number; // address into the 256-byte memory, 0..255

export const MEMORY_SIZE = 0x100;
export const REGISTER_COUNT = 8;
export const SP_REGISTER = 7;
export const SP_INIT = 0xF4; // stack starts just below the top of memory

export type CompareFlag = 'EQUAL' | 'LESS_THAN' | 'GREATER_THAN';

export type CPUStatus = 'running' | 'halted';

export interface CPUState {
  pc: Word;
  fl: CompareFlag | null; // null until the first CMP
  status: CPUStatus;
  steps: number; // instructions executed since reset
}

// Raw operand bytes become register indices/values only through these two masks.
export const toRegisterIndex = (raw: number): number => raw & 0x07;
export const toByte = (raw: number): Byte => raw & 0xFF;

