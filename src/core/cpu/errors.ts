import type { Byte, Word } from './types';

const hex2 = (v: number) => '$' + (v & 0xFF).toString(16).toUpperCase().padStart(2, '0');

export class LS8Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidOpcodeError extends LS8Error {
  constructor(public readonly opcode: Byte, public readonly pc: Word) {
    super(`Invalid opcode ${hex2(opcode)} (0b${opcode.toString(2).padStart(8, '0')}) at ${hex2(pc)}`);
  }
}

export class UnsupportedAluOperationError extends LS8Error {
  constructor(public readonly operation: string) {
    super(`Unsupported ALU operation: ${operation}`);
  }
}

export class AddressOutOfRangeError extends LS8Error {
  constructor(public readonly address: number) {
    super(`Memory address out of range: ${address} (valid: 0..255)`);
  }
}

export class ProgramLoadError extends LS8Error {}

export class MalformedProgramLineError extends ProgramLoadError {
  constructor(public readonly lineNumber: number, public readonly text: string) {
    super(`Invalid number on line ${lineNumber}: ${text}`);
  }
}

export class ProgramFileNotFoundError extends ProgramLoadError {
  constructor(public readonly path: string) {
    super(`Could not find file: ${path}`);
  }
}

export class ProgramTooLargeError extends ProgramLoadError {
  constructor(public readonly size: number) {
    super(`Program is ${size} bytes; memory holds 256`);
  }
}
