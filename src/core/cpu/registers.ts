import type { Byte } from './types';
import { REGISTER_COUNT, SP_REGISTER, SP_INIT, toByte, toRegisterIndex } from './types';

// R0..R7. Indices wrap onto the low 3 bits and values onto 8 bits; neither is an error.
export class RegisterFile {
  private reg = new Uint8Array(REGISTER_COUNT);

  constructor(sp: Byte = SP_INIT) {
    this.reset(sp);
  }

  get(index: number): Byte {
    return this.reg[toRegisterIndex(index)];
  }

  set(index: number, value: number): void {
    this.reg[toRegisterIndex(index)] = toByte(value);
  }

  get sp(): Byte { return this.get(SP_REGISTER); }
  set sp(value: number) { this.set(SP_REGISTER, value); }

  reset(sp: Byte = SP_INIT): void {
    this.reg.fill(0);
    this.sp = sp;
  }

  snapshot(): Byte[] { return Array.from(this.reg); }
}
