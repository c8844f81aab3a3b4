import type { Byte, Word } from '@core/cpu/types';
import { MEMORY_SIZE, toByte } from '@core/cpu/types';
import { AddressOutOfRangeError } from '@core/cpu/errors';

// Flat 256-byte RAM. Unlike the register file, addresses are never wrapped here:
// every address the CPU produces is already in range, so a bad one is a bug.
export class Memory {
  readonly size = MEMORY_SIZE;
  private ram = new Uint8Array(MEMORY_SIZE);

  private check(addr: number): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= MEMORY_SIZE) throw new AddressOutOfRangeError(addr);
  }

  read(addr: Word): Byte {
    this.check(addr);
    return this.ram[addr];
  }

  write(addr: Word, value: number): void {
    this.check(addr);
    this.ram[addr] = toByte(value);
  }

  load(data: ArrayLike<number>, offset = 0): void {
    if (data.length === 0) return;
    this.check(offset);
    this.check(offset + data.length - 1);
    for (let i = 0; i < data.length; i++) this.ram[offset + i] = toByte(data[i]);
  }

  reset(): void { this.ram.fill(0); }

  snapshot(): Uint8Array { return this.ram.slice(); }
}
