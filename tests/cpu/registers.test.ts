import { describe, it, expect } from 'vitest';
import { RegisterFile } from '@core/cpu/registers';

describe('RegisterFile', () => {
  it('starts zeroed with SP (R7) at $F4', () => {
    const reg = new RegisterFile();
    expect(reg.snapshot()).toEqual([0, 0, 0, 0, 0, 0, 0, 0xF4]);
    expect(reg.sp).toBe(0xF4);
  });

  it('set(i, v) then get(i mod 8) returns v mod 256 for i, v in 0..1000', () => {
    const reg = new RegisterFile();
    for (let i = 0; i <= 1000; i += 7) {
      for (let v = 0; v <= 1000; v += 13) {
        reg.set(i, v);
        expect(reg.get(i % 8)).toBe(v % 256);
      }
    }
  });

  it('aliases out-of-range indices onto the low 3 bits', () => {
    const reg = new RegisterFile();
    reg.set(9, 0x55); // 9 & 7 = 1
    expect(reg.get(1)).toBe(0x55);
    reg.set(15, 0x20); // lands on SP
    expect(reg.sp).toBe(0x20);
  });

  it('sp accessor wraps like any register', () => {
    const reg = new RegisterFile(0);
    reg.sp = reg.sp - 1;
    expect(reg.get(7)).toBe(0xFF);
    reg.sp = reg.sp + 1;
    expect(reg.get(7)).toBe(0x00);
  });

  it('reset clears registers and reinitializes SP', () => {
    const reg = new RegisterFile();
    reg.set(3, 7);
    reg.reset(0x80);
    expect(reg.snapshot()).toEqual([0, 0, 0, 0, 0, 0, 0, 0x80]);
  });
});
