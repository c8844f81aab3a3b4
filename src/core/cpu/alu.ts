import type { CompareFlag } from './types';
import { RegisterFile } from './registers';
import { UnsupportedAluOperationError } from './errors';

export type AluOp = 'ADD' | 'SUB' | 'MUL' | 'INC' | 'DEC' | 'CMP';

/**
 * Register-to-register arithmetic. Results go back through the register file,
 * so every one of them is reduced to 8 bits (ADD/SUB/MUL included).
 */
export class ALU {
  constructor(private readonly reg: RegisterFile) {}

  /** Runs `op` on R[a], R[b]. Returns the new compare flag for CMP, otherwise null. */
  execute(op: AluOp, a: number, b: number): CompareFlag | null {
    const r = this.reg;
    switch (op) {
      case 'ADD': r.set(a, r.get(a) + r.get(b)); return null;
      case 'SUB': r.set(a, r.get(a) - r.get(b)); return null;
      case 'MUL': r.set(a, r.get(a) * r.get(b)); return null;
      case 'INC': r.set(a, r.get(a) + 1); return null;
      case 'DEC': r.set(a, r.get(a) - 1); return null;
      case 'CMP': return this.compare(a, b);
      default: {
        // only reachable when a caller bypasses the AluOp type
        const unknown: never = op;
        throw new UnsupportedAluOperationError(String(unknown));
      }
    }
  }

  compare(a: number, b: number): CompareFlag {
    const va = this.reg.get(a);
    const vb = this.reg.get(b);
    if (va === vb) return 'EQUAL';
    return va < vb ? 'LESS_THAN' : 'GREATER_THAN';
  }
}
