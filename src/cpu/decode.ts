import type { Word } from '../emulator/types';

export type Op =
  | 'CLS' | 'RET' | 'JP' | 'CALL'
  | 'SE_IMM' | 'SNE_IMM' | 'SE_REG' | 'LD_IMM' | 'ADD_IMM'
  | 'LD_REG' | 'OR' | 'AND' | 'XOR' | 'ADD_REG' | 'SUB' | 'SHR' | 'SUBN' | 'SHL'
  | 'SNE_REG' | 'LD_I' | 'JP_V0' | 'RND' | 'DRW' | 'SKP' | 'SKNP'
  | 'LD_VX_DT' | 'LD_VX_K' | 'LD_DT_VX' | 'LD_ST_VX' | 'ADD_I_VX'
  | 'LD_F_VX' | 'LD_B_VX' | 'LD_MEM_VX' | 'LD_VX_MEM';

export interface Instruction {
  readonly op: Op;
  readonly opcode: Word;
  readonly x: number;   // bits 8-11
  readonly y: number;   // bits 4-7
  readonly n: number;   // low nibble
  readonly nn: number;  // low byte
  readonly nnn: number; // low 12 bits
}

// ALU group 8xyN, indexed by the low nibble
const ALU_OPS: Partial<Record<number, Op>> = {
  0x0: 'LD_REG',
  0x1: 'OR',
  0x2: 'AND',
  0x3: 'XOR',
  0x4: 'ADD_REG',
  0x5: 'SUB',
  0x6: 'SHR',
  0x7: 'SUBN',
  0xe: 'SHL',
};

// Fx group, indexed by the low byte
const MISC_OPS: Partial<Record<number, Op>> = {
  0x07: 'LD_VX_DT',
  0x0a: 'LD_VX_K',
  0x15: 'LD_DT_VX',
  0x18: 'LD_ST_VX',
  0x1e: 'ADD_I_VX',
  0x29: 'LD_F_VX',
  0x33: 'LD_B_VX',
  0x55: 'LD_MEM_VX',
  0x65: 'LD_VX_MEM',
};

function selectOp(opcode: Word): Op | undefined {
  const n = opcode & 0x000f;
  const nn = opcode & 0x00ff;
  switch (opcode >> 12) {
    case 0x0:
      if (opcode === 0x00e0) return 'CLS';
      if (opcode === 0x00ee) return 'RET';
      return undefined;
    case 0x1: return 'JP';
    case 0x2: return 'CALL';
    case 0x3: return 'SE_IMM';
    case 0x4: return 'SNE_IMM';
    case 0x5: return n === 0 ? 'SE_REG' : undefined;
    case 0x6: return 'LD_IMM';
    case 0x7: return 'ADD_IMM';
    case 0x8: return ALU_OPS[n];
    case 0x9: return n === 0 ? 'SNE_REG' : undefined;
    case 0xa: return 'LD_I';
    case 0xb: return 'JP_V0';
    case 0xc: return 'RND';
    case 0xd: return 'DRW';
    case 0xe:
      if (nn === 0x9e) return 'SKP';
      if (nn === 0xa1) return 'SKNP';
      return undefined;
    case 0xf: return MISC_OPS[nn];
    default: return undefined;
  }
}

// Split a 16-bit instruction word into its operation and operand fields.
// Returns undefined for words that match no instruction.
export function decode(opcode: Word): Instruction | undefined {
  const word = opcode & 0xffff;
  const op = selectOp(word);
  if (op === undefined) return undefined;
  return {
    op,
    opcode: word,
    x: (word >> 8) & 0x0f,
    y: (word >> 4) & 0x0f,
    n: word & 0x000f,
    nn: word & 0x00ff,
    nnn: word & 0x0fff,
  };
}
