import { describe, it, expect } from 'vitest';
import { decode } from '../../src/cpu/decode';

describe('decode', () => {
  it('extracts operand fields', () => {
    const ins = decode(0xd125);
    expect(ins).toEqual({ op: 'DRW', opcode: 0xd125, x: 1, y: 2, n: 5, nn: 0x25, nnn: 0x125 });
  });

  it('maps every documented pattern', () => {
    const table: Array<[number, string]> = [
      [0x00e0, 'CLS'], [0x00ee, 'RET'], [0x1234, 'JP'], [0x2345, 'CALL'],
      [0x3a12, 'SE_IMM'], [0x4a12, 'SNE_IMM'], [0x5ab0, 'SE_REG'], [0x6a12, 'LD_IMM'],
      [0x7a12, 'ADD_IMM'], [0x8ab0, 'LD_REG'], [0x8ab1, 'OR'], [0x8ab2, 'AND'],
      [0x8ab3, 'XOR'], [0x8ab4, 'ADD_REG'], [0x8ab5, 'SUB'], [0x8ab6, 'SHR'],
      [0x8ab7, 'SUBN'], [0x8abe, 'SHL'], [0x9ab0, 'SNE_REG'], [0xa123, 'LD_I'],
      [0xb123, 'JP_V0'], [0xca12, 'RND'], [0xdab3, 'DRW'], [0xea9e, 'SKP'],
      [0xeaa1, 'SKNP'], [0xfa07, 'LD_VX_DT'], [0xfa0a, 'LD_VX_K'], [0xfa15, 'LD_DT_VX'],
      [0xfa18, 'LD_ST_VX'], [0xfa1e, 'ADD_I_VX'], [0xfa29, 'LD_F_VX'], [0xfa33, 'LD_B_VX'],
      [0xfa55, 'LD_MEM_VX'], [0xfa65, 'LD_VX_MEM'],
    ];
    for (const [opcode, op] of table) expect(decode(opcode)?.op).toBe(op);
  });

  it('returns undefined for unmatched words', () => {
    for (const opcode of [0x0000, 0x0123, 0x00e1, 0x5ab1, 0x8ab8, 0x8abf, 0x9ab1, 0xea9f, 0xf000, 0xfa56, 0xffff]) {
      expect(decode(opcode)).toBeUndefined();
    }
  });
});
