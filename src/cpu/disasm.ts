import type { Word } from '../emulator/types';
import { decode } from './decode';
import type { Instruction } from './decode';

const h = (v: number, width: number) => '0x' + v.toString(16).toUpperCase().padStart(width, '0');
const reg = (i: number) => 'V' + i.toString(16).toUpperCase();

function format(ins: Instruction): string {
  const { x, y, n, nn, nnn } = ins;
  switch (ins.op) {
    case 'CLS': return 'CLS';
    case 'RET': return 'RET';
    case 'JP': return `JP ${h(nnn, 3)}`;
    case 'CALL': return `CALL ${h(nnn, 3)}`;
    case 'SE_IMM': return `SE ${reg(x)}, ${h(nn, 2)}`;
    case 'SNE_IMM': return `SNE ${reg(x)}, ${h(nn, 2)}`;
    case 'SE_REG': return `SE ${reg(x)}, ${reg(y)}`;
    case 'LD_IMM': return `LD ${reg(x)}, ${h(nn, 2)}`;
    case 'ADD_IMM': return `ADD ${reg(x)}, ${h(nn, 2)}`;
    case 'LD_REG': return `LD ${reg(x)}, ${reg(y)}`;
    case 'OR': return `OR ${reg(x)}, ${reg(y)}`;
    case 'AND': return `AND ${reg(x)}, ${reg(y)}`;
    case 'XOR': return `XOR ${reg(x)}, ${reg(y)}`;
    case 'ADD_REG': return `ADD ${reg(x)}, ${reg(y)}`;
    case 'SUB': return `SUB ${reg(x)}, ${reg(y)}`;
    case 'SHR': return `SHR ${reg(x)}`;
    case 'SUBN': return `SUBN ${reg(x)}, ${reg(y)}`;
    case 'SHL': return `SHL ${reg(x)}`;
    case 'SNE_REG': return `SNE ${reg(x)}, ${reg(y)}`;
    case 'LD_I': return `LD I, ${h(nnn, 3)}`;
    case 'JP_V0': return `JP V0, ${h(nnn, 3)}`;
    case 'RND': return `RND ${reg(x)}, ${h(nn, 2)}`;
    case 'DRW': return `DRW ${reg(x)}, ${reg(y)}, ${n}`;
    case 'SKP': return `SKP ${reg(x)}`;
    case 'SKNP': return `SKNP ${reg(x)}`;
    case 'LD_VX_DT': return `LD ${reg(x)}, DT`;
    case 'LD_VX_K': return `LD ${reg(x)}, K`;
    case 'LD_DT_VX': return `LD DT, ${reg(x)}`;
    case 'LD_ST_VX': return `LD ST, ${reg(x)}`;
    case 'ADD_I_VX': return `ADD I, ${reg(x)}`;
    case 'LD_F_VX': return `LD F, ${reg(x)}`;
    case 'LD_B_VX': return `LD B, ${reg(x)}`;
    case 'LD_MEM_VX': return `LD [I], ${reg(x)}`;
    case 'LD_VX_MEM': return `LD ${reg(x)}, [I]`;
  }
}

// Assembly-style text for one instruction word; unknown words render as raw data.
export function disassemble(opcode: Word): string {
  const ins = decode(opcode);
  return ins ? format(ins) : `DW ${h(opcode & 0xffff, 4)}`;
}

export interface ListingLine {
  address: number;
  opcode: Word;
  text: string;
}

// Disassemble a program image word by word, starting at `origin`. A trailing odd byte
// is listed as a single data byte.
export function disassembleProgram(program: ArrayLike<number>, origin = 0x200): ListingLine[] {
  const out: ListingLine[] = [];
  let off = 0;
  for (; off + 1 < program.length; off += 2) {
    const opcode = ((program[off] & 0xff) << 8) | (program[off + 1] & 0xff);
    out.push({ address: origin + off, opcode, text: disassemble(opcode) });
  }
  if (off < program.length) {
    const b = program[off] & 0xff;
    out.push({ address: origin + off, opcode: b, text: `DB ${h(b, 2)}` });
  }
  return out;
}
