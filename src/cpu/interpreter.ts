import type { Byte, Flow, IKeypad, IMemory, RandomSource, StepResult, Word } from '../emulator/types';
import { KEY_COUNT } from '../emulator/types';
import { UnknownOpcodeError } from '../emulator/errors';
import type { FrameBuffer } from '../display/framebuffer';
import type { Timers } from '../timing/timers';
import { glyphAddress } from '../memory/font';
import { decode } from './decode';
import type { Instruction } from './decode';
import { RegisterFile, VF } from './registers';
import { SeededRandom } from './random';

const NEXT: Flow = { kind: 'next' };
const SKIP: Flow = { kind: 'skip' };
const WAIT: Flow = { kind: 'wait' };

const skipIf = (cond: boolean): Flow => (cond ? SKIP : NEXT);

export interface InterpreterDeps {
  memory: IMemory;
  registers: RegisterFile;
  display: FrameBuffer;
  keypad: IKeypad;
  timers: Timers;
  random?: RandomSource;
}

// Fetch-decode-execute engine. Holds no machine state of its own beyond the PRNG;
// every operation returns a Flow and the program counter is moved only in applyFlow().
export class Interpreter {
  private readonly memory: IMemory;
  private readonly regs: RegisterFile;
  private readonly display: FrameBuffer;
  private readonly keypad: IKeypad;
  private readonly timers: Timers;
  readonly random: RandomSource;

  constructor(deps: InterpreterDeps) {
    this.memory = deps.memory;
    this.regs = deps.registers;
    this.display = deps.display;
    this.keypad = deps.keypad;
    this.timers = deps.timers;
    this.random = deps.random ?? new SeededRandom();
  }

  fetch(): Word {
    const pc = this.regs.pc;
    return (this.memory.read(pc) << 8) | this.memory.read(pc + 1);
  }

  step(): StepResult {
    const pc = this.regs.pc;
    const opcode = this.fetch();
    const ins = decode(opcode);
    if (!ins) throw new UnknownOpcodeError(opcode, pc);
    const flow = this.execute(ins);
    this.applyFlow(flow);
    return { pc, opcode, flow: flow.kind };
  }

  private applyFlow(flow: Flow): void {
    switch (flow.kind) {
      case 'next': this.regs.advance(); break;
      case 'skip': this.regs.skip(); break;
      case 'jump': this.regs.jump(flow.target); break;
      case 'wait': break;
    }
  }

  private v(i: number): Byte { return this.regs.getRegister(i); }
  private setV(i: number, value: number): void { this.regs.setRegister(i, value); }

  // Result first, flag second: with x = F the flag is what remains in VF.
  private setWithFlag(x: number, value: number, flag: boolean): void {
    this.setV(x, value & 0xff);
    this.setV(VF, flag ? 1 : 0);
  }

  private execute(ins: Instruction): Flow {
    const { x, y, n, nn, nnn } = ins;
    switch (ins.op) {
      case 'CLS':
        this.display.clear();
        return NEXT;
      case 'RET':
        // The stack holds the CALL itself; resume at the instruction after it.
        return { kind: 'jump', target: (this.regs.pop() + 2) & 0xffff };
      case 'JP':
        return { kind: 'jump', target: nnn };
      case 'CALL':
        this.regs.push(this.regs.pc);
        return { kind: 'jump', target: nnn };
      case 'SE_IMM':
        return skipIf(this.v(x) === nn);
      case 'SNE_IMM':
        return skipIf(this.v(x) !== nn);
      case 'SE_REG':
        return skipIf(this.v(x) === this.v(y));
      case 'SNE_REG':
        return skipIf(this.v(x) !== this.v(y));
      case 'LD_IMM':
        this.setV(x, nn);
        return NEXT;
      case 'ADD_IMM':
        this.setV(x, (this.v(x) + nn) & 0xff);
        return NEXT;
      case 'LD_REG':
        this.setV(x, this.v(y));
        return NEXT;
      case 'OR':
        this.setV(x, this.v(x) | this.v(y));
        return NEXT;
      case 'AND':
        this.setV(x, this.v(x) & this.v(y));
        return NEXT;
      case 'XOR':
        this.setV(x, this.v(x) ^ this.v(y));
        return NEXT;
      case 'ADD_REG': {
        const sum = this.v(x) + this.v(y);
        this.setWithFlag(x, sum, sum > 0xff);
        return NEXT;
      }
      case 'SUB': {
        const a = this.v(x), b = this.v(y);
        this.setWithFlag(x, a - b, a >= b);
        return NEXT;
      }
      case 'SUBN': {
        const a = this.v(x), b = this.v(y);
        this.setWithFlag(x, b - a, b >= a);
        return NEXT;
      }
      case 'SHR': {
        const a = this.v(x);
        this.setWithFlag(x, a >> 1, (a & 0x01) !== 0);
        return NEXT;
      }
      case 'SHL': {
        const a = this.v(x);
        this.setWithFlag(x, a << 1, (a & 0x80) !== 0);
        return NEXT;
      }
      case 'LD_I':
        this.regs.I = nnn;
        return NEXT;
      case 'JP_V0':
        return { kind: 'jump', target: nnn + this.v(0) };
      case 'RND':
        this.setV(x, this.random.nextByte() & nn);
        return NEXT;
      case 'DRW': {
        const rows = n === 0 ? new Uint8Array(0) : this.memory.readSpan(this.regs.I, n);
        const collided = this.display.drawSprite(this.v(x), this.v(y), rows);
        this.setV(VF, collided ? 1 : 0);
        return NEXT;
      }
      // Only the low nibble of Vx names a key.
      case 'SKP':
        return skipIf(this.keypad.isPressed(this.v(x) & 0x0f));
      case 'SKNP':
        return skipIf(!this.keypad.isPressed(this.v(x) & 0x0f));
      case 'LD_VX_DT':
        this.setV(x, this.timers.delay);
        return NEXT;
      case 'LD_VX_K': {
        // Poll-and-retry: without a held key the same instruction runs again next step.
        for (let key = 0; key < KEY_COUNT; key++) {
          if (this.keypad.isPressed(key)) {
            this.setV(x, key);
            return NEXT;
          }
        }
        return WAIT;
      }
      case 'LD_DT_VX':
        this.timers.delay = this.v(x);
        return NEXT;
      case 'LD_ST_VX':
        this.timers.sound = this.v(x);
        return NEXT;
      case 'ADD_I_VX':
        this.regs.I = this.regs.I + this.v(x);
        return NEXT;
      case 'LD_F_VX':
        this.regs.I = glyphAddress(this.v(x));
        return NEXT;
      case 'LD_B_VX': {
        const value = this.v(x);
        this.memory.writeSpan(this.regs.I, [Math.floor(value / 100), Math.floor(value / 10) % 10, value % 10]);
        return NEXT;
      }
      case 'LD_MEM_VX':
        this.memory.writeSpan(this.regs.I, Array.from({ length: x + 1 }, (_, i) => this.v(i)));
        return NEXT;
      case 'LD_VX_MEM': {
        const bytes = this.memory.readSpan(this.regs.I, x + 1);
        bytes.forEach((b, i) => this.setV(i, b));
        return NEXT;
      }
    }
  }
}
