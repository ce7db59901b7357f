import type { Byte, Word } from '../emulator/types';
import { REGISTER_COUNT, STACK_DEPTH, PROGRAM_START } from '../emulator/types';
import { InvalidRegisterIndexError, StackOverflowError, StackUnderflowError } from '../emulator/errors';

export const VF = 0xf;

export interface RegisterSnapshot {
  readonly V: readonly Byte[];
  readonly I: Word;
  readonly PC: Word;
  readonly stack: readonly Word[];
}

// V0-VF, the address register I, the program counter and the return-address stack.
// VF doubles as the flag register for carry, borrow, shift-out and sprite collision.
export class RegisterFile {
  private readonly v = new Uint8Array(REGISTER_COUNT);
  private readonly stack = new Uint16Array(STACK_DEPTH);
  private sp = 0;
  private _i: Word = 0;
  private _pc: Word = PROGRAM_START;

  reset(): void {
    this.v.fill(0);
    this.stack.fill(0);
    this.sp = 0;
    this._i = 0;
    this._pc = PROGRAM_START;
  }

  getRegister(index: number): Byte {
    this.checkIndex(index);
    return this.v[index];
  }

  setRegister(index: number, value: Byte): void {
    this.checkIndex(index);
    this.v[index] = value & 0xff;
  }

  get I(): Word { return this._i; }
  set I(value: Word) { this._i = value & 0xffff; }

  get pc(): Word { return this._pc; }

  get stackDepth(): number { return this.sp; }

  push(address: Word): void {
    if (this.sp >= STACK_DEPTH) throw new StackOverflowError(this.sp);
    this.stack[this.sp++] = address & 0xffff;
  }

  pop(): Word {
    if (this.sp === 0) throw new StackUnderflowError();
    return this.stack[--this.sp];
  }

  advance(): void { this._pc = (this._pc + 2) & 0xffff; }
  skip(): void { this._pc = (this._pc + 4) & 0xffff; }
  jump(address: Word): void { this._pc = address & 0xffff; }

  snapshot(): RegisterSnapshot {
    return {
      V: Array.from(this.v),
      I: this._i,
      PC: this._pc,
      stack: Array.from(this.stack.subarray(0, this.sp)),
    };
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= REGISTER_COUNT) {
      throw new InvalidRegisterIndexError(index);
    }
  }
}
