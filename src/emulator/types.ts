export type Byte = number; // 0..255
export type Word = number; // 0..65535

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START;

export const REGISTER_COUNT = 16;
export const STACK_DEPTH = 16;
export const KEY_COUNT = 16;

export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;

export const TIMER_HZ = 60;
export const FRAME_MS = 1000 / TIMER_HZ;

export interface IMemory {
  read(address: number): Byte;
  write(address: number, value: Byte): void;
  readSpan(address: number, length: number): Uint8Array;
  writeSpan(address: number, bytes: ArrayLike<number>): void;
  loadBlock(offset: number, bytes: ArrayLike<number>): void;
}

// Host-owned keypad view; the VM only reads it.
export interface IKeypad {
  isPressed(key: number): boolean;
}

// Anything the VM pulls random bytes from (Cxnn).
export interface RandomSource {
  nextByte(): Byte;
}

export interface IEmulator {
  reset(): void;
  stepInstruction(): StepResult;
}

// Control-flow outcome returned by every operation; the interpreter applies it in one place.
export type Flow =
  | { kind: 'next' }
  | { kind: 'skip' }
  | { kind: 'jump'; target: Word }
  | { kind: 'wait' };

export interface StepResult {
  pc: Word; // address the instruction was fetched from
  opcode: Word;
  flow: Flow['kind'];
}
