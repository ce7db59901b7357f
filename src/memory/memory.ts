import type { IMemory, Byte } from '../emulator/types';
import { MEMORY_SIZE, PROGRAM_START, MAX_PROGRAM_SIZE } from '../emulator/types';
import { OutOfBoundsMemoryAccessError } from '../emulator/errors';
import { FONT, FONT_BASE } from './font';

// Flat 4KB address space. The font lives in the reserved area below 0x200.
export class Memory implements IMemory {
  private readonly mem = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.reset();
  }

  reset(): void {
    this.mem.fill(0);
    this.mem.set(FONT, FONT_BASE);
  }

  get size(): number {
    return MEMORY_SIZE;
  }

  read(address: number): Byte {
    this.check(address, 1);
    return this.mem[address];
  }

  write(address: number, value: Byte): void {
    this.check(address, 1);
    this.mem[address] = value & 0xff;
  }

  // Copy of [address, address+length); the whole span must be addressable.
  readSpan(address: number, length: number): Uint8Array {
    this.check(address, length);
    return this.mem.slice(address, address + length);
  }

  // All-or-nothing: nothing is written unless the whole span fits.
  writeSpan(address: number, bytes: ArrayLike<number>): void {
    this.loadBlock(address, bytes);
  }

  loadBlock(offset: number, bytes: ArrayLike<number>): void {
    this.check(offset, bytes.length);
    for (let i = 0; i < bytes.length; i++) this.mem[offset + i] = bytes[i] & 0xff;
  }

  loadProgram(program: ArrayLike<number>): void {
    if (program.length > MAX_PROGRAM_SIZE) {
      throw new OutOfBoundsMemoryAccessError(PROGRAM_START, program.length);
    }
    this.loadBlock(PROGRAM_START, program);
  }

  private check(address: number, length: number): void {
    if (!Number.isInteger(address) || address < 0 || length < 0 || address + length > MEMORY_SIZE) {
      throw new OutOfBoundsMemoryAccessError(address, length);
    }
  }
}
