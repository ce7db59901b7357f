import type { Word } from './types';

export type VmErrorCode =
  | 'OutOfBoundsMemoryAccess'
  | 'InvalidRegisterIndex'
  | 'StackOverflow'
  | 'StackUnderflow'
  | 'UnknownOpcode';

const hex = (v: number, width: number) => v.toString(16).toUpperCase().padStart(width, '0');

// Faults raised by the machine. None of them are retryable: the program or the VM is broken.
export abstract class VmError extends Error {
  abstract readonly code: VmErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class OutOfBoundsMemoryAccessError extends VmError {
  readonly code = 'OutOfBoundsMemoryAccess';

  constructor(public readonly address: number, public readonly length = 1) {
    super(
      length === 1
        ? `Memory access out of range: 0x${hex(address, 4)}`
        : `Memory access out of range: 0x${hex(address, 4)}+${length}`,
    );
  }
}

export class InvalidRegisterIndexError extends VmError {
  readonly code = 'InvalidRegisterIndex';

  constructor(public readonly index: number) {
    super(`Invalid register index: ${index}`);
  }
}

export class StackOverflowError extends VmError {
  readonly code = 'StackOverflow';

  constructor(public readonly depth: number) {
    super(`Call stack overflow at depth ${depth}`);
  }
}

export class StackUnderflowError extends VmError {
  readonly code = 'StackUnderflow';

  constructor() {
    super('Return with empty call stack');
  }
}

export class UnknownOpcodeError extends VmError {
  readonly code = 'UnknownOpcode';

  constructor(public readonly opcode: Word, public readonly pc: Word) {
    super(`Unknown opcode ${hex(opcode, 4)} at 0x${hex(pc, 3)}`);
  }
}

export function isVmError(e: unknown): e is VmError {
  return e instanceof VmError;
}
