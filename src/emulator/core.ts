import type { IEmulator, RandomSource, StepResult } from './types';
import { Memory } from '../memory/memory';
import { RegisterFile } from '../cpu/registers';
import { FrameBuffer } from '../display/framebuffer';
import { Keypad } from '../input/keypad';
import { Timers, TimerClock } from '../timing/timers';
import { Interpreter } from '../cpu/interpreter';
import { SeededRandom } from '../cpu/random';

export interface MachineOptions {
  seed?: number;
  random?: RandomSource; // overrides seed
}

// Owns every piece of machine state and the interpreter operating on it.
export class Machine implements IEmulator {
  readonly memory = new Memory();
  readonly registers = new RegisterFile();
  readonly display = new FrameBuffer();
  readonly keypad = new Keypad();
  readonly timers = new Timers();
  readonly clock = new TimerClock(this.timers);
  readonly cpu: Interpreter;
  private program: Uint8Array = new Uint8Array(0);

  constructor(opts: MachineOptions = {}) {
    const random = opts.random ?? new SeededRandom(opts.seed);
    this.cpu = new Interpreter({
      memory: this.memory,
      registers: this.registers,
      display: this.display,
      keypad: this.keypad,
      timers: this.timers,
      random,
    });
  }

  static fromProgram(program: Uint8Array, opts: MachineOptions = {}): Machine {
    const m = new Machine(opts);
    m.loadProgram(program);
    return m;
  }

  loadProgram(program: Uint8Array): void {
    this.memory.loadProgram(program);
    this.program = program.slice();
  }

  // Back to power-on state with the last loaded program in place. The PRNG keeps its sequence.
  reset(): void {
    this.memory.reset();
    this.registers.reset();
    this.display.clear();
    this.keypad.releaseAll();
    this.timers.reset();
    this.clock.reset();
    if (this.program.length > 0) this.memory.loadProgram(this.program);
  }

  stepInstruction(): StepResult {
    return this.cpu.step();
  }

  isToneActive(): boolean {
    return this.timers.toneActive;
  }
}
