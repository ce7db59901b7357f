import type { Machine } from './core';
import { FRAME_MS } from './types';
import { disassemble } from '../cpu/disasm';
import { createLogger } from '../utils/log';
import type { Logger } from '../utils/log';

// 'throw' rethrows the fault to the caller; 'record' keeps it in lastCpuError.
// Either way the machine is halted until reset().
export type CpuErrorMode = 'throw' | 'record';

export interface SchedulerOptions {
  instrPerFrame?: number;
  onCpuError?: CpuErrorMode;
  traceEveryInstr?: number; // if >0, log CPU state every N instructions
  pollInput?: () => void;   // called at the start of every frame
  logger?: Logger;
}

export interface FrameReport {
  executed: number;
  timerTicks: number;
  waitingForKey: boolean;
  halted: boolean;
}

const hex = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

// Host loop for one machine: poll input, run a fixed number of instructions, then apply
// whatever 60 Hz timer ticks the elapsed time calls for. Rendering is left to the caller.
export class Scheduler {
  readonly instrPerFrame: number;
  private readonly onCpuError: CpuErrorMode;
  private readonly traceEveryInstr: number;
  private readonly pollInput?: () => void;
  private readonly log: Logger;
  public lastCpuError: Error | undefined;
  private execCount = 0;
  private _halted = false;

  constructor(private readonly machine: Machine, opts: SchedulerOptions = {}) {
    this.instrPerFrame = Math.max(1, Math.floor(opts.instrPerFrame ?? 10));
    this.onCpuError = opts.onCpuError ?? 'throw';
    this.traceEveryInstr = Math.max(0, Math.floor(opts.traceEveryInstr ?? 0));
    this.pollInput = opts.pollInput;
    this.log = opts.logger ?? createLogger('TRACE', { debug: true });
  }

  get halted(): boolean { return this._halted; }
  get executedInstructions(): number { return this.execCount; }

  stepFrame(elapsedMs: number = FRAME_MS): FrameReport {
    this.pollInput?.();

    let executed = 0;
    let waitingForKey = false;
    while (!this._halted && executed < this.instrPerFrame) {
      try {
        const res = this.machine.stepInstruction();
        executed++;
        this.execCount++;
        if (this.traceEveryInstr > 0 && (this.execCount % this.traceEveryInstr) === 0) this.trace(res.pc, res.opcode);
        if (res.flow === 'wait') {
          waitingForKey = true;
          break;
        }
      } catch (e) {
        this._halted = true;
        this.lastCpuError = e instanceof Error ? e : new Error(String(e));
        if (this.onCpuError === 'throw') throw e;
      }
    }

    const timerTicks = this._halted ? 0 : this.machine.clock.advance(elapsedMs);
    return { executed, timerTicks, waitingForKey, halted: this._halted };
  }

  runFrames(count: number, elapsedMs: number = FRAME_MS): FrameReport[] {
    const out: FrameReport[] = [];
    for (let i = 0; i < count && !this._halted; i++) out.push(this.stepFrame(elapsedMs));
    return out;
  }

  reset(): void {
    this.machine.reset();
    this._halted = false;
    this.lastCpuError = undefined;
    this.execCount = 0;
  }

  private trace(pc: number, opcode: number): void {
    const s = this.machine.registers.snapshot();
    const regs = s.V.map((v, i) => `V${i.toString(16).toUpperCase()}=${hex(v, 2)}`).join(' ');
    this.log.info(`${hex(pc, 3)}: ${hex(opcode, 4)} ${disassemble(opcode).padEnd(16)} I=${hex(s.I, 3)} SP=${s.stack.length} ${regs}`);
  }
}
