import type { Byte } from '../emulator/types';
import { TIMER_HZ } from '../emulator/types';

// Delay and sound timer registers. Both count down to zero and stop there.
export class Timers {
  private _delay: Byte = 0;
  private _sound: Byte = 0;

  get delay(): Byte { return this._delay; }
  set delay(v: Byte) { this._delay = v & 0xff; }

  get sound(): Byte { return this._sound; }
  set sound(v: Byte) { this._sound = v & 0xff; }

  // The tone plays while the sound timer is non-zero.
  get toneActive(): boolean { return this._sound > 0; }

  tick(): void {
    if (this._delay > 0) this._delay--;
    if (this._sound > 0) this._sound--;
  }

  reset(): void {
    this._delay = 0;
    this._sound = 0;
  }
}

// Converts elapsed host time into timer ticks at a fixed rate, carrying the remainder
// between calls. Time is accumulated scaled by the rate so whole-millisecond inputs stay exact.
export class TimerClock {
  private accumulated = 0; // elapsed ms * hz; one tick per 1000

  constructor(private readonly timers: Timers, readonly hz = TIMER_HZ) {
    if (!(hz > 0)) throw new RangeError(`Timer rate must be positive: ${hz}`);
  }

  get pendingMs(): number { return this.accumulated / this.hz; }

  // Returns the number of ticks applied (0, 1 or several).
  advance(elapsedMs: number): number {
    if (!(elapsedMs > 0)) return 0;
    this.accumulated += elapsedMs * this.hz;
    let ticks = 0;
    while (this.accumulated >= 1000) {
      this.accumulated -= 1000;
      this.timers.tick();
      ticks++;
    }
    return ticks;
  }

  reset(): void {
    this.accumulated = 0;
  }
}
