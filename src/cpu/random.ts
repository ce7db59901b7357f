import type { Byte, RandomSource } from '../emulator/types';

// mulberry32: small 32-bit PRNG, deterministic for a given seed.
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(readonly seed: number = (Date.now() ^ (Math.random() * 0x100000000)) >>> 0) {
    this.state = seed >>> 0;
  }

  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  nextByte(): Byte {
    return this.nextUint32() >>> 24;
  }
}
