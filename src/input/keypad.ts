import type { IKeypad } from '../emulator/types';
import { KEY_COUNT } from '../emulator/types';

// 16-key hex keypad, keys 0x0-0xF. Written by the host, read by the VM.
export class Keypad implements IKeypad {
  private readonly state = new Uint8Array(KEY_COUNT);

  setKey(key: number, pressed: boolean): void {
    this.check(key);
    this.state[key] = pressed ? 1 : 0;
  }

  press(key: number): void { this.setKey(key, true); }
  release(key: number): void { this.setKey(key, false); }

  releaseAll(): void {
    this.state.fill(0);
  }

  isPressed(key: number): boolean {
    this.check(key);
    return this.state[key] === 1;
  }

  private check(key: number): void {
    if (!Keypad.isValidKey(key)) throw new RangeError(`Keypad key out of range: ${key}`);
  }

  static isValidKey(key: number): boolean {
    return Number.isInteger(key) && key >= 0 && key < KEY_COUNT;
  }
}
