import { DISPLAY_WIDTH, DISPLAY_HEIGHT } from '../emulator/types';

// 64x32 monochrome display, one byte (0 or 1) per pixel, row-major (x + y*64).
export class FrameBuffer {
  readonly width = DISPLAY_WIDTH;
  readonly height = DISPLAY_HEIGHT;
  private readonly cells = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);

  clear(): void {
    this.cells.fill(0);
  }

  getPixel(x: number, y: number): number {
    return this.cells[this.indexOf(x, y)];
  }

  pixels(): Readonly<Uint8Array> {
    return this.cells;
  }

  litCount(): number {
    let c = 0;
    for (let i = 0; i < this.cells.length; i++) c += this.cells[i];
    return c;
  }

  // XOR an 8-pixel-wide sprite onto the display. Both the origin and every pixel wrap
  // around the edges. Returns true when any lit pixel was turned off.
  drawSprite(x: number, y: number, rows: ArrayLike<number>): boolean {
    const ox = x % this.width;
    const oy = y % this.height;
    let collided = false;
    for (let row = 0; row < rows.length; row++) {
      const bits = rows[row] & 0xff;
      if (bits === 0) continue;
      for (let col = 0; col < 8; col++) {
        if ((bits & (0x80 >> col)) === 0) continue;
        const idx = this.indexOf(ox + col, oy + row);
        if (this.cells[idx] === 1) collided = true;
        this.cells[idx] ^= 1;
      }
    }
    return collided;
  }

  private indexOf(x: number, y: number): number {
    const wx = ((x % this.width) + this.width) % this.width;
    const wy = ((y % this.height) + this.height) % this.height;
    return wx + wy * this.width;
  }
}
