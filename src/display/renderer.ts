import type { FrameBuffer } from './framebuffer';

export interface RGBA { r: number; g: number; b: number; a: number; }

export interface Palette {
  on: RGBA;
  off: RGBA;
}

export const DEFAULT_PALETTE: Palette = {
  on: { r: 255, g: 255, b: 255, a: 255 },
  off: { r: 0, g: 0, b: 0, a: 255 },
};

// Upscale the display into an RGBA buffer of (64*scale) x (32*scale) pixels.
export function renderRGBA(fb: FrameBuffer, scale = 10, palette: Palette = DEFAULT_PALETTE): Uint8Array {
  const s = Math.max(1, Math.floor(scale));
  const outW = fb.width * s;
  const out = new Uint8Array(outW * fb.height * s * 4);
  for (let y = 0; y < fb.height; y++) {
    for (let x = 0; x < fb.width; x++) {
      const c = fb.getPixel(x, y) ? palette.on : palette.off;
      for (let dy = 0; dy < s; dy++) {
        let p = ((y * s + dy) * outW + x * s) * 4;
        for (let dx = 0; dx < s; dx++) {
          out[p++] = c.r;
          out[p++] = c.g;
          out[p++] = c.b;
          out[p++] = c.a;
        }
      }
    }
  }
  return out;
}

// One character per pixel, one line per row.
export function renderText(fb: FrameBuffer, on = '#', off = '.'): string {
  const lines: string[] = [];
  for (let y = 0; y < fb.height; y++) {
    let line = '';
    for (let x = 0; x < fb.width; x++) line += fb.getPixel(x, y) ? on : off;
    lines.push(line);
  }
  return lines.join('\n');
}

// Two display rows per terminal line using half-block characters.
export function renderHalfBlocks(fb: FrameBuffer): string {
  const lines: string[] = [];
  for (let y = 0; y < fb.height; y += 2) {
    let line = '';
    for (let x = 0; x < fb.width; x++) {
      const top = fb.getPixel(x, y);
      const bottom = y + 1 < fb.height ? fb.getPixel(x, y + 1) : 0;
      line += top && bottom ? '█' : top ? '▀' : bottom ? '▄' : ' ';
    }
    lines.push(line);
  }
  return lines.join('\n');
}
