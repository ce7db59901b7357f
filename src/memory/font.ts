import glyphs from './glyphs.json';

// Hex digit glyphs 0-F, 5 rows each, 4 pixels wide in the high nibble.
export const GLYPH_HEIGHT = 5;
export const FONT_BASE = 0x000;

export const FONT: Uint8Array = Uint8Array.from(glyphs.flat());

// Not masked: a value above 0xF lands past the table, wherever that is.
export function glyphAddress(digit: number): number {
  return FONT_BASE + digit * GLYPH_HEIGHT;
}
