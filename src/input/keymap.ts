export type Keymap = Readonly<Record<string, number>>;

// Host keyboard -> hex keypad. The 4x4 block 1234/QWER/ASDF/ZXCV mirrors the keypad layout:
//   1 2 3 C
//   4 5 6 D
//   7 8 9 E
//   A 0 B F
export const QWERTY_KEYMAP: Keymap = {
  '1': 0x1, '2': 0x2, '3': 0x3, '4': 0xc,
  'q': 0x4, 'w': 0x5, 'e': 0x6, 'r': 0xd,
  'a': 0x7, 's': 0x8, 'd': 0x9, 'f': 0xe,
  'z': 0xa, 'x': 0x0, 'c': 0xb, 'v': 0xf,
};

// Same block shifted up a row, so W/A/S/D sit on 2/4/5/6 (the usual movement keys)
// and the A 0 B F row moves onto the number keys. Space doubles as 5.
export const GAMEPAD_KEYMAP: Keymap = {
  'q': 0x1, 'w': 0x2, 'e': 0x3, 'r': 0xc,
  'a': 0x4, 's': 0x5, 'd': 0x6, 'f': 0xd,
  'z': 0x7, 'x': 0x8, 'c': 0x9, 'v': 0xe,
  '1': 0xa, '2': 0x0, '3': 0xb, '4': 0xf,
  'space': 0x5,
};

export const KEYMAPS = {
  qwerty: QWERTY_KEYMAP,
  gamepad: GAMEPAD_KEYMAP,
} as const;

export type KeymapName = keyof typeof KEYMAPS;

export function isKeymapName(name: string): name is KeymapName {
  return Object.prototype.hasOwnProperty.call(KEYMAPS, name);
}

export function keyForHostKey(name: string, map: Keymap = QWERTY_KEYMAP): number | undefined {
  return map[name.toLowerCase()];
}
