import fs from 'fs';
import { MAX_PROGRAM_SIZE } from '../emulator/types';

export class ProgramLoadError extends Error {}

// Validate a raw program image. Images are headerless and loaded verbatim at 0x200.
export function normaliseProgram(raw: Uint8Array): Uint8Array {
  if (raw.length === 0) throw new ProgramLoadError('Program is empty');
  if (raw.length > MAX_PROGRAM_SIZE) {
    throw new ProgramLoadError(`Program is ${raw.length} bytes; at most ${MAX_PROGRAM_SIZE} fit above 0x200`);
  }
  return raw;
}

export function loadProgramFile(path: string): Uint8Array {
  const raw = fs.readFileSync(path);
  return normaliseProgram(new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength));
}
