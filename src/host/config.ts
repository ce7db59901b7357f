import type { CpuErrorMode } from '../emulator/scheduler';
import { isKeymapName } from '../input/keymap';
import type { KeymapName } from '../input/keymap';

type Env = Record<string, string | undefined>;

export interface RunConfig {
  programPath?: string;
  out: string;
  frames: number;
  instrPerFrame: number;
  scale: number;
  seed?: number;
  traceCpu: number;
  onCpuError: CpuErrorMode;
  debug: boolean;
  keymap: KeymapName;
}

export const DEFAULT_RUN_CONFIG: Omit<RunConfig, 'programPath' | 'seed'> = {
  out: 'screenshot.png',
  frames: 120,
  instrPerFrame: 10,
  scale: 10,
  traceCpu: 0,
  onCpuError: 'record',
  debug: false,
  keymap: 'qwerty',
};

// `--key=value` pairs; anything else is ignored. A bare `--flag` means `--flag=1`.
export function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv.slice(2)) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
    else if (/^--[^=]+$/.test(a)) out[a.slice(2)] = '1';
  }
  return out;
}

function intOr(raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const v = Number(raw);
  return Number.isFinite(v) ? Math.max(min, Math.floor(v)) : fallback;
}

function flag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const v = raw.toLowerCase();
  return v === '1' || v === 'true' || v === 'yes';
}

// Command-line arguments win over CHIP8_* environment variables, which win over defaults.
export function resolveRunConfig(args: Record<string, string>, env: Env = {}): RunConfig {
  const d = DEFAULT_RUN_CONFIG;
  const seedRaw = args.seed ?? env.CHIP8_SEED;
  const seed = seedRaw !== undefined && Number.isFinite(Number(seedRaw)) ? Number(seedRaw) >>> 0 : undefined;
  const mode = args.onCpuError ?? env.CHIP8_CPUERR;
  const keymap = (args.keymap ?? env.CHIP8_KEYMAP ?? '').toLowerCase();
  return {
    programPath: args.rom ?? env.CHIP8_ROM,
    out: args.out ?? env.CHIP8_OUT ?? d.out,
    frames: intOr(args.frames ?? env.CHIP8_FRAMES, d.frames, 1),
    instrPerFrame: intOr(args.ipf ?? env.CHIP8_IPF, d.instrPerFrame, 1),
    scale: intOr(args.scale ?? env.CHIP8_SCALE, d.scale, 1),
    seed,
    traceCpu: intOr(args.traceCpu ?? env.CHIP8_TRACE_CPU, d.traceCpu, 0),
    onCpuError: mode === 'throw' || mode === 'record' ? mode : d.onCpuError,
    debug: flag(args.debug ?? env.CHIP8_DEBUG, d.debug),
    keymap: isKeymapName(keymap) ? keymap : d.keymap,
  };
}
