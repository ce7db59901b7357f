import readline from 'readline';
import { loadProgramFile } from '../src/rom/loader';
import { Machine } from '../src/emulator/core';
import { Scheduler } from '../src/emulator/scheduler';
import { renderHalfBlocks } from '../src/display/renderer';
import { KEYMAPS, keyForHostKey } from '../src/input/keymap';
import { parseArgs, resolveRunConfig } from '../src/host/config';
import { createLogger } from '../src/utils/log';

// Terminals report key presses but not releases: a key counts as held for this long.
const KEY_HOLD_MS = 150;

const cfg = resolveRunConfig(parseArgs(process.argv), process.env);
const log = createLogger('play', { debug: cfg.debug });

if (!cfg.programPath) {
  log.error('Usage: npm run play -- --rom=path/to/program.ch8 [--ipf=10] [--seed=N] [--keymap=qwerty|gamepad]   (Esc or Ctrl-C quits)');
  process.exit(1);
}
if (!process.stdin.isTTY) {
  log.error('stdin is not a terminal');
  process.exit(1);
}

const machine = Machine.fromProgram(loadProgramFile(cfg.programPath), { seed: cfg.seed });
const keymap = KEYMAPS[cfg.keymap];
const heldUntil = new Map<number, number>();

const sched = new Scheduler(machine, {
  instrPerFrame: cfg.instrPerFrame,
  onCpuError: 'record',
  traceEveryInstr: cfg.traceCpu,
  pollInput: () => {
    const now = Date.now();
    for (const [key, until] of heldUntil) {
      if (until <= now) {
        heldUntil.delete(key);
        machine.keypad.release(key);
      }
    }
  },
});

readline.emitKeypressEvents(process.stdin);
process.stdin.setRawMode(true);

let timer: NodeJS.Timeout | undefined;

function quit(code: number): void {
  if (timer) clearInterval(timer);
  process.stdin.setRawMode(false);
  process.stdin.pause();
  process.stdout.write('\x1b[?25h\n');
  if (sched.lastCpuError) log.error('CPU halted:', sched.lastCpuError.message);
  process.exit(code);
}

process.stdin.on('keypress', (_str: string | undefined, key: { name?: string; sequence?: string; ctrl?: boolean } | undefined) => {
  if (!key) return;
  if (key.name === 'escape' || (key.ctrl && key.name === 'c')) quit(0);
  const hexKey = keyForHostKey(key.name ?? key.sequence ?? '', keymap);
  if (hexKey === undefined) return;
  machine.keypad.press(hexKey);
  heldUntil.set(hexKey, Date.now() + KEY_HOLD_MS);
});

process.stdout.write('\x1b[2J\x1b[?25l');
let last = Date.now();
let toneWasActive = false;

timer = setInterval(() => {
  const now = Date.now();
  sched.stepFrame(now - last);
  last = now;

  const tone = machine.isToneActive();
  if (tone && !toneWasActive) process.stdout.write('\x07');
  toneWasActive = tone;

  process.stdout.write('\x1b[H' + renderHalfBlocks(machine.display) + '\n');
  if (sched.halted) quit(2);
}, 1000 / 60);
