import fs from 'fs';
import { PNG } from 'pngjs';
import { loadProgramFile } from '../src/rom/loader';
import { Machine } from '../src/emulator/core';
import { Scheduler } from '../src/emulator/scheduler';
import { renderRGBA } from '../src/display/renderer';
import { parseArgs, resolveRunConfig } from '../src/host/config';
import { createLogger } from '../src/utils/log';

async function main() {
  const cfg = resolveRunConfig(parseArgs(process.argv), process.env);
  const log = createLogger('screenshot', { debug: cfg.debug });

  if (!cfg.programPath) {
    log.error('Usage: npm run screenshot -- --rom=path/to/program.ch8 --out=./out.png [--frames=120] [--ipf=10] [--scale=10] [--seed=N] [--traceCpu=N] [--onCpuError=record|throw] [--debug]');
    process.exit(1);
  }

  log.info(`program: ${cfg.programPath}  out: ${cfg.out}  frames: ${cfg.frames}  ipf: ${cfg.instrPerFrame}  scale: ${cfg.scale}  seed: ${cfg.seed ?? 'random'}  onCpuError=${cfg.onCpuError}`);

  const program = loadProgramFile(cfg.programPath);
  const machine = Machine.fromProgram(program, { seed: cfg.seed });
  const sched = new Scheduler(machine, {
    instrPerFrame: cfg.instrPerFrame,
    onCpuError: cfg.onCpuError,
    traceEveryInstr: cfg.traceCpu,
  });

  for (let i = 0; i < cfg.frames && !sched.halted; i++) {
    const report = sched.stepFrame();
    if (report.waitingForKey) log.debug(`frame ${i}: waiting for key at PC=0x${machine.registers.pc.toString(16)}`);
    if (i % 60 === 59) log.info(`stepped ${i + 1} frames`);
  }

  if (sched.lastCpuError) {
    log.error(`CPU halted after ${sched.executedInstructions} instructions:`, sched.lastCpuError.message);
  }
  log.debug(`lit pixels: ${machine.display.litCount()}  tone: ${machine.isToneActive() ? 'on' : 'off'}`);

  const width = machine.display.width * cfg.scale;
  const height = machine.display.height * cfg.scale;
  const png = new PNG({ width, height });
  png.data.set(renderRGBA(machine.display, cfg.scale));
  await new Promise<void>((resolve, reject) => {
    png.pack().pipe(fs.createWriteStream(cfg.out)).on('finish', () => resolve()).on('error', reject);
  });
  log.info(`wrote ${cfg.out} (${width}x${height})`);
  if (sched.lastCpuError) process.exitCode = 2;
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
