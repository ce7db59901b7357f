import { describe, it, expect } from 'vitest';
import { parseArgs, resolveRunConfig, DEFAULT_RUN_CONFIG } from '../../src/host/config';

describe('parseArgs', () => {
  it('collects --key=value pairs and bare flags, skipping node and script', () => {
    const args = parseArgs(['node', 'script.ts', '--rom=games/pong.ch8', '--frames=30', '--debug', 'stray']);
    expect(args).toEqual({ rom: 'games/pong.ch8', frames: '30', debug: '1' });
  });
});

describe('resolveRunConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveRunConfig({}, {})).toEqual({ ...DEFAULT_RUN_CONFIG, programPath: undefined, seed: undefined });
  });

  it('prefers arguments over environment variables', () => {
    const cfg = resolveRunConfig(
      { frames: '5', ipf: '20' },
      { CHIP8_FRAMES: '99', CHIP8_ROM: 'env.ch8', CHIP8_SEED: '42', CHIP8_SCALE: '4', CHIP8_CPUERR: 'throw' },
    );
    expect(cfg.frames).toBe(5);
    expect(cfg.instrPerFrame).toBe(20);
    expect(cfg.programPath).toBe('env.ch8');
    expect(cfg.seed).toBe(42);
    expect(cfg.scale).toBe(4);
    expect(cfg.onCpuError).toBe('throw');
  });

  it('clamps and ignores bad numbers and unknown error modes', () => {
    const cfg = resolveRunConfig({ frames: '0', scale: 'big', traceCpu: '-3', onCpuError: 'ignore' });
    expect(cfg.frames).toBe(1);
    expect(cfg.scale).toBe(DEFAULT_RUN_CONFIG.scale);
    expect(cfg.traceCpu).toBe(0);
    expect(cfg.onCpuError).toBe('record');
  });

  it('selects a keymap by name and ignores unknown ones', () => {
    expect(resolveRunConfig({ keymap: 'Gamepad' }).keymap).toBe('gamepad');
    expect(resolveRunConfig({}, { CHIP8_KEYMAP: 'gamepad' }).keymap).toBe('gamepad');
    expect(resolveRunConfig({ keymap: 'dvorak' }).keymap).toBe('qwerty');
  });

  it('reads the debug flag', () => {
    expect(resolveRunConfig({ debug: '1' }).debug).toBe(true);
    expect(resolveRunConfig({}, { CHIP8_DEBUG: 'true' }).debug).toBe(true);
    expect(resolveRunConfig({ debug: '0' }, { CHIP8_DEBUG: '1' }).debug).toBe(false);
  });
});
