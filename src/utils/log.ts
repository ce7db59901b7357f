export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

type Env = Record<string, string | undefined>;

const processEnv = (): Env => (typeof process !== 'undefined' && process.env ? process.env : {});

export function isDebugEnabled(env: Env = processEnv()): boolean {
  const v = (env.CHIP8_DEBUG ?? '0').toLowerCase();
  return v === '1' || v === 'true';
}

// Tagged console logger: every line starts with `[tag]`. debug() is silent unless
// CHIP8_DEBUG=1 (or `debug` is passed explicitly).
export function createLogger(tag: string, opts: { debug?: boolean; sink?: LogSink } = {}): Logger {
  const sink = opts.sink ?? console;
  const debugOn = opts.debug ?? isDebugEnabled();
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => { if (debugOn) sink.log(prefix, ...args); },
    info: (...args) => sink.log(prefix, ...args),
    warn: (...args) => sink.warn(prefix, ...args),
    error: (...args) => sink.error(prefix, ...args),
  };
}
