/**
 * Logger Utility
 * All levels write to stdout, alongside the progress lines. A registered
 * output guard (the progress spinner) is paused around each write.
 */

export interface OutputGuard {
  pause(): void;
  resume(): void;
}

let verboseMode = false;
let outputGuard: OutputGuard | undefined;

/**
 * Set the global verbose mode
 */
export function setVerboseMode(enabled: boolean): void {
  verboseMode = enabled;
}

/**
 * Register (or clear) whatever owns the current terminal line
 */
export function setOutputGuard(guard: OutputGuard | undefined): void {
  outputGuard = guard;
}

function write(args: unknown[]): void {
  outputGuard?.pause();
  console.log(...args);
  outputGuard?.resume();
}

/**
 * Step message, verbose mode only
 */
export function debug(...args: unknown[]): void {
  if (verboseMode) {
    write(args);
  }
}

export function info(...args: unknown[]): void {
  write(args);
}

export function warn(...args: unknown[]): void {
  write(args);
}

export function error(...args: unknown[]): void {
  write(args);
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a scoped logger with a prefix
 */
export function createLogger(prefix: string): Logger {
  return {
    debug: (...args: unknown[]) => debug(`[${prefix}]`, ...args),
    info: (...args: unknown[]) => info(`[${prefix}]`, ...args),
    warn: (...args: unknown[]) => warn(`[${prefix}]`, ...args),
    error: (...args: unknown[]) => error(`[${prefix}]`, ...args),
  };
}
