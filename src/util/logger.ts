/**
 * Console logger with a process-wide debug switch.
 */

let debugMode = false;

export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/** Debug lines are dropped unless debug mode is on. */
export function createLogger(prefix: string): Logger {
  return {
    debug: (...args: unknown[]) => {
      if (debugMode) console.log(`[${prefix}]`, ...args);
    },
    info: (...args: unknown[]) => console.log(`[${prefix}]`, ...args),
    warn: (...args: unknown[]) => console.warn(`[${prefix}]`, ...args),
    error: (...args: unknown[]) => console.error(`[${prefix}]`, ...args),
  };
}
