/**
 * Levelled console logging for tree surgery and graph construction.
 *
 * Refused edits go to DEBUG and storey changes to INFO, so the default WARN
 * level stays quiet while callers try many candidate edits.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

let currentLevel: LogLevel = LogLevel.WARN;

function emit(
  level: LogLevel,
  write: (...data: unknown[]) => void,
  msg: string,
  args: unknown[],
): void {
  if (currentLevel > level) return;
  write(`[${LogLevel[level]}] ${msg}`, ...args);
}

export const Logger = {
  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  getLevel: (): LogLevel => currentLevel,

  /** Refused divide/crossover/straighten requests, graph summaries. */
  debug: (msg: string, ...args: unknown[]): void => {
    emit(LogLevel.DEBUG, console.log, msg, args);
  },

  /** Storeys added or removed, collapse passes. */
  info: (msg: string, ...args: unknown[]): void => {
    emit(LogLevel.INFO, console.log, msg, args);
  },

  warn: (msg: string, ...args: unknown[]): void => {
    emit(LogLevel.WARN, console.warn, msg, args);
  },

  error: (msg: string, ...args: unknown[]): void => {
    emit(LogLevel.ERROR, console.error, msg, args);
  },
};
