// Console logging with a "[textcanvas]" prefix. The core recovers from bad
// gestures silently; these debug lines are the only trace it leaves.
// Change the level from DevTools with `__textcanvasLog.setLevel("debug")`.

const PREFIX = "[textcanvas]";

const _debug = globalThis.console.debug.bind(globalThis.console);
const _log = globalThis.console.log.bind(globalThis.console);
const _warn = globalThis.console.warn.bind(globalThis.console);
const _error = globalThis.console.error.bind(globalThis.console);

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = "info";

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export const log = {
  setLevel(level: LogLevel) {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  debug(...args: unknown[]) {
    if (shouldLog("debug")) _debug(PREFIX, ...args);
  },

  info(...args: unknown[]) {
    if (shouldLog("info")) _log(PREFIX, ...args);
  },

  warn(...args: unknown[]) {
    if (shouldLog("warn")) _warn(PREFIX, ...args);
  },

  error(...args: unknown[]) {
    if (shouldLog("error")) _error(PREFIX, ...args);
  },

  /** For caught errors that are recovered from; logged at debug level. */
  swallow(context: string, err?: unknown) {
    if (shouldLog("debug")) _debug(PREFIX, `[swallowed] ${context}:`, err);
  },
};

declare global {
  // eslint-disable-next-line no-var
  var __textcanvasLog: typeof log | undefined;
}

globalThis.__textcanvasLog = log;
