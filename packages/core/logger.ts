export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

let currentLevel: LogLevel = "info";

const order: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in order;
}

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel) {
  return order[level] >= order[currentLevel];
}

/**
 * Logger whose lines are prefixed with `[scope]`, e.g. `createLogger("store")`.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(...args: unknown[]) {
      if (shouldLog("debug")) console.debug(prefix, ...args);
    },
    info(...args: unknown[]) {
      if (shouldLog("info")) console.info(prefix, ...args);
    },
    warn(...args: unknown[]) {
      if (shouldLog("warn")) console.warn(prefix, ...args);
    },
    error(...args: unknown[]) {
      if (shouldLog("error")) console.error(prefix, ...args);
    },
  };
}

export function debug(...args: unknown[]) {
  if (shouldLog("debug")) console.debug(...args);
}

export function info(...args: unknown[]) {
  if (shouldLog("info")) console.info(...args);
}

export function warn(...args: unknown[]) {
  if (shouldLog("warn")) console.warn(...args);
}

export function error(...args: unknown[]) {
  if (shouldLog("error")) console.error(...args);
}
