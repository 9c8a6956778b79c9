export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...args) => {
      if (enabled("debug")) console.debug(prefix, message, ...args);
    },
    info: (message, ...args) => {
      if (enabled("info")) console.info(prefix, message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled("warn")) console.warn(prefix, message, ...args);
    },
    error: (message, ...args) => {
      if (enabled("error")) console.error(prefix, message, ...args);
    },
  };
}
