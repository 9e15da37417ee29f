// lib/util/log.ts
// Tagged console logging with a process-wide level.

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(x: unknown): x is LogLevel {
  return typeof x === 'string' && Object.hasOwn(RANK, x);
}

export type Log = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export function makeLog(tag: string): Log {
  const prefix = `[${tag}]`;
  const enabled = (lvl: LogLevel) => RANK[currentLevel] >= RANK[lvl];
  return {
    debug: (...args) => {
      if (enabled('debug')) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled('info')) console.info(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled('warn')) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled('error')) console.error(prefix, ...args);
    },
  };
}
