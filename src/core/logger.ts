/**
 * Tagged console logger
 *
 * Every component takes a Logger in its constructor and writes
 * `[Tag] message` lines, e.g. `[Pairing] Found left glass: G1_L_42`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Logger for a sub-component, sharing this logger's level */
  child(tag: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

export function createLogger(tag: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${tag}]`;
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
    child: (childTag) => createLogger(childTag, level),
  };
}

/** Logger that drops everything (tests, library use without output) */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
