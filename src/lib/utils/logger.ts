/**
 * Leveled console logging with a bracketed component prefix,
 * e.g. `[LayoutEngine] page 2 opened`.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] <= LEVEL_RANK[currentLevel];
}

/**
 * Create a logger whose lines start with `[component]`.
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    }
  };
}
