import { LOG_LEVEL, SERVICE } from './config.js';

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40 } as const;

export type LogLevel = keyof typeof LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

const threshold: number = isLogLevel(LOG_LEVEL) ? LEVELS[LOG_LEVEL] : LEVELS.info;

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= threshold;
}

// Every line carries the service prefix
export const log = {
  debug(message: string, ...rest: unknown[]): void {
    if (enabled('debug')) console.debug(`[${SERVICE}] ${message}`, ...rest);
  },
  info(message: string, ...rest: unknown[]): void {
    if (enabled('info')) console.log(`[${SERVICE}] ${message}`, ...rest);
  },
  warn(message: string, ...rest: unknown[]): void {
    if (enabled('warn')) console.warn(`[${SERVICE}] ${message}`, ...rest);
  },
  error(message: string, ...rest: unknown[]): void {
    if (enabled('error')) console.error(`[${SERVICE}] ${message}`, ...rest);
  },
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
