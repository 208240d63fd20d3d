/**
 * Logging for treescrape
 */

import { LogLevel } from './types';

/**
 * Logger interface accepted everywhere a component logs
 */
export interface ScraperLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
};

/**
 * Console-backed logger that prefixes every line and drops messages above `level`
 */
export function createConsoleLogger(level: LogLevel = 'info', prefix = '[treescrape]'): ScraperLogger {
  const rank = LEVEL_RANK[level];
  return {
    info(message: string) {
      if (rank >= LEVEL_RANK.info) console.log(`${prefix} ${message}`);
    },
    warn(message: string) {
      if (rank >= LEVEL_RANK.warn) console.warn(`${prefix} ${message}`);
    },
    error(message: string) {
      if (rank >= LEVEL_RANK.error) console.error(`${prefix} ${message}`);
    },
  };
}

export const defaultLogger: ScraperLogger = createConsoleLogger();
