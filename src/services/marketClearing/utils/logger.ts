/**
 * Tagged console logger
 *
 * Every line is prefixed with its component tag, e.g. "[LPBuilder] ...".
 * `silent` suppresses everything but errors; `debug` adds LP previews and
 * coefficient diagnostics.
 */

import type { LogLevel } from '../types';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  info: 1,
  debug: 2,
};

export function createLogger(tag: string, level: LogLevel): Logger {
  const rank = LEVEL_RANK[level];
  const prefix = `[${tag}]`;

  return {
    debug(message, ...details) {
      if (rank >= LEVEL_RANK.debug) console.log(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (rank >= LEVEL_RANK.info) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (rank >= LEVEL_RANK.info) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}
