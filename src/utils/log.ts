import { DateTime } from 'luxon';
import { CFG, type LogLevel } from '../config.js';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return RANK[level] >= RANK[CFG.logLevel];
}

function prefix(level: string): string {
  return `${DateTime.now().toISO()} ${level.toUpperCase()}`;
}

export const log = {
  debug: (...args: unknown[]) => {
    if (enabled('debug')) console.log(prefix('debug'), ...args);
  },
  info: (...args: unknown[]) => {
    if (enabled('info')) console.log(prefix('info'), ...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled('warn')) console.warn(prefix('warn'), ...args);
  },
  error: (...args: unknown[]) => {
    if (enabled('error')) console.error(prefix('error'), ...args);
  },
};
