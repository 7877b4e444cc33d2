import 'dotenv/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? 'info').toLowerCase();
  return LOG_LEVELS.find((l) => l === value) ?? 'info';
}

export const CFG = {
  outDir: process.env.OUT_DIR ?? './out',
  splitColumn: process.env.SPLIT_COLUMN ?? 'open',
  splitArchive: (process.env.SPLIT_ARCHIVE ?? 'true').toLowerCase() === 'true',
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};
