import path from 'node:path';
import { DateTime } from 'luxon';

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd_HH-mm-ss';

export function timestamp(now: DateTime = DateTime.now()): string {
  return now.toFormat(TIMESTAMP_FORMAT);
}

/** `leads/March.xlsx` -> `March`. */
export function baseName(filename: string): string {
  const file = path.basename(filename);
  return path.basename(file, path.extname(file));
}

export function extensionOf(filename: string): string {
  return path.extname(filename).toLowerCase();
}
