import { dedupe } from '../pipeline/dedupe.js';
import { isLeadError } from '../pipeline/errors.js';
import { csvDownload } from '../pipeline/export.js';
import { readUpload } from '../pipeline/readers.js';
import { concatTables, isEmpty, type RecordTable } from '../pipeline/table.js';
import type { Upload } from '../sources/uploads.js';
import { timestamp } from '../utils/filename.js';
import { log } from '../utils/log.js';
import { Reporter, type ModeOptions, type ModeResult } from './report.js';

export function describeSources(uploads: readonly Upload[]): string {
  return uploads.map((u) => u.name).join(', ');
}

/**
 * Read every upload and concatenate them. Unsupported files are reported and
 * skipped; the first file that fails to parse aborts with `null`.
 */
export function loadCombined(uploads: readonly Upload[], report: Reporter): RecordTable | null {
  const tables: RecordTable[] = [];
  for (const upload of uploads) {
    try {
      tables.push(readUpload(upload));
    } catch (err) {
      report.fail(err);
      if (isLeadError(err) && err.code === 'UNSUPPORTED_FILE_TYPE') continue;
      return null;
    }
  }
  return concatTables(tables);
}

export function combineAndClean(uploads: readonly Upload[], options: ModeOptions = {}): ModeResult {
  const report = new Reporter();
  log.info(`Combining ${uploads.length} file(s)`);

  const combined = loadCombined(uploads, report);
  if (!combined) return report.result([]);
  if (isEmpty(combined)) {
    report.warn('No data to process.');
    return report.result([]);
  }

  let cleaned: RecordTable;
  try {
    cleaned = dedupe(combined, describeSources(uploads));
  } catch (err) {
    report.fail(err);
    return report.result([]);
  }

  log.info(`Kept ${cleaned.rows.length} of ${combined.rows.length} rows`);
  const name = `COMBINED_CLEAN_LEADS_${timestamp(options.now)}.csv`;
  return report.result([csvDownload(name, cleaned)]);
}
