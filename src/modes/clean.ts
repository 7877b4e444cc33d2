import { dedupe } from '../pipeline/dedupe.js';
import { csvDownload } from '../pipeline/export.js';
import { readUpload } from '../pipeline/readers.js';
import { isEmpty } from '../pipeline/table.js';
import type { Download, Upload } from '../sources/uploads.js';
import { baseName } from '../utils/filename.js';
import { log } from '../utils/log.js';
import { Reporter, type ModeResult } from './report.js';

export function cleanEach(uploads: readonly Upload[]): ModeResult {
  const report = new Reporter();
  const downloads: Download[] = [];

  for (const upload of uploads) {
    try {
      const table = readUpload(upload);
      const cleaned = dedupe(table, upload.name);
      if (isEmpty(cleaned)) {
        report.warn(`File ${upload.name} is empty after cleaning.`, upload.name);
        continue;
      }
      log.info(`${upload.name}: kept ${cleaned.rows.length} of ${table.rows.length} rows`);
      const name = `${baseName(upload.name)}_CLEAN.csv`;
      report.claim(name, upload.name);
      downloads.push(csvDownload(name, cleaned));
    } catch (err) {
      report.fail(err);
    }
  }

  return report.result(downloads);
}
