import { dedupe } from '../pipeline/dedupe.js';
import { buildArchive } from '../pipeline/archive.js';
import { csvDownload } from '../pipeline/export.js';
import { readUpload } from '../pipeline/readers.js';
import { subtract } from '../pipeline/subtract.js';
import { isEmpty, type RecordTable } from '../pipeline/table.js';
import type { Download, Upload } from '../sources/uploads.js';
import { baseName, timestamp } from '../utils/filename.js';
import { log } from '../utils/log.js';
import { describeSources, loadCombined } from './combine.js';
import { Reporter, type ModeOptions, type ModeResult } from './report.js';

export type CheckOptions = ModeOptions & {
  /** Dedupe the combined reference before checking. Defaults to true. */
  dedupeReference?: boolean;
  /** Also hand back the combined reference as `COMBINED_LEADS_<ts>.csv`. */
  emitReference?: boolean;
};

function loadReference(uploads: readonly Upload[], dedupeIt: boolean, report: Reporter): RecordTable | null {
  const combined = loadCombined(uploads, report);
  if (!combined) return null;
  if (isEmpty(combined)) {
    report.warn('No reference data to check against.');
    return null;
  }
  if (!dedupeIt) return combined;
  try {
    return dedupe(combined, describeSources(uploads));
  } catch (err) {
    report.fail(err);
    return null;
  }
}

/**
 * Drop from every candidate file the leads already present in the reference
 * set, after deduping the candidate itself. Results are bundled in one zip.
 */
export async function checkAgainstReference(
  references: readonly Upload[],
  candidates: readonly Upload[],
  options: CheckOptions = {},
): Promise<ModeResult> {
  const report = new Reporter();
  const stamp = timestamp(options.now);

  const reference = loadReference(references, options.dedupeReference ?? true, report);
  if (!reference) return report.result([]);
  log.info(`Reference holds ${reference.rows.length} rows from ${references.length} file(s)`);

  const downloads: Download[] = [];
  if (options.emitReference) {
    downloads.push(csvDownload(`COMBINED_LEADS_${stamp}.csv`, reference));
  }

  const checked: Download[] = [];
  for (const upload of candidates) {
    try {
      const own = dedupe(readUpload(upload), upload.name);
      const fresh = subtract(reference, own, upload.name);
      if (isEmpty(fresh)) {
        report.warn(`File ${upload.name} is empty after cleaning.`, upload.name);
        continue;
      }
      log.info(`${upload.name}: ${fresh.rows.length} new of ${own.rows.length} rows`);
      const name = `${baseName(upload.name)}_CHECKED_CLEANED.csv`;
      report.claim(name, upload.name);
      checked.push(csvDownload(name, fresh));
    } catch (err) {
      report.fail(err);
    }
  }

  if (checked.length) {
    downloads.push(await buildArchive(`CHECKED_CLEANED_LEADS_${stamp}.zip`, checked));
  }
  return report.result(downloads);
}
