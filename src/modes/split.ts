import { CFG } from '../config.js';
import { buildArchive } from '../pipeline/archive.js';
import { toCsvBytes } from '../pipeline/export.js';
import { partition } from '../pipeline/partition.js';
import { readUpload } from '../pipeline/readers.js';
import { isEmpty } from '../pipeline/table.js';
import type { Download, Upload } from '../sources/uploads.js';
import { baseName } from '../utils/filename.js';
import { log } from '../utils/log.js';
import { Reporter, type ModeResult } from './report.js';
import type { DownloadStore } from './store.js';

export const ALL_FILES_ARCHIVE = 'AllFiles.zip';

export type SplitOptions = {
  /** Boolean column to split on. */
  column?: string;
  /** Add `AllFiles.zip` covering everything in the store. */
  archive?: boolean;
};

// The store is emptied first, then holds every file this run produced.
export async function split(
  uploads: readonly Upload[],
  store: DownloadStore,
  options: SplitOptions = {},
): Promise<ModeResult> {
  const column = options.column ?? CFG.splitColumn;
  const report = new Reporter();
  const downloads: Download[] = [];
  store.clear();

  const emit = (name: string, file: string, bytes: Buffer) => {
    report.claim(name, file);
    store.put(name, bytes);
    downloads.push({ name, bytes, mimeType: 'text/csv' });
  };

  for (const upload of uploads) {
    try {
      const { trueTable, falseTable } = partition(readUpload(upload), column, upload.name);
      const base = baseName(upload.name);
      if (!isEmpty(trueTable)) emit(`${base}_Inmail.csv`, upload.name, toCsvBytes(trueTable));
      if (!isEmpty(falseTable)) emit(`${base}_Invite.csv`, upload.name, toCsvBytes(falseTable));
      if (isEmpty(trueTable) && isEmpty(falseTable)) {
        report.warn(`File ${upload.name} has no true/false values in '${column}'.`, upload.name);
      }
      log.info(`${upload.name}: ${trueTable.rows.length} inmail, ${falseTable.rows.length} invite`);
    } catch (err) {
      report.fail(err);
    }
  }

  if ((options.archive ?? CFG.splitArchive) && store.size > 0) {
    downloads.push(await buildArchive(ALL_FILES_ARCHIVE, store.entries()));
  }
  return report.result(downloads);
}
