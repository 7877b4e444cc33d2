export { combineAndClean, loadCombined } from './combine.js';
export { cleanEach } from './clean.js';
export { checkAgainstReference, type CheckOptions } from './check.js';
export { split, ALL_FILES_ARCHIVE, type SplitOptions } from './split.js';
export { DownloadStore } from './store.js';
export { Reporter, hasErrors, toIssue, type Issue, type ModeOptions, type ModeResult } from './report.js';
export { dedupe } from '../pipeline/dedupe.js';
export { subtract } from '../pipeline/subtract.js';
export { partition, type Partition } from '../pipeline/partition.js';
export { resolveIdentityKey, sharedIdentityKey, identityValue, type IdentityKey } from '../pipeline/identity.js';
export { readUpload, readerFor, csvReader, excelReader, type TableReader, type TableFormat } from '../pipeline/readers.js';
export { createTable, concatTables, type Cell, type Row, type RecordTable } from '../pipeline/table.js';
export { toCsvBytes } from '../pipeline/export.js';
export { buildArchive } from '../pipeline/archive.js';
export { LeadError, type LeadErrorCode } from '../pipeline/errors.js';
export type { Upload, Download } from '../sources/uploads.js';
