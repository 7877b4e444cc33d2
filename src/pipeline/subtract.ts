import { identityValue, sharedIdentityKey } from './identity.js';
import { withRows, type RecordTable } from './table.js';

/** Candidate rows whose identity does not occur anywhere in the reference. */
export function subtract(reference: RecordTable, candidate: RecordTable, file?: string): RecordTable {
  const key = sharedIdentityKey(reference.columns, candidate.columns, file);
  const known = new Set(reference.rows.map((row) => identityValue(row, key)));
  return withRows(
    candidate,
    candidate.rows.filter((row) => !known.has(identityValue(row, key))),
  );
}
