import { LeadError, inFile } from './errors.js';
import { cellOf, type Row } from './table.js';

export const FULL_NAME = 'full_name';
export const LINKEDIN = 'linkedin';

export type IdentityKey =
  | readonly [typeof FULL_NAME, typeof LINKEDIN]
  | readonly [typeof FULL_NAME]
  | readonly [typeof LINKEDIN];

const COMPOSITE: IdentityKey = [FULL_NAME, LINKEDIN];
const BY_NAME: IdentityKey = [FULL_NAME];
const BY_PROFILE: IdentityKey = [LINKEDIN];

/** Which columns identify a lead in a table with these columns. */
export function resolveIdentityKey(columns: readonly string[], file?: string): IdentityKey {
  const name = columns.includes(FULL_NAME);
  const profile = columns.includes(LINKEDIN);
  if (name && profile) return COMPOSITE;
  if (name) return BY_NAME;
  if (profile) return BY_PROFILE;
  throw new LeadError(
    'NO_IDENTITY_COLUMNS',
    `Neither '${FULL_NAME}' nor '${LINKEDIN}' columns found${inFile(file)}. Cannot remove duplicates.`,
    file,
  );
}

/**
 * The key two tables can be compared on: the composite pair when both carry
 * it, otherwise a single column they share, name first.
 */
export function sharedIdentityKey(
  referenceColumns: readonly string[],
  candidateColumns: readonly string[],
  file?: string,
): IdentityKey {
  const both = (c: string) => referenceColumns.includes(c) && candidateColumns.includes(c);
  if (both(FULL_NAME) && both(LINKEDIN)) return COMPOSITE;
  if (both(FULL_NAME)) return BY_NAME;
  if (both(LINKEDIN)) return BY_PROFILE;
  throw new LeadError(
    'INCOMPATIBLE_KEYS',
    `Columns mismatch between reference and check file${inFile(file)}.`,
    file,
    { reference: [...referenceColumns], candidate: [...candidateColumns] },
  );
}

// JSON keeps types apart ("1" vs 1) and lets missing match missing.
export function identityValue(row: Row, key: IdentityKey): string {
  const columns: readonly string[] = key;
  return JSON.stringify(columns.map((c) => cellOf(row, c)));
}
