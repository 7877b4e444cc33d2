import { identityValue, resolveIdentityKey } from './identity.js';
import { withRows, type RecordTable, type Row } from './table.js';

export function dedupe(table: RecordTable, file?: string): RecordTable {
  const key = resolveIdentityKey(table.columns, file);
  const seen = new Set<string>();
  const out: Row[] = [];
  for (const row of table.rows) {
    const id = identityValue(row, key);
    if (seen.has(id)) continue;
    seen.add(id);
    out.push(row);
  }
  return withRows(table, out);
}
