import { LeadError, inFile } from './errors.js';
import { flagValue } from './normalize.js';
import { cellOf, hasColumn, withRows, type RecordTable, type Row } from './table.js';

export type Partition = {
  trueTable: RecordTable;
  falseTable: RecordTable;
};

/**
 * Split rows on the boolean value of `column` (a boolean cell or the text
 * true/false). Rows holding anything else, or nothing, land in neither table.
 */
export function partition(table: RecordTable, column = 'open', file?: string): Partition {
  if (!hasColumn(table, column)) {
    throw new LeadError('MISSING_COLUMN', `Column '${column}' not found${inFile(file)}.`, file, { column });
  }
  const yes: Row[] = [];
  const no: Row[] = [];
  for (const row of table.rows) {
    const flag = flagValue(cellOf(row, column));
    if (flag === true) yes.push(row);
    else if (flag === false) no.push(row);
  }
  return { trueTable: withRows(table, yes), falseTable: withRows(table, no) };
}
