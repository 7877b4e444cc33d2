export type Cell = string | number | boolean | null;

export type Row = Readonly<Record<string, Cell>>;

/**
 * An immutable table: a fixed column list and rows that each carry every
 * column (absent values are `null`). Operations return new tables.
 */
export interface RecordTable {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

// Column names come from user files, so rows have no prototype to collide with.
export function blankRow(): Record<string, Cell> {
  return Object.create(null);
}

export function cellOf(row: Readonly<Record<string, Cell | undefined>>, column: string): Cell {
  return Object.hasOwn(row, column) ? row[column] ?? null : null;
}

export function createTable(columns: readonly string[], rows: readonly Readonly<Record<string, Cell | undefined>>[]): RecordTable {
  const cols = Object.freeze([...columns]);
  const filled = rows.map((row) => {
    const out = blankRow();
    for (const c of cols) out[c] = cellOf(row, c);
    return Object.freeze(out);
  });
  return Object.freeze({ columns: cols, rows: Object.freeze(filled) });
}

export function withRows(table: RecordTable, rows: readonly Row[]): RecordTable {
  return Object.freeze({ columns: table.columns, rows: Object.freeze([...rows]) });
}

export function hasColumn(table: RecordTable, column: string): boolean {
  return table.columns.includes(column);
}

export function isEmpty(table: RecordTable): boolean {
  return table.rows.length === 0;
}

/** Columns are unioned in order of first appearance. */
export function concatTables(tables: readonly RecordTable[]): RecordTable {
  const columns: string[] = [];
  const known = new Set<string>();
  for (const t of tables) {
    for (const c of t.columns) {
      if (known.has(c)) continue;
      known.add(c);
      columns.push(c);
    }
  }
  return createTable(
    columns,
    tables.flatMap((t) => t.rows),
  );
}
