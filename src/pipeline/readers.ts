import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { Upload } from '../sources/uploads.js';
import { extensionOf } from '../utils/filename.js';
import { LeadError } from './errors.js';
import { normalizeCsvCell, normalizeHeaders, normalizeSheetCell } from './normalize.js';
import { blankRow, createTable, type Cell, type RecordTable } from './table.js';

export type TableFormat = 'csv' | 'excel';

export interface TableReader {
  readonly format: TableFormat;
  readonly extensions: readonly string[];
  read(bytes: Uint8Array, file: string): RecordTable;
}

export const csvReader: TableReader = {
  format: 'csv',
  extensions: ['.csv'],
  read(bytes, file) {
    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch {
      throw new LeadError('PARSE_ERROR', `Error processing ${file}: not valid UTF-8 text`, file);
    }
    const parsed = Papa.parse<string[]>(text, { delimiter: ',', skipEmptyLines: true });
    const quoteError = parsed.errors.find((e) => e.type === 'Quotes');
    if (quoteError) {
      throw new LeadError('PARSE_ERROR', `Error processing ${file}: ${quoteError.message} (row ${quoteError.row ?? '?'})`, file);
    }
    const [header, ...records] = parsed.data;
    if (!header) {
      throw new LeadError('PARSE_ERROR', `Error processing ${file}: no columns to parse`, file);
    }
    const columns = normalizeHeaders(header);
    const rows = records.map((fields, i) => {
      if (fields.length > columns.length) {
        throw new LeadError(
          'PARSE_ERROR',
          `Error processing ${file}: expected ${columns.length} fields in line ${i + 2}, saw ${fields.length}`,
          file,
          { line: i + 2 },
        );
      }
      return toRow(columns, fields.map(normalizeCsvCell));
    });
    return createTable(columns, rows);
  },
};

export const excelReader: TableReader = {
  format: 'excel',
  extensions: ['.xls', '.xlsx'],
  read(bytes, file) {
    if (!isWorkbook(bytes)) {
      throw new LeadError('PARSE_ERROR', `Error processing ${file}: not an Excel workbook`, file);
    }
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(bytes, { type: 'array' });
    } catch (err) {
      throw new LeadError('PARSE_ERROR', `Error processing ${file}: ${err instanceof Error ? err.message : String(err)}`, file);
    }
    const first = workbook.SheetNames[0];
    if (first === undefined) {
      throw new LeadError('PARSE_ERROR', `Error processing ${file}: workbook has no sheets`, file);
    }
    const matrix = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[first], {
      header: 1,
      defval: null,
      blankrows: false,
      raw: true,
    });
    const [header, ...records] = matrix;
    if (!header) return createTable([], []);
    const columns = normalizeHeaders(header);
    return createTable(
      columns,
      records.map((cells) => toRow(columns, cells.map(normalizeSheetCell))),
    );
  },
};

// .xlsx is a ZIP container (PK), legacy .xls an OLE compound file.
const WORKBOOK_MAGIC = [
  [0x50, 0x4b, 0x03, 0x04],
  [0xd0, 0xcf, 0x11, 0xe0],
];

function isWorkbook(bytes: Uint8Array): boolean {
  return WORKBOOK_MAGIC.some((magic) => magic.every((b, i) => bytes[i] === b));
}

const READERS: readonly TableReader[] = [csvReader, excelReader];

export function readerFor(file: string): TableReader {
  const ext = extensionOf(file);
  const reader = READERS.find((r) => r.extensions.includes(ext));
  if (!reader) {
    throw new LeadError('UNSUPPORTED_FILE_TYPE', `Unsupported file type: ${file}`, file);
  }
  return reader;
}

export function readUpload(upload: Upload): RecordTable {
  return readerFor(upload.name).read(upload.bytes, upload.name);
}

function toRow(columns: readonly string[], cells: readonly Cell[]): Record<string, Cell> {
  const row = blankRow();
  columns.forEach((c, i) => {
    row[c] = cells[i] ?? null;
  });
  return row;
}
