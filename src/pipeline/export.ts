import { createObjectCsvStringifier } from 'csv-writer';
import type { Download } from '../sources/uploads.js';
import { isEmpty, type RecordTable } from './table.js';

export function toCsvBytes(table: RecordTable): Buffer {
  const csv = createObjectCsvStringifier({
    header: table.columns.map((c) => ({ id: c, title: c })),
  });
  const header = csv.getHeaderString() ?? '';
  const body = isEmpty(table) ? '' : csv.stringifyRecords([...table.rows]);
  return Buffer.from(header + body, 'utf-8');
}

export function csvDownload(name: string, table: RecordTable): Download {
  return { name, bytes: toCsvBytes(table), mimeType: 'text/csv' };
}
