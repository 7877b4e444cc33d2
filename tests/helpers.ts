import { DateTime } from 'luxon';
import * as XLSX from 'xlsx';
import JSZip from 'jszip';
import { LeadError } from '../src/pipeline/errors.js';
import type { Download, Upload } from '../src/sources/uploads.js';

export const FIXED_NOW = DateTime.fromObject({ year: 2024, month: 3, day: 5, hour: 9, minute: 7, second: 3 });
export const FIXED_STAMP = '2024-03-05_09-07-03';

export function csvUpload(name: string, text: string): Upload {
  return { name, bytes: Buffer.from(text, 'utf-8') };
}

export function xlsxUpload(name: string, rows: unknown[][]): Upload {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), 'Leads');
  const bytes: Buffer = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
  return { name, bytes };
}

export function text(download: Download | undefined): string {
  if (!download) throw new Error('missing download');
  return download.bytes.toString('utf-8');
}

export async function unzip(download: Download | undefined): Promise<Record<string, string>> {
  if (!download) throw new Error('missing download');
  const zip = await JSZip.loadAsync(download.bytes);
  const out: Record<string, string> = {};
  for (const name of Object.keys(zip.files).sort()) {
    const entry = zip.file(name);
    if (entry) out[name] = await entry.async('string');
  }
  return out;
}

export function catchLeadError(fn: () => unknown): LeadError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LeadError) return err;
    throw err;
  }
  throw new Error('expected a LeadError');
}
