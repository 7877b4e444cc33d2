import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { LeadError } from '../pipeline/errors.js';
import { log } from '../utils/log.js';

export type Upload = {
  name: string;
  bytes: Uint8Array;
};

export type Download = {
  name: string;
  bytes: Buffer;
  mimeType: 'text/csv' | 'application/zip';
};

export type LoadedUploads = {
  uploads: Upload[];
  failures: LeadError[];
};

/** Read every path on its own; a path that cannot be read becomes a failure. */
export async function loadUploads(paths: readonly string[]): Promise<LoadedUploads> {
  const uploads: Upload[] = [];
  const failures: LeadError[] = [];
  for (const p of paths) {
    const name = path.basename(p);
    try {
      const bytes = await readFile(p);
      log.debug('Loaded upload:', p, `${bytes.length} bytes`);
      uploads.push({ name, bytes });
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      log.error(`Cannot read ${name}:`, reason);
      failures.push(new LeadError('READ_ERROR', `Cannot read ${name}: ${reason}`, name, { path: p }));
    }
  }
  return { uploads, failures };
}

export async function saveDownloads(outDir: string, downloads: readonly Download[]): Promise<string[]> {
  await mkdir(outDir, { recursive: true });
  const written: string[] = [];
  for (const d of downloads) {
    const target = path.join(outDir, d.name);
    await writeFile(target, d.bytes);
    log.info('Wrote', target);
    written.push(target);
  }
  return written;
}
