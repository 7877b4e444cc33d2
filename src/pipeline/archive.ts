import JSZip from 'jszip';
import type { Download } from '../sources/uploads.js';

export type ArchiveEntry = {
  name: string;
  bytes: Uint8Array;
};

export async function buildArchive(name: string, entries: Iterable<ArchiveEntry>): Promise<Download> {
  const zip = new JSZip();
  for (const e of entries) zip.file(e.name, e.bytes);
  const bytes = await zip.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  });
  return { name, bytes, mimeType: 'application/zip' };
}
