import JSZip from 'jszip';

export interface ArchiveEntry {
  readonly fileName: string;
  readonly bytes: Uint8Array;
}

/** Zip the entries flat, one file per entry name */
export async function buildArchive(entries: readonly ArchiveEntry[]): Promise<Buffer> {
  const zip = new JSZip();
  for (const entry of entries) {
    zip.file(entry.fileName, entry.bytes);
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}
