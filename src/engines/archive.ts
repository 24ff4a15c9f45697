import { writeFile } from 'node:fs/promises';
import JSZip from 'jszip';

export interface ArchiveEntry {
  name: string;
  data: Uint8Array;
}

export async function writeZip(
  entries: readonly ArchiveEntry[],
  outputPath: string,
  compression: 'STORE' | 'DEFLATE' = 'DEFLATE',
): Promise<void> {
  const zip = new JSZip();
  for (const entry of entries) {
    zip.file(entry.name, entry.data);
  }

  const archive = await zip.generateAsync({ type: 'nodebuffer', compression });
  await writeFile(outputPath, archive);
}
