import { readFile, writeFile } from 'node:fs/promises';
import { PDFDocument } from '@cantoo/pdf-lib';

export type DecryptOutcome = 'decrypted' | 'not-encrypted' | 'wrong-password';

// Messages @cantoo/pdf-lib's cipher factory throws for a missing or wrong password.
const PASSWORD_REJECTIONS = new Set(['Password incorrect', 'NEEDS PASSWORD']);

function isPasswordRejection(error: unknown): boolean {
  return error instanceof Error && PASSWORD_REJECTIONS.has(error.message);
}

async function copyInto(source: PDFDocument): Promise<PDFDocument> {
  const target = await PDFDocument.create();
  const pages = await target.copyPages(source, source.getPageIndices());
  pages.forEach((page) => target.addPage(page));
  return target;
}

/** Writes a copy of the document that needs `password` to open. */
export async function encryptDocument(inputPath: string, outputPath: string, password: string): Promise<void> {
  const source = await PDFDocument.load(await readFile(inputPath));
  const target = await copyInto(source);

  target.encrypt({ userPassword: password, ownerPassword: password });
  // Plain xref keeps the page tree readable to tools that skip decryption.
  await writeFile(outputPath, await target.save({ useObjectStreams: false }));
}

/**
 * Writes an unencrypted copy of the document. Nothing is written when the
 * password does not open it.
 */
export async function decryptDocument(inputPath: string, outputPath: string, password: string): Promise<DecryptOutcome> {
  const bytes = await readFile(inputPath);
  const probe = await PDFDocument.load(bytes, { ignoreEncryption: true });

  if (!probe.isEncrypted) {
    await writeFile(outputPath, await (await copyInto(probe)).save());
    return 'not-encrypted';
  }

  let source: PDFDocument;
  try {
    source = await PDFDocument.load(bytes, { password });
  } catch (error) {
    if (isPasswordRejection(error)) return 'wrong-password';
    throw error;
  }

  await writeFile(outputPath, await (await copyInto(source)).save());
  return 'decrypted';
}
