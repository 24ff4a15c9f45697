import { stat } from 'node:fs/promises';
import { z } from 'zod';
import { fail } from '../errors.js';
import { parsePageRange } from '../page-range.js';
import { PDF_MIME, SINGLE_PDF, ZIP_MIME, artifactOutput, defineOperation } from './define.js';

const INVALID_RANGE = 'Invalid page range.';

const noOptions = z.object({});

export const merge = defineOperation({
  tool: 'merge',
  failurePrefix: 'Merge failed',
  input: {
    field: 'files',
    min: 2,
    missingMessage: 'Please upload at least 2 PDF files to merge.',
    tooFewMessage: 'Please upload at least 2 PDF files to merge.',
  },
  pdfOnly: true,
  options: noOptions,
  async transform({ inputs, registry, output }) {
    const artifact = output('.pdf', PDF_MIME, 'merged.pdf');
    await registry.engine('pdf').mergeDocuments(
      inputs.map((input) => input.path),
      artifact.path,
    );
    return artifactOutput(artifact);
  },
});

export const split = defineOperation({
  tool: 'split',
  failurePrefix: 'Split failed',
  input: SINGLE_PDF,
  pdfOnly: true,
  options: z.object({
    // Anything other than "all" selects by range.
    mode: z.enum(['all', 'range']).catch('range').default('all'),
    range: z.string().default(''),
  }),
  async transform({ inputs: [input], registry, output }, { mode, range }) {
    const document = await registry.engine('pdf').openDocument(input.path);

    if (mode === 'all') {
      const pages = await document.splitPages();
      const artifact = output('.zip', ZIP_MIME, 'split_pages.zip');
      await registry.engine('archive').writeZip(
        pages.map((data, index) => ({ name: `page_${index + 1}.pdf`, data })),
        artifact.path,
      );
      return artifactOutput(artifact);
    }

    const selection = parsePageRange(range, document.pageCount);
    if (selection.length === 0) return fail('validation', INVALID_RANGE);

    const artifact = output('.pdf', PDF_MIME, 'split.pdf');
    await document.writePages(selection, artifact.path);
    return artifactOutput(artifact);
  },
});

export const extract = defineOperation({
  tool: 'extract',
  failurePrefix: 'Extract failed',
  input: SINGLE_PDF,
  pdfOnly: true,
  options: z.object({ range: z.string().default('1') }),
  async transform({ inputs: [input], registry, output }, { range }) {
    const document = await registry.engine('pdf').openDocument(input.path);
    const selection = parsePageRange(range, document.pageCount);
    if (selection.length === 0) return fail('validation', INVALID_RANGE);

    const artifact = output('.pdf', PDF_MIME, 'extracted.pdf');
    await document.writePages(selection, artifact.path);
    return artifactOutput(artifact);
  },
});

export const removePages = defineOperation({
  tool: 'remove_pages',
  failurePrefix: 'Remove pages failed',
  input: SINGLE_PDF,
  pdfOnly: true,
  options: z.object({ pages: z.string().default('') }),
  async transform({ inputs: [input], registry, output }, { pages }) {
    const document = await registry.engine('pdf').openDocument(input.path);
    const removed = new Set(parsePageRange(pages, document.pageCount));
    if (removed.size === 0) return fail('validation', INVALID_RANGE);

    const kept: number[] = [];
    for (let index = 0; index < document.pageCount; index++) {
      if (!removed.has(index)) kept.push(index);
    }
    if (kept.length === 0) return fail('validation', 'Cannot remove every page.');

    const artifact = output('.pdf', PDF_MIME, 'removed_pages.pdf');
    await document.writePages(kept, artifact.path);
    return artifactOutput(artifact);
  },
});

export const rotate = defineOperation({
  tool: 'rotate',
  failurePrefix: 'Rotate failed',
  input: SINGLE_PDF,
  pdfOnly: true,
  options: z.object({
    angle: z
      .enum(['90', '180', '270'], { errorMap: () => ({ message: 'Angle must be 90, 180, or 270.' }) })
      .default('90')
      .transform(Number),
  }),
  async transform({ inputs: [input], registry, output }, { angle }) {
    const artifact = output('.pdf', PDF_MIME, 'rotated.pdf');
    await registry.engine('pdf').rotatePages(input.path, angle, artifact.path);
    return artifactOutput(artifact);
  },
});

export function reductionPercent(originalSize: number, compressedSize: number): string {
  if (originalSize === 0) return '0.0';
  return ((1 - compressedSize / originalSize) * 100).toFixed(1);
}

export const compress = defineOperation({
  tool: 'compress',
  failurePrefix: 'Compress failed',
  input: SINGLE_PDF,
  pdfOnly: true,
  options: noOptions,
  async transform({ inputs: [input], registry, output }) {
    const artifact = output('.pdf', PDF_MIME, 'compressed.pdf');
    await registry.engine('pdf').recompress(input.path, artifact.path);

    const originalSize = (await stat(input.path)).size;
    const compressedSize = (await stat(artifact.path)).size;

    return artifactOutput(artifact, {
      'X-Original-Size': String(originalSize),
      'X-Compressed-Size': String(compressedSize),
      'X-Reduction-Percent': reductionPercent(originalSize, compressedSize),
    });
  },
});
