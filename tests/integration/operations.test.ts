import { readFile, stat } from 'node:fs/promises';
import JSZip from 'jszip';
import { PDFDocument, PDFHexString } from 'pdf-lib';
import sharp from 'sharp';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { CapabilityRegistry, type ToolName } from '../../src/capabilities.js';
import type { OperationError } from '../../src/errors.js';
import { OPERATIONS, type FormFields, type TransformOutput } from '../../src/operations/index.js';
import { runPipeline, type IncomingFile } from '../../src/pipeline.js';
import {
  createTempStore,
  makePdf,
  makePng,
  pageRotations,
  pageWidths,
  readZipEntry,
  type TempStore,
} from '../helpers/fixtures.js';

type Artifact = Extract<TransformOutput, { kind: 'artifact' }>;

let registry: CapabilityRegistry;
let temp: TempStore;

beforeAll(async () => {
  registry = await CapabilityRegistry.load({
    // pdfjs is not needed to exercise the JPEG/ZIP side of pdf_to_jpg.
    raster: async () => ({
      async *renderPages() {
        yield await makePng(20, 30);
        yield await makePng(20, 30);
      },
    }),
  });
});

beforeEach(async () => {
  temp = await createTempStore();
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await temp.cleanup();
});

async function attempt(tool: ToolName, files: IncomingFile[], fields: FormFields = {}) {
  const outputs: TransformOutput[] = [];
  const outcome = await runPipeline(OPERATIONS[tool], { files, fields }, { store: temp.store, registry }, async (output) => {
    outputs.push(output);
  });
  return { outcome, output: outputs[0] };
}

async function artifactOf(tool: ToolName, files: IncomingFile[], fields: FormFields = {}): Promise<Artifact> {
  const { outcome, output } = await attempt(tool, files, fields);
  if (outcome.state === 'FAILED') throw new Error(`${tool} failed: ${outcome.error.message}`);
  if (output?.kind !== 'artifact') throw new Error(`${tool} returned no artifact`);
  return output;
}

async function bytesOf(tool: ToolName, files: IncomingFile[], fields: FormFields = {}): Promise<Buffer> {
  return readFile((await artifactOf(tool, files, fields)).artifact.path);
}

async function errorOf(tool: ToolName, files: IncomingFile[], fields: FormFields = {}): Promise<OperationError> {
  const { outcome } = await attempt(tool, files, fields);
  if (outcome.state !== 'FAILED') throw new Error(`${tool} unexpectedly succeeded`);
  return outcome.error;
}

async function pdf(name: string, pages: number, title?: string): Promise<IncomingFile> {
  return { originalName: name, content: await makePdf(pages, title) };
}

describe('merge', () => {
  it('concatenates documents in upload order', async () => {
    const merged = await bytesOf('merge', [await pdf('a.pdf', 2), await pdf('b.PDF', 3)]);

    expect(await pageWidths(merged)).toEqual([200, 210, 200, 210, 220]);
  });
});

describe('split', () => {
  it('zips one document per page by default', async () => {
    const { artifact } = await artifactOf('split', [await pdf('a.pdf', 3)]);
    const zip = await JSZip.loadAsync(await readFile(artifact.path));

    expect(artifact.downloadName).toBe('split_pages.zip');
    expect(artifact.mimeType).toBe('application/zip');
    expect(Object.keys(zip.files).sort()).toEqual(['page_1.pdf', 'page_2.pdf', 'page_3.pdf']);
    expect(await pageWidths(await readZipEntry(zip, 'page_3.pdf'))).toEqual([220]);
  });

  it('merging the split pages restores the document', async () => {
    const { artifact } = await artifactOf('split', [await pdf('a.pdf', 3)]);
    const zip = await JSZip.loadAsync(await readFile(artifact.path));
    const pages = await Promise.all(
      ['page_1.pdf', 'page_2.pdf', 'page_3.pdf'].map(async (name) => ({
        originalName: name,
        content: await readZipEntry(zip, name),
      })),
    );

    expect(await pageWidths(await bytesOf('merge', pages))).toEqual([200, 210, 220]);
  });

  it('writes the selected range as one document', async () => {
    const { artifact } = await artifactOf('split', [await pdf('a.pdf', 4)], { mode: 'range', range: '3-9, 1' });

    expect(artifact.downloadName).toBe('split.pdf');
    expect(await pageWidths(await readFile(artifact.path))).toEqual([220, 230, 200]);
  });

  it('rejects a range that selects nothing', async () => {
    expect(await errorOf('split', [await pdf('a.pdf', 2)], { mode: 'range', range: '5, x' })).toEqual({
      kind: 'validation',
      message: 'Invalid page range.',
    });
  });

  it('treats any mode other than "all" as a range selection', async () => {
    const { artifact } = await artifactOf('split', [await pdf('a.pdf', 3)], { mode: 'pages', range: '2' });

    expect(artifact.downloadName).toBe('split.pdf');
    expect(await pageWidths(await readFile(artifact.path))).toEqual([210]);
  });
});

describe('extract', () => {
  it('keeps the requested order and duplicates', async () => {
    const extracted = await bytesOf('extract', [await pdf('a.pdf', 3)], { range: '3,1,3' });

    expect(await pageWidths(extracted)).toEqual([220, 200, 220]);
  });

  it('takes the first page by default', async () => {
    expect(await pageWidths(await bytesOf('extract', [await pdf('a.pdf', 3)]))).toEqual([200]);
  });
});

describe('remove_pages', () => {
  it('drops the listed pages', async () => {
    const remaining = await bytesOf('remove_pages', [await pdf('a.pdf', 5)], { pages: '2,4-5' });

    expect(await pageWidths(remaining)).toEqual([200, 220]);
  });

  it('refuses an empty selection', async () => {
    expect(await errorOf('remove_pages', [await pdf('a.pdf', 2)])).toEqual({
      kind: 'validation',
      message: 'Invalid page range.',
    });
  });

  it('refuses to remove every page', async () => {
    expect(await errorOf('remove_pages', [await pdf('a.pdf', 2)], { pages: '1-2' })).toEqual({
      kind: 'validation',
      message: 'Cannot remove every page.',
    });
  });
});

describe('rotate', () => {
  it('adds to the existing rotation', async () => {
    const once = await bytesOf('rotate', [await pdf('a.pdf', 2)], { angle: '270' });
    const twice = await bytesOf('rotate', [{ originalName: 'once.pdf', content: once }], { angle: '180' });

    expect(await pageRotations(once)).toEqual([270, 270]);
    expect(await pageRotations(twice)).toEqual([90, 90]);
  });

  it('comes back to zero after four quarter turns', async () => {
    let content = await makePdf(1);
    for (let turn = 0; turn < 4; turn++) {
      content = await bytesOf('rotate', [{ originalName: 'a.pdf', content }]);
    }

    expect(await pageRotations(content)).toEqual([0]);
  });
});

describe('compress', () => {
  it('reports sizes and keeps the metadata', async () => {
    const input = await makePdf(3, 'Quarterly report');
    const { artifact, headers } = await artifactOf('compress', [{ originalName: 'big.pdf', content: input }]);
    const compressedSize = (await stat(artifact.path)).size;
    const expectedPercent = ((1 - compressedSize / input.length) * 100).toFixed(1);

    expect(headers).toEqual({
      'X-Original-Size': String(input.length),
      'X-Compressed-Size': String(compressedSize),
      'X-Reduction-Percent': expectedPercent,
    });

    const output = await PDFDocument.load(await readFile(artifact.path));
    expect(output.getTitle()).toBe('Quarterly report');
    expect(output.getPageCount()).toBe(3);
  });
});

describe('page_numbers', () => {
  it('stamps every page and keeps the geometry', async () => {
    const input = await makePdf(3);
    const stamped = await bytesOf('page_numbers', [{ originalName: 'a.pdf', content: input }], {
      position: 'top-center',
    });

    expect(await pageWidths(stamped)).toEqual([200, 210, 220]);
    expect(stamped.length).toBeGreaterThan(input.length);
  });

  it('falls back to bottom-center for an unknown position', async () => {
    const stamped = await bytesOf('page_numbers', [await pdf('a.pdf', 1)], { position: 'middle' });

    expect(await pageWidths(stamped)).toEqual([200]);
  });
});

describe('watermark', () => {
  it('stamps the document', async () => {
    const input = await makePdf(2);
    const stamped = await bytesOf('watermark', [{ originalName: 'a.pdf', content: input }], {
      text: 'DRAFT',
      opacity: '0.5',
    });

    expect(await pageWidths(stamped)).toEqual([200, 210]);
    expect(stamped.length).toBeGreaterThan(input.length);
  });

  it('drops characters the standard fonts cannot draw', async () => {
    const stamped = await bytesOf('watermark', [await pdf('a.pdf', 1)], { text: 'Entwurf – 草稿' });

    expect(await pageWidths(stamped)).toEqual([200]);
  });

  it('uses the default opacity when the field is blank', async () => {
    const stamped = await bytesOf('watermark', [await pdf('a.pdf', 1)], { opacity: '' });

    expect(await pageWidths(stamped)).toEqual([200]);
  });

  it('rejects text with nothing drawable', async () => {
    expect(await errorOf('watermark', [await pdf('a.pdf', 1)], { text: '草稿' })).toEqual({
      kind: 'validation',
      message: 'Watermark text has no characters the standard fonts can draw.',
    });
  });

  it.each<[FormFields, string]>([
    [{ opacity: '1.5' }, 'Opacity must be a number between 0 and 1.'],
    [{ opacity: 'lots' }, 'Opacity must be a number between 0 and 1.'],
    [{ text: '   ' }, 'Watermark text cannot be empty.'],
  ])('rejects %o', async (fields, message) => {
    expect(await errorOf('watermark', [await pdf('a.pdf', 1)], fields)).toEqual({ kind: 'validation', message });
  });
});

describe('protect and unlock', () => {
  it('encrypts with a password and decrypts with the same one', async () => {
    const locked = await bytesOf('protect', [await pdf('a.pdf', 2)], { password: 'test-password' });

    const { outcome, output } = await attempt('info', [{ originalName: 'locked.pdf', content: locked }]);
    expect(outcome.state).toBe('RESPONDED');
    expect(output?.kind === 'json' ? output.body : undefined).toMatchObject({ pages: 2, encrypted: true });

    const unlocked = await bytesOf('unlock', [{ originalName: 'locked.pdf', content: locked }], {
      password: 'test-password',
    });
    const reopened = await PDFDocument.load(unlocked);
    expect(reopened.isEncrypted).toBe(false);
    expect(reopened.getPages().map((page) => page.getWidth())).toEqual([200, 210]);
  });

  it('produces a document that will not open without the password', async () => {
    const locked = await bytesOf('protect', [await pdf('a.pdf', 1)], { password: 'test-password' });

    await expect(PDFDocument.load(locked)).rejects.toThrow();
  });

  it('refuses a wrong password and leaves no output behind', async () => {
    const locked = await bytesOf('protect', [await pdf('a.pdf', 1)], { password: 'test-password' });
    const before = await temp.outputs();

    expect(await errorOf('unlock', [{ originalName: 'locked.pdf', content: locked }], { password: 'not-it' })).toEqual({
      kind: 'transform',
      message: 'Wrong password. Please enter the correct password.',
    });
    expect(await temp.outputs()).toEqual(before);
    expect(await temp.uploads()).toEqual([]);
  });

  it('treats a missing password on an encrypted document as wrong', async () => {
    const locked = await bytesOf('protect', [await pdf('a.pdf', 1)], { password: 'test-password' });

    expect(await errorOf('unlock', [{ originalName: 'locked.pdf', content: locked }])).toEqual({
      kind: 'transform',
      message: 'Wrong password. Please enter the correct password.',
    });
  });

  it('reports encryption it cannot handle as an unlock failure', async () => {
    const document = await PDFDocument.create();
    document.addPage([200, 300]);
    document.context.trailerInfo.Encrypt = document.context.obj({ Filter: 'Custom', V: 2 });
    document.context.trailerInfo.ID = document.context.obj([PDFHexString.of('0123'), PDFHexString.of('0123')]);
    const content = Buffer.from(await document.save({ useObjectStreams: false }));

    expect(await errorOf('unlock', [{ originalName: 'custom.pdf', content }], { password: 'test-password' })).toEqual({
      kind: 'transform',
      message: 'Unlock failed: unknown encryption method',
    });
  });

  it('requires a password to protect', async () => {
    expect(await errorOf('protect', [await pdf('a.pdf', 1)])).toEqual({
      kind: 'validation',
      message: 'Please provide a password.',
    });
    expect(await errorOf('protect', [await pdf('a.pdf', 1)], { password: '' })).toEqual({
      kind: 'validation',
      message: 'Please provide a password.',
    });
  });

  it('passes an unencrypted document through unlock', async () => {
    const unlocked = await bytesOf('unlock', [await pdf('a.pdf', 2)]);

    expect(await pageWidths(unlocked)).toEqual([200, 210]);
  });
});

describe('images_to_pdf', () => {
  it('sizes each page from the image at 100 DPI', async () => {
    const document = await bytesOf('images_to_pdf', [
      { originalName: 'wide.png', content: await makePng(200, 100) },
      { originalName: 'tall.PNG', content: await makePng(50, 80) },
    ]);

    const pages = (await PDFDocument.load(document)).getPages().map((page) => page.getSize());
    expect(pages).toHaveLength(2);
    expect(pages[0]?.width).toBeCloseTo(144, 6);
    expect(pages[0]?.height).toBeCloseTo(72, 6);
    expect(pages[1]?.width).toBeCloseTo(36, 6);
    expect(pages[1]?.height).toBeCloseTo(57.6, 6);
  });

  it('serves jpg_to_pdf with the same conversion', async () => {
    const { artifact } = await artifactOf('jpg_to_pdf', [{ originalName: 'photo.png', content: await makePng(100, 100) }]);

    expect(artifact.downloadName).toBe('images.pdf');
    expect(await pageWidths(await readFile(artifact.path))).toEqual([72]);
  });

  it('rejects a request without images', async () => {
    expect(await errorOf('images_to_pdf', [])).toEqual({ kind: 'not_found', message: 'No images uploaded.' });
  });

  it('reports an unreadable image as a conversion failure', async () => {
    const error = await errorOf('images_to_pdf', [{ originalName: 'fake.png', content: Buffer.from('not an image') }]);

    expect(error.kind).toBe('transform');
    expect(error.message).toMatch(/^Image to PDF failed: /);
  });
});

describe('pdf_to_jpg', () => {
  it('zips one JPEG per rendered page', async () => {
    const { artifact } = await artifactOf('pdf_to_jpg', [await pdf('a.pdf', 2)]);
    const zip = await JSZip.loadAsync(await readFile(artifact.path));

    expect(artifact.downloadName).toBe('pdf_pages.zip');
    expect(Object.keys(zip.files).sort()).toEqual(['page_1.jpg', 'page_2.jpg']);

    const first = await readZipEntry(zip, 'page_1.jpg');
    expect([...first.subarray(0, 3)]).toEqual([0xff, 0xd8, 0xff]);
    const metadata = await sharp(first).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(20);
    expect(metadata.height).toBe(30);
  });
});

describe('info', () => {
  it('describes the document', async () => {
    const input = await makePdf(3, 'Quarterly report');
    const { outcome, output } = await attempt('info', [{ originalName: 'a.pdf', content: input }]);

    expect(outcome.state).toBe('RESPONDED');
    expect(output?.kind).toBe('json');
    expect(output?.kind === 'json' ? output.body : undefined).toMatchObject({
      pages: 3,
      encrypted: false,
      metadata: { title: 'Quarterly report', author: '', subject: '' },
      width: 200,
      height: 300,
      file_size: input.length,
    });
  });
});
