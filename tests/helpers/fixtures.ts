import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import JSZip from 'jszip';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';
import { ArtifactStore } from '../../src/artifact-store.js';

export const BASE_PAGE_WIDTH = 200;
export const PAGE_HEIGHT = 300;

/** Page i (zero-based) is BASE_PAGE_WIDTH + 10 * i points wide, so page order is observable. */
export async function makePdf(pageCount: number, title?: string): Promise<Buffer> {
  const document = await PDFDocument.create();
  for (let index = 0; index < pageCount; index++) {
    document.addPage([BASE_PAGE_WIDTH + 10 * index, PAGE_HEIGHT]);
  }
  if (title) document.setTitle(title);
  return Buffer.from(await document.save());
}

export async function pageWidths(pdf: Uint8Array): Promise<number[]> {
  const document = await PDFDocument.load(pdf);
  return document.getPages().map((page) => page.getWidth());
}

export async function pageRotations(pdf: Uint8Array): Promise<number[]> {
  const document = await PDFDocument.load(pdf);
  return document.getPages().map((page) => page.getRotation().angle);
}

export async function makePng(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 4, background: { r: 200, g: 40, b: 40, alpha: 0.5 } },
  })
    .png()
    .toBuffer();
}

export async function readZipEntry(zip: JSZip, name: string): Promise<Buffer> {
  const entry = zip.file(name);
  if (!entry) throw new Error(`Archive has no entry ${name}`);
  return entry.async('nodebuffer');
}

export interface TempStore {
  root: string;
  store: ArtifactStore;
  uploads(): Promise<string[]>;
  outputs(): Promise<string[]>;
  cleanup(): Promise<void>;
}

export async function createTempStore(retentionMs = 60 * 60 * 1000): Promise<TempStore> {
  const root = await mkdtemp(path.join(tmpdir(), 'pdf-workbench-'));
  const uploadDir = path.join(root, 'uploads');
  const outputDir = path.join(root, 'outputs');
  const store = new ArtifactStore({ uploadDir, outputDir, retentionMs });
  await store.init();

  return {
    root,
    store,
    uploads: () => readdir(uploadDir),
    outputs: () => readdir(outputDir),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}
