import { readFile, writeFile } from 'node:fs/promises';
import { PDFDocument, StandardFonts, degrees, rgb } from 'pdf-lib';

export interface SourceDocument {
  readonly pageCount: number;
  /** Writes the given pages, in order, to a new document at `outputPath`. */
  writePages(indices: readonly number[], outputPath: string): Promise<void>;
  /** Serializes every page as its own single-page document. */
  splitPages(): Promise<Uint8Array[]>;
}

export interface PageGeometry {
  index: number;
  total: number;
  width: number;
  height: number;
}

export interface TextStamp {
  text: string;
  x: number;
  y: number;
  size: number;
  font: 'Helvetica' | 'Helvetica-Bold';
  gray: number;
  opacity: number;
  rotateDegrees: number;
}

export interface PageImage {
  jpeg: Buffer;
  width: number;
  height: number;
}

export interface DocumentInfo {
  pages: number;
  encrypted: boolean;
  metadata: {
    title: string;
    author: string;
    creator: string;
    subject: string;
  };
  width?: number;
  height?: number;
}

async function load(inputPath: string): Promise<PDFDocument> {
  return PDFDocument.load(await readFile(inputPath));
}

async function save(document: PDFDocument, outputPath: string): Promise<void> {
  await writeFile(outputPath, await document.save());
}

export async function openDocument(inputPath: string): Promise<SourceDocument> {
  const source = await load(inputPath);

  return {
    pageCount: source.getPageCount(),

    async writePages(indices, outputPath) {
      const target = await PDFDocument.create();
      const pages = await target.copyPages(source, [...indices]);
      pages.forEach((page) => target.addPage(page));
      await save(target, outputPath);
    },

    async splitPages() {
      const parts: Uint8Array[] = [];
      for (const index of source.getPageIndices()) {
        const single = await PDFDocument.create();
        const [page] = await single.copyPages(source, [index]);
        single.addPage(page);
        parts.push(await single.save());
      }
      return parts;
    },
  };
}

export async function mergeDocuments(inputPaths: readonly string[], outputPath: string): Promise<void> {
  const merged = await PDFDocument.create();

  for (const inputPath of inputPaths) {
    const source = await load(inputPath);
    const pages = await merged.copyPages(source, source.getPageIndices());
    pages.forEach((page) => merged.addPage(page));
  }

  await save(merged, outputPath);
}

/** Adds `angle` to each page's existing rotation. */
export async function rotatePages(inputPath: string, angle: number, outputPath: string): Promise<void> {
  const document = await load(inputPath);

  for (const page of document.getPages()) {
    const current = page.getRotation().angle;
    page.setRotation(degrees((((current + angle) % 360) + 360) % 360));
  }

  await save(document, outputPath);
}

/**
 * Rebuilds the document from its pages, which drops unreferenced objects,
 * and writes it with object streams. Document metadata is carried over.
 */
export async function recompress(inputPath: string, outputPath: string): Promise<void> {
  const source = await load(inputPath);
  const target = await PDFDocument.create({ updateMetadata: false });

  const pages = await target.copyPages(source, source.getPageIndices());
  pages.forEach((page) => target.addPage(page));

  const title = source.getTitle();
  const author = source.getAuthor();
  const subject = source.getSubject();
  const creator = source.getCreator();
  const producer = source.getProducer();
  const keywords = source.getKeywords();
  if (title) target.setTitle(title);
  if (author) target.setAuthor(author);
  if (subject) target.setSubject(subject);
  if (creator) target.setCreator(creator);
  if (producer) target.setProducer(producer);
  if (keywords) target.setKeywords([keywords]);

  await writeFile(outputPath, await target.save({ useObjectStreams: true }));
}

/** Draws one text stamp per page, as laid out by `layout`. */
export async function stampText(
  inputPath: string,
  outputPath: string,
  layout: (page: PageGeometry) => TextStamp,
): Promise<void> {
  const document = await load(inputPath);
  const fonts = {
    Helvetica: await document.embedFont(StandardFonts.Helvetica),
    'Helvetica-Bold': await document.embedFont(StandardFonts.HelveticaBold),
  };

  const pages = document.getPages();
  pages.forEach((page, index) => {
    const { width, height } = page.getSize();
    const stamp = layout({ index, total: pages.length, width, height });

    page.drawText(stamp.text, {
      x: stamp.x,
      y: stamp.y,
      size: stamp.size,
      font: fonts[stamp.font],
      color: rgb(stamp.gray, stamp.gray, stamp.gray),
      opacity: stamp.opacity,
      rotate: degrees(stamp.rotateDegrees),
    });
  });

  await save(document, outputPath);
}

/**
 * Builds a document with one page per image. Page size is the image size at
 * `dpi`, in points.
 */
export async function imagesToDocument(images: readonly PageImage[], dpi: number, outputPath: string): Promise<void> {
  const document = await PDFDocument.create();
  const scale = 72 / dpi;

  for (const image of images) {
    const embedded = await document.embedJpg(image.jpeg);
    const width = image.width * scale;
    const height = image.height * scale;
    const page = document.addPage([width, height]);
    page.drawImage(embedded, { x: 0, y: 0, width, height });
  }

  await save(document, outputPath);
}

export async function readDocumentInfo(inputPath: string): Promise<DocumentInfo> {
  const document = await PDFDocument.load(await readFile(inputPath), {
    ignoreEncryption: true,
    updateMetadata: false,
  });

  const info: DocumentInfo = {
    pages: document.getPageCount(),
    encrypted: document.isEncrypted,
    metadata: {
      title: document.getTitle() ?? '',
      author: document.getAuthor() ?? '',
      creator: document.getCreator() ?? '',
      subject: document.getSubject() ?? '',
    },
  };

  if (info.pages > 0) {
    const { width, height } = document.getPage(0).getSize();
    info.width = width;
    info.height = height;
  }

  return info;
}
