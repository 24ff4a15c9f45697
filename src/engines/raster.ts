import { pdf as pdfToImg } from 'pdf-to-img';

/** Yields each page of the document as a PNG rendered at `dpi`. */
export async function* renderPages(inputPath: string, dpi: number): AsyncGenerator<Buffer> {
  const document = await pdfToImg(inputPath, { scale: dpi / 72 });
  for await (const page of document) {
    yield page;
  }
}
