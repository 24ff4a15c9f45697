import { z } from 'zod';
import type { ArchiveEntry } from '../engines/archive.js';
import type { PageImage } from '../engines/pdf.js';
import { PDF_MIME, SINGLE_PDF, ZIP_MIME, artifactOutput, defineOperation, type Operation } from './define.js';

const IMAGE_PAGE_DPI = 100;
const RENDER_DPI = 150;
const RENDER_JPEG_QUALITY = 85;

function imagesToPdf(tool: 'images_to_pdf' | 'jpg_to_pdf'): Operation {
  return defineOperation({
    tool,
    failurePrefix: 'Image to PDF failed',
    input: { field: 'files', min: 1, missingMessage: 'No images uploaded.' },
    pdfOnly: false,
    options: z.object({}),
    async transform({ inputs, registry, output }) {
      const imaging = registry.engine('imaging');
      const images: PageImage[] = [];
      for (const input of inputs) {
        images.push(await imaging.toJpegPage(input.path));
      }

      const artifact = output('.pdf', PDF_MIME, 'images.pdf');
      await registry.engine('pdf').imagesToDocument(images, IMAGE_PAGE_DPI, artifact.path);
      return artifactOutput(artifact);
    },
  });
}

export const imagesToPdfOperation = imagesToPdf('images_to_pdf');
export const jpgToPdfOperation = imagesToPdf('jpg_to_pdf');

export const pdfToJpg = defineOperation({
  tool: 'pdf_to_jpg',
  failurePrefix: 'PDF to JPG failed',
  input: SINGLE_PDF,
  pdfOnly: true,
  options: z.object({}),
  async transform({ inputs: [input], registry, output }) {
    const imaging = registry.engine('imaging');
    const entries: ArchiveEntry[] = [];

    for await (const png of registry.engine('raster').renderPages(input.path, RENDER_DPI)) {
      entries.push({
        name: `page_${entries.length + 1}.jpg`,
        data: await imaging.convertToJpeg(png, RENDER_JPEG_QUALITY),
      });
    }

    const artifact = output('.zip', ZIP_MIME, 'pdf_pages.zip');
    await registry.engine('archive').writeZip(entries, artifact.path, 'STORE');
    return artifactOutput(artifact);
  },
});
