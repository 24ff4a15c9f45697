import { z } from 'zod';
import { blankAsUnset } from '../config.js';
import { fail } from '../errors.js';
import type { StandardFontName } from '../engines/fonts.js';
import type { PageGeometry, TextStamp } from '../engines/pdf.js';
import { PDF_MIME, SINGLE_PDF, artifactOutput, defineOperation } from './define.js';

export type MeasureText = (text: string, font: StandardFontName, size: number) => number;

export const PAGE_NUMBER_POSITIONS = ['bottom-center', 'bottom-right', 'bottom-left', 'top-center'] as const;
export type PageNumberPosition = (typeof PAGE_NUMBER_POSITIONS)[number];

const PAGE_NUMBER_SIZE = 10;
const PAGE_NUMBER_MARGIN = 30;
const PAGE_NUMBER_BASELINE = 20;

const WATERMARK_SIZE = 48;
const WATERMARK_ANGLE = 45;

/** "i / n" in the requested corner or edge, 10pt Helvetica. */
export function layoutPageNumber(page: PageGeometry, position: PageNumberPosition, measure: MeasureText): TextStamp {
  const text = `${page.index + 1} / ${page.total}`;
  const textWidth = measure(text, 'Helvetica', PAGE_NUMBER_SIZE);
  const centered = (page.width - textWidth) / 2;

  const placement: Record<PageNumberPosition, { x: number; y: number }> = {
    'bottom-center': { x: centered, y: PAGE_NUMBER_BASELINE },
    'bottom-right': { x: page.width - textWidth - PAGE_NUMBER_MARGIN, y: PAGE_NUMBER_BASELINE },
    'bottom-left': { x: PAGE_NUMBER_MARGIN, y: PAGE_NUMBER_BASELINE },
    'top-center': { x: centered, y: page.height - PAGE_NUMBER_MARGIN },
  };

  return {
    text,
    ...placement[position],
    size: PAGE_NUMBER_SIZE,
    font: 'Helvetica',
    gray: 0.4,
    opacity: 1,
    rotateDegrees: 0,
  };
}

/**
 * Diagonal text centred on the page. pdf-lib rotates text about its start
 * point, so the start is moved back half the text width along the 45° line.
 */
export function layoutWatermark(page: PageGeometry, text: string, opacity: number, measure: MeasureText): TextStamp {
  const halfWidth = measure(text, 'Helvetica-Bold', WATERMARK_SIZE) / 2;
  const radians = (WATERMARK_ANGLE * Math.PI) / 180;

  return {
    text,
    x: page.width / 2 - halfWidth * Math.cos(radians),
    y: page.height / 2 - halfWidth * Math.sin(radians),
    size: WATERMARK_SIZE,
    font: 'Helvetica-Bold',
    gray: 0.6,
    opacity,
    rotateDegrees: WATERMARK_ANGLE,
  };
}

export const pageNumbers = defineOperation({
  tool: 'page_numbers',
  failurePrefix: 'Page numbers failed',
  input: SINGLE_PDF,
  pdfOnly: true,
  options: z.object({
    position: z.enum(PAGE_NUMBER_POSITIONS).catch('bottom-center'),
  }),
  async transform({ inputs: [input], registry, output }, { position }) {
    const { widthOfText } = registry.engine('fonts');
    const artifact = output('.pdf', PDF_MIME, 'page_numbers.pdf');

    await registry
      .engine('pdf')
      .stampText(input.path, artifact.path, (page) => layoutPageNumber(page, position, widthOfText));
    return artifactOutput(artifact);
  },
});

const OPACITY_MESSAGE = 'Opacity must be a number between 0 and 1.';

export const watermark = defineOperation({
  tool: 'watermark',
  failurePrefix: 'Watermark failed',
  input: SINGLE_PDF,
  pdfOnly: true,
  options: z.object({
    text: z.string().trim().min(1, 'Watermark text cannot be empty.').default('CONFIDENTIAL'),
    opacity: z.preprocess(
      blankAsUnset,
      z.coerce
        .number({ invalid_type_error: OPACITY_MESSAGE })
        .min(0, OPACITY_MESSAGE)
        .max(1, OPACITY_MESSAGE)
        .default(0.3),
    ),
  }),
  async transform({ inputs: [input], registry, output }, { text, opacity }) {
    const { widthOfText, drawableText } = registry.engine('fonts');
    const drawable = drawableText(text).trim();
    if (drawable.length === 0) {
      return fail('validation', 'Watermark text has no characters the standard fonts can draw.');
    }

    const artifact = output('.pdf', PDF_MIME, 'watermarked.pdf');
    await registry
      .engine('pdf')
      .stampText(input.path, artifact.path, (page) => layoutWatermark(page, drawable, opacity, widthOfText));
    return artifactOutput(artifact);
  },
});
