import type { ToolName } from '../capabilities.js';
import { imagesToPdfOperation, jpgToPdfOperation, pdfToJpg } from './convert.js';
import type { Operation } from './define.js';
import { info } from './info.js';
import { compress, extract, merge, removePages, rotate, split } from './organize.js';
import { protect, unlock } from './security.js';
import { pageNumbers, watermark } from './stamp.js';

export const OPERATIONS: Record<ToolName, Operation> = {
  merge,
  split,
  compress,
  rotate,
  extract,
  remove_pages: removePages,
  page_numbers: pageNumbers,
  watermark,
  protect,
  unlock,
  images_to_pdf: imagesToPdfOperation,
  jpg_to_pdf: jpgToPdfOperation,
  pdf_to_jpg: pdfToJpg,
  info,
};

export type { Operation, FormFields, TransformContext, TransformOutput } from './define.js';
