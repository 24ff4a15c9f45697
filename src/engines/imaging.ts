import sharp from 'sharp';
import type { PageImage } from './pdf.js';

/**
 * Decodes any image sharp understands and re-encodes it as an RGB JPEG,
 * flattening transparency onto white.
 */
export async function toJpegPage(inputPath: string): Promise<PageImage> {
  const { data, info } = await sharp(inputPath)
    .rotate()
    .flatten({ background: '#ffffff' })
    .toColourspace('srgb')
    .jpeg({ quality: 92 })
    .toBuffer({ resolveWithObject: true });

  return { jpeg: data, width: info.width, height: info.height };
}

export async function convertToJpeg(image: Buffer, quality: number): Promise<Buffer> {
  return sharp(image).flatten({ background: '#ffffff' }).jpeg({ quality }).toBuffer();
}
