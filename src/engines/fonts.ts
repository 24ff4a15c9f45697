import { Encodings, Font, FontNames } from '@pdf-lib/standard-fonts';

export type StandardFontName = 'Helvetica' | 'Helvetica-Bold';

// Loaded eagerly so a broken metrics package fails at startup, not mid-request.
const METRICS: Record<StandardFontName, Font> = {
  Helvetica: Font.load(FontNames.Helvetica),
  'Helvetica-Bold': Font.load(FontNames.HelveticaBold),
};

function encodable(character: string): boolean {
  return Encodings.WinAnsi.canEncodeUnicodeCodePoint(character.codePointAt(0) ?? 0);
}

/** `text` without the characters the standard fonts cannot encode. */
export function drawableText(text: string): string {
  return Array.from(text).filter(encodable).join('');
}

function glyphNames(text: string): string[] {
  return Array.from(text)
    .filter(encodable)
    .map((character) => Encodings.WinAnsi.encodeUnicodeCodePoint(character.codePointAt(0) ?? 0).name);
}

/**
 * Width in points of `text` set in a standard font at `size`, kerning
 * included. Characters `drawableText` drops are ignored.
 */
export function widthOfText(text: string, font: StandardFontName, size: number): number {
  const metrics = METRICS[font];
  const glyphs = glyphNames(text);
  let total = 0;

  for (let index = 0; index < glyphs.length; index++) {
    const left = glyphs[index];
    const right = glyphs[index + 1];
    const kerning = right === undefined ? 0 : (metrics.getXAxisKerningForPair(left, right) ?? 0);
    total += (metrics.getWidthOfGlyph(left) ?? 0) + kerning;
  }

  return (total * size) / 1000;
}
