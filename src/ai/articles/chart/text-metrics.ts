/**
 * Text measurement for layout.
 *
 * Width is estimated from an average glyph advance; no font files are read,
 * so layouts are identical on every machine.
 */

import type { TypographySettings } from '../config';

export type FontWeight = 'normal' | 'bold';

export interface TextBoxSize {
  readonly width: number;
  readonly height: number;
}

export function measureText(
  text: string,
  fontSize: number,
  typography: TypographySettings,
  weight: FontWeight = 'normal'
): TextBoxSize {
  const ratio = weight === 'bold' ? typography.boldCharWidthRatio : typography.charWidthRatio;
  const glyphs = [...text].length;
  return {
    width: glyphs * fontSize * ratio,
    height: fontSize * typography.lineHeight,
  };
}

export interface FittedText {
  readonly fontSize: number;
  readonly width: number;
  readonly height: number;
  readonly fits: boolean;
}

/**
 * Largest whole font size between `preferred` and `floor` at which `text`
 * fits `availableWidth`. When nothing fits, returns the floor size with
 * `fits: false`; callers decide whether that is an error.
 */
export function fitText(
  text: string,
  availableWidth: number,
  preferred: number,
  floor: number,
  typography: TypographySettings,
  weight: FontWeight = 'normal'
): FittedText {
  for (let size = preferred; size >= floor; size--) {
    const { width, height } = measureText(text, size, typography, weight);
    if (width <= availableWidth) {
      return { fontSize: size, width, height, fits: true };
    }
  }
  const { width, height } = measureText(text, floor, typography, weight);
  return { fontSize: floor, width, height, fits: false };
}
